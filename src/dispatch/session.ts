import { parseCalendarDate } from '../events/dates.js';
import { alertKey, createValidationContext, partitionEvents, type InvalidCandidate } from '../events/validator.js';
import type { LedgerState } from '../ledger/deliveryLedger.js';
import { logError, logFatal, logInfo, logWarn } from '../logger.js';
import type { AlertContent, DispatchOutcome, EventSource, PendingAlert, Recipient, RecipientSource } from '../types.js';
import { errorMessage, mapWithConcurrency, sleep } from '../utils.js';
import { buildAlertContent } from './content.js';

export interface DispatchConfig {
  /** Minimum (delivered + already delivered) / attempted ratio required to commit. */
  successThreshold: number;
  /** Events older than this many days before today are stale and never sent. */
  freshnessWindowDays: number;
  /** Month (1-12) on whose first day a season opens. */
  seasonStartMonth: number;
  /** Time zone that decides what "today" is. */
  timeZone: string;
  /** Recipients delivered to in parallel. */
  concurrency: number;
  /** Pause for `paceMs` after every `paceEvery` recipients. */
  paceEvery: number;
  paceMs: number;
  dryRun: boolean;
}

export const DEFAULT_DISPATCH_CONFIG: Readonly<DispatchConfig> = {
  successThreshold: 0.95,
  freshnessWindowDays: 1,
  seasonStartMonth: 10,
  timeZone: 'America/New_York',
  concurrency: 4,
  paceEvery: 10,
  paceMs: 1_000,
  dryRun: false,
};

export interface DeliveryLedgerPort {
  load(): LedgerState;
  contains(key: string): boolean;
  hasReceipt(key: string, recipientId: string): boolean;
  commit(newKeys: readonly string[]): LedgerState;
  recordReceipts(delivered: ReadonlyMap<string, readonly string[]>): LedgerState;
}

export interface DeliveryDriverPort {
  deliver(recipient: Recipient, content: AlertContent, signal?: AbortSignal): Promise<DispatchOutcome>;
}

export type SessionPhase =
  | 'idle'
  | 'validating'
  | 'diffing'
  | 'fetching_recipients'
  | 'dispatching'
  | 'deciding'
  | 'committed'
  | 'deferred'
  | 'fatal';

export type SessionReason =
  | 'no_new_events'
  | 'delivered'
  | 'no_recipients'
  | 'dry_run'
  | 'events_unavailable'
  | 'audience_unavailable'
  | 'below_threshold'
  | 'transport_misconfigured'
  | 'delivered_not_recorded';

export interface DispatchCounts {
  delivered: number;
  alreadyDelivered: number;
  /** Skipped: a receipt from an earlier deferred run covers every pending alert. */
  previouslyDelivered: number;
  failed: number;
  total: number;
}

export interface RecipientFailure {
  recipient: Recipient;
  reason: string;
}

export interface SessionReport {
  status: 'committed' | 'deferred' | 'fatal';
  reason: SessionReason;
  /** True when the hosting process should exit successfully. */
  ok: boolean;
  message: string;
  phases: SessionPhase[];
  invalid: InvalidCandidate[];
  stale: PendingAlert[];
  pending: PendingAlert[];
  committedKeys: string[];
  counts: DispatchCounts;
  failures: RecipientFailure[];
}

interface DispatchSessionDeps {
  events: EventSource;
  ledger: DeliveryLedgerPort;
  recipients: RecipientSource;
  driver: DeliveryDriverPort;
  config?: Partial<DispatchConfig>;
  now?: () => Date;
  wait?: (ms: number) => Promise<void>;
}

const EMPTY_COUNTS: DispatchCounts = { delivered: 0, alreadyDelivered: 0, previouslyDelivered: 0, failed: 0, total: 0 };

/** One recipient and the pending alerts it has not received yet. */
interface DeliveryPlan {
  recipient: Recipient;
  alerts: PendingAlert[];
  content: AlertContent;
}

/**
 * One end-to-end alert run. Alert keys are only committed once the batch
 * reaches the success threshold. A deferred batch leaves per-recipient
 * receipts in the ledger instead, so the retry reaches only the recipients
 * that are still missing an alert.
 */
export class DispatchSession {
  readonly config: Readonly<DispatchConfig>;

  private phases: SessionPhase[] = ['idle'];
  private invalid: InvalidCandidate[] = [];
  private stale: PendingAlert[] = [];
  private pending: PendingAlert[] = [];

  constructor(private readonly deps: DispatchSessionDeps) {
    this.config = { ...DEFAULT_DISPATCH_CONFIG, ...deps.config };
  }

  /** Aborting `signal` stops further contact; the batch is then decided on what went out. */
  async run(signal?: AbortSignal): Promise<SessionReport> {
    this.phases = ['idle'];
    this.invalid = [];
    this.stale = [];
    this.pending = [];

    this.enter('validating');
    const fetched = await this.deps.events.fetchCandidates();
    if (fetched.kind === 'unavailable') {
      logError(`Scoring events unavailable: ${fetched.reason}`);
      return this.finish('deferred', 'events_unavailable', `Scoring events unavailable: ${fetched.reason}`);
    }

    const context = createValidationContext(this.now(), this.config.timeZone, this.config.seasonStartMonth);
    const { valid, invalid } = partitionEvents(fetched.candidates, context);
    this.invalid = invalid;
    for (const entry of invalid) {
      logWarn(`Skipping invalid scoring event: ${entry.violations.join('; ')}`, entry.candidate);
    }

    this.enter('diffing');
    // LedgerCorruptionError is deliberately not caught: the run must halt.
    this.deps.ledger.load();

    const todayDay = parseCalendarDate(context.today);
    const seen = new Set<string>();
    let alreadySent = 0;
    for (const event of valid) {
      const key = alertKey(event);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      if (this.deps.ledger.contains(key)) {
        alreadySent += 1;
        continue;
      }

      const eventDay = parseCalendarDate(event.date);
      if (todayDay !== null && eventDay !== null && todayDay - eventDay > this.config.freshnessWindowDays) {
        this.stale.push({ alertKey: key, event });
        logWarn(
          `Skipping stale event ${key}: older than ${this.config.freshnessWindowDays} day(s) as of ${context.today}; not recorded as delivered`,
        );
        continue;
      }

      this.pending.push({ alertKey: key, event });
    }

    logInfo(
      `Events: ${fetched.candidates.length} candidate(s), ${invalid.length} invalid, ${alreadySent} already sent, ${this.stale.length} stale, ${this.pending.length} new`,
    );

    if (this.pending.length === 0) {
      return this.finish('committed', 'no_new_events', 'No new 50+ point events to alert about');
    }

    for (const { event } of this.pending) {
      logInfo(`New alert: ${event.player} scored ${event.points} on ${event.date}`);
    }

    this.enter('fetching_recipients');
    const audience = await this.deps.recipients.fetchAll();
    if (audience.kind === 'unavailable') {
      logError(`Recipient list unavailable: ${audience.reason}`);
      return this.finish('deferred', 'audience_unavailable', `Recipient list unavailable: ${audience.reason}`);
    }

    const recipients = audience.recipients;
    if (recipients.length === 0) {
      if (this.config.dryRun) {
        return this.finish('deferred', 'dry_run', 'Dry run: no recipients, would record pending alerts');
      }
      logInfo('No recipients; recording pending alerts as delivered');
      return this.commit('no_recipients', EMPTY_COUNTS, []);
    }

    const plans = this.planDeliveries(recipients);
    const previouslyDelivered = recipients.length - plans.length;
    if (previouslyDelivered > 0) {
      logInfo(`${previouslyDelivered} recipient(s) already received every pending alert on an earlier run`);
    }

    if (this.config.dryRun) {
      const subjects = new Set(plans.map((plan) => plan.content.subject));
      for (const subject of subjects) {
        logInfo(`Dry run: would send "${subject}"`);
      }
      return this.finish('deferred', 'dry_run', `Dry run: ${plans.length} recipient(s) not contacted`);
    }

    this.enter('dispatching');
    logInfo(`Sending alert to ${plans.length} recipient(s)`);
    const outcomes = await this.dispatchAll(plans, signal);

    this.enter('deciding');
    const counts: DispatchCounts = { ...EMPTY_COUNTS, previouslyDelivered, total: recipients.length };
    const failures: RecipientFailure[] = [];
    const receipts = new Map<string, string[]>();
    outcomes.forEach((outcome, index) => {
      const plan = plans[index];
      if (outcome.kind === 'failed') {
        counts.failed += 1;
        failures.push({ recipient: plan.recipient, reason: outcome.reason });
        return;
      }
      if (outcome.kind === 'delivered') {
        counts.delivered += 1;
      } else {
        counts.alreadyDelivered += 1;
      }
      for (const alert of plan.alerts) {
        const ids = receipts.get(alert.alertKey) ?? [];
        ids.push(plan.recipient.id);
        receipts.set(alert.alertKey, ids);
      }
    });

    for (const failure of failures) {
      logWarn(`Delivery to ${failure.recipient.address} failed: ${failure.reason}`);
    }
    logInfo(
      `Dispatch results: ${counts.delivered} delivered, ${counts.alreadyDelivered} already delivered, ` +
        `${counts.previouslyDelivered} previously delivered, ${counts.failed} failed of ${counts.total}`,
    );

    if (plans.length > 0 && counts.alreadyDelivered === plans.length) {
      const message =
        `All ${plans.length} contacted recipient(s) reported the alert as already delivered on a first send; ` +
        'the transport is likely suppressing repeats. Ledger not updated; fix the automation and re-run.';
      logError(message);
      return this.finish('fatal', 'transport_misconfigured', message, counts, failures);
    }

    const effectiveRate = (counts.delivered + counts.alreadyDelivered + counts.previouslyDelivered) / counts.total;
    if (effectiveRate < this.config.successThreshold) {
      return this.defer(effectiveRate, receipts, counts, failures);
    }

    return this.commit('delivered', counts, failures);
  }

  private planDeliveries(recipients: readonly Recipient[]): DeliveryPlan[] {
    const contentByBatch = new Map<string, AlertContent>();
    const plans: DeliveryPlan[] = [];

    for (const recipient of recipients) {
      const alerts = this.pending.filter((alert) => !this.deps.ledger.hasReceipt(alert.alertKey, recipient.id));
      if (alerts.length === 0) {
        continue;
      }
      const batchId = alerts.map((alert) => alert.alertKey).join('\n');
      let content = contentByBatch.get(batchId);
      if (!content) {
        content = buildAlertContent(alerts);
        contentByBatch.set(batchId, content);
      }
      plans.push({ recipient, alerts, content });
    }

    return plans;
  }

  private defer(
    effectiveRate: number,
    receipts: ReadonlyMap<string, readonly string[]>,
    counts: DispatchCounts,
    failures: RecipientFailure[],
  ): SessionReport {
    const reached = counts.delivered + counts.alreadyDelivered;
    if (receipts.size > 0) {
      try {
        this.deps.ledger.recordReceipts(receipts);
      } catch (error) {
        const message =
          `DELIVERED BUT NOT RECORDED: ${reached} recipient(s) received the alert but their delivery receipts ` +
          `could not be saved (${errorMessage(error)}). A re-run would email them again.`;
        logFatal(message);
        return this.finish('fatal', 'delivered_not_recorded', message, counts, failures);
      }
    }

    const message =
      `Success rate ${formatRate(effectiveRate)} is below ${formatRate(this.config.successThreshold)}; ` +
      `alerts not recorded, ${reached} recipient receipt(s) saved so the retry skips them.`;
    logWarn(message);
    return this.finish('deferred', 'below_threshold', message, counts, failures);
  }

  private async dispatchAll(plans: readonly DeliveryPlan[], signal?: AbortSignal): Promise<DispatchOutcome[]> {
    const paceEvery = Math.max(1, this.config.paceEvery);
    const outcomes: DispatchOutcome[] = [];

    for (let start = 0; start < plans.length; start += paceEvery) {
      if (start > 0 && this.config.paceMs > 0) {
        await this.wait(this.config.paceMs);
      }
      if (signal?.aborted) {
        const skipped = plans.length - start;
        logWarn(`Run cancelled; ${skipped} recipient(s) not contacted`);
        for (let index = start; index < plans.length; index += 1) {
          outcomes.push({ kind: 'failed', reason: 'run cancelled before contact', attempts: 0 });
        }
        break;
      }
      const wave = plans.slice(start, start + paceEvery);
      const results = await mapWithConcurrency(wave, this.config.concurrency, (plan) => this.deliverOne(plan, signal));
      outcomes.push(...results);
    }

    return outcomes;
  }

  private async deliverOne(plan: DeliveryPlan, signal?: AbortSignal): Promise<DispatchOutcome> {
    try {
      return await this.deps.driver.deliver(plan.recipient, plan.content, signal);
    } catch (error) {
      return { kind: 'failed', reason: `driver error: ${errorMessage(error)}`, attempts: 0 };
    }
  }

  private commit(reason: 'delivered' | 'no_recipients', counts: DispatchCounts, failures: RecipientFailure[]): SessionReport {
    const keys = this.pending.map((alert) => alert.alertKey);
    try {
      this.deps.ledger.commit(keys);
    } catch (error) {
      const message =
        `DELIVERED BUT NOT RECORDED: ${keys.length} alert(s) went out but the ledger could not be updated ` +
        `(${errorMessage(error)}). Do not re-run until the ledger contains: ${keys.join(', ')}`;
      logFatal(message);
      return this.finish('fatal', 'delivered_not_recorded', message, counts, failures);
    }

    const message =
      reason === 'no_recipients'
        ? `No recipients; recorded ${keys.length} alert(s)`
        : `Alert sent and recorded ${keys.length} alert(s)`;
    logInfo(message);
    return this.finish('committed', reason, message, counts, failures, keys);
  }

  private finish(
    status: SessionReport['status'],
    reason: SessionReason,
    message: string,
    counts: DispatchCounts = EMPTY_COUNTS,
    failures: RecipientFailure[] = [],
    committedKeys: string[] = [],
  ): SessionReport {
    this.enter(status);
    return {
      status,
      reason,
      ok: status === 'committed' || reason === 'dry_run',
      message,
      phases: [...this.phases],
      invalid: this.invalid,
      stale: this.stale,
      pending: this.pending,
      committedKeys,
      counts: { ...counts },
      failures,
    };
  }

  private enter(phase: SessionPhase): void {
    this.phases.push(phase);
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private wait(ms: number): Promise<void> {
    return this.deps.wait ? this.deps.wait(ms) : sleep(ms);
  }
}

function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}
