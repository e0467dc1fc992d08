import { logWarn } from '../logger.js';
import type { AlertContent, DispatchOutcome, NotificationTransport, Recipient, TransportResult } from '../types.js';
import { errorMessage } from '../utils.js';
import { retryWithBackoff, type BackoffPolicy } from './retry.js';

interface DispatchDriverOptions {
  transport: NotificationTransport;
  maxAttempts?: number;
  backoffUnitMs?: number;
  maxBackoffMs?: number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

type Delivery = 'delivered' | 'already_delivered';

export class DispatchDriver {
  static readonly DEFAULT_MAX_ATTEMPTS = 3;
  static readonly DEFAULT_BACKOFF_UNIT_MS = 1_000;
  static readonly DEFAULT_MAX_BACKOFF_MS = 8_000;

  private readonly transport: NotificationTransport;
  private readonly policy: BackoffPolicy;
  private readonly wait?: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: DispatchDriverOptions) {
    this.transport = options.transport;
    const unitMs = Math.max(0, options.backoffUnitMs ?? DispatchDriver.DEFAULT_BACKOFF_UNIT_MS);
    this.policy = {
      maxAttempts: Math.max(1, options.maxAttempts ?? DispatchDriver.DEFAULT_MAX_ATTEMPTS),
      unitMs,
      maxDelayMs: Math.max(unitMs, options.maxBackoffMs ?? DispatchDriver.DEFAULT_MAX_BACKOFF_MS),
    };
    this.wait = options.wait;
  }

  get maxAttempts(): number {
    return this.policy.maxAttempts;
  }

  async deliver(recipient: Recipient, content: AlertContent, signal?: AbortSignal): Promise<DispatchOutcome> {
    const result = await retryWithBackoff<Delivery>(
      this.policy,
      async (attempt) => {
        const sent = await this.sendOnce(recipient, content);
        switch (sent.kind) {
          case 'sent':
            return { done: true, value: 'delivered' };
          case 'already_notified':
            return { done: true, value: 'already_delivered' };
          case 'rate_limited':
            logWarn(`Rate limited sending to ${recipient.address} (attempt ${attempt}/${this.policy.maxAttempts})`);
            return { done: false, retryable: true, reason: `rate limited: ${sent.reason}` };
          case 'transient':
            logWarn(`Transient failure sending to ${recipient.address} (attempt ${attempt}/${this.policy.maxAttempts}): ${sent.reason}`);
            return { done: false, retryable: true, reason: sent.reason };
          case 'rejected':
            return { done: false, retryable: false, reason: sent.reason };
        }
      },
      { signal, wait: this.wait },
    );

    if (result.ok) {
      return { kind: result.value, attempts: result.attempts };
    }
    const reason = result.exhausted ? `${result.reason} (gave up after ${result.attempts} attempts)` : result.reason;
    return { kind: 'failed', reason, attempts: result.attempts };
  }

  private async sendOnce(recipient: Recipient, content: AlertContent): Promise<TransportResult> {
    try {
      return await this.transport.send(recipient, content);
    } catch (error) {
      // Adapters are expected to classify their own errors; anything that
      // escapes is unknown and therefore not retried.
      return { kind: 'rejected', reason: `transport error: ${errorMessage(error)}` };
    }
  }
}
