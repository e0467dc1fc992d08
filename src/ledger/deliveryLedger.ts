import { closeSync, copyFileSync, existsSync, fsyncSync, openSync, readFileSync, renameSync, rmSync, writeSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { z } from 'zod';
import { logError, logInfo, logWarn } from '../logger.js';
import { ensureDirForFile, errorMessage, nowMs } from '../utils.js';

const ledgerFileSchema = z
  .object({
    sent_alerts: z.array(z.string()),
    // Recipients already reached for keys that are not yet committed.
    delivery_receipts: z.record(z.array(z.string())).optional(),
    last_updated: z.string().nullable().optional(),
  })
  .passthrough();

export interface LedgerState {
  sentAlerts: ReadonlySet<string>;
  receipts: ReadonlyMap<string, ReadonlySet<string>>;
  lastUpdated: string | null;
}

const emptyState = (): LedgerState => ({ sentAlerts: new Set(), receipts: new Map(), lastUpdated: null });

export class LedgerCorruptionError extends Error {
  constructor(
    message: string,
    readonly ledgerPath: string,
    readonly preservedPath: string | null,
  ) {
    super(message);
    this.name = 'LedgerCorruptionError';
  }
}

export class LedgerCommitError extends Error {
  constructor(
    message: string,
    readonly ledgerPath: string,
    readonly keys: readonly string[],
  ) {
    super(message);
    this.name = 'LedgerCommitError';
  }
}

interface LedgerSnapshot {
  state: LedgerState;
  // Other top-level fields in the file (e.g. a subscriber list) survive commits.
  extra: Record<string, unknown>;
}

/**
 * File-backed record of alert keys that have already been dispatched.
 *
 * Reads fail closed: an unreadable or malformed file raises
 * LedgerCorruptionError instead of yielding an empty ledger, and a copy of
 * the bad artifact is left beside it. Besides committed keys the file holds
 * per-recipient receipts for a batch that was deferred, so a retry can skip
 * recipients it already reached. Writes go through a temp file that is
 * fsynced and re-validated before being renamed over the ledger.
 */
export class DeliveryLedger {
  private state: LedgerState = emptyState();

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  load(): LedgerState {
    this.state = this.readSnapshot().state;
    return this.state;
  }

  contains(key: string): boolean {
    return this.state.sentAlerts.has(key);
  }

  hasReceipt(key: string, recipientId: string): boolean {
    return this.state.receipts.get(key)?.has(recipientId) ?? false;
  }

  /** Records the keys as sent and drops their receipts. */
  commit(newKeys: readonly string[]): LedgerState {
    // Re-read so a concurrent run's committed keys are kept.
    const current = this.readSnapshot();
    const sentAlerts = new Set(current.state.sentAlerts);
    for (const key of newKeys) {
      sentAlerts.add(key);
    }
    const receipts = new Map(current.state.receipts);
    for (const key of sentAlerts) {
      receipts.delete(key);
    }

    this.write(current.extra, sentAlerts, receipts, newKeys);
    logInfo(`Ledger committed ${newKeys.length} new key(s); ${sentAlerts.size} total`);
    return this.state;
  }

  /** Adds per-recipient receipts for keys that stay uncommitted. */
  recordReceipts(delivered: ReadonlyMap<string, readonly string[]>): LedgerState {
    const current = this.readSnapshot();
    const receipts = new Map<string, ReadonlySet<string>>(current.state.receipts);
    let added = 0;
    for (const [key, recipientIds] of delivered) {
      if (current.state.sentAlerts.has(key)) {
        continue;
      }
      const merged = new Set(receipts.get(key));
      for (const id of recipientIds) {
        if (!merged.has(id)) {
          merged.add(id);
          added += 1;
        }
      }
      receipts.set(key, merged);
    }

    this.write(current.extra, current.state.sentAlerts, receipts, [...delivered.keys()]);
    logInfo(`Ledger saved ${added} new delivery receipt(s) across ${delivered.size} key(s)`);
    return this.state;
  }

  private write(
    extra: Record<string, unknown>,
    sentAlerts: ReadonlySet<string>,
    receipts: ReadonlyMap<string, ReadonlySet<string>>,
    keys: readonly string[],
  ): void {
    const lastUpdated = new Date(nowMs()).toISOString();
    const document: Record<string, unknown> = {
      ...extra,
      sent_alerts: [...sentAlerts],
    };
    if (receipts.size > 0) {
      document.delivery_receipts = Object.fromEntries([...receipts].map(([key, ids]) => [key, [...ids]] as const));
    }
    document.last_updated = lastUpdated;

    const tempPath = join(dirname(this.filePath), `${basename(this.filePath)}.${process.pid}.${nowMs()}.tmp`);

    try {
      ensureDirForFile(this.filePath);
      writeDurably(tempPath, `${JSON.stringify(document, null, 2)}\n`);
      const written = parseLedger(readFileSync(tempPath, 'utf8'));
      if (!written.ok) {
        throw new Error(`written ledger failed re-validation: ${written.reason}`);
      }
      const { state } = written.snapshot;
      if (state.sentAlerts.size !== sentAlerts.size || state.receipts.size !== receipts.size) {
        throw new Error(
          `written ledger holds ${state.sentAlerts.size} keys and ${state.receipts.size} receipt sets, expected ${sentAlerts.size} and ${receipts.size}`,
        );
      }
      renameSync(tempPath, this.filePath);
    } catch (error) {
      discardTempFile(tempPath);
      throw new LedgerCommitError(
        `Failed to commit delivery ledger ${this.filePath}: ${errorMessage(error)}`,
        this.filePath,
        keys,
      );
    }

    this.state = { sentAlerts: new Set(sentAlerts), receipts: new Map(receipts), lastUpdated };
  }

  private readSnapshot(): LedgerSnapshot {
    if (!existsSync(this.filePath)) {
      return { state: emptyState(), extra: {} };
    }

    let text: string;
    try {
      text = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      throw this.corruption(`unreadable: ${errorMessage(error)}`);
    }

    const parsed = parseLedger(text);
    if (!parsed.ok) {
      throw this.corruption(parsed.reason);
    }
    return parsed.snapshot;
  }

  private corruption(reason: string): LedgerCorruptionError {
    const preservedPath = `${this.filePath}.corrupt-${nowMs()}`;
    let preserved: string | null = preservedPath;
    try {
      copyFileSync(this.filePath, preservedPath);
    } catch (error) {
      preserved = null;
      logError(`Could not preserve corrupt ledger ${this.filePath}`, error);
    }

    const where = preserved ? `; copy preserved at ${preserved}` : '';
    return new LedgerCorruptionError(
      `Delivery ledger ${this.filePath} is corrupt (${reason})${where}. Refusing to continue: an empty ledger would re-send every alert.`,
      this.filePath,
      preserved,
    );
  }
}

type ParseResult = { ok: true; snapshot: LedgerSnapshot } | { ok: false; reason: string };

function parseLedger(text: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${errorMessage(error)}` };
  }

  const result = ledgerFileSchema.safeParse(raw);
  if (!result.success) {
    return { ok: false, reason: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ') };
  }

  const { sent_alerts: sentAlerts, delivery_receipts: receipts, last_updated: lastUpdated, ...extra } = result.data;
  return {
    ok: true,
    snapshot: {
      state: {
        sentAlerts: new Set(sentAlerts),
        receipts: new Map(Object.entries(receipts ?? {}).map(([key, ids]) => [key, new Set(ids)] as const)),
        lastUpdated: lastUpdated ?? null,
      },
      extra,
    },
  };
}

function writeDurably(filePath: string, contents: string): void {
  const fd = openSync(filePath, 'w');
  try {
    writeSync(fd, contents);
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}

function discardTempFile(tempPath: string): void {
  try {
    rmSync(tempPath, { force: true });
  } catch (error) {
    logWarn(`Could not remove ledger temp file ${tempPath}`, error);
  }
}
