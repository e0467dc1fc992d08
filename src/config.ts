import { resolve } from 'node:path';
import { z } from 'zod';
import type { DispatchConfig } from './dispatch/session.js';

export interface AppConfig {
  emailOctopus: {
    apiKey: string;
    listId: string;
    automationId: string;
    apiBase: string;
    requestTimeoutMs: number;
    pageSize: number;
    subjectField: string;
    textField: string;
  };
  driver: {
    maxAttempts: number;
    backoffUnitMs: number;
    maxBackoffMs: number;
  };
  dispatch: DispatchConfig;
  clubDataPath: string;
  ledgerPath: string;
}

const flag = (fallback: '0' | '1') =>
  z
    .enum(['0', '1', 'true', 'false'])
    .default(fallback)
    .transform((value) => value === '1' || value === 'true');

const envSchema = z.object({
  EMAILOCTOPUS_API_KEY: z.string().min(1),
  EMAILOCTOPUS_LIST_ID: z.string().min(1),
  EMAILOCTOPUS_AUTOMATION_ID: z.string().min(1),
  EMAILOCTOPUS_API_BASE: z.string().url().default('https://emailoctopus.com/api/1.6'),
  EMAILOCTOPUS_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),
  EMAILOCTOPUS_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(100),
  EMAILOCTOPUS_SUBJECT_FIELD: z.string().min(1).default('AlertSubject'),
  EMAILOCTOPUS_TEXT_FIELD: z.string().min(1).default('AlertText'),
  CLUB_DATA_PATH: z.string().min(1).default(resolve(process.cwd(), 'data', '50_club.json')),
  LEDGER_PATH: z.string().min(1).default(resolve(process.cwd(), 'data', 'emails.json')),
  DISPATCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  DISPATCH_BACKOFF_UNIT_MS: z.coerce.number().int().min(0).max(60_000).default(1_000),
  DISPATCH_MAX_BACKOFF_MS: z.coerce.number().int().min(0).max(300_000).default(8_000),
  DISPATCH_SUCCESS_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.95),
  DISPATCH_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  DISPATCH_PACE_EVERY: z.coerce.number().int().min(1).max(1_000).default(10),
  DISPATCH_PACE_MS: z.coerce.number().int().min(0).max(60_000).default(1_000),
  FRESHNESS_WINDOW_DAYS: z.coerce.number().int().min(0).max(365).default(1),
  SEASON_START_MONTH: z.coerce.number().int().min(1).max(12).default(10),
  REFERENCE_TIME_ZONE: z.string().min(1).default('America/New_York'),
  DRY_RUN: flag('0'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (!isSupportedTimeZone(parsed.REFERENCE_TIME_ZONE)) {
    throw new Error(`REFERENCE_TIME_ZONE (${parsed.REFERENCE_TIME_ZONE}) is not a known IANA time zone`);
  }
  if (parsed.DISPATCH_MAX_BACKOFF_MS < parsed.DISPATCH_BACKOFF_UNIT_MS) {
    throw new Error(
      `DISPATCH_MAX_BACKOFF_MS (${parsed.DISPATCH_MAX_BACKOFF_MS}) must be at least DISPATCH_BACKOFF_UNIT_MS (${parsed.DISPATCH_BACKOFF_UNIT_MS})`,
    );
  }
  if (parsed.EMAILOCTOPUS_SUBJECT_FIELD === parsed.EMAILOCTOPUS_TEXT_FIELD) {
    throw new Error('EMAILOCTOPUS_TEXT_FIELD must differ from EMAILOCTOPUS_SUBJECT_FIELD');
  }
  if (resolve(parsed.CLUB_DATA_PATH) === resolve(parsed.LEDGER_PATH)) {
    throw new Error('LEDGER_PATH must differ from CLUB_DATA_PATH');
  }

  return {
    emailOctopus: {
      apiKey: parsed.EMAILOCTOPUS_API_KEY,
      listId: parsed.EMAILOCTOPUS_LIST_ID,
      automationId: parsed.EMAILOCTOPUS_AUTOMATION_ID,
      apiBase: parsed.EMAILOCTOPUS_API_BASE,
      requestTimeoutMs: parsed.EMAILOCTOPUS_REQUEST_TIMEOUT_MS,
      pageSize: parsed.EMAILOCTOPUS_PAGE_SIZE,
      subjectField: parsed.EMAILOCTOPUS_SUBJECT_FIELD,
      textField: parsed.EMAILOCTOPUS_TEXT_FIELD,
    },
    driver: {
      maxAttempts: parsed.DISPATCH_MAX_ATTEMPTS,
      backoffUnitMs: parsed.DISPATCH_BACKOFF_UNIT_MS,
      maxBackoffMs: parsed.DISPATCH_MAX_BACKOFF_MS,
    },
    dispatch: {
      successThreshold: parsed.DISPATCH_SUCCESS_THRESHOLD,
      freshnessWindowDays: parsed.FRESHNESS_WINDOW_DAYS,
      seasonStartMonth: parsed.SEASON_START_MONTH,
      timeZone: parsed.REFERENCE_TIME_ZONE,
      concurrency: parsed.DISPATCH_CONCURRENCY,
      paceEvery: parsed.DISPATCH_PACE_EVERY,
      paceMs: parsed.DISPATCH_PACE_MS,
      dryRun: parsed.DRY_RUN,
    },
    clubDataPath: parsed.CLUB_DATA_PATH,
    ledgerPath: parsed.LEDGER_PATH,
  };
}

function isSupportedTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
