import type { CandidateEvent, ScoringEvent } from '../types.js';
import { calendarDateInTimeZone, parseCalendarDate, seasonStartDate } from './dates.js';

export const MIN_POINTS = 50;
export const MAX_POINTS = 100;

const TEAM_CODE_PATTERN = /^[A-Z]{2,4}$/;

export interface ValidationContext {
  /** Today's calendar day in the reference time zone. */
  today: string;
  seasonStart: string;
}

export interface InvalidCandidate {
  candidate: CandidateEvent;
  violations: string[];
}

export interface PartitionedEvents {
  valid: ScoringEvent[];
  invalid: InvalidCandidate[];
}

export function createValidationContext(now: Date, timeZone: string, seasonStartMonth: number): ValidationContext {
  const today = calendarDateInTimeZone(now, timeZone);
  return {
    today,
    seasonStart: seasonStartDate(today, seasonStartMonth),
  };
}

/** Built from the fields exactly as the event source wrote them; existing ledgers depend on it. */
export function alertKey(event: Pick<ScoringEvent, 'date' | 'player' | 'points'>): string {
  return `${event.date}_${event.player}_${event.points}`;
}

/** Every rule the candidate breaks; an empty list means it is dispatchable. */
export function validateEvent(candidate: CandidateEvent, context: ValidationContext): string[] {
  return inspect(candidate, context).violations;
}

export function partitionEvents(candidates: readonly CandidateEvent[], context: ValidationContext): PartitionedEvents {
  const valid: ScoringEvent[] = [];
  const invalid: InvalidCandidate[] = [];

  for (const candidate of candidates) {
    const result = inspect(candidate, context);
    if (result.event) {
      valid.push(result.event);
    } else {
      invalid.push({ candidate, violations: result.violations });
    }
  }

  return { valid, invalid };
}

function inspect(
  candidate: CandidateEvent,
  context: ValidationContext,
): { event: ScoringEvent | null; violations: string[] } {
  const violations: string[] = [];

  const player = requiredText(candidate.player, 'player', violations);
  const date = requiredText(candidate.date, 'date', violations);
  const team = requiredText(candidate.team, 'team', violations);
  const opponent = typeof candidate.opponent === 'string' ? candidate.opponent.trim() : '';

  const points = candidate.points;
  if (typeof points !== 'number' || !Number.isInteger(points)) {
    violations.push(`points must be an integer (got ${describe(points)})`);
  } else if (points > MAX_POINTS) {
    violations.push(`points ${points} is impossible (above ${MAX_POINTS}); likely upstream corruption`);
  } else if (points < MIN_POINTS) {
    violations.push(`points ${points} is below the ${MIN_POINTS}-point threshold`);
  }

  if (date !== null) {
    if (parseCalendarDate(date) === null) {
      violations.push(`date "${date}" is not a valid YYYY-MM-DD calendar day`);
    } else {
      // Same fixed-width format on both sides, so string order is day order.
      if (date > context.today) {
        violations.push(`date ${date} is in the future (today is ${context.today})`);
      }
      if (date < context.seasonStart) {
        violations.push(`date ${date} is before the season start ${context.seasonStart}`);
      }
    }
  }

  if (team !== null && !TEAM_CODE_PATTERN.test(team)) {
    violations.push(`team "${team}" must be 2-4 uppercase letters`);
  }

  if (violations.length > 0 || player === null || date === null || team === null || typeof points !== 'number') {
    return { event: null, violations };
  }

  return {
    event: { date, player, team, points, opponent },
    violations,
  };
}

function requiredText(value: unknown, field: string, violations: string[]): string | null {
  if (value === undefined || value === null) {
    violations.push(`${field} is required`);
    return null;
  }
  if (typeof value !== 'string') {
    violations.push(`${field} must be a string (got ${describe(value)})`);
    return null;
  }
  if (value.trim().length === 0) {
    violations.push(`${field} must not be empty`);
    return null;
  }
  return value;
}

function describe(value: unknown): string {
  if (value === undefined) {
    return 'undefined';
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  return String(value);
}
