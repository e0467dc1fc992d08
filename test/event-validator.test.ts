import { describe, expect, it } from 'vitest';
import {
  alertKey,
  createValidationContext,
  partitionEvents,
  validateEvent,
  type ValidationContext,
} from '../src/events/validator.js';
import type { CandidateEvent } from '../src/types.js';

const context: ValidationContext = { today: '2024-01-11', seasonStart: '2023-10-01' };

function makeEvent(overrides: CandidateEvent = {}): CandidateEvent {
  return {
    date: '2024-01-10',
    player: 'A. Player',
    team: 'LAL',
    points: 50,
    opponent: 'BOS',
    ...overrides,
  };
}

describe('validateEvent', () => {
  it('accepts a plausible 50-point event', () => {
    expect(validateEvent(makeEvent(), context)).toEqual([]);
    expect(validateEvent(makeEvent({ points: 100, team: 'GS' }), context)).toEqual([]);
  });

  it('flags every point total outside 50-100', () => {
    for (let points = 0; points < 50; points += 1) {
      expect(validateEvent(makeEvent({ points }), context)).not.toEqual([]);
    }
    for (let points = 101; points <= 250; points += 1) {
      expect(validateEvent(makeEvent({ points }), context)).not.toEqual([]);
    }
  });

  it('labels totals above 100 as impossible rather than low', () => {
    expect(validateEvent(makeEvent({ points: 101 }), context)).toEqual([
      'points 101 is impossible (above 100); likely upstream corruption',
    ]);
    expect(validateEvent(makeEvent({ points: 49 }), context)).toEqual(['points 49 is below the 50-point threshold']);
  });

  it('rejects non-integer points', () => {
    expect(validateEvent(makeEvent({ points: 50.5 }), context)).toEqual(['points must be an integer (got 50.5)']);
    expect(validateEvent(makeEvent({ points: '55' }), context)).toEqual(['points must be an integer (got "55")']);
  });

  it('reports all violations together', () => {
    const violations = validateEvent(
      makeEvent({ date: '2024-02-30', player: '', team: 'lal', points: 120 }),
      context,
    );

    expect(violations).toEqual([
      'player must not be empty',
      'points 120 is impossible (above 100); likely upstream corruption',
      'date "2024-02-30" is not a valid YYYY-MM-DD calendar day',
      'team "lal" must be 2-4 uppercase letters',
    ]);
  });

  it('reports missing required fields', () => {
    expect(validateEvent({}, context)).toEqual([
      'player is required',
      'date is required',
      'team is required',
      'points must be an integer (got undefined)',
    ]);
  });

  it('rejects future dates and dates before the season start', () => {
    expect(validateEvent(makeEvent({ date: '2024-01-12' }), context)).toEqual([
      'date 2024-01-12 is in the future (today is 2024-01-11)',
    ]);
    expect(validateEvent(makeEvent({ date: '2023-09-30' }), context)).toEqual([
      'date 2023-09-30 is before the season start 2023-10-01',
    ]);
    expect(validateEvent(makeEvent({ date: '2024-01-11' }), context)).toEqual([]);
    expect(validateEvent(makeEvent({ date: '2023-10-01' }), context)).toEqual([]);
  });

  it('rejects dates outside the fixed calendar format', () => {
    expect(validateEvent(makeEvent({ date: '01/10/2024' }), context)).toEqual([
      'date "01/10/2024" is not a valid YYYY-MM-DD calendar day',
    ]);
  });

  it('requires 2-4 uppercase letters for the team code', () => {
    expect(validateEvent(makeEvent({ team: 'L' }), context)).toEqual(['team "L" must be 2-4 uppercase letters']);
    expect(validateEvent(makeEvent({ team: 'LAKER' }), context)).toEqual([
      'team "LAKER" must be 2-4 uppercase letters',
    ]);
  });
});

describe('createValidationContext', () => {
  it('derives today in the reference time zone', () => {
    // 03:00 UTC is still the previous evening in New York.
    expect(createValidationContext(new Date('2024-01-11T03:00:00.000Z'), 'America/New_York', 10)).toEqual({
      today: '2024-01-10',
      seasonStart: '2023-10-01',
    });
  });

  it('starts the season in the current year once the start month is reached', () => {
    expect(createValidationContext(new Date('2024-10-05T12:00:00.000Z'), 'America/New_York', 10)).toEqual({
      today: '2024-10-05',
      seasonStart: '2024-10-01',
    });
  });
});

describe('alertKey', () => {
  it('joins date, player and points', () => {
    expect(alertKey({ date: '2024-01-10', player: 'A. Player', points: 50 })).toBe('2024-01-10_A. Player_50');
  });

  it('is stable and distinct across triples', () => {
    const triples = [
      { date: '2024-01-10', player: 'A. Player', points: 50 },
      { date: '2024-01-10', player: 'A. Player', points: 51 },
      { date: '2024-01-11', player: 'A. Player', points: 50 },
      { date: '2024-01-10', player: 'B. Player', points: 50 },
      { date: '2024-01-10', player: 'A_Player', points: 50 },
    ];
    const keys = triples.map(alertKey);

    expect(new Set(keys).size).toBe(triples.length);
    expect(triples.map(alertKey)).toEqual(keys);
  });
});

describe('partitionEvents', () => {
  it('splits candidates into typed events and violations', () => {
    const result = partitionEvents([makeEvent({ player: '  A. Player ' }), makeEvent({ points: 120 })], context);

    expect(result.valid).toEqual([
      { date: '2024-01-10', player: '  A. Player ', team: 'LAL', points: 50, opponent: 'BOS' },
    ]);
    expect(result.valid.map(alertKey)).toEqual(['2024-01-10_  A. Player _50']);
    expect(result.invalid).toHaveLength(1);
    expect(result.invalid[0]?.violations).toEqual([
      'points 120 is impossible (above 100); likely upstream corruption',
    ]);
  });
});
