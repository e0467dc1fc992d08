import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { CandidateEvent, EventFetchResult, EventSource } from '../types.js';
import { errorMessage } from '../utils.js';

// Individual scorer rows stay untyped here; the validator owns their rules.
const clubDataSchema = z
  .object({
    season: z.string().optional(),
    lastUpdated: z.string().optional(),
    lastCheckedDate: z.string().optional(),
    totalGames: z.number().optional(),
    scorers: z.array(z.unknown()),
  })
  .passthrough();

export class ClubDataEventSource implements EventSource {
  constructor(private readonly filePath: string) {}

  async fetchCandidates(): Promise<EventFetchResult> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      return { kind: 'unavailable', reason: `Could not read club data ${this.filePath}: ${errorMessage(error)}` };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return { kind: 'unavailable', reason: `Club data ${this.filePath} is not valid JSON: ${errorMessage(error)}` };
    }

    const parsed = clubDataSchema.safeParse(raw);
    if (!parsed.success) {
      return { kind: 'unavailable', reason: `Unexpected club data shape: ${parsed.error.message}` };
    }

    return {
      kind: 'available',
      candidates: parsed.data.scorers.map(toCandidate),
    };
  }
}

function toCandidate(row: unknown): CandidateEvent {
  if (!row || typeof row !== 'object' || Array.isArray(row)) {
    return {};
  }
  const record = row as Record<string, unknown>;
  return {
    date: record.date,
    player: record.player,
    team: record.team,
    points: record.points,
    opponent: record.opponent,
  };
}
