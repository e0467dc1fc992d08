export interface ScoringEvent {
  date: string;
  player: string;
  team: string;
  points: number;
  opponent: string;
}

/** Untrusted record as read from an event source; nothing is guaranteed. */
export type CandidateEvent = Partial<Record<keyof ScoringEvent, unknown>>;

export interface PendingAlert {
  alertKey: string;
  event: ScoringEvent;
}

export interface Recipient {
  id: string;
  address: string;
}

export type RecipientFetchResult =
  | { kind: 'available'; recipients: Recipient[] }
  | { kind: 'unavailable'; reason: string };

export interface RecipientSource {
  fetchAll(): Promise<RecipientFetchResult>;
}

export type EventFetchResult =
  | { kind: 'available'; candidates: CandidateEvent[] }
  | { kind: 'unavailable'; reason: string };

export interface EventSource {
  fetchCandidates(): Promise<EventFetchResult>;
}

export interface AlertContent {
  subject: string;
  text: string;
}

/**
 * Closed set of transport outcomes. Adapters map their wire-level status
 * codes and error vocabulary onto these variants.
 */
export type TransportResult =
  | { kind: 'sent' }
  | { kind: 'already_notified' }
  | { kind: 'rate_limited'; reason: string }
  | { kind: 'transient'; reason: string }
  | { kind: 'rejected'; reason: string };

export interface NotificationTransport {
  send(recipient: Recipient, content: AlertContent): Promise<TransportResult>;
}

export type DispatchOutcome =
  | { kind: 'delivered'; attempts: number }
  | { kind: 'already_delivered'; attempts: number }
  | { kind: 'failed'; reason: string; attempts: number };
