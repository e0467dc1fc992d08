import { z } from 'zod';
import { retryWithBackoff, type BackoffPolicy } from '../dispatch/retry.js';
import { logWarn } from '../logger.js';
import type {
  AlertContent,
  NotificationTransport,
  Recipient,
  RecipientFetchResult,
  RecipientSource,
  TransportResult,
} from '../types.js';
import { errorMessage } from '../utils.js';

interface EmailOctopusConfig {
  apiBase: string;
  apiKey: string;
  listId: string;
  automationId: string;
  requestTimeoutMs?: number;
  pageSize?: number;
  /** Contact custom fields the automation's email renders. */
  subjectField?: string;
  textField?: string;
  listMaxAttempts?: number;
  listBackoffUnitMs?: number;
  listMaxBackoffMs?: number;
}

const contactSchema = z.object({
  id: z.string().min(1),
  email_address: z.string(),
  status: z.string().optional(),
});

const contactPageSchema = z.object({
  data: z.array(contactSchema).default([]),
  paging: z
    .object({
      next: z.string().nullish(),
    })
    .partial()
    .optional(),
});

type ContactPage = z.infer<typeof contactPageSchema>;

const errorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string().optional(),
  }),
});

// Error codes meaning this contact has already been through the automation.
const ALREADY_NOTIFIED_CODES = new Set(['MEMBER_ALREADY_IN_AUTOMATION', 'ALREADY_STARTED', 'AUTOMATION_ALREADY_STARTED']);
const RATE_LIMIT_CODES = new Set(['TOO_MANY_REQUESTS', 'RATE_LIMITED']);

/**
 * EmailOctopus adapter: lists subscribed contacts of one list and delivers
 * to a contact by writing the alert into its custom fields, then queueing it
 * into an automation whose email renders those fields.
 */
export class EmailOctopusClient implements RecipientSource, NotificationTransport {
  private static readonly DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
  private static readonly DEFAULT_PAGE_SIZE = 100;
  private static readonly DEFAULT_SUBJECT_FIELD = 'AlertSubject';
  private static readonly DEFAULT_TEXT_FIELD = 'AlertText';
  private static readonly DEFAULT_LIST_MAX_ATTEMPTS = 3;
  private static readonly DEFAULT_LIST_BACKOFF_UNIT_MS = 250;
  private static readonly DEFAULT_LIST_MAX_BACKOFF_MS = 4_000;
  private static readonly RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);
  private static readonly MAX_PAGES = 1_000;

  private readonly apiBase: string;
  private readonly apiKey: string;
  private readonly listId: string;
  private readonly automationId: string;
  private readonly requestTimeoutMs: number;
  private readonly pageSize: number;
  private readonly subjectField: string;
  private readonly textField: string;
  private readonly listPolicy: BackoffPolicy;

  constructor(config: EmailOctopusConfig) {
    this.apiBase = config.apiBase.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.listId = config.listId;
    this.automationId = config.automationId;
    this.requestTimeoutMs = Math.max(100, config.requestTimeoutMs ?? EmailOctopusClient.DEFAULT_REQUEST_TIMEOUT_MS);
    this.pageSize = Math.min(100, Math.max(1, config.pageSize ?? EmailOctopusClient.DEFAULT_PAGE_SIZE));
    this.subjectField = config.subjectField ?? EmailOctopusClient.DEFAULT_SUBJECT_FIELD;
    this.textField = config.textField ?? EmailOctopusClient.DEFAULT_TEXT_FIELD;
    const unitMs = Math.max(0, config.listBackoffUnitMs ?? EmailOctopusClient.DEFAULT_LIST_BACKOFF_UNIT_MS);
    this.listPolicy = {
      maxAttempts: Math.max(1, config.listMaxAttempts ?? EmailOctopusClient.DEFAULT_LIST_MAX_ATTEMPTS),
      unitMs,
      maxDelayMs: Math.max(unitMs, config.listMaxBackoffMs ?? EmailOctopusClient.DEFAULT_LIST_MAX_BACKOFF_MS),
    };
  }

  async fetchAll(): Promise<RecipientFetchResult> {
    const recipients: Recipient[] = [];
    const seen = new Set<string>();
    let url: string | null = this.firstPageUrl();
    let pages = 0;

    try {
      while (url) {
        pages += 1;
        if (pages > EmailOctopusClient.MAX_PAGES) {
          throw new Error(`EmailOctopus paging did not terminate after ${EmailOctopusClient.MAX_PAGES} pages`);
        }

        const page = await this.getContactPage(url);
        for (const contact of page.data) {
          if (seen.has(contact.id) || (contact.status !== undefined && contact.status !== 'SUBSCRIBED')) {
            continue;
          }
          seen.add(contact.id);
          recipients.push({ id: contact.id, address: contact.email_address });
        }
        url = this.authorizeUrl(page.paging?.next ?? null);
      }
    } catch (error) {
      return { kind: 'unavailable', reason: errorMessage(error) };
    }

    return { kind: 'available', recipients };
  }

  async send(recipient: Recipient, content: AlertContent): Promise<TransportResult> {
    const updated = await this.submit(
      `${this.apiBase}/lists/${encodeURIComponent(this.listId)}/contacts/${encodeURIComponent(recipient.id)}`,
      'PUT',
      {
        api_key: this.apiKey,
        fields: {
          [this.subjectField]: content.subject,
          [this.textField]: content.text,
        },
      },
      'EmailOctopus contact update failed',
    );
    if (updated.kind !== 'sent') {
      return updated;
    }

    return this.submit(
      `${this.apiBase}/automations/${encodeURIComponent(this.automationId)}/queue`,
      'POST',
      {
        api_key: this.apiKey,
        list_member_id: recipient.id,
      },
      'EmailOctopus queue failed',
    );
  }

  private async submit(
    url: string,
    method: 'POST' | 'PUT',
    payload: Record<string, unknown>,
    failurePrefix: string,
  ): Promise<TransportResult> {
    let response: Response;
    try {
      response = await this.fetchWithTimeout(url, {
        method,
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(payload),
      });
    } catch (error) {
      // fetch only throws for network failures and timeouts.
      return { kind: 'transient', reason: errorMessage(error) };
    }

    if (response.ok) {
      return { kind: 'sent' };
    }

    const body = await response.text();
    const code = parseErrorCode(body);
    const reason = `${failurePrefix}: ${response.status} ${code ?? body}`.trim();

    if (code !== null && ALREADY_NOTIFIED_CODES.has(code)) {
      return { kind: 'already_notified' };
    }
    if (response.status === 429 || (code !== null && RATE_LIMIT_CODES.has(code))) {
      return { kind: 'rate_limited', reason };
    }
    if (response.status >= 500) {
      return { kind: 'transient', reason };
    }
    return { kind: 'rejected', reason };
  }

  private async getContactPage(url: string): Promise<ContactPage> {
    const result = await retryWithBackoff<ContactPage>(this.listPolicy, async (attempt) => {
      let response: Response;
      try {
        response = await this.fetchWithTimeout(url, { method: 'GET' });
      } catch (error) {
        logWarn(`Contacts fetch failed (attempt ${attempt}/${this.listPolicy.maxAttempts}): ${errorMessage(error)}`);
        return { done: false, retryable: true, reason: errorMessage(error) };
      }

      if (!response.ok) {
        const body = await response.text();
        const reason = `EmailOctopus contacts request failed: ${response.status} ${body}`.trim();
        if (!EmailOctopusClient.RETRYABLE_STATUSES.has(response.status)) {
          return { done: false, retryable: false, reason };
        }
        logWarn(`Contacts fetch got ${response.status} (attempt ${attempt}/${this.listPolicy.maxAttempts})`);
        return { done: false, retryable: true, reason };
      }

      const raw: unknown = await response.json();
      const parsed = contactPageSchema.safeParse(raw);
      if (!parsed.success) {
        return {
          done: false,
          retryable: false,
          reason: `Unexpected EmailOctopus contacts response: ${parsed.error.message}`,
        };
      }
      return { done: true, value: parsed.data };
    });

    if (!result.ok) {
      throw new Error(result.exhausted ? `${result.reason} (gave up after ${result.attempts} attempts)` : result.reason);
    }
    return result.value;
  }

  private firstPageUrl(): string {
    const params = new URLSearchParams({
      api_key: this.apiKey,
      limit: String(this.pageSize),
      page: '1',
    });
    return `${this.apiBase}/lists/${encodeURIComponent(this.listId)}/contacts/subscribed?${params.toString()}`;
  }

  // Paging links are returned without credentials.
  private authorizeUrl(next: string | null): string | null {
    if (!next) {
      return null;
    }
    const url = new URL(next, `${this.apiBase}/`);
    url.searchParams.set('api_key', this.apiKey);
    return url.toString();
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    try {
      return await fetch(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`EmailOctopus request timed out after ${this.requestTimeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function parseErrorCode(body: string): string | null {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.error.code : null;
  } catch {
    return null;
  }
}
