import { afterEach, describe, expect, it, vi } from 'vitest';
import { EmailOctopusClient } from '../src/emailoctopus/client.js';
import type { AlertContent } from '../src/types.js';

const content: AlertContent = { subject: 'subject', text: 'text' };
const recipient = { id: 'member-1', address: 'fan@example.test' };

function createClient(overrides: Partial<ConstructorParameters<typeof EmailOctopusClient>[0]> = {}): EmailOctopusClient {
  return new EmailOctopusClient({
    apiBase: 'https://emailoctopus.test/api/1.6',
    apiKey: 'test-key',
    listId: 'list-1',
    automationId: 'auto-1',
    requestTimeoutMs: 100,
    listMaxAttempts: 3,
    listBackoffUnitMs: 0,
    listMaxBackoffMs: 0,
    ...overrides,
  });
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

type FetchMock = (input: string | URL, init?: RequestInit) => Promise<Response>;

// Contact updates succeed; queue requests get the given responses in order.
function queueResponses(responses: Array<Response | Error>) {
  return vi.fn<FetchMock>(async (_input, init) => {
    if (init?.method === 'PUT') {
      return json({});
    }
    const next = responses.shift();
    if (!next) {
      throw new Error('unexpected queue request');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
}

function contact(id: string, email: string) {
  return { id, email_address: email, status: 'SUBSCRIBED' };
}

describe('EmailOctopusClient.fetchAll', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('follows paging links and returns one list', async () => {
    const fetchMock = vi
      .fn<FetchMock>()
      .mockResolvedValueOnce(
        json({
          data: [contact('m1', 'a@example.test'), contact('m2', 'b@example.test')],
          paging: { next: 'https://emailoctopus.test/api/1.6/lists/list-1/contacts/subscribed?limit=100&page=2' },
        }),
      )
      .mockResolvedValueOnce(json({ data: [contact('m3', 'c@example.test')], paging: { next: null } }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await createClient().fetchAll();

    expect(result).toEqual({
      kind: 'available',
      recipients: [
        { id: 'm1', address: 'a@example.test' },
        { id: 'm2', address: 'b@example.test' },
        { id: 'm3', address: 'c@example.test' },
      ],
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(
      'https://emailoctopus.test/api/1.6/lists/list-1/contacts/subscribed?api_key=test-key&limit=100&page=1',
    );
    expect(String(fetchMock.mock.calls[1]?.[0])).toBe(
      'https://emailoctopus.test/api/1.6/lists/list-1/contacts/subscribed?limit=100&page=2&api_key=test-key',
    );
  });

  it('treats an empty list as available', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => json({ data: [], paging: { next: null } })),
    );

    await expect(createClient().fetchAll()).resolves.toEqual({ kind: 'available', recipients: [] });
  });

  it('retries a transient 502 before giving the page back', async () => {
    const fetchMock = vi
      .fn<FetchMock>()
      .mockResolvedValueOnce(new Response('<html>502</html>', { status: 502 }))
      .mockResolvedValueOnce(json({ data: [contact('m1', 'a@example.test')], paging: { next: null } }));
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = await createClient().fetchAll();

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ kind: 'available', recipients: [{ id: 'm1', address: 'a@example.test' }] });
  });

  it('reports unavailable instead of a partial list', async () => {
    const fetchMock = vi
      .fn<FetchMock>()
      .mockResolvedValueOnce(
        json({
          data: [contact('m1', 'a@example.test')],
          paging: { next: 'https://emailoctopus.test/api/1.6/lists/list-1/contacts/subscribed?page=2' },
        }),
      )
      .mockResolvedValueOnce(json({ error: { code: 'API_KEY_INVALID' } }, 401));
    vi.stubGlobal('fetch', fetchMock);

    const result = await createClient().fetchAll();

    expect(result.kind).toBe('unavailable');
    expect(result.kind === 'unavailable' ? result.reason : '').toMatch(/EmailOctopus contacts request failed: 401/);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('retries a network error on a contacts page', async () => {
    const fetchMock = vi
      .fn<FetchMock>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(json({ data: [contact('m1', 'a@example.test')], paging: { next: null } }));
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = await createClient().fetchAll();

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ kind: 'available', recipients: [{ id: 'm1', address: 'a@example.test' }] });
  });

  it('gives up after the attempt ceiling', async () => {
    const fetchMock = vi.fn<FetchMock>(async () => new Response('down', { status: 503 }));
    vi.stubGlobal('fetch', fetchMock);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = await createClient({ listMaxAttempts: 3 }).fetchAll();

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(result).toEqual({
      kind: 'unavailable',
      reason: 'EmailOctopus contacts request failed: 503 down (gave up after 3 attempts)',
    });
  });
});

describe('EmailOctopusClient.send', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('writes the alert into contact fields, then queues the contact', async () => {
    const fetchMock = queueResponses([json({})]);
    vi.stubGlobal('fetch', fetchMock);

    await expect(createClient().send(recipient, content)).resolves.toEqual({ kind: 'sent' });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    const update = fetchMock.mock.calls[0];
    expect(update?.[0]).toBe('https://emailoctopus.test/api/1.6/lists/list-1/contacts/member-1');
    expect(update?.[1]?.method).toBe('PUT');
    expect(JSON.parse(String(update?.[1]?.body))).toEqual({
      api_key: 'test-key',
      fields: { AlertSubject: 'subject', AlertText: 'text' },
    });
    const queue = fetchMock.mock.calls[1];
    expect(queue?.[0]).toBe('https://emailoctopus.test/api/1.6/automations/auto-1/queue');
    expect(queue?.[1]?.method).toBe('POST');
    expect(JSON.parse(String(queue?.[1]?.body))).toEqual({ api_key: 'test-key', list_member_id: 'member-1' });
  });

  it('carries each alert its own content', async () => {
    const fetchMock = queueResponses([json({}), json({})]);
    vi.stubGlobal('fetch', fetchMock);
    const client = createClient({ subjectField: 'Headline', textField: 'Body' });

    await client.send(recipient, { subject: 'A. Player scored 50', text: 'first' });
    await client.send(recipient, { subject: 'B. Player scored 52', text: 'second' });

    const updates = fetchMock.mock.calls
      .filter((call) => call[1]?.method === 'PUT')
      .map((call) => JSON.parse(String(call[1]?.body)));
    expect(updates).toEqual([
      { api_key: 'test-key', fields: { Headline: 'A. Player scored 50', Body: 'first' } },
      { api_key: 'test-key', fields: { Headline: 'B. Player scored 52', Body: 'second' } },
    ]);
  });

  it('does not queue a contact whose fields could not be written', async () => {
    const fetchMock = vi.fn<FetchMock>().mockResolvedValueOnce(json({ error: { code: 'MEMBER_NOT_FOUND' } }, 404));
    vi.stubGlobal('fetch', fetchMock);

    await expect(createClient().send(recipient, content)).resolves.toEqual({
      kind: 'rejected',
      reason: 'EmailOctopus contact update failed: 404 MEMBER_NOT_FOUND',
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('maps wire responses onto transport outcomes', async () => {
    vi.stubGlobal(
      'fetch',
      queueResponses([
        json({ error: { code: 'MEMBER_ALREADY_IN_AUTOMATION' } }, 409),
        json({ error: { code: 'TOO_MANY_REQUESTS' } }, 429),
        new Response('upstream down', { status: 503 }),
        json({ error: { code: 'INVALID_PARAMETERS' } }, 400),
      ]),
    );
    const client = createClient();

    await expect(client.send(recipient, content)).resolves.toEqual({ kind: 'already_notified' });
    await expect(client.send(recipient, content)).resolves.toEqual({
      kind: 'rate_limited',
      reason: 'EmailOctopus queue failed: 429 TOO_MANY_REQUESTS',
    });
    await expect(client.send(recipient, content)).resolves.toEqual({
      kind: 'transient',
      reason: 'EmailOctopus queue failed: 503 upstream down',
    });
    await expect(client.send(recipient, content)).resolves.toEqual({
      kind: 'rejected',
      reason: 'EmailOctopus queue failed: 400 INVALID_PARAMETERS',
    });
  });

  it('classifies network errors and timeouts as transient', async () => {
    const fetchMock = vi
      .fn<FetchMock>()
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockImplementationOnce((_url, init) => {
        const signal = init?.signal;
        return new Promise((_resolve, reject) => {
          signal?.addEventListener('abort', () => {
            reject(Object.assign(new Error('Aborted'), { name: 'AbortError' }));
          });
        });
      });
    vi.stubGlobal('fetch', fetchMock);
    const client = createClient({ requestTimeoutMs: 100 });

    await expect(client.send(recipient, content)).resolves.toEqual({ kind: 'transient', reason: 'fetch failed' });
    await expect(client.send(recipient, content)).resolves.toEqual({
      kind: 'transient',
      reason: 'EmailOctopus request timed out after 100ms',
    });
  });
});
