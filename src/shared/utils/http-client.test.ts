import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { JsonFetch, buildUrl, parseRetryAfter } from './http-client.js';
import { BankingError, HttpError } from '../errors.js';
import { Helpers } from './helpers.js';

type FetchMock = Mock<(input: string, init?: RequestInit) => Promise<Response>>;

function textResponse(body: string, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

describe('JsonFetch', () => {
  let fetchMock: FetchMock;

  beforeEach(() => {
    fetchMock = vi.fn<(input: string, init?: RequestInit) => Promise<Response>>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  function recordDelays(): number[] {
    const waits: number[] = [];
    vi.spyOn(Helpers, 'delay').mockImplementation(async (ms: number) => {
      waits.push(ms);
    });
    return waits;
  }

  it('serializes a JSON body and sets the content type', async () => {
    fetchMock.mockResolvedValueOnce(textResponse('{"ok":true}'));
    const http = new JsonFetch();

    const data = await http.getJson('http://bank.test/transfer', { method: 'POST', json: { amount: 10 } });

    expect(data).toEqual({ ok: true });
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.body).toBe('{"amount":10}');
    expect(new Headers(init?.headers).get('content-type')).toBe('application/json');
    expect(new Headers(init?.headers).get('accept')).toBe('application/json');
  });

  it('appends query parameters', async () => {
    fetchMock.mockResolvedValueOnce(textResponse('{}'));

    await new JsonFetch().getJson('http://bank.test/authToken', { method: 'POST', query: { claim: 'enquiry' } });

    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://bank.test/authToken?claim=enquiry');
  });

  it('returns null for an empty body', async () => {
    fetchMock.mockResolvedValueOnce(textResponse(''));

    await expect(new JsonFetch().getJson('http://bank.test/accounts')).resolves.toBeNull();
  });

  it('raises INVALID_JSON for an undecodable body', async () => {
    fetchMock.mockResolvedValueOnce(textResponse('<html>oops</html>'));

    const error = await new JsonFetch().getJson('http://bank.test/accounts').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BankingError);
    expect(error).toMatchObject({ code: 'INVALID_JSON', statusCode: 200 });
  });

  it('raises HttpError with a truncated body for non-2xx', async () => {
    fetchMock.mockResolvedValueOnce(textResponse('x'.repeat(500), 400));

    const error = await new JsonFetch().getJson('http://bank.test/transfer').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ statusCode: 400, url: 'http://bank.test/transfer', body: 'x'.repeat(200) });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports the URL with its query string in HttpError', async () => {
    fetchMock.mockResolvedValueOnce(textResponse('denied', 401));

    const error = await new JsonFetch()
      .getJson('http://bank.test/authToken', { method: 'POST', query: { claim: 'enquiry' } })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpError);
    expect(error).toMatchObject({ statusCode: 401, url: 'http://bank.test/authToken?claim=enquiry' });
  });

  it('retries a retryable status and returns the later success', async () => {
    fetchMock
      .mockResolvedValueOnce(textResponse('busy', 503))
      .mockResolvedValueOnce(textResponse('busy', 502))
      .mockResolvedValueOnce(textResponse('{"balance":5}'));
    const http = new JsonFetch({ maxRetries: 3, backoffFactor: 0 });

    await expect(http.getJson('http://bank.test/accounts/balance/ACC1000')).resolves.toEqual({ balance: 5 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('stops after maxRetries and returns the last response', async () => {
    fetchMock.mockImplementation(async () => textResponse('slow down', 429));
    const http = new JsonFetch({ maxRetries: 1, backoffFactor: 0 });

    const response = await http.request('http://bank.test/accounts');

    expect(response.status).toBe(429);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('waits for Retry-After on a 429 before retrying', async () => {
    const waits = recordDelays();
    fetchMock
      .mockResolvedValueOnce(textResponse('slow down', 429, { 'Retry-After': '7' }))
      .mockResolvedValueOnce(textResponse('{"ok":true}'));
    const http = new JsonFetch({ maxRetries: 1 });

    await expect(http.getJson('http://bank.test/accounts')).resolves.toEqual({ ok: true });
    expect(waits).toEqual([7000]);
  });

  it('backs off exponentially from the backoff factor', async () => {
    const waits = recordDelays();
    fetchMock
      .mockResolvedValueOnce(textResponse('down', 500))
      .mockResolvedValueOnce(textResponse('down', 500))
      .mockResolvedValueOnce(textResponse('down', 500))
      .mockResolvedValueOnce(textResponse('{}'));
    const http = new JsonFetch({ maxRetries: 3, backoffFactor: 0.5 });

    await expect(http.getJson('http://bank.test/accounts')).resolves.toEqual({});
    expect(waits).toEqual([500, 1000, 2000]);
  });

  it('does not retry when maxRetries is 0', async () => {
    fetchMock.mockResolvedValueOnce(textResponse('down', 500));
    const http = new JsonFetch({ maxRetries: 0 });

    await expect(http.getJson('http://bank.test/accounts')).rejects.toBeInstanceOf(HttpError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('honors a custom set of retry statuses', async () => {
    fetchMock
      .mockResolvedValueOnce(textResponse('conflict', 409))
      .mockResolvedValueOnce(textResponse('{}'));
    const http = new JsonFetch({ backoffFactor: 0, retryStatuses: [409] });

    await expect(http.getJson('http://bank.test/transfer')).resolves.toEqual({});
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('retries network failures and wraps the last one', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const http = new JsonFetch({ maxRetries: 2, backoffFactor: 0 });

    const error = await http.request('http://bank.test/accounts').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BankingError);
    expect(error).toMatchObject({
      code: 'NETWORK_ERROR',
      message: 'Request to http://bank.test/accounts failed: fetch failed'
    });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('reports a timeout when the request is aborted', async () => {
    fetchMock.mockImplementation((_input, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => {
        const abort = new Error('This operation was aborted');
        abort.name = 'AbortError';
        reject(abort);
      });
    }));
    const http = new JsonFetch({ timeout: 20, maxRetries: 0 });

    const error = await http.request('http://bank.test/accounts').catch((e: unknown) => e);

    expect(error).toMatchObject({ code: 'TIMEOUT', message: 'Request timeout after 20ms' });
  });

  it('times out a response whose body stalls after the headers', async () => {
    fetchMock.mockImplementation(async (_input, init) => {
      const stream = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"balance":'));
          init?.signal?.addEventListener('abort', () => controller.error(new Error('stream aborted')));
        }
      });
      return new Response(stream, { status: 200 });
    });
    const http = new JsonFetch({ timeout: 50, maxRetries: 0 });

    const error = await http.getJson('http://bank.test/accounts/balance/ACC1000').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BankingError);
    expect(error).toMatchObject({ code: 'TIMEOUT', message: 'Request timeout after 50ms' });
  });
});

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('2024-01-01T12:00:00Z');
    expect(parseRetryAfter('Mon, 01 Jan 2024 12:00:05 GMT', now)).toBe(5000);
  });

  it('caps long waits at two minutes', () => {
    expect(parseRetryAfter('3600')).toBe(120000);
  });

  it('ignores a missing or malformed header', () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter('soon')).toBeNull();
  });
});

describe('buildUrl', () => {
  it('returns the URL unchanged without a query', () => {
    expect(buildUrl('http://bank.test/accounts')).toBe('http://bank.test/accounts');
  });

  it('encodes query values', () => {
    expect(buildUrl('http://bank.test/search', { q: 'a b' })).toBe('http://bank.test/search?q=a+b');
  });
});
