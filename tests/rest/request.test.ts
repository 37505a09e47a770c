import { jest } from '@jest/globals';

import { StripeRestClient } from '../../src/core/stripe/rest/request.js';
import { USER_AGENT } from '../../src/core/stripe/constants.js';
import {
  ApiError,
  AuthError,
  CardError,
  InvalidRequestError,
  NetworkError,
  TimeoutError,
} from '../../src/infra/errors.js';
import { installFetch, jsonResponse } from '../helpers/fetchMock.js';

const API_BASE = 'https://api.example.test';
const API_KEY = 'sk_test_123';

function makeClient(): StripeRestClient {
  return new StripeRestClient({ apiBase: API_BASE, apiVersion: '2017-08-15', defaultTimeoutMs: 1_000 });
}

describe('StripeRestClient.request()', () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    global.fetch = originalFetch;
    jest.restoreAllMocks();
  });

  test('GET builds url with query string and returns JSON payload', async () => {
    const payload = { object: 'account', id: 'acct_1' };
    const { calls } = installFetch(() => jsonResponse(payload));

    const data = await makeClient().request('GET', '/v1/accounts', { params: { limit: 3 }, apiKey: API_KEY });

    expect(data).toEqual(payload);
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://api.example.test/v1/accounts?limit=3');
    expect(calls[0].method).toBe('GET');
    expect(calls[0].body).toBeUndefined();
    expect(calls[0].headers).toEqual({
      accept: 'application/json',
      authorization: 'Bearer sk_test_123',
      'user-agent': USER_AGENT,
      'stripe-version': '2017-08-15',
    });
  });

  test('POST sends a form-encoded body', async () => {
    const { calls } = installFetch(() => jsonResponse({ id: 'acct_1' }));

    await makeClient().request('POST', '/v1/accounts/acct_1', {
      params: { legal_entity: { first_name: 'Bob' }, email: 'a@example.com' },
      apiKey: API_KEY,
    });

    expect(calls[0].url).toBe('https://api.example.test/v1/accounts/acct_1');
    expect(calls[0].method).toBe('POST');
    expect(calls[0].headers['content-type']).toBe('application/x-www-form-urlencoded');
    expect(calls[0].body).toBe('legal_entity[first_name]=Bob&email=a%40example.com');
  });

  test('POST without params sends an empty body', async () => {
    const { calls } = installFetch(() => jsonResponse({ id: 'acct_1' }));

    await makeClient().request('POST', '/v1/accounts/acct_1', { apiKey: API_KEY });

    expect(calls[0].body).toBe('');
  });

  test('per-request base, connected account and idempotency key', async () => {
    const { calls } = installFetch(() => jsonResponse({}));

    await makeClient().request('POST', '/oauth/deauthorize', {
      apiKey: API_KEY,
      apiBase: 'https://connect.example.test',
      stripeAccount: 'acct_9',
      idempotencyKey: 'idem-1',
    });

    expect(calls[0].url).toBe('https://connect.example.test/oauth/deauthorize');
    expect(calls[0].headers['stripe-account']).toBe('acct_9');
    expect(calls[0].headers['idempotency-key']).toBe('idem-1');
  });

  test('throws AuthError before any request when no key is supplied', async () => {
    const { mock } = installFetch(() => jsonResponse({}));

    await expect(makeClient().request('GET', '/v1/account')).rejects.toMatchObject({ code: 'MISSING_KEY' });
    await expect(makeClient().request('GET', '/v1/account')).rejects.toBeInstanceOf(AuthError);
    expect(mock).not.toHaveBeenCalled();
  });

  test('maps 400 with an error body to InvalidRequestError', async () => {
    installFetch(() =>
      jsonResponse(
        { error: { type: 'invalid_request_error', message: 'No such account: acct_x', param: 'id' } },
        400,
        { 'request-id': 'req_abc' },
      ),
    );

    const error = await makeClient()
      .request('GET', '/v1/accounts/acct_x', { apiKey: API_KEY })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InvalidRequestError);
    expect(error).toMatchObject({
      message: 'No such account: acct_x',
      param: 'id',
      httpStatus: 400,
      requestId: 'req_abc',
    });
  });

  test('maps 402 to CardError', async () => {
    installFetch(() => jsonResponse({ error: { type: 'card_error', message: 'Declined' } }, 402));

    await expect(makeClient().request('POST', '/v1/charges', { apiKey: API_KEY })).rejects.toBeInstanceOf(CardError);
  });

  test('maps 429 to RateLimitError with retryAfterMs', async () => {
    installFetch(
      () =>
        new Response('{"error":{"type":"rate_limit_error","message":"Too many requests"}}', {
          status: 429,
          headers: { 'Retry-After': '2' },
        }),
    );

    await expect(makeClient().request('GET', '/v1/account', { apiKey: API_KEY })).rejects.toMatchObject({
      retryAfterMs: 2000,
      code: 'RATE_LIMIT',
    });
  });

  test('maps 5xx with a text body to ApiError', async () => {
    installFetch(() => new Response('Server down', { status: 503 }));

    await expect(makeClient().request('GET', '/v1/account', { apiKey: API_KEY })).rejects.toBeInstanceOf(ApiError);
  });

  test('maps fetch failures to NetworkError', async () => {
    installFetch(() => {
      throw new TypeError('fetch failed');
    });

    await expect(makeClient().request('GET', '/v1/account', { apiKey: API_KEY })).rejects.toBeInstanceOf(
      NetworkError,
    );
  });

  test('aborts after the timeout and maps it to TimeoutError', async () => {
    const mockFetch = jest.fn(
      (_input: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const abort = new Error('This operation was aborted');
            abort.name = 'AbortError';
            reject(abort);
          });
        }),
    );
    global.fetch = mockFetch as unknown as typeof fetch;

    await expect(
      makeClient().request('GET', '/v1/account', { apiKey: API_KEY, timeoutMs: 10 }),
    ).rejects.toBeInstanceOf(TimeoutError);
  });
});
