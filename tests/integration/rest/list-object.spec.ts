import { jest } from '@jest/globals';

import { StripeClient } from '../../../src/StripeClient.js';
import { Account } from '../../../src/domain/account.js';
import { ListObject } from '../../../src/domain/listObject.js';
import { ValidationError } from '../../../src/infra/errors.js';
import { installFetch, jsonResponse } from '../../helpers/fetchMock.js';

import type { RawObject } from '../../../src/core/types.js';

function page(ids: string[], hasMore: boolean): RawObject {
  return {
    object: 'list',
    url: '/v1/accounts',
    has_more: hasMore,
    data: ids.map(id => ({ id, object: 'account', email: `${id}@example.com` })),
  };
}

function makeClient(): StripeClient {
  return new StripeClient({ apiKey: 'sk_test_client', apiBase: 'https://api.example.test', apiVersion: '2017-08-15' });
}

describe('ListObject pagination', () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    global.fetch = originalFetch;
    jest.restoreAllMocks();
  });

  test('list materializes typed members', async () => {
    const { calls } = installFetch(() => jsonResponse(page(['acct_1', 'acct_2'], true)));

    const accounts = await makeClient().accounts.list({ limit: 2 });

    expect(calls[0].url).toBe('https://api.example.test/v1/accounts?limit=2');
    expect(accounts).toBeInstanceOf(ListObject);
    expect(accounts.hasMore).toBe(true);
    expect(accounts.data.map(item => item.id)).toEqual(['acct_1', 'acct_2']);
    expect(accounts.data.every(item => item instanceof Account)).toBe(true);
  });

  test('nextPage continues after the last member', async () => {
    const { calls } = installFetch((call, index) =>
      jsonResponse(index === 0 ? page(['acct_1', 'acct_2'], true) : page(['acct_3'], false)),
    );

    const first = await makeClient().accounts.list({ limit: 2 });
    const second = await first.nextPage({ limit: 2 });

    expect(calls[1].url).toBe('https://api.example.test/v1/accounts?limit=2&starting_after=acct_2');
    expect(second.data.map(item => item.id)).toEqual(['acct_3']);
    expect(second.hasMore).toBe(false);
  });

  test('nextPage on the last page returns an empty list without a request', async () => {
    const { calls } = installFetch(() => jsonResponse(page(['acct_1'], false)));

    const only = await makeClient().accounts.list();
    const next = await only.nextPage();

    expect(calls).toHaveLength(1);
    expect(next).toBeInstanceOf(ListObject);
    expect(next.data).toEqual([]);
    expect(next.hasMore).toBe(false);
    expect(next.url).toBe('/v1/accounts');
  });

  test('list on a collection rejects a non-list response', async () => {
    installFetch((call, index) =>
      jsonResponse(index === 0 ? page(['acct_1'], true) : { object: 'account', id: 'acct_9' }),
    );

    const accounts = await makeClient().accounts.list();

    await expect(accounts.list()).rejects.toBeInstanceOf(ValidationError);
  });

  test('retrieve fetches a member by id', async () => {
    const { calls } = installFetch((call, index) =>
      jsonResponse(index === 0 ? page(['acct_1'], false) : { object: 'account', id: 'acct_7' }),
    );

    const accounts = await makeClient().accounts.list();
    const account = await accounts.retrieve('acct_7');

    expect(calls[1].url).toBe('https://api.example.test/v1/accounts/acct_7');
    expect(account).toBeInstanceOf(Account);
  });
});
