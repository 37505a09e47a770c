import { jest } from '@jest/globals';

import {
  DEFAULT_API_BASE,
  DEFAULT_CONNECT_BASE,
  DEFAULT_TIMEOUT_MS,
  getApiBase,
  getApiVersion,
  getConnectBase,
  getDefaultApiKey,
  getTimeoutMs,
  setDefaultApiKey,
} from '../src/config/stripe.js';

const ENV_KEYS = [
  'STRIPE_API_KEY',
  'STRIPE_API_BASE',
  'STRIPE_CONNECT_BASE',
  'STRIPE_API_VERSION',
  'STRIPE_TIMEOUT_MS',
] as const;

describe('config/stripe', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    setDefaultApiKey(undefined);
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    setDefaultApiKey(undefined);
    jest.restoreAllMocks();
  });

  test('defaults', () => {
    expect(getApiBase()).toBe(DEFAULT_API_BASE);
    expect(getConnectBase()).toBe(DEFAULT_CONNECT_BASE);
    expect(getApiVersion()).toBeUndefined();
    expect(getTimeoutMs()).toBe(DEFAULT_TIMEOUT_MS);
    expect(getDefaultApiKey()).toBeUndefined();
  });

  test('default key: explicit override beats the environment, read at call time', () => {
    process.env.STRIPE_API_KEY = 'sk_test_from_env';
    expect(getDefaultApiKey()).toBe('sk_test_from_env');

    setDefaultApiKey('  sk_test_override ');
    expect(getDefaultApiKey()).toBe('sk_test_override');

    setDefaultApiKey(undefined);
    process.env.STRIPE_API_KEY = 'sk_test_rotated';
    expect(getDefaultApiKey()).toBe('sk_test_rotated');
  });

  test('base URLs are reduced to their origin, warning when a path is dropped', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    process.env.STRIPE_API_BASE = 'http://localhost:12111/stripe';
    process.env.STRIPE_CONNECT_BASE = 'https://connect.example.test/';

    expect(getApiBase()).toBe('http://localhost:12111');
    expect(getConnectBase()).toBe('https://connect.example.test');
    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0][0])).toContain('STRIPE_API_BASE has a path or query');
  });

  test('invalid base URL falls back to the default with a warning', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    process.env.STRIPE_API_BASE = 'not a url';

    expect(getApiBase()).toBe(DEFAULT_API_BASE);
    expect(write).toHaveBeenCalledTimes(1);
  });

  test('timeout parsing and clamping', () => {
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    process.env.STRIPE_TIMEOUT_MS = '5000';
    expect(getTimeoutMs()).toBe(5000);

    process.env.STRIPE_TIMEOUT_MS = '-1';
    expect(getTimeoutMs()).toBe(DEFAULT_TIMEOUT_MS);

    process.env.STRIPE_TIMEOUT_MS = 'soon';
    expect(getTimeoutMs()).toBe(DEFAULT_TIMEOUT_MS);

    process.env.STRIPE_TIMEOUT_MS = '900000';
    expect(getTimeoutMs()).toBe(600_000);
    expect(write).toHaveBeenCalledTimes(1);
  });

  test('api version is trimmed', () => {
    process.env.STRIPE_API_VERSION = ' 2017-08-15 ';
    expect(getApiVersion()).toBe('2017-08-15');
  });
});
