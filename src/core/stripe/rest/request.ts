import { encodeForm, type FormParams } from './encode.js';

import { getApiBase, getApiVersion, getTimeoutMs } from '../../../config/stripe.js';
import { AuthError, BaseError, fromFetchError, fromHttpResponse } from '../../../infra/errors.js';
import { createLogger } from '../../../infra/logger.js';
import { USER_AGENT } from '../constants.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface RequestInitEx {
    /** Sent as query string for GET/DELETE and as form body for POST. */
    params?: FormParams;
    apiKey?: string;
    /** Overrides the client's base URL, e.g. for the OAuth host. */
    apiBase?: string;
    stripeAccount?: string;
    idempotencyKey?: string;
    timeoutMs?: number;
}

export interface StripeRestClientOptions {
    apiBase?: string;
    apiVersion?: string;
    defaultTimeoutMs?: number;
}

const log = createLogger('stripe:rest:request');

export class StripeRestClient {
    readonly #apiBase?: string;
    readonly #apiVersion?: string;
    readonly #defaultTimeoutMs?: number;

    constructor(opts: StripeRestClientOptions = {}) {
        this.#apiBase = opts.apiBase;
        this.#apiVersion = opts.apiVersion;
        this.#defaultTimeoutMs = opts.defaultTimeoutMs;
    }

    get apiBase(): string {
        return this.#apiBase ?? getApiBase();
    }

    async request(method: HttpMethod, path: string, init: RequestInitEx = {}): Promise<unknown> {
        if (!init.apiKey) {
            throw AuthError.missingKey();
        }

        const url = new URL(path, init.apiBase ?? this.apiBase);
        const encoded = init.params ? encodeForm(init.params) : '';
        let body: string | undefined;

        if (method === 'POST') {
            body = encoded;
        } else if (encoded) {
            url.search = url.search ? `${url.search}&${encoded}` : `?${encoded}`;
        }

        const headers: Record<string, string> = {
            accept: 'application/json',
            authorization: `Bearer ${init.apiKey}`,
            'user-agent': USER_AGENT,
        };

        if (body !== undefined) {
            headers['content-type'] = 'application/x-www-form-urlencoded';
        }

        const apiVersion = this.#apiVersion ?? getApiVersion();

        if (apiVersion) {
            headers['stripe-version'] = apiVersion;
        }

        if (init.stripeAccount) {
            headers['stripe-account'] = init.stripeAccount;
        }

        if (init.idempotencyKey) {
            headers['idempotency-key'] = init.idempotencyKey;
        }

        const pathWithQuery = `${url.pathname}${url.search}`;
        const controller = new AbortController();
        const timeoutMs = init.timeoutMs ?? this.#defaultTimeoutMs ?? getTimeoutMs();
        const timeout = setTimeout(() => controller.abort(), timeoutMs);
        const startedAt = Date.now();

        log.debug('%s %s', method, pathWithQuery, { host: url.host, apiKey: init.apiKey });

        try {
            const response = await fetch(url.toString(), {
                method,
                headers,
                body,
                signal: controller.signal,
            });

            const text = await response.text();
            const parsed = text ? safeJsonParse(text, { url: pathWithQuery, method }) : undefined;

            if (!response.ok) {
                throw fromHttpResponse({
                    status: response.status,
                    body: parsed ?? (text || undefined),
                    headers: response.headers,
                    url: pathWithQuery,
                    method,
                });
            }

            log.debug('%s %s → %d in %dms', method, pathWithQuery, response.status, Date.now() - startedAt, {
                requestId: response.headers.get('request-id') ?? undefined,
            });

            return parsed;
        } catch (error) {
            const mapped = error instanceof BaseError ? error : fromFetchError(error);

            log.warn('%s %s failed after %dms: %s', method, pathWithQuery, Date.now() - startedAt, mapped.message, {
                code: mapped.code,
                httpStatus: mapped.httpStatus,
                requestId: mapped.requestId,
            });

            throw mapped;
        } finally {
            clearTimeout(timeout);
        }
    }
}

function safeJsonParse(text: string, context: { url: string; method: HttpMethod }): unknown {
    try {
        return JSON.parse(text);
    } catch {
        log.debug('response json parse failed', {
            url: context.url,
            method: context.method,
            note: 'falling back to text',
        });

        return undefined;
    }
}
