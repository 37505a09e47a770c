import { getConnectBase, getDefaultApiKey } from '../../config/stripe.js';
import { convertFields, convertToStripeObject } from '../../domain/convert.js';
import { ApiError } from '../../infra/errors.js';
import { isRawObject, isRawValue } from '../../infra/validation.js';

import type { FormParams } from './rest/encode.js';
import type { HttpMethod, StripeRestClient } from './rest/request.js';
import type { StripeObject } from '../../domain/stripeObject.js';
import type { NormalizedRequestOptions, RawObject, Requestor, StripeValue } from '../types.js';

export interface StripeRequestorOptions {
    apiKey?: string;
    connectBase?: string;
}

/**
 * Binds the REST client to credentials and the materializer. The API key is
 * resolved per request: call options, then the client's key, then the
 * process-wide default.
 */
export class StripeRequestor implements Requestor {
    readonly #rest: StripeRestClient;
    readonly #apiKey?: string;
    readonly #connectBase?: string;

    constructor(rest: StripeRestClient, opts: StripeRequestorOptions = {}) {
        this.#rest = rest;
        this.#apiKey = opts.apiKey;
        this.#connectBase = opts.connectBase;
    }

    get connectBase(): string {
        return this.#connectBase ?? getConnectBase();
    }

    async request(
        method: HttpMethod,
        path: string,
        params?: FormParams,
        options: NormalizedRequestOptions = {},
    ): Promise<RawObject> {
        const response = await this.#rest.request(method, path, {
            params,
            apiKey: options.apiKey ?? this.#apiKey ?? getDefaultApiKey(),
            apiBase: options.apiBase,
            stripeAccount: options.stripeAccount,
            idempotencyKey: options.idempotencyKey,
        });

        if (!isRawValue(response) || !isRawObject(response)) {
            throw new ApiError('Invalid response object from API', {
                details: { method, path, type: Array.isArray(response) ? 'array' : typeof response },
            });
        }

        return response;
    }

    materialize(raw: RawObject, options: NormalizedRequestOptions): StripeObject {
        return convertToStripeObject(raw, { requestor: this, options });
    }

    convertFields(raw: RawObject, options: NormalizedRequestOptions): Map<string, StripeValue> {
        return convertFields(raw, { requestor: this, options });
    }
}
