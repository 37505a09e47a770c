import { Accounts } from './core/stripe/rest/accounts.js';
import { StripeRestClient } from './core/stripe/rest/request.js';
import { StripeRequestor } from './core/stripe/requestor.js';
import { ValidationError } from './infra/errors.js';
import { normalizeRequestOptions } from './infra/validation.js';

import type { RawObject, RequestOptions } from './core/types.js';
import type { StripeObject } from './domain/stripeObject.js';
import type { Settings } from './types.js';

export class StripeClient {
    #rest: StripeRestClient;
    #requestor: StripeRequestor;
    #accounts: Accounts;

    constructor(settings: Settings = {}) {
        const { apiKey } = normalizeRequestOptions({ apiKey: settings.apiKey });

        if (settings.timeoutMs !== undefined && !(Number.isFinite(settings.timeoutMs) && settings.timeoutMs > 0)) {
            throw new ValidationError('timeoutMs must be a positive number', { details: { timeoutMs: settings.timeoutMs } });
        }

        this.#rest = new StripeRestClient({
            apiBase: settings.apiBase,
            apiVersion: settings.apiVersion,
            defaultTimeoutMs: settings.timeoutMs,
        });
        this.#requestor = new StripeRequestor(this.#rest, { apiKey, connectBase: settings.connectBase });
        this.#accounts = new Accounts(this.#requestor);
    }

    get accounts(): Accounts {
        return this.#accounts;
    }

    /**
     * Lower-level access for endpoints without a resource class.
     */
    get requestor(): StripeRequestor {
        return this.#requestor;
    }

    get apiBase(): string {
        return this.#rest.apiBase;
    }

    /**
     * Materializes raw data (e.g. a webhook payload) into records bound to
     * this client. Nothing is marked dirty.
     */
    constructFrom(raw: RawObject, options?: RequestOptions | string): StripeObject {
        return this.#requestor.materialize(raw, normalizeRequestOptions(options));
    }
}
