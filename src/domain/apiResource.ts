import { serializeParams } from './serialize.js';
import { StripeObject } from './stripeObject.js';

import { ValidationError } from '../infra/errors.js';
import { createLogger } from '../infra/logger.js';
import { normalizeRequestOptions } from '../infra/validation.js';

import type { NormalizedRequestOptions, RequestOptions } from '../core/types.js';
import type { FormParams } from '../core/stripe/rest/encode.js';

const log = createLogger('stripe:resource');

/**
 * A record with its own endpoint. Changes are written back with {@link save},
 * which sends only what {@link serializeParams} reports as changed.
 */
export abstract class ApiResource extends StripeObject {
    abstract resourceUrl(): string;

    override savesIndependently(): boolean {
        return true;
    }

    async refresh(options?: RequestOptions | string): Promise<this> {
        const callOptions = this.callOptions(options);
        const raw = await this.requestor.request('GET', this.resourceUrl(), undefined, callOptions);

        this.refreshFrom(this.requestor.convertFields(raw, this.context.options));

        return this;
    }

    async save(params: FormParams = {}, options?: RequestOptions | string): Promise<this> {
        const callOptions = this.callOptions(options);
        const url = this.resourceUrl();
        const body: FormParams = { ...serializeParams(this), ...params };

        log.debug('saving %s', this.describe(), { url, fields: Object.keys(body) });

        const raw = await this.requestor.request('POST', url, body, callOptions);

        this.refreshFrom(this.requestor.convertFields(raw, this.context.options));

        return this;
    }

    async del(params?: FormParams, options?: RequestOptions | string): Promise<this> {
        const callOptions = this.callOptions(options);
        const raw = await this.requestor.request('DELETE', this.resourceUrl(), params, callOptions);

        this.refreshFrom(this.requestor.convertFields(raw, this.context.options));

        return this;
    }

    protected callOptions(options?: RequestOptions | string): NormalizedRequestOptions {
        return { ...this.context.options, ...normalizeRequestOptions(options) };
    }

    protected requireId(): string {
        const { id } = this;

        if (!id) {
            throw new ValidationError(`${this.describe()} has no id; it cannot be addressed by URL`);
        }

        return id;
    }
}
