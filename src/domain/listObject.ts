import { StripeObject } from './stripeObject.js';

import { ValidationError } from '../infra/errors.js';
import { normalizeObjectId, normalizeRequestOptions } from '../infra/validation.js';

import type { NormalizedRequestOptions, RequestOptions, StripeValue } from '../core/types.js';
import type { FormParams } from '../core/stripe/rest/encode.js';

/**
 * A page of records plus the collection URL it came from. Nested collections
 * such as `account.externalAccounts` use the URL to create and fetch members.
 */
export class ListObject extends StripeObject {
    get data(): StripeObject[] {
        return this.getList('data').filter((item): item is StripeObject => item instanceof StripeObject);
    }

    get url(): string {
        return this.getString('url');
    }

    get hasMore(): boolean {
        return this.has('has_more') ? this.getBoolean('has_more') : false;
    }

    async create(params: FormParams = {}, options?: RequestOptions | string): Promise<StripeObject> {
        const callOptions = this.#callOptions(options);
        const raw = await this.requestor.request('POST', this.url, params, callOptions);

        return this.requestor.materialize(raw, this.context.options);
    }

    async retrieve(id: string, options?: RequestOptions | string): Promise<StripeObject> {
        const callOptions = this.#callOptions(options);
        const path = `${this.url}/${encodeURIComponent(normalizeObjectId(id))}`;
        const raw = await this.requestor.request('GET', path, undefined, callOptions);

        return this.requestor.materialize(raw, this.context.options);
    }

    async list(params: FormParams = {}, options?: RequestOptions | string): Promise<ListObject> {
        const callOptions = this.#callOptions(options);
        const raw = await this.requestor.request('GET', this.url, params, callOptions);
        const page = this.requestor.materialize(raw, this.context.options);

        if (!(page instanceof ListObject)) {
            throw new ValidationError(`Expected a list from ${this.url}, received ${page.objectType ?? 'untyped object'}`);
        }

        return page;
    }

    /**
     * Fetches the page after this one, or an empty list when `has_more` is
     * false.
     */
    async nextPage(params: FormParams = {}, options?: RequestOptions | string): Promise<ListObject> {
        const last = this.data.at(-1)?.id;

        if (!this.hasMore || !last) {
            return ListObject.#empty(this);
        }

        return this.list({ ...params, starting_after: last }, options);
    }

    #callOptions(options?: RequestOptions | string): NormalizedRequestOptions {
        return { ...this.context.options, ...normalizeRequestOptions(options) };
    }

    static #empty(source: ListObject): ListObject {
        const fields = new Map<string, StripeValue>([
            ['object', 'list'],
            ['data', []],
            ['has_more', false],
            ['url', source.url],
        ]);

        return ListObject.load(fields, source.context);
    }
}
