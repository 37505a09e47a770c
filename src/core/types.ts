import type { FormParams } from './stripe/rest/encode.js';
import type { HttpMethod } from './stripe/rest/request.js';
import type { StripeObject } from '../domain/stripeObject.js';

export type ObjectId = string;
export type ObjectTag = string;

export type RawScalar = string | number | boolean | null;

export type RawValue = RawScalar | RawObject | RawValue[];

export interface RawObject {
    [key: string]: RawValue;
}

export type StripeValue = RawScalar | StripeObject | StripeValue[];

/**
 * Per-call options. `apiKey: null` is rejected; leave it out to use the
 * client's key or the process-wide default.
 */
export interface RequestOptions {
    apiKey?: string | null;
    stripeAccount?: string;
    idempotencyKey?: string;
}

export interface NormalizedRequestOptions {
    apiKey?: string;
    stripeAccount?: string;
    idempotencyKey?: string;
    apiBase?: string;
}

/**
 * What records need from the client: a transport that resolves credentials
 * at call time, and the materializer that turns responses into records.
 */
export interface Requestor {
    readonly connectBase: string;
    request(
        method: HttpMethod,
        path: string,
        params?: FormParams,
        options?: NormalizedRequestOptions,
    ): Promise<RawObject>;
    materialize(raw: RawObject, options: NormalizedRequestOptions): StripeObject;
    convertFields(raw: RawObject, options: NormalizedRequestOptions): Map<string, StripeValue>;
}

export interface ObjectContext {
    requestor?: Requestor;
    options: NormalizedRequestOptions;
}
