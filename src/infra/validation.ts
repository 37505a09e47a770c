import { InvalidCredentialsError, ValidationError } from './errors.js';

import type { NormalizedRequestOptions, ObjectId, RawObject, RawValue, RequestOptions } from '../core/types.js';

const SECRET_KEY_PREFIXES = ['sk_', 'rk_'] as const;

export function isSecretKeyShaped(value: string): boolean {
    return SECRET_KEY_PREFIXES.some(prefix => value.startsWith(prefix));
}

function normalizeApiKey(apiKey: unknown): string {
    if (apiKey === null) {
        throw new InvalidCredentialsError('API key cannot be null; omit it to use the default key');
    }

    if (typeof apiKey !== 'string') {
        throw new InvalidCredentialsError('API key must be a string', { details: { type: typeof apiKey } });
    }

    if (!apiKey || /\s/.test(apiKey)) {
        throw new InvalidCredentialsError('API key must be a non-empty string without whitespace');
    }

    return apiKey;
}

/**
 * Accepts either an options object or an API key string. An explicit `null`,
 * as the whole argument or as `apiKey`, is rejected rather than treated as
 * "not provided".
 */
export function normalizeRequestOptions(input?: RequestOptions | string | null): NormalizedRequestOptions {
    if (input === undefined) {
        return {};
    }

    if (input === null || typeof input === 'string') {
        return { apiKey: normalizeApiKey(input) };
    }

    const normalized: NormalizedRequestOptions = {};

    if ('apiKey' in input && input.apiKey !== undefined) {
        normalized.apiKey = normalizeApiKey(input.apiKey);
    }

    if (input.stripeAccount !== undefined) {
        normalized.stripeAccount = normalizeObjectId(input.stripeAccount, 'stripeAccount');
    }

    if (input.idempotencyKey !== undefined) {
        const key = input.idempotencyKey.trim();

        if (!key) {
            throw new ValidationError('idempotencyKey cannot be empty');
        }

        normalized.idempotencyKey = key;
    }

    return normalized;
}

export function normalizeObjectId(id: unknown, label = 'id'): ObjectId {
    if (typeof id !== 'string') {
        throw new ValidationError(`${label} must be a string`, { details: { [label]: id } });
    }

    const trimmed = id.trim();

    if (!trimmed) {
        throw new ValidationError(`${label} cannot be empty`);
    }

    return trimmed;
}

export function isRawObject(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isRawValue(value: unknown): value is RawValue {
    if (value === null) {
        return true;
    }

    switch (typeof value) {
        case 'string':
        case 'boolean':
            return true;
        case 'number':
            return Number.isFinite(value);
        case 'object':
            return Array.isArray(value) ? value.every(isRawValue) : Object.values(value).every(isRawValue);
        default:
            return false;
    }
}
