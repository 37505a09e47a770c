import { Account } from './account.js';
import { BankAccount, Card } from './externalAccount.js';
import { ListObject } from './listObject.js';
import { StripeObject } from './stripeObject.js';

import { isRawObject } from '../infra/validation.js';

import type { ObjectContext, ObjectTag, RawObject, RawValue, StripeValue } from '../core/types.js';

export type RecordType = typeof StripeObject;

/** Record classes selected by a mapping's `object` tag. */
export const OBJECT_TYPES: ReadonlyMap<ObjectTag, RecordType> = new Map<ObjectTag, RecordType>([
    ['account', Account],
    ['bank_account', BankAccount],
    ['card', Card],
    ['list', ListObject],
]);

export function resolveRecordType(tag: RawValue | undefined): RecordType {
    return (typeof tag === 'string' ? OBJECT_TYPES.get(tag) : undefined) ?? StripeObject;
}

export function convertValue(value: RawValue, context: ObjectContext): StripeValue {
    if (Array.isArray(value)) {
        return value.map(item => convertValue(item, context));
    }

    if (isRawObject(value)) {
        return convertToStripeObject(value, context);
    }

    return value;
}

export function convertFields(raw: RawObject, context: ObjectContext): Map<string, StripeValue> {
    const fields = new Map<string, StripeValue>();

    for (const [key, value] of Object.entries(raw)) {
        fields.set(key, convertValue(value, context));
    }

    return fields;
}

/**
 * Materializes response data into loaded records, choosing each record's
 * class from its `object` tag. Every record shares `context`.
 */
export function convertToStripeObject(raw: RawObject, context: ObjectContext = { options: {} }): StripeObject {
    return resolveRecordType(raw.object).load(convertFields(raw, context), context);
}
