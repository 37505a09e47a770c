import { StripeObject } from './stripeObject.js';

import { ValidationError } from '../infra/errors.js';

import type { StripeValue } from '../core/types.js';

export type ParamValue = string | number | boolean | ParamMap;

export interface ParamMap {
    [key: string]: ParamValue;
}

/** Sent in place of a value to clear it on the server. */
export const UNSET = '';

/**
 * Builds the update payload for `record`: only fields assigned since the last
 * load, plus whatever changed inside nested records and lists.
 *
 * - A nested record that was assigned, or that the caller built, is sent in
 *   full; keys it dropped relative to the loaded value are sent as `""`.
 * - A loaded nested record contributes its own diff, or nothing if that diff
 *   is empty.
 * - Lists are sent as index-keyed maps (`{ "0": ..., "1": ... }`); an assigned
 *   empty list or `null` is sent as `""`. An assigned list that is shorter
 *   than the loaded one, or whose items are all unchanged, is sent in full.
 *
 * The returned map may be empty.
 */
export function serializeParams(record: StripeObject): ParamMap {
    const update: ParamMap = {};

    for (const [key, value] of record.entries()) {
        const serialized = serializeField(key, value, record.originalValue(key), record.isDirty(key));

        if (serialized !== undefined) {
            update[key] = serialized;
        }
    }

    return update;
}

/** Full params for `record`, regardless of what is dirty. */
export function snapshotParams(record: StripeObject, original?: StripeObject): ParamMap {
    const snapshot: ParamMap = {};

    for (const [key, value] of record.entries()) {
        const serialized = snapshotValue(value);

        if (serialized !== undefined) {
            snapshot[key] = serialized;
        }
    }

    if (original) {
        for (const key of original.fieldNames()) {
            if (!record.has(key)) {
                snapshot[key] = UNSET;
            }
        }
    }

    return snapshot;
}

function serializeField(
    key: string,
    value: StripeValue,
    original: StripeValue | undefined,
    assigned: boolean,
): ParamValue | undefined {
    if (value instanceof StripeObject) {
        if (assigned || value.isFresh) {
            return snapshotParams(value, original instanceof StripeObject ? original : undefined);
        }

        if (value.savesIndependently()) {
            return undefined;
        }

        return nonEmpty(serializeParams(value));
    }

    if (Array.isArray(value)) {
        return serializeList(key, value, Array.isArray(original) ? original : undefined, assigned);
    }

    if (!assigned) {
        return undefined;
    }

    return value === null ? UNSET : value;
}

function serializeList(
    key: string,
    list: StripeValue[],
    original: StripeValue[] | undefined,
    assigned: boolean,
): ParamValue | undefined {
    if (list.length === 0) {
        return assigned ? UNSET : undefined;
    }

    if (original && original.length > list.length) {
        if (!assigned) {
            // Index-keyed params can add or overwrite items but never remove one.
            throw new ValidationError(`Cannot delete items from ${key} in place; assign a new array or null instead`, {
                param: key,
                details: { originalLength: original.length, length: list.length },
            });
        }

        return snapshotValue(list);
    }

    const update: ParamMap = {};

    list.forEach((element, index) => {
        const serialized = serializeElement(key, element, original?.[index], assigned);

        if (serialized !== undefined) {
            update[String(index)] = serialized;
        }
    });

    // An assigned list is always sent, even when every element is unchanged.
    return assigned ? (nonEmpty(update) ?? snapshotValue(list)) : nonEmpty(update);
}

function serializeElement(
    key: string,
    element: StripeValue,
    original: StripeValue | undefined,
    assigned: boolean,
): ParamValue | undefined {
    if (element instanceof StripeObject) {
        if (element.isFresh) {
            return snapshotParams(element);
        }

        return element.savesIndependently() ? undefined : nonEmpty(serializeParams(element));
    }

    if (Array.isArray(element)) {
        return serializeList(key, element, Array.isArray(original) ? original : undefined, assigned || original === undefined);
    }

    if (assigned || original === undefined || !Object.is(original, element)) {
        return element === null ? UNSET : element;
    }

    return undefined;
}

function snapshotValue(value: StripeValue): ParamValue | undefined {
    if (value instanceof StripeObject) {
        return snapshotParams(value);
    }

    if (Array.isArray(value)) {
        if (value.length === 0) {
            return UNSET;
        }

        const indexed: ParamMap = {};

        value.forEach((element, index) => {
            const serialized = snapshotValue(element);

            if (serialized !== undefined) {
                indexed[String(index)] = serialized;
            }
        });

        return indexed;
    }

    return value === null ? UNSET : value;
}

function nonEmpty(params: ParamMap): ParamMap | undefined {
    return Object.keys(params).length > 0 ? params : undefined;
}
