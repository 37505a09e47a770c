export type FormScalar = string | number | boolean | null | undefined;

export type FormValue = FormScalar | FormParams | readonly FormValue[];

export interface FormParams {
    [key: string]: FormValue;
}

/**
 * Flattens nested params into `[key, value]` pairs using bracket notation.
 *
 * - nested mappings: `parent[child]`
 * - arrays of scalars: `key[]`
 * - arrays holding mappings or arrays: `key[0][field]`
 * - `null` becomes the empty string (unset); `undefined` is skipped.
 */
export function flattenParams(params: FormParams, prefix?: string): [string, string][] {
    const pairs: [string, string][] = [];

    for (const [key, value] of Object.entries(params)) {
        appendValue(pairs, prefix ? `${prefix}[${key}]` : key, value);
    }

    return pairs;
}

function appendValue(pairs: [string, string][], key: string, value: FormValue): void {
    if (value === undefined) {
        return;
    }

    if (value === null) {
        pairs.push([key, '']);
        return;
    }

    if (isFormArray(value)) {
        const indexed = value.some(item => typeof item === 'object' && item !== null);

        value.forEach((item, index) => appendValue(pairs, indexed ? `${key}[${index}]` : `${key}[]`, item));
        return;
    }

    if (typeof value === 'object') {
        pairs.push(...flattenParams(value, key));
        return;
    }

    pairs.push([key, String(value)]);
}

function isFormArray(value: FormValue): value is readonly FormValue[] {
    return Array.isArray(value);
}

/**
 * `application/x-www-form-urlencoded` body for {@link FormParams}. Spaces are
 * sent as `+` and brackets are left literal, e.g.
 * `legal_entity[address][line1]=2+Three+Four`.
 */
export function encodeForm(params: FormParams): string {
    return new URLSearchParams(flattenParams(params)).toString().replace(/%5B/gi, '[').replace(/%5D/gi, ']');
}
