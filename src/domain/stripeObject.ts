import { AttributeNotFoundError, ImmutableAssignmentError, ValidationError } from '../infra/errors.js';
import { isRawObject } from '../infra/validation.js';

import type {
    ObjectContext,
    ObjectId,
    ObjectTag,
    RawObject,
    RawScalar,
    RawValue,
    Requestor,
    StripeValue,
} from '../core/types.js';

export type AssignableValue = RawScalar | StripeObject | AssignableObject | readonly AssignableValue[];

export interface AssignableObject {
    [key: string]: AssignableValue;
}

export type RecordConstructor<T extends StripeObject> = new (values?: AssignableObject, context?: ObjectContext) => T;

const PERMANENT_FIELDS: readonly string[] = ['id'];

/**
 * Mapping-backed API record.
 *
 * A record is either *loaded* (materialized from a response, nothing dirty)
 * or *fresh* (built by the caller, every supplied field dirty). Assignments
 * mark the field dirty at this level only; nested records keep their own
 * dirty sets and are inspected when params are serialized.
 */
export class StripeObject {
    #values = new Map<string, StripeValue>();
    #originalValues = new Map<string, StripeValue>();
    #dirty = new Set<string>();
    #fresh = true;
    readonly #context: ObjectContext;

    constructor(values?: AssignableObject, context: ObjectContext = { options: {} }) {
        this.#context = context;

        if (values) {
            for (const [key, value] of Object.entries(values)) {
                this.#assign(key, value);
            }
        }
    }

    /**
     * Loads raw response data without type dispatch: nested mappings become
     * plain `StripeObject`s. Nothing is marked dirty.
     */
    static constructFrom<T extends StripeObject>(this: RecordConstructor<T>, raw: RawObject, context?: ObjectContext): T {
        const ctx = context ?? { options: {} };
        const fields = new Map<string, StripeValue>();

        for (const [key, value] of Object.entries(raw)) {
            fields.set(key, loadGeneric(value, ctx));
        }

        const record = new this(undefined, ctx);

        record.refreshFrom(fields);

        return record;
    }

    /** Builds a loaded record from already-converted fields. */
    static load<T extends StripeObject>(
        this: RecordConstructor<T>,
        fields: ReadonlyMap<string, StripeValue>,
        context?: ObjectContext,
    ): T {
        const record = new this(undefined, context);

        record.refreshFrom(fields);

        return record;
    }

    get id(): ObjectId | undefined {
        const id = this.#values.get('id');

        return typeof id === 'string' ? id : undefined;
    }

    get objectType(): ObjectTag | undefined {
        const tag = this.#values.get('object');

        return typeof tag === 'string' ? tag : this.defaultObjectType;
    }

    get isFresh(): boolean {
        return this.#fresh;
    }

    get(name: string): StripeValue {
        const value = this.#values.get(name);

        if (value === undefined) {
            throw new AttributeNotFoundError(name, `Attribute "${name}" is not set on ${this.describe()}`, {
                details: { available: this.fieldNames() },
            });
        }

        return value;
    }

    getOptional(name: string): StripeValue | undefined {
        return this.#values.get(name);
    }

    getString(name: string): string {
        const value = this.get(name);

        if (typeof value !== 'string') {
            throw this.#typeMismatch(name, 'string', value);
        }

        return value;
    }

    getNumber(name: string): number {
        const value = this.get(name);

        if (typeof value !== 'number') {
            throw this.#typeMismatch(name, 'number', value);
        }

        return value;
    }

    getBoolean(name: string): boolean {
        const value = this.get(name);

        if (typeof value !== 'boolean') {
            throw this.#typeMismatch(name, 'boolean', value);
        }

        return value;
    }

    getObject(name: string): StripeObject {
        const value = this.get(name);

        if (!(value instanceof StripeObject)) {
            throw this.#typeMismatch(name, 'object', value);
        }

        return value;
    }

    getList(name: string): StripeValue[] {
        const value = this.get(name);

        if (!Array.isArray(value)) {
            throw this.#typeMismatch(name, 'list', value);
        }

        return value;
    }

    /**
     * Assigns a field and marks it dirty. Plain mappings, also inside arrays,
     * become fresh records; records passed in keep their origin.
     */
    set(name: string, value: AssignableValue): this {
        if (PERMANENT_FIELDS.includes(name) || this.protectedFields.includes(name)) {
            throw new ImmutableAssignmentError(name, undefined, { details: { object: this.describe() } });
        }

        if (value === '') {
            throw new ValidationError(`Cannot set ${name} to an empty string; set it to null to unset the value`, {
                param: name,
            });
        }

        this.#assign(name, value);

        return this;
    }

    has(name: string): boolean {
        return this.#values.has(name);
    }

    fieldNames(): string[] {
        return Array.from(this.#values.keys());
    }

    entries(): IterableIterator<[string, StripeValue]> {
        return this.#values.entries();
    }

    isDirty(name: string): boolean {
        return this.#dirty.has(name);
    }

    dirtyFields(): string[] {
        return Array.from(this.#dirty);
    }

    /** Value of `name` as of the last load, or `undefined` if it was not loaded. */
    originalValue(name: string): StripeValue | undefined {
        return this.#originalValues.get(name);
    }

    /**
     * Records saved through their own endpoint are left out when a parent
     * record is serialized, unless the caller assigned them.
     */
    savesIndependently(): boolean {
        return false;
    }

    toJSON(): RawObject {
        const json: RawObject = {};

        for (const [key, value] of this.#values) {
            json[key] = toRaw(value);
        }

        return json;
    }

    protected get protectedFields(): readonly string[] {
        return [];
    }

    protected get defaultObjectType(): ObjectTag | undefined {
        return undefined;
    }

    protected get context(): ObjectContext {
        return this.#context;
    }

    protected get requestor(): Requestor {
        const { requestor } = this.#context;

        if (!requestor) {
            throw new ValidationError(`${this.describe()} is not bound to a client; load it through StripeClient`);
        }

        return requestor;
    }

    /** Replaces all values with `fields`, clearing the dirty set. */
    protected refreshFrom(fields: ReadonlyMap<string, StripeValue>): void {
        this.#values = new Map(fields);
        this.#originalValues = new Map();

        for (const [key, value] of fields) {
            this.#originalValues.set(key, copyLists(value));
        }

        this.#dirty.clear();
        this.#fresh = false;
    }

    protected describe(): string {
        const type = this.objectType ?? 'object';
        const id = this.id;

        return id ? `${type} ${id}` : type;
    }

    #assign(name: string, value: AssignableValue): void {
        this.#values.set(name, toStripeValue(value, this.#context));
        this.#dirty.add(name);
    }

    #typeMismatch(name: string, expected: string, value: StripeValue): ValidationError {
        const actual = value === null ? 'null' : Array.isArray(value) ? 'list' : typeof value;

        return new ValidationError(`Attribute "${name}" on ${this.describe()} is ${actual}, expected ${expected}`, {
            param: name,
        });
    }
}

function isAssignableList(value: AssignableValue): value is readonly AssignableValue[] {
    return Array.isArray(value);
}

function toStripeValue(value: AssignableValue, context: ObjectContext): StripeValue {
    if (value instanceof StripeObject) {
        return value;
    }

    if (isAssignableList(value)) {
        return value.map(item => toStripeValue(item, context));
    }

    if (value !== null && typeof value === 'object') {
        return new StripeObject(value, context);
    }

    return value;
}

/** Copies arrays at every depth; records keep their identity. */
function copyLists(value: StripeValue): StripeValue {
    return Array.isArray(value) ? value.map(copyLists) : value;
}

function loadGeneric(value: RawValue, context: ObjectContext): StripeValue {
    if (Array.isArray(value)) {
        return value.map(item => loadGeneric(item, context));
    }

    if (isRawObject(value)) {
        return StripeObject.constructFrom(value, context);
    }

    return value;
}

function toRaw(value: StripeValue): RawValue {
    if (value instanceof StripeObject) {
        return value.toJSON();
    }

    if (Array.isArray(value)) {
        return value.map(toRaw);
    }

    return value;
}
