/**
 * Client error hierarchy and helpers.
 *
 * Local usage errors (bad credentials argument, protected assignment, missing
 * attribute) and remote API failures share {@link BaseError}, so callers can
 * branch on `code` without caring where the failure was raised.
 */

export type ErrorCode =
    | 'API_CONNECTION_ERROR'
    | 'AUTHENTICATION_ERROR'
    | 'PERMISSION_ERROR'
    | 'RATE_LIMIT'
    | 'INVALID_REQUEST'
    | 'IDEMPOTENCY_ERROR'
    | 'CARD_ERROR'
    | 'API_ERROR'
    | 'TIMEOUT'
    | 'INVALID_CREDENTIALS'
    | 'IMMUTABLE_ASSIGNMENT'
    | 'ATTRIBUTE_NOT_FOUND'
    | 'VALIDATION_ERROR'
    | 'UNKNOWN_ERROR';

export type AuthErrorCode = 'MISSING_KEY' | 'BAD_CREDENTIALS';

export interface ErrorJSON {
    name: string;
    code: ErrorCode | AuthErrorCode;
    category: ErrorCode;
    message: string;
    httpStatus?: number;
    retryAfterMs?: number;
    requestId?: string;
    param?: string;
    details?: Record<string, unknown>;
    cause?: string;
    stack?: string;
}

export interface ErrorOptions {
    code: ErrorCode;
    message?: string;
    cause?: unknown;
    details?: Record<string, unknown>;
    httpStatus?: number;
    retryAfterMs?: number;
    requestId?: string;
    param?: string;
}

export type ErrorInit = Omit<ErrorOptions, 'code' | 'message'>;

type ErrorOverrides = Partial<Omit<ErrorOptions, 'code'>>;

export class BaseError extends Error {
    public readonly category: ErrorCode;
    public override readonly cause?: unknown;
    public readonly details?: Record<string, unknown>;
    public readonly httpStatus?: number;
    public readonly retryAfterMs?: number;
    public readonly requestId?: string;
    public readonly param?: string;

    constructor(opts: ErrorOptions) {
        const message = opts.message ?? opts.code;

        super(message);

        this.name = new.target.name;
        this.category = opts.code;
        this.cause = opts.cause;
        this.details = opts.details;
        this.httpStatus = opts.httpStatus;
        this.retryAfterMs = opts.retryAfterMs;
        this.requestId = opts.requestId;
        this.param = opts.param;

        Error.captureStackTrace?.(this, new.target);

        Object.setPrototypeOf(this, new.target.prototype);
    }

    get code(): ErrorCode | AuthErrorCode {
        return this.category;
    }

    isRetryable(): boolean {
        switch (this.category) {
            case 'API_CONNECTION_ERROR':
            case 'RATE_LIMIT':
            case 'API_ERROR':
            case 'TIMEOUT':
                return true;
            default:
                return false;
        }
    }

    toJSON(): ErrorJSON {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            httpStatus: this.httpStatus,
            retryAfterMs: this.retryAfterMs,
            requestId: this.requestId,
            param: this.param,
            details: this.details ? sanitizeRecord(this.details) : undefined,
            cause: formatCause(this.cause),
            stack: this.stack,
        };
    }
}

export class NetworkError extends BaseError {
    constructor(message = 'Could not connect to the API', opts: ErrorInit = {}) {
        super({ code: 'API_CONNECTION_ERROR', message, ...opts });
    }
}

export class AuthError extends BaseError {
    public readonly authCode: AuthErrorCode;

    constructor(message = 'Authentication failed', code: AuthErrorCode = 'BAD_CREDENTIALS', opts: ErrorInit = {}) {
        super({ code: 'AUTHENTICATION_ERROR', message, ...opts });
        this.authCode = code;
    }

    override get code(): AuthErrorCode {
        return this.authCode;
    }

    static missingKey(
        message = 'No API key provided. Pass `apiKey` to the client, call setDefaultApiKey() or set STRIPE_API_KEY',
        opts: ErrorInit = {},
    ): AuthError {
        return new AuthError(message, 'MISSING_KEY', opts);
    }

    static badCredentials(message = 'Invalid API key provided', opts: ErrorInit = {}): AuthError {
        return new AuthError(message, 'BAD_CREDENTIALS', opts);
    }
}

export class PermissionError extends BaseError {
    constructor(message = 'The API key does not have access to this resource', opts: ErrorInit = {}) {
        super({ code: 'PERMISSION_ERROR', message, ...opts });
    }
}

export class RateLimitError extends BaseError {
    constructor(message = 'Too many requests', opts: ErrorInit = {}) {
        super({ code: 'RATE_LIMIT', message, ...opts });
    }
}

export class InvalidRequestError extends BaseError {
    constructor(message = 'Invalid request', opts: ErrorInit = {}) {
        super({ code: 'INVALID_REQUEST', message, ...opts });
    }
}

export class IdempotencyError extends BaseError {
    constructor(message = 'Idempotency key reused with different parameters', opts: ErrorInit = {}) {
        super({ code: 'IDEMPOTENCY_ERROR', message, ...opts });
    }
}

export class CardError extends BaseError {
    public readonly declineCode?: string;

    constructor(message = 'The card was declined', opts: ErrorInit & { declineCode?: string } = {}) {
        const { declineCode, ...rest } = opts;

        super({ code: 'CARD_ERROR', message, ...rest });
        this.declineCode = declineCode;
    }
}

export class ApiError extends BaseError {
    constructor(message = 'The API encountered an internal error', opts: ErrorInit = {}) {
        super({ code: 'API_ERROR', message, ...opts });
    }
}

export class TimeoutError extends BaseError {
    constructor(message = 'Request timed out', opts: ErrorInit = {}) {
        super({ code: 'TIMEOUT', message, ...opts });
    }
}

/** A credential argument was explicitly `null` or malformed. */
export class InvalidCredentialsError extends BaseError {
    constructor(message = 'API key must be a non-empty string', opts: ErrorInit = {}) {
        super({ code: 'INVALID_CREDENTIALS', message, ...opts });
    }
}

export class ImmutableAssignmentError extends BaseError {
    public readonly field: string;

    constructor(field: string, message?: string, opts: ErrorInit = {}) {
        super({
            code: 'IMMUTABLE_ASSIGNMENT',
            message: message ?? `Cannot replace "${field}" wholesale; assign its fields individually`,
            ...opts,
        });
        this.field = field;
    }
}

export class AttributeNotFoundError extends BaseError {
    public readonly field: string;

    constructor(field: string, message?: string, opts: ErrorInit = {}) {
        super({ code: 'ATTRIBUTE_NOT_FOUND', message: message ?? `Attribute "${field}" is not set`, ...opts });
        this.field = field;
    }
}

export class ValidationError extends BaseError {
    constructor(message = 'Validation error', opts: ErrorInit = {}) {
        super({ code: 'VALIDATION_ERROR', message, ...opts });
    }
}

export interface HttpResponseErrorParams {
    status: number;
    body?: unknown;
    headers?: HeadersLike;
    url?: string;
    method?: string;
    requestId?: string;
}

type HeadersLike = Record<string, string | string[] | number | undefined> | Iterable<[string, string]>;

interface ApiErrorBody {
    type?: string;
    message?: string;
    code?: string;
    param?: string;
    declineCode?: string;
}

const HTTP_ERROR_BODY_MAX_BYTES = 2048;

/** Build error from HTTP response context */
export function fromHttpResponse(params: HttpResponseErrorParams): BaseError {
    const { status, body, headers, url, method } = params;
    const normalizedHeaders = normalizeHeaders(headers);
    const requestId = params.requestId ?? normalizedHeaders?.['request-id'] ?? normalizedHeaders?.['x-request-id'];
    const retryAfterMs = parseRetryAfterHeader(normalizedHeaders?.['retry-after']);
    const apiError = extractApiError(body);

    const details: Record<string, unknown> = { status };

    if (url) details.url = url;
    if (method) details.method = method;
    if (apiError?.type) details.type = apiError.type;
    if (apiError?.code) details.apiCode = apiError.code;

    if (body !== undefined) {
        const { value, truncated } = buildHttpErrorBody(body);

        details.body = value;

        if (truncated) {
            details.body_truncated = true;
        }
    }

    if (retryAfterMs !== undefined) details.retryAfterMs = retryAfterMs;

    const init: ErrorInit = { httpStatus: status, requestId, details, param: apiError?.param };
    const message = apiError?.message;

    if (apiError?.type === 'idempotency_error') {
        return new IdempotencyError(message, init);
    }

    if (status === 400 || status === 404) {
        return new InvalidRequestError(message, init);
    }

    if (status === 401) {
        return AuthError.badCredentials(message, init);
    }

    if (status === 402) {
        return new CardError(message, { ...init, declineCode: apiError?.declineCode });
    }

    if (status === 403) {
        return new PermissionError(message, init);
    }

    if (status === 429) {
        return new RateLimitError(message, { ...init, retryAfterMs });
    }

    if (status >= 400 && status < 500) {
        return new InvalidRequestError(message, init);
    }

    if (status >= 500 && status < 600) {
        return new ApiError(message, { ...init, retryAfterMs });
    }

    return new BaseError({
        code: 'UNKNOWN_ERROR',
        message: message ?? `HTTP ${status}`,
        ...init,
        retryAfterMs,
    });
}

/** Build error from low-level fetch/network error */
export function fromFetchError(err: unknown, extra: ErrorOverrides = {}): BaseError {
    if (err instanceof BaseError) {
        return err;
    }

    const { message: overrideMessage, cause: overrideCause, ...context } = extra;
    const cause = overrideCause ?? err;
    const baseMessage = err instanceof Error ? err.message : typeof err === 'string' ? err : 'Network error';
    const message = overrideMessage ?? baseMessage;

    if (isAbortError(err)) {
        return new TimeoutError(message || 'Aborted', { ...context, cause });
    }

    return new NetworkError(message, { ...context, cause });
}

/** Wrap unknown error into BaseError with specific code */
export function wrap(err: unknown, code?: ErrorCode, overrides: ErrorOverrides = {}): BaseError {
    if (err instanceof BaseError) {
        if (!code && !hasOverrides(overrides)) {
            return err;
        }

        const { message, cause, details, httpStatus, retryAfterMs, requestId, param } = overrides;

        return new BaseError({
            code: code ?? err.category,
            message: message ?? err.message,
            cause: cause ?? err,
            details: details || err.details ? { ...err.details, ...details } : undefined,
            httpStatus: httpStatus ?? err.httpStatus,
            retryAfterMs: retryAfterMs ?? err.retryAfterMs,
            requestId: requestId ?? err.requestId,
            param: param ?? err.param,
        });
    }

    const { message, cause, ...rest } = overrides;

    return new BaseError({
        ...rest,
        code: code ?? 'UNKNOWN_ERROR',
        message: message ?? coerceUnknownErrorMessage(err),
        cause: cause ?? err,
    });
}

function hasOverrides(overrides: ErrorOverrides): boolean {
    return Object.values(overrides).some(value => value !== undefined);
}

function extractApiError(body: unknown): ApiErrorBody | undefined {
    if (!isPlainRecord(body) || !isPlainRecord(body.error)) {
        return undefined;
    }

    const { type, message, code, param, decline_code: declineCode } = body.error;

    return {
        type: typeof type === 'string' ? type : undefined,
        message: typeof message === 'string' ? message : undefined,
        code: typeof code === 'string' ? code : undefined,
        param: typeof param === 'string' ? param : undefined,
        declineCode: typeof declineCode === 'string' ? declineCode : undefined,
    };
}

function normalizeHeaders(headers?: HeadersLike): Record<string, string> | undefined {
    if (!headers) {
        return undefined;
    }

    const normalized: Record<string, string> = {};

    if (!isIterable(headers)) {
        for (const [key, value] of Object.entries(headers)) {
            if (value === undefined) continue;

            normalized[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
        }

        return normalized;
    }

    for (const [key, value] of headers) {
        normalized[key.toLowerCase()] = value;
    }

    return normalized;
}

function parseRetryAfterHeader(value: string | undefined): number | undefined {
    if (!value) {
        return undefined;
    }

    const numeric = Number(value);

    if (Number.isFinite(numeric)) {
        return numeric * 1000;
    }

    const date = Date.parse(value);

    if (!Number.isNaN(date)) {
        const diff = date - Date.now();

        return diff > 0 ? diff : 0;
    }

    return undefined;
}

function buildHttpErrorBody(body: unknown): { value: unknown; truncated: boolean } {
    const sanitized = safeSerializeValue(body);

    if (process.env.STRIPE_LOG_HTTP_ERROR_BODY === '1') {
        return { value: sanitized, truncated: false };
    }

    const serialized = typeof sanitized === 'string' ? sanitized : JSON.stringify(sanitized) ?? String(sanitized);
    const buffer = Buffer.from(serialized);

    if (buffer.byteLength <= HTTP_ERROR_BODY_MAX_BYTES) {
        return { value: serialized, truncated: false };
    }

    return { value: buffer.subarray(0, HTTP_ERROR_BODY_MAX_BYTES).toString(), truncated: true };
}

function sanitizeRecord(record: Record<string, unknown>): Record<string, unknown> {
    const seen = new WeakSet<object>();
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(record)) {
        result[key] = safeSerializeValue(value, seen);
    }

    return result;
}

function formatCause(cause: unknown): string | undefined {
    if (cause === undefined || cause === null) {
        return undefined;
    }

    if (cause instanceof Error) {
        return cause.message;
    }

    if (typeof cause === 'string') {
        return cause;
    }

    try {
        const serialized = safeSerializeValue(cause);

        return typeof serialized === 'string' ? serialized : JSON.stringify(serialized);
    } catch {
        return '[Unserializable cause]';
    }
}

function safeSerializeValue(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
    if (value === undefined || value === null) {
        return value;
    }

    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }

    if (typeof value === 'bigint' || typeof value === 'symbol' || typeof value === 'function') {
        return String(value);
    }

    if (value instanceof Date) {
        return value.toISOString();
    }

    if (value instanceof Error) {
        return { type: value.name, message: value.message, stack: value.stack };
    }

    if (typeof value !== 'object') {
        return String(value);
    }

    if (seen.has(value)) {
        return '[Circular]';
    }

    seen.add(value);

    try {
        if (Array.isArray(value)) {
            return value.map(item => safeSerializeValue(item, seen));
        }

        const result: Record<string, unknown> = {};

        for (const [key, val] of Object.entries(value)) {
            result[key] = safeSerializeValue(val, seen);
        }

        return result;
    } finally {
        seen.delete(value);
    }
}

function coerceUnknownErrorMessage(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }

    if (typeof err === 'string') {
        return err;
    }

    if (typeof err === 'number' || typeof err === 'boolean' || typeof err === 'bigint') {
        return String(err);
    }

    return 'Unknown error';
}

function isAbortError(err: unknown): err is Error {
    if (!(err instanceof Error)) {
        return false;
    }

    if (err.name === 'AbortError' || err.name === 'TimeoutError') {
        return true;
    }

    return 'code' in err && (err.code === 'ABORT_ERR' || err.code === 'ERR_CANCELED');
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isIterable(value: HeadersLike): value is Iterable<[string, string]> {
    return Symbol.iterator in value;
}
