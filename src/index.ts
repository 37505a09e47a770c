export { StripeClient } from './StripeClient.js';
export type { Settings, ApiKey } from './types.js';

export { createLogger, getLevel, setLevel, redactSecrets } from './infra/logger.js';
export type { LogLevel, Logger, LogContext } from './infra/logger.js';
export {
    BaseError,
    NetworkError,
    AuthError,
    PermissionError,
    RateLimitError,
    InvalidRequestError,
    IdempotencyError,
    CardError,
    ApiError,
    TimeoutError,
    InvalidCredentialsError,
    ImmutableAssignmentError,
    AttributeNotFoundError,
    ValidationError,
    fromHttpResponse,
    fromFetchError,
    wrap,
} from './infra/errors.js';
export type { ErrorCode, AuthErrorCode, ErrorJSON, ErrorOptions } from './infra/errors.js';
export {
    setDefaultApiKey,
    getDefaultApiKey,
    getApiBase,
    getConnectBase,
    getApiVersion,
    getTimeoutMs,
    DEFAULT_API_BASE,
    DEFAULT_CONNECT_BASE,
    DEFAULT_TIMEOUT_MS,
} from './config/stripe.js';

export type {
    ObjectId,
    ObjectTag,
    RawScalar,
    RawValue,
    RawObject,
    StripeValue,
    RequestOptions,
    NormalizedRequestOptions,
    Requestor,
    ObjectContext,
} from './core/types.js';
export { StripeRestClient } from './core/stripe/rest/request.js';
export type { HttpMethod, RequestInitEx, StripeRestClientOptions } from './core/stripe/rest/request.js';
export { encodeForm, flattenParams } from './core/stripe/rest/encode.js';
export type { FormParams, FormValue, FormScalar } from './core/stripe/rest/encode.js';
export { StripeRequestor } from './core/stripe/requestor.js';
export { Accounts } from './core/stripe/rest/accounts.js';

export { StripeObject } from './domain/stripeObject.js';
export type { AssignableValue, AssignableObject, RecordConstructor } from './domain/stripeObject.js';
export { serializeParams, snapshotParams, UNSET } from './domain/serialize.js';
export type { ParamMap, ParamValue } from './domain/serialize.js';
export { ApiResource } from './domain/apiResource.js';
export { Account } from './domain/account.js';
export { ExternalAccount, BankAccount, Card } from './domain/externalAccount.js';
export { ListObject } from './domain/listObject.js';
export { convertToStripeObject, convertValue, convertFields, resolveRecordType, OBJECT_TYPES } from './domain/convert.js';
export type { RecordType } from './domain/convert.js';
