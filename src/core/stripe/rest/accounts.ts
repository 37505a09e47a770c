import { Account } from '../../../domain/account.js';
import { ListObject } from '../../../domain/listObject.js';
import { InvalidCredentialsError } from '../../../infra/errors.js';
import { createLogger } from '../../../infra/logger.js';
import { isSecretKeyShaped, normalizeObjectId, normalizeRequestOptions } from '../../../infra/validation.js';
import { API_PATHS } from '../constants.js';

import type { FormParams } from './encode.js';
import type { NormalizedRequestOptions, RequestOptions, Requestor } from '../../types.js';

const log = createLogger('stripe:rest:accounts');

/**
 * Entry points for the account resource. Records returned here carry the
 * call's options for their own follow-up requests.
 */
export class Accounts {
    readonly #requestor: Requestor;

    constructor(requestor: Requestor) {
        this.#requestor = requestor;
    }

    /**
     * - `retrieve()` fetches the account that owns the API key.
     * - `retrieve(id)` fetches a connected account.
     * - `retrieve('sk_...')` fetches the account that owns the given key.
     * - `retrieve(null)` and `retrieve({ apiKey: null })` throw
     *   {@link InvalidCredentialsError}.
     */
    retrieve(options?: RequestOptions): Promise<Account>;
    retrieve(id: string | null, options?: RequestOptions | string): Promise<Account>;
    async retrieve(idOrOptions?: string | null | RequestOptions, options?: RequestOptions | string): Promise<Account> {
        if (idOrOptions === null) {
            throw new InvalidCredentialsError('Account id or API key cannot be null');
        }

        let id: string | undefined;
        let callOptions: NormalizedRequestOptions;

        if (typeof idOrOptions === 'string' && options === undefined && isSecretKeyShaped(idOrOptions)) {
            callOptions = normalizeRequestOptions(idOrOptions);
        } else if (typeof idOrOptions === 'string') {
            id = normalizeObjectId(idOrOptions);
            callOptions = normalizeRequestOptions(options);
        } else {
            callOptions = normalizeRequestOptions(idOrOptions);
        }

        const path = id ? `${API_PATHS.accounts}/${encodeURIComponent(id)}` : API_PATHS.currentAccount;
        const raw = await this.#requestor.request('GET', path, undefined, callOptions);

        log.debug('retrieved account %s', raw.id ?? '(current)');

        return Account.load(this.#requestor.convertFields(raw, callOptions), {
            requestor: this.#requestor,
            options: callOptions,
        });
    }

    async create(params: FormParams = {}, options?: RequestOptions | string): Promise<Account> {
        const callOptions = normalizeRequestOptions(options);
        const raw = await this.#requestor.request('POST', API_PATHS.accounts, params, callOptions);

        log.info('created account %s', raw.id ?? '(unknown)');

        return Account.load(this.#requestor.convertFields(raw, callOptions), {
            requestor: this.#requestor,
            options: callOptions,
        });
    }

    async list(params: FormParams = {}, options?: RequestOptions | string): Promise<ListObject> {
        const callOptions = normalizeRequestOptions(options);
        const raw = await this.#requestor.request('GET', API_PATHS.accounts, params, callOptions);

        return ListObject.load(this.#requestor.convertFields(raw, callOptions), {
            requestor: this.#requestor,
            options: callOptions,
        });
    }
}
