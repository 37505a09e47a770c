import { ApiResource } from './apiResource.js';
import { ListObject } from './listObject.js';

import { API_PATHS } from '../core/stripe/constants.js';
import { ValidationError } from '../infra/errors.js';
import { createLogger } from '../infra/logger.js';

import type { StripeObject } from './stripeObject.js';
import type { ObjectTag, RequestOptions } from '../core/types.js';
import type { FormParams } from '../core/stripe/rest/encode.js';

const PROTECTED_FIELDS: readonly string[] = ['legal_entity'];

const log = createLogger('stripe:account');

/**
 * Connected account. Without an id it addresses the account that owns the
 * API key (`/v1/account`).
 *
 * `legal_entity` may only be edited field by field:
 *
 * ```ts
 * account.legalEntity.set('first_name', 'Bob');
 * await account.save();
 * ```
 */
export class Account extends ApiResource {
    resourceUrl(): string {
        const { id } = this;

        return id ? `${API_PATHS.accounts}/${encodeURIComponent(id)}` : API_PATHS.currentAccount;
    }

    get email(): string | null {
        return this.get('email') === null ? null : this.getString('email');
    }

    get chargesEnabled(): boolean {
        return this.getBoolean('charges_enabled');
    }

    get detailsSubmitted(): boolean {
        return this.getBoolean('details_submitted');
    }

    get keys(): StripeObject {
        return this.getObject('keys');
    }

    get legalEntity(): StripeObject {
        return this.getObject('legal_entity');
    }

    get externalAccounts(): ListObject {
        const value = this.get('external_accounts');

        if (!(value instanceof ListObject)) {
            throw new ValidationError(`external_accounts on ${this.describe()} is not a list`);
        }

        return value;
    }

    async reject(reason: string, options?: RequestOptions | string): Promise<this> {
        const path = `${API_PATHS.accounts}/${encodeURIComponent(this.requireId())}/reject`;
        const params: FormParams = { reason };
        const raw = await this.requestor.request('POST', path, params, this.callOptions(options));

        this.refreshFrom(this.requestor.convertFields(raw, this.context.options));

        return this;
    }

    /**
     * Revokes the platform's access to this account. The request goes to the
     * OAuth host rather than the API host.
     */
    async deauthorize(clientId: string, options?: RequestOptions | string): Promise<StripeObject> {
        const callOptions = this.callOptions(options);
        const params: FormParams = { client_id: clientId, stripe_user_id: this.requireId() };
        const raw = await this.requestor.request('POST', API_PATHS.deauthorize, params, {
            ...callOptions,
            apiBase: this.requestor.connectBase,
        });

        log.info('account %s deauthorized for client %s', this.id, clientId);

        return this.requestor.materialize(raw, callOptions);
    }

    protected override get protectedFields(): readonly string[] {
        return PROTECTED_FIELDS;
    }

    protected override get defaultObjectType(): ObjectTag {
        return 'account';
    }
}
