import { ApiResource } from './apiResource.js';

import { API_PATHS } from '../core/stripe/constants.js';
import { ValidationError } from '../infra/errors.js';

import type { ObjectTag } from '../core/types.js';

/**
 * Payout destination attached to a connected account, or a payment source
 * attached to a customer. Its URL depends on which owner it carries.
 */
export abstract class ExternalAccount extends ApiResource {
    resourceUrl(): string {
        const id = encodeURIComponent(this.requireId());
        const customer = this.getOptional('customer');
        const account = this.getOptional('account');

        if (typeof customer === 'string') {
            return `${API_PATHS.customers}/${encodeURIComponent(customer)}/sources/${id}`;
        }

        if (typeof account === 'string') {
            return `${API_PATHS.accounts}/${encodeURIComponent(account)}/external_accounts/${id}`;
        }

        throw new ValidationError(`${this.describe()} belongs to neither an account nor a customer`);
    }
}

export class BankAccount extends ExternalAccount {
    get last4(): string {
        return this.getString('last4');
    }

    get country(): string {
        return this.getString('country');
    }

    get currency(): string {
        return this.getString('currency');
    }

    protected override get defaultObjectType(): ObjectTag {
        return 'bank_account';
    }
}

export class Card extends ExternalAccount {
    get last4(): string {
        return this.getString('last4');
    }

    get brand(): string {
        return this.getString('brand');
    }

    protected override get defaultObjectType(): ObjectTag {
        return 'card';
    }
}
