export const CLIENT_VERSION = '0.1.0';

export const USER_AGENT = `stripe-accounts-client/${CLIENT_VERSION} node/${process.versions.node}`;

export const API_PATHS = {
    currentAccount: '/v1/account',
    accounts: '/v1/accounts',
    customers: '/v1/customers',
    deauthorize: '/oauth/deauthorize',
} as const;
