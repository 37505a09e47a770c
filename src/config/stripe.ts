import { createLogger } from '../infra/logger.js';

export const DEFAULT_API_BASE = 'https://api.stripe.com';
export const DEFAULT_CONNECT_BASE = 'https://connect.stripe.com';

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT_MS = 80_000;

const MAX_TIMEOUT_MS = 600_000;

const log = createLogger('config:stripe');

let defaultApiKey: string | undefined;

/**
 * Sets the process-wide API key used when neither the request nor the client
 * supplies one. Pass `undefined` to fall back to `STRIPE_API_KEY` again.
 */
export function setDefaultApiKey(apiKey: string | undefined): void {
    defaultApiKey = apiKey?.trim() || undefined;
}

/**
 * Resolved on every call so that key rotation takes effect without
 * rebuilding clients or records.
 */
export function getDefaultApiKey(): string | undefined {
    return defaultApiKey ?? (process.env.STRIPE_API_KEY?.trim() || undefined);
}

export function getApiBase(): string {
    return readUrl('STRIPE_API_BASE') ?? DEFAULT_API_BASE;
}

export function getConnectBase(): string {
    return readUrl('STRIPE_CONNECT_BASE') ?? DEFAULT_CONNECT_BASE;
}

export function getApiVersion(): string | undefined {
    return process.env.STRIPE_API_VERSION?.trim() || undefined;
}

export function getTimeoutMs(): number {
    const raw = process.env.STRIPE_TIMEOUT_MS?.trim();

    if (!raw) {
        return DEFAULT_TIMEOUT_MS;
    }

    const parsed = Number.parseInt(raw, 10);

    if (!Number.isFinite(parsed) || parsed <= 0) {
        return DEFAULT_TIMEOUT_MS;
    }

    if (parsed > MAX_TIMEOUT_MS) {
        log.warn('STRIPE_TIMEOUT_MS above safe maximum → clamping', {
            provided: parsed,
            max: MAX_TIMEOUT_MS,
        });

        return MAX_TIMEOUT_MS;
    }

    return parsed;
}

function readUrl(name: string): string | undefined {
    const raw = process.env[name]?.trim();

    if (!raw) {
        return undefined;
    }

    let url: URL;

    try {
        url = new URL(raw);
    } catch {
        log.warn('%s is not a valid URL → using default', name, { provided: raw });

        return undefined;
    }

    // Request paths are absolute, so only the origin of the base is used.
    if (url.pathname !== '/' || url.search || url.hash) {
        log.warn('%s has a path or query → using its origin only', name, { provided: raw, origin: url.origin });
    }

    return url.origin;
}
