import { format, inspect } from 'node:util';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
};

const PLACEHOLDER_REGEX = /%[sdifjoOc]/g;
const SECRET_KEY_REGEX = /^(api_?key|authorization|secret|client_secret|password)$/i;
const SECRET_VALUE_REGEX = /\b(sk|rk)_(test|live)_[A-Za-z0-9]+/g;

export type LogContext = Record<string, unknown> & { tags?: readonly string[] };

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_PRIORITY;
}

function normalizeLevel(level?: string | null): LogLevel | undefined {
    if (!level) {
        return undefined;
    }

    const normalized = level.trim().toLowerCase();

    return isLogLevel(normalized) ? normalized : undefined;
}

let globalLevel: LogLevel = normalizeLevel(process.env.STRIPE_LOG_LEVEL) ?? 'info';

export function setLevel(level: LogLevel | string): void {
    const normalized = normalizeLevel(level);

    if (normalized) {
        globalLevel = normalized;
    }
}

export function getLevel(): LogLevel {
    return globalLevel;
}

/**
 * Masks API keys embedded in free text, keeping the mode prefix and the last
 * four characters: `sk_test_abcdef1234` becomes `sk_test_****1234`.
 */
export function redactSecrets(text: string): string {
    return text.replace(SECRET_VALUE_REGEX, match => {
        const prefixEnd = match.indexOf('_', match.indexOf('_') + 1) + 1;

        return `${match.slice(0, prefixEnd)}****${match.slice(-4)}`;
    });
}

function isPlainObject(value: unknown): value is LogContext {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }

    const prototype = Object.getPrototypeOf(value);

    return prototype === Object.prototype || prototype === null;
}

function redactContext(context: LogContext): LogContext {
    const result: LogContext = {};

    for (const [key, value] of Object.entries(context)) {
        if (SECRET_KEY_REGEX.test(key) && value !== undefined && value !== null) {
            result[key] = '[REDACTED]';
        } else if (isPlainObject(value)) {
            result[key] = redactContext(value);
        } else {
            result[key] = value;
        }
    }

    return result;
}

function stringifyContext(context: LogContext): string {
    const redacted = redactContext(context);

    try {
        return JSON.stringify(redacted);
    } catch {
        return inspect(redacted, { depth: null, compact: true, breakLength: Infinity });
    }
}

function mergeContext(base?: LogContext, extra?: LogContext): LogContext | undefined {
    if (!base || !extra) {
        const only = base ?? extra;

        return only ? { ...only } : undefined;
    }

    const { tags: baseTags, ...baseRest } = base;
    const { tags: extraTags, ...extraRest } = extra;
    const merged: LogContext = { ...baseRest, ...extraRest };
    const tags = new Set<string>([...(baseTags ?? []), ...(extraTags ?? [])]);

    if (tags.size > 0) {
        merged.tags = Array.from(tags);
    }

    return merged;
}

function countPlaceholders(template: string): number {
    return template.match(PLACEHOLDER_REGEX)?.length ?? 0;
}

function formatMessage(args: unknown[], baseContext?: LogContext): string {
    let context = baseContext;
    let formatArgs = args;

    const candidate = args.at(-1);
    const template = args[0];

    if (isPlainObject(candidate) && typeof template === 'string') {
        if (countPlaceholders(template) <= args.length - 2) {
            context = mergeContext(baseContext, candidate);
            formatArgs = args.slice(0, -1);
        }
    }

    const [first, ...rest] = formatArgs;
    const baseMessage = formatArgs.length > 0 ? redactSecrets(format(first, ...rest)) : '';

    if (!context) {
        return baseMessage;
    }

    return `${baseMessage}${baseMessage ? ' ' : ''}${redactSecrets(stringifyContext(context))}`.trim();
}

function formatLine(level: LogLevel, namespace: string | undefined, message: string): string {
    const time = new Date().toISOString();
    const scope = namespace ? ` ${namespace}` : '';
    const separator = message ? ': ' : '';

    return `[${time}] ${level.toUpperCase()}${scope}${separator}${message}`;
}

type LogFn = (...args: unknown[]) => void;

function createWriter(level: LogLevel, namespace?: string, baseContext?: LogContext): LogFn {
    const stream = level === 'error' || level === 'warn' ? process.stderr : process.stdout;

    return (...args: unknown[]) => {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[globalLevel]) {
            return;
        }

        stream.write(`${formatLine(level, namespace, formatMessage(args, baseContext))}\n`);
    };
}

export interface Logger {
    level(): LogLevel;
    setLevel(level: LogLevel | string): void;
    trace: LogFn;
    debug: LogFn;
    info: LogFn;
    warn: LogFn;
    error: LogFn;
    withContext(context: LogContext): Logger;
    withTags(tags: readonly string[]): Logger;
}

export function createLogger(namespace?: string, context?: LogContext): Logger {
    const baseContext = context ? { ...context } : undefined;

    return {
        level: getLevel,
        setLevel,
        trace: createWriter('trace', namespace, baseContext),
        debug: createWriter('debug', namespace, baseContext),
        info: createWriter('info', namespace, baseContext),
        warn: createWriter('warn', namespace, baseContext),
        error: createWriter('error', namespace, baseContext),
        withContext(extra: LogContext): Logger {
            return createLogger(namespace, mergeContext(baseContext, extra));
        },
        withTags(tags: readonly string[]): Logger {
            return createLogger(namespace, mergeContext(baseContext, { tags }));
        },
    };
}
