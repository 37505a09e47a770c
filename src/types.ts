export type ApiKey = string;

export type Settings = {
    /** Used when a call does not pass its own key; falls back to the process-wide default. */
    apiKey?: ApiKey;
    apiBase?: string;
    connectBase?: string;
    apiVersion?: string;
    timeoutMs?: number;
};
