/**
 * Log Redaction Configuration
 * Masking events log the calling context and member names, never member values.
 * These paths catch values that reach a log line through a context object anyway.
 */
export const REDACT_KEYS = [
    // Request credentials carried on a calling context
    'authorization', '*.authorization',
    'cookie', '*.cookie',
    'token', '*.token',
    'apiKey', '*.apiKey',
    'password', '*.password',
    'secret', '*.secret',

    // Context headers (Express request snapshot)
    'context.headers.authorization',
    'context.headers.cookie',
    'context.headers["x-api-key"]',

    // Error payloads that might echo a member value
    'internalDetails.value',
    'err.value'
];

export const REDACT_CENSOR = '[REDACTED]';
