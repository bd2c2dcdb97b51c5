/**
 * Centralized Redaction Configuration
 * Keys that must be redacted from logs to prevent credential leakage.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'Authorization', '*.Authorization',
    'headers.authorization', '*.headers.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'bearerToken', '*.bearerToken',
    'password', '*.password',
    'secret', '*.secret',
    'client_secret', '*.client_secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Connection strings may embed the credential
    'dsn', '*.dsn'
];

export const REDACT_CENSOR = '[REDACTED]';
