/**
 * Keys redacted from every log line. Contest users log in with plain
 * passwords and the admin UI forwards browser cookies, so both stay out of
 * the logs along with any credential the database layer might echo.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'cookie', '*.cookie',
    'cookies', '*.cookies',
    'token', '*.token',
    'password', '*.password',
    'secret', '*.secret',

    // Request payloads that may carry uploaded file bodies
    'binary_data', '*.binary_data',

    // Database connection parameters
    'DB_PASSWORD', '*.DB_PASSWORD'
];

export const REDACT_CENSOR = '[REDACTED]';
