import { GuardRule } from '../config-guard.js';

/**
 * Database configuration guards. No inline defaults for connection
 * parameters.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD' },
    { type: 'required', name: 'DB_NAME' },

    {
        type: 'forbidIf',
        name: 'DB_SSL',
        when: () => ['production', 'staging'].includes(process.env.NODE_ENV ?? '') &&
            process.env.DB_SSL === 'false',
        message: 'DB_SSL=false is forbidden in production/staging',
    }
];
