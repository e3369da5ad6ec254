import pg from 'pg';
import { ConfigGuard } from '../bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';
import { logger } from '../logging/logger.js';

const { Pool } = pg;

export type Queryable = Pick<pg.Pool, 'query'>;

/**
 * Creates the contest database pool. Connection parameters come only from
 * the environment and are checked by DB_CONFIG_GUARDS first.
 */
export function createPool(env: NodeJS.ProcessEnv = process.env): pg.Pool {
    ConfigGuard.enforce(DB_CONFIG_GUARDS);

    const poolMax = env.DB_POOL_MAX ? Number.parseInt(env.DB_POOL_MAX, 10) : 10;
    const pool = new Pool({
        host: env.DB_HOST,
        port: Number.parseInt(env.DB_PORT ?? '', 10),
        user: env.DB_USER,
        password: env.DB_PASSWORD,
        database: env.DB_NAME,
        max: Number.isFinite(poolMax) ? poolMax : 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: env.DB_SSL === 'true'
            ? { rejectUnauthorized: true, ca: env.DB_CA_CERT }
            : false
    });

    // An idle client dropping must not take the admin server down.
    pool.on('error', error => {
        logger.error({ error }, '[DB] Idle client error');
    });

    return pool;
}
