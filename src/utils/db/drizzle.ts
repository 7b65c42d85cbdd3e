import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';

import * as schema from '../../db/schema';
import type { Logger } from '../logger';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseSettings {
    url: string;
    ssl: boolean;
    pool?: { min: number; max: number };
}

export interface DatabaseConnection {
    db: Database;
    pool: Pool;
}

/**
 * Opens the connection pool. Nothing connects until the first query.
 */
export function createDatabase(
    settings: DatabaseSettings,
    logger: Logger
): DatabaseConnection {
    const log = logger.child({ module: 'database' });

    const pool = new Pool({
        connectionString: settings.url,
        ssl: settings.ssl ? { rejectUnauthorized: true } : undefined,
        max: settings.pool?.max ?? 10,
        min: settings.pool?.min ?? 2,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 5000,
        keepAlive: true,
        keepAliveInitialDelayMillis: 10000,
    });

    pool.on('error', (err) => {
        // An idle client failed; the pool replaces it
        log.error({ err }, 'Unexpected database error');
    });

    pool.on('connect', () => {
        log.debug('New database connection established');
    });

    const db = drizzle(pool, {
        schema,
        logger: process.env.NODE_ENV === 'development',
    });

    return { db, pool };
}

export async function checkDatabaseHealth(
    pool: Pool,
    logger: Logger
): Promise<boolean> {
    try {
        await pool.query('SELECT 1');
        return true;
    } catch (error) {
        logger.error({ err: error }, 'Database health check failed');
        return false;
    }
}
