import type { AppConfig } from './config';
import { AuthorizationServer } from './core/oidc/services';
import { TokenService } from './core/token/service';
import { MemoryOidcStore } from './db/repository/memory.repository';
import type { OidcStore } from './db/repository/oidc.repository';
import { PostgresOidcStore } from './db/repository/postgres.repository';
import { ApiError } from './utils/api/api-error';
import { checkDatabaseHealth, createDatabase } from './utils/db/drizzle';
import type { Logger } from './utils/logger';

export interface Services {
    store: OidcStore;
    tokens: TokenService;
    oidc: AuthorizationServer;
    healthCheck?: () => Promise<boolean>;
}

function createStore(
    config: AppConfig,
    logger: Logger
): Pick<Services, 'store' | 'healthCheck'> {
    if (config.storage.driver === 'memory') {
        return { store: new MemoryOidcStore() };
    }

    const url = config.database.url;
    if (!url) {
        throw new Error('database.url is required for the postgres driver');
    }
    const { db, pool } = createDatabase(
        { url, ssl: config.database.ssl, pool: config.database.pool },
        logger
    );
    return {
        store: new PostgresOidcStore(db, pool),
        healthCheck: () => checkDatabaseHealth(pool, logger),
    };
}

export function createServices(config: AppConfig, logger: Logger): Services {
    const { store, healthCheck } = createStore(config, logger);

    const tokens = new TokenService({
        issuer: config.oidc.issuer,
        algorithm: config.oidc.signingAlgorithm,
        idTokenTTL: config.oidc.idTokenTTL,
    });

    const oidc = new AuthorizationServer({
        store,
        tokens,
        settings: {
            issuer: config.oidc.issuer,
            authorizationCodeTTL: config.oidc.authorizationCodeTTL,
            accessTokenTTL: config.oidc.accessTokenTTL,
        },
        logger,
    });

    return { store, tokens, oidc, ...(healthCheck && { healthCheck }) };
}

/**
 * Registers the configured clients and users. Clients are upserted; users
 * that already exist are left untouched.
 */
export async function seedRegistry(
    oidc: AuthorizationServer,
    config: AppConfig['oidc'],
    logger: Logger
): Promise<{ clients: number; users: number }> {
    for (const client of config.clients) {
        await oidc.registerClient(client);
    }

    let users = 0;
    for (const user of config.users) {
        try {
            await oidc.registerUser(user);
            users++;
        } catch (error) {
            if (error instanceof ApiError && error.code === 'USERNAME_TAKEN') {
                logger.debug({ username: user.username }, 'User already registered');
                continue;
            }
            throw error;
        }
    }

    return { clients: config.clients.length, users };
}
