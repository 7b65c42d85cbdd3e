import { and, eq, gte, lt } from 'drizzle-orm';
import type { Pool } from 'pg';

import type {
    AccessToken,
    AuthorizationCode,
    Client,
    Session,
    User,
} from '../../types/oidc';
import type { Database } from '../../utils/db/drizzle';
import * as schema from '../schema';
import type { ConsumeAuthorizationCode, OidcStore } from './oidc.repository';

type AuthorizationCodeRow = typeof schema.authorizationCodes.$inferSelect;

function toAuthorizationCode(row: AuthorizationCodeRow): AuthorizationCode {
    const { nonce, ...rest } = row;
    return { ...rest, ...(nonce !== null && { nonce }) };
}

/**
 * PostgreSQL store (drizzle-orm over node-postgres).
 *
 * Code redemption is one `UPDATE … WHERE used = false … RETURNING`; the row
 * lock taken by the first UPDATE makes any concurrent one re-check `used`
 * and match nothing.
 */
export class PostgresOidcStore implements OidcStore {
    constructor(
        private readonly db: Database,
        private readonly pool?: Pool
    ) {}

    // ========================================================================
    // USERS & CLIENTS
    // ========================================================================

    async insertUser(user: User): Promise<boolean> {
        const inserted = await this.db
            .insert(schema.users)
            .values(user)
            .onConflictDoNothing()
            .returning({ id: schema.users.id });
        return inserted.length > 0;
    }

    async findUserByUsername(username: string): Promise<User | undefined> {
        return this.db.query.users.findFirst({
            where: eq(schema.users.username, username),
        });
    }

    async findUserById(id: string): Promise<User | undefined> {
        return this.db.query.users.findFirst({
            where: eq(schema.users.id, id),
        });
    }

    async saveClient(client: Client): Promise<void> {
        await this.db
            .insert(schema.clients)
            .values(client)
            .onConflictDoUpdate({
                target: schema.clients.clientId,
                set: {
                    clientSecretHash: client.clientSecretHash,
                    name: client.name,
                    redirectUris: client.redirectUris,
                    grantTypes: client.grantTypes,
                    responseTypes: client.responseTypes,
                    scopes: client.scopes,
                },
            });
    }

    async findClient(clientId: string): Promise<Client | undefined> {
        return this.db.query.clients.findFirst({
            where: eq(schema.clients.clientId, clientId),
        });
    }

    // ========================================================================
    // SESSIONS
    // ========================================================================

    async insertSession(session: Session): Promise<void> {
        await this.db.insert(schema.loginSessions).values(session);
    }

    async findSession(tokenHash: string): Promise<Session | undefined> {
        return this.db.query.loginSessions.findFirst({
            where: eq(schema.loginSessions.tokenHash, tokenHash),
        });
    }

    async deleteSession(tokenHash: string): Promise<boolean> {
        const deleted = await this.db
            .delete(schema.loginSessions)
            .where(eq(schema.loginSessions.tokenHash, tokenHash))
            .returning({ tokenHash: schema.loginSessions.tokenHash });
        return deleted.length > 0;
    }

    // ========================================================================
    // AUTHORIZATION CODES
    // ========================================================================

    async insertAuthorizationCode(code: AuthorizationCode): Promise<boolean> {
        const inserted = await this.db
            .insert(schema.authorizationCodes)
            .values({ ...code, nonce: code.nonce ?? null })
            .onConflictDoNothing()
            .returning({ code: schema.authorizationCodes.code });
        return inserted.length > 0;
    }

    async findAuthorizationCode(
        code: string
    ): Promise<AuthorizationCode | undefined> {
        const row = await this.db.query.authorizationCodes.findFirst({
            where: eq(schema.authorizationCodes.code, code),
        });
        return row && toAuthorizationCode(row);
    }

    async consumeAuthorizationCode({
        code,
        clientId,
        redirectUri,
        now,
    }: ConsumeAuthorizationCode): Promise<AuthorizationCode | undefined> {
        const table = schema.authorizationCodes;
        const [row] = await this.db
            .update(table)
            .set({ used: true })
            .where(
                and(
                    eq(table.code, code),
                    eq(table.used, false),
                    gte(table.expiresAt, now),
                    eq(table.clientId, clientId),
                    eq(table.redirectUri, redirectUri)
                )
            )
            .returning();
        return row && toAuthorizationCode(row);
    }

    async deleteExpiredAuthorizationCodes(now: Date): Promise<number> {
        const deleted = await this.db
            .delete(schema.authorizationCodes)
            .where(lt(schema.authorizationCodes.expiresAt, now))
            .returning({ code: schema.authorizationCodes.code });
        return deleted.length;
    }

    // ========================================================================
    // ACCESS TOKENS
    // ========================================================================

    async insertAccessToken(token: AccessToken): Promise<void> {
        await this.db.insert(schema.accessTokens).values(token);
    }

    async findAccessToken(tokenHash: string): Promise<AccessToken | undefined> {
        return this.db.query.accessTokens.findFirst({
            where: eq(schema.accessTokens.tokenHash, tokenHash),
        });
    }

    async deleteExpiredAccessTokens(now: Date): Promise<number> {
        const deleted = await this.db
            .delete(schema.accessTokens)
            .where(lt(schema.accessTokens.expiresAt, now))
            .returning({ tokenHash: schema.accessTokens.tokenHash });
        return deleted.length;
    }

    async close(): Promise<void> {
        await this.pool?.end();
    }
}
