import type {
    AccessToken,
    AuthorizationCode,
    Client,
    Session,
    User,
} from '../../types/oidc';
import type { ConsumeAuthorizationCode, OidcStore } from './oidc.repository';

// Callers get copies; stored records only change through the store
function copyCode(code: AuthorizationCode): AuthorizationCode {
    return { ...code, scopes: [...code.scopes] };
}

function copyClient(client: Client): Client {
    return {
        ...client,
        redirectUris: [...client.redirectUris],
        grantTypes: [...client.grantTypes],
        responseTypes: [...client.responseTypes],
        scopes: [...client.scopes],
    };
}

function copyToken(token: AccessToken): AccessToken {
    return { ...token, scopes: [...token.scopes] };
}

function copy<T extends object>(record: T | undefined): T | undefined {
    return record && { ...record };
}

/**
 * Process-local store. Every method body runs without awaiting, so each
 * call is one critical section on the event loop; the compare-and-set in
 * `consumeAuthorizationCode` cannot interleave with another.
 */
export class MemoryOidcStore implements OidcStore {
    private readonly users = new Map<string, User>();
    private readonly usernames = new Map<string, string>();
    private readonly clients = new Map<string, Client>();
    private readonly sessions = new Map<string, Session>();
    private readonly codes = new Map<string, AuthorizationCode>();
    private readonly accessTokens = new Map<string, AccessToken>();

    // ========================================================================
    // USERS & CLIENTS
    // ========================================================================

    async insertUser(user: User): Promise<boolean> {
        if (this.usernames.has(user.username) || this.users.has(user.id)) {
            return false;
        }
        this.users.set(user.id, { ...user });
        this.usernames.set(user.username, user.id);
        return true;
    }

    async findUserByUsername(username: string): Promise<User | undefined> {
        const id = this.usernames.get(username);
        return id === undefined ? undefined : copy(this.users.get(id));
    }

    async findUserById(id: string): Promise<User | undefined> {
        return copy(this.users.get(id));
    }

    async saveClient(client: Client): Promise<void> {
        this.clients.set(client.clientId, copyClient(client));
    }

    async findClient(clientId: string): Promise<Client | undefined> {
        const client = this.clients.get(clientId);
        return client && copyClient(client);
    }

    // ========================================================================
    // SESSIONS
    // ========================================================================

    async insertSession(session: Session): Promise<void> {
        this.sessions.set(session.tokenHash, { ...session });
    }

    async findSession(tokenHash: string): Promise<Session | undefined> {
        return copy(this.sessions.get(tokenHash));
    }

    async deleteSession(tokenHash: string): Promise<boolean> {
        return this.sessions.delete(tokenHash);
    }

    // ========================================================================
    // AUTHORIZATION CODES
    // ========================================================================

    async insertAuthorizationCode(code: AuthorizationCode): Promise<boolean> {
        if (this.codes.has(code.code)) {
            return false;
        }
        this.codes.set(code.code, copyCode(code));
        return true;
    }

    async findAuthorizationCode(
        code: string
    ): Promise<AuthorizationCode | undefined> {
        const record = this.codes.get(code);
        return record && copyCode(record);
    }

    async consumeAuthorizationCode({
        code,
        clientId,
        redirectUri,
        now,
    }: ConsumeAuthorizationCode): Promise<AuthorizationCode | undefined> {
        const record = this.codes.get(code);
        if (
            !record ||
            record.used ||
            now.getTime() > record.expiresAt.getTime() ||
            record.clientId !== clientId ||
            record.redirectUri !== redirectUri
        ) {
            return undefined;
        }
        record.used = true;
        return copyCode(record);
    }

    async deleteExpiredAuthorizationCodes(now: Date): Promise<number> {
        let deleted = 0;
        for (const [key, record] of this.codes) {
            if (record.expiresAt.getTime() < now.getTime()) {
                this.codes.delete(key);
                deleted++;
            }
        }
        return deleted;
    }

    // ========================================================================
    // ACCESS TOKENS
    // ========================================================================

    async insertAccessToken(token: AccessToken): Promise<void> {
        this.accessTokens.set(token.tokenHash, copyToken(token));
    }

    async findAccessToken(tokenHash: string): Promise<AccessToken | undefined> {
        const token = this.accessTokens.get(tokenHash);
        return token && copyToken(token);
    }

    async deleteExpiredAccessTokens(now: Date): Promise<number> {
        let deleted = 0;
        for (const [key, token] of this.accessTokens) {
            if (token.expiresAt.getTime() < now.getTime()) {
                this.accessTokens.delete(key);
                deleted++;
            }
        }
        return deleted;
    }

    async close(): Promise<void> {
        this.sessions.clear();
        this.codes.clear();
        this.accessTokens.clear();
    }
}
