import type {
    AccessToken,
    AuthorizationCode,
    Client,
    Session,
    User,
} from '../../types/oidc';

export interface ConsumeAuthorizationCode {
    code: string;
    clientId: string;
    redirectUri: string;
    now: Date;
}

/**
 * Persistence contract of the authorization server.
 *
 * Two operations carry the concurrency discipline:
 * - `insertAuthorizationCode` never overwrites: it reports a collision by
 *   returning false.
 * - `consumeAuthorizationCode` is a single compare-and-set. It flips `used`
 *   only when the code exists, is unused, unexpired and matches the client
 *   and redirect URI, and returns the record it flipped. Concurrent calls
 *   for one code see at most one success.
 */
export interface OidcStore {
    // ========================================================================
    // USERS & CLIENTS
    // ========================================================================

    /** @returns false if the username is taken */
    insertUser(user: User): Promise<boolean>;
    findUserByUsername(username: string): Promise<User | undefined>;
    findUserById(id: string): Promise<User | undefined>;

    /** Inserts or replaces the registration of `client.clientId`. */
    saveClient(client: Client): Promise<void>;
    findClient(clientId: string): Promise<Client | undefined>;

    // ========================================================================
    // SESSIONS
    // ========================================================================

    insertSession(session: Session): Promise<void>;
    findSession(tokenHash: string): Promise<Session | undefined>;
    /** @returns whether a session was removed */
    deleteSession(tokenHash: string): Promise<boolean>;

    // ========================================================================
    // AUTHORIZATION CODES
    // ========================================================================

    insertAuthorizationCode(code: AuthorizationCode): Promise<boolean>;
    /** Read-only lookup, for diagnostics. Never use it to decide redemption. */
    findAuthorizationCode(code: string): Promise<AuthorizationCode | undefined>;
    consumeAuthorizationCode(
        request: ConsumeAuthorizationCode
    ): Promise<AuthorizationCode | undefined>;
    /** @returns number of deleted codes */
    deleteExpiredAuthorizationCodes(now: Date): Promise<number>;

    // ========================================================================
    // ACCESS TOKENS
    // ========================================================================

    insertAccessToken(token: AccessToken): Promise<void>;
    findAccessToken(tokenHash: string): Promise<AccessToken | undefined>;
    /** @returns number of deleted tokens */
    deleteExpiredAccessTokens(now: Date): Promise<number>;

    close(): Promise<void>;
}
