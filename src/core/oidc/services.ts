import { randomUUID } from 'node:crypto';

import type { OidcStore } from '../../db/repository/oidc.repository';
import type { Clock } from '../../types/crypto';
import type {
    AuthorizationCode,
    AuthorizationOutcome,
    AuthorizationRequest,
    Client,
    DiscoveryDocument,
    IdentityClaims,
    NewClient,
    NewUser,
    OidcErrorCode,
    TokenRequest,
    TokenResponse,
    User,
    UserInfoResponse,
} from '../../types/oidc';
import { OidcError } from '../../types/oidc';
import { ApiError } from '../../utils/api/api-error';
import {
    constantTimeEqual,
    generateOpaqueToken,
    hashPassword,
    hashToken,
    verifyPassword,
} from '../../utils/crypto';
import type { Logger } from '../../utils/logger';
import { logger as defaultLogger } from '../../utils/logger';
import type { TokenService } from '../token/service';

// ============================================================================
// CONSTANTS
// ============================================================================

export const SUPPORTED_SCOPES = ['openid', 'profile', 'email'];
export const SUPPORTED_RESPONSE_TYPES = ['code'];
export const SUPPORTED_GRANT_TYPES = ['authorization_code'];

const CLAIMS_SUPPORTED = [
    'sub',
    'iss',
    'aud',
    'exp',
    'iat',
    'nbf',
    'auth_time',
    'nonce',
    'name',
    'given_name',
    'family_name',
    'email',
    'email_verified',
];

/** Attempts at drawing an unused authorization code */
const CODE_INSERT_ATTEMPTS = 3;

export interface AuthorizationServerSettings {
    issuer: string;
    /** Seconds */
    authorizationCodeTTL: number;
    /** Seconds */
    accessTokenTTL: number;
}

export interface AuthorizationServerDeps {
    store: OidcStore;
    tokens: TokenService;
    settings: AuthorizationServerSettings;
    clock?: Clock;
    logger?: Logger;
}

// ============================================================================
// HELPERS
// ============================================================================

/** Splits on whitespace, keeping first occurrences in order. */
export function parseScope(scope: string): string[] {
    return [...new Set(scope.split(/\s+/).filter(Boolean))];
}

function identityClaims(user: User, scopes: string[]): IdentityClaims {
    return {
        ...(scopes.includes('profile') && {
            name: user.name,
            given_name: user.givenName,
            family_name: user.familyName,
        }),
        ...(scopes.includes('email') && {
            email: user.email,
            email_verified: user.emailVerified,
        }),
    };
}

function secretMatches(secret: string, expectedHash: string): boolean {
    return constantTimeEqual(
        Buffer.from(hashToken(secret), 'hex'),
        Buffer.from(expectedHash, 'hex')
    );
}

function redirectWith(
    redirectUri: string,
    params: Record<string, string | undefined>
): AuthorizationOutcome {
    // Never redirect to something that is not an absolute URL
    if (!URL.canParse(redirectUri)) {
        throw new OidcError('invalid_redirect_uri');
    }
    const location = new URL(redirectUri);
    for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
            location.searchParams.set(key, value);
        }
    }
    return { type: 'redirect', location: location.toString() };
}

function errorRedirect(
    redirectUri: string,
    error: OidcErrorCode,
    state: string | undefined
): AuthorizationOutcome {
    return redirectWith(redirectUri, {
        error,
        error_description: OidcError.describe(error),
        state,
    });
}

/** Why a redemption failed, from a read taken before the compare-and-set. */
function rejectionReason(
    record: AuthorizationCode | undefined,
    request: TokenRequest,
    now: Date
): string {
    if (!record) return 'unknown code';
    if (record.used) return 'code already used';
    if (now.getTime() > record.expiresAt.getTime()) return 'code expired';
    if (record.clientId !== request.clientId) return 'client mismatch';
    if (record.redirectUri !== request.redirectUri) return 'redirect URI mismatch';
    return 'lost redemption race';
}

// ============================================================================
// AUTHORIZATION SERVER
// ============================================================================

/**
 * Authorization-code flow over an explicit store.
 *
 * @example
 * ```typescript
 * const server = new AuthorizationServer({ store, tokens, settings });
 * const outcome = await server.handleAuthorizationRequest({
 *   responseType: 'code',
 *   clientId: 'demo-client',
 *   redirectUri: 'https://rp.example/callback',
 *   scope: 'openid profile email',
 *   state: 'xyz',
 *   sessionId,
 * });
 * ```
 */
export class AuthorizationServer {
    private readonly store: OidcStore;
    private readonly tokens: TokenService;
    private readonly settings: AuthorizationServerSettings;
    private readonly clock: Clock;
    private readonly log: Logger;

    constructor(deps: AuthorizationServerDeps) {
        this.store = deps.store;
        this.tokens = deps.tokens;
        this.settings = deps.settings;
        this.clock = deps.clock ?? Date.now;
        this.log = (deps.logger ?? defaultLogger).child({ module: 'oidc' });
    }

    private now(): Date {
        return new Date(this.clock());
    }

    // ========================================================================
    // REGISTRATION
    // ========================================================================

    /**
     * @throws ApiError (USERNAME_TAKEN) if the username exists
     */
    async registerUser(data: NewUser): Promise<User> {
        const user: User = {
            id: randomUUID(),
            username: data.username,
            email: data.email,
            emailVerified: data.emailVerified ?? true,
            name: data.name,
            givenName: data.givenName ?? '',
            familyName: data.familyName ?? '',
            passwordHash: await hashPassword(data.password),
            createdAt: this.now(),
        };

        if (!(await this.store.insertUser(user))) {
            throw new ApiError(
                `Username "${data.username}" is already registered`,
                409,
                'USERNAME_TAKEN'
            );
        }
        this.log.info({ userId: user.id, username: user.username }, 'User registered');
        return user;
    }

    /**
     * Registers or replaces a client. Redirect URIs must be absolute URLs.
     */
    async registerClient(data: NewClient): Promise<Client> {
        for (const uri of data.redirectUris) {
            if (!URL.canParse(uri)) {
                throw new ApiError(
                    `Redirect URI "${uri}" is not an absolute URL`,
                    422,
                    'INVALID_REDIRECT_URI'
                );
            }
        }

        const client: Client = {
            clientId: data.clientId,
            clientSecretHash: hashToken(data.clientSecret),
            name: data.name ?? data.clientId,
            redirectUris: [...data.redirectUris],
            grantTypes: data.grantTypes ?? [...SUPPORTED_GRANT_TYPES],
            responseTypes: data.responseTypes ?? [...SUPPORTED_RESPONSE_TYPES],
            scopes: data.scopes ?? [...SUPPORTED_SCOPES],
            createdAt: this.now(),
        };

        await this.store.saveClient(client);
        this.log.info({ clientId: client.clientId }, 'Client registered');
        return client;
    }

    // ========================================================================
    // AUTHENTICATION & SESSIONS
    // ========================================================================

    /** @returns the principal id, or undefined for bad credentials */
    async authenticate(
        username: string,
        password: string
    ): Promise<string | undefined> {
        const user = await this.store.findUserByUsername(username);
        if (!user || !(await verifyPassword(user.passwordHash, password))) {
            this.log.info({ username }, 'Authentication failed');
            return undefined;
        }
        return user.id;
    }

    /**
     * @returns an opaque, unguessable session id; only its hash is stored
     */
    async createSession(userId: string): Promise<string> {
        const sessionId = generateOpaqueToken();
        const now = this.now();
        await this.store.insertSession({
            tokenHash: hashToken(sessionId),
            userId,
            authTime: Math.floor(now.getTime() / 1000),
            createdAt: now,
        });
        return sessionId;
    }

    async getUserFromSession(sessionId: string): Promise<User | undefined> {
        const session = await this.store.findSession(hashToken(sessionId));
        return session && this.store.findUserById(session.userId);
    }

    async endSession(sessionId: string): Promise<boolean> {
        return this.store.deleteSession(hashToken(sessionId));
    }

    // ========================================================================
    // AUTHORIZATION ENDPOINT
    // ========================================================================

    /**
     * Decides an authorization request. Errors are redirected only once
     * both the client and the redirect URI are trusted.
     *
     * @throws OidcError (invalid_client, invalid_redirect_uri)
     */
    async handleAuthorizationRequest(
        request: AuthorizationRequest
    ): Promise<AuthorizationOutcome> {
        const client = await this.store.findClient(request.clientId);
        if (!client) {
            this.log.warn({ clientId: request.clientId }, 'Authorization request for unknown client');
            throw new OidcError('invalid_client');
        }

        if (!client.responseTypes.includes(request.responseType)) {
            return errorRedirect(
                request.redirectUri,
                'unsupported_response_type',
                request.state
            );
        }

        if (!client.redirectUris.includes(request.redirectUri)) {
            this.log.warn(
                { clientId: client.clientId, redirectUri: request.redirectUri },
                'Unregistered redirect URI'
            );
            throw new OidcError('invalid_redirect_uri');
        }

        const scopes = parseScope(request.scope).filter((scope) =>
            client.scopes.includes(scope)
        );
        if (!scopes.includes('openid')) {
            return errorRedirect(request.redirectUri, 'invalid_scope', request.state);
        }

        const session =
            request.sessionId === undefined
                ? undefined
                : await this.store.findSession(hashToken(request.sessionId));
        const user = session && (await this.store.findUserById(session.userId));
        if (!session || !user) {
            return { type: 'login_required' };
        }

        const code = await this.issueAuthorizationCode({
            clientId: client.clientId,
            userId: user.id,
            redirectUri: request.redirectUri,
            scopes,
            authTime: session.authTime,
            ...(request.nonce !== undefined && { nonce: request.nonce }),
        });

        return redirectWith(request.redirectUri, {
            code,
            state: request.state,
        });
    }

    private async issueAuthorizationCode(
        grant: Omit<AuthorizationCode, 'code' | 'expiresAt' | 'used' | 'createdAt'>
    ): Promise<string> {
        const now = this.now();
        const expiresAt = new Date(
            now.getTime() + this.settings.authorizationCodeTTL * 1000
        );

        for (let attempt = 1; attempt <= CODE_INSERT_ATTEMPTS; attempt++) {
            const code = generateOpaqueToken();
            const inserted = await this.store.insertAuthorizationCode({
                ...grant,
                code,
                expiresAt,
                used: false,
                createdAt: now,
            });
            if (inserted) {
                return code;
            }
            this.log.warn({ attempt }, 'Authorization code collision');
        }

        throw new OidcError(
            'server_error',
            new Error(`No unused authorization code after ${CODE_INSERT_ATTEMPTS} attempts`)
        );
    }

    // ========================================================================
    // TOKEN ENDPOINT
    // ========================================================================

    /**
     * Redeems an authorization code. The code is marked used in the same
     * atomic step that accepts it.
     *
     * @throws OidcError (invalid_client, unsupported_grant_type, invalid_grant)
     */
    async handleTokenRequest(request: TokenRequest): Promise<TokenResponse> {
        const client = await this.store.findClient(request.clientId);
        if (!client || !secretMatches(request.clientSecret, client.clientSecretHash)) {
            this.log.warn({ clientId: request.clientId }, 'Client authentication failed');
            throw new OidcError('invalid_client');
        }

        if (!client.grantTypes.includes(request.grantType)) {
            throw new OidcError('unsupported_grant_type');
        }

        const now = this.now();
        const snapshot = await this.store.findAuthorizationCode(request.code);
        const record = await this.store.consumeAuthorizationCode({
            code: request.code,
            clientId: request.clientId,
            redirectUri: request.redirectUri,
            now,
        });
        if (!record) {
            this.log.warn(
                {
                    clientId: request.clientId,
                    reason: rejectionReason(snapshot, request, now),
                },
                'Authorization code rejected'
            );
            throw new OidcError('invalid_grant');
        }

        const user = await this.store.findUserById(record.userId);
        if (!user) {
            this.log.warn({ userId: record.userId }, 'Authorization code for a removed user');
            throw new OidcError('invalid_grant');
        }

        const idToken = this.tokens.createIdToken({
            subject: user.id,
            audience: client.clientId,
            authTime: record.authTime,
            claims: { ...identityClaims(user, record.scopes) },
            ...(record.nonce !== undefined && { nonce: record.nonce }),
        });

        const accessToken = generateOpaqueToken();
        await this.store.insertAccessToken({
            tokenHash: hashToken(accessToken),
            userId: user.id,
            clientId: client.clientId,
            scopes: record.scopes,
            expiresAt: new Date(now.getTime() + this.settings.accessTokenTTL * 1000),
            createdAt: now,
        });

        this.log.info(
            { clientId: client.clientId, userId: user.id, scope: record.scopes },
            'Tokens issued'
        );

        return {
            access_token: accessToken,
            token_type: 'Bearer',
            expires_in: this.settings.accessTokenTTL,
            id_token: idToken,
            scope: record.scopes.join(' '),
        };
    }

    // ========================================================================
    // USERINFO & DISCOVERY
    // ========================================================================

    /**
     * @throws OidcError (invalid_token) for unknown or expired tokens
     */
    async handleUserInfoRequest(accessToken: string): Promise<UserInfoResponse> {
        const token = await this.store.findAccessToken(hashToken(accessToken));
        if (!token || this.now().getTime() > token.expiresAt.getTime()) {
            throw new OidcError('invalid_token');
        }

        const user = await this.store.findUserById(token.userId);
        if (!user) {
            throw new OidcError('invalid_token');
        }

        return { sub: user.id, ...identityClaims(user, token.scopes) };
    }

    getDiscoveryDocument(): DiscoveryDocument {
        const issuer = this.settings.issuer.replace(/\/+$/, '');
        return {
            issuer: this.settings.issuer,
            authorization_endpoint: `${issuer}/authorize`,
            token_endpoint: `${issuer}/token`,
            userinfo_endpoint: `${issuer}/userinfo`,
            jwks_uri: `${issuer}/.well-known/jwks.json`,
            scopes_supported: [...SUPPORTED_SCOPES],
            response_types_supported: [...SUPPORTED_RESPONSE_TYPES],
            grant_types_supported: [...SUPPORTED_GRANT_TYPES],
            subject_types_supported: ['public'],
            id_token_signing_alg_values_supported: [this.tokens.algorithm],
            token_endpoint_auth_methods_supported: ['client_secret_post'],
            claims_supported: [...CLAIMS_SUPPORTED],
        };
    }
}
