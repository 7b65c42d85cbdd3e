/**
 * @fileoverview Authorization server domain types and the OAuth error type.
 * @module types/oidc
 */

import { ApiError } from '../utils/api/api-error';

// ============================================================================
// REGISTRIES
// ============================================================================

/** Registered principal. Read-only to the authorization flow. */
export interface User {
    id: string;
    username: string;
    email: string;
    emailVerified: boolean;
    name: string;
    givenName: string;
    familyName: string;
    /** Argon2id hash */
    passwordHash: string;
    createdAt: Date;
}

export interface NewUser {
    username: string;
    password: string;
    email: string;
    name: string;
    givenName?: string;
    familyName?: string;
    emailVerified?: boolean;
}

/** Registered relying party. Immutable after registration. */
export interface Client {
    clientId: string;
    /** SHA-256 of the client secret */
    clientSecretHash: string;
    name: string;
    redirectUris: string[];
    grantTypes: string[];
    responseTypes: string[];
    scopes: string[];
    createdAt: Date;
}

export interface NewClient {
    clientId: string;
    clientSecret: string;
    name?: string;
    redirectUris: string[];
    grantTypes?: string[];
    responseTypes?: string[];
    scopes?: string[];
}

// ============================================================================
// ISSUED ARTIFACTS
// ============================================================================

/** Login session. Only the hash of the cookie value is stored. */
export interface Session {
    tokenHash: string;
    userId: string;
    /** Unix seconds */
    authTime: number;
    createdAt: Date;
}

/**
 * Single-use authorization code. `used` goes from false to true once and
 * never back.
 */
export interface AuthorizationCode {
    code: string;
    clientId: string;
    userId: string;
    redirectUri: string;
    /** Ordered, de-duplicated */
    scopes: string[];
    nonce?: string;
    /** Unix seconds of the login that produced the code */
    authTime: number;
    expiresAt: Date;
    used: boolean;
    createdAt: Date;
}

/** Opaque bearer token, stored by hash. */
export interface AccessToken {
    tokenHash: string;
    userId: string;
    clientId: string;
    scopes: string[];
    expiresAt: Date;
    createdAt: Date;
}

// ============================================================================
// REQUESTS AND RESPONSES
// ============================================================================

export interface AuthorizationRequest {
    responseType: string;
    clientId: string;
    redirectUri: string;
    scope: string;
    state?: string;
    nonce?: string;
    /** Session cookie value */
    sessionId?: string;
}

export type AuthorizationOutcome =
    | { type: 'redirect'; location: string }
    | { type: 'login_required' };

export interface TokenRequest {
    grantType: string;
    code: string;
    redirectUri: string;
    clientId: string;
    clientSecret: string;
}

export interface TokenResponse {
    access_token: string;
    token_type: 'Bearer';
    expires_in: number;
    id_token: string;
    scope: string;
}

/** Scope-gated identity claims shared by the ID token and userinfo. */
export interface IdentityClaims {
    name?: string;
    given_name?: string;
    family_name?: string;
    email?: string;
    email_verified?: boolean;
}

export interface UserInfoResponse extends IdentityClaims {
    sub: string;
}

export interface DiscoveryDocument {
    issuer: string;
    authorization_endpoint: string;
    token_endpoint: string;
    userinfo_endpoint: string;
    jwks_uri: string;
    scopes_supported: string[];
    response_types_supported: string[];
    grant_types_supported: string[];
    subject_types_supported: string[];
    id_token_signing_alg_values_supported: string[];
    token_endpoint_auth_methods_supported: string[];
    claims_supported: string[];
}

// ============================================================================
// ERRORS
// ============================================================================

export type OidcErrorCode =
    | 'invalid_request'
    | 'invalid_client'
    | 'invalid_redirect_uri'
    | 'unsupported_response_type'
    | 'invalid_scope'
    | 'unsupported_grant_type'
    | 'invalid_grant'
    | 'invalid_token'
    | 'server_error';

/** Client-visible descriptions. Details stay in the server log. */
const DESCRIPTIONS: Record<OidcErrorCode, string> = {
    invalid_request: 'The request is missing a required parameter',
    invalid_client: 'Client authentication failed',
    invalid_redirect_uri: 'The redirect URI is not registered for this client',
    unsupported_response_type: 'The response type is not supported',
    invalid_scope: "Scope must include 'openid'",
    unsupported_grant_type: 'The grant type is not supported',
    invalid_grant: 'The authorization code is invalid, expired or already used',
    invalid_token: 'The access token is invalid or expired',
    server_error: 'The server encountered an unexpected condition',
};

const STATUS_CODES: Partial<Record<OidcErrorCode, number>> = {
    invalid_client: 401,
    invalid_token: 401,
    server_error: 500,
};

export interface OAuthErrorBody {
    error: OidcErrorCode;
    error_description: string;
}

/**
 * OAuth 2.0 / OpenID Connect protocol error.
 */
export class OidcError extends ApiError {
    declare readonly code: OidcErrorCode;

    constructor(code: OidcErrorCode, cause?: unknown) {
        super(DESCRIPTIONS[code], STATUS_CODES[code] ?? 400, code, undefined, {
            cause,
        });
    }

    static describe(code: OidcErrorCode): string {
        return DESCRIPTIONS[code];
    }

    toResponse(): OAuthErrorBody {
        return { error: this.code, error_description: this.message };
    }
}
