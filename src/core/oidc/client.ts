import type { Clock, JWTClaims, PublicKey } from '../../types/crypto';
import type { TokenRequest } from '../../types/oidc';
import { OidcError } from '../../types/oidc';
import { ApiError } from '../../utils/api/api-error';
import { generateOpaqueToken, verifyJWT } from '../../utils/crypto';

export interface RelyingPartyOptions {
    clientId: string;
    clientSecret: string;
    /** Issuer identifier; endpoints hang off it */
    issuer: string;
    redirectUri: string;
    scopes?: string[];
    /** Public key that signs the issuer's ID tokens */
    issuerKey: PublicKey;
    clock?: Clock;
    /** Seconds an authorization URL stays redeemable (default 600) */
    pendingTTL?: number;
    /** Most authorizations remembered at once; the oldest is dropped first (default 1000) */
    maxPending?: number;
}

interface PendingAuthorization {
    nonce: string;
    redirectUri: string;
    /** Epoch milliseconds */
    expiresAt: number;
}

export interface CallbackParams {
    code: string;
    state: string;
}

export interface PreparedTokenRequest {
    request: TokenRequest;
    expectedNonce: string;
}

/**
 * Client side of the authorization-code flow. Remembers the state and nonce
 * of every authorization URL it hands out until the matching token request
 * is prepared.
 */
export class RelyingParty {
    readonly clientId: string;
    readonly issuer: string;
    readonly redirectUri: string;
    readonly scopes: string[];

    private readonly clientSecret: string;
    private readonly issuerKey: PublicKey;
    private readonly clock: Clock;
    private readonly pendingTTL: number;
    private readonly maxPending: number;
    // Insertion order is issue order, so the first entry is always the oldest
    private readonly pending = new Map<string, PendingAuthorization>();

    constructor(options: RelyingPartyOptions) {
        this.clientId = options.clientId;
        this.clientSecret = options.clientSecret;
        this.issuer = options.issuer;
        this.redirectUri = options.redirectUri;
        this.scopes = options.scopes ?? ['openid', 'profile', 'email'];
        this.issuerKey = options.issuerKey;
        this.clock = options.clock ?? Date.now;
        this.pendingTTL = options.pendingTTL ?? 600;
        this.maxPending = options.maxPending ?? 1000;
    }

    get authorizationEndpoint(): string {
        return `${this.issuer.replace(/\/+$/, '')}/authorize`;
    }

    get pendingCount(): number {
        this.evictPending();
        return this.pending.size;
    }

    getAuthorizationUrl(params: { state?: string; nonce?: string } = {}): string {
        const state = params.state || generateOpaqueToken();
        const nonce = params.nonce || generateOpaqueToken();
        this.evictPending();
        while (this.pending.size >= this.maxPending) {
            const oldest = this.pending.keys().next();
            if (oldest.done) {
                break;
            }
            this.pending.delete(oldest.value);
        }
        this.pending.delete(state);
        this.pending.set(state, {
            nonce,
            redirectUri: this.redirectUri,
            expiresAt: this.clock() + this.pendingTTL * 1000,
        });

        const url = new URL(this.authorizationEndpoint);
        url.search = new URLSearchParams({
            response_type: 'code',
            client_id: this.clientId,
            redirect_uri: this.redirectUri,
            scope: this.scopes.join(' '),
            state,
            nonce,
        }).toString();
        return url.toString();
    }

    /**
     * Extracts code and state from a callback URL.
     *
     * @throws ApiError (AUTHORIZATION_ERROR, MISSING_CODE, MISSING_STATE, INVALID_STATE)
     */
    validateCallback(callbackUrl: string): CallbackParams {
        const params = new URL(callbackUrl).searchParams;

        const error = params.get('error');
        if (error) {
            const description = params.get('error_description') ?? '';
            throw new ApiError(
                `Authorization error: ${error} - ${description}`,
                400,
                'AUTHORIZATION_ERROR',
                { error, error_description: description }
            );
        }

        const code = params.get('code');
        if (!code) {
            throw new ApiError('Authorization code missing from callback', 400, 'MISSING_CODE');
        }
        const state = params.get('state');
        if (!state) {
            throw new ApiError('State missing from callback', 400, 'MISSING_STATE');
        }
        if (!this.findPending(state)) {
            throw new ApiError('Unknown state', 400, 'INVALID_STATE');
        }

        return { code, state };
    }

    /**
     * Builds the token request for a callback and forgets its state.
     *
     * @throws ApiError (INVALID_STATE)
     */
    createTokenRequest(code: string, state: string): PreparedTokenRequest {
        const pending = this.findPending(state);
        if (!pending) {
            throw new ApiError('Unknown state', 400, 'INVALID_STATE');
        }
        this.pending.delete(state);

        return {
            request: {
                grantType: 'authorization_code',
                code,
                redirectUri: pending.redirectUri,
                clientId: this.clientId,
                clientSecret: this.clientSecret,
            },
            expectedNonce: pending.nonce,
        };
    }

    /**
     * Verifies an ID token from this party's issuer.
     *
     * @throws JWTVerificationError when the token does not verify
     * @throws OidcError (invalid_token) on a nonce mismatch
     */
    verifyIdToken(idToken: string, expectedNonce?: string): JWTClaims {
        const { payload } = verifyJWT(idToken, this.issuerKey, {
            audience: this.clientId,
            issuer: this.issuer,
            clock: this.clock,
        });

        if (expectedNonce !== undefined && payload.nonce !== expectedNonce) {
            throw new OidcError('invalid_token');
        }
        return payload;
    }

    private findPending(state: string): PendingAuthorization | undefined {
        this.evictPending();
        return this.pending.get(state);
    }

    /** Drops authorizations whose URL has outlived `pendingTTL`. */
    private evictPending(): void {
        const now = this.clock();
        for (const [state, pending] of this.pending) {
            if (pending.expiresAt < now) {
                this.pending.delete(state);
            }
        }
    }
}
