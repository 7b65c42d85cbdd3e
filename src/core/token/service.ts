import type {
    Clock,
    JWTVerifyOptions,
    JWTVerifyResult,
    KeyPair,
    PublicKey,
    SigningAlgorithm,
} from '../../types/crypto';
import {
    createJWKS,
    createJWT,
    createSigner,
    generateKeyPair,
    type JWKS,
    verifyJWT,
} from '../../utils/crypto';

export interface TokenServiceOptions {
    issuer: string;
    /** Signature algorithm identifier, resolved once */
    algorithm: string;
    /** Default ID token lifetime in seconds */
    idTokenTTL: number;
    clock?: Clock;
    /** Generated when absent */
    signingKey?: KeyPair;
}

export interface IdTokenRequest {
    /** Principal id */
    subject: string;
    /** Client id */
    audience: string;
    nonce?: string;
    /** Unix seconds; defaults to now */
    authTime?: number;
    claims?: Record<string, unknown>;
    ttlSeconds?: number;
}

/**
 * Issuer-side token handle: owns the algorithm, the issuer name and the
 * signing key pair.
 */
export class TokenService {
    readonly issuer: string;
    readonly algorithm: SigningAlgorithm;
    private readonly signingKey: KeyPair;
    private readonly idTokenTTL: number;
    private readonly clock: Clock;

    /**
     * @throws UnsupportedAlgorithmError for an unknown algorithm
     */
    constructor(options: TokenServiceOptions) {
        const signer = createSigner(options.algorithm);
        if (
            options.signingKey &&
            options.signingKey.algorithm !== signer.algorithm
        ) {
            throw new Error(
                `Signing key ${options.signingKey.kid} is ${options.signingKey.algorithm}, expected ${signer.algorithm}`
            );
        }

        this.issuer = options.issuer;
        this.algorithm = signer.algorithm;
        this.signingKey = options.signingKey ?? generateKeyPair(signer);
        this.idTokenTTL = options.idTokenTTL;
        this.clock = options.clock ?? Date.now;
    }

    get publicKey(): PublicKey {
        return {
            kid: this.signingKey.kid,
            algorithm: this.signingKey.algorithm,
            publicKey: this.signingKey.publicKey,
        };
    }

    get jwks(): JWKS {
        return createJWKS([this.publicKey]);
    }

    /**
     * Signs an ID token. `auth_time` defaults to now; `nonce` is copied
     * unchanged when given.
     */
    createIdToken(request: IdTokenRequest): string {
        const authTime =
            request.authTime ?? Math.floor(this.clock() / 1000);

        return createJWT(
            {
                ...request.claims,
                auth_time: authTime,
                ...(request.nonce !== undefined && { nonce: request.nonce }),
            },
            this.signingKey,
            {
                issuer: this.issuer,
                subject: request.subject,
                audience: request.audience,
                ttlSeconds: request.ttlSeconds ?? this.idTokenTTL,
                clock: this.clock,
            }
        );
    }

    /**
     * Verifies a token against this issuer's key unless another is given.
     *
     * @throws JWTVerificationError
     */
    verify(
        token: string,
        options: JWTVerifyOptions & { key?: PublicKey } = {}
    ): JWTVerifyResult {
        const { key = this.publicKey, ...verifyOptions } = options;
        return verifyJWT(token, key, {
            clock: this.clock,
            ...verifyOptions,
        });
    }
}
