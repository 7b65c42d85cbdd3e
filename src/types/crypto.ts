/**
 * @fileoverview Cryptographic types and interfaces for the post-quantum provider.
 * @module types/crypto
 */

import type {
    KEM_ALGORITHMS,
    ML_DSA_ALGORITHMS,
    SIGNING_ALGORITHMS,
    SLH_DSA_ALGORITHMS,
} from '../constants/crypto';

// ============================================================================
// ALGORITHM TYPES
// ============================================================================

/**
 * Supported digital signature algorithms.
 *
 * Post-quantum algorithms (NIST FIPS 204/205):
 * - ML-DSA-44/65/87: Lattice-based (Dilithium), fast verification
 * - SLH-DSA-SHA2-192f: Hash-based (SPHINCS+), conservative choice
 *
 * @see https://nvlpubs.nist.gov/nistpubs/ir/2024/NIST.IR.8547.ipd.pdf
 */
export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export type MLDSAAlgorithm = (typeof ML_DSA_ALGORITHMS)[number];

export type SLHDSAAlgorithm = (typeof SLH_DSA_ALGORITHMS)[number];

/**
 * Supported key encapsulation mechanisms (NIST FIPS 203).
 * The Kyber names of the round-3 submission are accepted as aliases.
 */
export type KemAlgorithm = (typeof KEM_ALGORITHMS)[number];

/** Fixed byte lengths of a signature scheme. */
export interface SignatureSizes {
    publicKey: number;
    secretKey: number;
    signature: number;
}

/** Fixed byte lengths of a KEM. */
export interface KemSizes {
    publicKey: number;
    secretKey: number;
    ciphertext: number;
    sharedSecret: number;
}

// ============================================================================
// KEY INTERFACES
// ============================================================================

/** Raw key pair as returned by a capability. */
export interface RawKeyPair {
    publicKey: Uint8Array;
    secretKey: Uint8Array;
}

/**
 * Signing key pair with metadata.
 * Used by the token codec and the certificate model.
 */
export interface KeyPair extends RawKeyPair {
    /** Unique key identifier for JWKS/JWT headers */
    kid: string;
    /** Algorithm used for this key pair */
    algorithm: SigningAlgorithm;
}

/** Public half of a signing key, enough to verify tokens. */
export type PublicKey = Pick<KeyPair, 'kid' | 'algorithm' | 'publicKey'>;

/** Result of a KEM encapsulation. */
export interface Encapsulation {
    ciphertext: Uint8Array;
    sharedSecret: Uint8Array;
}

// ============================================================================
// CAPABILITIES
// ============================================================================

/**
 * Key encapsulation capability bound to a single algorithm.
 */
export interface KemCapability {
    readonly algorithm: KemAlgorithm;
    readonly sizes: KemSizes;
    generateKeyPair(): RawKeyPair;
    encapsulate(publicKey: Uint8Array): Encapsulation;
    decapsulate(ciphertext: Uint8Array, secretKey: Uint8Array): Uint8Array;
}

/**
 * Signature capability bound to a single algorithm.
 */
export interface SignatureCapability {
    readonly algorithm: SigningAlgorithm;
    readonly sizes: SignatureSizes;
    generateKeyPair(): RawKeyPair;
    sign(secretKey: Uint8Array, message: Uint8Array): Uint8Array;
    /** Never throws: malformed input verifies as false. */
    verify(
        publicKey: Uint8Array,
        message: Uint8Array,
        signature: Uint8Array
    ): boolean;
}

// ============================================================================
// SIGNATURE INTERFACES
// ============================================================================

/**
 * Result of a signing operation.
 */
export interface SignatureResult {
    /** Raw signature bytes */
    signature: Uint8Array;
    /** Algorithm used for signing */
    algorithm: SigningAlgorithm;
    /** Key identifier used for signing */
    kid: string;
}

// ============================================================================
// JWT INTERFACES
// ============================================================================

/**
 * JWT header structure.
 */
export interface JWTHeader {
    /** Algorithm used for signing */
    alg: SigningAlgorithm;
    /** Token type (always 'JWT') */
    typ: 'JWT';
    /** Key identifier */
    kid?: string;
}

/**
 * Standard JWT claims.
 */
export interface JWTClaims {
    /** Subject (user ID) */
    sub?: string;
    /** Issuer */
    iss?: string;
    /** Audience */
    aud?: string | string[];
    /** Expiration time (Unix timestamp) */
    exp?: number;
    /** Issued at (Unix timestamp) */
    iat?: number;
    /** Not before (Unix timestamp) */
    nbf?: number;
    /** JWT ID */
    jti?: string;
    /** Custom claims */
    [key: string]: unknown;
}

/**
 * Result of a successful JWT verification.
 */
export interface JWTVerifyResult {
    /** Decoded JWT header */
    header: JWTHeader;
    /** Decoded and validated JWT payload/claims */
    payload: JWTClaims;
}

/**
 * Unverified token contents, for inspection only.
 */
export interface DecodedJWT {
    header: { alg: string; typ?: string; kid?: string };
    payload: JWTClaims;
}

/** Returns the current time in epoch milliseconds. */
export type Clock = () => number;

/**
 * JWT creation options.
 */
export interface JWTCreateOptions {
    issuer: string;
    subject: string;
    audience: string;
    /** Lifetime in seconds */
    ttlSeconds: number;
    /** Applied after the caller payload */
    extraClaims?: Record<string, unknown>;
    clock?: Clock;
}

/**
 * JWT verification options.
 */
export interface JWTVerifyOptions {
    /** Expected issuer (validates 'iss' claim) */
    issuer?: string;
    /** Expected audience (validates 'aud' claim) */
    audience?: string;
    /** Check exp/nbf against the clock (default: true) */
    checkExpiry?: boolean;
    clock?: Clock;
}

// ============================================================================
// ERROR TYPES
// ============================================================================

/**
 * JWT verification error codes, in the order the checks run.
 */
export type JWTErrorCode =
    | 'MALFORMED_TOKEN'
    | 'UNSUPPORTED_ALGORITHM'
    | 'ALGORITHM_MISMATCH'
    | 'INVALID_SIGNATURE'
    | 'TOKEN_EXPIRED'
    | 'TOKEN_NOT_YET_VALID'
    | 'INVALID_AUDIENCE'
    | 'INVALID_ISSUER';

/**
 * Custom error class for JWT verification failures.
 */
export class JWTVerificationError extends Error {
    constructor(
        message: string,
        public readonly code: JWTErrorCode,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'JWTVerificationError';
    }
}

/**
 * Raised when an algorithm identifier does not resolve to a capability.
 */
export class UnsupportedAlgorithmError extends Error {
    constructor(public readonly algorithm: string) {
        super(`Unsupported algorithm: ${algorithm}`);
        this.name = 'UnsupportedAlgorithmError';
    }
}

/**
 * Raised by a capability when handed input of the wrong shape.
 */
export class CryptoProviderError extends Error {
    constructor(
        message: string,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'CryptoProviderError';
    }
}
