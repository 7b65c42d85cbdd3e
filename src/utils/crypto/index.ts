/**
 * @fileoverview Cryptographic utilities: post-quantum provider, signing,
 * JWT codec, JWKS, session key derivation and hashing.
 *
 * @module utils/crypto
 *
 * @example
 * ```typescript
 * import {
 *   createKem,
 *   createSigner,
 *   generateKeyPair,
 *   createJWT,
 *   verifyJWT,
 *   deriveSessionKeys,
 *   JWTVerificationError,
 * } from '../utils/crypto';
 * ```
 */

// ============================================================================
// TYPES & INTERFACES
// ============================================================================

export type {
    Clock,
    DecodedJWT,
    JWTClaims,
    JWTErrorCode,
    JWTHeader,
    JWTVerifyOptions,
    JWTVerifyResult,
    KemAlgorithm,
    KemCapability,
    KeyPair,
    PublicKey,
    SignatureCapability,
    SignatureResult,
    SigningAlgorithm,
} from '../../types/crypto';

export {
    CryptoProviderError,
    JWTVerificationError,
    UnsupportedAlgorithmError,
} from '../../types/crypto';

// ============================================================================
// CONSTANTS & UTILITIES
// ============================================================================

export { DURATION_UNITS, parseDuration } from '../../constants/crypto';

// ============================================================================
// PROVIDER & KEYS
// ============================================================================

export {
    createKem,
    createSigner,
    resolveKemAlgorithm,
    resolveSigningAlgorithm,
} from './provider';

export {
    generateKeyPair,
    generateKid,
    generateNonce,
    generateOpaqueToken,
} from './keys';

// ============================================================================
// HASHING
// ============================================================================

export {
    constantTimeEqual,
    hashPassword,
    hashToken,
    sha256,
    verifyPassword,
} from './hashing';

// ============================================================================
// SIGNING OPERATIONS
// ============================================================================

export { signerFor, signMessage, verifySignature } from './signing';

// ============================================================================
// SESSION KEYS
// ============================================================================

export {
    computeTranscriptHash,
    deriveSessionKeys,
    establishSession,
} from './key-derivation';

// ============================================================================
// JWT OPERATIONS
// ============================================================================

export { createJWT, decodeJWT, getJWTKeyId, verifyJWT } from './jwt';

// ============================================================================
// JWKS
// ============================================================================

export type { AkpJwk, JWKS } from './jwks';
export { createJWKS, exportToJWK, importFromJWK } from './jwks';
