/**
 * @fileoverview Key and random value generation.
 * @module utils/crypto/keys
 */

import { randomBytes } from 'node:crypto';

import { NONCE_LENGTH, OPAQUE_TOKEN_LENGTH } from '../../constants/crypto';
import type { KeyPair, SignatureCapability } from '../../types/crypto';
import { createSigner } from './provider';

// ============================================================================
// KEY GENERATION
// ============================================================================

/**
 * Generates a signing key pair.
 *
 * @param algorithm - Signing algorithm identifier, or an already resolved capability
 * @param kid - Optional key identifier (auto-generated if not provided)
 * @returns Generated key pair with public/secret keys and metadata
 * @throws UnsupportedAlgorithmError if algorithm is not supported
 *
 * @example
 * ```typescript
 * const keys = generateKeyPair('ML-DSA-65');
 * const pinned = generateKeyPair('ML-DSA-44', '2025-01-prod-signing');
 * ```
 *
 * @remarks
 * - ML-DSA-65 is recommended for most use cases (NIST Category 3)
 * - ML-DSA-87 for high-security requirements (NIST Category 5)
 * - SLH-DSA is slower but ultra-conservative (hash-based)
 */
export function generateKeyPair(
    algorithm: string | SignatureCapability,
    kid?: string
): KeyPair {
    const signer =
        typeof algorithm === 'string' ? createSigner(algorithm) : algorithm;
    const { publicKey, secretKey } = signer.generateKeyPair();

    return {
        publicKey,
        secretKey,
        kid: kid ?? generateKid(),
        algorithm: signer.algorithm,
    };
}

/**
 * Generates a unique key identifier (kid) for JWKS.
 *
 * Format: YYYY-MM-XXXXXXXX (date prefix + random hex)
 * Example: 2025-01-a3f9b2c1
 */
export function generateKid(): string {
    const datePrefix = new Date().toISOString().slice(0, 7);
    const randomSuffix = randomBytes(4).toString('hex');
    return `${datePrefix}-${randomSuffix}`;
}

// ============================================================================
// RANDOM VALUES
// ============================================================================

/** 16-byte handshake nonce. */
export function generateNonce(length = NONCE_LENGTH): Uint8Array {
    return new Uint8Array(randomBytes(length));
}

/**
 * Unguessable opaque token (authorization codes, session ids, access tokens).
 */
export function generateOpaqueToken(): string {
    return randomBytes(OPAQUE_TOKEN_LENGTH).toString('base64url');
}
