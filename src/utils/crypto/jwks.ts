/**
 * @fileoverview JWKS (JSON Web Key Set) export and import for post-quantum keys.
 * @module utils/crypto/jwks
 */

import { base64url } from 'jose';

import { isSigningAlgorithm, SIGNATURE_SIZES } from '../../constants/crypto';
import type { PublicKey } from '../../types/crypto';
import { UnsupportedAlgorithmError } from '../../types/crypto';

/**
 * Algorithm Key Pair JWK (draft-ietf-cose-dilithium): the raw public key
 * travels in `pub`.
 */
export interface AkpJwk {
    kty: 'AKP';
    alg: string;
    pub: string;
    kid: string;
    use: 'sig';
}

export interface JWKS {
    keys: AkpJwk[];
}

// ============================================================================
// JWKS EXPORT (for public key distribution)
// ============================================================================

/**
 * Exports a public key to JWK format for the JWKS endpoint.
 *
 * @example
 * ```typescript
 * const jwk = exportToJWK(tokenService.publicKey);
 * // { kty: 'AKP', alg: 'ML-DSA-44', pub: '...', kid: '2025-01-a3f9b2c1', use: 'sig' }
 * ```
 */
export function exportToJWK(key: PublicKey): AkpJwk {
    return {
        kty: 'AKP',
        alg: key.algorithm,
        pub: base64url.encode(key.publicKey),
        kid: key.kid,
        use: 'sig',
    };
}

/**
 * Creates a complete JWKS from multiple keys.
 * Use this to build the /.well-known/jwks.json endpoint response.
 */
export function createJWKS(keys: PublicKey[]): JWKS {
    return { keys: keys.map(exportToJWK) };
}

/**
 * Imports an AKP JWK back into a verification key.
 *
 * @throws UnsupportedAlgorithmError for unknown `alg` values
 * @throws Error if `pub` does not have the algorithm's public key length
 */
export function importFromJWK(jwk: AkpJwk): PublicKey {
    if (!isSigningAlgorithm(jwk.alg)) {
        throw new UnsupportedAlgorithmError(jwk.alg);
    }

    const publicKey = base64url.decode(jwk.pub);
    if (publicKey.length !== SIGNATURE_SIZES[jwk.alg].publicKey) {
        throw new Error(
            `JWK "${jwk.kid}" has a ${publicKey.length}-byte key, expected ${SIGNATURE_SIZES[jwk.alg].publicKey}`
        );
    }

    return { kid: jwk.kid, algorithm: jwk.alg, publicKey };
}
