/**
 * @fileoverview Post-quantum crypto provider: KEM and signature capabilities
 * resolved once from an algorithm identifier.
 * @module utils/crypto/provider
 */

import {
    isKemAlgorithm,
    isMLDSAAlgorithm,
    isSigningAlgorithm,
    KEM_ALGORITHM_ALIASES,
    KEM_SIZES,
    ML_DSA_INSTANCES,
    ML_KEM_INSTANCES,
    SIGNATURE_SIZES,
    SLH_DSA_INSTANCES,
} from '../../constants/crypto';
import type {
    KemAlgorithm,
    KemCapability,
    RawKeyPair,
    SignatureCapability,
    SigningAlgorithm,
} from '../../types/crypto';
import { CryptoProviderError, UnsupportedAlgorithmError } from '../../types/crypto';
import { logger } from '../logger';

const log = logger.child({ module: 'crypto-provider' });

// ============================================================================
// ALGORITHM RESOLUTION
// ============================================================================

/**
 * Resolves a KEM identifier, accepting the Kyber aliases.
 *
 * @throws UnsupportedAlgorithmError for unknown identifiers
 */
export function resolveKemAlgorithm(name: string): KemAlgorithm {
    if (isKemAlgorithm(name)) {
        return name;
    }
    // Own keys only: `constructor`, `toString` and friends are not aliases
    const alias = Object.hasOwn(KEM_ALGORITHM_ALIASES, name)
        ? KEM_ALGORITHM_ALIASES[name]
        : undefined;
    if (alias) {
        return alias;
    }
    throw new UnsupportedAlgorithmError(name);
}

/**
 * Resolves a signature algorithm identifier.
 *
 * @throws UnsupportedAlgorithmError for unknown identifiers (e.g. Falcon-512)
 */
export function resolveSigningAlgorithm(name: string): SigningAlgorithm {
    if (isSigningAlgorithm(name)) {
        return name;
    }
    throw new UnsupportedAlgorithmError(name);
}

function expectLength(label: string, value: Uint8Array, expected: number) {
    if (value.length !== expected) {
        throw new CryptoProviderError(
            `${label} must be ${expected} bytes, got ${value.length}`
        );
    }
}

// ============================================================================
// KEM CAPABILITY
// ============================================================================

/**
 * Creates a KEM capability for the given algorithm.
 *
 * @param name - ML-KEM identifier or Kyber alias
 * @returns Capability with fixed-size inputs and outputs
 * @throws UnsupportedAlgorithmError if the identifier is unknown
 *
 * @example
 * ```typescript
 * const kem = createKem('ML-KEM-768');
 * const { publicKey, secretKey } = kem.generateKeyPair();
 * const { ciphertext, sharedSecret } = kem.encapsulate(publicKey);
 * kem.decapsulate(ciphertext, secretKey); // equals sharedSecret
 * ```
 */
export function createKem(name: string): KemCapability {
    const algorithm = resolveKemAlgorithm(name);
    const instance = ML_KEM_INSTANCES[algorithm];
    const sizes = KEM_SIZES[algorithm];

    return {
        algorithm,
        sizes,
        generateKeyPair(): RawKeyPair {
            const { publicKey, secretKey } = instance.keygen();
            return { publicKey, secretKey };
        },
        encapsulate(publicKey) {
            expectLength('KEM public key', publicKey, sizes.publicKey);
            const { cipherText, sharedSecret } = instance.encapsulate(publicKey);
            return { ciphertext: cipherText, sharedSecret };
        },
        decapsulate(ciphertext, secretKey) {
            expectLength('KEM ciphertext', ciphertext, sizes.ciphertext);
            expectLength('KEM secret key', secretKey, sizes.secretKey);
            return instance.decapsulate(ciphertext, secretKey);
        },
    };
}

// ============================================================================
// SIGNATURE CAPABILITY
// ============================================================================

interface SignatureScheme {
    keygen(): RawKeyPair;
    sign(message: Uint8Array, secretKey: Uint8Array): Uint8Array;
    verify(
        signature: Uint8Array,
        message: Uint8Array,
        publicKey: Uint8Array
    ): boolean;
}

function schemeFor(algorithm: SigningAlgorithm): SignatureScheme {
    if (isMLDSAAlgorithm(algorithm)) {
        return ML_DSA_INSTANCES[algorithm];
    }
    return SLH_DSA_INSTANCES[algorithm];
}

/**
 * Creates a signature capability for the given algorithm.
 *
 * Note: SLH-DSA signing is slow (hundreds of milliseconds per signature).
 *
 * @param name - Signature algorithm identifier
 * @throws UnsupportedAlgorithmError if the identifier is unknown
 */
export function createSigner(name: string): SignatureCapability {
    const algorithm = resolveSigningAlgorithm(name);
    const scheme = schemeFor(algorithm);
    const sizes = SIGNATURE_SIZES[algorithm];

    return {
        algorithm,
        sizes,
        generateKeyPair(): RawKeyPair {
            const { publicKey, secretKey } = scheme.keygen();
            return { publicKey, secretKey };
        },
        sign(secretKey, message) {
            expectLength('Signature secret key', secretKey, sizes.secretKey);
            return scheme.sign(message, secretKey);
        },
        verify(publicKey, message, signature) {
            if (
                publicKey.length !== sizes.publicKey ||
                signature.length !== sizes.signature
            ) {
                return false;
            }
            try {
                return scheme.verify(signature, message, publicKey);
            } catch (error) {
                log.debug({ err: error, algorithm }, 'Signature verification failed');
                return false;
            }
        },
    };
}
