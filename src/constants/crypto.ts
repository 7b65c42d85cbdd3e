/**
 * @fileoverview Cryptographic constants and algorithm instances.
 * @module constants/crypto
 */

import { ml_dsa44, ml_dsa65, ml_dsa87 } from '@noble/post-quantum/ml-dsa.js';
import { ml_kem512, ml_kem768, ml_kem1024 } from '@noble/post-quantum/ml-kem.js';
import { slh_dsa_sha2_192f } from '@noble/post-quantum/slh-dsa.js';

import type {
    KemAlgorithm,
    KemSizes,
    MLDSAAlgorithm,
    SignatureSizes,
    SigningAlgorithm,
    SLHDSAAlgorithm,
} from '../types/crypto';

// ============================================================================
// ALGORITHM IDENTIFIERS
// ============================================================================

export const ML_DSA_ALGORITHMS = ['ML-DSA-44', 'ML-DSA-65', 'ML-DSA-87'] as const;

export const SLH_DSA_ALGORITHMS = ['SLH-DSA-SHA2-192f'] as const;

export const SIGNING_ALGORITHMS = [
    ...ML_DSA_ALGORITHMS,
    ...SLH_DSA_ALGORITHMS,
] as const;

export const KEM_ALGORITHMS = ['ML-KEM-512', 'ML-KEM-768', 'ML-KEM-1024'] as const;

/** Round-3 submission names still found in configuration files. */
export const KEM_ALGORITHM_ALIASES: Readonly<Record<string, KemAlgorithm>> = {
    Kyber512: 'ML-KEM-512',
    Kyber768: 'ML-KEM-768',
    Kyber1024: 'ML-KEM-1024',
};

// ============================================================================
// POST-QUANTUM ALGORITHM INSTANCES
// ============================================================================

/**
 * ML-DSA (Dilithium) algorithm instances mapped by algorithm name.
 * @see NIST FIPS 204
 */
export const ML_DSA_INSTANCES = {
    'ML-DSA-44': ml_dsa44,
    'ML-DSA-65': ml_dsa65,
    'ML-DSA-87': ml_dsa87,
} as const;

/**
 * SLH-DSA (SPHINCS+) algorithm instances mapped by algorithm name.
 * @see NIST FIPS 205
 */
export const SLH_DSA_INSTANCES = {
    'SLH-DSA-SHA2-192f': slh_dsa_sha2_192f,
} as const;

/**
 * ML-KEM (Kyber) algorithm instances mapped by algorithm name.
 * @see NIST FIPS 203
 */
export const ML_KEM_INSTANCES = {
    'ML-KEM-512': ml_kem512,
    'ML-KEM-768': ml_kem768,
    'ML-KEM-1024': ml_kem1024,
} as const;

// ============================================================================
// KEY AND MESSAGE SIZES
// ============================================================================

export const SIGNATURE_SIZES: Readonly<Record<SigningAlgorithm, SignatureSizes>> =
    {
        'ML-DSA-44': { publicKey: 1312, secretKey: 2560, signature: 2420 },
        'ML-DSA-65': { publicKey: 1952, secretKey: 4032, signature: 3309 },
        'ML-DSA-87': { publicKey: 2592, secretKey: 4896, signature: 4627 },
        'SLH-DSA-SHA2-192f': { publicKey: 48, secretKey: 96, signature: 35664 },
    };

export const KEM_SIZES: Readonly<Record<KemAlgorithm, KemSizes>> = {
    'ML-KEM-512': {
        publicKey: 800,
        secretKey: 1632,
        ciphertext: 768,
        sharedSecret: 32,
    },
    'ML-KEM-768': {
        publicKey: 1184,
        secretKey: 2400,
        ciphertext: 1088,
        sharedSecret: 32,
    },
    'ML-KEM-1024': {
        publicKey: 1568,
        secretKey: 3168,
        ciphertext: 1568,
        sharedSecret: 32,
    },
};

/** Handshake nonce length in bytes */
export const NONCE_LENGTH = 16;

/** Opaque token length (codes, sessions, access tokens) in bytes */
export const OPAQUE_TOKEN_LENGTH = 32;

// ============================================================================
// DURATION PARSING
// ============================================================================

/**
 * Duration units in seconds for lifetime parsing.
 */
export const DURATION_UNITS: Record<string, number> = {
    s: 1,
    m: 60,
    h: 3600,
    d: 86400,
    w: 604800,
};

/**
 * Parses a duration string into seconds.
 *
 * @param duration - Duration string (e.g., '15m', '1h', '7d', '2w')
 * @returns Duration in seconds
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * parseDuration('15m'); // 900
 * parseDuration('1h');  // 3600
 * parseDuration('7d');  // 604800
 * ```
 */
export function parseDuration(duration: string): number {
    const match = /^(\d+)([smhdw])$/.exec(duration);
    const value = match?.[1];
    const unit = match?.[2];
    const multiplier = unit ? DURATION_UNITS[unit] : undefined;

    if (value === undefined || multiplier === undefined) {
        throw new Error(
            `Invalid duration format: "${duration}". Expected format: number + unit (s/m/h/d/w)`
        );
    }

    return parseInt(value, 10) * multiplier;
}

// ============================================================================
// ALGORITHM TYPE GUARDS
// ============================================================================

/**
 * Type guard for any supported signing algorithm identifier.
 */
export function isSigningAlgorithm(value: unknown): value is SigningAlgorithm {
    return SIGNING_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Type guard to check if algorithm is ML-DSA (Dilithium).
 *
 * @param algorithm - Algorithm to check
 * @returns True if algorithm is ML-DSA-44, ML-DSA-65, or ML-DSA-87
 */
export function isMLDSAAlgorithm(
    algorithm: SigningAlgorithm
): algorithm is MLDSAAlgorithm {
    return ML_DSA_ALGORITHMS.some((candidate) => candidate === algorithm);
}

/**
 * Type guard to check if algorithm is SLH-DSA (SPHINCS+).
 */
export function isSLHDSAAlgorithm(
    algorithm: SigningAlgorithm
): algorithm is SLHDSAAlgorithm {
    return SLH_DSA_ALGORITHMS.some((candidate) => candidate === algorithm);
}

/**
 * Type guard for KEM identifiers (aliases excluded).
 */
export function isKemAlgorithm(value: unknown): value is KemAlgorithm {
    return KEM_ALGORITHMS.some((algorithm) => algorithm === value);
}
