/**
 * @fileoverview Digital signature operations over the post-quantum provider.
 * @module utils/crypto/signing
 */

import type {
    KeyPair,
    PublicKey,
    SignatureCapability,
    SignatureResult,
    SigningAlgorithm,
} from '../../types/crypto';
import { createSigner } from './provider';

const signers = new Map<SigningAlgorithm, SignatureCapability>();

/**
 * Returns the shared capability for an algorithm, resolving it on first use.
 */
export function signerFor(algorithm: SigningAlgorithm): SignatureCapability {
    let signer = signers.get(algorithm);
    if (!signer) {
        signer = createSigner(algorithm);
        signers.set(algorithm, signer);
    }
    return signer;
}

function toBytes(message: string | Uint8Array): Uint8Array {
    return typeof message === 'string'
        ? new TextEncoder().encode(message)
        : message;
}

// ============================================================================
// SIGNING OPERATIONS
// ============================================================================

/**
 * Signs a message with the key pair's algorithm.
 *
 * @param message - Message to sign (UTF-8 string or raw bytes)
 * @param key - Signing key pair
 * @returns Signature result containing the raw signature, algorithm, and kid
 *
 * @example
 * ```typescript
 * const result = signMessage(`${headerB64}.${payloadB64}`, issuerKey);
 * ```
 */
export function signMessage(
    message: string | Uint8Array,
    key: KeyPair
): SignatureResult {
    const signature = signerFor(key.algorithm).sign(
        key.secretKey,
        toBytes(message)
    );

    return { signature, algorithm: key.algorithm, kid: key.kid };
}

// ============================================================================
// SIGNATURE VERIFICATION
// ============================================================================

/**
 * Verifies a digital signature against the original message.
 *
 * @returns True if signature is valid, false otherwise (never throws)
 *
 * @example
 * ```typescript
 * if (!verifySignature(tbs, certificate.signature, issuerPublicKey)) {
 *   throw new CertificateError('Invalid server certificate', 'INVALID_SIGNATURE');
 * }
 * ```
 */
export function verifySignature(
    message: string | Uint8Array,
    signature: Uint8Array,
    key: Pick<PublicKey, 'algorithm' | 'publicKey'>
): boolean {
    return signerFor(key.algorithm).verify(
        key.publicKey,
        toBytes(message),
        signature
    );
}
