/**
 * @fileoverview Self-asserted server certificate: binds a subject to a KEM
 * public key and a signature public key, signed by the latter's secret key.
 *
 * There is no CA chain. A verified certificate only proves that the subject
 * and both keys were signed together.
 *
 * @module kemtls/certificate
 */

import { z } from 'zod';

import { SIGNING_ALGORITHMS } from '../constants/crypto';
import type { KeyPair } from '../types/crypto';
import type { Certificate, CertificateJSON } from '../types/kemtls';
import { CertificateError } from '../types/kemtls';
import { constantTimeEqual, signMessage, verifySignature } from '../utils/crypto';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

const hex = z.string().regex(/^(?:[0-9a-fA-F]{2})*$/, 'Expected hex string');

const CertificateSchema = z.object({
    subject: z.string().min(1),
    sig_alg: z.enum(SIGNING_ALGORITHMS),
    kem_pk: hex.min(2),
    sig_pk: hex.min(2),
    signature: hex.optional(),
});

function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
}

function fromHex(value: string): Uint8Array {
    return new Uint8Array(Buffer.from(value, 'hex'));
}

/**
 * To-be-signed bytes: UTF-8 of `subject|hex(kem_pk)|hex(sig_pk)`.
 */
export function certificateTbs(certificate: Certificate): Uint8Array {
    return encoder.encode(
        [
            certificate.subject,
            toHex(certificate.kemPublicKey),
            toHex(certificate.sigPublicKey),
        ].join('|')
    );
}

/**
 * Signs a certificate with the secret half of its own signature key.
 *
 * @throws CertificateError (KEY_MISMATCH) if the key does not belong to the certificate
 */
export function signCertificate(
    certificate: Certificate,
    key: KeyPair
): Certificate {
    if (
        key.algorithm !== certificate.signatureAlgorithm ||
        !constantTimeEqual(key.publicKey, certificate.sigPublicKey)
    ) {
        throw new CertificateError(
            `Signing key ${key.kid} does not match the certificate of "${certificate.subject}"`,
            'KEY_MISMATCH'
        );
    }

    const { signature } = signMessage(certificateTbs(certificate), key);
    return { ...certificate, signature };
}

/**
 * Returns false when unsigned; otherwise verifies the signature with the
 * embedded signature public key under the declared algorithm.
 */
export function verifyCertificate(certificate: Certificate): boolean {
    if (!certificate.signature) {
        return false;
    }
    return verifySignature(certificateTbs(certificate), certificate.signature, {
        algorithm: certificate.signatureAlgorithm,
        publicKey: certificate.sigPublicKey,
    });
}

/**
 * Creates and signs the certificate of a server identity.
 *
 * @example
 * ```typescript
 * const signingKey = generateKeyPair('ML-DSA-44');
 * const kemKeys = createKem('ML-KEM-768').generateKeyPair();
 * const certificate = issueCertificate('auth.example', kemKeys.publicKey, signingKey);
 * ```
 */
export function issueCertificate(
    subject: string,
    kemPublicKey: Uint8Array,
    key: KeyPair
): Certificate {
    return signCertificate(
        {
            subject,
            signatureAlgorithm: key.algorithm,
            kemPublicKey,
            sigPublicKey: key.publicKey,
        },
        key
    );
}

// ============================================================================
// WIRE FORMAT
// ============================================================================

export function certificateToJSON(certificate: Certificate): CertificateJSON {
    return {
        subject: certificate.subject,
        sig_alg: certificate.signatureAlgorithm,
        kem_pk: toHex(certificate.kemPublicKey),
        sig_pk: toHex(certificate.sigPublicKey),
        ...(certificate.signature && {
            signature: toHex(certificate.signature),
        }),
    };
}

export function serializeCertificate(certificate: Certificate): Uint8Array {
    return encoder.encode(JSON.stringify(certificateToJSON(certificate)));
}

/**
 * Parses a serialized certificate. Does not verify it.
 *
 * @throws CertificateError (MALFORMED_CERTIFICATE)
 */
export function parseCertificate(bytes: Uint8Array): Certificate {
    let json: unknown;
    try {
        json = JSON.parse(decoder.decode(bytes));
    } catch (error) {
        throw new CertificateError(
            'Certificate is not valid JSON',
            'MALFORMED_CERTIFICATE',
            error
        );
    }

    const result = CertificateSchema.safeParse(json);
    if (!result.success) {
        throw new CertificateError(
            'Certificate fields are invalid',
            'MALFORMED_CERTIFICATE',
            result.error
        );
    }

    const { subject, sig_alg, kem_pk, sig_pk, signature } = result.data;
    return {
        subject,
        signatureAlgorithm: sig_alg,
        kemPublicKey: fromHex(kem_pk),
        sigPublicKey: fromHex(sig_pk),
        ...(signature !== undefined && { signature: fromHex(signature) }),
    };
}
