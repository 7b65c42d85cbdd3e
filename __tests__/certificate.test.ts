import { describe, expect, it } from 'vitest';
import {
    certificateTbs,
    certificateToJSON,
    issueCertificate,
    parseCertificate,
    serializeCertificate,
    signCertificate,
    verifyCertificate,
} from '../src/kemtls/certificate';
import { CertificateError } from '../src/types/kemtls';
import { generateKeyPair } from '../src/utils/crypto/keys';
import { createKem } from '../src/utils/crypto/provider';

const encoder = new TextEncoder();

describe('certificate', () => {
    const signingKey = generateKeyPair('ML-DSA-44');
    const kemPublicKey = createKem('ML-KEM-768').generateKeyPair().publicKey;

    it('signs subject|hex(kem_pk)|hex(sig_pk)', () => {
        const certificate = {
            subject: 'auth.example',
            signatureAlgorithm: 'ML-DSA-44' as const,
            kemPublicKey: new Uint8Array([0xab, 0x01]),
            sigPublicKey: new Uint8Array([0x00, 0xff]),
        };

        expect(new TextDecoder().decode(certificateTbs(certificate))).toBe(
            'auth.example|ab01|00ff'
        );
    });

    it('verifies an issued certificate', () => {
        const certificate = issueCertificate('auth.example', kemPublicKey, signingKey);

        expect(certificate.signatureAlgorithm).toBe('ML-DSA-44');
        expect(verifyCertificate(certificate)).toBe(true);
    });

    it('fails verification when unsigned or altered', () => {
        const certificate = issueCertificate('auth.example', kemPublicKey, signingKey);
        const { signature: _signature, ...unsigned } = certificate;

        expect(verifyCertificate(unsigned)).toBe(false);
        expect(verifyCertificate({ ...certificate, subject: 'evil.example' })).toBe(false);

        const kem = certificate.kemPublicKey.slice();
        kem[0] = (kem[0] ?? 0) ^ 0x01;
        expect(verifyCertificate({ ...certificate, kemPublicKey: kem })).toBe(false);
    });

    it('refuses to sign with a key that is not the certificate key', () => {
        const other = generateKeyPair('ML-DSA-44');
        const sign = () =>
            signCertificate(
                {
                    subject: 'auth.example',
                    signatureAlgorithm: 'ML-DSA-44',
                    kemPublicKey,
                    sigPublicKey: signingKey.publicKey,
                },
                other
            );

        expect(sign).toThrow(CertificateError);
        expect(sign).toThrow('does not match the certificate');
        try {
            sign();
        } catch (error) {
            expect(error).toMatchObject({ code: 'KEY_MISMATCH' });
        }
    });

    it('serializes to hex JSON and parses back', () => {
        const certificate = issueCertificate('auth.example', kemPublicKey, signingKey);
        const json = certificateToJSON(certificate);

        expect(json.subject).toBe('auth.example');
        expect(json.sig_alg).toBe('ML-DSA-44');
        expect(json.kem_pk).toBe(Buffer.from(kemPublicKey).toString('hex'));

        const parsed = parseCertificate(serializeCertificate(certificate));
        expect(parsed).toEqual(certificate);
        expect(verifyCertificate(parsed)).toBe(true);
    });

    it('raises MALFORMED_CERTIFICATE for bad input', () => {
        const cases = [
            encoder.encode('not json'),
            encoder.encode(JSON.stringify({ subject: 'x' })),
            encoder.encode(
                JSON.stringify({ subject: 'x', sig_alg: 'Falcon-512', kem_pk: 'ab', sig_pk: 'cd' })
            ),
            encoder.encode(
                JSON.stringify({ subject: 'x', sig_alg: 'ML-DSA-44', kem_pk: 'zz', sig_pk: 'cd' })
            ),
        ];

        for (const bytes of cases) {
            try {
                parseCertificate(bytes);
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(CertificateError);
                expect(error).toMatchObject({ code: 'MALFORMED_CERTIFICATE' });
            }
        }
    });
});
