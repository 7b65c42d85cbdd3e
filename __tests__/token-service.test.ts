import { describe, expect, it } from 'vitest';
import { TokenService } from '../src/core/token/service';
import {
    createJWKS,
    exportToJWK,
    generateKeyPair,
    importFromJWK,
    UnsupportedAlgorithmError,
    verifyJWT,
} from '../src/utils/crypto';

const NOW = 1_700_000_000_000;

describe('TokenService', () => {
    const tokens = new TokenService({
        issuer: 'https://auth.example',
        algorithm: 'ML-DSA-44',
        idTokenTTL: 300,
        clock: () => NOW,
    });

    it('issues ID tokens with auth_time and nonce', () => {
        const token = tokens.createIdToken({
            subject: 'user-1',
            audience: 'demo-client',
            nonce: 'n-1',
            authTime: 1_699_999_000,
            claims: { email: 'alice@example.com' },
        });

        const { header, payload } = tokens.verify(token, { audience: 'demo-client' });
        expect(header.kid).toBe(tokens.publicKey.kid);
        expect(payload).toMatchObject({
            iss: 'https://auth.example',
            sub: 'user-1',
            aud: 'demo-client',
            exp: NOW / 1000 + 300,
            auth_time: 1_699_999_000,
            nonce: 'n-1',
            email: 'alice@example.com',
        });
    });

    it('defaults auth_time to now and leaves out an absent nonce', () => {
        const token = tokens.createIdToken({ subject: 'user-1', audience: 'demo-client', ttlSeconds: 10 });
        const { payload } = tokens.verify(token);

        expect(payload.auth_time).toBe(NOW / 1000);
        expect(payload.exp).toBe(NOW / 1000 + 10);
        expect('nonce' in payload).toBe(false);
    });

    it('refuses a signing key of another algorithm', () => {
        expect(
            () =>
                new TokenService({
                    issuer: 'https://auth.example',
                    algorithm: 'ML-DSA-44',
                    idTokenTTL: 300,
                    signingKey: generateKeyPair('ML-DSA-65', 'test-kid'),
                })
        ).toThrow('Signing key test-kid is ML-DSA-65, expected ML-DSA-44');
        expect(
            () => new TokenService({ issuer: 'x', algorithm: 'Falcon-512', idTokenTTL: 300 })
        ).toThrow(UnsupportedAlgorithmError);
    });

    it('verifies with a key imported from its JWKS', () => {
        const [jwk] = tokens.jwks.keys;
        if (!jwk) {
            throw new Error('Empty JWKS');
        }
        const key = importFromJWK(jwk);
        const token = tokens.createIdToken({ subject: 'user-1', audience: 'demo-client' });

        expect(key).toEqual(tokens.publicKey);
        expect(verifyJWT(token, key, { clock: () => NOW }).payload.sub).toBe('user-1');
    });
});

describe('JWKS', () => {
    const key = generateKeyPair('ML-DSA-44', 'test-kid');

    it('exports the raw public key as an AKP JWK', () => {
        const jwk = exportToJWK(key);

        expect(jwk).toMatchObject({ kty: 'AKP', alg: 'ML-DSA-44', kid: 'test-kid', use: 'sig' });
        expect(Buffer.from(jwk.pub, 'base64url')).toEqual(Buffer.from(key.publicKey));
        expect(createJWKS([key, key]).keys).toHaveLength(2);
    });

    it('rejects unknown algorithms and keys of the wrong size', () => {
        const jwk = exportToJWK(key);

        expect(() => importFromJWK({ ...jwk, alg: 'EdDSA' })).toThrow(UnsupportedAlgorithmError);
        expect(() => importFromJWK({ ...jwk, pub: 'AAAA' })).toThrow(
            'JWK "test-kid" has a 3-byte key, expected 1312'
        );
    });
});
