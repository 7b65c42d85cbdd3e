import { base64url } from 'jose';
import { describe, expect, it } from 'vitest';
import { createJWT, decodeJWT, getJWTKeyId, verifyJWT } from '../src/utils/crypto/jwt';
import { generateKeyPair } from '../src/utils/crypto/keys';
import { JWTVerificationError } from '../src/types/crypto';

const NOW = 1_700_000_000_000;
const NOW_SECONDS = 1_700_000_000;
const at = (seconds: number) => () => seconds * 1000;

const key = generateKeyPair('ML-DSA-44', 'test-kid');
const options = {
    issuer: 'https://issuer.example',
    subject: 'user-1',
    audience: 'demo-client',
    ttlSeconds: 60,
    clock: () => NOW,
};

function segment(value: unknown): string {
    return base64url.encode(JSON.stringify(value));
}

function expectJwtError(run: () => unknown, code: string) {
    try {
        run();
        expect.unreachable();
    } catch (error) {
        expect(error).toBeInstanceOf(JWTVerificationError);
        expect(error).toMatchObject({ code });
    }
}

describe('JWT codec', () => {
    it('signs standard claims and verifies them', () => {
        const token = createJWT({ nonce: 'n-1' }, key, options);
        const { header, payload } = verifyJWT(token, key, {
            audience: 'demo-client',
            issuer: 'https://issuer.example',
            clock: () => NOW,
        });

        expect(header).toEqual({ alg: 'ML-DSA-44', typ: 'JWT', kid: 'test-kid' });
        expect(payload).toEqual({
            iss: 'https://issuer.example',
            sub: 'user-1',
            aud: 'demo-client',
            iat: NOW_SECONDS,
            exp: NOW_SECONDS + 60,
            nbf: NOW_SECONDS,
            nonce: 'n-1',
        });
    });

    it('lets extraClaims override the payload', () => {
        const token = createJWT({ role: 'user' }, key, {
            ...options,
            extraClaims: { role: 'admin' },
        });
        expect(decodeJWT(token).payload.role).toBe('admin');
    });

    it('rejects a non-positive lifetime', () => {
        expect(() => createJWT({}, key, { ...options, ttlSeconds: 0 })).toThrow(RangeError);
    });

    describe('malformed input', () => {
        it('requires three segments', () => {
            expectJwtError(() => verifyJWT('a.b', key), 'MALFORMED_TOKEN');
            expectJwtError(() => verifyJWT('a.b.c.d', key), 'MALFORMED_TOKEN');
        });

        it('requires JSON segments with an alg header', () => {
            const payload = segment({ sub: 'x' });
            expectJwtError(() => verifyJWT(`bm90IGpzb24.${payload}.AAAA`, key), 'MALFORMED_TOKEN');
            expectJwtError(
                () => verifyJWT(`${segment({ typ: 'JWT' })}.${payload}.AAAA`, key),
                'MALFORMED_TOKEN'
            );
            expectJwtError(
                () => verifyJWT(`${segment({ alg: 'ML-DSA-44' })}.${segment({ exp: 'soon' })}.AAAA`, key),
                'MALFORMED_TOKEN'
            );
        });
    });

    describe('algorithm checks', () => {
        it('rejects algorithms outside the registry', () => {
            const token = `${segment({ alg: 'HS256', typ: 'JWT' })}.${segment({})}.AAAA`;
            expectJwtError(() => verifyJWT(token, key), 'UNSUPPORTED_ALGORITHM');
        });

        it('rejects the algorithm before decoding the claims and signature', () => {
            const notJson = base64url.encode('not json');
            expectJwtError(
                () => verifyJWT(`${segment({ alg: 'RS256', typ: 'JWT' })}.${notJson}.%%%`, key),
                'UNSUPPORTED_ALGORITHM'
            );
            expectJwtError(
                () => verifyJWT(`${segment({ alg: 'ML-DSA-65', typ: 'JWT' })}.${notJson}.AAAA`, key),
                'ALGORITHM_MISMATCH'
            );
        });

        it('rejects a known algorithm that is not the key algorithm', () => {
            const token = `${segment({ alg: 'ML-DSA-65', typ: 'JWT' })}.${segment({})}.AAAA`;
            expectJwtError(() => verifyJWT(token, key), 'ALGORITHM_MISMATCH');
        });
    });

    describe('signature', () => {
        it('fails on altered claims', () => {
            const [header, , signature] = createJWT({}, key, options).split('.');
            const forged = `${header}.${segment({ sub: 'admin' })}.${signature}`;

            expectJwtError(() => verifyJWT(forged, key), 'INVALID_SIGNATURE');
        });

        it('fails under another key of the same algorithm', () => {
            const token = createJWT({}, key, options);
            expectJwtError(
                () => verifyJWT(token, generateKeyPair('ML-DSA-44'), { clock: () => NOW }),
                'INVALID_SIGNATURE'
            );
        });

        it('is checked before expiry', () => {
            const [header, payload] = createJWT({}, key, options).split('.');
            const forged = `${header}.${payload}.${base64url.encode(new Uint8Array(2420))}`;

            expectJwtError(
                () => verifyJWT(forged, key, { clock: at(NOW_SECONDS + 3600) }),
                'INVALID_SIGNATURE'
            );
        });
    });

    describe('time claims', () => {
        const token = createJWT({}, key, options);

        it('accepts the token up to and including exp', () => {
            expect(() => verifyJWT(token, key, { clock: at(NOW_SECONDS + 60) })).not.toThrow();
            expectJwtError(() => verifyJWT(token, key, { clock: at(NOW_SECONDS + 61) }), 'TOKEN_EXPIRED');
        });

        it('rejects use before nbf', () => {
            expectJwtError(
                () => verifyJWT(token, key, { clock: at(NOW_SECONDS - 1) }),
                'TOKEN_NOT_YET_VALID'
            );
        });

        it('skips both checks when checkExpiry is false', () => {
            expect(() =>
                verifyJWT(token, key, { clock: at(NOW_SECONDS + 3600), checkExpiry: false })
            ).not.toThrow();
        });

        it('reports expiry before a wrong audience', () => {
            expectJwtError(
                () =>
                    verifyJWT(token, key, {
                        clock: at(NOW_SECONDS + 120),
                        audience: 'other-client',
                    }),
                'TOKEN_EXPIRED'
            );
        });
    });

    describe('audience and issuer', () => {
        const token = createJWT({}, key, options);
        const clock = () => NOW;

        it('requires the expected audience', () => {
            expectJwtError(
                () => verifyJWT(token, key, { clock, audience: 'other-client' }),
                'INVALID_AUDIENCE'
            );
        });

        it('accepts an audience array containing the client', () => {
            const multi = createJWT({}, key, {
                ...options,
                extraClaims: { aud: ['api', 'demo-client'] },
            });
            expect(verifyJWT(multi, key, { clock, audience: 'demo-client' }).payload.aud).toEqual([
                'api',
                'demo-client',
            ]);
        });

        it('checks audience before issuer', () => {
            expectJwtError(
                () =>
                    verifyJWT(token, key, {
                        clock,
                        audience: 'other-client',
                        issuer: 'https://other.example',
                    }),
                'INVALID_AUDIENCE'
            );
            expectJwtError(
                () => verifyJWT(token, key, { clock, issuer: 'https://other.example' }),
                'INVALID_ISSUER'
            );
        });
    });

    describe('inspection helpers', () => {
        it('decodes without verifying', () => {
            const token = createJWT({}, key, options);
            const { header, payload } = decodeJWT(token);

            expect(header.alg).toBe('ML-DSA-44');
            expect(payload.sub).toBe('user-1');
        });

        it('reads the kid, or undefined for garbage', () => {
            expect(getJWTKeyId(createJWT({}, key, options))).toBe('test-kid');
            expect(getJWTKeyId('not-a-token')).toBeUndefined();
        });
    });
});
