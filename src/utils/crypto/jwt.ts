/**
 * @fileoverview JWT creation and verification over post-quantum signature algorithms.
 * @module utils/crypto/jwt
 */

import { base64url } from 'jose';
import { z } from 'zod';

import { isSigningAlgorithm } from '../../constants/crypto';
import type {
    DecodedJWT,
    JWTClaims,
    JWTCreateOptions,
    JWTHeader,
    JWTVerifyOptions,
    JWTVerifyResult,
    KeyPair,
    PublicKey,
} from '../../types/crypto';
import { JWTVerificationError } from '../../types/crypto';
import { signMessage, verifySignature } from './signing';

const decoder = new TextDecoder('utf-8', { fatal: true });

const HeaderSchema = z.object({
    alg: z.string(),
    typ: z.literal('JWT').optional(),
    kid: z.string().optional(),
});

const ClaimsSchema = z.looseObject({
    iss: z.string().optional(),
    sub: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    exp: z.number().optional(),
    iat: z.number().optional(),
    nbf: z.number().optional(),
    jti: z.string().optional(),
});

function encodeSegment(value: unknown): string {
    return base64url.encode(JSON.stringify(value));
}

function currentSeconds(clock: JWTCreateOptions['clock']): number {
    return Math.floor((clock ?? Date.now)() / 1000);
}

// ============================================================================
// JWT CREATION
// ============================================================================

/**
 * Creates a signed JWT.
 *
 * Structure: base64url(header).base64url(claims).base64url(signature).
 * Standard claims come first, then the caller payload, then `extraClaims`.
 *
 * @param payload - Caller claims
 * @param key - Signing key pair (its algorithm and kid go into the header)
 * @param options - Issuer, subject, audience and lifetime
 * @returns Signed JWT string
 * @throws RangeError if the lifetime is not positive
 *
 * @example
 * ```typescript
 * const idToken = createJWT(
 *   { nonce: 'n-0S6_WzA2Mj' },
 *   signingKey,
 *   { issuer: 'https://issuer.example', subject: user.id, audience: client.clientId, ttlSeconds: 3600 }
 * );
 * ```
 */
export function createJWT(
    payload: Record<string, unknown>,
    key: KeyPair,
    options: JWTCreateOptions
): string {
    if (!(options.ttlSeconds > 0)) {
        throw new RangeError(
            `ttlSeconds must be positive, got ${options.ttlSeconds}`
        );
    }

    const now = currentSeconds(options.clock);
    const header: JWTHeader = { alg: key.algorithm, typ: 'JWT', kid: key.kid };
    const claims: JWTClaims = {
        iss: options.issuer,
        sub: options.subject,
        aud: options.audience,
        iat: now,
        exp: now + options.ttlSeconds,
        nbf: now,
        ...payload,
        ...options.extraClaims,
    };

    const message = `${encodeSegment(header)}.${encodeSegment(claims)}`;
    const { signature } = signMessage(message, key);

    return `${message}.${base64url.encode(signature)}`;
}

// ============================================================================
// DECODING
// ============================================================================

function splitToken(token: string): [string, string, string] {
    const parts = token.split('.');
    const [header, payload, signature] = parts;
    if (
        parts.length !== 3 ||
        header === undefined ||
        payload === undefined ||
        signature === undefined
    ) {
        throw new JWTVerificationError(
            'Invalid JWT format: expected 3 parts separated by dots',
            'MALFORMED_TOKEN'
        );
    }
    return [header, payload, signature];
}

function parseSegment<S extends z.ZodType>(
    segment: string,
    schema: S,
    label: string
): z.infer<S> {
    let json: unknown;
    try {
        json = JSON.parse(decoder.decode(base64url.decode(segment)));
    } catch (error) {
        throw new JWTVerificationError(
            `Failed to decode JWT ${label}`,
            'MALFORMED_TOKEN',
            error
        );
    }

    const result = schema.safeParse(json);
    if (!result.success) {
        throw new JWTVerificationError(
            `Invalid JWT ${label}`,
            'MALFORMED_TOKEN',
            result.error
        );
    }
    return result.data;
}

function decodeSignature(segment: string): Uint8Array {
    try {
        return base64url.decode(segment);
    } catch (error) {
        throw new JWTVerificationError(
            'Failed to decode JWT signature',
            'MALFORMED_TOKEN',
            error
        );
    }
}

// ============================================================================
// JWT VERIFICATION
// ============================================================================

/**
 * Verifies a JWT and returns the decoded header and claims.
 *
 * Checks run in a fixed order so the reported code never depends on a
 * later check: MALFORMED_TOKEN, UNSUPPORTED_ALGORITHM, ALGORITHM_MISMATCH,
 * INVALID_SIGNATURE, TOKEN_EXPIRED, TOKEN_NOT_YET_VALID, INVALID_AUDIENCE,
 * INVALID_ISSUER.
 *
 * The signature covers the two encoded segments as received, never the
 * re-serialized claims.
 *
 * @throws JWTVerificationError if verification fails
 *
 * @example
 * ```typescript
 * try {
 *   const { payload } = verifyJWT(token, issuerKey, {
 *     issuer: 'https://issuer.example',
 *     audience: 'demo-client',
 *   });
 * } catch (error) {
 *   if (error instanceof JWTVerificationError) {
 *     log.warn({ code: error.code }, 'Rejected ID token');
 *   }
 * }
 * ```
 */
export function verifyJWT(
    token: string,
    key: Pick<PublicKey, 'algorithm' | 'publicKey'>,
    options: JWTVerifyOptions = {}
): JWTVerifyResult {
    const [headerB64, payloadB64, signatureB64] = splitToken(token);
    const header = parseSegment(headerB64, HeaderSchema, 'header');

    if (!isSigningAlgorithm(header.alg)) {
        throw new JWTVerificationError(
            `Unsupported algorithm: ${header.alg}`,
            'UNSUPPORTED_ALGORITHM'
        );
    }
    if (header.alg !== key.algorithm) {
        throw new JWTVerificationError(
            `Algorithm mismatch: expected ${key.algorithm}, got ${header.alg}`,
            'ALGORITHM_MISMATCH'
        );
    }

    const payload = parseSegment(payloadB64, ClaimsSchema, 'payload');
    const signature = decodeSignature(signatureB64);
    if (!verifySignature(`${headerB64}.${payloadB64}`, signature, key)) {
        throw new JWTVerificationError('Invalid signature', 'INVALID_SIGNATURE');
    }

    validateClaims(payload, options);

    return {
        header: {
            alg: header.alg,
            typ: 'JWT',
            ...(header.kid !== undefined && { kid: header.kid }),
        },
        payload,
    };
}

/**
 * Validates temporal, audience and issuer claims, in that order.
 */
function validateClaims(payload: JWTClaims, options: JWTVerifyOptions): void {
    if (options.checkExpiry ?? true) {
        const now = currentSeconds(options.clock);

        if (payload.exp !== undefined && now > payload.exp) {
            throw new JWTVerificationError(
                `Token expired at ${new Date(payload.exp * 1000).toISOString()}`,
                'TOKEN_EXPIRED'
            );
        }

        if (payload.nbf !== undefined && now < payload.nbf) {
            throw new JWTVerificationError(
                `Token not valid before ${new Date(payload.nbf * 1000).toISOString()}`,
                'TOKEN_NOT_YET_VALID'
            );
        }
    }

    if (options.audience !== undefined) {
        const tokenAudiences =
            payload.aud === undefined
                ? []
                : Array.isArray(payload.aud)
                  ? payload.aud
                  : [payload.aud];

        if (!tokenAudiences.includes(options.audience)) {
            throw new JWTVerificationError(
                `Invalid audience: expected "${options.audience}", got [${tokenAudiences.join(', ')}]`,
                'INVALID_AUDIENCE'
            );
        }
    }

    if (options.issuer !== undefined && payload.iss !== options.issuer) {
        throw new JWTVerificationError(
            `Invalid issuer: expected "${options.issuer}", got "${payload.iss}"`,
            'INVALID_ISSUER'
        );
    }
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * Decodes a JWT without verifying the signature.
 *
 * ⚠️ WARNING: Only use for inspection (e.g. picking the verification key).
 * Never trust unverified claims.
 *
 * @throws JWTVerificationError (MALFORMED_TOKEN) if the token cannot be decoded
 */
export function decodeJWT(token: string): DecodedJWT {
    const [headerB64, payloadB64] = splitToken(token);
    const header = parseSegment(headerB64, HeaderSchema, 'header');
    const payload = parseSegment(payloadB64, ClaimsSchema, 'payload');

    return { header, payload };
}

/**
 * Extracts the key ID (kid) from a JWT header without verification.
 *
 * @returns Key ID if present, undefined otherwise
 */
export function getJWTKeyId(token: string): string | undefined {
    try {
        return decodeJWT(token).header.kid;
    } catch {
        return undefined;
    }
}
