/**
 * @fileoverview Hashing helpers: SHA-256 digests, token hashing and
 * Argon2id password hashing.
 * @module utils/crypto/hashing
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { hash, verify } from '@node-rs/argon2';

/**
 * SHA-256 over the concatenation of the given parts.
 */
export function sha256(...parts: Uint8Array[]): Uint8Array {
    const digest = createHash('sha256');
    for (const part of parts) {
        digest.update(part);
    }
    return new Uint8Array(digest.digest());
}

/**
 * Hash a token with SHA-256 (deterministic)
 * Use this for opaque tokens, NOT passwords!
 */
export function hashToken(token: string): string {
    return createHash('sha256').update(token).digest('hex');
}

/**
 * Constant-time byte comparison; unequal lengths compare false.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) {
        return false;
    }
    return timingSafeEqual(a, b);
}

// ============================================================================
// PASSWORD HASHING (Argon2id)
// ============================================================================

/**
 * Hashes a password using Argon2id algorithm.
 *
 * Uses OWASP recommended parameters:
 * - Memory: 64 MB (65536 KB)
 * - Time cost: 3 iterations
 * - Parallelism: 4 lanes
 *
 * @param password - Plain text password to hash
 * @returns Argon2id hash string (includes salt and parameters)
 *
 * @see https://cheatsheetseries.owasp.org/cheatsheets/Password_Storage_Cheat_Sheet.html
 */
export async function hashPassword(password: string): Promise<string> {
    return hash(password, {
        memoryCost: 65536,
        timeCost: 3,
        parallelism: 4,
        algorithm: 2, // Argon2id
    });
}

/**
 * Verifies a password against an Argon2id hash.
 *
 * @param storedHash - Hash recorded for the principal
 * @param password - Plain text password to verify
 * @returns True if password matches, false otherwise
 */
export async function verifyPassword(
    storedHash: string,
    password: string
): Promise<boolean> {
    return verify(storedHash, password);
}
