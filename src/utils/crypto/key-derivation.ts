/**
 * @fileoverview Session key derivation (HKDF-SHA256) and handshake transcript hashing.
 * @module utils/crypto/key-derivation
 */

import { hkdfSync } from 'node:crypto';

import { NONCE_LENGTH } from '../../constants/crypto';
import {
    SESSION_KEY_INFO_PREFIX,
    SESSION_KEY_LENGTHS,
    SESSION_KEY_SALT,
} from '../../constants/kemtls';
import { CryptoProviderError } from '../../types/crypto';
import type { HandshakeSession, SessionKeys } from '../../types/kemtls';
import { sha256 } from './hashing';

const encoder = new TextEncoder();

const OUTPUT_LENGTH =
    SESSION_KEY_LENGTHS.encryptionKey +
    SESSION_KEY_LENGTHS.macKey +
    SESSION_KEY_LENGTHS.iv;

function assertInputs(
    sharedSecret: Uint8Array,
    clientNonce: Uint8Array,
    serverNonce: Uint8Array
): void {
    if (sharedSecret.length === 0) {
        throw new CryptoProviderError('Shared secret must not be empty');
    }
    if (
        clientNonce.length !== NONCE_LENGTH ||
        serverNonce.length !== NONCE_LENGTH
    ) {
        throw new CryptoProviderError(
            `Handshake nonces must be ${NONCE_LENGTH} bytes`
        );
    }
}

/**
 * Derives the session key triple from a KEM shared secret.
 *
 * The context is `client_nonce ‖ server_nonce` in that fixed order, so both
 * peers obtain identical keys without negotiating anything.
 *
 * @example
 * ```typescript
 * const { encryptionKey, macKey, iv } = deriveSessionKeys(ss, clientNonce, serverNonce);
 * ```
 */
export function deriveSessionKeys(
    sharedSecret: Uint8Array,
    clientNonce: Uint8Array,
    serverNonce: Uint8Array
): SessionKeys {
    assertInputs(sharedSecret, clientNonce, serverNonce);

    const info = Buffer.concat([
        encoder.encode(SESSION_KEY_INFO_PREFIX),
        clientNonce,
        serverNonce,
    ]);
    const okm = new Uint8Array(
        hkdfSync('sha256', sharedSecret, SESSION_KEY_SALT, info, OUTPUT_LENGTH)
    );

    const macStart = SESSION_KEY_LENGTHS.encryptionKey;
    const ivStart = macStart + SESSION_KEY_LENGTHS.macKey;

    return {
        encryptionKey: okm.slice(0, macStart),
        macKey: okm.slice(macStart, ivStart),
        iv: okm.slice(ivStart, OUTPUT_LENGTH),
    };
}

/**
 * Builds a complete session: keys are derived in the same step that
 * records the secret and nonces.
 */
export function establishSession(
    sharedSecret: Uint8Array,
    clientNonce: Uint8Array,
    serverNonce: Uint8Array
): HandshakeSession {
    const keys = deriveSessionKeys(sharedSecret, clientNonce, serverNonce);
    return {
        clientNonce: clientNonce.slice(),
        serverNonce: serverNonce.slice(),
        sharedSecret: sharedSecret.slice(),
        ...keys,
    };
}

/** SHA-256(client_nonce ‖ server_nonce ‖ shared_secret) */
export function computeTranscriptHash(
    clientNonce: Uint8Array,
    serverNonce: Uint8Array,
    sharedSecret: Uint8Array
): Uint8Array {
    return sha256(clientNonce, serverNonce, sharedSecret);
}
