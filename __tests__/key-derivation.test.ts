import { createHash, hkdfSync } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import {
    computeTranscriptHash,
    deriveSessionKeys,
    establishSession,
} from '../src/utils/crypto/key-derivation';
import { CryptoProviderError } from '../src/types/crypto';

const sharedSecret = new Uint8Array(32).fill(7);
const clientNonce = new Uint8Array(16).fill(1);
const serverNonce = new Uint8Array(16).fill(2);

describe('session key derivation', () => {
    it('splits 80 bytes of HKDF output into 32/32/16', () => {
        const keys = deriveSessionKeys(sharedSecret, clientNonce, serverNonce);

        const info = Buffer.concat([
            Buffer.from('PQ-OIDC-v1|'),
            clientNonce,
            serverNonce,
        ]);
        const okm = new Uint8Array(
            hkdfSync('sha256', sharedSecret, 'KEMTLS-Session-Keys', info, 80)
        );

        expect(keys.encryptionKey).toEqual(okm.slice(0, 32));
        expect(keys.macKey).toEqual(okm.slice(32, 64));
        expect(keys.iv).toEqual(okm.slice(64, 80));
    });

    it('is deterministic and depends on nonce order', () => {
        const a = deriveSessionKeys(sharedSecret, clientNonce, serverNonce);
        const b = deriveSessionKeys(sharedSecret, clientNonce, serverNonce);
        const swapped = deriveSessionKeys(sharedSecret, serverNonce, clientNonce);

        expect(a).toEqual(b);
        expect(swapped.encryptionKey).not.toEqual(a.encryptionKey);
    });

    it('rejects an empty secret and nonces of the wrong size', () => {
        expect(() =>
            deriveSessionKeys(new Uint8Array(0), clientNonce, serverNonce)
        ).toThrow(CryptoProviderError);
        expect(() =>
            deriveSessionKeys(sharedSecret, new Uint8Array(15), serverNonce)
        ).toThrow('Handshake nonces must be 16 bytes');
    });

    it('establishes a session holding copies of its inputs', () => {
        const secret = sharedSecret.slice();
        const session = establishSession(secret, clientNonce, serverNonce);
        secret.fill(0);

        expect(session.sharedSecret).toEqual(sharedSecret);
        expect(session.clientNonce).toEqual(clientNonce);
        expect(session.encryptionKey.length).toBe(32);
    });

    it('hashes the transcript as SHA-256(cn || sn || ss)', () => {
        const expected = createHash('sha256')
            .update(clientNonce)
            .update(serverNonce)
            .update(sharedSecret)
            .digest();

        expect(computeTranscriptHash(clientNonce, serverNonce, sharedSecret)).toEqual(
            new Uint8Array(expected)
        );
    });
});
