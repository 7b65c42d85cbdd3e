import { describe, expect, it } from 'vitest';
import { MESSAGE_TYPES } from '../src/constants/kemtls';
import {
    createAlertMessage,
    createFinishedMessage,
    decodeAlert,
    decodeClientHello,
    decodeFinished,
    decodeFrame,
    decodeServerHello,
    encodeClientHello,
    encodeFields,
    encodeFrame,
    encodeServerHello,
    FrameDecoder,
} from '../src/kemtls/protocol';
import { ProtocolError, StateError } from '../src/types/kemtls';
import {
    computeTranscriptHash,
    establishSession,
} from '../src/utils/crypto/key-derivation';

function expectProtocolError(run: () => unknown, code: string) {
    try {
        run();
        expect.unreachable();
    } catch (error) {
        expect(error).toBeInstanceOf(ProtocolError);
        expect(error).toMatchObject({ code });
    }
}

describe('handshake protocol', () => {
    describe('frames', () => {
        it('writes type, big-endian length and payload', () => {
            const frame = encodeFrame({
                type: MESSAGE_TYPES.CLIENT_HELLO,
                payload: new Uint8Array([0xaa, 0xbb]),
            });

            expect(Array.from(frame)).toEqual([0x01, 0, 0, 0, 2, 0xaa, 0xbb]);
            expect(decodeFrame(frame)).toEqual({
                type: 0x01,
                payload: new Uint8Array([0xaa, 0xbb]),
            });
        });

        it('rejects short, incomplete, trailing and unknown frames', () => {
            expectProtocolError(() => decodeFrame(new Uint8Array([1, 0, 0])), 'MALFORMED_MESSAGE');
            expectProtocolError(
                () => decodeFrame(new Uint8Array([1, 0, 0, 0, 3, 9])),
                'MALFORMED_MESSAGE'
            );
            expectProtocolError(
                () => decodeFrame(new Uint8Array([1, 0, 0, 0, 1, 9, 9])),
                'MALFORMED_MESSAGE'
            );
            expectProtocolError(
                () => decodeFrame(new Uint8Array([0x42, 0, 0, 0, 0])),
                'MALFORMED_MESSAGE'
            );
        });

        it('caps the payload at 1 MiB', () => {
            expectProtocolError(
                () =>
                    encodeFrame({
                        type: MESSAGE_TYPES.ALERT,
                        payload: new Uint8Array(1024 * 1024 + 1),
                    }),
                'FRAME_TOO_LARGE'
            );
            expectProtocolError(
                () => decodeFrame(new Uint8Array([0x02, 0x00, 0x10, 0x00, 0x01])),
                'FRAME_TOO_LARGE'
            );
        });
    });

    describe('FrameDecoder', () => {
        it('reassembles frames split at arbitrary points', () => {
            const first = encodeFrame({ type: MESSAGE_TYPES.SERVER_HELLO, payload: new Uint8Array([1, 2, 3]) });
            const second = encodeFrame({ type: MESSAGE_TYPES.SERVER_FINISHED, payload: new Uint8Array([4]) });
            const stream = new Uint8Array([...first, ...second]);

            const decoder = new FrameDecoder();
            expect(decoder.push(stream.slice(0, 4))).toEqual([]);
            expect(decoder.pending).toBe(4);

            const completed = decoder.push(stream.slice(4, 9));
            expect(completed).toEqual([
                { type: MESSAGE_TYPES.SERVER_HELLO, payload: new Uint8Array([1, 2, 3]) },
            ]);

            expect(decoder.push(stream.slice(9))).toEqual([
                { type: MESSAGE_TYPES.SERVER_FINISHED, payload: new Uint8Array([4]) },
            ]);
            expect(decoder.pending).toBe(0);
        });

        it('fails fast on an unknown type byte', () => {
            const decoder = new FrameDecoder();
            expectProtocolError(() => decoder.push(new Uint8Array([0x7f, 0, 0, 0, 0])), 'MALFORMED_MESSAGE');
        });
    });

    describe('payloads', () => {
        const nonce = new Uint8Array(16).fill(9);

        it('length-prefixes each field', () => {
            expect(Array.from(encodeFields([new Uint8Array([5]), new Uint8Array(0)]))).toEqual([
                0, 0, 0, 1, 5, 0, 0, 0, 0,
            ]);
        });

        it('decodes ClientHello and ServerHello fields in order', () => {
            const hello = {
                kemAlgorithm: 'ML-KEM-768',
                publicKey: new Uint8Array([1, 2, 3]),
                nonce,
            };
            expect(decodeClientHello(encodeClientHello(hello))).toEqual(hello);

            const serverHello = {
                ciphertext: new Uint8Array([4, 5]),
                nonce,
                certificate: new TextEncoder().encode('{}'),
            };
            expect(decodeServerHello(encodeServerHello(serverHello))).toEqual(serverHello);
        });

        it('rejects missing, trailing and wrong-size fields', () => {
            const twoFields = encodeFields([new TextEncoder().encode('ML-KEM-768'), new Uint8Array(3)]);
            expectProtocolError(() => decodeClientHello(twoFields), 'MALFORMED_MESSAGE');

            const fourFields = encodeFields([new Uint8Array(1), nonce, new Uint8Array(1), new Uint8Array(1)]);
            expectProtocolError(() => decodeServerHello(fourFields), 'MALFORMED_MESSAGE');

            const shortNonce = encodeFields([new TextEncoder().encode('ML-KEM-768'), new Uint8Array(3), new Uint8Array(8)]);
            expectProtocolError(() => decodeClientHello(shortNonce), 'MALFORMED_MESSAGE');

            expectProtocolError(() => decodeFinished(encodeFields([new Uint8Array(31)])), 'MALFORMED_MESSAGE');
        });

        it('carries the alert code as text', () => {
            const alert = createAlertMessage('TRANSCRIPT_MISMATCH');
            expect(alert.type).toBe(0xff);
            expect(decodeAlert(alert.payload)).toEqual({ code: 'TRANSCRIPT_MISMATCH' });
        });
    });

    describe('createFinishedMessage', () => {
        it('hashes the session transcript', () => {
            const session = establishSession(
                new Uint8Array(32).fill(3),
                new Uint8Array(16).fill(1),
                new Uint8Array(16).fill(2)
            );
            const message = createFinishedMessage('SERVER_FINISHED', session);

            expect(message.type).toBe(MESSAGE_TYPES.SERVER_FINISHED);
            expect(decodeFinished(message.payload).transcriptHash).toEqual(
                computeTranscriptHash(session.clientNonce, session.serverNonce, session.sharedSecret)
            );
        });

        it('raises KEYS_NOT_DERIVED for an incomplete session', () => {
            try {
                createFinishedMessage('CLIENT_FINISHED', { clientNonce: new Uint8Array(16) });
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(StateError);
                expect(error).toMatchObject({ code: 'KEYS_NOT_DERIVED' });
            }
        });
    });
});
