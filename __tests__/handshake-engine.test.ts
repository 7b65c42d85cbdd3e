import { describe, expect, it } from 'vitest';
import { KemTlsClient } from '../src/kemtls/client';
import { encodeClientHello } from '../src/kemtls/protocol';
import { KemTlsServerIdentity } from '../src/kemtls/server';
import { MESSAGE_TYPES } from '../src/constants/kemtls';
import type { HandshakeMessage } from '../src/types/kemtls';
import { CertificateError, KemTlsError } from '../src/types/kemtls';
import { UnsupportedAlgorithmError } from '../src/types/crypto';
import { issueCertificate } from '../src/kemtls/certificate';
import { generateKeyPair } from '../src/utils/crypto/keys';
import { createKem } from '../src/utils/crypto/provider';

const identity = KemTlsServerIdentity.create({
    subject: 'auth.example',
    kemAlgorithm: 'ML-KEM-768',
    signatureAlgorithm: 'ML-DSA-44',
});

function expectKemTlsError(run: () => unknown, code: string) {
    try {
        run();
        expect.unreachable();
    } catch (error) {
        expect(error).toBeInstanceOf(KemTlsError);
        expect(error).toMatchObject({ code });
    }
}

/** Runs both sides in memory up to the point where they hold matching keys. */
function runHandshake(client: KemTlsClient, server = identity.accept()) {
    const hello = server.handleClientHello(client.createClientHello());
    const serverHello = server.createServerHello(hello.publicKey);
    const result = client.handleServerHello(serverHello);
    client.handleServerFinished(server.createServerFinished());
    server.handleClientFinished(client.createClientFinished());
    return { server, result };
}

describe('handshake engine', () => {
    it('leaves both sides with the same session', () => {
        const client = new KemTlsClient({
            kemAlgorithm: 'ML-KEM-768',
            expectedSubject: 'auth.example',
        });
        const { server, result } = runHandshake(client);

        expect(client.state).toBe('HANDSHAKE_COMPLETE');
        expect(server.state).toBe('HANDSHAKE_COMPLETE');
        expect(result.certificate.subject).toBe('auth.example');
        expect(client.certificate).toEqual(identity.certificate);

        const clientSession = client.getSession();
        const serverSession = server.getSession();
        expect(clientSession.sharedSecret).toEqual(result.sharedSecret);
        expect(clientSession.sharedSecret).toEqual(serverSession.sharedSecret);
        expect(clientSession.encryptionKey).toEqual(serverSession.encryptionKey);
        expect(clientSession.macKey).toEqual(serverSession.macKey);
        expect(clientSession.iv).toEqual(serverSession.iv);
        expect(clientSession.serverNonce).toEqual(result.serverNonce);
    });

    it('gives every connection fresh secrets', () => {
        const first = runHandshake(new KemTlsClient({ kemAlgorithm: 'ML-KEM-768' }));
        const second = runHandshake(new KemTlsClient({ kemAlgorithm: 'ML-KEM-768' }));

        expect(first.server.getSession().sharedSecret).not.toEqual(
            second.server.getSession().sharedSecret
        );
    });

    it('accepts a Kyber alias for the same KEM', () => {
        const client = new KemTlsClient({ kemAlgorithm: 'Kyber768' });
        expect(client.kemAlgorithm).toBe('ML-KEM-768');
        runHandshake(client);
        expect(client.state).toBe('HANDSHAKE_COMPLETE');
    });

    it('refuses inherited object keys as KEM names at construction', () => {
        expect(() => new KemTlsClient({ kemAlgorithm: 'toString' })).toThrow(
            UnsupportedAlgorithmError
        );
    });

    describe('server', () => {
        it('refuses a certificate whose KEM key does not fit the KEM', () => {
            const signingKey = generateKeyPair('ML-DSA-44');
            const kemPublicKey = createKem('ML-KEM-512').generateKeyPair().publicKey;
            const certificate = issueCertificate('auth.example', kemPublicKey, signingKey);

            expect(() => new KemTlsServerIdentity(createKem('ML-KEM-768'), certificate)).toThrow(
                CertificateError
            );
        });

        it('rejects a client offering another KEM', () => {
            const server = identity.accept();
            const client = new KemTlsClient({ kemAlgorithm: 'ML-KEM-512' });

            expectKemTlsError(
                () => server.handleClientHello(client.createClientHello()),
                'ALGORITHM_MISMATCH'
            );
            expect(server.state).toBe('ABORTED');
        });

        it('rejects a public key of the wrong size', () => {
            const server = identity.accept();
            const message: HandshakeMessage = {
                type: MESSAGE_TYPES.CLIENT_HELLO,
                payload: encodeClientHello({
                    kemAlgorithm: 'ML-KEM-768',
                    publicKey: new Uint8Array(800),
                    nonce: new Uint8Array(16),
                }),
            };

            expectKemTlsError(() => server.handleClientHello(message), 'INVALID_PUBLIC_KEY');
        });

        it('treats a message of the wrong type as fatal', () => {
            const server = identity.accept();
            expectKemTlsError(
                () =>
                    server.handleClientHello({
                        type: MESSAGE_TYPES.CLIENT_FINISHED,
                        payload: new Uint8Array(0),
                    }),
                'UNEXPECTED_MESSAGE'
            );

            expectKemTlsError(
                () => server.handleClientHello(new KemTlsClient({ kemAlgorithm: 'ML-KEM-768' }).createClientHello()),
                'ABORTED'
            );
        });

        it('refuses steps out of order', () => {
            const server = identity.accept();
            expectKemTlsError(() => server.createServerFinished(), 'INVALID_STATE');
            expect(server.state).toBe('ABORTED');
        });
    });

    describe('client', () => {
        it('refuses a second ClientHello', () => {
            const client = new KemTlsClient({ kemAlgorithm: 'ML-KEM-768' });
            client.createClientHello();
            expectKemTlsError(() => client.createClientHello(), 'INVALID_STATE');
            expectKemTlsError(() => client.getSession(), 'INVALID_STATE');
        });

        it('rejects a certificate whose signature does not verify', () => {
            const forged = new KemTlsServerIdentity(createKem('ML-KEM-768'), {
                ...identity.certificate,
                subject: 'evil.example',
            });
            const client = new KemTlsClient({ kemAlgorithm: 'ML-KEM-768' });
            const server = forged.accept();

            const hello = server.handleClientHello(client.createClientHello());
            expectKemTlsError(
                () => client.handleServerHello(server.createServerHello(hello.publicKey)),
                'INVALID_SIGNATURE'
            );
            expect(client.state).toBe('ABORTED');
        });

        it('rejects a valid certificate for another subject', () => {
            const client = new KemTlsClient({
                kemAlgorithm: 'ML-KEM-768',
                expectedSubject: 'other.example',
            });
            const server = identity.accept();

            const hello = server.handleClientHello(client.createClientHello());
            expectKemTlsError(
                () => client.handleServerHello(server.createServerHello(hello.publicKey)),
                'SUBJECT_MISMATCH'
            );
        });

        it('detects a ServerFinished over another transcript', () => {
            const client = new KemTlsClient({ kemAlgorithm: 'ML-KEM-768' });
            const server = identity.accept();
            const hello = server.handleClientHello(client.createClientHello());
            client.handleServerHello(server.createServerHello(hello.publicKey));

            const finished = server.createServerFinished();
            const tampered = finished.payload.slice();
            tampered[tampered.length - 1] = (tampered[tampered.length - 1] ?? 0) ^ 0xff;

            expectKemTlsError(
                () =>
                    client.handleServerFinished({
                        type: MESSAGE_TYPES.SERVER_FINISHED,
                        payload: tampered,
                    }),
                'TRANSCRIPT_MISMATCH'
            );
            expectKemTlsError(() => client.createClientFinished(), 'ABORTED');
        });

        it('will not send ClientFinished before verifying ServerFinished', () => {
            const client = new KemTlsClient({ kemAlgorithm: 'ML-KEM-768' });
            const server = identity.accept();
            const hello = server.handleClientHello(client.createClientHello());
            client.handleServerHello(server.createServerHello(hello.publicKey));

            expectKemTlsError(() => client.createClientFinished(), 'INVALID_STATE');
        });
    });
});
