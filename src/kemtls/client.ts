/**
 * @fileoverview Handshake initiator.
 * @module kemtls/client
 *
 * START → CLIENT_HELLO_SENT → SERVER_HELLO_RECEIVED → HANDSHAKE_COMPLETE,
 * ABORTED on any failure.
 */

import { MESSAGE_TYPES } from '../constants/kemtls';
import type { KemCapability } from '../types/crypto';
import type {
    Certificate,
    ClientHandshakeState,
    HandshakeMessage,
    HandshakeSession,
    KemTlsClientOptions,
    ServerHelloResult,
} from '../types/kemtls';
import { CertificateError, ProtocolError, StateError } from '../types/kemtls';
import {
    computeTranscriptHash,
    constantTimeEqual,
    createKem,
    establishSession,
    generateNonce,
} from '../utils/crypto';
import type { Logger } from '../utils/logger';
import { parseCertificate, verifyCertificate } from './certificate';
import {
    createFinishedMessage,
    decodeFinished,
    decodeServerHello,
    encodeClientHello,
    expectMessage,
} from './protocol';
import { HandshakeStateMachine } from './state-machine';

type ClientStep = Exclude<ClientHandshakeState, 'START' | 'ABORTED'>;

/**
 * One instance per connection attempt; never reused.
 *
 * @example
 * ```typescript
 * const client = new KemTlsClient({ kemAlgorithm: 'ML-KEM-768', expectedSubject: 'auth.example' });
 * const session = await performClientHandshake(new StreamChannel(socket), client);
 * ```
 */
export class KemTlsClient extends HandshakeStateMachine<ClientStep> {
    private readonly kem: KemCapability;
    private readonly expectedSubject: string | undefined;

    private ephemeralSecretKey: Uint8Array | undefined;
    private clientNonce: Uint8Array | undefined;
    private session: HandshakeSession | undefined;
    private serverCertificate: Certificate | undefined;
    private serverFinishedVerified = false;

    /**
     * @throws UnsupportedAlgorithmError for an unknown KEM identifier
     */
    constructor(options: KemTlsClientOptions, log?: Logger) {
        super('client', log);
        this.kem = createKem(options.kemAlgorithm);
        this.expectedSubject = options.expectedSubject;
    }

    get kemAlgorithm(): string {
        return this.kem.algorithm;
    }

    /** Verified server certificate, once the ServerHello was handled. */
    get certificate(): Certificate | undefined {
        return this.serverCertificate;
    }

    /**
     * Generates the ephemeral KEM key pair and nonce. The secret key never
     * leaves this instance.
     */
    createClientHello(): HandshakeMessage {
        return this.step('create ClientHello', 'START', 'CLIENT_HELLO_SENT', () => {
            const { publicKey, secretKey } = this.kem.generateKeyPair();
            const nonce = generateNonce();
            this.ephemeralSecretKey = secretKey;
            this.clientNonce = nonce;

            return {
                type: MESSAGE_TYPES.CLIENT_HELLO,
                payload: encodeClientHello({
                    kemAlgorithm: this.kem.algorithm,
                    publicKey,
                    nonce,
                }),
            };
        });
    }

    /**
     * Decapsulates the server's ciphertext and verifies its certificate.
     *
     * @throws ProtocolError for a wrong message type or malformed payload
     * @throws CertificateError if the certificate is malformed, unsigned,
     * invalid, or issued for an unexpected subject
     */
    handleServerHello(message: HandshakeMessage): ServerHelloResult {
        return this.step(
            'handle ServerHello',
            'CLIENT_HELLO_SENT',
            'SERVER_HELLO_RECEIVED',
            () => {
                expectMessage(message, 'SERVER_HELLO');
                const hello = decodeServerHello(message.payload);
                const { secretKey, clientNonce } = this.handshakeSecrets();

                if (hello.ciphertext.length !== this.kem.sizes.ciphertext) {
                    throw new ProtocolError(
                        `ServerHello ciphertext must be ${this.kem.sizes.ciphertext} bytes for ${this.kem.algorithm}`,
                        'MALFORMED_MESSAGE'
                    );
                }

                const sharedSecret = this.kem.decapsulate(
                    hello.ciphertext,
                    secretKey
                );
                this.wipeEphemeralKey();

                const certificate = parseCertificate(hello.certificate);
                if (!verifyCertificate(certificate)) {
                    throw new CertificateError(
                        `Certificate of "${certificate.subject}" has no valid signature`,
                        'INVALID_SIGNATURE'
                    );
                }
                if (
                    this.expectedSubject !== undefined &&
                    certificate.subject !== this.expectedSubject
                ) {
                    throw new CertificateError(
                        `Certificate subject "${certificate.subject}" does not match "${this.expectedSubject}"`,
                        'SUBJECT_MISMATCH'
                    );
                }

                this.serverCertificate = certificate;
                this.session = establishSession(
                    sharedSecret,
                    clientNonce,
                    hello.nonce
                );
                this.log.debug(
                    { subject: certificate.subject },
                    'Server certificate verified'
                );

                return {
                    sharedSecret,
                    serverNonce: hello.nonce,
                    certificate,
                };
            }
        );
    }

    /**
     * @throws ProtocolError (TRANSCRIPT_MISMATCH) if the server hashed
     * another transcript
     */
    handleServerFinished(message: HandshakeMessage): void {
        this.step(
            'handle ServerFinished',
            'SERVER_HELLO_RECEIVED',
            'SERVER_HELLO_RECEIVED',
            () => {
                if (this.serverFinishedVerified) {
                    throw new StateError(
                        'ServerFinished already handled',
                        'INVALID_STATE'
                    );
                }
                expectMessage(message, 'SERVER_FINISHED');
                const { transcriptHash } = decodeFinished(message.payload);
                const session = this.requireSession();

                const expected = computeTranscriptHash(
                    session.clientNonce,
                    session.serverNonce,
                    session.sharedSecret
                );
                if (!constantTimeEqual(transcriptHash, expected)) {
                    throw new ProtocolError(
                        'ServerFinished transcript hash mismatch',
                        'TRANSCRIPT_MISMATCH'
                    );
                }
                this.serverFinishedVerified = true;
            }
        );
    }

    createClientFinished(): HandshakeMessage {
        return this.step(
            'create ClientFinished',
            'SERVER_HELLO_RECEIVED',
            'HANDSHAKE_COMPLETE',
            () => {
                if (!this.serverFinishedVerified) {
                    throw new StateError(
                        'ServerFinished has not been verified',
                        'INVALID_STATE'
                    );
                }
                return createFinishedMessage(
                    'CLIENT_FINISHED',
                    this.requireSession()
                );
            }
        );
    }

    /**
     * @throws StateError unless the handshake is complete
     */
    getSession(): HandshakeSession {
        if (this.state !== 'HANDSHAKE_COMPLETE' || !this.session) {
            throw new StateError(
                `Handshake not complete (state ${this.state})`,
                'INVALID_STATE'
            );
        }
        return this.session;
    }

    protected discardSecrets(): void {
        this.wipeEphemeralKey();
        this.session = undefined;
    }

    private wipeEphemeralKey(): void {
        this.ephemeralSecretKey?.fill(0);
        this.ephemeralSecretKey = undefined;
    }

    private handshakeSecrets(): { secretKey: Uint8Array; clientNonce: Uint8Array } {
        if (!this.ephemeralSecretKey || !this.clientNonce) {
            throw new StateError('ClientHello was not created', 'INVALID_STATE');
        }
        return {
            secretKey: this.ephemeralSecretKey,
            clientNonce: this.clientNonce,
        };
    }

    private requireSession(): HandshakeSession {
        if (!this.session) {
            throw new StateError('Session keys are not derived', 'KEYS_NOT_DERIVED');
        }
        return this.session;
    }
}
