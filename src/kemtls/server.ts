/**
 * @fileoverview Handshake responder: a long-lived server identity and the
 * per-connection handshakes it accepts.
 * @module kemtls/server
 *
 * START → CLIENT_HELLO_RECEIVED → SERVER_HELLO_SENT → HANDSHAKE_COMPLETE,
 * ABORTED on any failure.
 */

import { MESSAGE_TYPES } from '../constants/kemtls';
import type { KemCapability, KeyPair } from '../types/crypto';
import type {
    Certificate,
    ClientHello,
    HandshakeMessage,
    HandshakeSession,
    ServerHandshakeState,
} from '../types/kemtls';
import { CertificateError, ProtocolError, StateError } from '../types/kemtls';
import {
    computeTranscriptHash,
    constantTimeEqual,
    createKem,
    establishSession,
    generateKeyPair,
    generateNonce,
} from '../utils/crypto';
import type { Logger } from '../utils/logger';
import { issueCertificate, serializeCertificate } from './certificate';
import {
    createFinishedMessage,
    decodeClientHello,
    decodeFinished,
    encodeServerHello,
    expectMessage,
} from './protocol';
import { HandshakeStateMachine } from './state-machine';

type ServerStep = Exclude<ServerHandshakeState, 'START' | 'ABORTED'>;

export interface KemTlsServerIdentityOptions {
    /** Certificate subject, usually the server name */
    subject: string;
    kemAlgorithm: string;
    signatureAlgorithm: string;
    logger?: Logger;
}

// ============================================================================
// SERVER IDENTITY
// ============================================================================

/**
 * Long-term server identity: the signed certificate and the keys behind it.
 * Read-only after construction and shared by every connection.
 *
 * @example
 * ```typescript
 * const identity = KemTlsServerIdentity.create({
 *   subject: 'auth.example',
 *   kemAlgorithm: 'ML-KEM-768',
 *   signatureAlgorithm: 'ML-DSA-44',
 * });
 * const session = await performServerHandshake(channel, identity.accept());
 * ```
 */
export class KemTlsServerIdentity {
    private readonly serializedCertificate: Uint8Array;

    constructor(
        private readonly kem: KemCapability,
        readonly certificate: Certificate,
        private readonly logger?: Logger
    ) {
        if (certificate.kemPublicKey.length !== kem.sizes.publicKey) {
            throw new CertificateError(
                `Certificate KEM key does not fit ${kem.algorithm}`,
                'KEY_MISMATCH'
            );
        }
        this.serializedCertificate = serializeCertificate(certificate);
    }

    /**
     * Generates the long-term KEM and signature keys and self-signs the
     * certificate.
     *
     * @throws UnsupportedAlgorithmError for unknown algorithm identifiers
     */
    static create(options: KemTlsServerIdentityOptions): KemTlsServerIdentity {
        const kem = createKem(options.kemAlgorithm);
        const signingKey: KeyPair = generateKeyPair(options.signatureAlgorithm);
        const kemKeys = kem.generateKeyPair();
        const certificate = issueCertificate(
            options.subject,
            kemKeys.publicKey,
            signingKey
        );
        return new KemTlsServerIdentity(kem, certificate, options.logger);
    }

    get kemAlgorithm(): string {
        return this.kem.algorithm;
    }

    /** Starts the handshake of a new connection. */
    accept(): KemTlsServerHandshake {
        return new KemTlsServerHandshake(
            this.kem,
            this.serializedCertificate,
            this.logger
        );
    }
}

// ============================================================================
// PER-CONNECTION HANDSHAKE
// ============================================================================

export class KemTlsServerHandshake extends HandshakeStateMachine<ServerStep> {
    private clientHello: ClientHello | undefined;
    private session: HandshakeSession | undefined;
    private finishedSent = false;

    constructor(
        private readonly kem: KemCapability,
        private readonly certificate: Uint8Array,
        log?: Logger
    ) {
        super('server', log);
    }

    /**
     * @throws ProtocolError (ALGORITHM_MISMATCH) when the client advertises
     * another KEM; nothing is encapsulated in that case
     */
    handleClientHello(message: HandshakeMessage): ClientHello {
        return this.step(
            'handle ClientHello',
            'START',
            'CLIENT_HELLO_RECEIVED',
            () => {
                expectMessage(message, 'CLIENT_HELLO');
                const hello = decodeClientHello(message.payload);

                if (hello.kemAlgorithm !== this.kem.algorithm) {
                    throw new ProtocolError(
                        `Client offered ${hello.kemAlgorithm}, server uses ${this.kem.algorithm}`,
                        'ALGORITHM_MISMATCH'
                    );
                }
                this.assertPeerKey(hello.publicKey);

                this.clientHello = hello;
                return hello;
            }
        );
    }

    /**
     * Encapsulates against the client's ephemeral key and embeds the
     * certificate.
     */
    createServerHello(peerPublicKey: Uint8Array): HandshakeMessage {
        return this.step(
            'create ServerHello',
            'CLIENT_HELLO_RECEIVED',
            'SERVER_HELLO_SENT',
            () => {
                this.assertPeerKey(peerPublicKey);
                const clientNonce = this.requireClientHello().nonce;

                const { ciphertext, sharedSecret } =
                    this.kem.encapsulate(peerPublicKey);
                const nonce = generateNonce();
                this.session = establishSession(sharedSecret, clientNonce, nonce);

                return {
                    type: MESSAGE_TYPES.SERVER_HELLO,
                    payload: encodeServerHello({
                        ciphertext,
                        nonce,
                        certificate: this.certificate,
                    }),
                };
            }
        );
    }

    createServerFinished(): HandshakeMessage {
        return this.step(
            'create ServerFinished',
            'SERVER_HELLO_SENT',
            'SERVER_HELLO_SENT',
            () => {
                if (this.finishedSent) {
                    throw new StateError(
                        'ServerFinished already sent',
                        'INVALID_STATE'
                    );
                }
                const message = createFinishedMessage(
                    'SERVER_FINISHED',
                    this.session ?? {}
                );
                this.finishedSent = true;
                return message;
            }
        );
    }

    /**
     * @throws ProtocolError (TRANSCRIPT_MISMATCH) if the client hashed
     * another transcript
     */
    handleClientFinished(message: HandshakeMessage): void {
        this.step(
            'handle ClientFinished',
            'SERVER_HELLO_SENT',
            'HANDSHAKE_COMPLETE',
            () => {
                if (!this.finishedSent) {
                    throw new StateError(
                        'ServerFinished has not been sent',
                        'INVALID_STATE'
                    );
                }
                expectMessage(message, 'CLIENT_FINISHED');
                const { transcriptHash } = decodeFinished(message.payload);
                const session = this.requireSession();

                const expected = computeTranscriptHash(
                    session.clientNonce,
                    session.serverNonce,
                    session.sharedSecret
                );
                if (!constantTimeEqual(transcriptHash, expected)) {
                    throw new ProtocolError(
                        'ClientFinished transcript hash mismatch',
                        'TRANSCRIPT_MISMATCH'
                    );
                }
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
        this.session = undefined;
        this.clientHello = undefined;
    }

    private assertPeerKey(publicKey: Uint8Array): void {
        if (publicKey.length !== this.kem.sizes.publicKey) {
            throw new ProtocolError(
                `Client KEM public key must be ${this.kem.sizes.publicKey} bytes, got ${publicKey.length}`,
                'INVALID_PUBLIC_KEY'
            );
        }
    }

    private requireClientHello(): ClientHello {
        if (!this.clientHello) {
            throw new StateError('ClientHello was not received', 'INVALID_STATE');
        }
        return this.clientHello;
    }

    private requireSession(): HandshakeSession {
        if (!this.session) {
            throw new StateError('Session keys are not derived', 'KEYS_NOT_DERIVED');
        }
        return this.session;
    }
}
