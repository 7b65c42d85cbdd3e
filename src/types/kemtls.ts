/**
 * @fileoverview Handshake engine types: messages, sessions, certificates and errors.
 * @module types/kemtls
 */

import type { MESSAGE_TYPES } from '../constants/kemtls';
import type { KemAlgorithm, SigningAlgorithm } from './crypto';

// ============================================================================
// WIRE MESSAGES
// ============================================================================

export type MessageTypeName = keyof typeof MESSAGE_TYPES;

export type MessageType = (typeof MESSAGE_TYPES)[MessageTypeName];

/** A decoded frame. */
export interface HandshakeMessage {
    type: MessageType;
    payload: Uint8Array;
}

export interface ClientHello {
    kemAlgorithm: string;
    publicKey: Uint8Array;
    nonce: Uint8Array;
}

export interface ServerHello {
    ciphertext: Uint8Array;
    nonce: Uint8Array;
    /** Serialized certificate (UTF-8 JSON) */
    certificate: Uint8Array;
}

export interface Finished {
    transcriptHash: Uint8Array;
}

export interface Alert {
    code: string;
}

// ============================================================================
// CERTIFICATE
// ============================================================================

/**
 * Single-level, self-asserted server certificate.
 * Immutable once signed.
 */
export interface Certificate {
    readonly subject: string;
    readonly signatureAlgorithm: SigningAlgorithm;
    readonly kemPublicKey: Uint8Array;
    readonly sigPublicKey: Uint8Array;
    readonly signature?: Uint8Array;
}

/** Certificate wire map, key material in hex. */
export interface CertificateJSON {
    subject: string;
    sig_alg: SigningAlgorithm;
    kem_pk: string;
    sig_pk: string;
    signature?: string;
}

// ============================================================================
// SESSION
// ============================================================================

export interface SessionKeys {
    encryptionKey: Uint8Array;
    macKey: Uint8Array;
    iv: Uint8Array;
}

/**
 * Established handshake session. Keys only exist alongside the secret and
 * both nonces they were derived from.
 */
export interface HandshakeSession extends SessionKeys {
    clientNonce: Uint8Array;
    serverNonce: Uint8Array;
    sharedSecret: Uint8Array;
}

export type ClientHandshakeState =
    | 'START'
    | 'CLIENT_HELLO_SENT'
    | 'SERVER_HELLO_RECEIVED'
    | 'HANDSHAKE_COMPLETE'
    | 'ABORTED';

export type ServerHandshakeState =
    | 'START'
    | 'CLIENT_HELLO_RECEIVED'
    | 'SERVER_HELLO_SENT'
    | 'HANDSHAKE_COMPLETE'
    | 'ABORTED';

/** What the initiator learns from the ServerHello. */
export interface ServerHelloResult {
    sharedSecret: Uint8Array;
    serverNonce: Uint8Array;
    certificate: Certificate;
}

export interface KemTlsClientOptions {
    kemAlgorithm: KemAlgorithm | string;
    /** Reject verified certificates issued for another subject */
    expectedSubject?: string;
}

// ============================================================================
// ERRORS
// ============================================================================

export type ProtocolErrorCode =
    | 'UNEXPECTED_MESSAGE'
    | 'MALFORMED_MESSAGE'
    | 'FRAME_TOO_LARGE'
    | 'ALGORITHM_MISMATCH'
    | 'INVALID_PUBLIC_KEY'
    | 'TRANSCRIPT_MISMATCH'
    | 'PEER_ALERT'
    | 'CONNECTION_CLOSED';

export type CertificateErrorCode =
    | 'INVALID_SIGNATURE'
    | 'MALFORMED_CERTIFICATE'
    | 'SUBJECT_MISMATCH'
    | 'KEY_MISMATCH';

export type StateErrorCode = 'INVALID_STATE' | 'KEYS_NOT_DERIVED' | 'ABORTED';

export type KemTlsErrorCode =
    | ProtocolErrorCode
    | CertificateErrorCode
    | StateErrorCode;

/**
 * Base class of every handshake failure. All of them are fatal to the
 * handshake they occur in.
 */
export abstract class KemTlsError extends Error {
    abstract readonly code: KemTlsErrorCode;

    constructor(
        message: string,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = new.target.name;
    }
}

/** Wrong message type, order or encoding. */
export class ProtocolError extends KemTlsError {
    constructor(
        message: string,
        public readonly code: ProtocolErrorCode,
        cause?: unknown
    ) {
        super(message, cause);
    }
}

export class CertificateError extends KemTlsError {
    constructor(
        message: string,
        public readonly code: CertificateErrorCode,
        cause?: unknown
    ) {
        super(message, cause);
    }
}

/** Operation invoked before its prerequisite state, or after an abort. */
export class StateError extends KemTlsError {
    constructor(
        message: string,
        public readonly code: StateErrorCode,
        cause?: unknown
    ) {
        super(message, cause);
    }
}
