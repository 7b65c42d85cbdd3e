/**
 * @fileoverview Handshake wire format: frames, length-prefixed payload
 * fields and the per-message payload schemas.
 * @module kemtls/protocol
 *
 * Frame: type (u8) ‖ length (u32 BE) ‖ payload.
 * Payload: a fixed sequence of fields, each u32 BE length ‖ bytes.
 */

import { NONCE_LENGTH } from '../constants/crypto';
import {
    FIELD_LENGTH_PREFIX,
    FRAME_HEADER_LENGTH,
    MAX_FRAME_PAYLOAD,
    MESSAGE_TYPES,
    TRANSCRIPT_HASH_LENGTH,
} from '../constants/kemtls';
import type {
    Alert,
    ClientHello,
    Finished,
    HandshakeMessage,
    HandshakeSession,
    MessageType,
    MessageTypeName,
    ServerHello,
} from '../types/kemtls';
import { ProtocolError, StateError } from '../types/kemtls';
import { computeTranscriptHash } from '../utils/crypto';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

function isMessageTypeName(name: string): name is MessageTypeName {
    return name in MESSAGE_TYPES;
}

const MESSAGE_TYPE_NAMES = new Map<number, MessageTypeName>();
for (const name of Object.keys(MESSAGE_TYPES)) {
    if (isMessageTypeName(name)) {
        MESSAGE_TYPE_NAMES.set(MESSAGE_TYPES[name], name);
    }
}

export function isMessageType(value: number): value is MessageType {
    return MESSAGE_TYPE_NAMES.has(value);
}

export function messageTypeName(type: number): string {
    return MESSAGE_TYPE_NAMES.get(type) ?? `0x${type.toString(16)}`;
}

function view(bytes: Uint8Array): DataView {
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// ============================================================================
// FRAMES
// ============================================================================

/**
 * Encodes a message as a single frame.
 *
 * @throws ProtocolError (FRAME_TOO_LARGE) above 1 MiB of payload
 */
export function encodeFrame(message: HandshakeMessage): Uint8Array {
    if (message.payload.length > MAX_FRAME_PAYLOAD) {
        throw new ProtocolError(
            `Payload of ${message.payload.length} bytes exceeds ${MAX_FRAME_PAYLOAD}`,
            'FRAME_TOO_LARGE'
        );
    }

    const frame = new Uint8Array(FRAME_HEADER_LENGTH + message.payload.length);
    const header = view(frame);
    header.setUint8(0, message.type);
    header.setUint32(1, message.payload.length);
    frame.set(message.payload, FRAME_HEADER_LENGTH);
    return frame;
}

/** Reads and validates a frame header, returning the type and payload length. */
function readFrameHeader(bytes: Uint8Array): {
    type: MessageType;
    length: number;
} {
    const header = view(bytes);
    const type = header.getUint8(0);
    const length = header.getUint32(1);

    if (!isMessageType(type)) {
        throw new ProtocolError(
            `Unknown message type ${messageTypeName(type)}`,
            'MALFORMED_MESSAGE'
        );
    }
    if (length > MAX_FRAME_PAYLOAD) {
        throw new ProtocolError(
            `Frame length ${length} exceeds ${MAX_FRAME_PAYLOAD}`,
            'FRAME_TOO_LARGE'
        );
    }
    return { type, length };
}

/**
 * Decodes exactly one frame.
 *
 * @throws ProtocolError on short, incomplete, oversized or trailing input
 */
export function decodeFrame(bytes: Uint8Array): HandshakeMessage {
    if (bytes.length < FRAME_HEADER_LENGTH) {
        throw new ProtocolError(
            `Frame too short: ${bytes.length} bytes`,
            'MALFORMED_MESSAGE'
        );
    }

    const { type, length } = readFrameHeader(bytes);
    const end = FRAME_HEADER_LENGTH + length;

    if (bytes.length < end) {
        throw new ProtocolError(
            `Incomplete frame: expected ${length} payload bytes, got ${bytes.length - FRAME_HEADER_LENGTH}`,
            'MALFORMED_MESSAGE'
        );
    }
    if (bytes.length > end) {
        throw new ProtocolError(
            `${bytes.length - end} trailing bytes after frame`,
            'MALFORMED_MESSAGE'
        );
    }

    return { type, payload: bytes.slice(FRAME_HEADER_LENGTH, end) };
}

/**
 * Reassembles frames from a byte stream split at arbitrary points.
 *
 * @example
 * ```typescript
 * const decoder = new FrameDecoder();
 * socket.on('data', (chunk) => {
 *   for (const message of decoder.push(chunk)) handle(message);
 * });
 * ```
 */
export class FrameDecoder {
    private buffer: Uint8Array = new Uint8Array(0);

    /** Bytes received but not yet part of a complete frame. */
    get pending(): number {
        return this.buffer.length;
    }

    /**
     * Appends a chunk and returns every frame it completes.
     *
     * @throws ProtocolError as soon as a header is invalid
     */
    push(chunk: Uint8Array): HandshakeMessage[] {
        const joined = new Uint8Array(this.buffer.length + chunk.length);
        joined.set(this.buffer, 0);
        joined.set(chunk, this.buffer.length);
        this.buffer = joined;

        const messages: HandshakeMessage[] = [];
        while (this.buffer.length >= FRAME_HEADER_LENGTH) {
            const { type, length } = readFrameHeader(this.buffer);
            const end = FRAME_HEADER_LENGTH + length;
            if (this.buffer.length < end) {
                break;
            }
            messages.push({
                type,
                payload: this.buffer.slice(FRAME_HEADER_LENGTH, end),
            });
            this.buffer = this.buffer.slice(end);
        }
        return messages;
    }
}

// ============================================================================
// PAYLOAD FIELDS
// ============================================================================

/** Concatenates fields, each prefixed with its u32 BE length. */
export function encodeFields(fields: readonly Uint8Array[]): Uint8Array {
    const total = fields.reduce(
        (sum, field) => sum + FIELD_LENGTH_PREFIX + field.length,
        0
    );
    const payload = new Uint8Array(total);
    const writer = view(payload);

    let offset = 0;
    for (const field of fields) {
        writer.setUint32(offset, field.length);
        payload.set(field, offset + FIELD_LENGTH_PREFIX);
        offset += FIELD_LENGTH_PREFIX + field.length;
    }
    return payload;
}

/**
 * Sequential reader over a payload's fields.
 */
export class FieldReader {
    private offset = 0;

    constructor(
        private readonly payload: Uint8Array,
        private readonly messageName: string
    ) {}

    next(field: string): Uint8Array {
        const remaining = this.payload.length - this.offset;
        if (remaining < FIELD_LENGTH_PREFIX) {
            throw new ProtocolError(
                `${this.messageName}: missing field "${field}"`,
                'MALFORMED_MESSAGE'
            );
        }

        const length = view(this.payload).getUint32(this.offset);
        const start = this.offset + FIELD_LENGTH_PREFIX;
        if (length > this.payload.length - start) {
            throw new ProtocolError(
                `${this.messageName}: field "${field}" is truncated`,
                'MALFORMED_MESSAGE'
            );
        }

        this.offset = start + length;
        return this.payload.slice(start, this.offset);
    }

    /** Rejects trailing fields. */
    finish(): void {
        if (this.offset !== this.payload.length) {
            throw new ProtocolError(
                `${this.messageName}: ${this.payload.length - this.offset} trailing bytes`,
                'MALFORMED_MESSAGE'
            );
        }
    }
}

function expectFieldLength(
    message: string,
    field: string,
    value: Uint8Array,
    expected: number
): void {
    if (value.length !== expected) {
        throw new ProtocolError(
            `${message}: "${field}" must be ${expected} bytes, got ${value.length}`,
            'MALFORMED_MESSAGE'
        );
    }
}

function decodeText(message: string, field: string, value: Uint8Array): string {
    try {
        return decoder.decode(value);
    } catch (error) {
        throw new ProtocolError(
            `${message}: "${field}" is not valid UTF-8`,
            'MALFORMED_MESSAGE',
            error
        );
    }
}

// ============================================================================
// MESSAGE PAYLOADS
// ============================================================================

export function encodeClientHello(hello: ClientHello): Uint8Array {
    return encodeFields([
        encoder.encode(hello.kemAlgorithm),
        hello.publicKey,
        hello.nonce,
    ]);
}

export function decodeClientHello(payload: Uint8Array): ClientHello {
    const reader = new FieldReader(payload, 'ClientHello');
    const kemAlgorithm = decodeText(
        'ClientHello',
        'kem_algorithm',
        reader.next('kem_algorithm')
    );
    const publicKey = reader.next('kem_public_key');
    const nonce = reader.next('client_nonce');
    reader.finish();

    expectFieldLength('ClientHello', 'client_nonce', nonce, NONCE_LENGTH);
    return { kemAlgorithm, publicKey, nonce };
}

export function encodeServerHello(hello: ServerHello): Uint8Array {
    return encodeFields([hello.ciphertext, hello.nonce, hello.certificate]);
}

export function decodeServerHello(payload: Uint8Array): ServerHello {
    const reader = new FieldReader(payload, 'ServerHello');
    const ciphertext = reader.next('kem_ciphertext');
    const nonce = reader.next('server_nonce');
    const certificate = reader.next('certificate');
    reader.finish();

    expectFieldLength('ServerHello', 'server_nonce', nonce, NONCE_LENGTH);
    return { ciphertext, nonce, certificate };
}

export function encodeFinished(finished: Finished): Uint8Array {
    return encodeFields([finished.transcriptHash]);
}

export function decodeFinished(payload: Uint8Array): Finished {
    const reader = new FieldReader(payload, 'Finished');
    const transcriptHash = reader.next('transcript_hash');
    reader.finish();

    expectFieldLength(
        'Finished',
        'transcript_hash',
        transcriptHash,
        TRANSCRIPT_HASH_LENGTH
    );
    return { transcriptHash };
}

export function encodeAlert(alert: Alert): Uint8Array {
    return encodeFields([encoder.encode(alert.code)]);
}

export function decodeAlert(payload: Uint8Array): Alert {
    const reader = new FieldReader(payload, 'Alert');
    const code = decodeText('Alert', 'code', reader.next('code'));
    reader.finish();
    return { code };
}

// ============================================================================
// MESSAGES
// ============================================================================

/**
 * Asserts the message type; anything out of order is fatal.
 *
 * @throws ProtocolError (UNEXPECTED_MESSAGE)
 */
export function expectMessage(
    message: HandshakeMessage,
    expected: MessageTypeName
): void {
    if (message.type !== MESSAGE_TYPES[expected]) {
        throw new ProtocolError(
            `Expected ${expected}, got ${messageTypeName(message.type)}`,
            'UNEXPECTED_MESSAGE'
        );
    }
}

export function createAlertMessage(code: string): HandshakeMessage {
    return { type: MESSAGE_TYPES.ALERT, payload: encodeAlert({ code }) };
}

/**
 * Packages the transcript hash of a fully derived session.
 *
 * @throws StateError (KEYS_NOT_DERIVED) when any secret, nonce or key is missing
 */
export function createFinishedMessage(
    type: 'CLIENT_FINISHED' | 'SERVER_FINISHED',
    session: Partial<HandshakeSession>
): HandshakeMessage {
    const {
        clientNonce,
        serverNonce,
        sharedSecret,
        encryptionKey,
        macKey,
        iv,
    } = session;
    if (
        !clientNonce ||
        !serverNonce ||
        !sharedSecret ||
        !encryptionKey ||
        !macKey ||
        !iv
    ) {
        throw new StateError(
            `Cannot create ${type}: session keys are not derived`,
            'KEYS_NOT_DERIVED'
        );
    }

    const transcriptHash = computeTranscriptHash(
        clientNonce,
        serverNonce,
        sharedSecret
    );
    return {
        type: MESSAGE_TYPES[type],
        payload: encodeFinished({ transcriptHash }),
    };
}
