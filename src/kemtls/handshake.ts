/**
 * @fileoverview Transport-agnostic handshake drivers and a Node stream channel.
 * @module kemtls/handshake
 */

import type { Duplex } from 'node:stream';

import { MESSAGE_TYPES } from '../constants/kemtls';
import type { HandshakeMessage, HandshakeSession } from '../types/kemtls';
import { KemTlsError, ProtocolError } from '../types/kemtls';
import type { Logger } from '../utils/logger';
import { logger as defaultLogger } from '../utils/logger';
import type { KemTlsClient } from './client';
import {
    createAlertMessage,
    decodeAlert,
    encodeFrame,
    FrameDecoder,
} from './protocol';
import type { KemTlsServerHandshake } from './server';

/**
 * Ordered, reliable message transport. Timeouts are the channel's concern.
 */
export interface HandshakeChannel {
    send(message: HandshakeMessage): Promise<void>;
    receive(): Promise<HandshakeMessage>;
}

// ============================================================================
// STREAM CHANNEL
// ============================================================================

interface PendingReceive {
    resolve: (message: HandshakeMessage) => void;
    reject: (error: Error) => void;
}

/**
 * Frames handshake messages over a Node `Duplex` (a socket, or a
 * PassThrough pair in tests).
 */
export class StreamChannel implements HandshakeChannel {
    private readonly decoder = new FrameDecoder();
    private readonly inbox: HandshakeMessage[] = [];
    private readonly waiting: PendingReceive[] = [];
    private failure: Error | undefined;

    private readonly onData = (chunk: Uint8Array) => {
        try {
            this.inbox.push(...this.decoder.push(chunk));
            this.flush();
        } catch (error) {
            this.fail(
                error instanceof Error
                    ? error
                    : new ProtocolError('Undecodable frame', 'MALFORMED_MESSAGE', error)
            );
        }
    };

    private readonly onEnd = () => {
        this.fail(new ProtocolError('Connection closed by peer', 'CONNECTION_CLOSED'));
    };

    private readonly onError = (error: Error) => {
        this.fail(
            new ProtocolError('Connection failed', 'CONNECTION_CLOSED', error)
        );
    };

    constructor(private readonly stream: Duplex) {
        stream.on('data', this.onData);
        stream.on('end', this.onEnd);
        stream.on('close', this.onEnd);
        stream.on('error', this.onError);
    }

    send(message: HandshakeMessage): Promise<void> {
        const frame = encodeFrame(message);
        return new Promise((resolve, reject) => {
            this.stream.write(frame, (error) => {
                if (error) {
                    reject(
                        new ProtocolError('Write failed', 'CONNECTION_CLOSED', error)
                    );
                } else {
                    resolve();
                }
            });
        });
    }

    receive(): Promise<HandshakeMessage> {
        const next = this.inbox.shift();
        if (next) {
            return Promise.resolve(next);
        }
        if (this.failure) {
            return Promise.reject(this.failure);
        }
        return new Promise((resolve, reject) => {
            this.waiting.push({ resolve, reject });
        });
    }

    /** Stops listening; the stream itself stays open. */
    detach(): void {
        this.stream.off('data', this.onData);
        this.stream.off('end', this.onEnd);
        this.stream.off('close', this.onEnd);
        this.stream.off('error', this.onError);
    }

    private flush(): void {
        while (this.inbox.length > 0) {
            const waiter = this.waiting.shift();
            const message = this.inbox.shift();
            if (!waiter || !message) {
                if (message) {
                    this.inbox.unshift(message);
                }
                return;
            }
            waiter.resolve(message);
        }
    }

    private fail(error: Error): void {
        if (this.failure) {
            return;
        }
        this.failure = error;
        for (const waiter of this.waiting.splice(0)) {
            waiter.reject(error);
        }
    }
}

// ============================================================================
// DRIVERS
// ============================================================================

/** Receives the next message, surfacing a peer ALERT as an error. */
async function receiveMessage(
    channel: HandshakeChannel
): Promise<HandshakeMessage> {
    const message = await channel.receive();
    if (message.type === MESSAGE_TYPES.ALERT) {
        const { code } = decodeAlert(message.payload);
        throw new ProtocolError(`Peer aborted the handshake: ${code}`, 'PEER_ALERT');
    }
    return message;
}

/**
 * Tells the peer why the handshake stopped. Skipped when the peer already
 * did so or the connection is gone.
 */
async function sendAlert(
    channel: HandshakeChannel,
    error: unknown,
    log: Logger
): Promise<void> {
    if (
        error instanceof ProtocolError &&
        (error.code === 'PEER_ALERT' || error.code === 'CONNECTION_CLOSED')
    ) {
        return;
    }

    const code = error instanceof KemTlsError ? error.code : 'INTERNAL_ERROR';
    try {
        await channel.send(createAlertMessage(code));
    } catch (sendError) {
        log.debug({ err: sendError, code }, 'Could not deliver alert');
    }
}

/**
 * Runs the initiator side: ClientHello, ServerHello, ServerFinished,
 * ClientFinished.
 *
 * @throws KemTlsError (or UnsupportedAlgorithmError) after alerting the peer
 */
export async function performClientHandshake(
    channel: HandshakeChannel,
    client: KemTlsClient,
    log: Logger = defaultLogger
): Promise<HandshakeSession> {
    try {
        await channel.send(client.createClientHello());
        client.handleServerHello(await receiveMessage(channel));
        client.handleServerFinished(await receiveMessage(channel));
        await channel.send(client.createClientFinished());
        return client.getSession();
    } catch (error) {
        client.abort(error);
        await sendAlert(channel, error, log);
        throw error;
    }
}

/**
 * Runs the responder side for one accepted connection.
 *
 * @throws KemTlsError after alerting the peer
 */
export async function performServerHandshake(
    channel: HandshakeChannel,
    handshake: KemTlsServerHandshake,
    log: Logger = defaultLogger
): Promise<HandshakeSession> {
    try {
        const hello = handshake.handleClientHello(await receiveMessage(channel));
        await channel.send(handshake.createServerHello(hello.publicKey));
        await channel.send(handshake.createServerFinished());
        handshake.handleClientFinished(await receiveMessage(channel));
        return handshake.getSession();
    } catch (error) {
        handshake.abort(error);
        await sendAlert(channel, error, log);
        throw error;
    }
}
