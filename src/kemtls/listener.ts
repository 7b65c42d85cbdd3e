import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';
import type { Duplex } from 'node:stream';

import type { Logger } from '../utils/logger';
import { performServerHandshake, StreamChannel } from './handshake';
import type { KemTlsServerIdentity } from './server';

export interface KemTlsListenerOptions {
    host: string;
    port: number;
    /** Connections that have not finished the handshake by then are dropped */
    handshakeTimeoutMs: number;
    identity: KemTlsServerIdentity;
    logger: Logger;
}

/**
 * TCP endpoint running the responder handshake on every connection, then
 * closing it. Application data after the handshake is not carried.
 */
export class KemTlsListener {
    private server: Server | undefined;
    private readonly sockets = new Set<Socket>();
    private readonly log: Logger;

    constructor(private readonly options: KemTlsListenerOptions) {
        this.log = options.logger.child({ module: 'kemtls-listener' });
    }

    async start(): Promise<AddressInfo> {
        if (this.server) {
            throw new Error('KEMTLS listener already started');
        }

        const server = createServer((socket) => this.onConnection(socket));
        this.server = server;

        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(this.options.port, this.options.host, () => {
                server.off('error', reject);
                resolve();
            });
        });

        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('KEMTLS listener is not bound to a TCP port');
        }

        this.log.info(
            {
                host: address.address,
                port: address.port,
                kem: this.options.identity.kemAlgorithm,
                subject: this.options.identity.certificate.subject,
            },
            'KEMTLS listener started'
        );
        return address;
    }

    async stop(): Promise<void> {
        const server = this.server;
        if (!server) {
            return;
        }
        this.server = undefined;

        for (const socket of this.sockets) {
            socket.destroy();
        }
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
        this.log.info('KEMTLS listener stopped');
    }

    /**
     * Runs one responder handshake over the stream and ends it.
     *
     * @returns whether the handshake completed
     */
    async serve(stream: Duplex, remote = 'stream'): Promise<boolean> {
        const channel = new StreamChannel(stream);
        try {
            const session = await performServerHandshake(
                channel,
                this.options.identity.accept(),
                this.log
            );
            this.log.info(
                {
                    remote,
                    kem: this.options.identity.kemAlgorithm,
                    sharedSecretBytes: session.sharedSecret.length,
                },
                'KEMTLS handshake complete'
            );
            return true;
        } catch (error) {
            this.log.warn({ err: error, remote }, 'KEMTLS handshake failed');
            return false;
        } finally {
            channel.detach();
            stream.end();
        }
    }

    private onConnection(socket: Socket): void {
        const remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
        this.sockets.add(socket);
        socket.once('close', () => this.sockets.delete(socket));
        // Stays attached after the channel detaches: resets and timeouts land here
        socket.on('error', (error) => {
            this.log.debug({ err: error, remote }, 'KEMTLS connection error');
        });
        socket.setTimeout(this.options.handshakeTimeoutMs, () => {
            socket.destroy(new Error('Handshake timed out'));
        });

        this.serve(socket, remote)
            .catch((error: unknown) => {
                this.log.error({ err: error, remote }, 'KEMTLS connection handler failed');
            })
            .finally(() => {
                socket.setTimeout(0);
                socket.destroySoon();
            });
    }
}
