import type { Logger } from '../utils/logger';
import { logger as defaultLogger } from '../utils/logger';
import { StateError } from '../types/kemtls';

type Terminal = 'START' | 'ABORTED';

/**
 * Per-connection handshake state. Steps run only from their expected state;
 * any failure, including a step called out of order, aborts the handshake
 * for good.
 */
export abstract class HandshakeStateMachine<S extends string> {
    private current: S | Terminal = 'START';
    protected readonly log: Logger;

    protected constructor(role: 'client' | 'server', log?: Logger) {
        this.log = (log ?? defaultLogger).child({ module: 'kemtls', role });
    }

    get state(): S | Terminal {
        return this.current;
    }

    protected step<T>(
        name: string,
        from: S | 'START',
        to: S,
        run: () => T
    ): T {
        if (this.current === 'ABORTED') {
            throw new StateError(
                `Cannot ${name}: handshake aborted`,
                'ABORTED'
            );
        }
        if (this.current !== from) {
            const error = new StateError(
                `Cannot ${name} in state ${this.current}`,
                'INVALID_STATE'
            );
            this.abort(error);
            throw error;
        }

        try {
            const result = run();
            this.current = to;
            return result;
        } catch (error) {
            this.abort(error);
            throw error;
        }
    }

    /** Moves to ABORTED and discards secret material. Idempotent. */
    abort(reason?: unknown): void {
        if (this.current === 'ABORTED') {
            return;
        }
        this.log.debug({ err: reason, state: this.current }, 'Handshake aborted');
        this.current = 'ABORTED';
        this.discardSecrets();
    }

    protected abstract discardSecrets(): void;
}
