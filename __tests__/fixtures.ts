import pino from 'pino';
import { AuthorizationServer } from '../src/core/oidc/services';
import { TokenService } from '../src/core/token/service';
import { MemoryOidcStore } from '../src/db/repository/memory.repository';

export const ISSUER = 'https://auth.example';
export const CLIENT_ID = 'demo-client';
export const CLIENT_SECRET = 'test-secret';
export const REDIRECT_URI = 'http://localhost:8080/callback';
export const PASSWORD = 'test-password';

export const silentLogger = pino({ level: 'silent' });

/** Millisecond clock that tests move by hand. */
export class ManualClock {
    constructor(public current = Date.UTC(2025, 5, 1, 12, 0, 0)) {}

    now = (): number => this.current;

    advance(seconds: number): void {
        this.current += seconds * 1000;
    }
}

/**
 * Authorization server over an in-memory store, with one client and the
 * user alice already registered.
 */
export async function createTestServer(clock = new ManualClock()) {
    const store = new MemoryOidcStore();
    const tokens = new TokenService({
        issuer: ISSUER,
        algorithm: 'ML-DSA-44',
        idTokenTTL: 3600,
        clock: clock.now,
    });
    const oidc = new AuthorizationServer({
        store,
        tokens,
        settings: {
            issuer: ISSUER,
            authorizationCodeTTL: 600,
            accessTokenTTL: 3600,
        },
        clock: clock.now,
        logger: silentLogger,
    });

    await oidc.registerClient({
        clientId: CLIENT_ID,
        clientSecret: CLIENT_SECRET,
        name: 'Demo Client',
        redirectUris: [REDIRECT_URI],
    });
    const alice = await oidc.registerUser({
        username: 'alice',
        password: PASSWORD,
        email: 'alice@example.com',
        name: 'Alice Example',
        givenName: 'Alice',
        familyName: 'Example',
    });

    return { clock, store, tokens, oidc, alice };
}
