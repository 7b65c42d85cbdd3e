import { describe, expect, it } from 'vitest';
import { createServices, seedRegistry } from '../src/bootstrap';
import { ConfigLoader } from '../src/config/loader';
import { MemoryOidcStore } from '../src/db/repository/memory.repository';
import { PASSWORD, REDIRECT_URI, silentLogger } from './fixtures';

describe('bootstrap', () => {
    const config = new ConfigLoader({
        env: { OIDC_ISSUER: 'https://auth.example', SIGNING_ALGORITHM: 'ML-DSA-65' },
        logger: silentLogger,
    }).load();

    it('wires the in-memory store without a health probe', () => {
        const services = createServices(config, silentLogger);

        expect(services.store).toBeInstanceOf(MemoryOidcStore);
        expect(services.healthCheck).toBeUndefined();
        expect(services.tokens.algorithm).toBe('ML-DSA-65');
        expect(services.oidc.getDiscoveryDocument().issuer).toBe('https://auth.example');
    });

    it('seeds clients and users and skips users that exist', async () => {
        const { oidc } = createServices(config, silentLogger);
        const registry = {
            ...config.oidc,
            clients: [{ clientId: 'demo-client', clientSecret: 'test-secret', redirectUris: [REDIRECT_URI] }],
            users: [{ username: 'alice', password: PASSWORD, email: 'alice@example.com', name: 'Alice Example' }],
        };

        expect(await seedRegistry(oidc, registry, silentLogger)).toEqual({ clients: 1, users: 1 });
        expect(await seedRegistry(oidc, registry, silentLogger)).toEqual({ clients: 1, users: 0 });
        expect(await oidc.authenticate('alice', PASSWORD)).toBeDefined();
    });
});
