import { afterEach, describe, expect, it, vi } from 'vitest';
import { MemoryOidcStore } from '../src/db/repository/memory.repository';
import { CodeCleanupScheduler } from '../src/utils/scheduler/code-cleanup';
import { silentLogger } from './fixtures';

const NOW = Date.UTC(2025, 5, 1, 12, 0, 0);

async function seededStore(): Promise<MemoryOidcStore> {
    const store = new MemoryOidcStore();
    const code = {
        clientId: 'demo-client',
        userId: 'user-1',
        redirectUri: 'http://localhost:8080/callback',
        scopes: ['openid'],
        authTime: NOW / 1000,
        used: false,
        createdAt: new Date(NOW - 700_000),
    };
    await store.insertAuthorizationCode({ ...code, code: 'expired', expiresAt: new Date(NOW - 100_000) });
    await store.insertAuthorizationCode({ ...code, code: 'live', expiresAt: new Date(NOW + 100_000) });
    await store.insertAccessToken({
        tokenHash: 'expired',
        userId: 'user-1',
        clientId: 'demo-client',
        scopes: ['openid'],
        expiresAt: new Date(NOW - 1),
        createdAt: new Date(NOW - 3_600_000),
    });
    return store;
}

describe('CodeCleanupScheduler', () => {
    const schedulers: CodeCleanupScheduler[] = [];

    afterEach(() => {
        for (const scheduler of schedulers.splice(0)) {
            scheduler.stop();
        }
    });

    function scheduler(store: MemoryOidcStore, enabled = true) {
        const created = new CodeCleanupScheduler(
            store,
            { enabled, schedule: '*/10 * * * *' },
            silentLogger,
            () => NOW
        );
        schedulers.push(created);
        return created;
    }

    it('deletes expired codes and tokens and reports the counts', async () => {
        const store = await seededStore();
        const report = await scheduler(store).runCleanup();

        expect(report).toEqual({
            startedAt: new Date(NOW),
            completedAt: new Date(NOW),
            authorizationCodesDeleted: 1,
            accessTokensDeleted: 1,
            errors: [],
        });
        expect(await store.findAuthorizationCode('live')).toBeDefined();
        expect(await store.findAuthorizationCode('expired')).toBeUndefined();
    });

    it('keeps going when one phase fails', async () => {
        const store = await seededStore();
        vi.spyOn(store, 'deleteExpiredAuthorizationCodes').mockRejectedValue(
            new Error('connection reset')
        );

        const report = await scheduler(store).runCleanup();

        expect(report.errors).toEqual(['authorization_codes: connection reset']);
        expect(report.authorizationCodesDeleted).toBe(0);
        expect(report.accessTokensDeleted).toBe(1);
    });

    it('starts once and stops', () => {
        const cleanup = scheduler(new MemoryOidcStore());

        cleanup.start();
        cleanup.start();
        expect(cleanup.running).toBe(true);

        cleanup.stop();
        expect(cleanup.running).toBe(false);
    });

    it('stays idle when disabled', () => {
        const cleanup = scheduler(new MemoryOidcStore(), false);
        cleanup.start();
        expect(cleanup.running).toBe(false);
    });
});
