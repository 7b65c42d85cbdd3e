import { beforeEach, describe, expect, it } from 'vitest';
import { RelyingParty } from '../src/core/oidc/client';
import type { AuthorizationServer } from '../src/core/oidc/services';
import type { TokenService } from '../src/core/token/service';
import { JWTVerificationError } from '../src/types/crypto';
import type { User } from '../src/types/oidc';
import { OidcError } from '../src/types/oidc';
import { ApiError } from '../src/utils/api/api-error';
import {
    CLIENT_ID,
    CLIENT_SECRET,
    createTestServer,
    ISSUER,
    ManualClock,
    REDIRECT_URI,
} from './fixtures';

function expectCode(run: () => unknown, code: string) {
    try {
        run();
        expect.unreachable();
    } catch (error) {
        expect(error).toMatchObject({ code });
    }
}

describe('RelyingParty', () => {
    let clock: ManualClock;
    let oidc: AuthorizationServer;
    let tokens: TokenService;
    let alice: User;
    let rp: RelyingParty;

    beforeEach(async () => {
        ({ clock, oidc, tokens, alice } = await createTestServer());
        rp = new RelyingParty({
            clientId: CLIENT_ID,
            clientSecret: CLIENT_SECRET,
            issuer: ISSUER,
            redirectUri: REDIRECT_URI,
            issuerKey: tokens.publicKey,
            clock: clock.now,
        });
    });

    /** Feeds an authorization URL to the server with alice logged in. */
    async function followAuthorizationUrl(url: string): Promise<string> {
        const params = new URL(url).searchParams;
        const outcome = await oidc.handleAuthorizationRequest({
            responseType: params.get('response_type') ?? '',
            clientId: params.get('client_id') ?? '',
            redirectUri: params.get('redirect_uri') ?? '',
            scope: params.get('scope') ?? '',
            state: params.get('state') ?? undefined,
            nonce: params.get('nonce') ?? undefined,
            sessionId: await oidc.createSession(alice.id),
        });
        if (outcome.type !== 'redirect') {
            throw new Error('Expected a redirect');
        }
        return outcome.location;
    }

    it('builds the authorization URL', () => {
        const url = new URL(rp.getAuthorizationUrl({ state: 'xyz', nonce: 'n-1' }));

        expect(`${url.origin}${url.pathname}`).toBe(`${ISSUER}/authorize`);
        expect(Object.fromEntries(url.searchParams)).toEqual({
            response_type: 'code',
            client_id: CLIENT_ID,
            redirect_uri: REDIRECT_URI,
            scope: 'openid profile email',
            state: 'xyz',
            nonce: 'n-1',
        });
        expect(rp.pendingCount).toBe(1);
    });

    it('generates state and nonce when none are given', () => {
        const first = new URL(rp.getAuthorizationUrl()).searchParams;
        const second = new URL(rp.getAuthorizationUrl()).searchParams;

        expect(first.get('state')).toMatch(/^[A-Za-z0-9_-]{43}$/);
        expect(first.get('state')).not.toBe(second.get('state'));
        expect(first.get('nonce')).not.toBe(second.get('nonce'));
    });

    it('runs the whole authorization-code flow', async () => {
        const callback = await followAuthorizationUrl(rp.getAuthorizationUrl());
        const { code, state } = rp.validateCallback(callback);
        const { request, expectedNonce } = rp.createTokenRequest(code, state);
        expect(rp.pendingCount).toBe(0);

        const response = await oidc.handleTokenRequest(request);
        const claims = rp.verifyIdToken(response.id_token, expectedNonce);

        expect(claims.sub).toBe(alice.id);
        expect(claims.nonce).toBe(expectedNonce);
        expect(claims.email).toBe('alice@example.com');
    });

    describe('validateCallback', () => {
        it('raises the error the server redirected with', () => {
            rp.getAuthorizationUrl({ state: 'xyz' });
            const callback = `${REDIRECT_URI}?error=invalid_scope&error_description=Scope+must+include+%27openid%27&state=xyz`;

            try {
                rp.validateCallback(callback);
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(ApiError);
                expect(error).toMatchObject({
                    code: 'AUTHORIZATION_ERROR',
                    message: "Authorization error: invalid_scope - Scope must include 'openid'",
                    data: {
                        error: 'invalid_scope',
                        error_description: "Scope must include 'openid'",
                    },
                });
            }
        });

        it('requires code and a known state', () => {
            rp.getAuthorizationUrl({ state: 'xyz' });

            expectCode(() => rp.validateCallback(`${REDIRECT_URI}?state=xyz`), 'MISSING_CODE');
            expectCode(() => rp.validateCallback(`${REDIRECT_URI}?code=abc`), 'MISSING_STATE');
            expect(() => rp.validateCallback(`${REDIRECT_URI}?code=abc&state=other`)).toThrow(
                'Unknown state'
            );
            expect(rp.validateCallback(`${REDIRECT_URI}?code=abc&state=xyz`)).toEqual({
                code: 'abc',
                state: 'xyz',
            });
        });
    });

    it('uses each state for one token request only', () => {
        rp.getAuthorizationUrl({ state: 'xyz', nonce: 'n-1' });
        expect(rp.createTokenRequest('abc', 'xyz')).toEqual({
            request: {
                grantType: 'authorization_code',
                code: 'abc',
                redirectUri: REDIRECT_URI,
                clientId: CLIENT_ID,
                clientSecret: CLIENT_SECRET,
            },
            expectedNonce: 'n-1',
        });
        expectCode(() => rp.createTokenRequest('abc', 'xyz'), 'INVALID_STATE');
    });

    describe('pending authorizations', () => {
        it('forgets a state once its URL has outlived the pending TTL', () => {
            rp.getAuthorizationUrl({ state: 'xyz' });

            clock.advance(600);
            expect(rp.validateCallback(`${REDIRECT_URI}?code=abc&state=xyz`).state).toBe('xyz');

            clock.advance(1);
            expectCode(() => rp.validateCallback(`${REDIRECT_URI}?code=abc&state=xyz`), 'INVALID_STATE');
            expect(rp.pendingCount).toBe(0);
        });

        it('drops the oldest state beyond the cap', () => {
            const capped = new RelyingParty({
                clientId: CLIENT_ID,
                clientSecret: CLIENT_SECRET,
                issuer: ISSUER,
                redirectUri: REDIRECT_URI,
                issuerKey: tokens.publicKey,
                clock: clock.now,
                maxPending: 2,
            });
            capped.getAuthorizationUrl({ state: 's-1' });
            capped.getAuthorizationUrl({ state: 's-2' });
            capped.getAuthorizationUrl({ state: 's-3' });

            expect(capped.pendingCount).toBe(2);
            expectCode(() => capped.createTokenRequest('abc', 's-1'), 'INVALID_STATE');
            expect(capped.createTokenRequest('abc', 's-3').request.code).toBe('abc');
        });
    });

    describe('verifyIdToken', () => {
        it('rejects a nonce mismatch', () => {
            const token = tokens.createIdToken({ subject: alice.id, audience: CLIENT_ID, nonce: 'n-1' });

            expect(() => rp.verifyIdToken(token, 'n-2')).toThrow(OidcError);
            expect(rp.verifyIdToken(token).nonce).toBe('n-1');
        });

        it('rejects tokens for another audience or after expiry', () => {
            const foreign = tokens.createIdToken({ subject: alice.id, audience: 'other-client' });
            expectCode(() => rp.verifyIdToken(foreign), 'INVALID_AUDIENCE');

            const token = tokens.createIdToken({ subject: alice.id, audience: CLIENT_ID });
            clock.advance(3601);
            expect(() => rp.verifyIdToken(token)).toThrow(JWTVerificationError);
        });
    });
});
