import type { FastifyReply, FastifyRequest } from 'fastify';
import { OidcError } from '../../types/oidc';
import { ApiResponse } from '../../utils/api/api-response';
import { schema } from './schema';

function sessionCookie(req: FastifyRequest): string | undefined {
    return req.cookies[req.server.deps.sessionCookieName];
}

export async function login(req: FastifyRequest, res: FastifyReply) {
    try {
        const { oidc, sessionCookieName, secureCookies } = req.server.deps;
        const { username, password } = schema.login.body.parse(req.body);

        const userId = await oidc.authenticate(username, password);
        if (!userId) {
            return ApiResponse.unauthorized(
                res,
                'Invalid username or password',
                'INVALID_CREDENTIALS'
            );
        }

        const sessionId = await oidc.createSession(userId);
        res.setCookie(sessionCookieName, sessionId, {
            path: '/',
            httpOnly: true,
            sameSite: 'lax',
            secure: secureCookies,
        });
        return ApiResponse.success(res, { userId }, 'Logged in');
    } catch (e) {
        return ApiResponse.handleError(res, e);
    }
}

export async function logout(req: FastifyRequest, res: FastifyReply) {
    try {
        const { oidc, sessionCookieName } = req.server.deps;
        const sessionId = sessionCookie(req);
        const ended = sessionId ? await oidc.endSession(sessionId) : false;

        res.clearCookie(sessionCookieName, { path: '/' });
        return ApiResponse.success(res, { ended }, 'Logged out');
    } catch (e) {
        return ApiResponse.handleError(res, e);
    }
}

export async function authorize(req: FastifyRequest, res: FastifyReply) {
    try {
        const parsed = schema.authorize.querystring.safeParse(req.query);
        if (!parsed.success) {
            throw new OidcError('invalid_request');
        }
        const query = parsed.data;
        const sessionId = sessionCookie(req);

        const outcome = await req.server.deps.oidc.handleAuthorizationRequest({
            responseType: query.response_type,
            clientId: query.client_id,
            redirectUri: query.redirect_uri,
            scope: query.scope,
            ...(query.state !== undefined && { state: query.state }),
            ...(query.nonce !== undefined && { nonce: query.nonce }),
            ...(sessionId !== undefined && { sessionId }),
        });

        if (outcome.type === 'login_required') {
            return ApiResponse.unauthorized(res, 'Login required', 'LOGIN_REQUIRED');
        }
        return ApiResponse.redirect(res, outcome.location);
    } catch (e) {
        return ApiResponse.handleError(res, e);
    }
}

export async function token(req: FastifyRequest, res: FastifyReply) {
    try {
        const parsed = schema.token.body.safeParse(req.body);
        if (!parsed.success) {
            throw new OidcError('invalid_request');
        }
        const body = parsed.data;

        const tokens = await req.server.deps.oidc.handleTokenRequest({
            grantType: body.grant_type,
            code: body.code,
            redirectUri: body.redirect_uri,
            clientId: body.client_id,
            clientSecret: body.client_secret,
        });

        return res
            .header('Cache-Control', 'no-store')
            .header('Pragma', 'no-cache')
            .send(tokens);
    } catch (e) {
        return ApiResponse.handleError(res, e);
    }
}

export async function userinfo(req: FastifyRequest, res: FastifyReply) {
    if (!req.userInfo) {
        return ApiResponse.oauthError(res, new OidcError('invalid_token'));
    }
    return res.send(req.userInfo);
}
