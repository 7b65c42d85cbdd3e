import type { FastifyReply, FastifyRequest } from 'fastify';
import { OidcError, type UserInfoResponse } from '../types/oidc';
import { ApiResponse } from '../utils/api/api-response';

declare module 'fastify' {
    interface FastifyRequest {
        userInfo?: UserInfoResponse;
    }
}

/**
 * Gets the bearer token from the Authorization header
 * @param req - The Fastify request object
 * @returns The token, if the header carries one
 */
const getTokenFromRequest = (req: FastifyRequest) => {
    const [scheme, token] = req.headers.authorization?.split(' ') ?? [];
    return scheme?.toLowerCase() === 'bearer' && token ? token : undefined;
};

/**
 * Resolves the access token into the claims its scope allows and stores
 * them on `req.userInfo`.
 */
export function authenticate() {
    return async (req: FastifyRequest, res: FastifyReply) => {
        try {
            const token = getTokenFromRequest(req);
            if (!token) {
                return ApiResponse.oauthError(res, new OidcError('invalid_token'));
            }

            req.userInfo = await req.server.deps.oidc.handleUserInfoRequest(token);
        } catch (error) {
            return ApiResponse.handleError(res, error);
        }
    };
}
