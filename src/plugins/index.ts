import cookie from '@fastify/cookie';
import type { FastifyInstance } from 'fastify';
import type { AuthorizationServer } from '../core/oidc/services';
import type { TokenService } from '../core/token/service';

/** Services the routes reach through `app.deps`. */
export interface AppDependencies {
    oidc: AuthorizationServer;
    tokens: TokenService;
    sessionCookieName: string;
    /** Sets the `Secure` flag on the session cookie */
    secureCookies: boolean;
    /** Storage probe for `/health`; absent for the in-memory store */
    healthCheck?: () => Promise<boolean>;
}

declare module 'fastify' {
    interface FastifyInstance {
        deps: AppDependencies;
    }
}

export function plugins(app: FastifyInstance, deps: AppDependencies) {
    app.decorate('deps', deps);
    app.register(cookie);
}
