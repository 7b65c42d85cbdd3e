import type { FastifyInstance, FastifyReply } from 'fastify';
import { healthRoute } from './health/route';
import { oidcRoutes } from './oidc/route';

export function routes(app: FastifyInstance) {
    app.get('/.well-known/openid-configuration', async () => {
        return app.deps.oidc.getDiscoveryDocument();
    });

    app.get('/.well-known/jwks.json', async (_, reply: FastifyReply) => {
        // Cache for 1 hour to reduce load
        reply.header('Cache-Control', 'public, max-age=3600');

        return app.deps.tokens.jwks;
    });

    app.register(healthRoute, { prefix: 'health' });
    app.register(oidcRoutes);
}
