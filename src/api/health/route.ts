import type { FastifyInstance, FastifyReply } from 'fastify';

export function healthRoute(app: FastifyInstance) {
    app.get('/', async (_, res: FastifyReply) => {
        const check = app.deps.healthCheck;
        const storage = check ? await check() : true;

        res.status(storage ? 200 : 503).send({
            success: storage,
            health: storage ? 'ok' : 'degraded',
            storage: storage ? 'ok' : 'unavailable',
        });
    });
}
