import type { FastifyInstance } from 'fastify';
import { authenticate } from '../../middlewares/auth';
import * as ctrl from './controllers';

export function oidcRoutes(app: FastifyInstance) {
    app.post('/login', ctrl.login);
    app.post('/logout', ctrl.logout);

    app.get('/authorize', ctrl.authorize);
    app.post('/token', ctrl.token);

    app.get('/userinfo', { preHandler: authenticate() }, ctrl.userinfo);
}
