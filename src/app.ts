import fastify, {
    type FastifyBaseLogger,
    type FastifyInstance,
} from 'fastify';
import { routes } from './api';
import { appInfo } from './config';
import { plugins, type AppDependencies } from './plugins';
import { logger as defaultLogger, type Logger } from './utils/logger';

export interface BuildAppOptions {
    logger?: Logger;
}

/**
 * Builds the HTTP application around already constructed services. Nothing
 * here touches storage or starts schedulers.
 */
export function buildApp(
    deps: AppDependencies,
    options: BuildAppOptions = {}
): FastifyInstance {
    const loggerInstance: FastifyBaseLogger = options.logger ?? defaultLogger;
    const app = fastify({
        loggerInstance,
        ignoreTrailingSlash: true,
        requestTimeout: 30000,
        connectionTimeout: 10000,
        keepAliveTimeout: 72000,
        bodyLimit: 1024 * 1024,
        maxParamLength: 500,
        trustProxy: appInfo.isProduction,
        disableRequestLogging: appInfo.isProduction,
    });

    plugins(app, deps);
    app.register(routes);

    return app;
}
