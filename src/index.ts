import { buildApp } from './app';
import { createServices, seedRegistry } from './bootstrap';
import { appInfo, configLoader } from './config';
import { KemTlsListener, KemTlsServerIdentity } from './kemtls';
import { createLogger } from './utils/logger';
import { CodeCleanupScheduler } from './utils/scheduler/code-cleanup';

async function main() {
    const config = configLoader.load();
    const logger = createLogger(config.logging);

    try {
        logger.info(
            {
                environment: appInfo.environment,
                server: `${config.server.host}:${config.server.port}`,
                publicUrl: config.server.publicUrl ?? 'not set',
                issuer: config.oidc.issuer,
                signingAlgorithm: config.oidc.signingAlgorithm,
                storage: config.storage.driver,
                kemtls: config.kemtls.enabled ? 'enabled' : 'disabled',
                cleanup: config.cleanup.enabled ? 'enabled' : 'disabled',
            },
            'Configuration loaded'
        );

        const services = createServices(config, logger);

        if (services.healthCheck && !(await services.healthCheck())) {
            logger.fatal('Database not healthy');
            process.exit(1);
        }

        const seeded = await seedRegistry(services.oidc, config.oidc, logger);
        logger.info(seeded, 'Registry seeded');

        const app = buildApp(
            {
                oidc: services.oidc,
                tokens: services.tokens,
                sessionCookieName: config.oidc.sessionCookieName,
                secureCookies: config.oidc.issuer.startsWith('https://'),
                ...(services.healthCheck && { healthCheck: services.healthCheck }),
            },
            { logger }
        );

        const cleanup = new CodeCleanupScheduler(
            services.store,
            config.cleanup,
            logger
        );

        const listener = config.kemtls.enabled
            ? new KemTlsListener({
                  host: config.kemtls.host,
                  port: config.kemtls.port,
                  handshakeTimeoutMs: config.kemtls.handshakeTimeout * 1000,
                  identity: KemTlsServerIdentity.create({
                      subject: config.kemtls.serverName,
                      kemAlgorithm: config.kemtls.kemAlgorithm,
                      signatureAlgorithm: config.kemtls.signatureAlgorithm,
                      logger,
                  }),
                  logger,
              })
            : undefined;

        const shutdown = async (signal: string) => {
            logger.info(`Received ${signal}. Shutting down...`);
            try {
                cleanup.stop();
                await listener?.stop();
                await app.close();
                await services.store.close();
                logger.info('Graceful shutdown completed');
                process.exit(0);
            } catch (error) {
                logger.error({ err: error }, 'Error during shutdown');
                process.exit(1);
            }
        };

        await app.listen({ port: config.server.port, host: config.server.host });
        cleanup.start();
        await listener?.start();

        logger.info(
            {
                discovery: `${config.oidc.issuer.replace(/\/+$/, '')}/.well-known/openid-configuration`,
            },
            'Identity provider is running'
        );

        process.on('SIGINT', (signal) => void shutdown(signal));
        process.on('SIGTERM', (signal) => void shutdown(signal));
        process.on('uncaughtException', (err) => {
            logger.fatal(err);
            process.exit(1);
        });
    } catch (error) {
        logger.fatal({ err: error }, 'Failed to start application');
        process.exit(1);
    }
}

main().catch((error: unknown) => {
    console.error('Failed to start application:', error);
    process.exit(1);
});
