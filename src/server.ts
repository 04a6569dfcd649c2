/**
 * Server - HTTP entry point.
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { AppContainer } from './AppContainer.js';
import { loadConfig } from './infrastructure/config/AppConfig.js';
import { ConsoleLogger } from './infrastructure/observability/Logger.js';

async function main(): Promise<void> {
    const config = loadConfig();

    // Composition Root
    const container = await AppContainer.create(config);
    const { logger } = container;

    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
        container.appRouter.handle(req, res).catch((error: unknown) => {
            logger.error('Request pipeline failed', error instanceof Error ? error : undefined);
        });
    });

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        server.close(() => process.exit(0));
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    const activityCount = await container.activityRepository.count();
    server.listen(config.port, config.host, () => {
        logger.info(`Activities API listening on http://${config.host}:${config.port}`, {
            activities: activityCount,
        });
    });
}

main().catch((error: unknown) => {
    new ConsoleLogger({ service: 'mergington-activities' }).error(
        'Failed to start server',
        error instanceof Error ? error : new Error(String(error))
    );
    process.exit(1);
});
