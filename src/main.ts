import { createApiServer, API_BASE_PATH } from 'src/app/server';
import { createBackendContainer } from 'src/shared/backend/container';
import { logger } from 'src/shared/backend/logger';
import { getServerConfig } from 'src/shared/config/env';

const config = getServerConfig();
const server = createApiServer(createBackendContainer(config), config);

server.listen(config.http.port, config.http.host, () => {
    logger.info(
        { host: config.http.host, port: config.http.port, basePath: API_BASE_PATH, nodeEnv: config.nodeEnv },
        'Document PII masker listening',
    );
});

function shutdown(signal: NodeJS.Signals): void {
    logger.info({ signal }, 'Shutting down');
    server.close((error) => {
        if (error) {
            logger.error({ err: error }, 'Server close failed');
            process.exitCode = 1;
        }
    });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
