import type { Server } from 'node:http';
import { createHTTPServer } from '@trpc/server/adapters/standalone';
import type { Container } from 'src/shared/backend/container';
import { logger } from 'src/shared/backend/logger';
import type { ServerConfig } from 'src/shared/config/env';
import { appRouter } from './api-routers/app.router';
import { createTRPCContext } from './api-routers/init';

export const API_BASE_PATH = '/api/trpc/';

/** Multipart framing and form fields on top of the file itself. */
const FORM_OVERHEAD_BYTES = 64 * 1024;

/**
 * HTTP server exposing the tRPC API under /api/trpc.
 */
export function createApiServer(container: Container, config: ServerConfig): Server {
    return createHTTPServer({
        basePath: API_BASE_PATH,
        router: appRouter,
        createContext: () => createTRPCContext(container),
        maxBodySize: config.upload.maxBytes + FORM_OVERHEAD_BYTES,
        onError: ({ path, error }) => {
            if (error.code === 'INTERNAL_SERVER_ERROR') {
                logger.error({ path, err: error }, `tRPC error on '${path ?? '<no-path>'}'`);
            }
        },
    });
}
