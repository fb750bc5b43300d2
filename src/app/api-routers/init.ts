import { randomUUID } from 'node:crypto';
import { initTRPC } from '@trpc/server';
import { getBackendContainer, type Container } from 'src/shared/backend/container';
import { logger } from 'src/shared/backend/logger';
import { isDomainError, toTRPCError } from './errors';

export type TRPCContext = {
    container: Container;
    requestId: string;
};

export function createTRPCContext(container: Container = getBackendContainer()): TRPCContext {
    return { container, requestId: randomUUID() };
}

const t = initTRPC.context<TRPCContext>().create({
    errorFormatter({ shape, error }) {
        return {
            ...shape,
            data: {
                ...shape.data,
                domainCode: isDomainError(error.cause) ? error.cause.code : null,
            },
        };
    },
});

/**
 * Logs every call and turns use-case errors into typed tRPC errors.
 * Anything else stays an INTERNAL_SERVER_ERROR.
 */
const requestLifecycle = t.middleware(async ({ ctx, path, type, next }) => {
    const startTime = Date.now();
    const result = await next();
    const latencyMs = Date.now() - startTime;

    if (result.ok) {
        logger.info({ requestId: ctx.requestId, path, type, latencyMs }, 'Request completed');
        return result;
    }

    const { cause } = result.error;
    if (isDomainError(cause)) {
        logger.warn({ requestId: ctx.requestId, path, code: cause.code, latencyMs }, cause.message);
        throw toTRPCError(cause);
    }

    if (result.error.code === 'INTERNAL_SERVER_ERROR') {
        logger.error({ requestId: ctx.requestId, path, err: result.error, latencyMs }, 'Request failed');
    } else {
        logger.warn({ requestId: ctx.requestId, path, code: result.error.code, latencyMs }, result.error.message);
    }
    return result;
});

export const createTRPCRouter = t.router;
export const createCallerFactory = t.createCallerFactory;
export const publicProcedure = t.procedure.use(requestLifecycle);
