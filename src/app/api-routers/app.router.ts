import { createTRPCRouter, publicProcedure } from './init';
import { redactionRouter } from './redaction.router';
import { DOCUMENT_FORMATS } from 'src/shared/backend/extraction';
import { PII_CATEGORIES } from 'src/shared/backend/pii-detection';

/**
 * Root tRPC router
 * Combines all sub-routers
 */
export const appRouter = createTRPCRouter({
    health: publicProcedure.query(() => ({
        status: 'ok' as const,
        formats: [...DOCUMENT_FORMATS],
        categories: [...PII_CATEGORIES],
    })),
    redaction: redactionRouter,
});

export type AppRouter = typeof appRouter;
