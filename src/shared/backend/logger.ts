import pino from 'pino';
import { getServerConfig } from 'src/shared/config/env';

const config = getServerConfig();

/**
 * Process-wide structured logger.
 * Call as `logger.info({ ...fields }, 'message')`. Never pass matched PII values in fields.
 */
export const logger = pino({
    level: config.logLevel,
    base: { service: 'document-pii-masker' },
    timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
