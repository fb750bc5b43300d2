import { z } from 'zod';

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
const nodeEnvSchema = z.enum(['development', 'production', 'test']);

const DEFAULT_PORT = 5_000;
const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

const rawServerEnvSchema = z.object({
    NODE_ENV: z.string().optional(),
    LOG_LEVEL: z.string().optional(),
    HOST: z.string().trim().min(1, 'HOST cannot be empty').optional(),
    PORT: z.coerce.number().int().min(1).max(65_535, 'PORT must be between 1 and 65535').optional(),
    MAX_UPLOAD_BYTES: z.coerce.number().int().positive('MAX_UPLOAD_BYTES must be a positive integer').optional(),
});

const serverEnvSchema = rawServerEnvSchema.transform((raw): ServerConfig => {
    const nodeEnv = nodeEnvSchema.catch('development').parse(raw.NODE_ENV ?? 'development');
    const defaultLevel = nodeEnv === 'development' ? 'debug' : nodeEnv === 'test' ? 'silent' : 'info';
    const logLevel = logLevelSchema.catch(defaultLevel).parse(raw.LOG_LEVEL);

    return {
        nodeEnv,
        logLevel,
        http: {
            host: raw.HOST ?? '127.0.0.1',
            port: raw.PORT ?? DEFAULT_PORT,
        },
        upload: {
            maxBytes: raw.MAX_UPLOAD_BYTES ?? DEFAULT_MAX_UPLOAD_BYTES,
        },
    };
});

export type ServerConfig = {
    nodeEnv: 'development' | 'production' | 'test';
    logLevel: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
    http: { host: string; port: number };
    upload: { maxBytes: number };
};

type RawEnv = Record<string, string | undefined>;

function getRawEnv(): RawEnv {
    return {
        NODE_ENV: process.env.NODE_ENV,
        LOG_LEVEL: process.env.LOG_LEVEL,
        HOST: process.env.HOST,
        PORT: process.env.PORT,
        MAX_UPLOAD_BYTES: process.env.MAX_UPLOAD_BYTES,
    };
}

export function parseServerConfig(raw: RawEnv): ServerConfig {
    const parsed = serverEnvSchema.safeParse(raw);
    if (!parsed.success) {
        const message = parsed.error.issues[0]?.message ?? parsed.error.message;
        throw new Error(`Server config validation failed: ${message}`);
    }
    return parsed.data;
}

let cached: ServerConfig | null = null;

export function getServerConfig(): ServerConfig {
    if (cached) return cached;
    cached = parseServerConfig(getRawEnv());
    return cached;
}
