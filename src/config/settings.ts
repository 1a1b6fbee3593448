// src/config/settings.ts

import { z } from 'zod';
import { LogLevel } from '../utils/logger';

// Planning horizon accepted by the HTTP layer; the engine itself takes any positive integer
export const HORIZON_MIN_DAYS = 30;
export const HORIZON_MAX_DAYS = 365;
export const HORIZON_DEFAULT_DAYS = 180;

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    CORS_ORIGIN: z.string().min(1).default('*'),
    PARAMETERS_CSV: z.string().min(1).default('hospital_parameters.csv'),
    UPLOAD_LIMIT_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    LOG_LEVEL: z.enum(['info', 'warn', 'error', 'silent']).default('info')
});

export interface Settings {
    port: number;
    corsOrigin: string;
    parametersCsvPath: string;
    uploadLimitBytes: number;
    logLevel: LogLevel;
}

/**
 * Read service settings from environment variables
 *
 * Throws a ZodError naming every bad variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = envSchema.parse(env);

    return {
        port: parsed.PORT,
        corsOrigin: parsed.CORS_ORIGIN,
        parametersCsvPath: parsed.PARAMETERS_CSV,
        uploadLimitBytes: parsed.UPLOAD_LIMIT_BYTES,
        logLevel: parsed.LOG_LEVEL
    };
}
