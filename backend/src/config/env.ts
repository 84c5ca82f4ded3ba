import { z } from 'zod';
import type { AnalysisMode } from '../types/index';

// Blank values in .env files count as unset
const optionalSecret = z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(5000),
    HOST: z.string().default('0.0.0.0'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    GEMINI_API_KEY: optionalSecret,
    GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
    ANALYSIS_MODE: z.enum(['markdown', 'json']).default('markdown'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    LOG_DIR: optionalSecret,
    CORS_ORIGIN: z.string().default('*'),
});

export interface AppConfig {
    readonly port: number;
    readonly host: string;
    readonly nodeEnv: 'development' | 'production' | 'test';
    readonly geminiApiKey?: string;
    readonly geminiModel: string;
    readonly analysisMode: AnalysisMode;
    readonly logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
    readonly logDir?: string;
    readonly corsOrigin: string;
}

/**
 * Parse the environment once at startup. The returned object is frozen and
 * handed to `createApp`; nothing else reads `process.env` for these values.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const env = envSchema.parse(source);

    return Object.freeze({
        port: env.PORT,
        host: env.HOST,
        nodeEnv: env.NODE_ENV,
        geminiApiKey: env.GEMINI_API_KEY,
        geminiModel: env.GEMINI_MODEL,
        analysisMode: env.ANALYSIS_MODE,
        logLevel: env.LOG_LEVEL,
        logDir: env.LOG_DIR,
        corsOrigin: env.CORS_ORIGIN,
    });
}
