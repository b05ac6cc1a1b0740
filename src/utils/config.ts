import * as dotenv from 'dotenv';
import { z } from 'zod';
import { RoutingRegionInputSchema, type RoutingRegion } from '../models/riot/RiotRegionModels';
import { LogLevelSchema, type LogLevel } from '../helper/logger';
import { ConfigError, toValidationIssues } from '../helper/errors';

// --- ENVIRONMENT SCHEMA ---
const EnvSchema = z.object({
    RIOT_API_KEY: z.string({ required_error: 'RIOT_API_KEY is not defined in environment variables' })
        .min(1, 'RIOT_API_KEY is not defined in environment variables'),
    RIOT_ROUTING_REGION: RoutingRegionInputSchema.default('americas'),
    RIOT_LOG_LEVEL: LogLevelSchema.default('warn'),
    RIOT_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional()
});

export interface RiotConfig {
    apiKey: string;
    routingRegion: RoutingRegion;
    logLevel: LogLevel;
    timeoutMs?: number;
}

export interface LoadConfigOptions {
    env?: NodeJS.ProcessEnv;
    loadDotenv?: boolean; // read .env into process.env first (default true)
}

/**
 * Load client configuration from the environment
 *
 * Variables:
 *   - RIOT_API_KEY (required)
 *   - RIOT_ROUTING_REGION: americas | asia | europe (default americas)
 *   - RIOT_LOG_LEVEL: debug | info | warn | error | silent (default warn)
 *   - RIOT_HTTP_TIMEOUT_MS: transport timeout, unset means no timeout
 *
 * @throws ConfigError when a variable is missing or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): RiotConfig {
    if (options.loadDotenv ?? true) {
        dotenv.config();
    }

    const parsed = EnvSchema.safeParse(options.env ?? process.env);
    if (!parsed.success) {
        throw new ConfigError(toValidationIssues(parsed.error));
    }

    const env = parsed.data;
    return {
        apiKey: env.RIOT_API_KEY,
        routingRegion: env.RIOT_ROUTING_REGION,
        logLevel: env.RIOT_LOG_LEVEL,
        timeoutMs: env.RIOT_HTTP_TIMEOUT_MS
    };
}
