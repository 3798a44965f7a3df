import { z } from 'zod';
import { DEFAULT_CHUNK_SIZE } from '@shared/constants';
import { ConfigurationError } from './errors';

/**
 * Parses `input` with `schema`, turning validation failures into a
 * ConfigurationError that names every offending field.
 */
export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue => {
            const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${path}: ${issue.message}`;
        });
        throw new ConfigurationError(`Invalid ${what}`, issues);
    }
    return result.data;
}

// Environment values arrive as strings
const positiveIntFromEnv = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

export const serverConfigSchema = z.object({
    STEPWISE_PORT: z.coerce.number().int().gt(1000).lt(65535).default(5000),
    STEPWISE_REPORT_INTERVAL: positiveIntFromEnv(100),
    STEPWISE_BATCH_STEPS: positiveIntFromEnv(1000),
    STEPWISE_CHUNK_SIZE: positiveIntFromEnv(DEFAULT_CHUNK_SIZE),
});

export interface ServerConfig {
    port: number;
    reportInterval: number;
    batchSteps: number;
    chunkSize: number;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const parsed = parseConfig(serverConfigSchema, env, 'server configuration');
    return {
        port: parsed.STEPWISE_PORT,
        reportInterval: parsed.STEPWISE_REPORT_INTERVAL,
        batchSteps: parsed.STEPWISE_BATCH_STEPS,
        chunkSize: parsed.STEPWISE_CHUNK_SIZE,
    };
}
