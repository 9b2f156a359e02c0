import { ZodError } from 'zod';
import { envSchema, type Env } from './envSchema.js';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function formatIssues(err: ZodError): string {
    const lines = err.issues.map((i) => {
        const key = i.path.join('.') || '(root)';
        return `- ${key}: ${i.message}`;
    });
    return 'Invalid environment variables:\n' + lines.join('\n');
}

/**
 * Parses and validates the raw environment. Throws ConfigError listing every
 * offending variable.
 */
export function loadEnv(raw: NodeJS.ProcessEnv = process.env): Env {
    try {
        return envSchema.parse(raw);
    } catch (err) {
        if (err instanceof ZodError) {
            throw new ConfigError(formatIssues(err));
        }
        throw err;
    }
}

export type { Env };
