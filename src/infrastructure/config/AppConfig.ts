/**
 * AppConfig - Service configuration read from the environment.
 *
 * Environment variables:
 * - PORT: Port to listen on (default: 8000)
 * - HOST: Interface to bind (default: 0.0.0.0)
 * - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' (default: 'info')
 * - ACTIVITIES_SEED_FILE: JSON catalog loaded at start-up (default: data/activities.json)
 * - STATIC_DIR: Directory served under /static (default: static/)
 */

import { fileURLToPath } from 'url';
import { join } from 'path';
import { LOG_LEVELS, LogLevel, isLogLevel } from '../observability/Logger.js';
import { ValidationSchema, stringField } from '../../shared/validation/ValidationSchema.js';
import { validateOrThrow } from '../../shared/validation/RequestValidator.js';
import { ValidationError } from '../../shared/validation/ValidationError.js';

export interface AppConfig {
    port: number;
    host: string;
    logLevel: LogLevel;
    seedFile: string;
    staticDir: string;
}

/**
 * Package root, resolved the same way from src/ and dist/.
 */
export const PROJECT_ROOT = fileURLToPath(new URL('../../../', import.meta.url));

export const DEFAULT_APP_CONFIG: AppConfig = {
    port: 8000,
    host: '0.0.0.0',
    logLevel: 'info',
    seedFile: join(PROJECT_ROOT, 'data', 'activities.json'),
    staticDir: join(PROJECT_ROOT, 'static'),
};

const PORT_MESSAGE = 'PORT must be an integer between 1 and 65535';

const environmentSchema: ValidationSchema = {
    PORT: stringField({
        pattern: /^\d{1,5}$/,
        message: PORT_MESSAGE,
    }),
    HOST: stringField({ min: 1 }),
    LOG_LEVEL: stringField({ enum: LOG_LEVELS }),
    ACTIVITIES_SEED_FILE: stringField({ min: 1, max: 4096 }),
    STATIC_DIR: stringField({ min: 1, max: 4096 }),
};

/**
 * Build the configuration from environment variables.
 * Throws ValidationError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const values = {
        PORT: env.PORT,
        HOST: env.HOST,
        LOG_LEVEL: env.LOG_LEVEL,
        ACTIVITIES_SEED_FILE: env.ACTIVITIES_SEED_FILE,
        STATIC_DIR: env.STATIC_DIR,
    };
    validateOrThrow(values, environmentSchema);

    const port = values.PORT !== undefined ? parseInt(values.PORT, 10) : DEFAULT_APP_CONFIG.port;
    if (port < 1 || port > 65535) {
        throw ValidationError.fromFieldErrors([
            { field: 'PORT', message: PORT_MESSAGE, value: values.PORT },
        ]);
    }

    return {
        port,
        host: values.HOST ?? DEFAULT_APP_CONFIG.host,
        logLevel: values.LOG_LEVEL !== undefined && isLogLevel(values.LOG_LEVEL)
            ? values.LOG_LEVEL
            : DEFAULT_APP_CONFIG.logLevel,
        seedFile: values.ACTIVITIES_SEED_FILE ?? DEFAULT_APP_CONFIG.seedFile,
        staticDir: values.STATIC_DIR ?? DEFAULT_APP_CONFIG.staticDir,
    };
}
