import type { Logger } from '../application/ports/logger.js';
import { PinoLogger } from '../infrastructure/observability/pino-logger.js';
import { createConfig, readConfig } from './config.js';

let shared: Logger | undefined;

/**
 * Package-wide logger used by kinds defined without their own `logger`.
 * Built on first use from the process environment as it stands; `.env` is
 * only read by an explicit `loadConfig()`. Invalid logging variables fall
 * back to the defaults with a warning.
 */
export function defaultLogger(): Logger {
    if (!shared) {
        const result = readConfig(process.env);
        const logger = PinoLogger.fromConfig(result.ok ? result.value : createConfig({}));
        if (!result.ok) {
            logger.warn('Ignoring invalid logging configuration', { error: result.error.message });
        }
        shared = logger;
    }
    return shared;
}

/**
 * Replaces the package-wide logger; kinds defined afterwards pick it up.
 */
export function setDefaultLogger(logger: Logger): void {
    shared = logger;
}
