import { z } from 'zod';
import { config as loadEnv } from 'dotenv';
import { ConfigError } from '../application/errors.js';
import { fail, ok, type Result } from '../shared/result.js';

// Unknown NODE_ENV values count as development.
const environmentSchema = z.enum(['development', 'test', 'production']).catch('development');

const loggingSchema = z.object({
  name: z.string().min(1, 'Logger name cannot be empty').default('tagged-value'),
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  pretty: z.preprocess((val) => val === 'true' || val === true, z.boolean()).default(false),
});

const configSchema = z.object({
  environment: environmentSchema,
  logging: loggingSchema,
});

export type Config = z.infer<typeof configSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

/**
 * Validates environment variables into a typed configuration object.
 * @throws {ConfigError} listing every invalid entry as `path: message`
 */
export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = readConfig(env);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Same validation as `createConfig`, reported as a `Result`.
 */
export function readConfig(env: NodeJS.ProcessEnv): Result<Config, ConfigError> {
  const parsed = configSchema.safeParse({
    environment: env.NODE_ENV,
    logging: {
      name: env.TAGGED_VALUE_LOGGER_NAME,
      level: env.TAGGED_VALUE_LOG_LEVEL,
      pretty: env.TAGGED_VALUE_PRETTY_LOGS,
    },
  });
  if (parsed.success) {
    return ok(parsed.data);
  }

  const errorMessages = parsed.error.errors.map(err => {
    const path = err.path.join('.');
    return `${path}: ${err.message}`;
  }).join('\n');

  return fail(new ConfigError(`Configuration validation failed:\n${errorMessages}`));
}

/**
 * Loads `.env` (existing variables win) and builds the configuration.
 */
export function loadConfig(): Config {
  loadEnv();
  return createConfig(process.env);
}

let current: Config | undefined;

export function getConfig(): Config {
  current ??= loadConfig();
  return current;
}

export function isProduction(config: Config): boolean {
  return config.environment === 'production';
}
