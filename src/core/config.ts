import dotenv from 'dotenv';
import { ValidationError } from './errors';
import {
  ServerConfig,
  ServerConfigInput,
  serverConfigSchema,
  validateInput
} from '../utils/validation';

export type { ServerConfig, ServerConfigInput };

/**
 * Validates a server configuration and applies defaults
 *
 * @throws ValidationError naming the offending path
 */
export function resolveConfig(input: ServerConfigInput): ServerConfig {
  return validateInput(input, serverConfigSchema);
}

function optionalNumber(name: string, env: NodeJS.ProcessEnv): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number`, name, 'number', raw);
  }
  return value;
}

/**
 * Builds a configuration from environment variables, loading `.env` first.
 *
 * | variable | field |
 * |---|---|
 * | SERVER_ADDRESS | serverAddress |
 * | SERVER_API_VERSION | apiVersion |
 * | SERVER_SITE_ID | siteId |
 * | SERVER_AUTH_TOKEN | authToken |
 * | SERVER_TIMEOUT | timeout |
 * | SERVER_MAX_RETRIES | retry.maxRetries |
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const maxRetries = optionalNumber('SERVER_MAX_RETRIES', env);

  return resolveConfig({
    serverAddress: env.SERVER_ADDRESS ?? '',
    apiVersion: env.SERVER_API_VERSION || undefined,
    siteId: env.SERVER_SITE_ID || undefined,
    authToken: env.SERVER_AUTH_TOKEN || undefined,
    timeout: optionalNumber('SERVER_TIMEOUT', env),
    retry: maxRetries === undefined ? undefined : { maxRetries }
  });
}
