import { z } from 'zod';
import {
  SERVER_API_KEY_ENV_KEY,
  SERVER_RETRIES_ENV_KEY,
  SERVER_TIMEOUT_ENV_KEY,
  SERVER_URL_ENV_KEY,
  SITE_ID_ENV_KEY,
} from '../constants';
import { ConfigurationError } from '../errors';
import type { ConnectionOptions } from './connection';

export type EnvironmentSource = Record<string, string | undefined>;

const optionalNumber = (key: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform(value => (value === undefined || value === '' ? undefined : Number(value)))
    .refine(value => value === undefined || (Number.isFinite(value) && value > 0), {
      message: `${key} must be a positive number`,
    });

const EnvironmentSchema = z.object({
  [SERVER_URL_ENV_KEY]: z
    .string({ required_error: `${SERVER_URL_ENV_KEY} is not set` })
    .trim()
    .min(1, `${SERVER_URL_ENV_KEY} is not set`)
    .url(`${SERVER_URL_ENV_KEY} is not a valid URL`),
  [SERVER_API_KEY_ENV_KEY]: z
    .string({ required_error: `${SERVER_API_KEY_ENV_KEY} is not set` })
    .trim()
    .min(1, `${SERVER_API_KEY_ENV_KEY} is not set`),
  [SERVER_TIMEOUT_ENV_KEY]: optionalNumber(SERVER_TIMEOUT_ENV_KEY),
  [SERVER_RETRIES_ENV_KEY]: optionalNumber(SERVER_RETRIES_ENV_KEY),
  [SITE_ID_ENV_KEY]: z.string().trim().optional(),
});

/**
 * Build connection options from environment variables.
 *
 * Timeout is given in seconds, retries as the total attempt ceiling.
 */
export function loadConnectionConfig(env: EnvironmentSource = process.env): ConnectionOptions {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => issue.message);
    throw new ConfigurationError(`Invalid connection environment: ${issues.join('; ')}`, { issues });
  }

  const values = parsed.data;
  const options: ConnectionOptions = {
    baseUrl: values[SERVER_URL_ENV_KEY],
    token: values[SERVER_API_KEY_ENV_KEY],
  };
  const timeout = values[SERVER_TIMEOUT_ENV_KEY];
  if (timeout !== undefined) {
    options.timeoutMs = Math.round(timeout * 1000);
  }
  const retries = values[SERVER_RETRIES_ENV_KEY];
  if (retries !== undefined) {
    options.retry = { maxAttempts: Math.floor(retries) };
  }
  const siteId = values[SITE_ID_ENV_KEY];
  if (siteId) {
    options.siteId = siteId;
  }
  return options;
}
