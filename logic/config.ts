import { z } from 'zod';
import { BASE_URL, DEFAULT_TIMEOUT_MS } from './gridApi/apiClient';
import { DEFAULT_MAX_ROWS } from './dataProcessing/tableFormatter';
import { ValidationError } from './utils/errorUtils';

/**
 * Runtime configuration read from the environment.
 * The API key is optional here: demo mode works without it, and the API
 * client refuses to start when it is missing.
 */
export interface AppConfig {
  apiKey?: string;
  baseUrl: string;
  timeoutMs: number;
  maxRows: number;
  /** Print tagged diagnostic lines to stderr */
  debug: boolean;
}

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

/** A variable that is set but blank counts as unset */
function blankAsUnset<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema.optional());
}

const envSchema = z.object({
  FINGRID_API_KEY: optionalString,
  FINGRID_BASE_URL: blankAsUnset(z.string().trim().url()),
  FINGRID_TIMEOUT_MS: blankAsUnset(z.coerce.number().int().positive()),
  FINGRID_MAX_ROWS: blankAsUnset(z.coerce.number().int().positive()),
  FINGRID_DEBUG: blankAsUnset(z.enum(['0', '1', 'true', 'false'])),
});

/**
 * Load configuration from environment variables
 * @param env - Environment map (defaults to process.env)
 * @throws ValidationError naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new ValidationError(`Invalid ${variable}: ${issue?.message ?? 'invalid value'}`, { cause: result.error });
  }

  const parsed = result.data;
  return {
    apiKey: parsed.FINGRID_API_KEY,
    baseUrl: parsed.FINGRID_BASE_URL ?? BASE_URL,
    timeoutMs: parsed.FINGRID_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    maxRows: parsed.FINGRID_MAX_ROWS ?? DEFAULT_MAX_ROWS,
    debug: parsed.FINGRID_DEBUG === '1' || parsed.FINGRID_DEBUG === 'true',
  };
}
