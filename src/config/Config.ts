import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { LIMITS, SERVER, TIME } from '../core/constants';
import { ValidationError } from '../core/errors';
import { LOG_LEVELS } from '../core/types/Logger';
import { formatIssues } from '../formats/JsonFormatStrategy';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(SERVER.DEFAULT_PORT),
  HOST: z.string().min(1).default(SERVER.DEFAULT_HOST),
  WS_PATH: z.string().startsWith('/').default(SERVER.DEFAULT_PATH),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  MAX_FRAME_BYTES: z.coerce.number().int().positive().default(LIMITS.MAX_FRAME_BYTES),
  HANDLER_TIMEOUT_MS: z.coerce.number().int().min(0).default(TIME.DEFAULT_HANDLER_TIMEOUT_MS),
  FORMAT_CASE_INSENSITIVE: booleanFlag,
  AUTH_TOKENS_FILE: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Read the service configuration from environment variables
 *
 * @throws {ValidationError} VALIDATION_ERROR:INVALID_CONFIG
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw ValidationError.invalidConfig('Invalid configuration', {
      issues: formatIssues(result.error),
    });
  }
  return result.data;
};

const TokensFileSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

/**
 * Load a `{ "<token>": { ...claims } }` map
 *
 * @throws {ValidationError} VALIDATION_ERROR:INVALID_CONFIG
 */
export const loadTokens = async (path: string): Promise<Record<string, Record<string, unknown>>> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw ValidationError.invalidConfig(`Cannot read tokens file ${path}`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const result = TokensFileSchema.safeParse(parsed);
  if (!result.success) {
    throw ValidationError.invalidConfig(`Invalid tokens file ${path}`, {
      issues: formatIssues(result.error),
    });
  }
  return result.data;
};
