/**
 * Service configuration.
 *
 * Read once from the environment at startup and passed into the app factory.
 * Nothing below `main.ts` reads process.env for these values.
 */

import { tmpdir } from 'os';
import { z } from 'zod';
import {
  CONVERSION_TIMEOUT_MS,
  DEFAULT_CONVERTER_PATH,
  DEFAULT_HOST,
  DEFAULT_MAX_BODY_SIZE,
  DEFAULT_PORT,
} from '@mdocx/shared';

const configSchema = z.object({
  HOST: z.string().min(1).default(DEFAULT_HOST),
  PORT: z.coerce.number().int().min(0).max(65_535).default(DEFAULT_PORT),
  SCRATCH_DIR: z.string().min(1).optional(),
  PANDOC_PATH: z.string().min(1).default(DEFAULT_CONVERTER_PATH),
  CONVERSION_TIMEOUT_MS: z.coerce.number().int().positive().default(CONVERSION_TIMEOUT_MS),
  MAX_BODY_SIZE: z
    .string()
    .regex(/^\d+(b|kb|mb)?$/i, 'must be a byte count such as 512kb or 10mb')
    .default(DEFAULT_MAX_BODY_SIZE),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AppConfig {
  host: string;
  port: number;
  /** Writable directory for per-request scratch artifacts. */
  scratchDir: string;
  /** Converter executable, resolved on PATH when not absolute. */
  converterPath: string;
  conversionTimeoutMs: number;
  maxBodySize: string;
  logLevel: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      'Invalid configuration: ' +
        issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    );
    this.name = 'ConfigError';
  }
}

/**
 * Builds the config from an environment map.
 * Empty strings count as unset so `PORT=` in a .env file falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }

  const parsed = result.data;
  return {
    host: parsed.HOST,
    port: parsed.PORT,
    scratchDir: parsed.SCRATCH_DIR ?? tmpdir(),
    converterPath: parsed.PANDOC_PATH,
    conversionTimeoutMs: parsed.CONVERSION_TIMEOUT_MS,
    maxBodySize: parsed.MAX_BODY_SIZE,
    logLevel: parsed.LOG_LEVEL,
  };
}
