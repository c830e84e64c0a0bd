/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';
import { ConfigError } from './types/errors.js';

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Completion endpoint (OpenAI-compatible)
  LLM_BASE_URL: z.string().url().default('http://localhost:8000/v1'),
  LLM_MODEL: z.string().min(1).default('/model'),
  LLM_API_KEY: z.string().default('EMPTY'),

  // Embedded store
  DATABASE_PATH: z.string().min(1).default('your_data.db'),

  // Retrieval parameters
  DEFAULT_TOP_K: z.coerce.number().int().nonnegative().default(30),
  LOOKUP_TOP_K: z.coerce.number().int().nonnegative().default(50),

  // Per-call deadlines
  CLASSIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SQL_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  CHAT_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  MAX_CONCURRENT_COMPLETIONS: z.coerce.number().int().positive().default(64),

  // Server Configuration
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(7860),
  LOG_LEVEL: z
    .string()
    .default('INFO')
    .transform((level) => level.toUpperCase())
    .pipe(z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'])),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Load `.env` from the working directory if it exists.
 * Values already present in the environment win.
 */
export function loadDotenv(cwd: string = process.cwd()): void {
  const envPath = join(cwd, '.env');
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

/**
 * Parse and validate configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}
