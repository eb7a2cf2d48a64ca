import { join, resolve } from 'path';
import { z } from 'zod';
import { CONFIG_ERRORS } from '../utils/error-messages.js';
import { AppConfig } from './types.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEV_JWT_SECRET = 'your-secret-key-change-in-production';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform(value => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3010),
  HOST: z.string().default('0.0.0.0'),
  FRONTEND_URL: z.string().default('http://localhost:5173'),
  DATABASE_URL: optionalString,
  JWT_SECRET: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  DEMO_MODE: booleanFlag,
  FORUM_DISPATCH_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  FORUM_STALL_TIMEOUT_MINUTES: z.coerce.number().int().positive().default(30),
  FORUM_JOB_CONCURRENCY: z.coerce.number().int().positive().default(4),
  FORUM_JOB_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  RUN_WORKER: booleanFlag,
  PERSONAS_PATH: optionalString,
  SCHEMA_PATH: optionalString
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(CONFIG_ERRORS.INVALID_ENV(issues));
    this.name = 'ConfigError';
  }
}

/**
 * Validate environment variables into an AppConfig.
 * Data files are looked up relative to the working directory unless overridden:
 * 1. PERSONAS_PATH / SCHEMA_PATH
 * 2. ./config/personas.json and ./db/schema.sql
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;

  return {
    port: vars.PORT,
    host: vars.HOST,
    frontendUrl: vars.FRONTEND_URL,
    databaseUrl: vars.DATABASE_URL,
    jwtSecret: vars.JWT_SECRET ?? DEV_JWT_SECRET,
    usingDefaultJwtSecret: vars.JWT_SECRET === undefined,
    llm: {
      apiKey: vars.ANTHROPIC_API_KEY,
      model: vars.ANTHROPIC_MODEL,
      maxTokens: vars.LLM_MAX_TOKENS,
      demoMode: vars.DEMO_MODE
    },
    scheduler: {
      dispatchIntervalSeconds: vars.FORUM_DISPATCH_INTERVAL_SECONDS,
      stallTimeoutMinutes: vars.FORUM_STALL_TIMEOUT_MINUTES
    },
    jobs: {
      concurrency: vars.FORUM_JOB_CONCURRENCY,
      pollIntervalMs: vars.FORUM_JOB_POLL_INTERVAL_MS,
      runWorker: vars.RUN_WORKER
    },
    paths: {
      personas: vars.PERSONAS_PATH ? resolve(cwd, vars.PERSONAS_PATH) : join(cwd, 'config', 'personas.json'),
      schema: vars.SCHEMA_PATH ? resolve(cwd, vars.SCHEMA_PATH) : join(cwd, 'db', 'schema.sql')
    }
  };
}
