import { z } from 'zod';
import type { AppConfig, ConfigOverrides } from '../types';
import { ConfigError } from '../types';

export const DEFAULT_API_KEY_ENV = 'GEMINI_API_KEY';
export const DEFAULT_GEMINI_MODEL = 'gemini-1.5-flash';
export const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_LANGUAGE = 'python';

const optionalInt = (min: number) =>
  z.preprocess(
    (val) => (val === undefined || val === '' ? undefined : Number(val)),
    z.number().int().min(min).optional()
  );

const EnvSchema = z.object({
  API_KEY_ENV: z.string().trim().min(1).optional(),
  PRIMARY_GEMINI_MODEL: z.string().trim().min(1).optional(),
  GEMINI_BASE_URL: z.string().url().optional(),
  REVIEW_TIMEOUT_MS: optionalInt(1),
  REVIEW_RETRIES: optionalInt(0),
  REVIEW_BACKOFF: z.enum(['fixed', 'exponential']).optional(),
  REVIEW_RETRY_DELAY_MS: optionalInt(0),
  REVIEW_CONCURRENCY: optionalInt(1),
  REVIEW_LANGUAGE: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
});

const OverridesSchema = z.object({
  model: z.string().trim().min(1).optional(),
  language: z.string().trim().min(1).optional(),
  concurrency: z.number().int().min(1).optional(),
  retries: z.number().int().min(0).optional(),
  backoff: z.enum(['fixed', 'exponential']).optional(),
  timeoutMs: z.number().int().min(1).optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`);
}

/**
 * Build the run configuration from the environment and CLI overrides.
 * CLI values win over environment values. Throws ConfigError when the
 * credential is absent or a setting is out of range.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const envResult = EnvSchema.safeParse(env);
  if (!envResult.success) {
    const issues = formatIssues(envResult.error);
    throw new ConfigError(`Invalid environment configuration: ${issues.join(', ')}`, issues);
  }

  const overrideResult = OverridesSchema.safeParse(overrides);
  if (!overrideResult.success) {
    const issues = formatIssues(overrideResult.error);
    throw new ConfigError(`Invalid command-line options: ${issues.join(', ')}`, issues);
  }

  const vars = envResult.data;
  const cli = overrideResult.data;

  const keyName = vars.API_KEY_ENV ?? DEFAULT_API_KEY_ENV;
  const apiKey = env[keyName]?.trim();
  if (!apiKey) {
    throw new ConfigError(
      `${keyName} not found. Set it in the environment or a .env file, e.g. ${keyName}=your-api-key`,
      [`${keyName} environment variable is required`]
    );
  }

  return {
    model: {
      apiKey,
      model: cli.model ?? vars.PRIMARY_GEMINI_MODEL ?? DEFAULT_GEMINI_MODEL,
      baseURL: vars.GEMINI_BASE_URL ?? DEFAULT_GEMINI_BASE_URL,
      temperature: 0.4,
      maxTokens: 2048,
      timeoutMs: cli.timeoutMs ?? vars.REVIEW_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
      retry: {
        retries: cli.retries ?? vars.REVIEW_RETRIES ?? 0,
        backoff: cli.backoff ?? vars.REVIEW_BACKOFF ?? 'exponential',
        baseDelayMs: vars.REVIEW_RETRY_DELAY_MS ?? 1000,
      },
    },
    language: cli.language ?? vars.REVIEW_LANGUAGE ?? DEFAULT_LANGUAGE,
    concurrency: cli.concurrency ?? vars.REVIEW_CONCURRENCY ?? 1,
    logLevel: vars.LOG_LEVEL ?? 'info',
  };
}
