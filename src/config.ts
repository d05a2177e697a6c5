import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { EngineConfig, EngineOptions } from './engine/types';

dotenv.config();

export const DEFAULT_KEYWORDS_PROMOTIONAL = ['promotional', 'promotion'] as const;
export const DEFAULT_KEYWORDS_CONTRACT = ['contract'] as const;

// Reasons are lower-cased before matching, so keywords are too; blanks would match everything.
export function normalizeKeywords(keywords: readonly string[]): string[] {
  return keywords.map((k) => k.trim().toLowerCase()).filter((k) => k.length > 0);
}

const keywordList = z
  .string()
  .transform((val) => normalizeKeywords(val.split(',')))
  .optional();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  SLA_DAYS: z.coerce.number().int().min(0).default(5),
  MISSING_LEVELS_FOR_HIGH: z.coerce.number().int().min(1).default(2),
  KEYWORDS_PROMOTIONAL: keywordList,
  KEYWORDS_CONTRACT: keywordList,
});

type EnvConfig = z.infer<typeof envSchema>;

function formatIssues(error: z.ZodError): string {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment configuration:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function withDefault(list: readonly string[] | undefined, fallback: readonly string[]): readonly string[] {
  return list && list.length > 0 ? list : fallback;
}

function buildConfig(env: EnvConfig) {
  return {
    app: {
      env: env.NODE_ENV,
      isDevelopment: env.NODE_ENV === 'development',
      isTest: env.NODE_ENV === 'test',
    },
    logging: {
      level: env.LOG_LEVEL,
    },
    engine: {
      slaDays: env.SLA_DAYS,
      missingLevelsForHigh: env.MISSING_LEVELS_FOR_HIGH,
      keywordsPromotional: withDefault(env.KEYWORDS_PROMOTIONAL, DEFAULT_KEYWORDS_PROMOTIONAL),
      keywordsContract: withDefault(env.KEYWORDS_CONTRACT, DEFAULT_KEYWORDS_CONTRACT),
    } satisfies EngineConfig,
  } as const;
}

export type AppConfig = ReturnType<typeof buildConfig>;

let cached: AppConfig | undefined;

/** Validates the environment on first use, so importing the engine never throws. */
export function getConfig(): AppConfig {
  cached ??= buildConfig(loadEnv());
  return cached;
}

const loggingEnvSchema = z.object({
  NODE_ENV: envSchema.shape.NODE_ENV.catch('development'),
  LOG_LEVEL: envSchema.shape.LOG_LEVEL.catch('info'),
});

/** Logger settings; invalid values fall back to the defaults instead of throwing at import. */
export function loggingConfig(source: NodeJS.ProcessEnv = process.env) {
  const env = loggingEnvSchema.parse(source);
  return {
    level: env.LOG_LEVEL,
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',
  };
}

const engineOptionsSchema = z.object({
  slaDays: z.number().int().min(0).optional(),
  missingLevelsForHigh: z.number().int().min(1).optional(),
  keywordsPromotional: z.array(z.string()).transform(normalizeKeywords).optional(),
  keywordsContract: z.array(z.string()).transform(normalizeKeywords).optional(),
});

/**
 * Merges caller options over the environment defaults.
 * Keywords are trimmed and lower-cased; a list left empty falls back to the
 * defaults rather than matching nothing.
 */
export function resolveEngineConfig(options: EngineOptions = {}, base: EngineConfig = getConfig().engine): EngineConfig {
  const parsed = engineOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigError(`Invalid engine options:\n${formatIssues(parsed.error)}`);
  }
  const opts = parsed.data;
  return {
    slaDays: opts.slaDays ?? base.slaDays,
    missingLevelsForHigh: opts.missingLevelsForHigh ?? base.missingLevelsForHigh,
    keywordsPromotional: withDefault(opts.keywordsPromotional, base.keywordsPromotional),
    keywordsContract: withDefault(opts.keywordsContract, base.keywordsContract),
  };
}
