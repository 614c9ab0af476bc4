import { z } from 'zod';

import type { Configuration } from './types.js';

import { ConfigError } from './errors.js';

export const DEFAULT_BASE_URL = 'https://api.anthropic.com';
export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_ANTHROPIC_VERSION = '2023-06-01';

const ProviderSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  model: z.string().min(1).default(DEFAULT_MODEL),
  maxTokens: z.number().int().positive().default(2048),
  anthropicVersion: z.string().min(1).default(DEFAULT_ANTHROPIC_VERSION),
  stream: z.boolean().default(true),
  apiKey: z.string().min(1).optional(),
});

const TimeoutsSchema = z.object({
  connectMs: z.number().int().positive().default(10_000),
  requestMs: z.number().int().positive().default(60_000),
  lowSpeedWindowMs: z.number().int().positive().default(30_000),
  lowSpeedBytes: z.number().int().nonnegative().default(1),
});

const WorkflowSchema = z.object({
  maxSteps: z.number().int().positive().default(10),
  retryLimit: z.number().int().nonnegative().default(1),
});

const ContextSchema = z.object({
  charsPerToken: z.number().int().positive().default(4),
  maxInputTokens: z.number().int().positive().default(100_000),
  pruneTargetTokens: z.number().int().positive().default(80_000),
  minKeepPairs: z.number().int().nonnegative().default(2),
}).refine((ctx) => ctx.pruneTargetTokens <= ctx.maxInputTokens, {
  message: 'pruneTargetTokens must not exceed maxInputTokens',
  path: ['pruneTargetTokens'],
});

const ExecutorSchema = z.object({
  timeoutMs: z.number().int().positive().default(5_000),
});

const LoggingSchema = z.object({
  format: z.enum(['logfmt', 'json', 'console']).optional(),
  verbose: z.boolean().default(false),
});

export const ConfigurationSchema = z.object({
  provider: ProviderSchema.default({}),
  timeouts: TimeoutsSchema.default({}),
  workflow: WorkflowSchema.default({}),
  context: ContextSchema.default({}),
  executor: ExecutorSchema.default({}),
  logging: LoggingSchema.default({}),
});

/** Replaces `${NAME}` placeholders in every string value. */
export function expandPlaceholders(value: unknown, vars: (name: string) => string): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => vars(name));
  }
  if (Array.isArray(value)) return value.map((item) => expandPlaceholders(item, vars));
  if (value !== null && typeof value === 'object') {
    return Object.entries(value).reduce<Record<string, unknown>>((acc, [key, item]) => {
      acc[key] = expandPlaceholders(item, vars);
      return acc;
    }, {});
  }
  return value;
}

export function parseConfiguration(
  json: unknown,
  source: string,
  env: Record<string, string | undefined> = process.env
): Configuration {
  let expanded: unknown;
  try {
    expanded = expandPlaceholders(json, (name) => {
      const found = env[name];
      if (found === undefined) throw new ConfigError(`environment variable '${name}' is not set`);
      return found;
    });
  } catch (e) {
    throw new ConfigError(`Environment variable expansion failed in ${source}: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = ConfigurationSchema.safeParse(expanded);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed in ${source}:\n${msgs}`);
  }
  return parsed.data;
}

export const defaultConfiguration = (): Configuration => parseConfiguration({}, 'defaults', {});
