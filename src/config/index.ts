/**
 * @fileoverview Environment configuration.
 *
 * Every setting comes from an environment variable with a default. Empty
 * values count as unset.
 *
 * @module rag-orchestrator/config
 * @version 0.1.0
 */

import { z } from 'zod';
import { Severity } from '../types/core.types.js';
import { ConfigurationError } from '../utils/errors.js';
import { parseSeverity } from '../observability/logger.js';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const severity = z.string().transform((value, ctx) => {
  const level = parseSeverity(value);
  if (level === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `must be one of ${Object.values(Severity).join(', ')}`,
    });
    return z.NEVER;
  }
  return level;
});

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().trim().min(1).optional(),
  ANTHROPIC_MODEL: z.string().trim().min(1).default('claude-sonnet-4-20250514'),
  MAX_TOKENS: z.coerce.number().int().positive().default(800),
  TEMPERATURE: z.coerce.number().min(0).max(1).default(0),
  MAX_TOOL_ROUNDS: z.coerce.number().int().nonnegative().default(2),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),
  PARALLEL_TOOLS: booleanFlag.default('false'),
  MAX_CONSECUTIVE_TOOL_FAILURES: z.coerce.number().int().nonnegative().default(0),
  MAX_SEARCH_RESULTS: z.coerce.number().int().positive().default(5),
  LOG_LEVEL: severity.default('INFO'),
});

export interface AppConfig {
  readonly anthropicApiKey: string | null;

  readonly llm: {
    readonly model: string;
    readonly maxTokens: number;
    readonly temperature: number;
    readonly timeoutMs: number;
    readonly maxRetries: number;
  };

  readonly orchestrator: {
    readonly maxRounds: number;
    readonly parallelToolExecution: boolean;
    readonly maxConsecutiveToolFailures: number;
  };

  readonly tools: {
    readonly timeoutMs: number;
    readonly maxSearchResults: number;
  };

  readonly logLevel: Severity;
}

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Reads configuration from the environment.
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: Environment = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      present[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const vars = parsed.data;
  return {
    anthropicApiKey: vars.ANTHROPIC_API_KEY ?? null,
    llm: {
      model: vars.ANTHROPIC_MODEL,
      maxTokens: vars.MAX_TOKENS,
      temperature: vars.TEMPERATURE,
      timeoutMs: vars.LLM_TIMEOUT_MS,
      maxRetries: vars.LLM_MAX_RETRIES,
    },
    orchestrator: {
      maxRounds: vars.MAX_TOOL_ROUNDS,
      parallelToolExecution: vars.PARALLEL_TOOLS,
      maxConsecutiveToolFailures: vars.MAX_CONSECUTIVE_TOOL_FAILURES,
    },
    tools: {
      timeoutMs: vars.TOOL_TIMEOUT_MS,
      maxSearchResults: vars.MAX_SEARCH_RESULTS,
    },
    logLevel: vars.LOG_LEVEL,
  };
}

/**
 * @throws ConfigurationError when no API key is configured
 */
export function requireApiKey(config: AppConfig): string {
  if (config.anthropicApiKey === null) {
    throw new ConfigurationError('ANTHROPIC_API_KEY is not set', ['ANTHROPIC_API_KEY: Required']);
  }
  return config.anthropicApiKey;
}
