import { z } from 'zod';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a refactoring assistant. ' +
  'Extract every string literal into a named constant (for Java, a `public static final String` ' +
  'declared at the top of the class, after the package and imports), ' +
  'and replace usages accordingly. ' +
  'Return ONLY the full, compilable refactored source code.';

export const ProviderConfigSchema = z.object({
  type: z.enum(['openai', 'fake']).default('openai'),
  model: z.string().min(1).default('gpt-4'),
  /** Base URL of an OpenAI-compatible API; `/chat/completions` is appended by the client */
  baseUrl: z.string().url().default('http://localhost:8000/v1'),
  api_key: z.string().optional(),
  api_key_env: z.string().default('API_KEY'),
  temperature: z.number().min(0).max(2).default(0),
  maxTokens: z.number().int().positive().default(4096),
  systemPrompt: z.string().min(1).optional(),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export const CommitPolicySchema = z.enum(['dry-run', 'overwrite', 'overwrite-with-backup']);

/** Longest delay Node timers honour; anything larger fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const RunConfigSchema = z.object({
  workers: z.number().int().min(1).max(64).default(4),
  /** Per-attempt timeout for the rewrite service */
  timeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(300_000),
  /** Total attempts per file, including the first one */
  retries: z.number().int().min(1).default(3),
  /** Delay before the second attempt; doubles for every attempt after that */
  backoffMs: z.number().min(0).default(1000),
  maxBackoffMs: z.number().min(0).max(MAX_TIMER_DELAY_MS).default(60_000),
  policy: CommitPolicySchema.default('overwrite'),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

export const ScanConfigSchema = z.object({
  extensions: z.array(z.string().min(1)).min(1).default(['.java']),
  excludes: z.array(z.string()).default(['.git', 'target', 'build', '.idea']),
  maxFileSizeBytes: z.number().int().positive().default(2_000_000),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;

/**
 * How a suspicious rewrite is handled: committed silently, committed with a
 * warning, or rejected as a failed file.
 */
export const ValidationModeSchema = z.enum(['accept', 'warn', 'fatal']);
export type ValidationMode = z.infer<typeof ValidationModeSchema>;

export const ValidationConfigSchema = z.object({
  onUnchanged: ValidationModeSchema.default('warn'),
  onLiteralsDropped: ValidationModeSchema.default('warn'),
});

export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;

export const LoggingConfigSchema = z.object({
  jsonlPath: z.string().optional(),
  verbose: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  provider: ProviderConfigSchema.default({}),
  run: RunConfigSchema.default({}),
  scan: ScanConfigSchema.default({}),
  validation: ValidationConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
/** Config as written in YAML files or assembled from CLI flags, before defaults apply. */
export type ConfigInput = z.input<typeof ConfigSchema>;
