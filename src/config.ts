/**
 * Configuration management using Zod for validation.
 *
 * Two layers: the process environment (log level, provider API keys) and a
 * JSON settings file describing one run. The settings file is parsed into a
 * deep-frozen PipelineConfig that every component receives explicitly.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { ConfigError } from './types/errors.js';
import type { DeepReadonly } from './types/utils.js';

// Load .env from the working directory if it exists
const envPath = resolve(process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Environment schema with validation and defaults.
 */
const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
    .default('INFO'),
  NODE_ENV: z.string().optional(),
  VITEST: z.string().optional(),

  // API Keys (provider-specific)
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

function loadEnv(): Env {
  const result = EnvSchema.safeParse(process.env);
  if (!result.success) {
    throw new ConfigError(
      'Environment validation failed:',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Validated process environment.
 */
export const env = loadEnv();

export const ProviderSchema = z.enum(['anthropic', 'openai', 'google']);
export type Provider = z.infer<typeof ProviderSchema>;

/**
 * Model selection and sampling parameters, passed through to the provider.
 */
const ModelSchema = z.object({
  provider: ProviderSchema.default('google'),
  model_name: z.string().min(1, 'model_name must be set'),
  temperature: z.number().min(0).max(2).default(0),
  top_p: z.number().min(0).max(1).optional(),
  top_k: z.number().int().positive().optional(),
  max_output_tokens: z.number().int().positive().default(8192),
  use_system_instruction: z.boolean().default(true),
});

export type ModelConfig = DeepReadonly<z.infer<typeof ModelSchema>>;

export const DEFAULT_REQUIRED_FIELDS = [
  'source_db_id',
  'source_query',
  'source_question',
  'target_db_id',
  'target_query',
  'target_question',
  'tables_columns_replacement',
  'thought',
] as const;

const GenerationSchema = z.object({
  prompt_directory: z.string().default('prompts'),
  base_prompt_file: z.string().default('mapping_base.txt'),
  system_instruction_file: z.string().default('mapping_system.txt'),
  max_questions_per_prompt: z.number().int().positive().default(10),
  max_retry_per_prompt: z.number().int().positive().default(3),
  max_fail_limit: z.number().int().positive().default(20),
  max_token_reminder: z.number().int().positive().default(9),
  retry_delay_ms: z.number().int().nonnegative().default(1000),
  concurrency: z.number().int().positive().default(1),
  output_directory: z.string().default('output/generation'),
  json_only_output_directory: z.string().default('output/generated_queries'),
  copy_settings_to_output: z.boolean().default(true),
  validation: z
    .object({
      fields_checking: z.boolean().default(true),
      db_id_matching: z.boolean().default(true),
    })
    .default({}),
  fields_to_check: z.array(z.string().min(1)).min(1).default([...DEFAULT_REQUIRED_FIELDS]),
});

export type GenerationConfig = DeepReadonly<z.infer<typeof GenerationSchema>>;

const PipelineSchema = z.object({
  source_dataset: z.string().min(1),
  source_db_ids: z.array(z.string()).default([]),
  target_dataset: z.string().min(1),
  target_db_id: z.string().min(1),
  source_questions_shuffle_seed: z.number().int().default(-1),
  source_questions_limit: z.number().int().min(-1).default(-1),
});

export type PipelineSettings = DeepReadonly<z.infer<typeof PipelineSchema>>;

const EvaluationSchema = z.object({
  dataset_name: z.string().min(1),
  model_dir: z.string().min(1),
  databases_directory: z.string().default('data/raw'),
  generated_queries_directory: z.string().default('output/generated_queries'),
  result_directory: z.string().default('output/results'),
  summary_directory: z.string().default('output/summary'),
  llm_response_directory: z.string().default('llm'),
  prompt_directory: z.string().default('prompts'),
  semantic_prompt_file: z.string().default('semantic_base.txt'),
  semantic_examples_file: z.string().default('semantic_examples.txt'),
  semantic_batch_size: z.number().int().positive().default(20),
  max_retry_per_prompt: z.number().int().positive().default(3),
  retry_delay_ms: z.number().int().nonnegative().default(1000),
  execution_timeout_ms: z.number().int().positive().default(30000),
  max_rows_preserved: z.number().int().nonnegative().default(50),
  concurrency: z.number().int().positive().default(2),
  target_databases: z.array(z.string()).default([]),
  source_databases: z.array(z.string()).default([]),
  summary_by_source_db: z.boolean().default(true),
});

export type EvaluationConfig = DeepReadonly<z.infer<typeof EvaluationSchema>>;

/**
 * Settings file schema with validation and defaults.
 */
export const SettingsSchema = z.object({
  model: ModelSchema,
  judge_model: ModelSchema.optional(),
  datasets_directory: z.string().default('data'),
  generation: GenerationSchema.default({}),
  data: z.array(PipelineSchema).default([]),
  evaluation: EvaluationSchema.optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Per-run configuration. Frozen at load time; never mutated afterwards.
 */
export type PipelineConfig = DeepReadonly<Settings>;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a settings object (already parsed from JSON).
 */
export function parseSettings(raw: unknown): PipelineConfig {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      'Settings validation failed:',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return deepFreeze(result.data);
}

/**
 * Load and validate the settings file for one run.
 */
export function loadConfig(settingsPath: string = 'settings.json'): PipelineConfig {
  const fullPath = resolve(settingsPath);
  if (!existsSync(fullPath)) {
    throw new ConfigError(`Settings file not found: ${fullPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Settings file is not valid JSON: ${fullPath} (${error})`);
  }

  return parseSettings(raw);
}

/**
 * Evaluation section of the config, required by every evaluation stage.
 */
export function requireEvaluation(config: PipelineConfig): EvaluationConfig {
  if (!config.evaluation) {
    throw new ConfigError('Settings file has no "evaluation" section');
  }
  return config.evaluation;
}

/**
 * Resolve the API key for a provider from the environment.
 */
export function apiKeyFor(provider: Provider): string {
  const key =
    provider === 'anthropic'
      ? env.ANTHROPIC_API_KEY
      : provider === 'openai'
        ? env.OPENAI_API_KEY
        : env.GOOGLE_API_KEY;
  if (!key) {
    throw new ConfigError(`${provider.toUpperCase()}_API_KEY is required when provider is ${provider}`);
  }
  return key;
}
