/**
 * @fileoverview sourcewise configuration
 *
 * Defaults are tuned for a local, single-process deployment:
 * - sparse token vectors and a stub generator, so nothing needs a network
 * - one SQLite database under `.sourcewise/`
 * - refusal below 0.4 confidence
 *
 * Precedence, lowest first: DEFAULT_CONFIG, YAML file, environment, explicit overrides.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import YAML from 'yaml';
import { z, type ZodError } from 'zod';
import { ConfigurationError } from '../core/errors.js';

export const DEFAULT_CONFIG_FILENAME = 'sourcewise.config.yaml';

// ============================================================================
// SCHEMA
// ============================================================================

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const ChunkingSchema = z
  .object({
    chunkSize: z.number().int().positive().default(500),
    overlap: z.number().int().nonnegative().default(50),
  })
  .refine((value) => value.overlap < value.chunkSize, {
    message: 'overlap must be smaller than chunkSize',
    path: ['overlap'],
  });

const RetrievalSchema = z.object({
  defaultMaxSources: z.number().int().min(1).default(8),
  maxSourcesLimit: z.number().int().min(1).default(25),
});

const PipelineSchema = z.object({
  planner: z.enum(['auto', 'heuristic', 'generative']).default('auto'),
  maxPlanSteps: z.number().int().min(1).default(3),
  enableCritic: z.boolean().default(true),
  enableVerifier: z.boolean().default(true),
  snippetLength: z.number().int().positive().default(200),
  maxClaims: z.number().int().min(1).default(2),
  judge: z.enum(['heuristic', 'structured']).default('heuristic'),
  answerChunkSize: z.number().int().positive().default(80),
});

const ConfidenceSchema = z.object({
  noEvidence: z.number().min(0).max(1).default(0),
  noClaims: z.number().min(0).max(1).default(0.2),
  base: z.number().min(0).max(1).default(0.4),
  supportedWeight: z.number().min(0).max(1).default(0.6),
  refusalThreshold: z.number().min(0).max(1).default(0.4),
});

const LlmSchema = z.object({
  provider: z.enum(['stub', 'openai']).default('stub'),
  model: z.string().min(1).default('gpt-4o-mini'),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  temperature: z.number().min(0).max(2).default(0.2),
  timeoutMs: z.number().int().positive().default(30_000),
});

const EmbeddingSchema = z.object({
  provider: z.enum(['sparse', 'openai']).default('sparse'),
  model: z.string().min(1).default('text-embedding-3-small'),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  timeoutMs: z.number().int().positive().default(30_000),
});

const SearchSchema = z.object({
  provider: z.enum(['auto', 'bing', 'serpapi', 'none']).default('auto'),
  bingApiKey: z.string().min(1).optional(),
  serpApiKey: z.string().min(1).optional(),
  freshness: z.enum(['day', 'week', 'month']).default('month'),
  timeoutMs: z.number().int().positive().default(20_000),
});

const ExtractionSchema = z.object({
  timeoutMs: z.number().int().positive().default(20_000),
});

export const SourcewiseConfigSchema = z.object({
  dataDir: z.string().min(1).default('.sourcewise'),
  logLevel: LogLevelSchema.default('info'),
  chunking: ChunkingSchema.default({}),
  retrieval: RetrievalSchema.default({}),
  pipeline: PipelineSchema.default({}),
  confidence: ConfidenceSchema.default({}),
  llm: LlmSchema.default({}),
  embedding: EmbeddingSchema.default({}),
  search: SearchSchema.default({}),
  extraction: ExtractionSchema.default({}),
});

export type SourcewiseConfig = z.infer<typeof SourcewiseConfigSchema>;
export type ChunkingConfig = SourcewiseConfig['chunking'];
export type PipelineConfig = SourcewiseConfig['pipeline'];
export type ConfidencePolicy = SourcewiseConfig['confidence'];
export type LlmConfig = SourcewiseConfig['llm'];
export type EmbeddingConfig = SourcewiseConfig['embedding'];
export type SearchConfig = SourcewiseConfig['search'];

/** Partial view accepted by createConfig; every section may be partially specified. */
export type ConfigOverrides = z.input<typeof SourcewiseConfigSchema>;

// ============================================================================
// CONSTRUCTION
// ============================================================================

function formatZodIssues(error: ZodError): ConfigurationError {
  const first = error.issues[0];
  const key = first && first.path.length > 0 ? first.path.join('.') : 'config';
  const details = error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
  return new ConfigurationError(key, details.join('; '));
}

function parseConfig(input: unknown): SourcewiseConfig {
  const parsed = SourcewiseConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw formatZodIssues(parsed.error);
  }
  return parsed.data;
}

export const DEFAULT_CONFIG: SourcewiseConfig = Object.freeze(parseConfig({}));

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge plain-object sections key by key; arrays and scalars replace.
 * `undefined` never overwrites a value that is already set.
 */
export function mergeConfigInput(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeConfigInput(current, value) : value;
  }
  return merged;
}

/**
 * Build a validated config from defaults plus overrides.
 */
export function createConfig(overrides: ConfigOverrides = {}): SourcewiseConfig {
  return parseConfig(mergeConfigInput({}, overrides));
}

// ============================================================================
// LOADING
// ============================================================================

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(name, `expected a number, got "${raw}"`);
  }
  return value;
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Translate the environment variables sourcewise understands into config input.
 */
export function configFromEnv(env: Env): Record<string, unknown> {
  return {
    dataDir: readString(env, 'SOURCEWISE_DATA_DIR'),
    logLevel: readString(env, 'LOG_LEVEL')?.toLowerCase(),
    confidence: {
      refusalThreshold: readNumber(env, 'SOURCEWISE_REFUSAL_THRESHOLD'),
    },
    llm: {
      provider: readString(env, 'LLM_PROVIDER')?.toLowerCase(),
      model: readString(env, 'OPENAI_MODEL'),
      apiKey: readString(env, 'OPENAI_API_KEY'),
      baseUrl: readString(env, 'OPENAI_BASE_URL'),
    },
    embedding: {
      provider: readString(env, 'EMBEDDING_PROVIDER')?.toLowerCase(),
      model: readString(env, 'EMBEDDING_MODEL'),
      apiKey: readString(env, 'OPENAI_API_KEY'),
      baseUrl: readString(env, 'OPENAI_BASE_URL'),
    },
    search: {
      bingApiKey: readString(env, 'BING_API_KEY'),
      serpApiKey: readString(env, 'SERPAPI_KEY'),
    },
  };
}

/**
 * Read a YAML config file. A missing file is not an error; a malformed one is.
 */
export function readConfigFile(configPath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigurationError(configPath, error instanceof Error ? error.message : String(error));
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigurationError(configPath, `invalid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(configPath, 'expected a mapping at the top level');
  }
  return parsed;
}

export interface LoadConfigOptions {
  env?: Env;
  /** Defaults to `sourcewise.config.yaml` in the working directory. */
  configPath?: string;
  overrides?: ConfigOverrides;
}

export function loadConfig(options: LoadConfigOptions = {}): SourcewiseConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? path.resolve(process.cwd(), DEFAULT_CONFIG_FILENAME);
  const fromFile = readConfigFile(configPath);
  const fromEnv = configFromEnv(env);
  const merged = mergeConfigInput(mergeConfigInput(fromFile, fromEnv), options.overrides ?? {});
  return parseConfig(merged);
}
