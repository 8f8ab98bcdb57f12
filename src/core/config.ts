import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

import { ConfigError } from './errors.js';
import { parseLogLevel } from './logger.js';

export const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

const AgentSchema = z
  .object({
    provider: z.enum(['openai']).default('openai'),
    model: z.string().min(1).default('gemini-2.5-flash'),
    baseUrl: z.string().url().optional(),
    apiKeyEnv: z.string().min(1).default('LLM_API_KEY'),
    temperature: z.number().min(0).max(2).default(0),
    maxTokens: z.number().int().positive().default(2000),
    timeoutMs: z.number().int().positive().default(60_000),
    retries: z.number().int().min(0).max(10).default(2),
  })
  // Gemini models are only served on Google's OpenAI-compatible endpoint.
  .transform((agent) =>
    agent.baseUrl === undefined && agent.model.startsWith('gemini-')
      ? { ...agent, baseUrl: GEMINI_OPENAI_BASE_URL }
      : agent
  )
  .default({});

const GraphSchema = z
  .object({
    historyLimit: z.number().int().min(0).default(6),
    responderHistoryLimit: z.number().int().min(0).default(2),
    maxToolIterations: z.number().int().positive().default(5),
    maxSteps: z.number().int().positive().default(12),
  })
  .default({});

const ApiSchema = z
  .object({
    baseUrl: z.string().url().default('http://localhost:8000'),
    timeoutMs: z.number().int().positive().default(10_000),
    maxListed: z.number().int().positive().default(5),
    endpoints: z
      .object({
        scan: z.string().default('/assets'),
        timeseries: z.string().default('/timeseries'),
        lastvalue: z.string().default('/lastvalue'),
      })
      .default({}),
  })
  .default({});

const MemorySchema = z
  .object({
    backend: z.enum(['memory', 'sqlite']).default('memory'),
    dbPath: z.string().optional(),
    retentionDays: z.number().int().positive().default(30),
  })
  .default({});

const LoggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .default({});

export const AssetPilotConfigSchema = z.object({
  agent: AgentSchema,
  graph: GraphSchema,
  api: ApiSchema,
  memory: MemorySchema,
  logging: LoggingSchema,
});

export type AssetPilotConfig = z.infer<typeof AssetPilotConfigSchema>;
export type AssetPilotConfigInput = z.input<typeof AssetPilotConfigSchema>;

export function defaultConfigPath(): string {
  return process.env.ASSETPILOT_CONFIG_PATH ?? join(homedir(), '.assetpilot', 'config.yaml');
}

function readRawConfig(path: string): unknown {
  if (!existsSync(path)) {
    return {};
  }
  const text = readFileSync(path, 'utf-8');
  try {
    return yaml.parse(text) ?? {};
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${path} is not valid YAML: ${detail}`);
  }
}

function applyEnvOverrides(config: AssetPilotConfig): AssetPilotConfig {
  const next = { ...config };
  const rawLevel = process.env.ASSETPILOT_LOG_LEVEL;
  if (rawLevel) {
    next.logging = { ...next.logging, level: parseLogLevel(rawLevel, next.logging.level) };
  }
  const apiBaseUrl = process.env.ASSETPILOT_API_BASE_URL?.trim();
  if (apiBaseUrl) {
    next.api = { ...next.api, baseUrl: apiBaseUrl };
  }
  const dbPath = process.env.ASSETPILOT_DB_PATH?.trim();
  if (dbPath) {
    next.memory = { ...next.memory, dbPath };
  }
  return next;
}

/**
 * Validate a config object (already parsed from YAML or built in code) and apply defaults.
 */
export function parseConfig(raw: unknown): AssetPilotConfig {
  const result = AssetPilotConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config: ${summary}`, result.error.issues);
  }
  return result.data;
}

/**
 * Load config from YAML. A missing file yields the defaults.
 */
export function loadConfig(path: string = defaultConfigPath()): AssetPilotConfig {
  return applyEnvOverrides(parseConfig(readRawConfig(path)));
}
