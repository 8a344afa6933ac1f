import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { DEFAULT_CONFIG, type LecfixConfig } from './types.js';

const CONFIG_DIR = join(homedir(), '.lecfix');
const CONFIG_FILE = 'config.json';
const DB_FILE = 'runs.db';

const termMap = z.record(z.string(), z.string());

const ConfigFileSchema = z.object({
  dbPath: z.string().optional(),
  stages: z.object({
    technicalTerms: z.boolean(),
    endingFixes: z.boolean(),
    repetitionRemoval: z.boolean(),
    fillerRemoval: z.boolean(),
    naturalization: z.boolean(),
    punctuation: z.boolean(),
    normalization: z.boolean(),
  }).partial().optional(),
  llm: z.object({
    enabled: z.boolean(),
    model: z.string().min(1),
    domain: z.string().min(1),
    temperature: z.number().min(0).max(1),
    topP: z.number().min(0).max(1),
    maxTokens: z.number().int().positive(),
    useThreshold: z.number().min(0).max(1),
    inputRatePer1k: z.number().nonnegative(),
    outputRatePer1k: z.number().nonnegative(),
  }).partial().optional(),
  cost: z.object({
    currency: z.string().min(1),
    currencyRate: z.number().positive(),
    maxCostPerSession: z.number().nonnegative(),
    alertThreshold: z.number().nonnegative(),
  }).partial().optional(),
  scoring: z.object({
    variant: z.enum(['refined', 'simple']),
  }).partial().optional(),
  customPatterns: z.object({
    techTerms: termMap,
    organizationNames: termMap,
    productNames: termMap,
  }).partial().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export class ConfigError extends Error {
  constructor(message: string, readonly filePath: string) {
    super(`${message} (${filePath})`);
    this.name = 'ConfigError';
  }
}

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function getConfigPath(): string {
  return join(CONFIG_DIR, CONFIG_FILE);
}

export function getDbPath(): string {
  return join(CONFIG_DIR, DB_FILE);
}

export function defaultConfig(): LecfixConfig {
  return { ...structuredClone(DEFAULT_CONFIG), dbPath: getDbPath() };
}

/**
 * Defaults, then the saved config file, then the environment.
 */
export function resolveConfig(configPath?: string): LecfixConfig {
  const path = configPath ? resolve(configPath) : getConfigPath();
  let config = defaultConfig();

  if (existsSync(path)) {
    config = mergeConfig(config, loadConfigFile(path));
  } else if (configPath) {
    throw new ConfigError('Config file not found', path);
  }

  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (apiKey) {
    config.llm.enabled = true;
    config.llm.apiKey = apiKey;
  }

  return config;
}

export function loadConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file is not valid JSON: ${reason}`, path);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid config at "${issue.path.join('.')}": ${issue.message}`, path);
  }
  return parsed.data;
}

export function mergeConfig(base: LecfixConfig, file: ConfigFile): LecfixConfig {
  return {
    dbPath: file.dbPath ?? base.dbPath,
    stages: { ...base.stages, ...file.stages },
    llm: { ...base.llm, ...file.llm },
    cost: { ...base.cost, ...file.cost },
    scoring: { ...base.scoring, ...file.scoring },
    customPatterns: {
      techTerms: { ...base.customPatterns.techTerms, ...file.customPatterns?.techTerms },
      organizationNames: { ...base.customPatterns.organizationNames, ...file.customPatterns?.organizationNames },
      productNames: { ...base.customPatterns.productNames, ...file.customPatterns?.productNames },
    },
  };
}

export function saveConfig(config: LecfixConfig, configPath?: string): string {
  const path = configPath ? resolve(configPath) : getConfigPath();
  mkdirSync(dirname(path), { recursive: true });

  // Never persist the API key
  const { apiKey: _apiKey, ...llm } = config.llm;
  const toSave: ConfigFile = { ...config, llm };

  writeFileSync(path, JSON.stringify(toSave, null, 2) + '\n', 'utf-8');
  return path;
}

export function ensureConfigDir(): void {
  if (!existsSync(CONFIG_DIR)) {
    mkdirSync(CONFIG_DIR, { recursive: true });
  }
}
