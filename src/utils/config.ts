// Configuration management

import { promises as fs } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { getConfigFile } from './app-paths.js';

// Load .env file
dotenv.config();

const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export const AppConfigSchema = z.object({
  region: z
    .object({
      height: z.number().int().min(1).max(50).default(5),
      interactive: z.boolean().optional(),
    })
    .default({}),
  demo: z
    .object({
      count: z.number().int().min(0).default(50),
      delayMs: z.number().int().min(0).default(100),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).default('info'),
      timestamps: z.boolean().default(false),
      colors: z.boolean().default(true),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

type ConfigRecord = Record<string, unknown>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'ConfigError';
  }
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBoolean(value: string): boolean | string {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
}

function parseNumber(value: string): number | string {
  const parsed = Number(value);
  return value.trim() !== '' && !Number.isNaN(parsed) ? parsed : value;
}

/**
 * Collect overrides from environment variables.
 * Values are left unvalidated; the schema reports bad ones.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const region: ConfigRecord = {};
  const demo: ConfigRecord = {};
  const logging: ConfigRecord = {};

  if (env.PINNED_REGION_HEIGHT) region.height = parseNumber(env.PINNED_REGION_HEIGHT);
  if (env.PINNED_REGION_INTERACTIVE) region.interactive = parseBoolean(env.PINNED_REGION_INTERACTIVE);
  if (env.PINNED_REGION_DEMO_COUNT) demo.count = parseNumber(env.PINNED_REGION_DEMO_COUNT);
  if (env.PINNED_REGION_DEMO_DELAY_MS) demo.delayMs = parseNumber(env.PINNED_REGION_DEMO_DELAY_MS);
  if (env.PINNED_REGION_LOG_LEVEL) logging.level = env.PINNED_REGION_LOG_LEVEL.trim().toLowerCase();
  // https://no-color.org: any non-empty value disables colors
  if (env.NO_COLOR) logging.colors = false;

  const overrides: ConfigRecord = {};
  if (Object.keys(region).length > 0) overrides.region = region;
  if (Object.keys(demo).length > 0) overrides.demo = demo;
  if (Object.keys(logging).length > 0) overrides.logging = logging;
  return overrides;
}

async function readConfigFile(): Promise<ConfigRecord> {
  const file = getConfigFile();
  let raw: string;

  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${file}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${file}`);
  }
  return parsed;
}

export function validateConfig(raw: unknown, source: string = 'configuration'): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ${source}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Load configuration: defaults, then the config file, then environment variables
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const fileConfig = await readConfigFile();
  return validateConfig(deepMerge(fileConfig, readEnvOverrides(env)));
}

export async function getConfigValue(key: string, env: NodeJS.ProcessEnv = process.env): Promise<unknown> {
  const config = await loadConfig(env);
  let value: unknown = config;

  for (const k of key.split('.')) {
    value = isRecord(value) ? value[k] : undefined;
  }

  return value;
}

/**
 * Persist a dotted key in the config file. The value is parsed as JSON when
 * possible, and the resulting file is validated before it is written.
 */
export async function setConfigValue(key: string, value: string): Promise<void> {
  const fileConfig = await readConfigFile();
  const keys = key.split('.');
  let obj = fileConfig;

  for (let i = 0; i < keys.length - 1; i++) {
    const next = obj[keys[i]];
    if (isRecord(next)) {
      obj = next;
    } else {
      const created: ConfigRecord = {};
      obj[keys[i]] = created;
      obj = created;
    }
  }

  // Try to parse as JSON, otherwise use string
  let parsedValue: unknown;
  try {
    parsedValue = JSON.parse(value);
  } catch {
    parsedValue = value;
  }
  obj[keys[keys.length - 1]] = parsedValue;

  validateConfig(fileConfig, `value for ${key}`);

  const file = getConfigFile();
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(fileConfig, null, 2), 'utf-8');
}

export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    if (isRecord(sourceValue)) {
      result[key] = deepMerge(isRecord(targetValue) ? targetValue : {}, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }
  return result;
}
