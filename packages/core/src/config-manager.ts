import { readFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import {
  type GreenGateConfig,
  DEFAULT_CONFIG,
  greenGateConfigSchema,
  ConfigError,
} from '@greengate/shared';

export const CONFIG_FILE_NAMES = ['greengate.config.yaml', 'greengate.config.yml', 'greengate.config.json'];

export const CONFIG_ENV_VARS = [
  'GREENGATE_PROVIDER',
  'GREENGATE_API_KEY',
  'GREENGATE_REGION',
  'GREENGATE_LOG_LEVEL',
  'GREENGATE_DB_PATH',
];

export interface ConfigLoadOptions {
  configPath?: string;
  /** Defaults to process.cwd(). */
  cwd?: string;
  /** Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: GreenGateConfig = DEFAULT_CONFIG;
  private sourcePath: string | null = null;

  async load(options: ConfigLoadOptions = {}): Promise<GreenGateConfig> {
    // 1. Start with defaults
    let merged = toRecord(structuredClone(DEFAULT_CONFIG));

    // 2. Load config file
    const fileConfig = await this.loadConfigFile(options.configPath, options.cwd);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
    }

    // 3. Load environment variables
    merged = deepMerge(merged, loadEnvVars(options.env ?? process.env));

    // 4. Validate
    this.config = validate(merged);
    return this.config;
  }

  get<K extends keyof GreenGateConfig>(key: K): GreenGateConfig[K] {
    return this.config[key];
  }

  getAll(): GreenGateConfig {
    return this.config;
  }

  /** Path of the file the last load() read, if any. */
  getSourcePath(): string | null {
    return this.sourcePath;
  }

  set(overrides: Record<string, unknown>): void {
    this.config = validate(deepMerge(toRecord(structuredClone(this.config)), overrides));
  }

  private async loadConfigFile(configPath?: string, cwd?: string): Promise<Record<string, unknown> | null> {
    this.sourcePath = null;
    if (configPath) {
      const p = resolve(cwd ?? process.cwd(), configPath);
      if (!existsSync(p)) {
        throw new ConfigError(`config file not found: ${p}`);
      }
      return this.parseConfigFile(p);
    }

    // Search cwd and parent directories
    let dir = resolve(cwd ?? process.cwd());
    for (let depth = 0; depth < 10; depth++) {
      for (const name of CONFIG_FILE_NAMES) {
        const p = resolve(dir, name);
        if (existsSync(p)) {
          return this.parseConfigFile(p);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) break; // reached filesystem root
      dir = parent;
    }

    return null;
  }

  private async parseConfigFile(p: string): Promise<Record<string, unknown>> {
    const content = await readFile(p, 'utf-8');
    let parsed: unknown;
    try {
      parsed = p.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new ConfigError(`cannot parse ${p}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (parsed === null || parsed === undefined) {
      parsed = {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`${p} must contain a mapping at the top level`);
    }
    this.sourcePath = p;
    return camelCaseKeys(parsed);
  }
}

function validate(raw: Record<string, unknown>): GreenGateConfig {
  const result = greenGateConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
    );
  }
  return result.data;
}

function loadEnvVars(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  const carbonApi: Record<string, unknown> = {};

  if (env.GREENGATE_PROVIDER) carbonApi.provider = env.GREENGATE_PROVIDER;
  if (env.GREENGATE_API_KEY) carbonApi.apiKey = env.GREENGATE_API_KEY;
  if (env.GREENGATE_REGION) carbonApi.region = env.GREENGATE_REGION;
  if (Object.keys(carbonApi).length > 0) config.carbonApi = carbonApi;

  if (env.GREENGATE_LOG_LEVEL) {
    config.logging = { level: env.GREENGATE_LOG_LEVEL };
  }

  if (env.GREENGATE_DB_PATH) {
    config.store = { dbPath: env.GREENGATE_DB_PATH };
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

/** carbon_api.api_key → carbonApi.apiKey */
export function camelCaseKeys(source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    const camel = key.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
    result[camel] = isRecord(value) ? camelCaseKeys(value) : value;
  }
  return result;
}

export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const next = source[key];
    const current = target[key];
    if (isRecord(next) && isRecord(current)) {
      result[key] = deepMerge(current, next);
    } else {
      result[key] = next;
    }
  }
  return result;
}
