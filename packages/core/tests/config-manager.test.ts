import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigError } from '@greengate/shared';
import { ConfigManager, camelCaseKeys, deepMerge } from '../src/config-manager.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'greengate-config-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function write(name: string, content: string, base = dir): string {
  const p = path.join(base, name);
  fs.writeFileSync(p, content);
  return p;
}

describe('ConfigManager', () => {
  it('loads defaults when no file exists', async () => {
    const config = await new ConfigManager().load({ cwd: dir, env: {} });
    expect(config.carbonApi.provider).toBe('mock');
    expect(config.train.maxCarbonIntensity).toBe(400);
  });

  it('reads snake_case YAML keys', async () => {
    write('greengate.config.yaml', [
      'carbon_api:',
      '  region: DE',
      'train:',
      '  earliest_start_hour: 22',
      '  latest_start_hour: 6',
      '  max_carbon_intensity: 350',
      'model:',
      '  batch_size: 128',
      '  use_mixed_precision: true',
    ].join('\n'));

    const manager = new ConfigManager();
    const config = await manager.load({ cwd: dir, env: {} });

    expect(config.carbonApi.region).toBe('DE');
    expect(config.train.earliestStartHour).toBe(22);
    expect(config.train.latestStartHour).toBe(6);
    expect(config.train.maxCarbonIntensity).toBe(350);
    expect(config.train.minCarbonIntensity).toBe(200);
    expect(config.model).toEqual({ batchSize: 128, useMixedPrecision: true, epochs: 10 });
    expect(manager.getSourcePath()).toBe(path.join(dir, 'greengate.config.yaml'));
  });

  it('searches parent directories', async () => {
    write('greengate.config.json', JSON.stringify({ budget: { limitGrams: 500 } }));
    const nested = path.join(dir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });

    const config = await new ConfigManager().load({ cwd: nested, env: {} });
    expect(config.budget.limitGrams).toBe(500);
  });

  it('lets environment variables override the file', async () => {
    write('greengate.config.yaml', 'carbon_api:\n  region: DE\n');
    const config = await new ConfigManager().load({
      cwd: dir,
      env: { GREENGATE_REGION: 'FR', GREENGATE_LOG_LEVEL: 'debug', GREENGATE_DB_PATH: '/tmp/gg.db' },
    });
    expect(config.carbonApi.region).toBe('FR');
    expect(config.logging.level).toBe('debug');
    expect(config.store.dbPath).toBe('/tmp/gg.db');
  });

  it('accepts the live provider with an API key from the environment', async () => {
    const config = await new ConfigManager().load({
      cwd: dir,
      env: { GREENGATE_PROVIDER: 'electricitymap', GREENGATE_API_KEY: 'test-secret' },
    });
    expect(config.carbonApi.provider).toBe('electricitymap');
    expect(config.carbonApi.apiKey).toBe('test-secret');
  });

  it('rejects the live provider without an API key', async () => {
    await expect(
      new ConfigManager().load({ cwd: dir, env: { GREENGATE_PROVIDER: 'electricitymap' } }),
    ).rejects.toThrow('Configuration error: Invalid configuration: carbonApi.apiKey: apiKey is required for the electricitymap provider');
  });

  it('rejects invalid thresholds', async () => {
    write('greengate.config.yaml', 'train:\n  min_carbon_intensity: 500\n  max_carbon_intensity: 300\n');
    await expect(new ConfigManager().load({ cwd: dir, env: {} })).rejects.toThrow(
      /train\.minCarbonIntensity: minCarbonIntensity must not exceed maxCarbonIntensity/,
    );
  });

  it('rejects out-of-range hours', async () => {
    write('greengate.config.yaml', 'train:\n  earliest_start_hour: 25\n');
    await expect(new ConfigManager().load({ cwd: dir, env: {} })).rejects.toThrow(ConfigError);
  });

  it('fails on an explicit path that does not exist', async () => {
    await expect(
      new ConfigManager().load({ cwd: dir, env: {}, configPath: 'missing.yaml' }),
    ).rejects.toThrow(/config file not found/);
  });

  it('rejects a file that is not a mapping', async () => {
    const p = write('list.yaml', '- a\n- b\n');
    await expect(new ConfigManager().load({ cwd: dir, env: {}, configPath: p })).rejects.toThrow(
      /must contain a mapping/,
    );
  });

  it('applies validated overrides', async () => {
    const manager = new ConfigManager();
    await manager.load({ cwd: dir, env: {} });
    manager.set({ budget: { limitGrams: 50 } });
    expect(manager.get('budget')).toEqual({ limitGrams: 50, period: 'daily' });
    expect(() => manager.set({ budget: { limitGrams: -1 } })).toThrow(ConfigError);
  });
});

describe('config helpers', () => {
  it('converts snake_case keys recursively', () => {
    expect(camelCaseKeys({ carbon_api: { api_key: 'test-secret' }, logging: { level: 'warn' } })).toEqual({
      carbonApi: { apiKey: 'test-secret' },
      logging: { level: 'warn' },
    });
  });

  it('merges nested objects and replaces everything else', () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: [1] }, { a: { c: 3 }, d: [2] })).toEqual({ a: { b: 1, c: 3 }, d: [2] });
  });
});
