import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../errors/custom-errors.js';
import { LogLevel } from '../utils/logger.js';
import { DEFAULT_STORAGE_DIR, defaults } from './config-defaults.js';
import { loadConfig, readConfigFile, resolveConfig } from './config-loader.js';

describe('Config Loader', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-'));
    configPath = join(dir, 'config.yaml');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('readConfigFile', () => {
    it('should return an empty config for a missing optional file', async () => {
      expect(await readConfigFile(join(dir, 'missing.yaml'))).toEqual({});
    });

    it('should fail for a missing required file', async () => {
      await expect(readConfigFile(join(dir, 'missing.yaml'), { required: true })).rejects.toThrow(
        'Configuration file not found',
      );
    });

    it('should treat an empty file as an empty config', async () => {
      await writeFile(configPath, '');
      expect(await readConfigFile(configPath)).toEqual({});
    });

    it('should resolve environment placeholders', async () => {
      await writeFile(
        configPath,
        ['telegram:', '  botToken: "${TEST_TOKEN}"', 'storage:', '  directory: "${DATA_DIR:-/srv/files}"'].join('\n'),
      );

      const config = await readConfigFile(configPath, { env: { TEST_TOKEN: 'test-token' } });

      expect(config.telegram?.botToken).toBe('test-token');
      expect(config.storage?.directory).toBe('/srv/files');
    });

    it('should report unset placeholders as config errors', async () => {
      await writeFile(configPath, 'telegram:\n  botToken: "${UNSET_TOKEN}"\n');

      await expect(readConfigFile(configPath, { env: {} })).rejects.toThrow(
        new ConfigError('Environment variable "UNSET_TOKEN" is not set'),
      );
    });

    it('should report malformed YAML', async () => {
      await writeFile(configPath, 'storage: [unclosed');

      await expect(readConfigFile(configPath)).rejects.toThrow('Failed to parse YAML');
    });

    it('should report schema violations', async () => {
      await writeFile(configPath, 'workers:\n  concurrency: 0\n');

      await expect(readConfigFile(configPath)).rejects.toThrow('Invalid configuration: "workers.concurrency"');
    });
  });

  describe('resolveConfig', () => {
    it('should fall back to defaults and BOT_TOKEN', () => {
      const config = resolveConfig({}, { BOT_TOKEN: 'test-token' });

      expect(config.telegram).toEqual({ botToken: 'test-token', chatMinLevel: 'info' });
      expect(config.storage).toEqual({
        directory: DEFAULT_STORAGE_DIR,
        retentionMs: 600_000,
        sweepIntervalMs: 300_000,
        minFileSize: 1024,
      });
      expect(config.download).toEqual({ ...defaults.download, cookieFile: undefined });
      expect(config.delivery).toEqual({ maxAttempts: 2, retryDelayMs: 2000 });
      expect(config.workers).toEqual({ concurrency: 4, queueCapacity: 16 });
      expect(config.logging).toEqual({ level: LogLevel.INFO, colors: true });
    });

    it('should prefer the file token and convert seconds to milliseconds', () => {
      const config = resolveConfig(
        {
          telegram: { botToken: 'file-token' },
          storage: { retention: 1.5, sweepInterval: 60 },
          download: { retryDelay: 0, settleDelay: 0.25, cookieFile: 'cookies.txt' },
          logging: { level: 'warning', colors: false },
        },
        { BOT_TOKEN: 'env-token' },
      );

      expect(config.telegram.botToken).toBe('file-token');
      expect(config.storage.retentionMs).toBe(1500);
      expect(config.storage.sweepIntervalMs).toBe(60_000);
      expect(config.download.retryDelayMs).toBe(0);
      expect(config.download.settleDelayMs).toBe(250);
      expect(config.download.cookieFile).toBe('cookies.txt');
      expect(config.logging).toEqual({ level: LogLevel.WARNING, colors: false });
    });

    it('should fail without a bot token', () => {
      expect(() => resolveConfig({}, {})).toThrow(ConfigError);
      expect(() => resolveConfig({}, { BOT_TOKEN: '' })).toThrow('Bot token is not set');
    });
  });

  it('should load a file end to end', async () => {
    await writeFile(configPath, 'workers:\n  concurrency: 2\n  queueCapacity: 5\n');

    const config = await loadConfig(configPath, { env: { BOT_TOKEN: 'test-token' }, required: true });

    expect(config.workers).toEqual({ concurrency: 2, queueCapacity: 5 });
    expect(config.telegram.botToken).toBe('test-token');
  });

  it('should read the example config as the defaults', async () => {
    const example = fileURLToPath(new URL('../../config.example.yaml', import.meta.url));

    const config = await loadConfig(example, { env: { BOT_TOKEN: 'test-token' }, required: true });

    expect(config).toEqual({
      ...defaults,
      telegram: { botToken: 'test-token', chatMinLevel: 'info' },
      storage: { ...defaults.storage, directory: '/tmp/clipcourier-files' },
    });
  });
});
