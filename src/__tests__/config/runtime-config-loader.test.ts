import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  LOCK_DIR_ENV,
  LOG_LEVEL_ENV,
  RuntimeConfigLoader,
} from '../../config/runtime-config-loader.js';
import { ConfigurationError } from '../../utils/errors.js';
import { LogLevel } from '../../utils/logger.js';
import { createTempDir, cleanupTempDir } from '../setup.js';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as YAML from 'yaml';

describe('RuntimeConfigLoader', () => {
  let tempDir: string;
  let configPath: string;

  async function writeConfig(content: string): Promise<void> {
    await fs.writeFile(configPath, content, 'utf-8');
  }

  beforeEach(async () => {
    tempDir = await createTempDir('runtime-config-test-');
    configPath = path.join(tempDir, '.command-runtime.yml');
    RuntimeConfigLoader.clearCache();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
    RuntimeConfigLoader.clearCache();
  });

  describe('load', () => {
    it('should return defaults when no config file exists', async () => {
      const config = await new RuntimeConfigLoader(tempDir, {}).load();

      expect(config).toEqual({
        lockDir: path.join(os.tmpdir(), 'command-runtime'),
        logLevel: LogLevel.INFO,
      });
    });

    it('should read the config file and create the lock directory', async () => {
      await writeConfig(YAML.stringify({ lockDir: 'locks', logLevel: 'debug' }));

      const config = await new RuntimeConfigLoader(tempDir, {}).load();

      expect(config).toEqual({ lockDir: path.join(tempDir, 'locks'), logLevel: LogLevel.DEBUG });
      const stats = await fs.stat(config.lockDir);
      expect(stats.isDirectory()).toBe(true);
    });

    it('should let environment variables override the file', async () => {
      await writeConfig(YAML.stringify({ lockDir: 'locks', logLevel: 'debug' }));
      const envLockDir = path.join(tempDir, 'env-locks');

      const config = await new RuntimeConfigLoader(tempDir, {
        [LOCK_DIR_ENV]: envLockDir,
        [LOG_LEVEL_ENV]: 'WARN',
      }).load();

      expect(config).toEqual({ lockDir: envLockDir, logLevel: LogLevel.WARN });
    });

    it('should ignore blank environment variables', async () => {
      await writeConfig(YAML.stringify({ lockDir: 'locks' }));

      const config = await new RuntimeConfigLoader(tempDir, { [LOCK_DIR_ENV]: '  ', [LOG_LEVEL_ENV]: '' }).load();

      expect(config).toEqual({ lockDir: path.join(tempDir, 'locks'), logLevel: LogLevel.INFO });
    });

    it('should treat an empty file as defaults', async () => {
      await writeConfig('');
      const lockDir = path.join(tempDir, 'env-locks');

      const config = await new RuntimeConfigLoader(tempDir, { [LOCK_DIR_ENV]: lockDir }).load();

      expect(config).toEqual({ lockDir, logLevel: LogLevel.INFO });
    });

    it('should fall back to defaults when the file is not valid YAML', async () => {
      await writeConfig('lockDir: [unclosed');
      const lockDir = path.join(tempDir, 'env-locks');

      const config = await new RuntimeConfigLoader(tempDir, { [LOCK_DIR_ENV]: lockDir }).load();

      expect(config.logLevel).toBe(LogLevel.INFO);
      expect(console.warn).toHaveBeenCalledWith(
        expect.stringMatching(/^⚠️ {2}Failed to parse \.command-runtime\.yml: /)
      );
    });

    it('should reject unknown keys', async () => {
      await writeConfig(YAML.stringify({ colour: true }));

      await expect(new RuntimeConfigLoader(tempDir, {}).load()).rejects.toThrow(
        "Invalid .command-runtime.yml: (root): Unrecognized key(s) in object: 'colour'"
      );
    });

    it('should reject unknown log levels in the file', async () => {
      await writeConfig(YAML.stringify({ logLevel: 'loud' }));

      const error = await new RuntimeConfigLoader(tempDir, {}).load().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ message: expect.stringMatching(/^Invalid \.command-runtime\.yml: logLevel: /) });
    });

    it('should reject unknown log levels in the environment', async () => {
      await expect(new RuntimeConfigLoader(tempDir, { [LOG_LEVEL_ENV]: 'loud' }).load()).rejects.toThrow(
        "Unknown log level 'loud' in COMMAND_RUNTIME_LOG_LEVEL (expected debug, info, warn or error)"
      );
    });

    it('should fail when the lock directory cannot be created', async () => {
      const blocker = path.join(tempDir, 'blocker');
      await fs.writeFile(blocker, 'not a directory', 'utf-8');

      await expect(
        new RuntimeConfigLoader(tempDir, { [LOCK_DIR_ENV]: path.join(blocker, 'locks') }).load()
      ).rejects.toThrow(`Cannot create lock directory ${path.join(blocker, 'locks')}: `);
    });

    it('should cache the configuration per base directory', async () => {
      await writeConfig(YAML.stringify({ lockDir: 'locks' }));
      const loader = new RuntimeConfigLoader(tempDir, {});

      const first = await loader.load();
      await writeConfig(YAML.stringify({ lockDir: 'other' }));
      const second = await loader.load();

      expect(second).toBe(first);

      RuntimeConfigLoader.clearCache();
      expect((await loader.load()).lockDir).toBe(path.join(tempDir, 'other'));
    });
  });
});
