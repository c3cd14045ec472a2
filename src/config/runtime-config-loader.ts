// src/config/runtime-config-loader.ts

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as YAML from 'yaml';

import {
  CONFIG_FILE_NAME,
  RuntimeConfigFileSchema,
  type RuntimeConfig,
  type RuntimeConfigFile,
} from './schema.js';
import { ConfigurationError, describeThrown, errorCode } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export const LOCK_DIR_ENV = 'COMMAND_RUNTIME_LOCK_DIR';
export const LOG_LEVEL_ENV = 'COMMAND_RUNTIME_LOG_LEVEL';

// Cache to avoid repeated disk IO per process
const configCache = new Map<string, RuntimeConfig>();

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Loads runtime configuration from `.command-runtime.yml` in a base directory.
 * Environment variables override the file; defaults fill the rest.
 */
export class RuntimeConfigLoader {
  constructor(
    private readonly baseDir: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * @throws ConfigurationError for invalid values or an unusable lock directory
   */
  async load(): Promise<RuntimeConfig> {
    const cacheKey = path.resolve(this.baseDir);
    const cached = configCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const configPath = path.join(this.baseDir, CONFIG_FILE_NAME);
    let raw: unknown;

    try {
      const content = await fs.readFile(configPath, 'utf-8');
      raw = YAML.parse(content);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        Logger.debug(`No ${CONFIG_FILE_NAME} found, using defaults`);
      } else {
        Logger.warn(`Failed to parse ${CONFIG_FILE_NAME}: ${describeThrown(error)}`);
      }
    }

    const config = this.buildConfigWithDefaults(this.validate(raw ?? {}));
    await this.ensureLockDirExists(config.lockDir);

    configCache.set(cacheKey, config);
    return config;
  }

  static clearCache(): void {
    configCache.clear();
  }

  private validate(raw: unknown): RuntimeConfigFile {
    const result = RuntimeConfigFileSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid ${CONFIG_FILE_NAME}: ${issues}`);
    }
    return result.data;
  }

  private buildConfigWithDefaults(file: RuntimeConfigFile): RuntimeConfig {
    const lockDirSetting = nonEmpty(this.env[LOCK_DIR_ENV]) ?? file.lockDir;
    const lockDir = lockDirSetting
      ? path.resolve(this.baseDir, lockDirSetting)
      : path.join(os.tmpdir(), 'command-runtime');

    const levelSetting = nonEmpty(this.env[LOG_LEVEL_ENV]) ?? file.logLevel ?? 'info';
    const logLevel = Logger.parseLevel(levelSetting);
    if (logLevel === undefined) {
      throw new ConfigurationError(
        `Unknown log level '${levelSetting}' in ${LOG_LEVEL_ENV} (expected debug, info, warn or error)`
      );
    }

    return { lockDir, logLevel };
  }

  private async ensureLockDirExists(lockDir: string): Promise<void> {
    try {
      await fs.mkdir(lockDir, { recursive: true });
    } catch (error) {
      throw new ConfigurationError(`Cannot create lock directory ${lockDir}: ${describeThrown(error)}`);
    }
  }
}
