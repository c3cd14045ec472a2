// src/config/schema.ts

import { z } from 'zod';
import type { LogLevel } from '../utils/logger.js';

export const CONFIG_FILE_NAME = '.command-runtime.yml';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Shape of `.command-runtime.yml`. Every key is optional.
 */
export const RuntimeConfigFileSchema = z
  .object({
    lockDir: z.string().min(1).optional(),    // relative paths resolve against the config's directory
    logLevel: z.enum(LOG_LEVEL_NAMES).optional(),
  })
  .strict();

export type RuntimeConfigFile = z.infer<typeof RuntimeConfigFileSchema>;

/**
 * Resolved runtime configuration.
 */
export interface RuntimeConfig {
  lockDir: string;       // absolute, created on load
  logLevel: LogLevel;
}
