import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_TIMEOUT_SECONDS, LOG_LEVELS, MAX_TIMEOUT_SECONDS, OUTPUT_FORMATS, QUALITY_PRESETS } from '@reelsmith/core';

export const DEFAULT_DATA_DIR = path.join(os.homedir(), '.reelsmith');
export const DEFAULT_RENDERER_COMMAND = ['manim', 'render'];

export const ConfigSchema = z.object({
  dataDir: z.string().min(1).default(DEFAULT_DATA_DIR),
  /** Renderer executable followed by its fixed arguments. */
  renderer: z.array(z.string().min(1)).min(1).default(DEFAULT_RENDERER_COMMAND),
  quality: z.enum(QUALITY_PRESETS).default('low'),
  format: z.enum(OUTPUT_FORMATS).default('mp4'),
  timeoutSeconds: z.number().positive().max(MAX_TIMEOUT_SECONDS).default(DEFAULT_TIMEOUT_SECONDS),
  disableCaching: z.boolean().default(true),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigKey = keyof Config;

/** Shape of ~/.reelsmith/config.json: any subset of the config. */
export const StoredConfigSchema = ConfigSchema.partial();
export type StoredConfig = z.infer<typeof StoredConfigSchema>;

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(ConfigSchema.shape, key);
}
