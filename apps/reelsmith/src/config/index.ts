import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import type { RendererCommand } from '@reelsmith/core';
import {
  ConfigSchema,
  DEFAULT_DATA_DIR,
  isConfigKey,
  StoredConfigSchema,
  type Config,
  type ConfigKey,
  type StoredConfig,
} from './schema.js';

export interface CliFlags {
  dataDir?: string;
  /** Whitespace-separated command line, e.g. "python -m manim render". */
  renderer?: string;
  quality?: string;
  format?: string;
  timeoutSeconds?: number;
  disableCaching?: boolean;
  logLevel?: string;
}

export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  /** Stored config file; defaults to ~/.reelsmith/config.json. */
  configFile?: string;
}

export const CONFIG_FILE = path.join(DEFAULT_DATA_DIR, 'config.json');

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

export function splitCommand(value: string): string[] {
  return value.trim().split(/\s+/).filter(Boolean);
}

function read(file: string): StoredConfig {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw new ConfigError(`Could not read ${file}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${file} is not valid JSON`, { cause: err });
  }
  const parsed = StoredConfigSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(`Invalid ${file}: ${describeIssues(parsed.error)}`);
  return parsed.data;
}

function write(file: string, data: StoredConfig): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, `${JSON.stringify(data, null, 2)}\n`);
}

/** Flags win over the environment, which wins over the stored file, then defaults. */
export function loadConfig(flags: CliFlags = {}, sources: ConfigSources = {}): Config {
  const env = sources.env ?? process.env;
  const stored = read(sources.configFile ?? CONFIG_FILE);
  const renderer = flags.renderer ?? (env.REELSMITH_RENDERER || undefined);

  const result = ConfigSchema.safeParse({
    dataDir: flags.dataDir ?? (env.REELSMITH_HOME || stored.dataDir),
    renderer: renderer !== undefined ? splitCommand(renderer) : stored.renderer,
    quality: flags.quality ?? stored.quality,
    format: flags.format ?? stored.format,
    timeoutSeconds: flags.timeoutSeconds ?? stored.timeoutSeconds,
    disableCaching: flags.disableCaching ?? stored.disableCaching,
    logLevel: flags.logLevel ?? (env.REELSMITH_LOG_LEVEL || stored.logLevel),
  });
  if (!result.success) throw new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`);
  return result.data;
}

/** Merge `patch` into the stored file and return what was written. */
export function saveConfig(patch: StoredConfig, configFile = CONFIG_FILE): StoredConfig {
  const parsed = StoredConfigSchema.safeParse({ ...read(configFile), ...patch });
  if (!parsed.success) throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  write(configFile, parsed.data);
  return parsed.data;
}

/** Parse a `config set <key> <value>` pair into a validated patch. */
export function parseConfigEntry(key: string, value: string): StoredConfig {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown config key "${key}". Known keys: ${Object.keys(ConfigSchema.shape).join(', ')}`);
  }
  const parsed = StoredConfigSchema.safeParse({ [key]: coerce(key, value) });
  if (!parsed.success) throw new ConfigError(`Invalid value for ${key}: ${describeIssues(parsed.error)}`);
  return parsed.data;
}

function coerce(key: ConfigKey, value: string): unknown {
  switch (key) {
    case 'renderer':
      return splitCommand(value);
    case 'timeoutSeconds':
      return Number(value);
    case 'disableCaching':
      return value === 'true' ? true : value === 'false' ? false : value;
    default:
      return value;
  }
}

export function rendererCommand(config: Config): RendererCommand {
  const [command, ...args] = config.renderer;
  return { command, args };
}
