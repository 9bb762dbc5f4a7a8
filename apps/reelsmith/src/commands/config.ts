import { parseConfigEntry, saveConfig } from '../config/index.js';
import type { Config } from '../config/schema.js';

export function showConfig(config: Config): string {
  return Object.entries(config)
    .map(([key, value]) => `${key} = ${Array.isArray(value) ? value.join(' ') : String(value)}`)
    .join('\n');
}

export function setConfig(key: string, value: string, configFile?: string): string {
  const saved = saveConfig(parseConfigEntry(key, value), configFile);
  return `Saved ${Object.keys(saved).length} setting(s); ${key} updated`;
}
