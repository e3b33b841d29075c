/**
 * Configuration accessor with dot-path key support, and its YAML loader.
 */

import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError } from './errors.js';

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (current !== null && typeof current === 'object' && part in current) {
        current = (current as Record<string, unknown>)[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }
}

/**
 * Load a YAML file into a {@link Config}. An empty file yields an empty
 * configuration.
 */
export function loadConfig(filePath: string): Config {
  if (!existsSync(filePath)) {
    throw new ConfigNotFoundError(filePath);
  }

  let data: unknown;
  try {
    data = yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Invalid YAML in configuration file '${filePath}': ${e}`, { configPath: filePath }, {
      cause: e instanceof Error ? e : undefined,
    });
  }

  if (data === null || data === undefined) {
    return new Config();
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError(`Configuration file '${filePath}' is not a mapping`, { configPath: filePath });
  }
  return new Config(data as Record<string, unknown>);
}
