import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { type SamplingKey, type SamplingOverrides, type Setting, SAMPLING_KEYS, UNSET, emptyOverrides, set } from '../sampling/types.js';
import { ConfigurationError, getErrorMessage } from './errors.js';
import { logger } from './logger.js';

/**
 * Older config files spell the keys with a `preferred_` prefix.
 * The plain key wins when both are present and non-null.
 */
const KEY_ALIASES: Record<SamplingKey, string> = {
  temperature: 'preferred_temperature',
  top_p: 'preferred_top_p',
  top_k: 'preferred_top_k'
};

/**
 * Loads the sampling config file.
 *
 * Format: `{ "temperature": 0.7, "top_p": null, "top_k": 40 }`. Every key
 * is optional; an absent key and a null key both mean "no opinion".
 */
export class ConfigLoader {
  static expandHome(filePath: string): string {
    if (filePath === '~') return os.homedir();
    if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
      return path.join(os.homedir(), filePath.slice(2));
    }
    return filePath;
  }

  /**
   * Read and parse a config file. A missing or malformed file throws
   * ConfigurationError.
   */
  static async loadSamplingFile(filePath: string): Promise<SamplingOverrides> {
    const resolvedPath = path.resolve(this.expandHome(filePath));

    let content: string;
    try {
      content = await fs.readFile(resolvedPath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(
        `Could not read config file ${resolvedPath}: ${getErrorMessage(error)}`,
        { path: resolvedPath }
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Invalid JSON in config file ${resolvedPath}: ${getErrorMessage(error)}`,
        { path: resolvedPath }
      );
    }

    const overrides = this.parseSamplingConfig(data, resolvedPath);
    logger.debug(`Loaded config from: ${resolvedPath}`);
    return overrides;
  }

  /**
   * Convert an already-parsed JSON value into overrides.
   */
  static parseSamplingConfig(data: unknown, source: string = 'config file'): SamplingOverrides {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new ConfigurationError(`Config file ${source} must contain a JSON object`, { path: source });
    }

    const entries = new Map<string, unknown>(Object.entries(data));
    const overrides = emptyOverrides();
    for (const key of SAMPLING_KEYS) {
      overrides[key] = this.readSetting(entries, key, source);
    }
    return overrides;
  }

  private static readSetting(
    entries: Map<string, unknown>,
    key: SamplingKey,
    source: string
  ): Setting<number> {
    const primary = entries.get(key);
    const alias = KEY_ALIASES[key];
    const [name, value] = primary === undefined || primary === null
      ? [alias, entries.get(alias)]
      : [key, primary];

    if (value === undefined || value === null) {
      return UNSET;
    }

    if (typeof value !== 'number') {
      throw new ConfigurationError(
        `Config key "${name}" in ${source} must be a number or null, got ${JSON.stringify(value)}`,
        { path: source, field: name }
      );
    }

    return set(value);
  }
}
