import { ConfigurationError } from '../utils/errors.js';
import {
  type ResolvedConfig,
  SAMPLING_KEYS,
  type SamplingKey,
  type SamplingOverrides,
  type Setting,
  UNSET,
  isSet
} from './types.js';

/**
 * Merge CLI and config-file overrides, field by field.
 *
 * CLI wins whenever it sets a field; otherwise the file value is used;
 * otherwise the field stays unset. Either input may be missing entirely.
 */
export function resolve(
  cliOverrides?: Partial<SamplingOverrides>,
  fileOverrides?: Partial<SamplingOverrides>
): ResolvedConfig {
  const pick = (key: SamplingKey): Setting<number> => {
    const fromCli = cliOverrides?.[key];
    if (fromCli && isSet(fromCli)) return fromCli;
    const fromFile = fileOverrides?.[key];
    if (fromFile && isSet(fromFile)) return fromFile;
    return UNSET;
  };

  return Object.freeze({
    temperature: pick('temperature'),
    top_p: pick('top_p'),
    top_k: pick('top_k')
  });
}

/**
 * Reject values outside the documented domain before the listener starts.
 *
 * @param source - where the values came from, used in the error message
 */
export function validateOverrides(
  overrides: Partial<SamplingOverrides>,
  source: string = 'sampling config'
): void {
  for (const key of SAMPLING_KEYS) {
    const setting = overrides[key];
    if (!setting || !isSet(setting)) continue;

    const value = setting.value;
    if (key === 'top_k') {
      if (!Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(
          `Invalid top_k in ${source}: ${value} (expected an integer >= 1)`,
          { field: key, value, source }
        );
      }
    } else if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ConfigurationError(
        `Invalid ${key} in ${source}: ${value} (expected a number between 0.0 and 1.0)`,
        { field: key, value, source }
      );
    }
  }
}

/**
 * One-line summary for the startup banner, e.g.
 * `temperature=0.7, top_p=unset, top_k=40`
 */
export function describeSampling(config: ResolvedConfig): string {
  return SAMPLING_KEYS
    .map(key => {
      const setting = config[key];
      return `${key}=${isSet(setting) ? setting.value : 'unset'}`;
    })
    .join(', ');
}
