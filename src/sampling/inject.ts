/**
 * Sampling parameter injection
 *
 * Rewrites the top-level sampling keys of a JSON request body. Everything
 * else in the body, nested values included, is left alone. Bodies that are
 * empty, not JSON, or not a JSON object are returned as-is (fail open).
 */

import { isLosslessNumber, isSafeNumber, parse, stringify } from 'lossless-json';
import { type ResolvedConfig, SAMPLING_KEYS, type SamplingKey, isSet } from './types.js';

export interface SamplingChange {
  key: SamplingKey;
  /** Value the client sent, undefined when the key was absent */
  previous: unknown;
  value: number;
}

export type InjectionSkipReason = 'empty-body' | 'invalid-json' | 'not-an-object';

export interface InjectionResult {
  /** Bytes to forward; the input buffer itself when nothing changed */
  body: Buffer;
  modified: boolean;
  changes: SamplingChange[];
  /** Parsed body when it was a JSON object (after injection); numbers stay LosslessNumber */
  parsed?: Record<string, unknown>;
  skipped?: InjectionSkipReason;
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

/**
 * Apply the resolved overrides to a raw request body.
 *
 * The body is only re-serialized when at least one override differs from
 * what the client sent, so a no-op config forwards the original bytes.
 */
export function injectSamplingParams(
  body: Buffer,
  config: ResolvedConfig
): InjectionResult {
  if (body.length === 0) {
    return { body, modified: false, changes: [], skipped: 'empty-body' };
  }

  // Numbers are kept as their source text so untouched keys re-serialize exactly
  let data: unknown;
  try {
    data = parse(utf8Decoder.decode(body));
  } catch {
    return { body, modified: false, changes: [], skipped: 'invalid-json' };
  }

  if (!isPlainObject(data)) {
    return { body, modified: false, changes: [], skipped: 'not-an-object' };
  }

  const changes: SamplingChange[] = [];
  for (const key of SAMPLING_KEYS) {
    const setting = config[key];
    if (!isSet(setting)) continue;

    const previous = data[key];
    if (!sameNumber(previous, setting.value)) {
      data[key] = setting.value;
      changes.push({ key, previous: plainValue(previous), value: setting.value });
    }
  }

  if (changes.length === 0) {
    return { body, modified: false, changes, parsed: data };
  }

  const serialized = stringify(data);
  if (serialized === undefined) {
    return { body, modified: false, changes: [], skipped: 'invalid-json' };
  }

  return {
    body: Buffer.from(serialized, 'utf-8'),
    modified: true,
    changes,
    parsed: data
  };
}

function sameNumber(previous: unknown, value: number): boolean {
  if (isLosslessNumber(previous)) {
    return Number(previous.value) === value;
  }
  return previous === value;
}

function plainValue(value: unknown): unknown {
  if (isLosslessNumber(value) && isSafeNumber(value.value)) {
    return Number(value.value);
  }
  return value;
}

const MAX_LOG_LENGTH = 200;

/**
 * Shorten a value for log output: `abc... (1234 chars)`
 */
export function truncate(value: unknown, maxLength: number = MAX_LOG_LENGTH): string {
  const text = typeof value === 'string' ? value : stringify(value) ?? String(value);
  if (text.length > maxLength) {
    return `${text.slice(0, maxLength)}... (${text.length} chars)`;
  }
  return text;
}
