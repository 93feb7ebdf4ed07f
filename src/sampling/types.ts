/**
 * Sampling Types
 *
 * Each sampling parameter is an explicit tagged option so that "never
 * mentioned" and "config said null" both collapse to `unset` in one
 * auditable place (the config loader), never via truthiness checks.
 */

export type Setting<T> =
  | { kind: 'unset' }
  | { kind: 'set'; value: T };

export const UNSET: Setting<never> = Object.freeze({ kind: 'unset' as const });

export function set<T>(value: T): Setting<T> {
  return { kind: 'set', value };
}

export function isSet<T>(setting: Setting<T>): setting is { kind: 'set'; value: T } {
  return setting.kind === 'set';
}

/**
 * Names of the sampling parameters, exactly as they appear in request bodies.
 */
export const SAMPLING_KEYS = ['temperature', 'top_p', 'top_k'] as const;

export type SamplingKey = (typeof SAMPLING_KEYS)[number];

export interface SamplingOverrides {
  /** [0.0, 1.0] */
  temperature: Setting<number>;
  /** Nucleus sampling threshold, [0.0, 1.0] */
  top_p: Setting<number>;
  /** Integer >= 1 */
  top_k: Setting<number>;
}

/**
 * Final overrides after merging CLI and config file. Built once at startup
 * and frozen; every request handler reads the same instance.
 */
export type ResolvedConfig = Readonly<SamplingOverrides>;

export function emptyOverrides(): SamplingOverrides {
  return { temperature: UNSET, top_p: UNSET, top_k: UNSET };
}
