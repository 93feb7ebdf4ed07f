import { describe, it, expect } from 'vitest';
import { resolve, validateOverrides, describeSampling } from '../resolver.js';
import { UNSET, emptyOverrides, set } from '../types.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('resolve', () => {
  it('prefers CLI values over file values for every field', () => {
    const result = resolve(
      { temperature: set(0.2), top_p: set(0.5), top_k: set(10) },
      { temperature: set(0.9), top_p: set(0.95), top_k: set(40) }
    );

    expect(result).toEqual({ temperature: set(0.2), top_p: set(0.5), top_k: set(10) });
  });

  it('falls back to file values for fields the CLI leaves unset', () => {
    const result = resolve(
      { temperature: set(0.2), top_p: UNSET, top_k: UNSET },
      { temperature: set(0.9), top_p: set(0.95), top_k: UNSET }
    );

    expect(result.temperature).toEqual(set(0.2));
    expect(result.top_p).toEqual(set(0.95));
    expect(result.top_k).toEqual(UNSET);
  });

  it('treats a file null (unset) with no CLI value as unset', () => {
    const result = resolve(undefined, { temperature: UNSET, top_p: set(0.8), top_k: UNSET });

    expect(result.temperature.kind).toBe('unset');
    expect(result.top_p).toEqual(set(0.8));
  });

  it('returns all fields unset when both inputs are missing', () => {
    expect(resolve()).toEqual(emptyOverrides());
  });

  it('accepts partial inputs', () => {
    const result = resolve({ top_k: set(5) }, { temperature: set(0.1) });

    expect(result).toEqual({ temperature: set(0.1), top_p: UNSET, top_k: set(5) });
  });

  it('keeps a CLI value of 0', () => {
    const result = resolve({ temperature: set(0) }, { temperature: set(0.9) });

    expect(result.temperature).toEqual(set(0));
  });

  it('returns a frozen config', () => {
    const result = resolve({ temperature: set(0.7) });

    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe('validateOverrides', () => {
  it('accepts values inside the documented domain', () => {
    expect(() => validateOverrides({ temperature: set(0), top_p: set(1), top_k: set(1) })).not.toThrow();
    expect(() => validateOverrides(emptyOverrides())).not.toThrow();
  });

  it('rejects temperature above 1', () => {
    expect(() => validateOverrides({ temperature: set(1.5) }, 'command-line flags')).toThrow(
      'Invalid temperature in command-line flags: 1.5 (expected a number between 0.0 and 1.0)'
    );
  });

  it('rejects negative top_p', () => {
    expect(() => validateOverrides({ top_p: set(-0.1) })).toThrow(ConfigurationError);
  });

  it('rejects non-finite values', () => {
    expect(() => validateOverrides({ temperature: set(Number.POSITIVE_INFINITY) })).toThrow(ConfigurationError);
  });

  it('rejects a fractional top_k', () => {
    expect(() => validateOverrides({ top_k: set(2.5) }, 'sampling.json')).toThrow(
      'Invalid top_k in sampling.json: 2.5 (expected an integer >= 1)'
    );
  });

  it('rejects top_k of 0', () => {
    expect(() => validateOverrides({ top_k: set(0) })).toThrow(ConfigurationError);
  });

  it('carries the field in the error details', () => {
    try {
      validateOverrides({ top_k: set(0) }, 'flags');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe('CONFIGURATION_ERROR');
        expect(error.details).toEqual({ field: 'top_k', value: 0, source: 'flags' });
      }
    }
  });
});

describe('describeSampling', () => {
  it('lists every key with its value or unset', () => {
    const config = resolve({ temperature: set(0.7), top_k: set(40) });

    expect(describeSampling(config)).toBe('temperature=0.7, top_p=unset, top_k=40');
  });
});
