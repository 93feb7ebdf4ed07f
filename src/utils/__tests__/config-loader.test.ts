import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigLoader } from '../config-loader.js';
import { ConfigurationError } from '../errors.js';
import { UNSET, set } from '../../sampling/types.js';

describe('ConfigLoader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sampling-proxy-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const writeConfig = (content: string): string => {
    const filePath = path.join(tmpDir, 'sampling.json');
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  describe('loadSamplingFile', () => {
    it('reads all three keys', async () => {
      const filePath = writeConfig('{"temperature": 0.7, "top_p": 0.95, "top_k": 40}');

      const overrides = await ConfigLoader.loadSamplingFile(filePath);

      expect(overrides).toEqual({ temperature: set(0.7), top_p: set(0.95), top_k: set(40) });
    });

    it('maps null and absent keys to unset', async () => {
      const filePath = writeConfig('{"temperature": null, "top_k": 5}');

      const overrides = await ConfigLoader.loadSamplingFile(filePath);

      expect(overrides).toEqual({ temperature: UNSET, top_p: UNSET, top_k: set(5) });
    });

    it('keeps a value of 0', async () => {
      const filePath = writeConfig('{"temperature": 0}');

      const overrides = await ConfigLoader.loadSamplingFile(filePath);

      expect(overrides.temperature).toEqual(set(0));
    });

    it('reads preferred_ aliases when the plain key is missing or null', async () => {
      const filePath = writeConfig('{"preferred_temperature": 0.4, "top_p": null, "preferred_top_p": 0.8}');

      const overrides = await ConfigLoader.loadSamplingFile(filePath);

      expect(overrides.temperature).toEqual(set(0.4));
      expect(overrides.top_p).toEqual(set(0.8));
    });

    it('prefers the plain key over its alias', async () => {
      const filePath = writeConfig('{"top_k": 10, "preferred_top_k": 99}');

      const overrides = await ConfigLoader.loadSamplingFile(filePath);

      expect(overrides.top_k).toEqual(set(10));
    });

    it('ignores unrelated keys', async () => {
      const filePath = writeConfig('{"model": "x", "port": 9000}');

      const overrides = await ConfigLoader.loadSamplingFile(filePath);

      expect(overrides).toEqual({ temperature: UNSET, top_p: UNSET, top_k: UNSET });
    });

    it('throws ConfigurationError for a missing file', async () => {
      await expect(
        ConfigLoader.loadSamplingFile(path.join(tmpDir, 'missing.json'))
      ).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('throws ConfigurationError for invalid JSON', async () => {
      const filePath = writeConfig('{temperature: 0.7');

      await expect(ConfigLoader.loadSamplingFile(filePath)).rejects.toThrow(/Invalid JSON in config file/);
    });

    it('throws ConfigurationError when the top level is not an object', async () => {
      const filePath = writeConfig('[0.7]');

      await expect(ConfigLoader.loadSamplingFile(filePath)).rejects.toThrow(/must contain a JSON object/);
    });

    it('throws ConfigurationError for a non-numeric value', async () => {
      const filePath = writeConfig('{"top_p": "0.9"}');

      await expect(ConfigLoader.loadSamplingFile(filePath)).rejects.toThrow(
        `Config key "top_p" in ${filePath} must be a number or null, got "0.9"`
      );
    });
  });

  describe('expandHome', () => {
    it('expands a leading tilde', () => {
      expect(ConfigLoader.expandHome('~/.claude/sampling.json')).toBe(
        path.join(os.homedir(), '.claude/sampling.json')
      );
      expect(ConfigLoader.expandHome('~')).toBe(os.homedir());
    });

    it('leaves other paths alone', () => {
      expect(ConfigLoader.expandHome('/etc/sampling.json')).toBe('/etc/sampling.json');
      expect(ConfigLoader.expandHome('conf/~x.json')).toBe('conf/~x.json');
    });
  });
});
