import { type Command, InvalidArgumentError } from 'commander';
import { ConfigLoader } from '../utils/config-loader.js';
import { ConfigurationError } from '../utils/errors.js';
import { resolve, validateOverrides } from '../sampling/resolver.js';
import { type ResolvedConfig, type SamplingOverrides, UNSET, set } from '../sampling/types.js';

/**
 * Sampling flags shared by `start` and `config`
 */
export interface SamplingCliOptions {
  temperature?: number;
  topP?: number;
  topK?: number;
  config?: string;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parsePort(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 0 || parsed > 65535) {
    throw new InvalidArgumentError('Port must be between 0 and 65535.');
  }
  return parsed;
}

export function addSamplingOptions(command: Command): Command {
  return command
    .option('-t, --temperature <value>', 'Temperature (0.0-1.0)', parseNumber)
    .option('-p, --top-p <value>', 'Top-p / nucleus sampling (0.0-1.0)', parseNumber)
    .option('-k, --top-k <value>', 'Top-k sampling (integer >= 1)', parseInteger)
    .option('-c, --config <path>', 'Path to JSON config file (CLI flags override it)');
}

export function cliOverrides(options: SamplingCliOptions): SamplingOverrides {
  return {
    temperature: options.temperature === undefined ? UNSET : set(options.temperature),
    top_p: options.topP === undefined ? UNSET : set(options.topP),
    top_k: options.topK === undefined ? UNSET : set(options.topK)
  };
}

/**
 * CLI flags > config file > unset, validated before anything listens
 */
export async function resolveSamplingOptions(options: SamplingCliOptions): Promise<ResolvedConfig> {
  const fromCli = cliOverrides(options);
  validateOverrides(fromCli, 'command-line flags');

  let fromFile: SamplingOverrides | undefined;
  if (options.config) {
    fromFile = await ConfigLoader.loadSamplingFile(options.config);
    validateOverrides(fromFile, options.config);
  }

  return resolve(fromCli, fromFile);
}

export function parseUpstreamUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigurationError(`Invalid upstream URL: ${value}`, { upstream: value });
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigurationError(`Upstream URL must use http or https: ${value}`, { upstream: value });
  }
  return value;
}
