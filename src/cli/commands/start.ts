import { Command } from 'commander';
import chalk from 'chalk';
import { SamplingProxy } from '../../utils/sampling-proxy.js';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { describeSampling } from '../../sampling/resolver.js';
import { DEFAULT_HOST, DEFAULT_PORT, DEFAULT_UPSTREAM_URL } from '../../proxy/types.js';
import {
  type SamplingCliOptions,
  addSamplingOptions,
  parseInteger,
  parsePort,
  parseUpstreamUrl,
  resolveSamplingOptions
} from '../options.js';

interface StartOptions extends SamplingCliOptions {
  port: number;
  host: string;
  upstream: string;
  timeout?: number;
  cors?: boolean;
  debug?: boolean;
}

export function createStartCommand(): Command {
  const command = new Command('start');

  addSamplingOptions(command)
    .description('Start the proxy and inject sampling parameters into forwarded requests')
    .option('--port <port>', 'Port to listen on', parsePort, DEFAULT_PORT)
    .option('--host <host>', 'Host to bind to', DEFAULT_HOST)
    .option('--upstream <url>', 'Upstream API origin', DEFAULT_UPSTREAM_URL)
    .option('--timeout <ms>', 'Abort upstream requests idle for this long (default: no timeout)', parseInteger)
    .option('--cors', 'Answer CORS preflight (OPTIONS) requests locally')
    .option('--debug', 'Log every request and response')
    .action(async (options: StartOptions) => {
      if (options.debug) {
        logger.setDebug(true);
      }

      try {
        const sampling = await resolveSamplingOptions(options);
        const targetApiUrl = parseUpstreamUrl(options.upstream);

        const proxy = new SamplingProxy({
          targetApiUrl,
          host: options.host,
          port: options.port,
          timeout: options.timeout,
          cors: options.cors,
          sampling
        });

        const { url } = await proxy.start();

        if (options.config) {
          logger.info(`Loaded config from: ${options.config}`);
        }
        logger.info(`Sampling config: ${describeSampling(sampling)}`);
        logger.success(`Proxy listening on ${url}`);
        logger.info(`Forwarding to ${targetApiUrl}`);
        console.log();
        console.log('To use with Claude Code, run:');
        console.log(chalk.bold(`  ANTHROPIC_BASE_URL=${url} claude`));
        console.log();

        let shuttingDown = false;
        const shutdown = (): void => {
          if (shuttingDown) return;
          shuttingDown = true;
          logger.info('Shutting down');
          proxy.stop()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
              logger.error(`Shutdown failed: ${getErrorMessage(error)}`);
              process.exit(1);
            });
        };
        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });

  return command;
}
