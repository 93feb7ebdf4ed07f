/**
 * Sampling Plugin
 * Priority: 10 (runs before logging so the logged body is the forwarded one)
 *
 * Forces the resolved temperature / top_p / top_k into every JSON object
 * request body. Bodies that are not JSON objects pass through untouched.
 */

import type { ProxyPlugin, PluginContext, ProxyInterceptor } from './types.js';
import type { ProxyContext } from '../types.js';
import type { ResolvedConfig } from '../../sampling/types.js';
import { injectSamplingParams, truncate } from '../../sampling/inject.js';
import type { Logger } from '../../utils/logger.js';

export class SamplingPlugin implements ProxyPlugin {
  id = 'sampling-proxy/sampling';
  name = 'Sampling';
  version = '1.0.0';
  priority = 10;

  async createInterceptor(context: PluginContext): Promise<ProxyInterceptor> {
    return new SamplingInterceptor(context.config.sampling, context.logger);
  }
}

export class SamplingInterceptor implements ProxyInterceptor {
  name = 'sampling';

  constructor(
    private readonly sampling: ResolvedConfig,
    private readonly logger: Logger
  ) {}

  onRequest(context: ProxyContext): void {
    const result = injectSamplingParams(context.requestBody, this.sampling);

    if (result.skipped) {
      if (result.skipped !== 'empty-body') {
        this.logger.debug(`[${this.name}] Passing body through unchanged (${result.skipped})`, {
          requestId: context.requestId
        });
      }
      return;
    }

    if (result.parsed && this.logger.isDebugMode()) {
      this.logger.debug('Request parameters:');
      for (const [key, value] of Object.entries(result.parsed)) {
        this.logger.debug(`  ${key}: ${truncate(value)}`);
      }
    }

    if (!result.modified) return;

    for (const change of result.changes) {
      const previous = change.previous === undefined ? 'unset' : truncate(change.previous);
      this.logger.info(`Injected ${change.key}: ${previous} -> ${change.value}`);
    }

    context.requestBody = result.body;
    context.metadata.samplingChanges = result.changes;
  }
}
