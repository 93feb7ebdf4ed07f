/**
 * Logging Plugin - Request/Response Logging
 * Priority: 50 (runs after sampling, so it sees the forwarded body)
 *
 * Logs at DEBUG level (enable with --debug or SAMPLING_PROXY_DEBUG=1):
 * - Request: method, URL, target, content-type, body size
 * - Response headers: status-related headers, streaming detection
 * - Streaming: first chunk and every 1000th chunk
 * - Completion: status, bytes, chunk count, duration
 *
 * Per-request counters live in a WeakMap keyed by the request context, so
 * concurrent requests never see each other's counts.
 */

import type { IncomingHttpHeaders } from 'http';
import type { ProxyPlugin, PluginContext, ProxyInterceptor } from './types.js';
import type { ProxyContext, ResponseMetadata } from '../types.js';
import type { Logger } from '../../utils/logger.js';

interface StreamState {
  chunkCount: number;
  totalBytes: number;
  contentType: string;
}

export class LoggingPlugin implements ProxyPlugin {
  id = 'sampling-proxy/logging';
  name = 'Logging';
  version = '1.0.0';
  priority = 50;

  async createInterceptor(context: PluginContext): Promise<ProxyInterceptor> {
    return new LoggingInterceptor(context.logger);
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export class LoggingInterceptor implements ProxyInterceptor {
  name = 'logging';
  private streams = new WeakMap<ProxyContext, StreamState>();

  constructor(private readonly logger: Logger) {}

  onRequest(context: ProxyContext): void {
    this.logger.debug(`[proxy-request] ${context.method} ${context.url}`, {
      requestId: context.requestId,
      targetUrl: context.targetUrl,
      contentType: context.headers['content-type'] ?? 'unknown',
      bodySize: context.requestBody.length,
      hasAuth: Boolean(context.headers['x-api-key'] || context.headers['authorization'])
    });
  }

  onResponseHeaders(context: ProxyContext, headers: IncomingHttpHeaders): void {
    const contentType = headerValue(headers['content-type']) ?? 'unknown';
    this.streams.set(context, { chunkCount: 0, totalBytes: 0, contentType });

    this.logger.debug(`[proxy-response-headers] ${context.url}`, {
      requestId: context.requestId,
      headers: {
        'content-type': contentType,
        'content-length': headers['content-length'],
        'transfer-encoding': headers['transfer-encoding']
      },
      isStreaming: contentType.includes('text/event-stream')
    });
  }

  onResponseChunk(context: ProxyContext, chunk: Buffer): Buffer {
    const state = this.streams.get(context);
    if (state) {
      state.chunkCount++;
      state.totalBytes += chunk.length;

      if (state.chunkCount === 1 || state.chunkCount % 1000 === 0) {
        this.logger.debug(`[proxy-streaming] ${context.url}`, {
          requestId: context.requestId,
          chunkNumber: state.chunkCount,
          chunkSize: chunk.length,
          totalBytes: state.totalBytes
        });
      }
    }
    return chunk;
  }

  onResponseComplete(context: ProxyContext, metadata: ResponseMetadata): void {
    const state = this.streams.get(context);
    this.streams.delete(context);

    this.logger.debug(
      `[proxy-response] ${metadata.statusCode} ${context.url} (${metadata.durationMs}ms)`,
      {
        requestId: context.requestId,
        statusMessage: metadata.statusMessage,
        contentType: state?.contentType ?? 'unknown',
        bytesSent: metadata.bytesSent,
        totalChunks: metadata.chunkCount,
        samplingChanges: context.metadata.samplingChanges
      }
    );
  }

  onError(context: ProxyContext, error: Error): void {
    this.streams.delete(context);
    this.logger.debug(`[proxy-error] ${error.name}: ${error.message}`, {
      requestId: context.requestId,
      url: context.url,
      errorStack: error.stack
    });
  }
}
