/**
 * Simple Streaming HTTP Client
 *
 * Forwards one request upstream and hands back the response stream as soon
 * as the status line and headers arrive. The body is never buffered here.
 */

import https from 'https';
import http from 'http';
import { ClientAbortError, NetworkError, TimeoutError, isAbortError } from './errors.js';
import { logger } from '../utils/logger.js';
import { getErrorCode } from '../utils/errors.js';

export interface HTTPClientOptions {
  /** Socket idle timeout in ms; 0 means none */
  timeout?: number;
}

export interface ForwardRequestOptions {
  method: string;
  /** Request target sent as-is; defaults to the URL's path and query */
  path?: string;
  headers: Record<string, string>;
  body?: Buffer;
  /** Aborting destroys the upstream request and its response stream */
  signal?: AbortSignal;
}

/**
 * Streaming HTTP client with keep-alive connection pooling
 */
export class ProxyHTTPClient {
  private httpsAgent: https.Agent;
  private httpAgent: http.Agent;
  private timeout: number;

  constructor(options: HTTPClientOptions = {}) {
    this.timeout = Math.max(options.timeout ?? 0, 0);

    this.httpsAgent = new https.Agent({
      rejectUnauthorized: true,
      keepAlive: true,
      maxSockets: 50
    });
    this.httpAgent = new http.Agent({
      keepAlive: true,
      maxSockets: 50
    });
  }

  /**
   * Send the request; resolves with the upstream response once headers are in.
   *
   * Rejects with NetworkError when the upstream cannot be reached,
   * TimeoutError when the socket idles past the configured timeout, and
   * ClientAbortError when `signal` fires first.
   */
  async forward(
    url: URL,
    options: ForwardRequestOptions
  ): Promise<http.IncomingMessage> {
    const isHttps = url.protocol === 'https:';
    const protocol = isHttps ? https : http;
    const agent = isHttps ? this.httpsAgent : this.httpAgent;

    logger.debug('[http-client] Forwarding request to upstream', {
      url: url.toString(),
      method: options.method,
      bodySize: options.body?.length ?? 0
    });

    return new Promise((resolve, reject) => {
      const requestOptions: http.RequestOptions = {
        hostname: url.hostname,
        port: url.port || (isHttps ? 443 : 80),
        path: options.path ?? url.pathname + url.search,
        method: options.method,
        headers: options.headers,
        agent,
        signal: options.signal,
        timeout: this.timeout
      };

      const req = protocol.request(requestOptions, (res) => {
        logger.debug('[http-client] Received response from upstream', {
          url: url.toString(),
          statusCode: res.statusCode,
          statusMessage: res.statusMessage
        });
        resolve(res);
      });

      req.on('error', (error: Error) => {
        if (error instanceof TimeoutError) {
          reject(error);
          return;
        }

        if (options.signal?.aborted || isAbortError(error)) {
          logger.debug('[http-client] Client disconnected during request', {
            url: url.toString(),
            errorCode: getErrorCode(error)
          });
          reject(new ClientAbortError());
          return;
        }

        const errorCode = getErrorCode(error) ?? 'NETWORK_ERROR';
        logger.debug('[http-client] Network error during request', {
          url: url.toString(),
          errorCode,
          errorMessage: error.message
        });
        reject(new NetworkError(`Cannot connect to upstream: ${error.message}`, {
          errorCode,
          hostname: url.hostname
        }));
      });

      if (this.timeout > 0) {
        req.on('timeout', () => {
          logger.warn(`[http-client] Upstream idle for ${this.timeout}ms, giving up`, {
            url: url.toString(),
            method: options.method
          });
          req.destroy(new TimeoutError(`Upstream did not respond within ${this.timeout}ms`, {
            timeoutMs: this.timeout,
            hostname: url.hostname
          }));
        });
      }

      if (options.body && options.body.length > 0) {
        req.write(options.body);
      }
      req.end();
    });
  }

  /**
   * Close pooled connections
   */
  close(): void {
    this.httpsAgent.destroy();
    this.httpAgent.destroy();
  }
}
