/**
 * Sampling Proxy Server - Plugin-Based Architecture
 *
 * Forwards every inbound request to the configured upstream with streaming,
 * running interceptor hooks around it. Sampling injection itself is a
 * plugin (see ../proxy/plugins/sampling.plugin.ts).
 *
 * Flow:
 * 1. Build context (read the full request body)
 * 2. Run onRequest hooks (body rewrite happens here)
 * 3. Forward to upstream (wait for response headers)
 * 4. Run onResponseHeaders hooks
 * 5. Stream response body chunk by chunk (with optional chunk hooks)
 * 6. Run onResponseComplete hooks
 *
 * Response bodies are never buffered.
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'http';
import type { Duplex } from 'stream';
import { randomUUID } from 'crypto';
import { logger } from './logger.js';
import { ConfigurationError, getErrorCode, getErrorMessage } from './errors.js';
import { ProxyHTTPClient } from '../proxy/http-client.js';
import {
  DEFAULT_HOST,
  DEFAULT_PORT,
  type LocalResponse,
  type ProxyConfig,
  type ProxyContext,
  type ResponseMetadata
} from '../proxy/types.js';
import {
  ClientAbortError,
  MalformedRequestError,
  NetworkError,
  TimeoutError,
  isAbortError,
  normalizeError
} from '../proxy/errors.js';
import { createDefaultRegistry, type PluginRegistry } from '../proxy/plugins/index.js';
import type { ProxyInterceptor } from '../proxy/plugins/types.js';

/** Hop-by-hop headers the HTTP client and server set for themselves */
const REQUEST_SKIP_HEADERS = ['host', 'connection', 'keep-alive', 'transfer-encoding', 'content-length'];
const RESPONSE_SKIP_HEADERS = ['transfer-encoding', 'connection'];

interface UpstreamTarget {
  url: URL;
  /** Path and query exactly as the client sent them */
  path: string;
}

export interface ProxyAddress {
  port: number;
  url: string;
}

/**
 * Sampling Proxy - plugin-based HTTP proxy with streaming
 */
export class SamplingProxy {
  private server: Server | null = null;
  private httpClient: ProxyHTTPClient;
  private interceptors: ProxyInterceptor[] = [];
  private actualPort: number = 0;

  constructor(
    private readonly config: ProxyConfig,
    private readonly registry: PluginRegistry = createDefaultRegistry()
  ) {
    this.httpClient = new ProxyHTTPClient({
      timeout: config.timeout ?? 0
    });
  }

  get port(): number {
    return this.actualPort;
  }

  /**
   * Load plugins and bind the listener.
   * Rejects with ConfigurationError when the address cannot be bound.
   */
  async start(): Promise<ProxyAddress> {
    this.interceptors = await this.registry.initialize({
      config: this.config,
      logger
    });

    await this.runHook('onProxyStart', interceptor =>
      interceptor.onProxyStart?.()
    );

    const host = this.config.host ?? DEFAULT_HOST;
    const port = this.config.port ?? DEFAULT_PORT;

    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res).catch(error => {
          logger.error('[SamplingProxy] Unhandled request error:', error);
          if (!res.headersSent) {
            this.sendErrorResponse(res, error);
          } else {
            res.destroy();
          }
        });
      });

      server.on('clientError', (error, socket) => this.handleClientError(error, socket));

      server.once('error', (error) => {
        reject(new ConfigurationError(
          `Cannot listen on ${host}:${port}: ${getErrorMessage(error)}`,
          { host, port, errorCode: getErrorCode(error) }
        ));
      });

      server.listen(port, host, () => {
        const address = server.address();
        if (typeof address === 'object' && address) {
          this.actualPort = address.port;
        }

        server.on('error', (error) => {
          logger.error('[SamplingProxy] Server error:', error);
        });

        this.server = server;
        const proxyUrl = `http://${formatHost(host)}:${this.actualPort}`;
        logger.debug(`[SamplingProxy] Started: ${proxyUrl}`);
        resolve({ port: this.actualPort, url: proxyUrl });
      });
    });
  }

  /**
   * Stop accepting connections, drop idle and in-flight ones, release the pool
   */
  async stop(): Promise<void> {
    await this.runHook('onProxyStop', interceptor =>
      interceptor.onProxyStop?.()
    );

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => {
          logger.debug('[SamplingProxy] Stopped');
          resolve();
        });
        server.closeAllConnections();
      });
    }

    this.httpClient.close();
  }

  private async handleRequest(
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<void> {
    const startTime = Date.now();

    // Caller gone before we finished: abort the upstream request too
    const abortController = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        abortController.abort();
      }
    });

    let context: ProxyContext | undefined;
    try {
      const ctx = await this.buildContext(req);
      context = ctx;

      await this.runHook('onRequest', interceptor =>
        interceptor.onRequest?.(ctx)
      );

      if (ctx.localResponse) {
        this.sendLocalResponse(res, ctx.localResponse);
        logger.debug(`[SamplingProxy] Answered locally: ${ctx.method} ${ctx.url}`);
        return;
      }

      const target = this.parseTarget(ctx.targetUrl ?? this.joinTargetUrl(ctx.url), ctx.url);
      const upstreamResponse = await this.httpClient.forward(target.url, {
        method: ctx.method,
        path: target.path,
        headers: this.buildForwardHeaders(ctx, target.url),
        body: ctx.requestBody,
        signal: abortController.signal
      });

      await this.runHook('onResponseHeaders', interceptor =>
        interceptor.onResponseHeaders?.(ctx, upstreamResponse.headers)
      );

      const metadata = await this.streamResponse(
        ctx, upstreamResponse, res, startTime, abortController.signal
      );

      await this.runHook('onResponseComplete', interceptor =>
        interceptor.onResponseComplete?.(ctx, metadata)
      );
    } catch (error) {
      await this.handleError(error, context, req, res);
    }
  }

  /**
   * Build proxy context from incoming request
   */
  private async buildContext(req: IncomingMessage): Promise<ProxyContext> {
    const url = req.url || '/';
    const targetUrl = this.joinTargetUrl(url);
    this.parseTarget(targetUrl, url);
    const requestBody = await this.readBody(req);

    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(req.headers)) {
      if (value === undefined) continue;
      headers[key] = Array.isArray(value) ? value.join(', ') : value;
    }

    return {
      requestId: randomUUID(),
      method: req.method || 'GET',
      url,
      headers,
      requestBody,
      requestStartTime: Date.now(),
      targetUrl,
      metadata: {}
    };
  }

  /**
   * Join the upstream base URL with the request path and query
   */
  private joinTargetUrl(requestPath: string): string {
    if (!requestPath.startsWith('/')) {
      throw new MalformedRequestError(`Unsupported request target: ${requestPath}`, {
        url: requestPath
      });
    }

    const base = this.config.targetApiUrl;
    return base.endsWith('/')
      ? `${base}${requestPath.slice(1)}`
      : `${base}${requestPath}`;
  }

  /**
   * Parse the joined target for host and port, keeping the raw path:
   * URL parsing would collapse dot segments such as `/a/../b`.
   */
  private parseTarget(targetUrl: string, requestPath: string): UpstreamTarget {
    let url: URL;
    try {
      url = new URL(targetUrl);
    } catch {
      throw new MalformedRequestError(`Invalid request target: ${requestPath}`, {
        url: requestPath
      });
    }

    const pathStart = targetUrl.indexOf('/', targetUrl.indexOf('//') + 2);
    const path = pathStart === -1 ? `${url.pathname}${url.search}` : targetUrl.slice(pathStart);
    return { url, path };
  }

  /**
   * Inbound headers minus hop-by-hop ones, with host pointing at the
   * upstream and content-length matching the (possibly rewritten) body.
   */
  private buildForwardHeaders(context: ProxyContext, targetUrl: URL): Record<string, string> {
    const forwardHeaders: Record<string, string> = {};
    for (const [key, value] of Object.entries(context.headers)) {
      if (!REQUEST_SKIP_HEADERS.includes(key.toLowerCase())) {
        forwardHeaders[key] = value;
      }
    }

    forwardHeaders.host = targetUrl.host;
    if (context.requestBody.length > 0 || context.headers['content-length'] !== undefined) {
      forwardHeaders['content-length'] = String(context.requestBody.length);
    }

    return forwardHeaders;
  }

  /**
   * Read the whole request body as a Buffer (multi-byte UTF-8 stays intact)
   */
  private async readBody(req: IncomingMessage): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks);
  }

  /**
   * Relay status, headers and body. Headers are flushed immediately so
   * event-stream clients see the response start before the first event.
   */
  private async streamResponse(
    context: ProxyContext,
    upstream: IncomingMessage,
    downstream: ServerResponse,
    startTime: number,
    signal: AbortSignal
  ): Promise<ResponseMetadata> {
    downstream.statusCode = upstream.statusCode || 200;
    if (upstream.statusMessage) {
      downstream.statusMessage = upstream.statusMessage;
    }

    for (const [key, value] of Object.entries(upstream.headers)) {
      if (!RESPONSE_SKIP_HEADERS.includes(key.toLowerCase()) && value !== undefined) {
        downstream.setHeader(key, value);
      }
    }
    downstream.flushHeaders();

    let bytesSent = 0;
    let chunkCount = 0;

    try {
      for await (const chunk of upstream) {
        chunkCount++;
        let processedChunk: Buffer | null = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);

        for (const interceptor of this.interceptors) {
          if (interceptor.onResponseChunk && processedChunk) {
            try {
              processedChunk = await interceptor.onResponseChunk(context, processedChunk);
            } catch (error) {
              logger.error(`[SamplingProxy] Chunk hook error in ${interceptor.name}:`, error);
            }
          }
        }

        if (processedChunk && processedChunk.length > 0) {
          bytesSent += processedChunk.length;
          if (!downstream.write(processedChunk)) {
            await waitForDrain(downstream);
          }
        }

        if (downstream.destroyed) {
          break;
        }
      }
    } catch (error) {
      // A read failure after the caller left is the abort; anything else is the upstream
      if (signal.aborted || downstream.destroyed) {
        throw new ClientAbortError();
      }
      throw new NetworkError(`Upstream connection lost: ${getErrorMessage(error)}`, {
        errorCode: getErrorCode(error) ?? 'NETWORK_ERROR',
        bytesSent,
        chunkCount
      });
    }

    if (!upstream.destroyed) {
      upstream.destroy();
    }
    downstream.end();

    return {
      statusCode: upstream.statusCode || 200,
      statusMessage: upstream.statusMessage || 'OK',
      headers: upstream.headers,
      bytesSent,
      chunkCount,
      durationMs: Date.now() - startTime
    };
  }

  /**
   * Run interceptor hook safely (errors don't break flow)
   */
  private async runHook(
    hookName: string,
    fn: (interceptor: ProxyInterceptor) => Promise<unknown> | unknown
  ): Promise<void> {
    for (const interceptor of this.interceptors) {
      try {
        await fn(interceptor);
      } catch (error) {
        logger.error(`[SamplingProxy] Hook ${hookName} error in ${interceptor.name}:`, error);
      }
    }
  }

  private async handleError(
    error: unknown,
    context: ProxyContext | undefined,
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<void> {
    if (isAbortError(error)) {
      logger.debug('[SamplingProxy] Client disconnected', { url: req.url });
      if (!res.destroyed) {
        res.destroy();
      }
      return;
    }

    const errorContext: ProxyContext = context ?? {
      requestId: randomUUID(),
      method: req.method || 'GET',
      url: req.url || '/',
      headers: {},
      requestBody: Buffer.alloc(0),
      requestStartTime: Date.now(),
      metadata: {}
    };

    const errorObj = error instanceof Error ? error : new Error(String(error));
    await this.runHook('onError', interceptor =>
      interceptor.onError?.(errorContext, errorObj)
    );

    // Status line already went out: all we can do is cut the connection
    if (res.headersSent) {
      logger.warn(`[SamplingProxy] Upstream stream failed mid-response: ${errorObj.message}`, {
        requestId: errorContext.requestId
      });
      res.destroy();
      return;
    }

    this.sendErrorResponse(res, error, errorContext);
  }

  private sendErrorResponse(
    res: ServerResponse,
    error: unknown,
    context?: ProxyContext
  ): void {
    const proxyError = normalizeError(error, context ? { url: context.url } : undefined);

    res.statusCode = proxyError.statusCode;
    res.setHeader('Content-Type', 'application/json');
    res.end(JSON.stringify({
      error: proxyError.toJSON(),
      requestId: context?.requestId,
      timestamp: new Date().toISOString()
    }, null, 2));

    if (proxyError instanceof NetworkError || proxyError instanceof TimeoutError) {
      logger.warn(`${proxyError.message} (${context?.method ?? '?'} ${context?.url ?? '?'})`);
    } else if (proxyError instanceof MalformedRequestError) {
      logger.warn(`Rejected request: ${proxyError.message}`);
    } else {
      logger.error('[SamplingProxy] Error:', proxyError);
    }
  }

  private sendLocalResponse(res: ServerResponse, response: LocalResponse): void {
    res.writeHead(response.statusCode, response.headers);
    res.end(response.body ?? '');
  }

  /**
   * Unparseable HTTP framing never reaches handleRequest; Node reports it here.
   */
  private handleClientError(error: Error, socket: Duplex): void {
    if (getErrorCode(error) === 'ECONNRESET' || !socket.writable) {
      socket.destroy();
      return;
    }

    logger.warn(`Malformed request rejected: ${error.message}`);
    const body = JSON.stringify({
      error: new MalformedRequestError('Malformed HTTP request', {
        errorCode: getErrorCode(error)
      }).toJSON()
    });
    socket.end(
      'HTTP/1.1 400 Bad Request\r\n' +
      'Content-Type: application/json\r\n' +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      'Connection: close\r\n' +
      '\r\n' +
      body
    );
  }
}

function waitForDrain(stream: ServerResponse): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      stream.off('drain', done);
      stream.off('close', done);
      resolve();
    };
    stream.once('drain', done);
    stream.once('close', done);
  });
}

function formatHost(host: string): string {
  return host.includes(':') ? `[${host}]` : host;
}
