/**
 * Plugin Types
 *
 * A plugin is registered once; when the proxy starts it creates one
 * interceptor from each plugin. Interceptors are shared by all in-flight
 * requests, so anything request-scoped goes on `context.metadata`.
 */

import type { IncomingHttpHeaders } from 'http';
import type { Logger } from '../../utils/logger.js';
import type { ProxyConfig, ProxyContext, ResponseMetadata } from '../types.js';

export interface PluginContext {
  config: ProxyConfig;
  logger: Logger;
}

export interface ProxyPlugin {
  id: string;
  name: string;
  version: string;
  /** Lower runs first */
  priority: number;
  /**
   * Build the interceptor. Throwing disables the plugin for this proxy
   * instance; the message is logged at debug level.
   */
  createInterceptor(context: PluginContext): Promise<ProxyInterceptor>;
}

export interface ProxyInterceptor {
  name: string;

  onProxyStart?(): Promise<void> | void;
  onProxyStop?(): Promise<void> | void;

  /** May rewrite `context.requestBody` / `context.headers`, or set `context.localResponse` */
  onRequest?(context: ProxyContext): Promise<void> | void;

  onResponseHeaders?(context: ProxyContext, headers: IncomingHttpHeaders): Promise<void> | void;

  /** Return the chunk to forward, or null to drop it */
  onResponseChunk?(context: ProxyContext, chunk: Buffer): Promise<Buffer | null> | Buffer | null;

  onResponseComplete?(context: ProxyContext, metadata: ResponseMetadata): Promise<void> | void;

  onError?(context: ProxyContext, error: Error): Promise<void> | void;
}
