/**
 * Proxy Types
 *
 * Type definitions for proxy system.
 */

import type { IncomingHttpHeaders, OutgoingHttpHeaders } from 'http';
import type { ResolvedConfig } from '../sampling/types.js';

export const DEFAULT_UPSTREAM_URL = 'https://api.anthropic.com';
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8080;

/**
 * Proxy configuration
 */
export interface ProxyConfig {
  targetApiUrl: string;
  port?: number;
  host?: string;
  /** Upstream idle timeout in ms, 0 or unset for none */
  timeout?: number;
  sampling: ResolvedConfig;
  /** Answer CORS preflight requests locally */
  cors?: boolean;
}

/**
 * A response produced by a plugin instead of the upstream
 */
export interface LocalResponse {
  statusCode: number;
  headers: OutgoingHttpHeaders;
  body?: string;
}

/**
 * Proxy context - one per inbound request, shared across interceptors
 */
export interface ProxyContext {
  requestId: string;
  method: string;
  url: string;
  headers: Record<string, string>;
  /** Raw inbound body; empty buffer when the request had none */
  requestBody: Buffer;
  requestStartTime: number;
  targetUrl?: string;
  /** Set by a plugin to answer the request without forwarding it */
  localResponse?: LocalResponse;
  metadata: Record<string, unknown>;
}

/**
 * Summary of a relayed response
 */
export interface ResponseMetadata {
  statusCode: number;
  statusMessage: string;
  headers: IncomingHttpHeaders;
  bytesSent: number;
  chunkCount: number;
  durationMs: number;
}
