/**
 * CORS Preflight Plugin
 * Priority: 5 (runs first)
 *
 * Only loaded with --cors. Answers OPTIONS requests locally so browser-based
 * clients can reach the proxy; every other request is left alone.
 */

import type { ProxyPlugin, PluginContext, ProxyInterceptor } from './types.js';
import type { ProxyContext } from '../types.js';

export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': '*'
} as const;

export class CorsPlugin implements ProxyPlugin {
  id = 'sampling-proxy/cors';
  name = 'CORS Preflight';
  version = '1.0.0';
  priority = 5;

  async createInterceptor(context: PluginContext): Promise<ProxyInterceptor> {
    if (!context.config.cors) {
      throw new Error('CORS preflight handling disabled');
    }
    return new CorsInterceptor();
  }
}

class CorsInterceptor implements ProxyInterceptor {
  name = 'cors';

  onRequest(context: ProxyContext): void {
    if (context.method !== 'OPTIONS') return;

    context.localResponse = {
      statusCode: 200,
      headers: { ...CORS_HEADERS }
    };
  }
}
