import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PluginRegistry } from '../registry.js';
import { SamplingInterceptor } from '../sampling.plugin.js';
import { LoggingInterceptor } from '../logging.plugin.js';
import { CorsPlugin } from '../cors.plugin.js';
import { createDefaultRegistry } from '../index.js';
import type { PluginContext, ProxyInterceptor, ProxyPlugin } from '../types.js';
import type { ProxyContext } from '../../types.js';
import { Logger } from '../../../utils/logger.js';
import { resolve } from '../../../sampling/resolver.js';
import { set } from '../../../sampling/types.js';

function makeContext(overrides: Partial<ProxyContext> = {}): ProxyContext {
  return {
    requestId: 'req-1',
    method: 'POST',
    url: '/v1/messages',
    headers: { 'content-type': 'application/json' },
    requestBody: Buffer.alloc(0),
    requestStartTime: 0,
    metadata: {},
    ...overrides
  };
}

function makePlugin(id: string, priority: number, fail = false): ProxyPlugin {
  return {
    id,
    name: id,
    version: '1.0.0',
    priority,
    async createInterceptor(): Promise<ProxyInterceptor> {
      if (fail) throw new Error(`${id} disabled`);
      return { name: id };
    }
  };
}

describe('plugins', () => {
  const logger = new Logger();
  const pluginContext = (cors = false): PluginContext => ({
    config: { targetApiUrl: 'http://127.0.0.1:1', sampling: resolve(), cors },
    logger
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('PluginRegistry', () => {
    it('creates interceptors in priority order', async () => {
      const registry = new PluginRegistry();
      registry.register(makePlugin('late', 50));
      registry.register(makePlugin('early', 5));
      registry.register(makePlugin('middle', 10));

      const interceptors = await registry.initialize(pluginContext());

      expect(interceptors.map(interceptor => interceptor.name)).toEqual(['early', 'middle', 'late']);
    });

    it('skips plugins that refuse to initialize', async () => {
      const registry = new PluginRegistry();
      registry.register(makePlugin('ok', 1));
      registry.register(makePlugin('broken', 2, true));

      const interceptors = await registry.initialize(pluginContext());

      expect(interceptors.map(interceptor => interceptor.name)).toEqual(['ok']);
    });

    it('replaces a plugin registered twice under the same id', () => {
      const registry = new PluginRegistry();
      registry.register(makePlugin('same', 1));
      registry.register(makePlugin('same', 99));

      expect(registry.getAll().map(plugin => plugin.priority)).toEqual([99]);
    });

    it('loads the CORS plugin only when enabled', async () => {
      const disabled = await createDefaultRegistry().initialize(pluginContext(false));
      const enabled = await createDefaultRegistry().initialize(pluginContext(true));

      expect(disabled.map(interceptor => interceptor.name)).toEqual(['sampling', 'logging']);
      expect(enabled.map(interceptor => interceptor.name)).toEqual(['cors', 'sampling', 'logging']);
    });
  });

  describe('SamplingInterceptor', () => {
    it('rewrites the request body and records the changes', () => {
      const interceptor = new SamplingInterceptor(resolve({ top_k: set(40) }), logger);
      const context = makeContext({ requestBody: Buffer.from('{"top_k":5}') });

      interceptor.onRequest(context);

      expect(context.requestBody.toString('utf-8')).toBe('{"top_k":40}');
      expect(context.metadata.samplingChanges).toEqual([{ key: 'top_k', previous: 5, value: 40 }]);
    });

    it('leaves the body alone when it is not JSON', () => {
      const interceptor = new SamplingInterceptor(resolve({ top_k: set(40) }), logger);
      const original = Buffer.from('plain text');
      const context = makeContext({ requestBody: original });

      interceptor.onRequest(context);

      expect(context.requestBody).toBe(original);
      expect(context.metadata.samplingChanges).toBeUndefined();
    });
  });

  describe('LoggingInterceptor', () => {
    it('passes chunks through untouched', () => {
      const interceptor = new LoggingInterceptor(logger);
      const context = makeContext();
      const chunk = Buffer.from('data: {}\n\n');

      interceptor.onResponseHeaders(context, { 'content-type': 'text/event-stream' });

      expect(interceptor.onResponseChunk(context, chunk)).toBe(chunk);
    });

    it('keeps counters separate for concurrent requests', () => {
      const debugLogger = new Logger();
      debugLogger.setDebug(true);
      const debug = vi.spyOn(debugLogger, 'debug');
      const interceptor = new LoggingInterceptor(debugLogger);
      const first = makeContext({ requestId: 'a' });
      const second = makeContext({ requestId: 'b' });

      interceptor.onResponseHeaders(first, {});
      interceptor.onResponseHeaders(second, {});
      interceptor.onResponseChunk(first, Buffer.from('12345'));
      interceptor.onResponseChunk(second, Buffer.from('12'));

      const streamingLogs = debug.mock.calls.filter(([message]) => message.startsWith('[proxy-streaming]'));
      expect(streamingLogs.map(([, details]) => details)).toEqual([
        { requestId: 'a', chunkNumber: 1, chunkSize: 5, totalBytes: 5 },
        { requestId: 'b', chunkNumber: 1, chunkSize: 2, totalBytes: 2 }
      ]);
    });
  });

  describe('CorsPlugin', () => {
    it('answers OPTIONS and ignores other methods', async () => {
      const interceptor = await new CorsPlugin().createInterceptor(pluginContext(true));
      const preflight = makeContext({ method: 'OPTIONS' });
      const post = makeContext();

      await interceptor.onRequest?.(preflight);
      await interceptor.onRequest?.(post);

      expect(preflight.localResponse?.statusCode).toBe(200);
      expect(preflight.localResponse?.headers['Access-Control-Allow-Origin']).toBe('*');
      expect(post.localResponse).toBeUndefined();
    });
  });
});
