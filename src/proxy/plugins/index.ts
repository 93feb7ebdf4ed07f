import { PluginRegistry } from './registry.js';
import { CorsPlugin } from './cors.plugin.js';
import { SamplingPlugin } from './sampling.plugin.js';
import { LoggingPlugin } from './logging.plugin.js';

export { PluginRegistry } from './registry.js';
export { CorsPlugin, CORS_HEADERS } from './cors.plugin.js';
export { SamplingPlugin, SamplingInterceptor } from './sampling.plugin.js';
export { LoggingPlugin, LoggingInterceptor } from './logging.plugin.js';
export type { PluginContext, ProxyInterceptor, ProxyPlugin } from './types.js';

/**
 * Registry with the built-in plugins. CorsPlugin disables itself unless
 * the proxy config asks for it.
 */
export function createDefaultRegistry(): PluginRegistry {
  const registry = new PluginRegistry();
  registry.register(new CorsPlugin());
  registry.register(new SamplingPlugin());
  registry.register(new LoggingPlugin());
  return registry;
}
