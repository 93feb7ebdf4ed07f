import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import type { PluginContext, ProxyInterceptor, ProxyPlugin } from './types.js';

/**
 * Holds the plugins of one proxy instance and turns them into interceptors,
 * ordered by priority.
 */
export class PluginRegistry {
  private plugins = new Map<string, ProxyPlugin>();

  register(plugin: ProxyPlugin): void {
    if (this.plugins.has(plugin.id)) {
      logger.debug(`[PluginRegistry] Replacing plugin ${plugin.id}`);
    }
    this.plugins.set(plugin.id, plugin);
  }

  getAll(): ProxyPlugin[] {
    return [...this.plugins.values()].sort((a, b) => a.priority - b.priority);
  }

  /**
   * Create interceptors in priority order. A plugin that refuses to
   * initialize is skipped; the rest still load.
   */
  async initialize(context: PluginContext): Promise<ProxyInterceptor[]> {
    const interceptors: ProxyInterceptor[] = [];

    for (const plugin of this.getAll()) {
      try {
        interceptors.push(await plugin.createInterceptor(context));
        logger.debug(`[PluginRegistry] Loaded ${plugin.name} (priority ${plugin.priority})`);
      } catch (error) {
        logger.debug(`[PluginRegistry] Skipped ${plugin.name}: ${getErrorMessage(error)}`);
      }
    }

    return interceptors;
  }
}
