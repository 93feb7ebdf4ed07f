// Main exports for the sampling-proxy package

// Sampling resolution and injection
export { resolve, validateOverrides, describeSampling } from './sampling/resolver.js';
export { injectSamplingParams, isPlainObject, truncate } from './sampling/inject.js';
export type { InjectionResult, SamplingChange } from './sampling/inject.js';
export * from './sampling/types.js';

// Proxy
export { SamplingProxy } from './utils/sampling-proxy.js';
export type { ProxyAddress } from './utils/sampling-proxy.js';
export { ProxyHTTPClient } from './proxy/http-client.js';
export * from './proxy/types.js';
export * from './proxy/errors.js';
export * from './proxy/plugins/index.js';

// Utils
export { logger, Logger } from './utils/logger.js';
export { ConfigLoader } from './utils/config-loader.js';
export * from './utils/errors.js';
