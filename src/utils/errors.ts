/**
 * Base error for everything the proxy raises on purpose.
 */
export class SamplingProxyError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SamplingProxyError';
  }
}

/**
 * Bad CLI flags, bad config file, invalid parameter domain or an
 * unbindable listen address. Always fatal at startup.
 */
export class ConfigurationError extends SamplingProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the `code` property Node attaches to system errors (ECONNREFUSED etc.)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
