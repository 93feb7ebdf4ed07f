/**
 * Proxy Errors
 *
 * Per-request failures. Each carries the HTTP status the caller receives;
 * none of them ever stops the listener.
 */

import { getErrorMessage } from '../utils/errors.js';

export interface ProxyErrorJSON {
  name: string;
  code: string;
  message: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

export class ProxyError extends Error {
  constructor(
    message: string,
    public statusCode: number = 502,
    public code: string = 'PROXY_ERROR',
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProxyError';
  }

  toJSON(): ProxyErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.details ? { details: this.details } : {})
    };
  }
}

/** Upstream unreachable: DNS, refused, reset, TLS. */
export class NetworkError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 502, 'NETWORK_ERROR', details);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 504, 'TIMEOUT_ERROR', details);
    this.name = 'TimeoutError';
  }
}

export class MalformedRequestError extends ProxyError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'MALFORMED_REQUEST', details);
    this.name = 'MalformedRequestError';
  }
}

/**
 * Turn anything thrown during request handling into a ProxyError.
 * Unknown failures are reported as a gateway error.
 */
export function normalizeError(
  error: unknown,
  details?: Record<string, unknown>
): ProxyError {
  if (error instanceof ProxyError) {
    if (details) {
      error.details = { ...error.details, ...details };
    }
    return error;
  }

  return new ProxyError(getErrorMessage(error), 502, 'PROXY_ERROR', details);
}

/**
 * The caller went away before the relay finished. Not reported to anyone:
 * there is nobody left to receive a response.
 */
export class ClientAbortError extends Error {
  constructor(message: string = 'Client disconnected') {
    super(message);
    this.name = 'ClientAbortError';
  }
}

const ABORT_CODES = new Set(['ECONNABORTED', 'ERR_STREAM_PREMATURE_CLOSE', 'ABORT_ERR']);

export function isAbortError(error: unknown): boolean {
  if (error instanceof ClientAbortError) return true;
  if (!(error instanceof Error)) return false;
  if (error.name === 'AbortError') return true;
  const code = 'code' in error ? error.code : undefined;
  return typeof code === 'string' && ABORT_CODES.has(code);
}
