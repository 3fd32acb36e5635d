import type { Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/**
 * HTTP request configuration.
 */
export interface NetworkRequest {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string | Uint8Array;
}

/**
 * Failure categories callers can branch on.
 */
export type NetworkErrorType = 'no-connection' | 'timeout' | 'unauthorized' | 'server' | 'decoding';

/**
 * Network error with category, message and optional HTTP status.
 */
export interface NetworkError {
  readonly type: NetworkErrorType;
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}

/**
 * HTTP client interface for making requests.
 * Abstraction over fetch for dependency injection and testing.
 */
export interface NetworkClient {
  /**
   * Makes an HTTP request and returns the raw response body.
   * @param request - The request configuration
   * @returns Result with body bytes for 2xx responses, or error
   */
  readonly request: (request: NetworkRequest) => Promise<Result<Uint8Array, NetworkError>>;

  /**
   * Makes an HTTP request and decodes the JSON body.
   * @param request - The request configuration
   * @param schema - Shape the response body must match
   * @returns Result with the decoded body, or error
   */
  readonly requestJson: <T>(
    request: NetworkRequest,
    schema: ZodType<T, ZodTypeDef, unknown>
  ) => Promise<Result<T, NetworkError>>;
}

/**
 * Options for creating a network client.
 */
export interface NetworkClientOptions {
  /** Request timeout in milliseconds (default: 10000) */
  readonly timeoutMs?: number;
  /** Base headers to include in all requests */
  readonly baseHeaders?: Readonly<Record<string, string>>;
  /** fetch implementation (default: global fetch) */
  readonly fetch?: typeof fetch;
}
