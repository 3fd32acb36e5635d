import { ok, err, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';
import type {
  HttpMethod,
  NetworkClient,
  NetworkClientOptions,
  NetworkError,
  NetworkRequest,
} from './types.js';

/** Default request timeout: 10 seconds */
const DEFAULT_TIMEOUT_MS = 10_000;

const textDecoder = new TextDecoder();

/**
 * Maps a non-2xx status to a network error.
 */
const statusError = (response: Response): NetworkError => {
  if (response.status === 401) {
    return { type: 'unauthorized', message: 'Unauthorized access', status: 401 };
  }
  return {
    type: 'server',
    message: `Server error: ${String(response.status)}`,
    status: response.status,
  };
};

/**
 * Timeouts and lost connections are worth retrying; the rest are not.
 */
export const isRecoverableNetworkError = (error: NetworkError): boolean =>
  error.type === 'timeout' || error.type === 'no-connection';

/**
 * Builds a request with a JSON-encoded body.
 *
 * @param url - Target URL
 * @param body - Value to encode
 * @param options - Method (default POST) and extra headers
 * @throws TypeError when the body cannot be serialized
 */
export const buildJsonRequest = (
  url: string,
  body: unknown,
  options: { readonly method?: HttpMethod; readonly headers?: Readonly<Record<string, string>> } = {}
): NetworkRequest => ({
  url,
  method: options.method ?? 'POST',
  headers: { ...options.headers, 'Content-Type': 'application/json' },
  body: JSON.stringify(body),
});

/**
 * Creates a network client using the fetch API.
 *
 * @param options - Optional client configuration
 * @returns A NetworkClient instance
 *
 * @example
 * ```typescript
 * const client = createNetworkClient({ timeoutMs: 5000 });
 * const result = await client.requestJson({ url: '/api/user', method: 'GET' }, User);
 *
 * if (result.isErr() && isRecoverableNetworkError(result.error)) {
 *   // retry later
 * }
 * ```
 */
export const createNetworkClient = (options: NetworkClientOptions = {}): NetworkClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {}, fetch: fetchFn = fetch } = options;

  const request = async (req: NetworkRequest): Promise<Result<Uint8Array, NetworkError>> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, timeoutMs);

    try {
      const init: RequestInit = {
        method: req.method,
        headers: {
          ...baseHeaders,
          ...req.headers,
        },
        signal: controller.signal,
      };

      // Only set body if provided (exactOptionalPropertyTypes compliance)
      if (req.body !== undefined) {
        init.body = req.body;
      }

      const response = await fetchFn(req.url, init);

      if (!response.ok) {
        return err(statusError(response));
      }

      return ok(new Uint8Array(await response.arrayBuffer()));
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return err({
          type: 'timeout',
          message: `Request timed out after ${String(timeoutMs)}ms`,
          cause: error,
        });
      }

      return err({
        type: 'no-connection',
        message: error instanceof Error ? error.message : 'Network error',
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  };

  const requestJson = async <T>(
    req: NetworkRequest,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<Result<T, NetworkError>> => {
    const response = await request({
      ...req,
      headers: { Accept: 'application/json', ...req.headers },
    });

    if (response.isErr()) {
      return err(response.error);
    }

    let body: unknown;
    try {
      body = JSON.parse(textDecoder.decode(response.value));
    } catch (error) {
      return err({ type: 'decoding', message: 'Failed to parse response', cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return err({
        type: 'decoding',
        message: 'Response does not match the expected shape',
        cause: parsed.error,
      });
    }
    return ok(parsed.data);
  };

  return {
    request,
    requestJson,
  };
};
