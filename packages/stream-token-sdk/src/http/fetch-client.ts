import { ok, err, Result } from 'neverthrow';
import type { HttpClient, HttpClientOptions, HttpRequest, HttpResponse, HttpError } from './types.js';

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * `HttpClient` over the global `fetch`.
 *
 * The timeout covers the whole exchange, body included. Any status outside
 * 2xx is an `http` error carrying the status and the body text.
 */
export const createFetchClient = (options: HttpClientOptions = {}): HttpClient => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const failure = (request: HttpRequest, signal: AbortSignal, cause: unknown): HttpError =>
    signal.aborted
      ? {
          type: 'timeout',
          message: `Request timed out after ${String(timeoutMs)}ms`,
          url: request.url,
          cause,
        }
      : {
          type: 'network',
          message: cause instanceof Error ? cause.message : 'Network error',
          url: request.url,
          cause,
        };

  const text = async (request: HttpRequest): Promise<Result<HttpResponse<string>, HttpError>> => {
    const signal = AbortSignal.timeout(timeoutMs);
    const init: RequestInit = {
      method: request.method,
      headers: { ...request.headers },
      signal,
      ...(request.body !== undefined && { body: request.body }),
    };

    let response: Response;
    let body: string;
    try {
      response = await fetch(request.url, init);
      body = await response.text();
    } catch (cause) {
      return err(failure(request, signal, cause));
    }

    if (!response.ok) {
      return err({
        type: 'http',
        message: `HTTP ${String(response.status)}: ${response.statusText}`,
        url: request.url,
        status: response.status,
        body,
      });
    }
    return ok({ status: response.status, body });
  };

  const json = async <T>(request: HttpRequest): Promise<Result<HttpResponse<T>, HttpError>> => {
    const response = await text({
      ...request,
      headers: { Accept: 'application/json', ...request.headers },
    });

    return response.andThen(({ status, body }) =>
      Result.fromThrowable(
        (): T => JSON.parse(body) as T,
        (cause): HttpError => ({
          type: 'parse',
          message: 'Response body is not JSON',
          url: request.url,
          status,
          body,
          cause,
        })
      )().map((parsed) => ({ status, body: parsed }))
    );
  };

  return { json, text };
};
