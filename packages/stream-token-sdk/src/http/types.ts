import type { Result } from 'neverthrow';

/**
 * HTTP request configuration.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: 'GET' | 'POST';
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: string;
}

/** A 2xx response. */
export interface HttpResponse<T> {
  readonly status: number;
  readonly body: T;
}

/**
 * HTTP error.
 *
 * `http` errors carry the response status and body text, which the issuing
 * endpoints use to explain a rejection.
 */
export interface HttpError {
  readonly type: 'network' | 'timeout' | 'parse' | 'http';
  readonly message: string;
  readonly url: string;
  readonly status?: number | undefined;
  readonly body?: string | undefined;
  readonly cause?: unknown;
}

/**
 * Transport the fetchers send through. Injected so tests can script replies.
 */
export interface HttpClient {
  /** Sends the request and parses the body as JSON, unchecked against `T`. */
  readonly json: <T>(request: HttpRequest) => Promise<Result<HttpResponse<T>, HttpError>>;
  /** Sends the request and returns the body text as received. */
  readonly text: (request: HttpRequest) => Promise<Result<HttpResponse<string>, HttpError>>;
}

export interface HttpClientOptions {
  /** Milliseconds before the exchange is aborted; 10000 when omitted */
  readonly timeoutMs?: number;
}
