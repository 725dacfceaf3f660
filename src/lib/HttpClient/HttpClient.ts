/**
 * HTTP Client
 * GET requests against the Stack Exchange API and the scraper under test
 */

import { Context, Effect, Layer } from 'effect';
import { NetworkError, TimeoutError } from '../errors.js';
import { JsonUtils, type JsonParseError, type JsonValue } from '../utils/JsonUtils.js';

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  /** Abort after this many milliseconds (default: 30000) */
  timeout?: number;
}

export interface HttpResponse {
  url: string;
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

export interface JsonResponse {
  response: HttpResponse;
  json: JsonValue;
}

export interface HttpClientService {
  /**
   * Make a GET request. Every HTTP status is a successful result;
   * only transport failures fail the effect.
   */
  get: (
    url: string,
    options?: HttpRequestOptions
  ) => Effect.Effect<HttpResponse, NetworkError | TimeoutError>;

  /**
   * GET and parse the body as JSON
   */
  getJson: (
    url: string,
    options?: HttpRequestOptions
  ) => Effect.Effect<JsonResponse, NetworkError | TimeoutError | JsonParseError>;
}

export class HttpClient extends Context.Tag('HttpClient')<
  HttpClient,
  HttpClientService
>() {}

export const DEFAULT_TIMEOUT_MS = 30_000;

const USER_AGENT = 'stackoverflow-scraper-tests/0.1';

export const makeHttpClient = (): HttpClientService => {
  const get = (
    url: string,
    options: HttpRequestOptions = {}
  ): Effect.Effect<HttpResponse, NetworkError | TimeoutError> =>
    Effect.gen(function* () {
      const timeoutMs = options.timeout ?? DEFAULT_TIMEOUT_MS;
      const headers: Record<string, string> = {
        'User-Agent': USER_AGENT,
        Accept: 'application/json',
        ...options.headers,
      };

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
      const isAbort = (error: unknown) => error instanceof Error && error.name === 'AbortError';

      // the timer covers the body as well as the headers
      const { response, body } = yield* Effect.gen(function* () {
        const response = yield* Effect.tryPromise({
          try: () =>
            fetch(url, {
              method: 'GET',
              headers,
              signal: controller.signal,
              redirect: 'follow',
            }),
          catch: (error) =>
            isAbort(error)
              ? TimeoutError.after('HTTP GET', url, timeoutMs)
              : NetworkError.fromCause(url, error),
        });

        const body = yield* Effect.tryPromise({
          try: () => response.text(),
          catch: (error) =>
            isAbort(error)
              ? TimeoutError.after('HTTP GET', url, timeoutMs)
              : new NetworkError({
                  url,
                  statusCode: response.status,
                  cause: error,
                  message: `Failed to read response body from ${url}: ${error}`,
                }),
        });
        return { response, body };
      }).pipe(Effect.ensuring(Effect.sync(() => clearTimeout(timeoutId))));

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });

      const result: HttpResponse = {
        url: response.url || url,
        status: response.status,
        statusText: response.statusText,
        headers: responseHeaders,
        body,
      };
      return result;
    });

  return {
    get,
    getJson: (url, options) =>
      Effect.gen(function* () {
        const response = yield* get(url, options);
        const json = yield* JsonUtils.parse(response.body);
        return { response, json };
      }),
  };
};

export const HttpClientLive = Layer.sync(HttpClient, makeHttpClient);
