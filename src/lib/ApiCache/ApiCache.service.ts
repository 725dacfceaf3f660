import { Clock, Context, Effect, Layer, Option, Schema } from 'effect';
import * as path from 'path';
import { HarnessConfig } from '../Config/HarnessConfig.service.js';
import type { FileSystemError } from '../errors.js';
import { HttpClient } from '../HttpClient/HttpClient.js';
import { HarnessLogger } from '../Logging/HarnessLogger.service.js';
import { FileUtils } from '../utils/FileUtils.js';
import {
  isJsonObject,
  JsonUtils,
  type JsonStringifyError,
  type JsonValue,
} from '../utils/JsonUtils.js';

/**
 * Bookkeeping stored beside a cached response.
 * Field names are kept in snake_case so cache directories stay readable by older tooling.
 */
export const ApiCacheMeta = Schema.Struct({
  /** Seconds since the epoch of the last successful refresh, 0 if never fetched */
  last_update: Schema.Number,
  url: Schema.String,
  /** Seconds a response stays fresh */
  update_interval: Schema.Number,
});
export type ApiCacheMeta = typeof ApiCacheMeta.Type;

export interface ApiCacheEntry {
  readonly meta: ApiCacheMeta;
  readonly cache: JsonValue;
}

type CacheWriteError = FileSystemError | JsonStringifyError;

/**
 * A single cached URL
 */
export interface CachedEndpoint {
  readonly url: string;
  readonly filePath: string;
  /**
   * Return the cached response, refreshing it first when it is older than the update interval.
   * A failed refresh keeps the previous (possibly empty) response.
   */
  readonly fetch: () => Effect.Effect<JsonValue, CacheWriteError>;
  /** Query the URL and replace the cached response on success */
  readonly refresh: () => Effect.Effect<ApiCacheEntry, CacheWriteError>;
  /** Read the stored entry without touching the network */
  readonly inspect: () => Effect.Effect<ApiCacheEntry, CacheWriteError>;
}

export interface ApiCacheService {
  /**
   * Open the cache file for a URL, creating an empty one if none exists
   *
   * @param updateIntervalSeconds - defaults to the configured cache TTL
   */
  readonly open: (
    url: string,
    updateIntervalSeconds?: number
  ) => Effect.Effect<CachedEndpoint, CacheWriteError>;
  readonly clear: (url: string) => Effect.Effect<void, FileSystemError>;
  /** Delete every cache file; returns how many were removed */
  readonly clearAll: () => Effect.Effect<number, FileSystemError>;
}

export class ApiCache extends Context.Tag('ApiCache')<ApiCache, ApiCacheService>() {}

/**
 * `https://api.stackexchange.com/2.3/questions?site=stackoverflow`
 * becomes `https:__api.stackexchange.com_2.3_questions?site=stackoverflow.json`
 */
export const cacheFileName = (url: string): string =>
  `${url.split('/').join('_')}.json`;

const nowSeconds = Clock.currentTimeMillis.pipe(Effect.map((ms) => ms / 1000));

export const makeApiCache = Effect.gen(function* () {
  const config = yield* HarnessConfig;
  const http = yield* HttpClient;
  const logger = yield* HarnessLogger;
  const { apiCacheDir, cacheUpdateIntervalSeconds, forceRefresh } = config.options;

  const save = (filePath: string, entry: ApiCacheEntry) =>
    Effect.gen(function* () {
      yield* FileUtils.ensureDir(path.dirname(filePath));
      yield* FileUtils.writeJson(filePath, entry);
    });

  const load = (
    filePath: string,
    fresh: ApiCacheEntry
  ): Effect.Effect<ApiCacheEntry, CacheWriteError> =>
    Effect.gen(function* () {
      const stored = yield* FileUtils.readJson(filePath).pipe(Effect.option);
      const entry = Option.flatMap(stored, (value) => {
        if (!isJsonObject(value)) {
          return Option.none();
        }
        return Schema.decodeUnknownOption(ApiCacheMeta)(value.meta).pipe(
          Option.map((meta): ApiCacheEntry => ({ meta, cache: value.cache ?? {} }))
        );
      });
      if (Option.isSome(entry)) {
        return entry.value;
      }
      yield* logger.warning(
        `Cache file ${filePath} is unreadable. It will be rebuilt.`
      );
      yield* save(filePath, fresh);
      return fresh;
    });

  const open = (url: string, updateIntervalSeconds = cacheUpdateIntervalSeconds) =>
    Effect.gen(function* () {
      const filePath = path.join(apiCacheDir, cacheFileName(url));
      const empty: ApiCacheEntry = {
        meta: { last_update: 0, url, update_interval: updateIntervalSeconds },
        cache: {},
      };

      if (!(yield* FileUtils.exists(filePath))) {
        yield* save(filePath, empty);
      }

      const inspect = () => load(filePath, empty);

      const refreshEntry = (
        entry: ApiCacheEntry
      ): Effect.Effect<ApiCacheEntry, CacheWriteError> =>
        Effect.gen(function* () {
          const result = yield* http.get(url).pipe(Effect.either);
          if (result._tag === 'Left') {
            yield* logger.warning(
              `Request to ${url} failed. No changes will be made to the cache.`
            );
            yield* logger.debug(result.left.message);
            return entry;
          }

          const response = result.right;
          if (response.status !== 200) {
            yield* logger.warning(
              `Erroneous response from ${url}: ${response.status}. No changes will be made to the cache.`
            );
            yield* logger.debug(response.body);
            return entry;
          }

          const parsed = yield* JsonUtils.parse(response.body).pipe(Effect.either);
          if (parsed._tag === 'Left') {
            yield* logger.warning(
              `Response from ${url} is not JSON. No changes will be made to the cache.`
            );
            yield* logger.debug(parsed.left.message);
            return entry;
          }

          const updated: ApiCacheEntry = {
            meta: {
              last_update: yield* nowSeconds,
              url,
              update_interval: updateIntervalSeconds,
            },
            cache: parsed.right,
          };
          yield* save(filePath, updated);
          yield* logger.debug(`Cached response for ${url} updated`);
          return updated;
        });

      const handle: CachedEndpoint = {
        url,
        filePath,
        inspect,
        refresh: () => inspect().pipe(Effect.flatMap(refreshEntry)),
        fetch: () =>
          Effect.gen(function* () {
            const entry = yield* inspect();
            const age = (yield* nowSeconds) - entry.meta.last_update;
            if (forceRefresh || age > updateIntervalSeconds) {
              const refreshed = yield* refreshEntry(entry);
              return refreshed.cache;
            }
            yield* logger.debug(`Using cached response for ${url} (${Math.round(age)}s old)`);
            return entry.cache;
          }),
      };
      return handle;
    });

  const service: ApiCacheService = {
    open,
    clear: (url) => FileUtils.delete(path.join(apiCacheDir, cacheFileName(url))),
    clearAll: () =>
      Effect.gen(function* () {
        if (!(yield* FileUtils.exists(apiCacheDir))) {
          return 0;
        }
        const files = (yield* FileUtils.readDir(apiCacheDir)).filter((file) =>
          file.endsWith('.json')
        );
        yield* Effect.forEach(
          files,
          (file) => FileUtils.delete(path.join(apiCacheDir, file)),
          { discard: true }
        );
        return files.length;
      }),
  };
  return service;
});

export const ApiCacheLive = Layer.effect(ApiCache, makeApiCache);
