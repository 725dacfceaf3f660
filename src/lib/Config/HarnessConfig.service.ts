import dotenv from 'dotenv';
import { Config, Context, Effect, Layer, Option } from 'effect';
import * as path from 'path';
import { ConfigurationError } from '../errors.js';
import { FileUtils } from '../utils/FileUtils.js';

/**
 * Settings for one harness run.
 *
 * Everything the harness writes lives under {@link HarnessConfigOptions.basePath}:
 * ```
 * basePath/
 *   test_cases.json
 *   api_cache/      # one file per Stack Exchange URL
 *   logs/           # <stamp>-tester.log and <stamp>-scraper.log
 *   results/        # <id>.json per test and summary.json
 * ```
 *
 * @group Configuration
 * @public
 */
export interface HarnessConfigOptions {
  /** Directory holding test_cases.json and the generated directories (default: `<cwd>/tests`) */
  readonly basePath: string;
  readonly apiCacheDir: string;
  readonly logDir: string;
  readonly resultsDir: string;
  readonly testCasesPath: string;
  /** Port the scraper listens on; exported as STACKOVERFLOW_API_PORT (default: 5000) */
  readonly scraperPort: number;
  /** Stack Exchange API root, without trailing slash */
  readonly apiBaseUrl: string;
  /** Value of the `site` query parameter appended to every endpoint */
  readonly site: string;
  /** Seconds a cached API response stays fresh (default: 600) */
  readonly cacheUpdateIntervalSeconds: number;
  /** Shell command that starts the scraper */
  readonly scraperCommand: string;
  /** When false, an already running scraper is used and nothing is spawned */
  readonly startScraper: boolean;
  /** Endpoint polled until the scraper answers 200 */
  readonly readinessPath: string;
  readonly readinessIntervalMs: number;
  readonly readinessTimeoutMs: number;
  /** Top-level keys removed from API responses before comparing */
  readonly ignoredKeys: ReadonlyArray<string>;
  /** Compare arrays as multisets */
  readonly ignoreOrder: boolean;
  /** Ignore markup-only differences between HTML strings */
  readonly normalizeHtml: boolean;
  /** Refresh every cached API response regardless of its age */
  readonly forceRefresh: boolean;
  /** Show DEBUG lines on the console */
  readonly verbose: boolean;
  /** Timestamp shared by this run's log file names, e.g. `20261019-150900` */
  readonly runStamp: string;
}

export const DEFAULT_SCRAPER_PORT = 5000;
export const DEFAULT_API_BASE_URL = 'https://api.stackexchange.com/2.3';
export const DEFAULT_SCRAPER_COMMAND = 'python3 stackoverflow_scraper.py';

export interface HarnessConfigService {
  readonly options: HarnessConfigOptions;
  /** `http://localhost:<port>` */
  readonly scraperUrl: string;
  /** Log file of this run for the given service, e.g. `logs/20261019-150900-tester.log` */
  readonly logFile: (service: 'tester' | 'scraper') => string;
}

export class HarnessConfig extends Context.Tag('HarnessConfig')<
  HarnessConfig,
  HarnessConfigService
>() {
  /**
   * Provide a configuration built from explicit options
   */
  static Live = (options: Partial<HarnessConfigOptions> = {}) =>
    Layer.succeed(HarnessConfig, makeHarnessConfig(options));
}

/**
 * `YYYYMMDD-HHMMSS` in local time
 */
export const formatRunStamp = (date: Date): string => {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
};

/**
 * Merge options with defaults. Directories not given explicitly are derived from `basePath`.
 */
export const makeHarnessConfig = (
  options: Partial<HarnessConfigOptions> = {}
): HarnessConfigService => {
  const basePath = options.basePath ?? path.join(process.cwd(), 'tests');
  const resolved: HarnessConfigOptions = {
    basePath,
    apiCacheDir: options.apiCacheDir ?? path.join(basePath, 'api_cache'),
    logDir: options.logDir ?? path.join(basePath, 'logs'),
    resultsDir: options.resultsDir ?? path.join(basePath, 'results'),
    testCasesPath: options.testCasesPath ?? path.join(basePath, 'test_cases.json'),
    scraperPort: options.scraperPort ?? DEFAULT_SCRAPER_PORT,
    apiBaseUrl: (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, ''),
    site: options.site ?? 'stackoverflow',
    cacheUpdateIntervalSeconds: options.cacheUpdateIntervalSeconds ?? 600,
    scraperCommand: options.scraperCommand ?? DEFAULT_SCRAPER_COMMAND,
    startScraper: options.startScraper ?? true,
    readinessPath: options.readinessPath ?? '/questions',
    readinessIntervalMs: options.readinessIntervalMs ?? 500,
    readinessTimeoutMs: options.readinessTimeoutMs ?? 60_000,
    ignoredKeys: options.ignoredKeys ?? ['quota_max', 'quota_remaining'],
    ignoreOrder: options.ignoreOrder ?? true,
    normalizeHtml: options.normalizeHtml ?? false,
    forceRefresh: options.forceRefresh ?? false,
    verbose: options.verbose ?? false,
    runStamp: options.runStamp ?? formatRunStamp(new Date()),
  };

  return {
    options: resolved,
    scraperUrl: `http://localhost:${resolved.scraperPort}`,
    logFile: (service) =>
      path.join(resolved.logDir, `${resolved.runStamp}-${service}.log`),
  };
};

/**
 * Values the environment may supply.
 * STACKOVERFLOW_API_PORT is shared with the scraper, which reads the same variable.
 */
export const EnvironmentConfig = Config.all({
  port: Config.option(Config.string('STACKOVERFLOW_API_PORT')),
  apiBaseUrl: Config.option(Config.string('STACKEXCHANGE_API_URL')),
  scraperCommand: Config.option(Config.string('SCRAPER_COMMAND')),
});

/** Environment file read from the working directory before the environment is consulted */
export const ENV_FILE = '.env';

/**
 * Copy the variables of a dotenv file into `env`, leaving variables that are already set.
 * A missing file loads nothing. Returns the names that were loaded.
 */
export const loadEnvFile = (
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): Effect.Effect<ReadonlyArray<string>, ConfigurationError> =>
  Effect.gen(function* () {
    if (!(yield* FileUtils.exists(filePath))) {
      return [];
    }
    const content = yield* FileUtils.readText(filePath).pipe(
      Effect.mapError(
        (error) =>
          new ConfigurationError({
            message: `Could not read ${filePath}: ${error.message}`,
            details: { path: filePath },
          })
      )
    );
    const parsed = dotenv.parse(content);
    const loaded = Object.keys(parsed).filter((name) => env[name] === undefined);
    for (const name of loaded) {
      env[name] = parsed[name];
    }
    return loaded;
  });

export const parsePort = (
  raw: string
): Effect.Effect<number, ConfigurationError> => {
  const port = Number(raw.trim());
  return Number.isInteger(port) && port > 0 && port < 65536
    ? Effect.succeed(port)
    : Effect.fail(
        new ConfigurationError({
          message: `Invalid port '${raw}': expected an integer between 1 and 65535`,
          details: { port: raw },
        })
      );
};

export const parsePositiveNumber = (
  name: string,
  raw: string
): Effect.Effect<number, ConfigurationError> => {
  const value = Number(raw.trim());
  return Number.isFinite(value) && value > 0 && raw.trim() !== ''
    ? Effect.succeed(value)
    : Effect.fail(
        new ConfigurationError({
          message: `Invalid ${name} '${raw}': expected a positive number`,
          details: { [name]: raw },
        })
      );
};

/**
 * Port precedence: command line, then STACKOVERFLOW_API_PORT, then 5000.
 */
export const resolvePort = (
  cliPort: Option.Option<string>,
  envPort: Option.Option<string>
): Effect.Effect<number, ConfigurationError> => {
  const raw = Option.orElse(cliPort, () => envPort);
  return Option.isSome(raw) ? parsePort(raw.value) : Effect.succeed(DEFAULT_SCRAPER_PORT);
};
