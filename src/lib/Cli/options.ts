/**
 * Command line options
 */

import { Effect, Option } from 'effect';
import * as path from 'path';
import { parseArgs } from 'util';
import {
  ENV_FILE,
  EnvironmentConfig,
  loadEnvFile,
  parsePositiveNumber,
  resolvePort,
  type HarnessConfigOptions,
} from '../Config/HarnessConfig.service.js';
import { ConfigurationError } from '../errors.js';

export const USAGE = `Usage: stackoverflow-scraper-tests [options]

Compares a Stack Overflow scraper's JSON output with the Stack Exchange API.

Options:
  -h, --help              Show this message
  -p, --port <port>       Scraper port (default: $STACKOVERFLOW_API_PORT or 5000)
      --base-dir <dir>    Directory holding test_cases.json (default: ./tests)
      --scraper-cmd <cmd> Command that starts the scraper (default: $SCRAPER_COMMAND
                          or "python3 stackoverflow_scraper.py")
      --no-start          Use a scraper that is already running
      --cache-ttl <secs>  Seconds a cached API response stays fresh (default: 600)
      --ready-timeout <secs>
                          Seconds to wait for the scraper to answer (default: 60)
      --refresh           Refresh every cached API response
      --clear-cache       Delete the API cache and exit
      --normalize-html    Ignore markup-only differences in HTML strings
  -v, --verbose           Show debug output
`;

export type CliCommand =
  | { readonly _tag: 'Help' }
  | { readonly _tag: 'ClearCache'; readonly options: Partial<HarnessConfigOptions> }
  | { readonly _tag: 'Run'; readonly options: Partial<HarnessConfigOptions> };

const OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  port: { type: 'string', short: 'p' },
  'base-dir': { type: 'string' },
  'scraper-cmd': { type: 'string' },
  'no-start': { type: 'boolean' },
  'cache-ttl': { type: 'string' },
  'ready-timeout': { type: 'string' },
  refresh: { type: 'boolean' },
  'clear-cache': { type: 'boolean' },
  'normalize-html': { type: 'boolean' },
  verbose: { type: 'boolean', short: 'v' },
} as const;

const parseValues = (argv: ReadonlyArray<string>) =>
  Effect.try({
    try: () => parseArgs({ args: [...argv], options: OPTIONS, strict: true, allowPositionals: false }).values,
    catch: (error) =>
      new ConfigurationError({
        message: `${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`,
      }),
  });

const optional = <A>(
  raw: string | undefined,
  parse: (value: string) => Effect.Effect<A, ConfigurationError>
): Effect.Effect<A | undefined, ConfigurationError> =>
  raw === undefined ? Effect.succeed(undefined) : parse(raw);

/**
 * Turn command line arguments, with the environment as fallback, into harness options.
 * Variables from `envFile` fill in the environment first.
 */
export const parseCommandLine = (
  argv: ReadonlyArray<string>,
  envFile: string = path.resolve(ENV_FILE)
): Effect.Effect<CliCommand, ConfigurationError> =>
  Effect.gen(function* () {
    const values = yield* parseValues(argv);
    if (values.help) {
      return { _tag: 'Help' } as const;
    }

    yield* loadEnvFile(envFile);
    const env = yield* EnvironmentConfig.pipe(
      Effect.mapError(
        (error) => new ConfigurationError({ message: `Invalid environment: ${String(error)}` })
      )
    );

    const scraperPort = yield* resolvePort(Option.fromNullable(values.port), env.port);
    const cacheUpdateIntervalSeconds = yield* optional(values['cache-ttl'], (raw) =>
      parsePositiveNumber('cache-ttl', raw)
    );
    const readyTimeoutSeconds = yield* optional(values['ready-timeout'], (raw) =>
      parsePositiveNumber('ready-timeout', raw)
    );

    const options: Partial<HarnessConfigOptions> = {
      scraperPort,
      startScraper: values['no-start'] !== true,
      forceRefresh: values.refresh === true,
      normalizeHtml: values['normalize-html'] === true,
      verbose: values.verbose === true,
      ...(values['base-dir'] !== undefined && { basePath: path.resolve(values['base-dir']) }),
      ...Option.match(Option.orElse(Option.fromNullable(values['scraper-cmd']), () => env.scraperCommand), {
        onNone: () => ({}),
        onSome: (scraperCommand) => ({ scraperCommand }),
      }),
      ...Option.match(env.apiBaseUrl, {
        onNone: () => ({}),
        onSome: (apiBaseUrl) => ({ apiBaseUrl }),
      }),
      ...(cacheUpdateIntervalSeconds !== undefined && { cacheUpdateIntervalSeconds }),
      ...(readyTimeoutSeconds !== undefined && { readinessTimeoutMs: readyTimeoutSeconds * 1000 }),
    };

    return values['clear-cache']
      ? ({ _tag: 'ClearCache', options } as const)
      : ({ _tag: 'Run', options } as const);
  });
