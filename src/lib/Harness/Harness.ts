/**
 * Harness
 * Wires the services together and runs one complete comparison
 */

import { Effect, Layer } from 'effect';
import { ApiCache, ApiCacheLive } from '../ApiCache/ApiCache.service.js';
import { HarnessConfig, type HarnessConfigOptions } from '../Config/HarnessConfig.service.js';
import { HttpClientLive } from '../HttpClient/HttpClient.js';
import { HarnessLogger, HarnessLoggerLive } from '../Logging/HarnessLogger.service.js';
import { exitCodeFor, type RunSummary } from '../Runner/RunSummary.js';
import { TestRunner, TestRunnerLive } from '../Runner/TestRunner.service.js';
import { PORT_ENV_VAR, ScraperProcess, ScraperProcessLive } from '../Scraper/ScraperProcess.service.js';
import { TestCasesLive } from '../TestCases/TestCases.service.js';

/** Exit code of a run that could not complete */
export const ABORTED_EXIT_CODE = 2;

/**
 * Every service of the harness, built from one set of options
 */
export const makeHarnessLayer = (options: Partial<HarnessConfigOptions> = {}) => {
  const base = Layer.mergeAll(HttpClientLive, HarnessLoggerLive).pipe(
    Layer.provideMerge(HarnessConfig.Live(options))
  );
  const services = Layer.mergeAll(ApiCacheLive, TestCasesLive, ScraperProcessLive).pipe(
    Layer.provideMerge(base)
  );
  return TestRunnerLive.pipe(Layer.provideMerge(services));
};

/**
 * Start the scraper, run every test and stop the scraper again.
 * Failures that prevent the run from completing are logged as CRITICAL.
 */
export const runHarness = Effect.gen(function* () {
  const config = yield* HarnessConfig;
  const logger = yield* HarnessLogger;
  const scraper = yield* ScraperProcess;
  const runner = yield* TestRunner;

  // the scraper reads its port from the same variable
  if (process.env[PORT_ENV_VAR] === undefined) {
    process.env[PORT_ENV_VAR] = String(config.options.scraperPort);
  }

  yield* logger.logRunLifecycle('start', {
    basePath: config.options.basePath,
    scraperUrl: config.scraperUrl,
    apiBaseUrl: config.options.apiBaseUrl,
  });

  const summary: RunSummary = yield* Effect.scoped(
    Effect.gen(function* () {
      yield* scraper.launch();
      return yield* runner.runAll();
    })
  ).pipe(
    Effect.tapError((error) =>
      Effect.zipRight(
        logger.critical(error.message),
        logger.logRunLifecycle('error', { error: error._tag, message: error.message })
      )
    )
  );

  yield* logger.logRunLifecycle('complete', {
    total: summary.total,
    passed: summary.passed,
    failed: summary.failed,
  });
  return summary;
});

/**
 * Run the harness and turn the outcome into a process exit code
 */
export const runToExitCode = runHarness.pipe(
  Effect.map(exitCodeFor),
  Effect.catchAll(() => Effect.succeed(ABORTED_EXIT_CODE))
);

/**
 * Delete the API cache, returning how many files were removed
 */
export const clearCache = Effect.gen(function* () {
  const cache = yield* ApiCache;
  const logger = yield* HarnessLogger;
  const removed = yield* cache.clearAll();
  yield* logger.info(`Removed ${removed} cached API response${removed === 1 ? '' : 's'}`);
  return removed;
});
