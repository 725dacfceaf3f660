/**
 * Test Runner Service
 * Compares the scraper's answer for every test case with the cached Stack Exchange API answer
 */

import { Context, Effect, Layer } from 'effect';
import * as path from 'path';
import { ApiCache } from '../ApiCache/ApiCache.service.js';
import { HarnessConfig } from '../Config/HarnessConfig.service.js';
import { countDifferences, diffJson, isEmptyDiff } from '../Diff/JsonDiff.js';
import type { FileSystemError, TestCaseFileError } from '../errors.js';
import { HttpClient } from '../HttpClient/HttpClient.js';
import { HarnessLogger } from '../Logging/HarnessLogger.service.js';
import { apiUrl, parseEndpoint, scraperUrl, toTarget } from '../TestCases/Endpoint.js';
import { TestCases } from '../TestCases/TestCases.service.js';
import { FileUtils } from '../utils/FileUtils.js';
import { JsonUtils, type JsonStringifyError } from '../utils/JsonUtils.js';
import { summarize, type RunSummary, type TestOutcome } from './RunSummary.js';

export const BAD_ENDPOINT_PATH = '/bad-endpoint';
export const BAD_ENDPOINT_STATUS = 400;

type RunError = FileSystemError | JsonStringifyError;

export interface TestRunnerService {
  /** Test 0: an unknown endpoint must answer 400 */
  readonly runBadEndpointTest: () => Effect.Effect<TestOutcome>;
  /** Compare one endpoint and write `results/<id>.json` */
  readonly runTest: (id: number, endpoint: string) => Effect.Effect<TestOutcome, RunError>;
  /** Run test 0 and every test case in order, recording the summary */
  readonly runAll: () => Effect.Effect<RunSummary, RunError | TestCaseFileError>;
}

export class TestRunner extends Context.Tag('TestRunner')<TestRunner, TestRunnerService>() {}

export const makeTestRunner = Effect.gen(function* () {
  const config = yield* HarnessConfig;
  const http = yield* HttpClient;
  const cache = yield* ApiCache;
  const testCases = yield* TestCases;
  const logger = yield* HarnessLogger;
  const options = config.options;

  const finish = (outcome: TestOutcome) =>
    logger.logTestOutcome(outcome).pipe(Effect.as(outcome));

  const runBadEndpointTest = () =>
    Effect.gen(function* () {
      const target = BAD_ENDPOINT_PATH.slice(1);
      yield* logger.logTest(0, 'START', target);
      const response = yield* http
        .get(`${config.scraperUrl}${BAD_ENDPOINT_PATH}`)
        .pipe(Effect.either);

      if (response._tag === 'Right' && response.right.status === BAD_ENDPOINT_STATUS) {
        const reason = `Bad endpoint returned ${BAD_ENDPOINT_STATUS}`;
        yield* logger.logTest(0, 'PASS', reason);
        return yield* finish({ id: 0, target, status: 'pass', reason });
      }

      const reason = `Bad endpoint did not return ${BAD_ENDPOINT_STATUS}`;
      yield* logger.logTest(0, 'FAIL', reason);
      yield* logger.debug(
        response._tag === 'Left'
          ? response.left.message
          : `Got ${response.right.status}: ${response.right.body}`
      );
      return yield* finish({ id: 0, target, status: 'fail', reason });
    });

  const runTest = (id: number, endpoint: string) =>
    Effect.gen(function* () {
      const parsed = parseEndpoint(endpoint, options.site);
      const target = toTarget(parsed);
      yield* logger.logTest(id, 'START', target);

      yield* logger.logTest(id, 'RUNNING', 'Getting API response');
      const cachedEndpoint = yield* cache.open(apiUrl(options.apiBaseUrl, parsed));
      const cached = JsonUtils.omitKeys(yield* cachedEndpoint.fetch(), options.ignoredKeys);

      yield* logger.logTest(id, 'RUNNING', 'Getting Scraper response');
      const scraped = yield* http.get(scraperUrl(config.scraperUrl, parsed)).pipe(Effect.either);
      if (scraped._tag === 'Left') {
        const reason = `Scraper request failed: ${scraped.left.message}`;
        yield* logger.error(`Test ${id} [FAIL] - ${reason}`);
        return yield* finish({ id, target, status: 'fail', reason });
      }

      const response = scraped.right;
      if (response.status !== 200) {
        const reason = `Bad response code: ${response.status} : ${response.body}`;
        yield* logger.error(`Test ${id} [FAIL] - ${reason}`);
        return yield* finish({ id, target, status: 'fail', reason });
      }

      const body = yield* JsonUtils.parse(response.body).pipe(Effect.either);
      if (body._tag === 'Left') {
        const reason = `Scraper response is not JSON: ${response.body.slice(0, 200)}`;
        yield* logger.error(`Test ${id} [FAIL] - ${reason}`);
        return yield* finish({ id, target, status: 'fail', reason });
      }
      const scraper = body.right;

      const diff = diffJson(cached, scraper, {
        ignoreOrder: options.ignoreOrder,
        normalizeHtml: options.normalizeHtml,
      });
      const resultFile = path.join(options.resultsDir, `${id}.json`);
      yield* FileUtils.ensureDir(options.resultsDir);
      yield* FileUtils.writeJson(resultFile, { diff, cached, scraper }, 4);
      const relativeResult = path.relative(options.basePath, resultFile).split(path.sep).join('/');
      yield* logger.logTest(id, 'RUNNING', `Results written to ${relativeResult}`);

      if (isEmptyDiff(diff)) {
        const reason = 'No differences found';
        yield* logger.logTest(id, 'PASS', reason);
        return yield* finish({ id, target, status: 'pass', reason, resultFile: relativeResult, differences: 0 });
      }
      const reason = 'Differences found';
      yield* logger.logTest(id, 'FAIL', reason);
      return yield* finish({
        id,
        target,
        status: 'fail',
        reason,
        resultFile: relativeResult,
        differences: countDifferences(diff),
      });
    });

  const runAll = () =>
    Effect.gen(function* () {
      yield* Effect.forEach(
        [options.apiCacheDir, options.logDir, options.resultsDir],
        FileUtils.ensureDir,
        { discard: true }
      );
      const cases = yield* testCases.load();

      const outcomes: TestOutcome[] = [yield* runBadEndpointTest()];
      // one at a time: the API cache may have to hit the rate-limited API
      for (const testCase of cases) {
        outcomes.push(yield* runTest(testCase.id, testCase.endpoint));
      }

      const summary = summarize(outcomes);
      yield* logger.info(`Finished: ${summary.passed} passed, ${summary.failed} failed`);
      return summary;
    });

  const service: TestRunnerService = { runBadEndpointTest, runTest, runAll };
  return service;
});

export const TestRunnerLive = Layer.effect(TestRunner, makeTestRunner);
