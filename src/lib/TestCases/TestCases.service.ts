import { Context, Effect, Layer, ParseResult, Schema } from 'effect';
import * as path from 'path';
import { HarnessConfig } from '../Config/HarnessConfig.service.js';
import { FileSystemError, TestCaseFileError } from '../errors.js';
import { HarnessLogger } from '../Logging/HarnessLogger.service.js';
import { FileUtils } from '../utils/FileUtils.js';

const EndpointString = Schema.String.pipe(
  Schema.filter((value) => value.trim().length > 0, {
    message: () => 'endpoint must not be blank',
  })
);

/**
 * One entry of test_cases.json: either the endpoint itself or an object naming it
 *
 * @example
 * ```json
 * [
 *   "/questions?order=desc&sort=activity",
 *   { "endpoint": "/collectives", "description": "all collectives" }
 * ]
 * ```
 */
export const TestCaseEntry = Schema.Union(
  EndpointString,
  Schema.Struct({
    endpoint: EndpointString,
    description: Schema.optional(Schema.String),
  })
);

export const TestCaseFile = Schema.Array(TestCaseEntry);

export interface TestCase {
  /** 1-based position in the file; 0 is reserved for the bad-endpoint probe */
  readonly id: number;
  readonly endpoint: string;
  readonly description?: string;
}

export const NO_TEST_CASES_WARNING =
  'No test cases found. Please add test cases to test_cases.json';

export interface TestCasesService {
  /**
   * Read test_cases.json, creating it as `[]` when missing
   */
  readonly load: () => Effect.Effect<ReadonlyArray<TestCase>, TestCaseFileError | FileSystemError>;
}

export class TestCases extends Context.Tag('TestCases')<TestCases, TestCasesService>() {}

export const decodeTestCases = (
  filePath: string,
  content: string
): Effect.Effect<ReadonlyArray<TestCase>, TestCaseFileError> =>
  Effect.gen(function* () {
    const parsed = yield* Effect.try({
      try: (): unknown => JSON.parse(content),
      catch: (cause) => TestCaseFileError.invalid(filePath, `not valid JSON (${cause})`),
    });
    const entries = yield* Schema.decodeUnknown(TestCaseFile)(parsed).pipe(
      Effect.mapError((error) =>
        TestCaseFileError.invalid(
          filePath,
          ParseResult.TreeFormatter.formatErrorSync(error)
        )
      )
    );
    return entries.map((entry, index): TestCase =>
      typeof entry === 'string'
        ? { id: index + 1, endpoint: entry }
        : { id: index + 1, endpoint: entry.endpoint, description: entry.description }
    );
  });

export const makeTestCases = Effect.gen(function* () {
  const config = yield* HarnessConfig;
  const logger = yield* HarnessLogger;
  const { testCasesPath } = config.options;

  const service: TestCasesService = {
    load: () =>
      Effect.gen(function* () {
        if (!(yield* FileUtils.exists(testCasesPath))) {
          yield* FileUtils.ensureDir(path.dirname(testCasesPath));
          yield* FileUtils.writeText(testCasesPath, '[]');
          yield* logger.warning(NO_TEST_CASES_WARNING);
          return [];
        }
        const content = yield* FileUtils.readText(testCasesPath);
        const cases = yield* decodeTestCases(testCasesPath, content);
        if (cases.length === 0) {
          yield* logger.warning(NO_TEST_CASES_WARNING);
        }
        yield* logger.debug(`Loaded ${cases.length} test case(s) from ${testCasesPath}`);
        return cases;
      }),
  };
  return service;
});

export const TestCasesLive = Layer.effect(TestCases, makeTestCases);
