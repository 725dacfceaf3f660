import { Console, Context, Effect, Layer } from 'effect';
import * as fs from 'fs';
import * as path from 'path';
import { HarnessConfig } from '../Config/HarnessConfig.service.js';
import { FileSystemError } from '../errors.js';
import type { TestOutcome } from '../Runner/RunSummary.js';
import { colorize } from './colors.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

export type TestMarker = 'START' | 'RUNNING' | 'PASS' | 'FAIL';

export interface HarnessLogger {
  readonly log: (level: LogLevel, message: string) => Effect.Effect<void>;
  readonly debug: (message: string) => Effect.Effect<void>;
  readonly info: (message: string) => Effect.Effect<void>;
  readonly warning: (message: string) => Effect.Effect<void>;
  readonly error: (message: string) => Effect.Effect<void>;
  readonly critical: (message: string) => Effect.Effect<void>;

  /** `Test <id> [<MARKER>] : <detail>` at INFO */
  readonly logTest: (
    id: number,
    marker: TestMarker,
    detail: string
  ) => Effect.Effect<void>;

  /** Record a finished test in the run summary */
  readonly logTestOutcome: (outcome: TestOutcome) => Effect.Effect<void>;
  readonly logRunLifecycle: (
    event: 'start' | 'complete' | 'error',
    details?: Record<string, unknown>
  ) => Effect.Effect<void>;
}

export const HarnessLogger = Context.GenericTag<HarnessLogger>('HarnessLogger');

export interface HarnessLoggerOptions {
  /** Plain-text log receiving every line at or above `fileLevel` */
  readonly logFilePath?: string;
  /** JSON run summary rewritten as tests complete */
  readonly summaryFilePath?: string;
  readonly consoleLevel?: LogLevel;
  readonly fileLevel?: LogLevel;
  readonly console?: boolean;
  readonly color?: boolean;
}

export const formatLine = (
  timestamp: string,
  level: LogLevel,
  message: string
): string => `[${timestamp}] ${level}: ${message}`;

export const makeHarnessLogger = (
  options: HarnessLoggerOptions = {}
): HarnessLogger => {
  const {
    logFilePath,
    summaryFilePath,
    consoleLevel = 'INFO',
    fileLevel = 'DEBUG',
    console: toConsole = true,
    color = true,
  } = options;

  for (const file of [logFilePath, summaryFilePath]) {
    if (file && !fs.existsSync(path.dirname(file))) {
      fs.mkdirSync(path.dirname(file), { recursive: true });
    }
  }

  const writeLine = (level: LogLevel, message: string) =>
    Effect.gen(function* () {
      const line = formatLine(new Date().toISOString(), level, message);
      if (logFilePath && LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[fileLevel]) {
        yield* Effect.sync(() => fs.appendFileSync(logFilePath, line + '\n'));
      }
      if (toConsole && LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[consoleLevel]) {
        yield* Console.log(color ? colorize(line) : line);
      }
    });

  const updateSummary = (
    update: (summary: Record<string, unknown>) => Record<string, unknown>
  ) =>
    Effect.sync(() => {
      if (!summaryFilePath) {
        return;
      }
      let summary: Record<string, unknown> = {};
      if (fs.existsSync(summaryFilePath)) {
        const content = fs.readFileSync(summaryFilePath, 'utf-8');
        try {
          const parsed: unknown = JSON.parse(content);
          summary =
            typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
              ? { ...parsed }
              : {};
        } catch {
          summary = {};
        }
      }
      summary = update(summary);
      fs.writeFileSync(summaryFilePath, JSON.stringify(summary, null, 2));
    });

  const asRecord = (value: unknown): Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value)
      ? { ...value }
      : {};

  return {
    log: writeLine,
    debug: (message) => writeLine('DEBUG', message),
    info: (message) => writeLine('INFO', message),
    warning: (message) => writeLine('WARNING', message),
    error: (message) => writeLine('ERROR', message),
    critical: (message) => writeLine('CRITICAL', message),

    logTest: (id, marker, detail) =>
      writeLine('INFO', `Test ${id} [${marker}] : ${detail}`),

    logTestOutcome: (outcome) =>
      updateSummary((summary) => ({
        ...summary,
        tests: {
          ...asRecord(summary.tests),
          [outcome.id]: {
            target: outcome.target,
            status: outcome.status,
            reason: outcome.reason,
            ...(outcome.resultFile !== undefined ? { resultFile: outcome.resultFile } : {}),
            finishedAt: new Date().toISOString(),
          },
        },
      })),

    logRunLifecycle: (event, details) =>
      Effect.gen(function* () {
        yield* writeLine('DEBUG', `Run ${event}${details ? ` ${JSON.stringify(details)}` : ''}`);
        if (event === 'start') {
          // a new run starts from an empty summary
          yield* Effect.sync(() => {
            if (summaryFilePath && fs.existsSync(summaryFilePath)) {
              fs.rmSync(summaryFilePath);
            }
          });
          yield* updateSummary(() => ({
            status: 'running',
            startTime: new Date().toISOString(),
            ...(details && { details }),
          }));
        } else {
          yield* updateSummary((summary) => ({
            ...summary,
            status: event === 'complete' ? 'completed' : 'error',
            endTime: new Date().toISOString(),
            ...(details && { finalDetails: details }),
          }));
        }
      }),
  };
};

/**
 * Logger writing `<logDir>/<stamp>-tester.log` and `<resultsDir>/summary.json`
 */
export const HarnessLoggerLive = Layer.effect(
  HarnessLogger,
  Effect.gen(function* () {
    const config = yield* HarnessConfig;
    return yield* Effect.try({
      try: () =>
        makeHarnessLogger({
          logFilePath: config.logFile('tester'),
          summaryFilePath: path.join(config.options.resultsDir, 'summary.json'),
          consoleLevel: config.options.verbose ? 'DEBUG' : 'INFO',
          color: process.stdout.isTTY === true,
        }),
      catch: (error) => FileSystemError.create(config.options.logDir, error),
    });
  })
);
