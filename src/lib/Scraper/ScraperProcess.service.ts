/**
 * Scraper Process Service
 * Starts the scraper under test, waits until it answers, and stops it when the run ends
 */

import { type ChildProcess, spawn } from 'child_process';
import { Context, Data, Duration, Effect, Layer, Schedule, type Scope } from 'effect';
import * as fs from 'fs';
import * as path from 'path';
import { HarnessConfig } from '../Config/HarnessConfig.service.js';
import { ScraperProcessError } from '../errors.js';
import { HttpClient } from '../HttpClient/HttpClient.js';
import { HarnessLogger } from '../Logging/HarnessLogger.service.js';

export const PORT_ENV_VAR = 'STACKOVERFLOW_API_PORT';

/** How long a stopped scraper gets to exit before it is killed */
const STOP_GRACE_PERIOD = Duration.seconds(5);

export interface ScraperHandle {
  readonly pid: number | undefined;
  readonly hasExited: () => boolean;
  /** Exit code, or the signal name when the process was killed */
  readonly exitStatus: () => string | undefined;
  readonly stop: () => Effect.Effect<void>;
}

export interface ScraperProcessService {
  /** Spawn the scraper command with its output appended to the scraper log */
  readonly start: () => Effect.Effect<ScraperHandle, ScraperProcessError>;
  /**
   * Poll the readiness endpoint until it answers 200.
   * Fails once the timeout passes or the given process exits.
   */
  readonly waitUntilReady: (
    handle?: ScraperHandle
  ) => Effect.Effect<void, ScraperProcessError>;
  /**
   * Start the scraper (unless configured to use a running one) and wait for it.
   * The process is stopped when the scope closes.
   */
  readonly launch: () => Effect.Effect<void, ScraperProcessError, Scope.Scope>;
}

export class ScraperProcess extends Context.Tag('ScraperProcess')<
  ScraperProcess,
  ScraperProcessService
>() {}

class ScraperNotReady extends Data.TaggedError('ScraperNotReady')<{
  readonly reason: string;
}> {}

export const makeScraperProcess = Effect.gen(function* () {
  const config = yield* HarnessConfig;
  const http = yield* HttpClient;
  const logger = yield* HarnessLogger;
  const {
    scraperCommand,
    scraperPort,
    readinessPath,
    readinessIntervalMs,
    readinessTimeoutMs,
    startScraper,
  } = config.options;

  const handleFor = (child: ChildProcess, spawnError: { current?: Error }): ScraperHandle => {
    const hasExited = () =>
      spawnError.current !== undefined || child.exitCode !== null || child.signalCode !== null;

    const signal = (name: NodeJS.Signals) =>
      Effect.try(() => {
        if (child.pid === undefined) {
          return;
        }
        // the command runs through a shell; signal its whole process group
        if (process.platform === 'win32') {
          child.kill(name);
        } else {
          process.kill(-child.pid, name);
        }
      }).pipe(
        Effect.catchAll((error) =>
          logger.debug(`Could not send ${name} to scraper: ${error.message}`)
        )
      );

    const waitForExit = Effect.async<void>((resume) => {
      if (hasExited()) {
        resume(Effect.void);
        return;
      }
      const onExit = () => resume(Effect.void);
      child.once('exit', onExit);
      return Effect.sync(() => {
        child.off('exit', onExit);
      });
    });

    return {
      pid: child.pid,
      hasExited,
      exitStatus: () =>
        spawnError.current?.message ??
        (child.exitCode !== null ? String(child.exitCode) : child.signalCode ?? undefined),
      stop: () =>
        Effect.gen(function* () {
          if (hasExited()) {
            return;
          }
          yield* logger.info('Stopping the scraper service');
          yield* signal('SIGTERM');
          const exited = yield* waitForExit.pipe(Effect.timeoutOption(STOP_GRACE_PERIOD));
          if (exited._tag === 'None') {
            yield* logger.warning('Scraper did not stop in time, killing it');
            yield* signal('SIGKILL');
            yield* waitForExit.pipe(Effect.timeoutOption(STOP_GRACE_PERIOD));
          }
        }),
    };
  };

  const start = () =>
    Effect.gen(function* () {
      yield* logger.info(`Starting the scraper service on port ${scraperPort}`);
      const logFile = config.logFile('scraper');

      const child = yield* Effect.try({
        try: () => {
          fs.mkdirSync(path.dirname(logFile), { recursive: true });
          const fd = fs.openSync(logFile, 'a');
          try {
            return spawn(scraperCommand, {
              shell: true,
              cwd: process.cwd(),
              detached: process.platform !== 'win32',
              stdio: ['ignore', fd, fd],
              env: { ...process.env, [PORT_ENV_VAR]: String(scraperPort) },
            });
          } finally {
            fs.closeSync(fd);
          }
        },
        catch: (error) => ScraperProcessError.spawn(scraperCommand, error),
      });

      const spawnError: { current?: Error } = {};
      child.once('error', (error) => {
        spawnError.current = error;
      });
      yield* logger.debug(`Scraper pid ${child.pid ?? 'unknown'}, output in ${logFile}`);
      return handleFor(child, spawnError);
    });

  const readinessUrl = `${config.scraperUrl}${readinessPath}`;

  const waitUntilReady = (handle?: ScraperHandle) => {
    const probe = Effect.gen(function* () {
      if (handle?.hasExited()) {
        return yield* Effect.fail(
          ScraperProcessError.notReady(
            scraperCommand,
            `process exited (${handle.exitStatus() ?? 'unknown status'}) before answering`
          )
        );
      }
      const response = yield* http
        .get(readinessUrl, { timeout: Math.max(readinessIntervalMs, 1000) })
        .pipe(Effect.mapError((error) => new ScraperNotReady({ reason: error.message })));
      if (response.status !== 200) {
        return yield* Effect.fail(
          new ScraperNotReady({ reason: `${readinessUrl} answered ${response.status}` })
        );
      }
    });

    return Effect.gen(function* () {
      yield* logger.info('Waiting for the service to start');
      yield* probe.pipe(
        Effect.tapError((error) =>
          error._tag === 'ScraperNotReady' ? logger.debug(error.reason) : Effect.void
        ),
        Effect.retry({
          schedule: Schedule.spaced(Duration.millis(readinessIntervalMs)),
          while: (error) => error._tag === 'ScraperNotReady',
        }),
        Effect.mapError((error) =>
          error._tag === 'ScraperNotReady'
            ? ScraperProcessError.notReady(scraperCommand, error.reason)
            : error
        ),
        Effect.timeoutFail({
          duration: Duration.millis(readinessTimeoutMs),
          onTimeout: () =>
            ScraperProcessError.notReady(
              scraperCommand,
              `no 200 from ${readinessUrl} within ${readinessTimeoutMs}ms`
            ),
        })
      );
      yield* logger.debug(`Scraper answered on ${readinessUrl}`);
    });
  };

  const service: ScraperProcessService = {
    start,
    waitUntilReady,
    launch: () =>
      Effect.gen(function* () {
        if (!startScraper) {
          yield* logger.info(`Using the scraper already running on port ${scraperPort}`);
          yield* waitUntilReady();
          return;
        }
        const handle = yield* Effect.acquireRelease(start(), (started) => started.stop());
        yield* waitUntilReady(handle);
      }),
  };
  return service;
});

export const ScraperProcessLive = Layer.effect(ScraperProcess, makeScraperProcess);
