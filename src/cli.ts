#!/usr/bin/env node
import { Cause, Console, Effect, Fiber } from 'effect';
import { parseCommandLine, USAGE } from './lib/Cli/options.js';
import {
  ABORTED_EXIT_CODE,
  clearCache,
  makeHarnessLayer,
  runToExitCode,
} from './lib/Harness/Harness.js';

const program = Effect.gen(function* () {
  const command = yield* parseCommandLine(process.argv.slice(2));
  switch (command._tag) {
    case 'Help':
      yield* Console.log(USAGE);
      return 0;
    case 'ClearCache':
      yield* clearCache.pipe(Effect.provide(makeHarnessLayer(command.options)));
      return 0;
    case 'Run':
      return yield* runToExitCode.pipe(Effect.provide(makeHarnessLayer(command.options)));
  }
}).pipe(
  Effect.catchAll((error) =>
    Console.error(`CRITICAL: ${error.message}`).pipe(Effect.as(ABORTED_EXIT_CODE))
  )
);

const fiber = Effect.runFork(program);

// interrupting runs the finalizers, which stop a scraper we started
for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    process.exitCode = 130;
    Effect.runFork(Fiber.interrupt(fiber));
  });
}

fiber.addObserver((exit) => {
  if (exit._tag === 'Success') {
    process.exitCode = exit.value;
  } else if (!Cause.isInterruptedOnly(exit.cause)) {
    console.error(Cause.pretty(exit.cause));
    process.exitCode = ABORTED_EXIT_CODE;
  }
  process.exit();
});
