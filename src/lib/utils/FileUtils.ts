/**
 * File System Utilities
 * Effect-based file operations failing with FileSystemError
 */

import { Effect } from 'effect';
import * as fs from 'fs/promises';
import { FileSystemError } from '../errors.js';
import { JsonUtils, type JsonParseError, type JsonStringifyError, type JsonValue } from './JsonUtils.js';

export const FileUtils = {
  readText: (filePath: string): Effect.Effect<string, FileSystemError> =>
    Effect.tryPromise({
      try: () => fs.readFile(filePath, 'utf-8'),
      catch: (error) => FileSystemError.read(filePath, error),
    }),

  writeText: (filePath: string, content: string): Effect.Effect<void, FileSystemError> =>
    Effect.tryPromise({
      try: () => fs.writeFile(filePath, content, 'utf-8'),
      catch: (error) => FileSystemError.write(filePath, error),
    }),

  /**
   * Read and parse a JSON file
   *
   * @example
   * ```ts
   * const cases = yield* FileUtils.readJson('tests/test_cases.json');
   * ```
   */
  readJson: (
    filePath: string
  ): Effect.Effect<JsonValue, FileSystemError | JsonParseError> =>
    Effect.gen(function* () {
      const content = yield* FileUtils.readText(filePath);
      return yield* JsonUtils.parse(content);
    }),

  writeJson: (
    filePath: string,
    data: unknown,
    space?: number
  ): Effect.Effect<void, FileSystemError | JsonStringifyError> =>
    Effect.gen(function* () {
      const json = yield* JsonUtils.stringify(data, space);
      yield* FileUtils.writeText(filePath, json);
    }),

  exists: (filePath: string): Effect.Effect<boolean> =>
    Effect.promise(() =>
      fs.access(filePath).then(
        () => true,
        () => false
      )
    ),

  ensureDir: (dirPath: string): Effect.Effect<void, FileSystemError> =>
    Effect.tryPromise({
      try: () => fs.mkdir(dirPath, { recursive: true }),
      catch: (error) => FileSystemError.create(dirPath, error),
    }).pipe(Effect.asVoid),

  readDir: (dirPath: string): Effect.Effect<string[], FileSystemError> =>
    Effect.tryPromise({
      try: () => fs.readdir(dirPath),
      catch: (error) => FileSystemError.read(dirPath, error),
    }),

  delete: (filePath: string): Effect.Effect<void, FileSystemError> =>
    Effect.tryPromise({
      try: () => fs.rm(filePath, { force: true }),
      catch: (error) => FileSystemError.delete(filePath, error),
    }),
};
