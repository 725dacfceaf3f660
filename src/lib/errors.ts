import { Data } from 'effect';

/**
 * The request could not be made (connection refused, DNS failure, ...)
 */
export class NetworkError extends Data.TaggedError('NetworkError')<{
  readonly url: string;
  readonly statusCode?: number;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static fromCause(url: string, cause: unknown): NetworkError {
    return new NetworkError({
      url,
      cause,
      message: `Failed to fetch ${url}: ${cause}`,
    });
  }
}

/**
 * A request or wait exceeded its time limit
 */
export class TimeoutError extends Data.TaggedError('TimeoutError')<{
  readonly url: string;
  readonly timeoutMs: number;
  readonly operation: string;
  readonly message: string;
}> {
  static after(operation: string, url: string, timeoutMs: number): TimeoutError {
    return new TimeoutError({
      operation,
      url,
      timeoutMs,
      message: `Operation '${operation}' timed out after ${timeoutMs}ms for ${url}`,
    });
  }
}

/**
 * File system errors
 */
export class FileSystemError extends Data.TaggedError('FileSystemError')<{
  readonly operation: 'read' | 'write' | 'create' | 'delete';
  readonly path: string;
  readonly code?: string;
  readonly cause?: unknown;
  readonly message: string;
}> {
  static read(path: string, cause: unknown): FileSystemError {
    return new FileSystemError({
      operation: 'read',
      path,
      code: errorCode(cause),
      cause,
      message:
        errorCode(cause) === 'ENOENT'
          ? `File not found: ${path}`
          : `Failed to read file ${path}: ${cause}`,
    });
  }

  static write(path: string, cause: unknown): FileSystemError {
    return new FileSystemError({
      operation: 'write',
      path,
      code: errorCode(cause),
      cause,
      message: `Failed to write file ${path}: ${cause}`,
    });
  }

  static create(path: string, cause: unknown): FileSystemError {
    return new FileSystemError({
      operation: 'create',
      path,
      code: errorCode(cause),
      cause,
      message: `Failed to create directory ${path}: ${cause}`,
    });
  }

  static delete(path: string, cause: unknown): FileSystemError {
    return new FileSystemError({
      operation: 'delete',
      path,
      code: errorCode(cause),
      cause,
      message: `Failed to delete ${path}: ${cause}`,
    });
  }
}

/**
 * test_cases.json is not an array of endpoint entries
 */
export class TestCaseFileError extends Data.TaggedError('TestCaseFileError')<{
  readonly path: string;
  readonly issue: string;
  readonly message: string;
}> {
  static invalid(path: string, issue: string): TestCaseFileError {
    return new TestCaseFileError({
      path,
      issue,
      message: `Invalid test cases in ${path}: ${issue}`,
    });
  }
}

/**
 * The external scraper could not be started, never became ready, or could not be stopped
 */
export class ScraperProcessError extends Data.TaggedError('ScraperProcessError')<{
  readonly command: string;
  readonly phase: 'spawn' | 'ready' | 'stop';
  readonly cause?: unknown;
  readonly message: string;
}> {
  static spawn(command: string, cause: unknown): ScraperProcessError {
    return new ScraperProcessError({
      command,
      phase: 'spawn',
      cause,
      message: `Failed to start scraper with '${command}': ${cause}`,
    });
  }

  static notReady(command: string, cause: unknown): ScraperProcessError {
    return new ScraperProcessError({
      command,
      phase: 'ready',
      cause,
      message: `Scraper started with '${command}' did not become ready: ${cause}`,
    });
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends Data.TaggedError('ConfigurationError')<{
  readonly message: string;
  readonly details?: unknown;
}> {}

const errorCode = (cause: unknown): string | undefined => {
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    const code = cause.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};
