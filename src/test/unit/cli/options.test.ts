/**
 * Command line option tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigProvider, Effect } from 'effect';
import * as fs from 'fs';
import * as path from 'path';
import { parseCommandLine } from '../../../lib/Cli/options.js';
import { loadEnvFile } from '../../../lib/Config/HarnessConfig.service.js';
import { makeTempDir, removeDir } from '../../helpers/TestLayers.js';

let tempDir: string;

beforeEach(() => {
  tempDir = makeTempDir();
});

afterEach(() => {
  removeDir(tempDir);
});

/** An env file that does not exist, so only the given environment counts */
const noEnvFile = () => path.join(tempDir, 'missing.env');

const parse = (argv: string[], env: Record<string, string> = {}) =>
  Effect.runPromise(
    parseCommandLine(argv, noEnvFile()).pipe(
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env))))
    )
  );

const parseError = (argv: string[], env: Record<string, string> = {}) =>
  Effect.runPromise(
    parseCommandLine(argv, noEnvFile()).pipe(
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
      Effect.flip
    )
  );

describe('parseCommandLine', () => {
  it('should run with defaults', async () => {
    expect(await parse([])).toEqual({
      _tag: 'Run',
      options: {
        scraperPort: 5000,
        startScraper: true,
        forceRefresh: false,
        normalizeHtml: false,
        verbose: false,
      },
    });
  });

  it('should read every option', async () => {
    const command = await parse([
      '--port', '6000',
      '--no-start',
      '--refresh',
      '--cache-ttl', '30',
      '--ready-timeout', '2.5',
      '--normalize-html',
      '-v',
      '--base-dir', '/tmp/harness',
      '--scraper-cmd', 'node scraper.js',
    ]);
    expect(command).toEqual({
      _tag: 'Run',
      options: {
        scraperPort: 6000,
        startScraper: false,
        forceRefresh: true,
        normalizeHtml: true,
        verbose: true,
        basePath: '/tmp/harness',
        scraperCommand: 'node scraper.js',
        cacheUpdateIntervalSeconds: 30,
        readinessTimeoutMs: 2500,
      },
    });
  });

  it('should fall back to the environment', async () => {
    const command = await parse([], {
      STACKOVERFLOW_API_PORT: '7000',
      SCRAPER_COMMAND: 'node other.js',
      STACKEXCHANGE_API_URL: 'http://localhost:9000/2.3',
    });
    expect(command).toEqual({
      _tag: 'Run',
      options: {
        scraperPort: 7000,
        startScraper: true,
        forceRefresh: false,
        normalizeHtml: false,
        verbose: false,
        scraperCommand: 'node other.js',
        apiBaseUrl: 'http://localhost:9000/2.3',
      },
    });
  });

  it('should prefer the command line over the environment', async () => {
    const command = await parse(['-p', '6001'], { STACKOVERFLOW_API_PORT: '7000' });
    expect(command._tag === 'Run' && command.options.scraperPort).toBe(6001);
  });

  it('should recognise help', async () => {
    expect(await parse(['--help'])).toEqual({ _tag: 'Help' });
  });

  it('should recognise clearing the cache', async () => {
    expect((await parse(['--clear-cache']))._tag).toBe('ClearCache');
  });

  it('should reject unknown options', async () => {
    const error = await parseError(['--bogus']);
    expect(error.message).toContain("'--bogus'");
    expect(error.message).toContain('Usage: stackoverflow-scraper-tests');
  });

  it('should reject an invalid port', async () => {
    const error = await parseError(['--port', 'abc']);
    expect(error.message).toBe("Invalid port 'abc': expected an integer between 1 and 65535");
  });

  it('should reject an invalid port from the environment', async () => {
    const error = await parseError([], { STACKOVERFLOW_API_PORT: '99999' });
    expect(error.message).toBe("Invalid port '99999': expected an integer between 1 and 65535");
  });

  it('should reject a zero cache TTL', async () => {
    const error = await parseError(['--cache-ttl', '0']);
    expect(error.message).toBe("Invalid cache-ttl '0': expected a positive number");
  });
});

describe('environment file', () => {
  const VARIABLES = ['STACKOVERFLOW_API_PORT', 'SCRAPER_COMMAND', 'STACKEXCHANGE_API_URL'];
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = Object.fromEntries(VARIABLES.map((name) => [name, process.env[name]]));
    for (const name of VARIABLES) {
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of VARIABLES) {
      const value = saved[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  const writeEnvFile = (content: string) => {
    const file = path.join(tempDir, '.env');
    fs.writeFileSync(file, content);
    return file;
  };

  it('should read settings from the env file', async () => {
    const envFile = writeEnvFile('STACKOVERFLOW_API_PORT=6123\nSCRAPER_COMMAND="node scraper.js"\n');

    const command = await Effect.runPromise(parseCommandLine([], envFile));

    expect(command).toEqual({
      _tag: 'Run',
      options: {
        scraperPort: 6123,
        startScraper: true,
        forceRefresh: false,
        normalizeHtml: false,
        verbose: false,
        scraperCommand: 'node scraper.js',
      },
    });
    expect(process.env.STACKOVERFLOW_API_PORT).toBe('6123');
  });

  it('should not replace variables that are already set', async () => {
    process.env.STACKOVERFLOW_API_PORT = '6200';
    const envFile = writeEnvFile('STACKOVERFLOW_API_PORT=6123\n');

    const command = await Effect.runPromise(parseCommandLine([], envFile));

    expect(command._tag === 'Run' && command.options.scraperPort).toBe(6200);
  });
});

describe('loadEnvFile', () => {
  it('should return the names it loaded', async () => {
    const file = path.join(tempDir, '.env');
    fs.writeFileSync(file, '# settings\nALREADY=file\nADDED=2\n');
    const env: NodeJS.ProcessEnv = { ALREADY: 'set' };

    const loaded = await Effect.runPromise(loadEnvFile(file, env));

    expect(loaded).toEqual(['ADDED']);
    expect(env).toEqual({ ALREADY: 'set', ADDED: '2' });
  });

  it('should load nothing when the file is missing', async () => {
    const env: NodeJS.ProcessEnv = {};

    expect(await Effect.runPromise(loadEnvFile(noEnvFile(), env))).toEqual([]);
    expect(env).toEqual({});
  });
});
