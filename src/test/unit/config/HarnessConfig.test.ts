/**
 * HarnessConfig Tests
 */

import { describe, expect, it } from 'vitest';
import { Effect, Option } from 'effect';
import * as path from 'path';
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_SCRAPER_COMMAND,
  formatRunStamp,
  makeHarnessConfig,
  parsePort,
  parsePositiveNumber,
  resolvePort,
} from '../../../lib/Config/HarnessConfig.service.js';

describe('makeHarnessConfig', () => {
  it('should derive every directory from the base path', () => {
    const config = makeHarnessConfig({ basePath: '/work/tests', runStamp: '20260101-000000' });

    expect(config.options.apiCacheDir).toBe(path.join('/work/tests', 'api_cache'));
    expect(config.options.logDir).toBe(path.join('/work/tests', 'logs'));
    expect(config.options.resultsDir).toBe(path.join('/work/tests', 'results'));
    expect(config.options.testCasesPath).toBe(path.join('/work/tests', 'test_cases.json'));
    expect(config.logFile('scraper')).toBe(
      path.join('/work/tests', 'logs', '20260101-000000-scraper.log')
    );
  });

  it('should apply defaults', () => {
    const config = makeHarnessConfig();

    expect(config.options.basePath).toBe(path.join(process.cwd(), 'tests'));
    expect(config.options.scraperPort).toBe(5000);
    expect(config.options.apiBaseUrl).toBe(DEFAULT_API_BASE_URL);
    expect(config.options.scraperCommand).toBe(DEFAULT_SCRAPER_COMMAND);
    expect(config.options.cacheUpdateIntervalSeconds).toBe(600);
    expect(config.options.ignoredKeys).toEqual(['quota_max', 'quota_remaining']);
    expect(config.options.ignoreOrder).toBe(true);
    expect(config.options.normalizeHtml).toBe(false);
    expect(config.scraperUrl).toBe('http://localhost:5000');
  });

  it('should strip trailing slashes from the API URL', () => {
    const config = makeHarnessConfig({ apiBaseUrl: 'http://localhost:9000/2.3//' });
    expect(config.options.apiBaseUrl).toBe('http://localhost:9000/2.3');
  });

  it('should build the scraper URL from the port', () => {
    expect(makeHarnessConfig({ scraperPort: 8123 }).scraperUrl).toBe('http://localhost:8123');
  });
});

describe('formatRunStamp', () => {
  it('should pad every field', () => {
    expect(formatRunStamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('20260102-030405');
  });
});

describe('parsePort', () => {
  it('should accept ports in range', async () => {
    expect(await Effect.runPromise(parsePort(' 8080 '))).toBe(8080);
  });

  it.each(['0', '65536', 'http', '50.5', ''])('should reject %j', async (raw) => {
    const error = await Effect.runPromise(parsePort(raw).pipe(Effect.flip));
    expect(error._tag).toBe('ConfigurationError');
  });
});

describe('parsePositiveNumber', () => {
  it('should accept fractions', async () => {
    expect(await Effect.runPromise(parsePositiveNumber('ready-timeout', '0.5'))).toBe(0.5);
  });

  it('should name the setting in the error', async () => {
    const error = await Effect.runPromise(parsePositiveNumber('cache-ttl', '-1').pipe(Effect.flip));
    expect(error.message).toBe("Invalid cache-ttl '-1': expected a positive number");
  });
});

describe('resolvePort', () => {
  it('should prefer the command line', async () => {
    const port = await Effect.runPromise(resolvePort(Option.some('6000'), Option.some('7000')));
    expect(port).toBe(6000);
  });

  it('should fall back to the environment', async () => {
    const port = await Effect.runPromise(resolvePort(Option.none(), Option.some('7000')));
    expect(port).toBe(7000);
  });

  it('should default to 5000', async () => {
    expect(await Effect.runPromise(resolvePort(Option.none(), Option.none()))).toBe(5000);
  });
});
