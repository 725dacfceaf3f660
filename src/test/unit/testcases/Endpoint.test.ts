/**
 * Endpoint Tests
 */

import { describe, expect, it } from 'vitest';
import { apiUrl, parseEndpoint, scraperUrl, toTarget } from '../../../lib/TestCases/Endpoint.js';

describe('parseEndpoint', () => {
  it('should split path and query and append the site', () => {
    expect(parseEndpoint('/collectives?key=value&another_key=another_value')).toEqual({
      path: '/collectives',
      query: ['key=value', 'another_key=another_value', 'site=stackoverflow'],
    });
  });

  it('should add the site to an endpoint without a query', () => {
    expect(toTarget(parseEndpoint('/questions'))).toBe('/questions?site=stackoverflow');
  });

  it('should keep an explicit site parameter', () => {
    expect(toTarget(parseEndpoint('/questions?site=serverfault&order=desc'))).toBe(
      '/questions?site=serverfault&order=desc'
    );
  });

  it('should use the configured site', () => {
    expect(toTarget(parseEndpoint('/tags', 'superuser'))).toBe('/tags?site=superuser');
  });

  it('should trim whitespace and drop empty segments', () => {
    expect(toTarget(parseEndpoint('  /answers?&page=2&&pagesize=5&  '))).toBe(
      '/answers?page=2&pagesize=5&site=stackoverflow'
    );
  });

  it('should drop text after a second question mark', () => {
    expect(toTarget(parseEndpoint('/questions?order=desc?ignored=1'))).toBe(
      '/questions?order=desc&site=stackoverflow'
    );
  });

  it('should keep encoded segments verbatim', () => {
    expect(parseEndpoint('/questions?tagged=c%23').query).toEqual([
      'tagged=c%23',
      'site=stackoverflow',
    ]);
  });
});

describe('endpoint URLs', () => {
  const endpoint = parseEndpoint('/users/1?order=desc');

  it('should build the API URL', () => {
    expect(apiUrl('https://api.example.test/2.3', endpoint)).toBe(
      'https://api.example.test/2.3/users/1?order=desc&site=stackoverflow'
    );
  });

  it('should build the scraper URL', () => {
    expect(scraperUrl('http://localhost:5000', endpoint)).toBe(
      'http://localhost:5000/users/1?order=desc&site=stackoverflow'
    );
  });
});
