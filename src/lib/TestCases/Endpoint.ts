/**
 * Endpoint strings as contributors write them in test_cases.json,
 * e.g. `/collectives?key=value&another_key=another_value`
 */

export interface ParsedEndpoint {
  /** Path before the first `?` */
  readonly path: string;
  /** Query segments in order, verbatim, `site=<site>` last */
  readonly query: ReadonlyArray<string>;
}

/**
 * Split an endpoint into its path and query segments and append the `site` parameter.
 *
 * Text after a second `?` is dropped. Segments are not decoded or re-encoded,
 * so `tagged=c%23` reaches both the API and the scraper unchanged.
 */
export const parseEndpoint = (raw: string, site = 'stackoverflow'): ParsedEndpoint => {
  const [path = '', queryString = ''] = raw.trim().split('?');
  const query = queryString.split('&').filter((segment) => segment.length > 0);
  if (!query.some((segment) => segment.startsWith('site='))) {
    query.push(`site=${site}`);
  }
  return { path, query };
};

/**
 * `<path>?<query>` as requested from both the API and the scraper
 */
export const toTarget = (endpoint: ParsedEndpoint): string =>
  `${endpoint.path}?${endpoint.query.join('&')}`;

export const apiUrl = (apiBaseUrl: string, endpoint: ParsedEndpoint): string =>
  `${apiBaseUrl}${toTarget(endpoint)}`;

export const scraperUrl = (baseUrl: string, endpoint: ParsedEndpoint): string =>
  `${baseUrl}${toTarget(endpoint)}`;
