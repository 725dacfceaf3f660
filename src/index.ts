// Services
export * from './lib/Config/HarnessConfig.service.js';
export * from './lib/Logging/HarnessLogger.service.js';
export * from './lib/HttpClient/index.js';
export * from './lib/ApiCache/ApiCache.service.js';
export * from './lib/TestCases/TestCases.service.js';
export * from './lib/TestCases/Endpoint.js';
export * from './lib/Scraper/ScraperProcess.service.js';
export * from './lib/Runner/TestRunner.service.js';
export * from './lib/Runner/RunSummary.js';
export * from './lib/Harness/Harness.js';
export { parseCommandLine, USAGE } from './lib/Cli/options.js';
export type { CliCommand } from './lib/Cli/options.js';

// Comparison
export * from './lib/Diff/JsonDiff.js';
export { normalizeHtml, htmlEquivalent, looksLikeHtml } from './lib/Diff/HtmlNormaliser.js';
export { similarity } from './lib/Diff/similarity.js';

// Errors and utilities
export * from './lib/errors.js';
export * from './lib/utils/index.js';
