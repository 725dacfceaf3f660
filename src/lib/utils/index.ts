/**
 * Utility Services Index
 */

export { JsonUtils, isJsonObject } from './JsonUtils.js';
export type { JsonObject, JsonValue } from './JsonUtils.js';
export { JsonParseError, JsonStringifyError } from './JsonUtils.js';

export { FileUtils } from './FileUtils.js';
