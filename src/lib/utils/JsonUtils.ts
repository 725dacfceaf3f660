/**
 * JSON Utilities
 * Effect-based JSON parsing and stringification
 */

import { Data, Effect } from 'effect';

export class JsonParseError extends Data.TaggedError('JsonParseError')<{
  readonly input: string;
  readonly cause?: unknown;
}> {
  get message(): string {
    const preview =
      this.input.length > 100 ? `${this.input.substring(0, 100)}...` : this.input;
    return `Failed to parse JSON: ${this.cause}. Input: "${preview}"`;
  }
}

export class JsonStringifyError extends Data.TaggedError('JsonStringifyError')<{
  readonly input: unknown;
  readonly cause?: unknown;
}> {
  get message(): string {
    return `Failed to stringify value of type ${typeof this.input}: ${this.cause}`;
  }
}

/**
 * Any value JSON.parse can produce
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const isJsonObject = (value: JsonValue): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const JsonUtils = {
  /**
   * Parse a JSON document into a {@link JsonValue}
   *
   * @example
   * ```ts
   * const body = yield* JsonUtils.parse('{"items": []}');
   * ```
   */
  parse: (input: string): Effect.Effect<JsonValue, JsonParseError> =>
    Effect.try({
      try: (): JsonValue => JSON.parse(input),
      catch: (cause) => new JsonParseError({ input, cause }),
    }),

  /**
   * Stringify a value, failing instead of throwing on cycles or BigInts
   */
  stringify: (
    value: unknown,
    space?: string | number
  ): Effect.Effect<string, JsonStringifyError> =>
    Effect.try({
      try: () => JSON.stringify(value, null, space),
      catch: (cause) => new JsonStringifyError({ input: value, cause }),
    }),

  /**
   * Drop the given top-level keys from an object; other values are returned unchanged
   */
  omitKeys: (value: JsonValue, keys: ReadonlyArray<string>): JsonValue => {
    if (!isJsonObject(value)) {
      return value;
    }
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (!keys.includes(key)) {
        result[key] = entry;
      }
    }
    return result;
  },
};
