/**
 * JsonUtils Tests
 * Tests for JSON parsing, stringification, and key filtering
 */

import { describe, expect, it } from 'vitest';
import { Effect } from 'effect';
import { isJsonObject, JsonUtils } from '../../../lib/utils/JsonUtils.js';

const run = <A>(effect: Effect.Effect<A, unknown>) =>
  Effect.runPromise(effect);

describe('JsonUtils', () => {
  describe('parse', () => {
    it('should parse valid JSON string', async () => {
      const result = await run(JsonUtils.parse('{"items":[1,2],"has_more":false}'));
      expect(result).toEqual({ items: [1, 2], has_more: false });
    });

    it('should fail on invalid JSON', async () => {
      const result = await Effect.runPromiseExit(JsonUtils.parse('not json'));
      expect(result._tag).toBe('Failure');
    });

    it('should include a preview of the input in the error', async () => {
      const result = await run(JsonUtils.parse('<html>').pipe(Effect.flip));
      expect(result._tag).toBe('JsonParseError');
      expect(result.message).toContain('Input: "<html>"');
    });
  });

  describe('stringify', () => {
    it('should stringify a value to JSON', async () => {
      const result = await run(JsonUtils.stringify({ key: 'value' }));
      expect(result).toBe('{"key":"value"}');
    });

    it('should indent with the given width', async () => {
      const result = await run(JsonUtils.stringify({ a: 1 }, 4));
      expect(result).toBe('{\n    "a": 1\n}');
    });

    it('should fail on circular references', async () => {
      const circular: Record<string, unknown> = {};
      circular.self = circular;
      const result = await Effect.runPromiseExit(JsonUtils.stringify(circular));
      expect(result._tag).toBe('Failure');
    });
  });

  describe('omitKeys', () => {
    it('should drop top-level keys only', () => {
      const value = {
        items: [{ quota_max: 1 }],
        quota_max: 300,
        quota_remaining: 299,
        has_more: true,
      };
      expect(JsonUtils.omitKeys(value, ['quota_max', 'quota_remaining'])).toEqual({
        items: [{ quota_max: 1 }],
        has_more: true,
      });
    });

    it('should return non-objects unchanged', () => {
      expect(JsonUtils.omitKeys([1, 2], ['quota_max'])).toEqual([1, 2]);
      expect(JsonUtils.omitKeys(null, ['quota_max'])).toBeNull();
    });
  });

  describe('isJsonObject', () => {
    it('should accept plain objects only', () => {
      expect(isJsonObject({})).toBe(true);
      expect(isJsonObject([])).toBe(false);
      expect(isJsonObject(null)).toBe(false);
      expect(isJsonObject('x')).toBe(false);
    });
  });
});
