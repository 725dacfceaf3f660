/**
 * JSON Diff
 * Structural comparison of the cached API response with the scraper's response.
 *
 * The report groups differences the way DeepDiff does, so result files keep the
 * shape contributors already know:
 * ```json
 * {
 *   "values_changed": { "root['items'][0]['score']": { "old_value": 3, "new_value": 4 } },
 *   "dictionary_item_removed": ["root['has_more']"]
 * }
 * ```
 */

import { isJsonObject, type JsonValue } from '../utils/JsonUtils.js';
import { htmlEquivalent } from './HtmlNormaliser.js';
import { similarity } from './similarity.js';

export type TypeName = 'dict' | 'list' | 'str' | 'int' | 'float' | 'bool' | 'NoneType';

export interface ValueChange {
  readonly old_value: JsonValue;
  readonly new_value: JsonValue;
  /** Present when both values are strings */
  readonly similarity?: number;
}

export interface TypeChange {
  readonly old_type: TypeName;
  readonly new_type: TypeName;
  readonly old_value: JsonValue;
  readonly new_value: JsonValue;
}

export interface DiffReport {
  values_changed?: Record<string, ValueChange>;
  type_changes?: Record<string, TypeChange>;
  dictionary_item_added?: string[];
  dictionary_item_removed?: string[];
  iterable_item_added?: Record<string, JsonValue>;
  iterable_item_removed?: Record<string, JsonValue>;
}

export interface DiffOptions {
  /** Compare arrays as multisets (default: true) */
  readonly ignoreOrder?: boolean;
  /** Ignore markup-only differences between HTML strings (default: false) */
  readonly normalizeHtml?: boolean;
}

export const typeName = (value: JsonValue): TypeName => {
  if (value === null) return 'NoneType';
  if (Array.isArray(value)) return 'list';
  switch (typeof value) {
    case 'string':
      return 'str';
    case 'boolean':
      return 'bool';
    case 'number':
      return Number.isInteger(value) ? 'int' : 'float';
    default:
      return 'dict';
  }
};

const isNumber = (value: JsonValue): value is number => typeof value === 'number';

/** `root['key']`, or `root["key"]` when the key holds a single quote */
const keyPath = (path: string, key: string): string =>
  key.includes("'") && !key.includes('"')
    ? `${path}["${key}"]`
    : `${path}['${key.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}']`;

const indexPath = (path: string, index: number): string => `${path}[${index}]`;

const stringsMatch = (a: string, b: string, options: Required<DiffOptions>): boolean =>
  a === b || (options.normalizeHtml && htmlEquivalent(a, b));

/**
 * Deep equality under the same rules the diff uses
 */
export const isEquivalent = (
  a: JsonValue,
  b: JsonValue,
  options: DiffOptions = {}
): boolean => equivalent(a, b, withDefaults(options));

const withDefaults = (options: DiffOptions): Required<DiffOptions> => ({
  ignoreOrder: options.ignoreOrder ?? true,
  normalizeHtml: options.normalizeHtml ?? false,
});

const equivalent = (
  a: JsonValue,
  b: JsonValue,
  options: Required<DiffOptions>
): boolean => {
  if (isNumber(a) && isNumber(b)) {
    return a === b;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return stringsMatch(a, b, options);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) {
      return false;
    }
    if (!options.ignoreOrder) {
      return a.every((item, index) => equivalent(item, b[index], options));
    }
    const { unmatchedLeft } = matchItems(a, b, options);
    return unmatchedLeft.length === 0;
  }
  if (isJsonObject(a) && isJsonObject(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length &&
      keys.every((key) => Object.hasOwn(b, key) && equivalent(a[key], b[key], options))
    );
  }
  return a === b;
};

/**
 * Pair each element of `left` with the first unused equivalent element of `right`
 */
const matchItems = (
  left: JsonValue[],
  right: JsonValue[],
  options: Required<DiffOptions>
): { unmatchedLeft: number[]; unmatchedRight: number[] } => {
  const used = new Array<boolean>(right.length).fill(false);
  const unmatchedLeft: number[] = [];
  left.forEach((item, leftIndex) => {
    const match = right.findIndex(
      (candidate, rightIndex) => !used[rightIndex] && equivalent(item, candidate, options)
    );
    if (match === -1) {
      unmatchedLeft.push(leftIndex);
    } else {
      used[match] = true;
    }
  });
  const unmatchedRight = used.flatMap((isUsed, index) => (isUsed ? [] : [index]));
  return { unmatchedLeft, unmatchedRight };
};

class ReportBuilder {
  readonly report: DiffReport = {};

  valueChanged(path: string, oldValue: JsonValue, newValue: JsonValue): void {
    const change: ValueChange =
      typeof oldValue === 'string' && typeof newValue === 'string'
        ? { old_value: oldValue, new_value: newValue, similarity: similarity(oldValue, newValue) }
        : { old_value: oldValue, new_value: newValue };
    this.report.values_changed = { ...this.report.values_changed, [path]: change };
  }

  typeChanged(path: string, oldValue: JsonValue, newValue: JsonValue): void {
    this.report.type_changes = {
      ...this.report.type_changes,
      [path]: {
        old_type: typeName(oldValue),
        new_type: typeName(newValue),
        old_value: oldValue,
        new_value: newValue,
      },
    };
  }

  keyAdded(path: string): void {
    this.report.dictionary_item_added = [...(this.report.dictionary_item_added ?? []), path];
  }

  keyRemoved(path: string): void {
    this.report.dictionary_item_removed = [...(this.report.dictionary_item_removed ?? []), path];
  }

  itemAdded(path: string, value: JsonValue): void {
    this.report.iterable_item_added = { ...this.report.iterable_item_added, [path]: value };
  }

  itemRemoved(path: string, value: JsonValue): void {
    this.report.iterable_item_removed = { ...this.report.iterable_item_removed, [path]: value };
  }
}

const compare = (
  expected: JsonValue,
  actual: JsonValue,
  path: string,
  options: Required<DiffOptions>,
  builder: ReportBuilder
): void => {
  if (isNumber(expected) && isNumber(actual)) {
    if (expected !== actual) {
      builder.valueChanged(path, expected, actual);
    }
    return;
  }

  if (Array.isArray(expected) && Array.isArray(actual)) {
    if (options.ignoreOrder) {
      const { unmatchedLeft, unmatchedRight } = matchItems(expected, actual, options);
      unmatchedLeft.forEach((index) => builder.itemRemoved(indexPath(path, index), expected[index]));
      unmatchedRight.forEach((index) => builder.itemAdded(indexPath(path, index), actual[index]));
      return;
    }
    const shared = Math.min(expected.length, actual.length);
    for (let index = 0; index < shared; index++) {
      compare(expected[index], actual[index], indexPath(path, index), options, builder);
    }
    for (let index = shared; index < expected.length; index++) {
      builder.itemRemoved(indexPath(path, index), expected[index]);
    }
    for (let index = shared; index < actual.length; index++) {
      builder.itemAdded(indexPath(path, index), actual[index]);
    }
    return;
  }

  if (isJsonObject(expected) && isJsonObject(actual)) {
    for (const key of Object.keys(expected)) {
      if (Object.hasOwn(actual, key)) {
        compare(expected[key], actual[key], keyPath(path, key), options, builder);
      } else {
        builder.keyRemoved(keyPath(path, key));
      }
    }
    for (const key of Object.keys(actual)) {
      if (!Object.hasOwn(expected, key)) {
        builder.keyAdded(keyPath(path, key));
      }
    }
    return;
  }

  if (typeName(expected) !== typeName(actual)) {
    builder.typeChanged(path, expected, actual);
    return;
  }

  const same =
    typeof expected === 'string' && typeof actual === 'string'
      ? stringsMatch(expected, actual, options)
      : expected === actual;
  if (!same) {
    builder.valueChanged(path, expected, actual);
  }
};

/**
 * Differences turning `expected` into `actual`. An empty report means the two are equivalent.
 */
export const diffJson = (
  expected: JsonValue,
  actual: JsonValue,
  options: DiffOptions = {}
): DiffReport => {
  const builder = new ReportBuilder();
  compare(expected, actual, 'root', withDefaults(options), builder);
  return builder.report;
};

export const isEmptyDiff = (report: DiffReport): boolean => Object.keys(report).length === 0;

/**
 * Number of individual differences in a report
 */
export const countDifferences = (report: DiffReport): number =>
  Object.keys(report.values_changed ?? {}).length +
  Object.keys(report.type_changes ?? {}).length +
  (report.dictionary_item_added ?? []).length +
  (report.dictionary_item_removed ?? []).length +
  Object.keys(report.iterable_item_added ?? {}).length +
  Object.keys(report.iterable_item_removed ?? {}).length;
