/**
 * HTML Normaliser
 * Canonical form of HTML fragments so markup-only differences compare equal
 */

import * as cheerio from 'cheerio';
import { isText } from 'domhandler';

const TAG_PATTERN = /<\/?[a-z][a-z0-9]*(\s[^<>]*)?\/?>/i;

/**
 * True when the string contains at least one HTML tag
 */
export const looksLikeHtml = (value: string): boolean => TAG_PATTERN.test(value);

/**
 * Parse a fragment and serialise it again with whitespace-only text
 * between top-level nodes removed. Entities are decoded by the parser,
 * so `&quot;` and `"` in text produce the same output.
 *
 * @example
 * ```ts
 * normalizeHtml('<p>a</p>\n\n<p>b</p>'); // '<p>a</p><p>b</p>'
 * ```
 */
export const normalizeHtml = (html: string): string => {
  const $ = cheerio.load(html, null, false);
  $.root()
    .contents()
    .filter((_, node) => isText(node) && node.data.trim() === '')
    .remove();
  return $.html();
};

/**
 * Compare two strings, treating them as HTML when either contains markup
 */
export const htmlEquivalent = (left: string, right: string): boolean => {
  if (left === right) {
    return true;
  }
  if (!looksLikeHtml(left) && !looksLikeHtml(right)) {
    return false;
  }
  return normalizeHtml(left) === normalizeHtml(right);
};
