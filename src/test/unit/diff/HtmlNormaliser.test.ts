/**
 * HtmlNormaliser Tests
 */

import { describe, expect, it } from 'vitest';
import { htmlEquivalent, looksLikeHtml, normalizeHtml } from '../../../lib/Diff/HtmlNormaliser.js';

describe('looksLikeHtml', () => {
  it('should detect markup', () => {
    expect(looksLikeHtml('<p>body</p>')).toBe(true);
    expect(looksLikeHtml('line<br/>break')).toBe(true);
    expect(looksLikeHtml('<a href="https://example.com">link</a>')).toBe(true);
  });

  it('should ignore plain text with angle brackets', () => {
    expect(looksLikeHtml('plain text')).toBe(false);
    expect(looksLikeHtml('1 < 2 and 3 > 2')).toBe(false);
  });
});

describe('normalizeHtml', () => {
  it('should drop whitespace between top-level elements', () => {
    expect(normalizeHtml('<p>a</p>\n\n<p>b</p>')).toBe('<p>a</p><p>b</p>');
  });

  it('should keep whitespace inside elements', () => {
    expect(normalizeHtml('<pre>x\n  y</pre>')).toBe('<pre>x\n  y</pre>');
  });

  it('should serialise entities the same way', () => {
    expect(normalizeHtml('<p>&quot;quoted&quot;</p>')).toBe(normalizeHtml('<p>"quoted"</p>'));
  });
});

describe('htmlEquivalent', () => {
  it('should accept identical strings', () => {
    expect(htmlEquivalent('same', 'same')).toBe(true);
  });

  it('should not normalise plain text', () => {
    expect(htmlEquivalent('a  b', 'a b')).toBe(false);
  });

  it('should ignore markup-only differences', () => {
    expect(htmlEquivalent('<p>a</p>\n\n<p>b</p>', '<p>a</p>\n<p>b</p>')).toBe(true);
  });

  it('should see changed text', () => {
    expect(htmlEquivalent('<p>a</p>', '<p>b</p>')).toBe(false);
  });
});
