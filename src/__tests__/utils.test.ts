import { describe, it, expect } from '@jest/globals';
import { charWidth, contentKey, displayWidth, md5, normalizeLink, pageUrl, seenKey } from '../utils.js';

describe('charWidth', () => {
  it('counts wide and fullwidth characters as two columns', () => {
    expect(charWidth('a')).toBe(1);
    expect(charWidth('あ')).toBe(2);
    expect(charWidth('漢')).toBe(2);
    expect(charWidth('Ａ')).toBe(2);
    expect(charWidth('한')).toBe(2);
    expect(charWidth('😀')).toBe(2);
  });

  it('counts halfwidth katakana as one column', () => {
    expect(charWidth('ｱ')).toBe(1);
  });
});

describe('displayWidth', () => {
  it('sums the widths of every code point', () => {
    expect(displayWidth('abcあい')).toBe(7);
    expect(displayWidth('')).toBe(0);
  });
});

describe('keys', () => {
  it('strips whitespace and trailing slashes', () => {
    expect(normalizeLink(' https://example.com/a// ')).toBe('https://example.com/a');
    expect(seenKey(' Page/ ')).toBe('page/Page');
    expect(contentKey('Page')).toBe('content_Page');
  });

  it('hashes bodies with md5', () => {
    expect(md5('')).toBe('d41d8cd98f00b204e9800998ecf8427e');
  });
});

describe('pageUrl', () => {
  it('joins the wiki base URL and the page name', () => {
    expect(pageUrl('https://wiki.example/w/', 'PageA')).toBe('https://wiki.example/w/?PageA');
    expect(pageUrl('https://wiki.example/w', 'PageA')).toBe('https://wiki.example/w/?PageA');
  });

  it('falls back to the page name without a base URL', () => {
    expect(pageUrl('', 'PageA')).toBe('PageA');
  });
});
