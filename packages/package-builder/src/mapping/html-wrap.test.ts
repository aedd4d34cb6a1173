import { describe, expect, test } from 'vitest';

import { moduleAssetPath, wrapUnitHtml } from './html-wrap';

describe('wrapUnitHtml', () => {
  test('wraps content in one root element', () => {
    expect(wrapUnitHtml('<p>a</p>\n<p>b</p>')).toBe(
      '<div class="bookpack"><p>a</p>\n<p>b</p></div>',
    );
  });

  test('leaves wrapped content unchanged', () => {
    const once = wrapUnitHtml('<p>a</p>');

    expect(wrapUnitHtml(once)).toBe(once);
    expect(wrapUnitHtml("  <div id='u' class='intro bookpack'><p>a</p></div>")).toBe(
      "  <div id='u' class='intro bookpack'><p>a</p></div>",
    );
  });

  test('wraps content whose root is another element', () => {
    expect(wrapUnitHtml('<div class="bookpacks"></div>')).toBe(
      '<div class="bookpack"><div class="bookpacks"></div></div>',
    );
  });
});

describe('moduleAssetPath', () => {
  test.each([
    ['assets/x.png', 'modules/guide/assets/x.png'],
    ['modules/guide/assets/x.png', 'modules/guide/assets/x.png'],
    ['https://example.com/x.png', 'https://example.com/x.png'],
    ['data:image/png;base64,AAAA', 'data:image/png;base64,AAAA'],
  ])('maps "%s"', (path, expected) => {
    expect(moduleAssetPath(path, 'guide')).toBe(expected);
  });
});
