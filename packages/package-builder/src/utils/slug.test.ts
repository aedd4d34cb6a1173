import { describe, expect, test } from 'vitest';

import { SlugRegistry, slugify } from './slug';

describe('slugify', () => {
  test.each([
    ['Getting Started', 'getting-started'],
    ['  Chapter 1: The Café  ', 'chapter-1-the-cafe'],
    ['Ünïcödé & Co.', 'unicode-co'],
    ['---', 'untitled'],
    ['', 'untitled'],
    ['日本語', 'untitled'],
  ])('slugify(%j) = %j', (input, expected) => {
    expect(slugify(input)).toBe(expected);
  });
});

describe('SlugRegistry', () => {
  test('suffixes repeated slugs in claim order', () => {
    const registry = new SlugRegistry();

    expect(registry.claim('Notes')).toBe('notes');
    expect(registry.claim('Overview')).toBe('overview');
    expect(registry.claim('notes')).toBe('notes-2');
    expect(registry.claim('NOTES!')).toBe('notes-3');
  });
});
