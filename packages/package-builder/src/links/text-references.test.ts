import type { Book, Chapter, Section } from '@bookpack/model';

import { describe, expect, test } from 'vitest';

import { ReferenceCatalog, findTextReferences } from './text-references';

function section(id: string, title: string): Section {
  return {
    id,
    title,
    level: 2,
    pathKey: ['guide', id],
    range: { start: { pageNo: 1, index: 0 }, end: null },
    blocks: [],
  };
}

function chapter(
  id: string,
  title: string,
  sections: Section[],
  implicit = false,
): Chapter {
  return {
    id,
    title,
    pathKey: ['guide', id],
    range: { start: { pageNo: 1, index: 0 }, end: null },
    implicit,
    sections,
  };
}

function bookOf(chapters: Chapter[]): Book {
  return {
    packageId: 'guide',
    title: 'Field Guide',
    sourcePath: '/books/field-guide.pdf',
    chapters,
  };
}

describe('findTextReferences', () => {
  test('finds chapter, section and quoted title references in order', () => {
    expect(
      findTextReferences(
        'Read chapter 4, then Section 2.1. Also see "Safety First".',
      ),
    ).toEqual([
      { kind: 'chapter', label: 'chapter 4', number: 4 },
      { kind: 'section', label: 'Section 2.1', number: '2.1' },
      { kind: 'title', label: 'Safety First', title: 'Safety First' },
    ]);
  });

  test('returns nothing for plain prose', () => {
    expect(findTextReferences('The chapter ends here.')).toEqual([]);
  });
});

describe('ReferenceCatalog', () => {
  test('numbers chapters by position, skipping the implicit front matter', () => {
    const catalog = new ReferenceCatalog(
      bookOf([
        chapter(
          'front',
          'Front Matter',
          [section('front-1', 'Front Matter')],
          true,
        ),
        chapter('basics', 'Basics', [section('basics-1', 'Basics')]),
      ]),
    );

    expect(
      catalog.find({ kind: 'chapter', label: 'Chapter 1', number: 1 }),
    ).toEqual({
      status: 'resolved',
      chapterId: 'basics',
    });
    expect(
      catalog.find({ kind: 'chapter', label: 'Chapter 9', number: 9 }),
    ).toEqual({
      status: 'unresolved',
      reason: 'no-target',
    });
  });

  test('prefers numbers written in titles over position', () => {
    const catalog = new ReferenceCatalog(
      bookOf([
        chapter('one', '1 Basics', [section('one-1', '1.1 Setup')]),
        chapter('two', '2 Tools', [section('two-1', '2.1 Hand Tools')]),
        chapter('appendix', 'Appendix', [section('appendix-1', 'Tables')]),
      ]),
    );

    expect(
      catalog.find({ kind: 'chapter', label: 'Chapter 3', number: 3 }),
    ).toEqual({
      status: 'unresolved',
      reason: 'no-target',
    });
    expect(
      catalog.find({ kind: 'section', label: 'Section 2.1', number: '2.1' }),
    ).toEqual({
      status: 'resolved',
      chapterId: 'two',
      sectionId: 'two-1',
    });
  });

  test('numbers sections within chapters when titles carry no numbers', () => {
    const catalog = new ReferenceCatalog(
      bookOf([
        chapter('a', 'Basics', [
          section('a-0', 'Basics'),
          section('a-1', 'Setup'),
        ]),
        chapter('b', 'Tools', [
          section('b-1', 'Hand Tools'),
          section('b-2', 'Power Tools'),
        ]),
      ]),
    );

    expect(
      catalog.find({ kind: 'section', label: 'Section 1.1', number: '1.1' }),
    ).toEqual({
      status: 'resolved',
      chapterId: 'a',
      sectionId: 'a-1',
    });
    expect(
      catalog.find({ kind: 'section', label: 'Section 2.2', number: '2.2' }),
    ).toEqual({
      status: 'resolved',
      chapterId: 'b',
      sectionId: 'b-2',
    });
  });

  test('resolves titles to chapters before sections and refuses to guess', () => {
    const catalog = new ReferenceCatalog(
      bookOf([
        chapter('a', 'Tools', [section('a-1', 'Setup')]),
        chapter('b', 'Care', [
          section('b-1', 'Tools'),
          section('b-2', 'Setup'),
        ]),
      ]),
    );

    expect(
      catalog.find({ kind: 'title', label: 'tools', title: 'tools' }),
    ).toEqual({
      status: 'resolved',
      chapterId: 'a',
    });
    expect(
      catalog.find({ kind: 'title', label: 'Setup', title: 'Setup' }),
    ).toEqual({
      status: 'unresolved',
      reason: 'ambiguous',
    });
  });
});
