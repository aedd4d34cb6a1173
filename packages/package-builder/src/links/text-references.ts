import type { Book, Chapter, Section } from '@bookpack/model';

import { normalizeTitle } from '../structure/flow';

/**
 * Cross-reference phrase found in running text
 */
export type TextReference =
  | { kind: 'chapter'; label: string; number: number }
  | { kind: 'section'; label: string; number: string }
  | { kind: 'title'; label: string; title: string };

export type ReferenceTarget =
  | { status: 'resolved'; chapterId: string; sectionId?: string }
  | { status: 'unresolved'; reason: 'no-target' | 'ambiguous' };

const CHAPTER_PATTERN = /\b(?:chapter|ch\.)\s+(\d+)\b/gi;
const SECTION_PATTERN = /\bsection\s+(\d+(?:\.\d+)*)\b/gi;
const TITLE_PATTERN = /\bsee\s+["“]([^"”]{2,120})["”]/gi;
const LEADING_NUMBER = /^(?:chapter\s+|section\s+)?(\d+(?:\.\d+)*)\b/i;

/**
 * Find chapter, section and quoted-title references in a text, in order of
 * appearance
 */
export function findTextReferences(text: string): TextReference[] {
  const found: { at: number; reference: TextReference }[] = [];

  for (const match of text.matchAll(CHAPTER_PATTERN)) {
    found.push({
      at: match.index ?? 0,
      reference: { kind: 'chapter', label: match[0], number: Number(match[1]) },
    });
  }
  for (const match of text.matchAll(SECTION_PATTERN)) {
    found.push({
      at: match.index ?? 0,
      reference: { kind: 'section', label: match[0], number: match[1] },
    });
  }
  for (const match of text.matchAll(TITLE_PATTERN)) {
    found.push({
      at: match.index ?? 0,
      reference: { kind: 'title', label: match[1], title: match[1] },
    });
  }

  return found.sort((a, b) => a.at - b.at).map((entry) => entry.reference);
}

function leadingNumber(title: string): string | null {
  return LEADING_NUMBER.exec(title.trim())?.[1] ?? null;
}

function pick<T>(
  candidates: T[],
  toTarget: (candidate: T) => ReferenceTarget,
): ReferenceTarget {
  if (candidates.length === 1) {
    return toTarget(candidates[0]);
  }
  return {
    status: 'unresolved',
    reason: candidates.length === 0 ? 'no-target' : 'ambiguous',
  };
}

/**
 * Matches text references against the chapter and section titles of a book.
 *
 * A reference resolves only when exactly one target fits. Once any title
 * carries a number ("3 Tools", "2.1 Setup") those numbers are used instead
 * of positions, and chapter titles win over sections that share them.
 */
export class ReferenceCatalog {
  private readonly chapters: Chapter[];
  private readonly sections: {
    chapter: Chapter;
    section: Section;
    number: string;
  }[];

  constructor(book: Book) {
    this.chapters = book.chapters.filter((chapter) => !chapter.implicit);
    this.sections = this.chapters.flatMap((chapter, chapterIndex) =>
      chapter.sections
        .filter((section) => section.title !== chapter.title)
        .map((section, sectionIndex) => ({
          chapter,
          section,
          number: `${chapterIndex + 1}.${sectionIndex + 1}`,
        })),
    );
  }

  find(reference: TextReference): ReferenceTarget {
    switch (reference.kind) {
      case 'chapter':
        return this.findChapter(reference.number);
      case 'section':
        return this.findSection(reference.number);
      case 'title':
        return this.findTitle(reference.title);
    }
  }

  private findChapter(number: number): ReferenceTarget {
    const numbered = this.chapters.some(
      (chapter) => leadingNumber(chapter.title) !== null,
    );
    const candidates = numbered
      ? this.chapters.filter(
          (chapter) => leadingNumber(chapter.title) === String(number),
        )
      : this.chapters.filter((_, index) => index + 1 === number);
    return pick(candidates, (chapter) => ({
      status: 'resolved',
      chapterId: chapter.id,
    }));
  }

  private findSection(number: string): ReferenceTarget {
    const numbered = this.sections.some(
      (entry) => leadingNumber(entry.section.title) !== null,
    );
    const candidates = numbered
      ? this.sections.filter(
          (entry) => leadingNumber(entry.section.title) === number,
        )
      : this.sections.filter((entry) => entry.number === number);
    return pick(candidates, (entry) => ({
      status: 'resolved',
      chapterId: entry.chapter.id,
      sectionId: entry.section.id,
    }));
  }

  private findTitle(title: string): ReferenceTarget {
    const wanted = normalizeTitle(title);
    if (!wanted) {
      return { status: 'unresolved', reason: 'no-target' };
    }

    const chapters = this.chapters.filter(
      (chapter) => normalizeTitle(chapter.title) === wanted,
    );
    if (chapters.length > 0) {
      return pick(chapters, (chapter) => ({
        status: 'resolved',
        chapterId: chapter.id,
      }));
    }

    return pick(
      this.sections.filter(
        (entry) => normalizeTitle(entry.section.title) === wanted,
      ),
      (entry) => ({
        status: 'resolved',
        chapterId: entry.chapter.id,
        sectionId: entry.section.id,
      }),
    );
  }
}
