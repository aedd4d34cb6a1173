import type { LoggerMethods } from '@bookpack/logger';
import type {
  Book,
  Chapter,
  FlowPosition,
  ParsedDocument,
  Section,
} from '@bookpack/model';

import type { IdentityAllocator } from '../utils/id-allocator';
import type { FlowPage } from './flow';
import type { FontStatistics } from './heading-classifier';

import { sortBy } from 'es-toolkit';

import { HEADING_HEURISTIC, STRUCTURE } from '../config/constants';
import { StructureError } from '../errors/conversion-errors';
import { chapterSegment, sectionSegment } from '../utils/id-allocator';
import { SlugRegistry } from '../utils/slug';
import { blockText, comparePositions, normalizeTitle } from './flow';
import { classifyHeading, computeFontStatistics } from './heading-classifier';
import { flattenPage } from './reading-order';
import { SectionIndex } from './section-index';

export type StructureMode = 'outline' | 'heuristic';

/**
 * Output of structure resolution. Sections carry no blocks yet; content
 * extraction fills them using the same reading flow and section index.
 */
export interface ResolvedStructure {
  book: Book;
  mode: StructureMode;
  flow: FlowPage[];
  sectionIndex: SectionIndex;
  fontStatistics: FontStatistics;
}

interface Boundary {
  kind: 'chapter' | 'section';
  title: string;
  level: number;
  position: FlowPosition;
  // True when the position is the heading block itself
  atHeading: boolean;
}

interface SectionDraft {
  title: string;
  level: number;
  start: FlowPosition;
}

interface ChapterDraft {
  title: string;
  start: FlowPosition;
  implicit: boolean;
  atHeading: boolean;
  sections: SectionDraft[];
}

/**
 * StructureResolver
 *
 * Builds the Book → Chapter → Section tree for a parsed document.
 *
 * ## Boundary sources
 *
 * - Outline (authoritative when present): level-1 entries start chapters,
 *   deeper entries start sections. Each boundary is moved onto the heading
 *   block whose text matches the entry title, or the top of its page.
 * - Heading heuristic (fallback, reported as a warning): text blocks are
 *   classified by font size and weight against document-wide statistics;
 *   level-1 headings start chapters, lower levels start sections.
 *
 * ## Tree rules
 *
 * - Pages are flattened to column-major reading order before detection.
 * - Content before the first boundary forms an implicit leading chapter and
 *   section ("Front Matter").
 * - A section boundary before any chapter opens an implicit chapter titled
 *   after it.
 * - Content between a chapter heading and its first section becomes an intro
 *   section titled after the chapter; a chapter with no sections gets one.
 */
export class StructureResolver {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly allocator: IdentityAllocator,
  ) {}

  /**
   * @throws {StructureError} when the document has no pages
   */
  resolve(document: ParsedDocument, packageId: string): ResolvedStructure {
    if (document.pages.length === 0) {
      throw new StructureError(
        `Document has no pages to convert: ${document.sourcePath}`,
      );
    }

    const flow: FlowPage[] = sortBy(document.pages, ['pageNo']).map(
      (page) => ({ pageNo: page.pageNo, page, blocks: flattenPage(page) }),
    );
    const fontStatistics = computeFontStatistics(
      flow.flatMap(({ blocks }) =>
        blocks.flatMap((block) => (block.kind === 'text' ? block.runs : [])),
      ),
    );

    const mode: StructureMode =
      document.outline.length > 0 ? 'outline' : 'heuristic';
    const boundaries =
      mode === 'outline'
        ? this.outlineBoundaries(document, flow)
        : this.headingBoundaries(flow, fontStatistics);

    if (mode === 'heuristic') {
      this.logger.warn(
        `[StructureResolver] No outline in ${document.sourcePath}; using heading heuristic (${boundaries.length} headings)`,
      );
    }

    const drafts = this.buildDrafts(flow, boundaries, document.title);
    const book = this.assignIdentity(drafts, document, packageId);
    const sectionIndex = new SectionIndex(book, flow);

    this.logger.info(
      `[StructureResolver] Resolved ${book.chapters.length} chapters and ${sectionIndex.size} sections (${mode})`,
    );

    return { book, mode, flow, sectionIndex, fontStatistics };
  }

  private outlineBoundaries(
    document: ParsedDocument,
    flow: FlowPage[],
  ): Boundary[] {
    const pages = new Map(flow.map((page) => [page.pageNo, page]));
    const boundaries: Boundary[] = [];

    for (const entry of document.outline) {
      const page = pages.get(entry.pageNo);
      if (!page) {
        this.logger.debug(
          `[StructureResolver] Skipping outline entry "${entry.title}" on unselected page ${entry.pageNo}`,
        );
        continue;
      }

      const headingIndex = findHeadingIndex(page, entry.title);
      boundaries.push({
        kind: entry.level <= 1 ? 'chapter' : 'section',
        title: entry.title.trim(),
        level: entry.level,
        position: { pageNo: entry.pageNo, index: headingIndex ?? 0 },
        atHeading: headingIndex !== null,
      });
    }

    return sortBy(boundaries, [
      (boundary) => boundary.position.pageNo,
      (boundary) => boundary.position.index,
    ]);
  }

  private headingBoundaries(
    flow: FlowPage[],
    statistics: FontStatistics,
  ): Boundary[] {
    const boundaries: Boundary[] = [];

    for (const page of flow) {
      page.blocks.forEach((block, index) => {
        if (block.kind !== 'text') {
          return;
        }
        const level = classifyHeading(block, statistics);
        if (level === null) {
          return;
        }
        boundaries.push({
          kind: level === 1 ? 'chapter' : 'section',
          title: blockText(block),
          level,
          position: { pageNo: page.pageNo, index },
          atHeading: true,
        });
      });
    }

    return boundaries;
  }

  private buildDrafts(
    flow: FlowPage[],
    boundaries: Boundary[],
    documentTitle: string,
  ): ChapterDraft[] {
    const flowStart: FlowPosition = { pageNo: flow[0].pageNo, index: 0 };
    const chapters: ChapterDraft[] = [];

    const leadingEnd = boundaries.length > 0 ? boundaries[0].position : null;
    if (
      boundaries.length === 0 ||
      countBlocks(flow, flowStart, leadingEnd) > 0
    ) {
      const title =
        boundaries.length === 0 && documentTitle.trim()
          ? documentTitle.trim()
          : STRUCTURE.FRONT_MATTER_TITLE;
      chapters.push({
        title,
        start: flowStart,
        implicit: true,
        atHeading: false,
        sections: [{ title, level: 2, start: flowStart }],
      });
    }

    let current: ChapterDraft | undefined;
    for (const boundary of boundaries) {
      if (boundary.kind === 'chapter') {
        current = {
          title: boundary.title,
          start: boundary.position,
          implicit: false,
          atHeading: boundary.atHeading,
          sections: [],
        };
        chapters.push(current);
        continue;
      }

      if (!current) {
        current = {
          title: boundary.title,
          start: boundary.position,
          implicit: true,
          atHeading: false,
          sections: [],
        };
        chapters.push(current);
      }
      current.sections.push({
        title: boundary.title,
        level: Math.max(2, boundary.level),
        start: boundary.position,
      });
    }

    for (const chapter of chapters) {
      this.completeSections(flow, chapter);
    }
    return chapters;
  }

  private completeSections(flow: FlowPage[], chapter: ChapterDraft): void {
    const [first] = chapter.sections;
    if (!first) {
      chapter.sections.push({
        title: chapter.title,
        level: 2,
        start: chapter.start,
      });
      return;
    }

    if (comparePositions(first.start, chapter.start) <= 0) {
      return;
    }

    const introBlocks =
      countBlocks(flow, chapter.start, first.start) -
      (chapter.atHeading ? 1 : 0);
    if (introBlocks > 0) {
      chapter.sections.unshift({
        title: chapter.title,
        level: 2,
        start: chapter.start,
      });
    } else {
      first.start = chapter.start;
    }
  }

  private assignIdentity(
    drafts: ChapterDraft[],
    document: ParsedDocument,
    packageId: string,
  ): Book {
    const starts = drafts.flatMap((chapter) =>
      chapter.sections.map((section) => section.start),
    );
    let sectionCursor = 0;
    const chapterSlugs = new SlugRegistry();

    const chapters = drafts.map((draft, chapterIndex): Chapter => {
      const pathKey = [
        packageId,
        chapterSegment(chapterIndex + 1, chapterSlugs.claim(draft.title)),
      ];
      const sectionSlugs = new SlugRegistry();

      const sections = draft.sections.map((sectionDraft, sectionIndex) => {
        sectionCursor++;
        const sectionPathKey = [
          ...pathKey,
          sectionSegment(sectionIndex + 1, sectionSlugs.claim(sectionDraft.title)),
        ];
        const section: Section = {
          id: this.allocator.allocate(sectionPathKey),
          title: sectionDraft.title,
          level: sectionDraft.level,
          pathKey: sectionPathKey,
          range: {
            start: sectionDraft.start,
            end: starts[sectionCursor] ?? null,
          },
          blocks: [],
        };
        return section;
      });

      return {
        id: this.allocator.allocate(pathKey),
        title: draft.title,
        pathKey,
        range: {
          start: draft.start,
          end: drafts[chapterIndex + 1]?.start ?? null,
        },
        implicit: draft.implicit,
        sections,
      };
    });

    return {
      packageId,
      title: document.title,
      sourcePath: document.sourcePath,
      chapters,
    };
  }
}

/**
 * Index of the heading block on a page matching an outline title: an exact
 * normalized match first, else the first short block containing the title
 */
function findHeadingIndex(page: FlowPage, title: string): number | null {
  const wanted = normalizeTitle(title);
  if (!wanted) {
    return null;
  }

  let containing: number | null = null;
  for (const [index, block] of page.blocks.entries()) {
    if (block.kind !== 'text') {
      continue;
    }
    const text = blockText(block);
    const normalized = normalizeTitle(text);
    if (normalized === wanted) {
      return index;
    }
    if (
      containing === null &&
      text.length <= HEADING_HEURISTIC.MAX_HEADING_CHARS &&
      normalized.includes(wanted)
    ) {
      containing = index;
    }
  }
  return containing;
}

/**
 * Number of blocks in the half-open flow range [start, end)
 */
function countBlocks(
  flow: FlowPage[],
  start: FlowPosition,
  end: FlowPosition | null,
): number {
  let count = 0;
  for (const page of flow) {
    for (let index = 0; index < page.blocks.length; index++) {
      const position = { pageNo: page.pageNo, index };
      if (
        comparePositions(position, start) >= 0 &&
        (end === null || comparePositions(position, end) < 0)
      ) {
        count++;
      }
    }
  }
  return count;
}
