import type { Book, FlowPosition } from '@bookpack/model';

import type { FlowPage } from './flow';

import { comparePositions } from './flow';

/**
 * Where a flow position lands in the book
 */
export interface SectionRef {
  chapterId: string;
  sectionId: string;
  sectionPathKey: string[];
  start: FlowPosition;
}

// Destinations usually point a little above the heading they target
const TARGET_TOP_TOLERANCE = 2;

/**
 * SectionIndex
 *
 * Maps reading-flow positions and link destinations (page + vertical offset)
 * to the section that owns them. Built once from the resolved structure and
 * shared by content extraction and link resolution.
 */
export class SectionIndex {
  private readonly entries: SectionRef[];
  private readonly pages: Map<number, FlowPage>;

  constructor(book: Book, flow: readonly FlowPage[]) {
    this.entries = book.chapters.flatMap((chapter) =>
      chapter.sections.map((section) => ({
        chapterId: chapter.id,
        sectionId: section.id,
        sectionPathKey: section.pathKey,
        start: section.range.start,
      })),
    );
    this.pages = new Map(flow.map((page) => [page.pageNo, page]));
  }

  get size(): number {
    return this.entries.length;
  }

  hasPage(pageNo: number): boolean {
    return this.pages.has(pageNo);
  }

  /**
   * Section whose range contains the position: the last one starting at or
   * before it. Positions ahead of the first section (empty leading pages)
   * belong to the first section.
   */
  lookup(position: FlowPosition): SectionRef | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (comparePositions(this.entries[i].start, position) <= 0) {
        return this.entries[i];
      }
    }
    return this.entries[0];
  }

  /**
   * Section owning a link destination.
   *
   * Without a vertical offset the destination is the top of the page;
   * with one it is the last block starting at or above that offset.
   */
  resolveTarget(pageNo: number, targetTop?: number): SectionRef | undefined {
    const page = this.pages.get(pageNo);
    if (!page) {
      return undefined;
    }

    let index = 0;
    if (targetTop !== undefined) {
      page.blocks.forEach((block, i) => {
        if (block.boundingBox.t <= targetTop + TARGET_TOP_TOLERANCE) {
          index = i;
        }
      });
    }
    return this.lookup({ pageNo, index });
  }
}
