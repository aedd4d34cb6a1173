import type { LoggerMethods } from '@bookpack/logger';
import type {
  Book,
  Chapter,
  ContainerEntry,
  ContentBlock,
  ContentUnit,
  LinkReference,
} from '@bookpack/model';

import type { IdentityAllocator } from '../utils/id-allocator';

import { PACKAGE_OUTPUT } from '../config/constants';
import { moduleAssetPath, wrapUnitHtml } from './html-wrap';
import { renderBlocks } from './markup';
import { buildToc } from './toc-builder';

export interface MappingOptions {
  generateToc: boolean;
  tocTitle: string;
}

export interface MappingResult {
  entries: ContainerEntry[];
  notices: string[];
}

/**
 * Hands out sibling names, suffixing repeats with " (2)", " (3)", ...
 */
class NameRegistry {
  private readonly counts = new Map<string, number>();

  claim(name: string): string {
    const count = (this.counts.get(name) ?? 0) + 1;
    this.counts.set(name, count);
    return count === 1 ? name : `${name} (${count})`;
  }
}

/**
 * ModuleMapper
 *
 * Turns the linked book into container entries: one per chapter, one content
 * unit per section, plus an optional table of contents in front. Unit content
 * sits in one scoped root element, and asset sources point into the installed
 * module (`modules/<packageId>/assets/...`).
 *
 * Every link target written into content must be an id of an emitted chapter
 * or section. Resolved links pointing anywhere else are rendered as plain
 * text and reported as notices.
 */
export class ModuleMapper {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly allocator: IdentityAllocator,
  ) {}

  map(book: Book, options: MappingOptions): MappingResult {
    const notices: string[] = [];
    const known = new Set(
      book.chapters.flatMap((chapter) => [
        chapter.id,
        ...chapter.sections.map((section) => section.id),
      ]),
    );
    const chapterNames = new NameRegistry();

    const entries = book.chapters.map((chapter, chapterIndex) =>
      this.mapChapter(
        book,
        chapter,
        chapterIndex,
        chapterNames,
        (blocks) => this.checkLinks(blocks, known, notices),
      ),
    );

    if (options.generateToc) {
      entries.unshift(
        buildToc(
          entries,
          {
            packageId: book.packageId,
            bookTitle: book.title,
            tocTitle: options.tocTitle,
          },
          this.allocator,
        ),
      );
    }

    this.logger.info(
      `[ModuleMapper] Mapped ${book.chapters.length} chapters into ${entries.length} entries`,
    );
    return { entries, notices };
  }

  private mapChapter(
    book: Book,
    chapter: Chapter,
    chapterIndex: number,
    chapterNames: NameRegistry,
    checkLinks: (blocks: ContentBlock[]) => ContentBlock[],
  ): ContainerEntry {
    const name = chapterNames.claim(
      chapter.title.trim() || `Untitled Chapter ${chapterIndex + 1}`,
    );
    const unitNames = new NameRegistry();

    const units = chapter.sections.map(
      (section, sectionIndex): ContentUnit => ({
        id: section.id,
        name: unitNames.claim(
          section.title.trim() || `Untitled Section ${sectionIndex + 1}`,
        ),
        level: Math.min(
          PACKAGE_OUTPUT.MAX_UNIT_LEVEL,
          Math.max(1, section.level - 1),
        ),
        sort: (sectionIndex + 1) * PACKAGE_OUTPUT.SORT_STEP,
        pathKey: section.pathKey,
        content: wrapUnitHtml(
          renderBlocks(checkLinks(section.blocks), {
            assetSrc: (path) => moduleAssetPath(path, book.packageId),
          }),
        ),
      }),
    );

    return {
      id: chapter.id,
      name,
      kind: 'chapter',
      pathKey: chapter.pathKey,
      folder: [book.title, name],
      sort: (chapterIndex + 1) * PACKAGE_OUTPUT.SORT_STEP,
      units,
    };
  }

  private checkLinks(
    blocks: ContentBlock[],
    known: ReadonlySet<string>,
    notices: string[],
  ): ContentBlock[] {
    const check = (link: LinkReference): LinkReference => {
      if (
        link.kind !== 'resolved' ||
        (known.has(link.targetChapterId) &&
          (link.targetSectionId === undefined ||
            known.has(link.targetSectionId)))
      ) {
        return link;
      }

      const notice = `Link "${link.label}" in block ${link.sourceBlockId} points at a target outside the package; kept as text`;
      this.logger.warn(`[ModuleMapper] ${notice}`);
      notices.push(notice);
      return {
        kind: 'unresolved',
        origin: link.origin,
        sourceBlockId: link.sourceBlockId,
        label: link.label,
        reason: 'no-target',
      };
    };

    return blocks.map((block): ContentBlock => {
      if (block.kind === 'text') {
        return { ...block, links: block.links.map(check) };
      }
      if (block.kind === 'link' && block.link) {
        return { ...block, link: check(block.link) };
      }
      return block;
    });
  }
}
