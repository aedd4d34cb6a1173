import type { LoggerMethods } from '@bookpack/logger';
import type {
  Book,
  ContentBlock,
  LinkReference,
  LinkResolutionWarning,
  ParsedLinkAnnotation,
  Section,
  TextBlock,
} from '@bookpack/model';

import type { SectionIndex } from '../structure/section-index';

import { ReferenceCatalog, findTextReferences } from './text-references';

export interface LinkResolutionStats {
  resolved: number;
  external: number;
  unresolved: number;
}

export interface LinkResolutionResult {
  book: Book;
  warnings: LinkResolutionWarning[];
  stats: LinkResolutionStats;
}

/**
 * LinkResolver
 *
 * Runs once every page task has joined and the section index is complete.
 *
 * - Annotation links map their destination page (and vertical offset) to the
 *   owning section through the section index. Destinations outside the
 *   selected pages stay unresolved.
 * - Text references ("Chapter 3", "Section 2.1", `see "Title"`) in paragraphs
 *   and list items resolve only when exactly one chapter or section fits.
 * - External links pass through.
 *
 * Unresolved references never fail the run; they are returned as warnings
 * and rendered as plain text.
 */
export class LinkResolver {
  constructor(private readonly logger: LoggerMethods) {}

  resolve(book: Book, sectionIndex: SectionIndex): LinkResolutionResult {
    const catalog = new ReferenceCatalog(book);
    const warnings: LinkResolutionWarning[] = [];
    const stats: LinkResolutionStats = {
      resolved: 0,
      external: 0,
      unresolved: 0,
    };

    const record = (
      reference: LinkReference,
      block: ContentBlock,
      section: Section,
    ): LinkReference => {
      if (reference.kind === 'resolved') {
        stats.resolved++;
        return reference;
      }
      if (reference.kind === 'external') {
        stats.external++;
        return reference;
      }

      stats.unresolved++;
      warnings.push({
        origin: reference.origin,
        pageNo: block.pageNo,
        sectionId: section.id,
        label: reference.label,
        reason: reference.reason,
      });
      const message = `[LinkResolver] Unresolved ${reference.origin} reference "${reference.label}" on page ${block.pageNo}: ${reference.reason}`;
      if (reference.origin === 'annotation') {
        this.logger.warn(message);
      } else {
        this.logger.debug(message);
      }
      return reference;
    };

    const chapters = book.chapters.map((chapter) => ({
      ...chapter,
      sections: chapter.sections.map((section) => ({
        ...section,
        blocks: section.blocks.map((block): ContentBlock => {
          if (block.kind === 'link') {
            const reference = this.fromAnnotation(
              block.annotation,
              block.id,
              sectionIndex,
              fallbackLabel(block.annotation),
            );
            return { ...block, link: record(reference, block, section) };
          }
          if (block.kind !== 'text') {
            return block;
          }

          const links = [
            ...block.annotations.map((annotation) =>
              this.fromAnnotation(
                annotation,
                block.id,
                sectionIndex,
                block.text,
              ),
            ),
            ...this.fromText(block, catalog),
          ].map((reference) => record(reference, block, section));
          return { ...block, links };
        }),
      })),
    }));

    this.logger.info(
      `[LinkResolver] Resolved ${stats.resolved} links (${stats.external} external, ${stats.unresolved} unresolved)`,
    );

    return { book: { ...book, chapters }, warnings, stats };
  }

  private fromAnnotation(
    annotation: ParsedLinkAnnotation,
    sourceBlockId: string,
    sectionIndex: SectionIndex,
    defaultLabel: string,
  ): LinkReference {
    const label = annotation.anchorText?.trim() || defaultLabel;

    if (annotation.uri) {
      return {
        kind: 'external',
        origin: 'annotation',
        sourceBlockId,
        uri: annotation.uri,
        label,
      };
    }
    if (annotation.targetPageNo === undefined) {
      return unresolved('annotation', sourceBlockId, label, 'no-target');
    }
    if (!sectionIndex.hasPage(annotation.targetPageNo)) {
      return unresolved(
        'annotation',
        sourceBlockId,
        label,
        'outside-document',
      );
    }

    const target = sectionIndex.resolveTarget(
      annotation.targetPageNo,
      annotation.targetTop,
    );
    if (!target) {
      return unresolved('annotation', sourceBlockId, label, 'no-target');
    }
    return {
      kind: 'resolved',
      origin: 'annotation',
      sourceBlockId,
      targetChapterId: target.chapterId,
      targetSectionId: target.sectionId,
      label,
    };
  }

  private fromText(
    block: TextBlock,
    catalog: ReferenceCatalog,
  ): LinkReference[] {
    if (block.role === 'heading') {
      return [];
    }

    return findTextReferences(block.text).map((reference): LinkReference => {
      const target = catalog.find(reference);
      if (target.status === 'unresolved') {
        return unresolved('text', block.id, reference.label, target.reason);
      }
      return {
        kind: 'resolved',
        origin: 'text',
        sourceBlockId: block.id,
        targetChapterId: target.chapterId,
        ...(target.sectionId ? { targetSectionId: target.sectionId } : {}),
        label: reference.label,
      };
    });
  }
}

function unresolved(
  origin: 'annotation' | 'text',
  sourceBlockId: string,
  label: string,
  reason: 'no-target' | 'ambiguous' | 'outside-document',
): LinkReference {
  return { kind: 'unresolved', origin, sourceBlockId, label, reason };
}

function fallbackLabel(annotation: ParsedLinkAnnotation): string {
  if (annotation.uri) {
    return annotation.uri;
  }
  return annotation.targetPageNo !== undefined
    ? `page ${annotation.targetPageNo}`
    : 'link';
}
