import type { ContainerEntry } from '@bookpack/model';

import type { IdentityAllocator } from '../utils/id-allocator';

import { wrapUnitHtml } from './html-wrap';
import { escapeHtml, linkMarkup } from './markup';

export interface TocOptions {
  packageId: string;
  bookTitle: string;
  tocTitle: string;
}

/**
 * Build the table-of-contents container: one unit listing every chapter and
 * section in document order as content links, each item tagged with its
 * depth.
 */
export function buildToc(
  entries: readonly ContainerEntry[],
  options: TocOptions,
  allocator: IdentityAllocator,
): ContainerEntry {
  const items = entries.flatMap((entry) => [
    tocItem(
      1,
      linkMarkup({
        kind: 'resolved',
        origin: 'annotation',
        sourceBlockId: '',
        targetChapterId: entry.id,
        label: entry.name,
      }),
      entry.name,
    ),
    ...entry.units.map((unit) =>
      tocItem(
        unit.level + 1,
        linkMarkup({
          kind: 'resolved',
          origin: 'annotation',
          sourceBlockId: '',
          targetChapterId: entry.id,
          targetSectionId: unit.id,
          label: unit.name,
        }),
        unit.name,
      ),
    ),
  ]);

  const pathKey = [options.packageId, 'toc'];
  const unitPathKey = [...pathKey, options.tocTitle];
  return {
    id: allocator.allocate(pathKey),
    name: options.tocTitle,
    kind: 'toc',
    pathKey,
    folder: [options.bookTitle, options.tocTitle],
    sort: 0,
    units: [
      {
        id: allocator.allocate(unitPathKey),
        name: options.tocTitle,
        level: 1,
        sort: 0,
        pathKey: unitPathKey,
        content: wrapUnitHtml(`<ul>\n${items.join('\n')}\n</ul>`),
      },
    ],
  };
}

function tocItem(level: number, markup: string | null, name: string): string {
  return `<li data-level="${level}">${markup ?? escapeHtml(name)}</li>`;
}
