import type { ParsedDocument } from '@bookpack/model';

import { pick, uniq } from 'es-toolkit';

import { PageSelectionError } from '../errors/page-selection-error';

const SINGLE_PAGE = /^\d+$/;
const PAGE_RANGE = /^(\d+)\s*-\s*(\d+)$/;

/**
 * Parse a page-range string such as `"1,3,5-7"` into sorted, distinct
 * 1-based page numbers. Every page and range end is checked against
 * `pageCount` before a range is expanded.
 *
 * @throws {PageSelectionError} on empty items, page 0, negative numbers,
 * reversed ranges or pages beyond `pageCount`
 */
export function parsePageSelection(
  selection: string,
  pageCount: number,
): number[] {
  const items = selection.split(',').map((item) => item.trim());
  const pages: number[] = [];

  for (const item of items) {
    if (SINGLE_PAGE.test(item)) {
      pages.push(assertPageNumber(Number(item), selection, pageCount));
      continue;
    }

    const range = PAGE_RANGE.exec(item);
    if (!range) {
      throw new PageSelectionError(
        `Invalid page selection "${selection}": "${item}" is not a page or range`,
      );
    }

    const start = assertPageNumber(Number(range[1]), selection, pageCount);
    const end = assertPageNumber(Number(range[2]), selection, pageCount);
    if (end < start) {
      throw new PageSelectionError(
        `Invalid page selection "${selection}": range ${start}-${end} is reversed`,
      );
    }
    for (let pageNo = start; pageNo <= end; pageNo++) {
      pages.push(pageNo);
    }
  }

  return uniq(pages).sort((a, b) => a - b);
}

function assertPageNumber(
  pageNo: number,
  selection: string,
  pageCount: number,
): number {
  if (pageNo < 1) {
    throw new PageSelectionError(
      `Invalid page selection "${selection}": pages start at 1`,
    );
  }
  if (pageNo > pageCount) {
    throw new PageSelectionError(
      `Selected page ${pageNo} exceeds the document's ${pageCount} pages`,
    );
  }
  return pageNo;
}

/**
 * Restrict a document to the selected pages.
 *
 * Page numbers are kept as-is so link targets and outline entries still
 * refer to source pages; outline entries and images that only belong to
 * unselected pages are dropped.
 *
 * @throws {PageSelectionError} when a selected page is beyond the document
 */
export function selectPages(
  document: ParsedDocument,
  pages: readonly number[],
): ParsedDocument {
  const beyond = pages.filter((pageNo) => pageNo > document.pageCount);
  if (beyond.length > 0) {
    throw new PageSelectionError(
      `Selected page ${beyond[0]} exceeds the document's ${document.pageCount} pages`,
    );
  }

  const selected = new Set(pages);
  const keptPages = document.pages.filter((page) => selected.has(page.pageNo));
  const imageRefs = keptPages.flatMap((page) =>
    page.blocks.flatMap((block) =>
      block.kind === 'image' ? [block.imageRef] : [],
    ),
  );

  return {
    ...document,
    pages: keptPages,
    outline: document.outline.filter((entry) => selected.has(entry.pageNo)),
    images: pick(document.images, imageRefs),
  };
}
