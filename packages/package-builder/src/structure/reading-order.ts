import type { ParsedBlock, ParsedPage } from '@bookpack/model';

import { sortBy } from 'es-toolkit';

import { COLUMN_DETECTION } from '../config/constants';

function centerX(block: ParsedBlock): number {
  return (block.boundingBox.l + block.boundingBox.r) / 2;
}

/**
 * Find the x coordinate splitting a two-column page, or null for a single
 * column.
 *
 * Looks at the x-centers of text blocks and takes the widest gap between
 * neighbours. The page counts as two columns only when that gap is wide
 * relative to the spread of centers and both sides hold enough blocks.
 */
export function detectColumnSplit(blocks: readonly ParsedBlock[]): number | null {
  const centers = blocks
    .filter((block) => block.kind === 'text')
    .map(centerX)
    .sort((a, b) => a - b);

  if (centers.length < COLUMN_DETECTION.MIN_BLOCKS) {
    return null;
  }

  const spread = centers[centers.length - 1] - centers[0];
  if (spread <= 0) {
    return null;
  }

  let gapIndex = 0;
  let gap = 0;
  for (let i = 0; i < centers.length - 1; i++) {
    const current = centers[i + 1] - centers[i];
    if (current > gap) {
      gap = current;
      gapIndex = i;
    }
  }

  const leftCount = gapIndex + 1;
  const balance =
    Math.min(leftCount, centers.length - leftCount) / centers.length;
  if (
    gap / spread < COLUMN_DETECTION.MIN_GAP_SCORE ||
    balance < COLUMN_DETECTION.MIN_BALANCE
  ) {
    return null;
  }

  return (centers[gapIndex] + centers[gapIndex + 1]) / 2;
}

/**
 * Column index of every block on the page.
 *
 * A parser-supplied `columnCount` splits the page width evenly; otherwise the
 * two-column heuristic decides.
 */
function assignColumns(page: ParsedPage): number[] {
  if (page.columnCount !== undefined && page.columnCount > 1) {
    const columnWidth = page.width / page.columnCount;
    const last = page.columnCount - 1;
    return page.blocks.map((block) =>
      Math.min(last, Math.max(0, Math.floor(centerX(block) / columnWidth))),
    );
  }

  const split = detectColumnSplit(page.blocks);
  return page.blocks.map((block) =>
    split !== null && centerX(block) > split ? 1 : 0,
  );
}

/**
 * Flatten a page into column-major reading order: columns left to right,
 * top to bottom within a column.
 */
export function flattenPage(page: ParsedPage): ParsedBlock[] {
  const columns = assignColumns(page);
  const placed = page.blocks.map((block, i) => ({ block, column: columns[i] }));

  return sortBy(placed, [
    (item) => item.column,
    (item) => item.block.boundingBox.t,
    (item) => item.block.boundingBox.l,
  ]).map((item) => item.block);
}
