import type {
  FlowPosition,
  ParsedBlock,
  ParsedPage,
  ParsedTextBlock,
} from '@bookpack/model';

/**
 * A page with its blocks flattened into reading order
 */
export interface FlowPage {
  pageNo: number;
  page: ParsedPage;
  blocks: ParsedBlock[];
}

export function comparePositions(a: FlowPosition, b: FlowPosition): number {
  return a.pageNo - b.pageNo || a.index - b.index;
}

/**
 * Text of a block with runs joined and whitespace collapsed
 */
export function blockText(block: ParsedTextBlock): string {
  return block.runs
    .map((run) => run.text)
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Comparison form of a title: lowercase alphanumerics separated by single spaces
 */
export function normalizeTitle(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}
