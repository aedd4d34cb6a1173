import type { ParsedTextBlock, TextRun } from '@bookpack/model';

import { HEADING_HEURISTIC } from '../config/constants';
import { blockText } from './flow';

/**
 * Document-wide font statistics driving the heading heuristic
 */
export interface FontStatistics {
  /**
   * Font size carrying the most characters
   */
  bodySize: number;

  /**
   * Distinct heading sizes, largest first
   */
  headingSizes: number[];
}

// Sizes are compared at 0.1pt resolution so rendering noise does not split levels
function roundSize(size: number): number {
  return Math.round(size * 10) / 10;
}

export function computeFontStatistics(
  runs: readonly TextRun[],
): FontStatistics {
  const charsBySize = new Map<number, number>();
  for (const run of runs) {
    const size = roundSize(run.fontSize);
    const chars = run.text.trim().length;
    if (chars > 0) {
      charsBySize.set(size, (charsBySize.get(size) ?? 0) + chars);
    }
  }

  let bodySize = 0;
  let bodyChars = -1;
  for (const [size, chars] of charsBySize) {
    if (chars > bodyChars || (chars === bodyChars && size < bodySize)) {
      bodySize = size;
      bodyChars = chars;
    }
  }

  const threshold = bodySize * HEADING_HEURISTIC.SIZE_RATIO;
  const headingSizes = [...charsBySize.keys()]
    .filter((size) => size >= threshold)
    .sort((a, b) => b - a);

  return { bodySize, headingSizes };
}

/**
 * Heading level (1..MAX_LEVELS) of a text block, or null for body text.
 *
 * The block is judged by its largest run. Heading sizes map to levels in
 * descending order, collapsing past the last level; bold text at body size or
 * above takes the level after the size levels.
 */
export function classifyHeading(
  block: ParsedTextBlock,
  statistics: FontStatistics,
): number | null {
  const text = blockText(block);
  if (
    block.role === 'list_item' ||
    text.length === 0 ||
    text.length > HEADING_HEURISTIC.MAX_HEADING_CHARS ||
    block.runs.length === 0
  ) {
    return null;
  }

  const lead = block.runs.reduce((largest, run) =>
    run.fontSize > largest.fontSize ? run : largest,
  );
  const size = roundSize(lead.fontSize);

  const sizeRank = statistics.headingSizes.indexOf(size);
  if (sizeRank >= 0) {
    return Math.min(sizeRank + 1, HEADING_HEURISTIC.MAX_LEVELS);
  }

  if (
    lead.fontWeight >= HEADING_HEURISTIC.BOLD_WEIGHT &&
    size >= statistics.bodySize
  ) {
    return Math.min(
      statistics.headingSizes.length + 1,
      HEADING_HEURISTIC.MAX_LEVELS,
    );
  }

  return null;
}
