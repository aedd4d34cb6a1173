import type { ContentBlock } from './content-block';

/**
 * Position in the flattened reading order of the document.
 *
 * `index` is the block's index within its page after column flattening;
 * positions compare by page first, then index.
 */
export interface FlowPosition {
  pageNo: number;
  index: number;
}

/**
 * Half-open range of the reading flow; `end` null means end of document
 */
export interface FlowRange {
  start: FlowPosition;
  end: FlowPosition | null;
}

export interface Section {
  id: string;
  title: string;
  // Heading level (2 for first-level sections)
  level: number;
  pathKey: string[];
  range: FlowRange;
  blocks: ContentBlock[];
}

export interface Chapter {
  id: string;
  title: string;
  pathKey: string[];
  range: FlowRange;
  // True for the leading chapter that holds content before the first heading
  implicit: boolean;
  sections: Section[];
}

export interface Book {
  packageId: string;
  title: string;
  sourcePath: string;
  chapters: Chapter[];
}
