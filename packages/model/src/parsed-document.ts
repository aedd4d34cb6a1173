// Coordinates are in page units with a top-left origin
export interface BoundingBox {
  l: number;
  t: number;
  r: number;
  b: number;
}

// A single styled run of text as reported by the parser
export interface TextRun {
  text: string;
  fontSize: number;
  fontWeight: number;
  boundingBox: BoundingBox;
}

export type ParsedTextRole = 'paragraph' | 'heading' | 'list_item';

export interface ParsedTextBlock {
  kind: 'text';
  role: ParsedTextRole;
  boundingBox: BoundingBox;
  runs: TextRun[];
  // Present for list items; true = ordered list
  enumerated?: boolean;
}

export interface ParsedImageBlock {
  kind: 'image';
  boundingBox: BoundingBox;
  // Key into ParsedDocument.images
  imageRef: string;
}

// Structured table candidate detected by the parser
export interface ParsedTableStructure {
  rows: string[][];
  headerRows: number;
  // 0..1, parser's confidence in the detected cell grid
  confidence: number;
}

export interface ParsedTableBlock {
  kind: 'table';
  boundingBox: BoundingBox;
  // null when the parser found a table region but no cell structure
  structure: ParsedTableStructure | null;
}

export type ParsedBlock = ParsedTextBlock | ParsedImageBlock | ParsedTableBlock;

// Link annotation placed on a page
export interface ParsedLinkAnnotation {
  sourceBoundingBox: BoundingBox;
  // External target
  uri?: string;
  // Internal target (1-based page number)
  targetPageNo?: number;
  // Vertical offset on the target page, when the annotation carries one
  targetTop?: number;
  // Text covered by the annotation, when the parser could recover it
  anchorText?: string;
}

export interface ParsedPage {
  pageNo: number;
  width: number;
  height: number;
  blocks: ParsedBlock[];
  links: ParsedLinkAnnotation[];
  // Column count when the parser already detected the layout
  columnCount?: number;
}

// Outline (bookmark) entry
export interface OutlineEntry {
  // 1-based hierarchy level
  level: number;
  title: string;
  pageNo: number;
}

export interface EmbeddedImage {
  mimeType: string;
  // Base64-encoded original bytes
  data: string;
  width: number;
  height: number;
}

// Full structural/content tree produced by the document parser
export interface ParsedDocument {
  title: string;
  sourcePath: string;
  pageCount: number;
  pages: ParsedPage[];
  outline: OutlineEntry[];
  images: Record<string, EmbeddedImage>;
}
