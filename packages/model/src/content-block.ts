import type { ParsedLinkAnnotation } from './parsed-document';
import type { LinkReference } from './link-reference';

/**
 * Fields shared by every content block
 */
export interface ContentBlockBase {
  /**
   * Deterministic identifier derived from the owning section's path-key
   */
  id: string;

  /**
   * Position within the owning section (0-based, document order)
   */
  order: number;

  /**
   * Page the block was extracted from
   */
  pageNo: number;
}

export interface TextBlock extends ContentBlockBase {
  kind: 'text';
  role: 'paragraph' | 'heading' | 'list_item';
  text: string;
  // Heading level (1..6) when role is heading
  level?: number;
  // List items only; true = ordered
  enumerated?: boolean;
  // True when the text came from OCR
  ocr?: boolean;
  // Raw annotations overlapping this block, consumed by link resolution
  annotations: ParsedLinkAnnotation[];
  // Filled in by link resolution
  links: LinkReference[];
}

export interface ImageBlock extends ContentBlockBase {
  kind: 'image';
  // 'table' marks a table region rendered to an image
  origin: 'embedded' | 'table';
  // Path relative to the package root, e.g. "assets/ch-01-intro_sec-01-setup_img-0001.png"
  assetPath: string;
  mimeType: string;
  width?: number;
  height?: number;
  caption?: string;
  // Table regions only: why the structured form was not used
  fallbackReason?: string;
}

export interface StructuredTableBlock extends ContentBlockBase {
  kind: 'table';
  mode: 'structured';
  rows: string[][];
  headerRows: number;
  confidence: number;
  // Raster copy kept alongside a low-confidence structured table
  rasterAssetPath?: string;
}

/**
 * A table renders either as cells or as a rasterized image of its region
 */
export type RasterizedTableBlock = ImageBlock & { origin: 'table' };

export type TableBlock = StructuredTableBlock | RasterizedTableBlock;

/**
 * Link that could not be attached to any text on its page
 */
export interface LinkSpanBlock extends ContentBlockBase {
  kind: 'link';
  annotation: ParsedLinkAnnotation;
  link?: LinkReference;
}

export type ContentBlock =
  | TextBlock
  | ImageBlock
  | StructuredTableBlock
  | LinkSpanBlock;
