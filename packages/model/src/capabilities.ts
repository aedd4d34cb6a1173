import type { BoundingBox, ParsedDocument } from './parsed-document';

/**
 * Capabilities of the document-parser backend.
 *
 * Populated once at startup and passed to the scheduler and content pipeline
 * instead of probing the backend at run time.
 */
export interface Capabilities {
  /**
   * Version string of the parser, recorded in cache files
   */
  parserVersion: string;

  /**
   * Whether page extraction may run on several workers at once
   */
  supportsParallelExtraction: boolean;

  /**
   * Whether table blocks carry structured cell data
   */
  supportsStructuredTables: boolean;

  /**
   * Whether page regions can be rendered to images
   */
  supportsRegionRendering: boolean;
}

/**
 * Rendered image bytes with their mime type
 */
export interface RenderedImage {
  mimeType: string;
  data: Buffer;
}

/**
 * Document-parser collaborator.
 *
 * Parsing itself (PDF decoding, layout analysis) happens behind this interface.
 */
export interface DocumentBackend {
  readonly capabilities: Capabilities;

  parse(sourcePath: string): Promise<ParsedDocument>;

  renderPage(document: ParsedDocument, pageNo: number): Promise<RenderedImage>;

  renderRegion(
    document: ParsedDocument,
    pageNo: number,
    region: BoundingBox,
  ): Promise<RenderedImage>;
}

/**
 * OCR collaborator. Rejections degrade to "no text" for the page.
 */
export interface OcrEngine {
  recognize(image: RenderedImage): Promise<string>;
}

/**
 * Captioning (vision-language) collaborator. Rejections leave the image
 * without a caption.
 */
export interface CaptionEngine {
  caption(image: RenderedImage): Promise<string | null>;
}
