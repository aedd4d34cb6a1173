export type TableMode = 'structured' | 'auto' | 'image-only';

export type OcrMode = 'auto' | 'on' | 'off';

export type CacheSafeFeature = 'ocr' | 'captions';

/**
 * Content-mode settings for one extraction run
 */
export interface ContentModeOptions {
  tableMode: TableMode;
  tableConfidenceThreshold: number;
  lowConfidenceRasterThreshold: number;
  ocrMode: OcrMode;
  textCoverageThreshold: number;
  captions: boolean;
}
