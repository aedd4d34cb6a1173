import type { RenderedImage } from '@bookpack/model';

import { KeyedMemo, LruCache } from '@bookpack/shared';

/**
 * Per-run caches handed to the content pipeline.
 *
 * OCR and caption results are keyed by image fingerprint. Page renders are
 * memoized per page number with one in-flight render per slot, so
 * extractions that revisit a page share a single render.
 */
export interface ContentCaches {
  ocr: LruCache<string, string>;
  captions: LruCache<string, string | null>;
  renders: KeyedMemo<number, RenderedImage>;
}

export function createContentCaches(capacity: number): ContentCaches {
  return {
    ocr: new LruCache(capacity),
    captions: new LruCache(capacity),
    renders: new KeyedMemo(capacity),
  };
}
