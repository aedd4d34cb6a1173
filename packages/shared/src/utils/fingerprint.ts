import { createHash } from 'node:crypto';

/**
 * Content fingerprint used as a cache key for OCR and caption results
 */
export function fingerprint(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}
