import { createHash } from 'node:crypto';

import { IDENTITY } from '../config/constants';
import { slugify } from './slug';

/**
 * Derives identifiers from path keys: `[packageId, chapterKey, sectionKey, blockKey?]`.
 * Pure and deterministic; the same path key always yields the same id.
 */
export interface IdentityAllocator {
  allocate(pathKey: readonly string[]): string;
}

export interface IdAllocatorOptions {
  /**
   * Hash path keys (default). When false, ids are the slugged segments
   * joined with dashes: readable and unique, but longer.
   */
  deterministic?: boolean;
}

class HashIdAllocator implements IdentityAllocator {
  allocate(pathKey: readonly string[]): string {
    return createHash('sha1')
      .update(pathKey.join(IDENTITY.SEPARATOR))
      .digest('hex')
      .slice(0, IDENTITY.HEX_LENGTH);
  }
}

class ReadableIdAllocator implements IdentityAllocator {
  allocate(pathKey: readonly string[]): string {
    return pathKey.map((segment) => slugify(segment)).join('-');
  }
}

export function createIdAllocator(
  options: IdAllocatorOptions = {},
): IdentityAllocator {
  return options.deterministic === false
    ? new ReadableIdAllocator()
    : new HashIdAllocator();
}

function ordinal(index: number): string {
  return String(index).padStart(2, '0');
}

/**
 * Path-key segment for the chapter at 1-based `index`
 */
export function chapterSegment(index: number, slug: string): string {
  return `ch/${ordinal(index)}-${slug}`;
}

/**
 * Path-key segment for the section at 1-based `index` within its chapter
 */
export function sectionSegment(index: number, slug: string): string {
  return `sec/${ordinal(index)}-${slug}`;
}

/**
 * Path-key segment for the block at 0-based `order` within its section
 */
export function blockSegment(order: number): string {
  return `blk/${String(order).padStart(4, '0')}`;
}
