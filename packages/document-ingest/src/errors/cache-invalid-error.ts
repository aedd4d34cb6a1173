import { ConversionError } from '@bookpack/shared';

/**
 * Why a cache file could not be used
 */
export type CacheInvalidReason =
  | 'missing'
  | 'unreadable'
  | 'corrupt'
  | 'schema-mismatch'
  | 'parser-mismatch';

/**
 * CacheInvalidError
 *
 * Thrown by CacheStore.load when a cache file is absent, unreadable, corrupt
 * or written by an incompatible schema or parser version, and by
 * CacheStore.save when the document would not load back. Load failures are
 * recoverable when the run enables fallback on cache failure.
 */
export class CacheInvalidError extends ConversionError {
  readonly reason: CacheInvalidReason;
  readonly cachePath: string;

  constructor(
    message: string,
    reason: CacheInvalidReason,
    cachePath: string,
    options?: ErrorOptions,
  ) {
    super(message, 'cache', options);
    this.name = 'CacheInvalidError';
    this.reason = reason;
    this.cachePath = cachePath;
  }
}
