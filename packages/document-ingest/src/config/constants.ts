/**
 * Configuration constants for CacheStore
 */
export const CACHE_STORE = {
  /**
   * Version of the cache envelope layout. Readers reject any other value.
   */
  SCHEMA_VERSION: 1,

  /**
   * Indentation used when serializing cache files
   */
  JSON_INDENT: 2,

  /**
   * Suffix of the temporary file written before the atomic rename
   */
  TEMP_SUFFIX: '.tmp',
} as const;
