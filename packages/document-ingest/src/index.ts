export { CACHE_STORE } from './config/constants';
export {
  CacheStore,
  type CacheEnvelope,
  type CacheLoadOptions,
} from './core/cache-store';
export {
  DocumentIngestor,
  type IngestCacheOptions,
  type IngestResult,
} from './core/document-ingestor';
export {
  CacheInvalidError,
  type CacheInvalidReason,
} from './errors/cache-invalid-error';
export { PageSelectionError } from './errors/page-selection-error';
export { parsedDocumentSchema } from './schemas/parsed-document-schema';
export { parsePageSelection, selectPages } from './selection/page-selection';
