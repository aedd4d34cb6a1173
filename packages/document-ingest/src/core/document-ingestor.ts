import type { LoggerMethods } from '@bookpack/logger';
import type { DocumentBackend, ParsedDocument } from '@bookpack/model';

import { CacheInvalidError } from '../errors/cache-invalid-error';
import { CacheStore } from './cache-store';

/**
 * Cache behaviour for one ingestion
 */
export interface IngestCacheOptions {
  /**
   * Cache file location; without it the cache is not used at all
   */
  path?: string;

  /**
   * Write the cache after a fresh parse
   */
  write: boolean;

  /**
   * Re-parse instead of failing when the cache file is invalid
   */
  fallbackOnFailure: boolean;
}

export interface IngestResult {
  document: ParsedDocument;
  source: 'cache' | 'parser';
  /**
   * Run-level remarks such as a cache fallback
   */
  notices: string[];
}

/**
 * DocumentIngestor
 *
 * Produces the parsed document for a run, from the cache when one is usable
 * and from the parser backend otherwise.
 *
 * - A missing cache file is a cold cache: parse, then save when `write` is set.
 * - Any other cache failure re-parses when `fallbackOnFailure` is set (and
 *   re-saves when `write` is set); otherwise the CacheInvalidError aborts the run.
 */
export class DocumentIngestor {
  private readonly cacheStore: CacheStore;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly backend: DocumentBackend,
    cacheStore?: CacheStore,
  ) {
    this.cacheStore = cacheStore ?? new CacheStore(logger);
  }

  async ingest(
    sourcePath: string,
    cache: IngestCacheOptions,
  ): Promise<IngestResult> {
    const notices: string[] = [];

    if (cache.path) {
      try {
        const document = await this.cacheStore.load(cache.path, {
          expectedParserVersion: this.backend.capabilities.parserVersion,
        });
        return { document, source: 'cache', notices };
      } catch (error) {
        if (!(error instanceof CacheInvalidError)) {
          throw error;
        }
        if (error.reason === 'missing') {
          this.logger.info(
            `[DocumentIngestor] No cache at ${cache.path}, parsing source`,
          );
        } else if (cache.fallbackOnFailure) {
          this.logger.warn(
            `[DocumentIngestor] ${error.message}; falling back to a fresh parse`,
          );
          notices.push(`Cache ignored (${error.reason}): re-parsed source`);
        } else {
          throw error;
        }
      }
    }

    const document = await this.parse(sourcePath);

    if (cache.path && cache.write) {
      await this.cacheStore.save(
        document,
        cache.path,
        this.backend.capabilities.parserVersion,
      );
    }

    return { document, source: 'parser', notices };
  }

  private async parse(sourcePath: string): Promise<ParsedDocument> {
    const startedAt = Date.now();
    this.logger.info(`[DocumentIngestor] Parsing ${sourcePath}`);

    const document = await this.backend.parse(sourcePath);

    this.logger.info(
      `[DocumentIngestor] Parsed ${document.pages.length} pages in ${Date.now() - startedAt}ms`,
    );
    return document;
  }
}
