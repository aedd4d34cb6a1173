import type { LoggerMethods } from '@bookpack/logger';
import type { ParsedDocument } from '@bookpack/model';

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { CACHE_STORE } from '../config/constants';
import { CacheInvalidError } from '../errors/cache-invalid-error';
import {
  cacheHeaderSchema,
  parsedDocumentSchema,
} from '../schemas/parsed-document-schema';

/**
 * Envelope written to disk around a parsed document
 */
export interface CacheEnvelope {
  schemaVersion: number;
  parserVersion: string;
  document: ParsedDocument;
}

export interface CacheLoadOptions {
  /**
   * Reject caches written by a different parser version
   */
  expectedParserVersion?: string;
}

/**
 * CacheStore
 *
 * Persists the parser's output so a rerun can skip parsing. Files are JSON
 * envelopes `{ schemaVersion, parserVersion, document }` written to a
 * temporary sibling and renamed into place, so a reader never observes a
 * half-written cache.
 */
export class CacheStore {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Validate and write a document. Whatever `save` accepts, `load` reads back.
   *
   * @throws {CacheInvalidError} when the document fails validation; nothing is
   * written
   */
  async save(
    document: ParsedDocument,
    path: string,
    parserVersion: string,
  ): Promise<void> {
    const validated = parsedDocumentSchema.safeParse(document);
    if (!validated.success) {
      throw new CacheInvalidError(
        `Document failed validation, cache not written: ${path}`,
        'corrupt',
        path,
        { cause: validated.error },
      );
    }

    const envelope: CacheEnvelope = {
      schemaVersion: CACHE_STORE.SCHEMA_VERSION,
      parserVersion,
      document: validated.data,
    };
    const tempPath = `${path}.${randomUUID()}${CACHE_STORE.TEMP_SUFFIX}`;

    await mkdir(dirname(path), { recursive: true });
    try {
      await writeFile(
        tempPath,
        JSON.stringify(envelope, null, CACHE_STORE.JSON_INDENT),
        'utf-8',
      );
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }

    this.logger.info(
      `[CacheStore] Saved ${document.pages.length} pages to ${path}`,
    );
  }

  /**
   * Read and validate a cache file.
   *
   * @throws {CacheInvalidError} when the file is missing, unreadable, not
   * valid JSON, has an unknown schema version, was written by another parser
   * version, or holds a document of the wrong shape
   */
  async load(
    path: string,
    options: CacheLoadOptions = {},
  ): Promise<ParsedDocument> {
    const raw = await this.readRaw(path);

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new CacheInvalidError(
        `Cache file is not valid JSON: ${path}`,
        'corrupt',
        path,
        { cause: error },
      );
    }

    const header = cacheHeaderSchema.safeParse(data);
    if (!header.success) {
      throw new CacheInvalidError(
        `Cache file has no schema version header: ${path}`,
        'corrupt',
        path,
        { cause: header.error },
      );
    }

    const { schemaVersion, parserVersion } = header.data;
    if (schemaVersion !== CACHE_STORE.SCHEMA_VERSION) {
      throw new CacheInvalidError(
        `Unsupported cache schema version ${schemaVersion} (expected ${CACHE_STORE.SCHEMA_VERSION}): ${path}`,
        'schema-mismatch',
        path,
      );
    }

    if (
      options.expectedParserVersion !== undefined &&
      parserVersion !== options.expectedParserVersion
    ) {
      throw new CacheInvalidError(
        `Cache was written by parser ${parserVersion}, current parser is ${options.expectedParserVersion}: ${path}`,
        'parser-mismatch',
        path,
      );
    }

    const parsed = parsedDocumentSchema.safeParse(
      typeof data === 'object' && data !== null && 'document' in data
        ? data.document
        : undefined,
    );
    if (!parsed.success) {
      throw new CacheInvalidError(
        `Cache document failed validation: ${path}`,
        'corrupt',
        path,
        { cause: parsed.error },
      );
    }

    this.logger.info(
      `[CacheStore] Loaded ${parsed.data.pages.length} pages from ${path}`,
    );
    return parsed.data;
  }

  private async readRaw(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      const missing =
        error instanceof Error && 'code' in error && error.code === 'ENOENT';
      throw new CacheInvalidError(
        missing
          ? `Cache file not found: ${path}`
          : `Cache file could not be read: ${path}`,
        missing ? 'missing' : 'unreadable',
        path,
        { cause: error },
      );
    }
  }
}
