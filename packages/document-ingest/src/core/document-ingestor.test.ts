import type { DocumentBackend, ParsedDocument } from '@bookpack/model';

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { CacheInvalidError } from '../errors/cache-invalid-error';
import { CacheStore } from './cache-store';
import { DocumentIngestor } from './document-ingestor';

const parsedDocument: ParsedDocument = {
  title: 'Manual',
  sourcePath: '/books/manual.pdf',
  pageCount: 1,
  pages: [{ pageNo: 1, width: 600, height: 800, blocks: [], links: [] }],
  outline: [],
  images: {},
};

describe('DocumentIngestor', () => {
  let dir: string;
  let backend: DocumentBackend;
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ingestor-'));
    backend = {
      capabilities: {
        parserVersion: 'parser-3',
        supportsParallelExtraction: true,
        supportsStructuredTables: true,
        supportsRegionRendering: true,
      },
      parse: vi.fn().mockResolvedValue(parsedDocument),
      renderPage: vi.fn(),
      renderRegion: vi.fn(),
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('parses without touching the cache when no path is given', async () => {
    const ingestor = new DocumentIngestor(logger, backend);

    const result = await ingestor.ingest('/books/manual.pdf', {
      write: true,
      fallbackOnFailure: false,
    });

    expect(result).toEqual({
      document: parsedDocument,
      source: 'parser',
      notices: [],
    });
    expect(backend.parse).toHaveBeenCalledWith('/books/manual.pdf');
  });

  test('treats a missing cache as cold and writes it after parsing', async () => {
    const path = join(dir, 'manual.json');
    const ingestor = new DocumentIngestor(logger, backend);

    const first = await ingestor.ingest('/books/manual.pdf', {
      path,
      write: true,
      fallbackOnFailure: false,
    });
    const second = await ingestor.ingest('/books/manual.pdf', {
      path,
      write: true,
      fallbackOnFailure: false,
    });

    expect(first.source).toBe('parser');
    expect(second.source).toBe('cache');
    expect(second.document).toEqual(parsedDocument);
    expect(backend.parse).toHaveBeenCalledTimes(1);
  });

  test('does not write the cache when write is disabled', async () => {
    const store = new CacheStore(logger);
    const save = vi.spyOn(store, 'save');
    const ingestor = new DocumentIngestor(logger, backend, store);

    await ingestor.ingest('/books/manual.pdf', {
      path: join(dir, 'manual.json'),
      write: false,
      fallbackOnFailure: false,
    });

    expect(save).not.toHaveBeenCalled();
  });

  test('fails with CacheInvalidError on a schema mismatch without fallback', async () => {
    const path = join(dir, 'manual.json');
    await writeFile(
      path,
      JSON.stringify({
        schemaVersion: 99,
        parserVersion: 'parser-3',
        document: parsedDocument,
      }),
    );
    const ingestor = new DocumentIngestor(logger, backend);

    await expect(
      ingestor.ingest('/books/manual.pdf', {
        path,
        write: true,
        fallbackOnFailure: false,
      }),
    ).rejects.toBeInstanceOf(CacheInvalidError);
    expect(backend.parse).not.toHaveBeenCalled();
  });

  test('re-parses and re-saves on a corrupt cache when fallback is enabled', async () => {
    const path = join(dir, 'manual.json');
    await writeFile(path, 'not json');
    const ingestor = new DocumentIngestor(logger, backend);

    const result = await ingestor.ingest('/books/manual.pdf', {
      path,
      write: true,
      fallbackOnFailure: true,
    });

    expect(result.source).toBe('parser');
    expect(result.notices).toEqual(['Cache ignored (corrupt): re-parsed source']);
    expect(logger.warn).toHaveBeenCalledTimes(1);

    const store = new CacheStore(logger);
    await expect(store.load(path)).resolves.toEqual(parsedDocument);
  });

  test('rejects a cache written by another parser version', async () => {
    const path = join(dir, 'manual.json');
    await new CacheStore(logger).save(parsedDocument, path, 'parser-2');
    const ingestor = new DocumentIngestor(logger, backend);

    await expect(
      ingestor.ingest('/books/manual.pdf', {
        path,
        write: false,
        fallbackOnFailure: false,
      }),
    ).rejects.toMatchObject({ reason: 'parser-mismatch' });
  });

  test('propagates parser failures', async () => {
    vi.mocked(backend.parse).mockRejectedValue(new Error('bad xref table'));
    const ingestor = new DocumentIngestor(logger, backend);

    await expect(
      ingestor.ingest('/books/manual.pdf', {
        write: false,
        fallbackOnFailure: true,
      }),
    ).rejects.toThrow('bad xref table');
  });
});
