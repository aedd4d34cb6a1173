import type { ParsedDocument } from '@bookpack/model';

import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { CacheInvalidError } from '../errors/cache-invalid-error';
import { CacheStore } from './cache-store';

function sampleDocument(): ParsedDocument {
  return {
    title: 'Field Guide',
    sourcePath: '/books/field-guide.pdf',
    pageCount: 2,
    pages: [
      {
        pageNo: 1,
        width: 600,
        height: 800,
        blocks: [
          {
            kind: 'text',
            role: 'heading',
            boundingBox: { l: 50, t: 40, r: 550, b: 70 },
            runs: [
              {
                text: 'Introduction',
                fontSize: 24,
                fontWeight: 700,
                boundingBox: { l: 50, t: 40, r: 550, b: 70 },
              },
            ],
          },
          {
            kind: 'table',
            boundingBox: { l: 50, t: 100, r: 550, b: 300 },
            structure: { rows: [['a', 'b']], headerRows: 1, confidence: 0.8 },
          },
        ],
        links: [
          {
            sourceBoundingBox: { l: 50, t: 320, r: 120, b: 334 },
            targetPageNo: 2,
          },
        ],
      },
      {
        pageNo: 2,
        width: 600,
        height: 800,
        blocks: [
          {
            kind: 'image',
            boundingBox: { l: 50, t: 40, r: 250, b: 240 },
            imageRef: 'img-1',
          },
        ],
        links: [],
        columnCount: 1,
      },
    ],
    outline: [{ level: 1, title: 'Introduction', pageNo: 1 }],
    images: {
      'img-1': { mimeType: 'image/png', data: 'AAAA', width: 200, height: 200 },
    },
  };
}

describe('CacheStore', () => {
  let dir: string;
  let store: CacheStore;
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cache-store-'));
    store = new CacheStore(logger);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('round-trips a document through save and load', async () => {
    const path = join(dir, 'doc.json');
    const document = sampleDocument();

    await store.save(document, path, 'parser-2.1');
    const loaded = await store.load(path, {
      expectedParserVersion: 'parser-2.1',
    });

    expect(loaded).toEqual(document);
    expect(logger.info).toHaveBeenCalledWith(
      `[CacheStore] Saved 2 pages to ${path}`,
    );
  });

  test('round-trips zero font sizes, page sizes and outline levels', async () => {
    const path = join(dir, 'doc.json');
    const document = sampleDocument();
    const [first, second] = document.pages;
    const edge: ParsedDocument = {
      ...document,
      pages: [
        {
          ...first,
          blocks: [
            {
              kind: 'text',
              role: 'paragraph',
              boundingBox: { l: 0, t: 0, r: 0, b: 0 },
              runs: [
                {
                  text: '',
                  fontSize: 0,
                  fontWeight: 0,
                  boundingBox: { l: 0, t: 0, r: 0, b: 0 },
                },
              ],
            },
          ],
        },
        { ...second, width: 0, height: 0 },
      ],
      outline: [{ level: 0, title: 'Front', pageNo: 1 }],
    };

    await store.save(edge, path, 'parser-2.1');

    await expect(store.load(path)).resolves.toEqual(edge);
  });

  test('refuses to save a document that would not load back', async () => {
    const path = join(dir, 'doc.json');
    const document = sampleDocument();
    const broken: ParsedDocument = {
      ...document,
      pages: [{ ...document.pages[0], width: Number.NaN }],
    };

    await expect(store.save(broken, path, 'parser-2.1')).rejects.toMatchObject({
      name: 'CacheInvalidError',
      reason: 'corrupt',
      message: `Document failed validation, cache not written: ${path}`,
    });
    expect(await readdir(dir)).toEqual([]);
  });

  test('writes a versioned envelope and leaves no temporary files', async () => {
    const path = join(dir, 'nested', 'doc.json');

    await store.save(sampleDocument(), path, 'parser-2.1');

    const envelope: unknown = JSON.parse(await readFile(path, 'utf-8'));
    expect(envelope).toMatchObject({
      schemaVersion: 1,
      parserVersion: 'parser-2.1',
    });
    expect(await readdir(join(dir, 'nested'))).toEqual(['doc.json']);
  });

  test('reports a missing file', async () => {
    await expect(store.load(join(dir, 'absent.json'))).rejects.toMatchObject({
      name: 'CacheInvalidError',
      reason: 'missing',
    });
  });

  test('rejects invalid JSON as corrupt', async () => {
    const path = join(dir, 'doc.json');
    await writeFile(path, '{"schemaVersion": 1, "document": ');

    const error = await store.load(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CacheInvalidError);
    expect(error).toMatchObject({ reason: 'corrupt', cachePath: path });
  });

  test('rejects an unknown schema version', async () => {
    const path = join(dir, 'doc.json');
    await writeFile(
      path,
      JSON.stringify({
        schemaVersion: 2,
        parserVersion: 'parser-2.1',
        document: sampleDocument(),
      }),
    );

    await expect(store.load(path)).rejects.toThrow(
      `Unsupported cache schema version 2 (expected 1): ${path}`,
    );
  });

  test('rejects a cache from another parser version when one is expected', async () => {
    const path = join(dir, 'doc.json');
    await store.save(sampleDocument(), path, 'parser-1.0');

    await expect(
      store.load(path, { expectedParserVersion: 'parser-2.1' }),
    ).rejects.toMatchObject({ reason: 'parser-mismatch' });
    await expect(store.load(path)).resolves.toMatchObject({
      title: 'Field Guide',
    });
  });

  test('rejects a document of the wrong shape', async () => {
    const path = join(dir, 'doc.json');
    await writeFile(
      path,
      JSON.stringify({
        schemaVersion: 1,
        parserVersion: 'parser-2.1',
        document: { title: 'Field Guide', pages: 'none' },
      }),
    );

    await expect(store.load(path)).rejects.toMatchObject({
      reason: 'corrupt',
      message: `Cache document failed validation: ${path}`,
    });
  });

  test('rejects an envelope without a header', async () => {
    const path = join(dir, 'doc.json');
    await writeFile(path, JSON.stringify([1, 2, 3]));

    await expect(store.load(path)).rejects.toMatchObject({
      reason: 'corrupt',
    });
  });
});
