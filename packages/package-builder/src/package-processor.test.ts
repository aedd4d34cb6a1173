import type { RunReport } from '@bookpack/model';

import { CacheInvalidError, PageSelectionError } from '@bookpack/document-ingest';
import { createAbortError } from '@bookpack/shared';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import {
  BODY,
  documentOf,
  embeddedPng,
  heading,
  headingDocument,
  image,
  mockLogger,
  page,
  stubBackend,
  text,
} from './__fixtures__/documents';
import { PackageCompileError } from './errors/conversion-errors';
import { PackageWriter } from './output/package-writer';
import { PackageProcessor, type PackageResult } from './package-processor';

const SOURCE = '/books/field-guide.pdf';

describe('PackageProcessor', () => {
  let root: string;
  let outputDir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bookpack-processor-'));
    outputDir = join(root, 'out');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('converts a document into a package directory', async () => {
    const backend = stubBackend();
    const processor = new PackageProcessor({ logger: mockLogger(), backend });

    const result = await processor.process(SOURCE, outputDir, {
      packageId: 'field-guide',
    });

    expect(backend.parse).toHaveBeenCalledWith(SOURCE);
    expect(result.outputDir).toBe(outputDir);
    expect(result.entries.map((entry) => entry.name)).toEqual([
      'Table of Contents',
      'Getting Started',
      'Working Safely',
      'Advanced Use',
    ]);
    expect(result.sources).toHaveLength(4);
    expect(result.sources[0]).toMatch(/^sources\/00-table-of-contents-/);

    const written = await readdir(join(outputDir, 'sources'));
    expect(written.sort()).toEqual(
      result.sources.map((source) => source.replace('sources/', '')).sort(),
    );

    expect(result.report).toMatchObject({
      source: 'parser',
      structureMode: 'heuristic',
      chapters: 3,
      sections: 6,
    });
    expect(result.report.notices).toContain(
      'No outline in the source: structure detected from heading fonts',
    );
    const report: RunReport = JSON.parse(
      await readFile(join(outputDir, 'report.json'), 'utf-8'),
    );
    expect(report).toEqual(result.report);

    expect(await readdir(root)).toEqual(['out']);
  });

  test('produces the same entries for 1, 2 and 4 workers', async () => {
    const runs: PackageResult[] = [];
    for (const workers of [1, 2, 4]) {
      const processor = new PackageProcessor({
        logger: mockLogger(),
        backend: stubBackend(),
      });
      runs.push(
        await processor.process(SOURCE, join(root, `out-${workers}`), {
          packageId: 'field-guide',
          workers,
        }),
      );
    }

    expect(runs[1].entries).toEqual(runs[0].entries);
    expect(runs[2].entries).toEqual(runs[0].entries);
    expect(runs[2].report.plan.effectiveWorkers).toBe(3);
  });

  test('applies a page selection and a title override', async () => {
    const processor = new PackageProcessor({
      logger: mockLogger(),
      backend: stubBackend(),
    });

    const result = await processor.process(SOURCE, outputDir, {
      packageId: 'field-guide',
      pages: '2-3',
      title: 'Pocket Guide',
    });

    expect(result.book.title).toBe('Pocket Guide');
    expect(result.entries.map((entry) => entry.name)).toEqual([
      'Table of Contents',
      'Working Safely',
      'Advanced Use',
    ]);
    expect(result.entries[1].folder).toEqual(['Pocket Guide', 'Working Safely']);
  });

  test('rejects a selection beyond the document without writing output', async () => {
    const processor = new PackageProcessor({
      logger: mockLogger(),
      backend: stubBackend(),
    });

    await expect(
      processor.process(SOURCE, outputDir, {
        packageId: 'field-guide',
        pages: '9',
      }),
    ).rejects.toThrow(PageSelectionError);
    expect(await readdir(root)).toEqual([]);
  });

  test('rejects an oversized range against the parsed page count', async () => {
    const processor = new PackageProcessor({
      logger: mockLogger(),
      backend: stubBackend(),
    });

    await expect(
      processor.process(SOURCE, outputDir, {
        packageId: 'field-guide',
        pages: '1-999999999',
      }),
    ).rejects.toThrow("Selected page 999999999 exceeds the document's 3 pages");
    expect(await readdir(root)).toEqual([]);
  });

  test('rejects invalid options before parsing', async () => {
    const backend = stubBackend();
    const processor = new PackageProcessor({ logger: mockLogger(), backend });

    await expect(
      processor.process(SOURCE, outputDir, {
        packageId: 'field-guide',
        workers: 0,
      }),
    ).rejects.toMatchObject({ category: 'configuration' });
    expect(backend.parse).not.toHaveBeenCalled();
  });

  describe('parse cache', () => {
    let cachePath: string;

    beforeEach(async () => {
      cachePath = join(root, 'cache.json');
      await writeFile(
        cachePath,
        JSON.stringify({
          schemaVersion: 999,
          parserVersion: 'stub-parser-1',
          document: headingDocument(),
        }),
      );
    });

    test('fails on a schema mismatch and leaves no output', async () => {
      const backend = stubBackend();
      const processor = new PackageProcessor({ logger: mockLogger(), backend });

      const run = processor.process(SOURCE, outputDir, {
        packageId: 'field-guide',
        cache: { path: cachePath },
      });

      await expect(run).rejects.toThrow(CacheInvalidError);
      await expect(run).rejects.toMatchObject({ reason: 'schema-mismatch' });
      expect(backend.parse).not.toHaveBeenCalled();
      expect(await readdir(root)).toEqual(['cache.json']);
    });

    test('re-parses with fallback enabled, then reuses the rewritten cache', async () => {
      const backend = stubBackend();
      const processor = new PackageProcessor({ logger: mockLogger(), backend });

      const first = await processor.process(SOURCE, outputDir, {
        packageId: 'field-guide',
        cache: { path: cachePath, fallbackOnFailure: true },
      });
      const second = await processor.process(SOURCE, outputDir, {
        packageId: 'field-guide',
        cache: { path: cachePath },
      });

      expect(first.report.source).toBe('parser');
      expect(first.report.notices).toContain(
        'Cache ignored (schema-mismatch): re-parsed source',
      );
      expect(second.report.source).toBe('cache');
      expect(second.entries).toEqual(first.entries);
      expect(backend.parse).toHaveBeenCalledTimes(1);
    });
  });

  describe('scheduling', () => {
    test('runs on one worker when the backend cannot parallelize', async () => {
      const recognize = vi.fn(async () => 'recognized');
      const processor = new PackageProcessor({
        logger: mockLogger(),
        backend: stubBackend({ supportsParallelExtraction: false }),
        ocrEngine: { recognize },
      });

      const { report } = await processor.process(SOURCE, outputDir, {
        packageId: 'field-guide',
        workers: 4,
        ocrMode: 'on',
      });

      expect(report.plan).toEqual({
        requestedWorkers: 4,
        effectiveWorkers: 1,
        disabledFeatures: [],
        decisions: [
          {
            setting: 'workers',
            reason: 'backend does not support parallel page extraction',
            from: 4,
            to: 1,
          },
        ],
      });
      expect(report.ocr).toEqual({ pagesProcessed: 3, pagesSkipped: 0 });
      expect(recognize).toHaveBeenCalledTimes(3);
    });

    test('switches OCR off when several workers remain', async () => {
      const recognize = vi.fn(async () => 'recognized');
      const processor = new PackageProcessor({
        logger: mockLogger(),
        backend: stubBackend(),
        ocrEngine: { recognize },
      });

      const { report } = await processor.process(SOURCE, outputDir, {
        packageId: 'field-guide',
        workers: 2,
        ocrMode: 'on',
      });

      expect(report.plan.disabledFeatures).toEqual(['ocr']);
      expect(report.ocr).toEqual({ pagesProcessed: 0, pagesSkipped: 0 });
      expect(recognize).not.toHaveBeenCalled();
    });

    test('disables captions without a caption engine', async () => {
      const processor = new PackageProcessor({
        logger: mockLogger(),
        backend: stubBackend(),
      });

      const { report } = await processor.process(SOURCE, outputDir, {
        packageId: 'field-guide',
        captions: true,
      });

      expect(report.notices).toContain(
        'Captions requested without a caption engine; captions disabled',
      );
    });
  });

  describe('abort', () => {
    test('stops before parsing when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const backend = stubBackend();
      const processor = new PackageProcessor({
        logger: mockLogger(),
        backend,
        abortSignal: controller.signal,
      });

      await expect(
        processor.process(SOURCE, outputDir, { packageId: 'field-guide' }),
      ).rejects.toMatchObject({ name: 'AbortError' });
      expect(backend.parse).not.toHaveBeenCalled();
    });

    test('removes the staging directory when aborted mid-extraction', async () => {
      const controller = new AbortController();
      const document = documentOf(
        [page(1, [heading('Tools', 40, 24), text(BODY, 80), image('img1', 120)])],
        { images: { img1: embeddedPng() } },
      );
      const caption = vi.fn(async () => {
        controller.abort(createAbortError());
        return 'A hammer';
      });
      const logger = mockLogger();
      const processor = new PackageProcessor({
        logger,
        backend: stubBackend({}, document),
        captionEngine: { caption },
        abortSignal: controller.signal,
      });

      await expect(
        processor.process(SOURCE, outputDir, {
          packageId: 'field-guide',
          captions: true,
        }),
      ).rejects.toThrow('Conversion was aborted');
      expect(caption).toHaveBeenCalledTimes(1);
      expect(await readdir(root)).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        '[PackageProcessor] Conversion aborted; staging directory removed',
      );
      expect(logger.error).not.toHaveBeenCalled();
    });
  });

  describe('failure', () => {
    afterEach(() => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
    });

    test('logs a failed assembly as an error and removes the staging directory', async () => {
      vi.spyOn(PackageWriter.prototype, 'commit').mockRejectedValueOnce(
        new Error('disk full'),
      );
      const logger = mockLogger();
      const processor = new PackageProcessor({
        logger,
        backend: stubBackend(),
      });

      await expect(
        processor.process(SOURCE, outputDir, { packageId: 'field-guide' }),
      ).rejects.toThrow('disk full');
      expect(logger.error).toHaveBeenCalledWith(
        '[PackageProcessor] Conversion failed:',
        'disk full',
      );
      expect(logger.warn).not.toHaveBeenCalledWith(
        '[PackageProcessor] Conversion aborted; staging directory removed',
      );
      expect(await readdir(root)).toEqual([]);
    });

    test('falls back to a console logger when none is given', async () => {
      vi.stubEnv('BOOKPACK_LOG_LEVEL', 'info');
      const info = vi.spyOn(console, 'info').mockImplementation(() => {});

      await new PackageProcessor({ backend: stubBackend() }).process(
        SOURCE,
        outputDir,
        { packageId: 'field-guide' },
      );

      expect(info).toHaveBeenCalledWith(
        '[PackageProcessor] Starting conversion...',
      );
    });
  });

  describe('compile', () => {
    test('runs the compiler on the written package', async () => {
      const spawn = vi.fn(async () => ({ code: 0, stdout: 'packed', stderr: '' }));
      const processor = new PackageProcessor({
        logger: mockLogger(),
        backend: stubBackend(),
        spawn,
      });

      const result = await processor.process(SOURCE, outputDir, {
        packageId: 'field-guide',
        compile: { command: 'pack-compiler', output: 'field-guide.db' },
      });

      expect(spawn).toHaveBeenCalledWith(
        'pack-compiler',
        [join(outputDir, 'sources'), join(outputDir, 'field-guide.db')],
        { cwd: outputDir, timeoutMs: undefined },
      );
      expect(result.compiled).toEqual({ code: 0, stdout: 'packed', stderr: '' });
    });

    test('keeps the package when the compiler fails', async () => {
      const spawn = vi.fn(async () => ({
        code: 2,
        stdout: '',
        stderr: 'bad source',
      }));
      const processor = new PackageProcessor({
        logger: mockLogger(),
        backend: stubBackend(),
        spawn,
      });

      await expect(
        processor.process(SOURCE, outputDir, {
          packageId: 'field-guide',
          compile: { command: 'pack-compiler', output: 'field-guide.db' },
        }),
      ).rejects.toThrow(PackageCompileError);
      expect(await readdir(join(outputDir, 'sources'))).toHaveLength(4);
    });
  });
});
