import type { Book, ContentWarning } from '@bookpack/model';

import type { PageExtraction } from '../content/content-pipeline';

import { describe, expect, test } from 'vitest';

import { mockLogger } from '../__fixtures__/documents';
import { RunReportBuilder } from './run-report-builder';

function pageResult(
  pageNo: number,
  warnings: ContentWarning[] = [],
): PageExtraction {
  return {
    pageNo,
    items: [],
    warnings,
    stats: {
      structuredTables: 1,
      rasterizedTables: 2,
      tableFallbacks: 1,
      ocrPagesProcessed: 1,
      ocrPagesSkipped: 0,
      captioned: 3,
      captionsSkipped: 1,
    },
  };
}

function warning(pageNo: number): ContentWarning {
  return {
    kind: 'table-fallback',
    pageNo,
    message: 'table fell back: no table structure detected',
  };
}

const book: Book = {
  packageId: 'guide',
  title: 'Field Guide',
  sourcePath: '/books/field-guide.pdf',
  chapters: [
    {
      id: 'c1',
      title: 'Tools',
      pathKey: ['guide', 'c1'],
      range: { start: { pageNo: 1, index: 0 }, end: null },
      implicit: false,
      sections: [
        {
          id: 's1',
          title: 'Tools',
          level: 2,
          pathKey: ['guide', 'c1', 's1'],
          range: { start: { pageNo: 1, index: 0 }, end: null },
          blocks: [
            {
              kind: 'link',
              id: 'b1',
              order: 0,
              pageNo: 1,
              annotation: { sourceBoundingBox: { l: 0, t: 0, r: 1, b: 1 } },
            },
          ],
        },
      ],
    },
  ],
};

describe('RunReportBuilder', () => {
  test('sums page statistics and counts the book', () => {
    const builder = new RunReportBuilder('cache');
    builder.setStructure('heuristic', book);
    builder.addPages([pageResult(1), pageResult(2)]);

    expect(builder.build()).toMatchObject({
      source: 'cache',
      structureMode: 'heuristic',
      chapters: 1,
      sections: 1,
      blocks: 1,
      tables: { structured: 2, rasterized: 4, fallbacks: 2 },
      ocr: { pagesProcessed: 2, pagesSkipped: 0 },
      captions: { captioned: 6, skipped: 2 },
    });
  });

  test('keeps every count but at most five samples', () => {
    const builder = new RunReportBuilder('parser');
    builder.addPages(
      [1, 2, 3, 4, 5, 6, 7].map((pageNo) => pageResult(pageNo, [warning(pageNo)])),
    );

    const { warnings } = builder.build();

    expect(warnings.count).toBe(7);
    expect(warnings.samples.map((sample) => sample.pageNo)).toEqual([
      1, 2, 3, 4, 5,
    ]);
  });

  test('records unresolved links, plan decisions and notices', () => {
    const builder = new RunReportBuilder('parser');
    const plan = {
      requestedWorkers: 4,
      effectiveWorkers: 1,
      disabledFeatures: [],
      decisions: [
        {
          setting: 'workers' as const,
          reason: 'backend does not support parallel page extraction',
          from: 4,
          to: 1,
        },
      ],
    };
    builder.setPlan(plan);
    builder.addLinkWarnings([
      {
        origin: 'text',
        pageNo: 2,
        sectionId: 's1',
        label: 'Chapter 9',
        reason: 'no-target',
      },
    ]);
    builder.addNotice('Cache ignored (corrupt): re-parsed source');

    const report = builder.build();

    expect(report.plan).toEqual(plan);
    expect(report.unresolvedLinks.count).toBe(1);
    expect(report.unresolvedLinks.samples[0].label).toBe('Chapter 9');
    expect(report.notices).toEqual([
      'Cache ignored (corrupt): re-parsed source',
    ]);
  });

  test('logs a one-message summary', () => {
    const logger = mockLogger();
    const builder = new RunReportBuilder('parser');
    builder.setStructure('outline', book);

    builder.logSummary(logger);

    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info.mock.calls[0][0]).toContain(
      '[RunReport] 1 chapters, 1 sections, 1 blocks (outline, from parser)',
    );
  });
});
