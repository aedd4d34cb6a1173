import type { Capabilities } from '@bookpack/model';

import { describe, expect, test } from 'vitest';

import { mockLogger } from '../__fixtures__/documents';
import { WorkerScheduler } from './worker-scheduler';

const parallel: Capabilities = {
  parserVersion: 'stub-parser-1',
  supportsParallelExtraction: true,
  supportsStructuredTables: true,
  supportsRegionRendering: true,
};
const serial: Capabilities = { ...parallel, supportsParallelExtraction: false };
const noFeatures = { ocr: false, captions: false };

describe('WorkerScheduler', () => {
  test('honors the requested worker count when nothing limits it', () => {
    const plan = new WorkerScheduler(mockLogger()).plan(
      4,
      parallel,
      noFeatures,
      10,
    );

    expect(plan).toEqual({
      requestedWorkers: 4,
      effectiveWorkers: 4,
      disabledFeatures: [],
      decisions: [],
    });
  });

  test('runs serially on a backend without parallel support and keeps OCR', () => {
    const logger = mockLogger();

    const plan = new WorkerScheduler(logger).plan(
      4,
      serial,
      { ocr: true, captions: false },
      10,
    );

    expect(plan.effectiveWorkers).toBe(1);
    expect(plan.disabledFeatures).toEqual([]);
    expect(plan.decisions).toEqual([
      {
        setting: 'workers',
        reason: 'backend does not support parallel page extraction',
        from: 4,
        to: 1,
      },
    ]);
    expect(logger.info).toHaveBeenCalledWith(
      '[WorkerScheduler] workers: 4 -> 1 (backend does not support parallel page extraction)',
    );
  });

  test('disables OCR and captions when several workers remain', () => {
    const plan = new WorkerScheduler(mockLogger()).plan(
      3,
      parallel,
      { ocr: true, captions: true },
      10,
    );

    expect(plan.effectiveWorkers).toBe(3);
    expect(plan.disabledFeatures).toEqual(['ocr', 'captions']);
    expect(plan.decisions).toEqual([
      {
        setting: 'ocr',
        reason: 'ocr caches are unsafe under 3 workers',
        from: true,
        to: false,
      },
      {
        setting: 'captions',
        reason: 'captions caches are unsafe under 3 workers',
        from: true,
        to: false,
      },
    ]);
  });

  test('caps workers at the number of selected pages', () => {
    const plan = new WorkerScheduler(mockLogger()).plan(
      8,
      parallel,
      noFeatures,
      3,
    );

    expect(plan.effectiveWorkers).toBe(3);
    expect(plan.decisions).toEqual([
      {
        setting: 'workers',
        reason: 'only 3 page(s) selected',
        from: 8,
        to: 3,
      },
    ]);
  });

  test('still disables features before capping to a single page', () => {
    const plan = new WorkerScheduler(mockLogger()).plan(
      4,
      parallel,
      { ocr: false, captions: true },
      1,
    );

    expect(plan.effectiveWorkers).toBe(1);
    expect(plan.disabledFeatures).toEqual(['captions']);
  });

  test('records nothing for a single requested worker', () => {
    const logger = mockLogger();

    const plan = new WorkerScheduler(logger).plan(
      1,
      serial,
      { ocr: true, captions: true },
      1,
    );

    expect(plan.effectiveWorkers).toBe(1);
    expect(plan.decisions).toEqual([]);
    expect(logger.info).not.toHaveBeenCalled();
  });
});
