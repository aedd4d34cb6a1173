import type { LoggerMethods } from '@bookpack/logger';
import type {
  Book,
  ContentWarning,
  ExecutionPlan,
  LinkResolutionWarning,
  RunReport,
  SampledCount,
} from '@bookpack/model';

import type { PageExtraction } from '../content/content-pipeline';
import type { StructureMode } from '../structure/structure-resolver';

import { REPORT } from '../config/constants';

/**
 * Count of a category plus its first few occurrences
 */
class SampledCounter<T> {
  private count = 0;
  private readonly samples: T[] = [];

  add(item: T): void {
    this.count++;
    if (this.samples.length < REPORT.MAX_SAMPLES) {
      this.samples.push(item);
    }
  }

  toJSON(): SampledCount<T> {
    return { count: this.count, samples: [...this.samples] };
  }
}

/**
 * RunReportBuilder - Collects the non-fatal outcomes of one conversion run
 *
 * Components report into it as the run progresses; `build()` produces the
 * serializable report written next to the package and `logSummary()` prints
 * a short digest.
 *
 * @example
 * ```typescript
 * const report = new RunReportBuilder('parser');
 * report.setStructure('heuristic', book);
 * report.setPlan(plan);
 * report.addPages(extraction.pages);
 * report.addLinkWarnings(linkResult.warnings);
 * report.logSummary(logger);
 * await writer.commit(staged, entries, report.build());
 * ```
 */
export class RunReportBuilder {
  private structureMode: StructureMode = 'outline';
  private plan: ExecutionPlan = {
    requestedWorkers: 1,
    effectiveWorkers: 1,
    disabledFeatures: [],
    decisions: [],
  };
  private counts = { chapters: 0, sections: 0, blocks: 0 };
  private readonly tables = { structured: 0, rasterized: 0, fallbacks: 0 };
  private readonly ocr = { pagesProcessed: 0, pagesSkipped: 0 };
  private readonly captions = { captioned: 0, skipped: 0 };
  private readonly unresolvedLinks = new SampledCounter<LinkResolutionWarning>();
  private readonly warnings = new SampledCounter<ContentWarning>();
  private readonly notices: string[] = [];

  constructor(private readonly source: RunReport['source']) {}

  setStructure(mode: StructureMode, book: Book): void {
    this.structureMode = mode;
    this.counts = {
      chapters: book.chapters.length,
      sections: book.chapters.reduce(
        (sum, chapter) => sum + chapter.sections.length,
        0,
      ),
      blocks: book.chapters.reduce(
        (sum, chapter) =>
          sum +
          chapter.sections.reduce(
            (sectionSum, section) => sectionSum + section.blocks.length,
            0,
          ),
        0,
      ),
    };
  }

  setPlan(plan: ExecutionPlan): void {
    this.plan = plan;
  }

  /**
   * Merge page statistics and warnings, in page order
   */
  addPages(pages: readonly PageExtraction[]): void {
    for (const page of pages) {
      this.tables.structured += page.stats.structuredTables;
      this.tables.rasterized += page.stats.rasterizedTables;
      this.tables.fallbacks += page.stats.tableFallbacks;
      this.ocr.pagesProcessed += page.stats.ocrPagesProcessed;
      this.ocr.pagesSkipped += page.stats.ocrPagesSkipped;
      this.captions.captioned += page.stats.captioned;
      this.captions.skipped += page.stats.captionsSkipped;
      for (const warning of page.warnings) {
        this.warnings.add(warning);
      }
    }
  }

  addLinkWarnings(warnings: readonly LinkResolutionWarning[]): void {
    for (const warning of warnings) {
      this.unresolvedLinks.add(warning);
    }
  }

  addNotice(notice: string): void {
    this.notices.push(notice);
  }

  build(): RunReport {
    return {
      source: this.source,
      structureMode: this.structureMode,
      plan: this.plan,
      ...this.counts,
      tables: { ...this.tables },
      ocr: { ...this.ocr },
      captions: { ...this.captions },
      unresolvedLinks: this.unresolvedLinks.toJSON(),
      warnings: this.warnings.toJSON(),
      notices: [...this.notices],
    };
  }

  /**
   * Log a digest of the report
   */
  logSummary(logger: LoggerMethods): void {
    const report = this.build();
    const lines = [
      `[RunReport] ${report.chapters} chapters, ${report.sections} sections, ${report.blocks} blocks (${report.structureMode}, from ${report.source})`,
      `  workers: ${report.plan.effectiveWorkers} of ${report.plan.requestedWorkers} requested`,
      `  tables: ${report.tables.structured} structured, ${report.tables.rasterized} rasterized, ${report.tables.fallbacks} fallbacks`,
      `  ocr: ${report.ocr.pagesProcessed} pages, ${report.ocr.pagesSkipped} skipped`,
      `  captions: ${report.captions.captioned} captioned, ${report.captions.skipped} skipped`,
      `  warnings: ${report.warnings.count}, unresolved links: ${report.unresolvedLinks.count}`,
    ];
    logger.info(lines.join('\n'));
  }
}
