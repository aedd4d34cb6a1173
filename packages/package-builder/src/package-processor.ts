import type { CacheStore } from '@bookpack/document-ingest';
import type { LoggerMethods } from '@bookpack/logger';
import type {
  Book,
  CaptionEngine,
  ContainerEntry,
  ContentModeOptions,
  DocumentBackend,
  ExecutionPlan,
  OcrEngine,
  ParsedDocument,
  RunReport,
} from '@bookpack/model';
import type { SpawnResult } from '@bookpack/shared';

import type {
  ConversionOptions,
  ConversionOptionsInput,
} from './config/conversion-options';
import type { StagedPackage } from './output/package-writer';
import type { ResolvedStructure } from './structure/structure-resolver';
import type { IdentityAllocator } from './utils/id-allocator';

import {
  DocumentIngestor,
  parsePageSelection,
  selectPages,
} from '@bookpack/document-ingest';
import { createLogger } from '@bookpack/logger';
import {
  ConversionError,
  createAbortError,
  isAbortError,
  resolveOperationTimeout,
  spawnAsync,
} from '@bookpack/shared';

import { parseConversionOptions } from './config/conversion-options';
import { createContentCaches } from './content/content-caches';
import { ContentPipeline } from './content/content-pipeline';
import { LinkResolver } from './links/link-resolver';
import { ModuleMapper } from './mapping/module-mapper';
import { PackageCompiler } from './output/package-compiler';
import { PackageWriter } from './output/package-writer';
import { RunReportBuilder } from './report/run-report-builder';
import { WorkerScheduler } from './scheduling/worker-scheduler';
import { StructureResolver } from './structure/structure-resolver';
import { createIdAllocator } from './utils/id-allocator';

/**
 * PackageProcessor Options
 */
export interface PackageProcessorOptions {
  /**
   * Logger instance (default: console logger at BOOKPACK_LOG_LEVEL)
   */
  logger?: LoggerMethods;

  /**
   * Document parser. Its capabilities are read once per run.
   */
  backend: DocumentBackend;

  /**
   * Required for `ocrMode` other than 'off'
   */
  ocrEngine?: OcrEngine;

  /**
   * Required for `captions`
   */
  captionEngine?: CaptionEngine;

  /**
   * Parsed-document cache store (default: a file store using the same logger)
   */
  cacheStore?: CacheStore;

  /**
   * Runner for the package compiler command
   */
  spawn?: typeof spawnAsync;

  /**
   * Abort signal, checked between stages and by the page pool
   */
  abortSignal?: AbortSignal;
}

export interface PackageResult {
  book: Book;
  entries: ContainerEntry[];
  report: RunReport;
  outputDir: string;
  /**
   * Package-relative paths of the written source documents
   */
  sources: string[];
  /**
   * Present when a compile step was configured
   */
  compiled?: SpawnResult;
}

/**
 * PackageProcessor
 *
 * Runs one conversion from a source document to a package directory:
 *
 * 1. Validate options
 * 2. Ingest the parsed document (cache or parser) and apply the page selection
 * 3. Plan workers and features against the backend capabilities
 * 4. Resolve the chapter/section structure and identities
 * 5. Extract content per page into a staging directory
 * 6. Resolve links, map to container entries, write sources and report
 * 7. Optionally run the package compiler
 *
 * Stages 5-6 write into a staging directory that is removed on any failure,
 * so an aborted or failed run leaves no package behind.
 *
 * @example
 * ```typescript
 * const processor = new PackageProcessor({ logger, backend });
 * const result = await processor.process('book.pdf', 'out/field-guide', {
 *   packageId: 'field-guide',
 *   workers: 4,
 * });
 * console.log(result.report.chapters);
 * ```
 */
export class PackageProcessor {
  private readonly logger: LoggerMethods;
  private readonly backend: DocumentBackend;
  private readonly ocrEngine?: OcrEngine;
  private readonly captionEngine?: CaptionEngine;
  private readonly ingestor: DocumentIngestor;
  private readonly scheduler: WorkerScheduler;
  private readonly linkResolver: LinkResolver;
  private readonly writer: PackageWriter;
  private readonly compiler: PackageCompiler;
  private readonly abortSignal?: AbortSignal;

  constructor(options: PackageProcessorOptions) {
    this.logger = options.logger ?? createLogger();
    this.backend = options.backend;
    this.ocrEngine = options.ocrEngine;
    this.captionEngine = options.captionEngine;
    this.abortSignal = options.abortSignal;
    this.ingestor = new DocumentIngestor(
      this.logger,
      this.backend,
      options.cacheStore,
    );
    this.scheduler = new WorkerScheduler(this.logger);
    this.linkResolver = new LinkResolver(this.logger);
    this.writer = new PackageWriter(this.logger);
    this.compiler = new PackageCompiler(
      this.logger,
      options.spawn ?? spawnAsync,
    );
  }

  /**
   * Check if abort has been requested and throw error if so
   *
   * @throws {Error} with name 'AbortError' if aborted
   */
  private checkAborted(): void {
    if (this.abortSignal?.aborted) {
      throw createAbortError();
    }
  }

  /**
   * @throws {ConversionError} on invalid options
   * @throws {CacheInvalidError} when the cache is unusable and fallback is off
   * @throws {PageSelectionError} on an invalid page selection
   * @throws {StructureError} when nothing is left to convert
   * @throws {ContentExtractionError} when an asset cannot be written
   * @throws {PackageCompileError} when the compile command fails
   */
  async process(
    sourcePath: string,
    outputDir: string,
    input: ConversionOptionsInput,
  ): Promise<PackageResult> {
    this.logger.info('[PackageProcessor] Starting conversion...');
    this.logger.info('[PackageProcessor] Source:', sourcePath);

    const options = parseConversionOptions(input);
    this.checkAborted();

    const startTimeIngest = Date.now();
    const ingested = await this.ingestor.ingest(sourcePath, options.cache);
    const document = this.selectDocument(ingested.document, options);
    const ingestTime = Date.now() - startTimeIngest;
    this.logger.info(`[PackageProcessor] Ingestion took ${ingestTime}ms`);

    const report = new RunReportBuilder(ingested.source);
    for (const notice of ingested.notices) {
      report.addNotice(notice);
    }

    this.checkAborted();

    const { plan, contentOptions } = this.planRun(document, options, report);
    report.setPlan(plan);

    const startTimeStructure = Date.now();
    const allocator = createIdAllocator({
      deterministic: options.deterministicIds,
    });
    const structure = new StructureResolver(this.logger, allocator).resolve(
      document,
      options.packageId,
    );
    if (structure.mode === 'heuristic') {
      report.addNotice(
        'No outline in the source: structure detected from heading fonts',
      );
    }
    const structureTime = Date.now() - startTimeStructure;
    this.logger.info(
      `[PackageProcessor] Structure resolution took ${structureTime}ms`,
    );

    this.checkAborted();

    const staged = await this.writer.begin(outputDir);
    let result: Omit<PackageResult, 'compiled'>;
    try {
      result = await this.assemble(
        document,
        structure,
        options,
        { plan, contentOptions, report, allocator },
        staged,
      );
    } catch (error) {
      await this.writer.discard(staged);
      if (isAbortError(error)) {
        this.logger.warn(
          '[PackageProcessor] Conversion aborted; staging directory removed',
        );
      } else {
        this.logger.error(
          '[PackageProcessor] Conversion failed:',
          ConversionError.getErrorMessage(error),
        );
      }
      throw error;
    }

    if (!options.compile) {
      return result;
    }

    this.checkAborted();

    const startTimeCompile = Date.now();
    const compiled = await this.compiler.compile(
      result.outputDir,
      options.compile,
    );
    const compileTime = Date.now() - startTimeCompile;
    this.logger.info(`[PackageProcessor] Compilation took ${compileTime}ms`);

    return { ...result, compiled };
  }

  private selectDocument(
    document: ParsedDocument,
    options: ConversionOptions,
  ): ParsedDocument {
    const selected = options.pages
      ? selectPages(
          document,
          parsePageSelection(options.pages, document.pageCount),
        )
      : document;
    if (options.pages) {
      this.logger.info(
        `[PackageProcessor] Selected ${selected.pages.length} of ${document.pageCount} pages`,
      );
    }
    return options.title ? { ...selected, title: options.title } : selected;
  }

  /**
   * Switch off features without an engine, then let the scheduler settle
   * workers and cache-sensitive features.
   */
  private planRun(
    document: ParsedDocument,
    options: ConversionOptions,
    report: RunReportBuilder,
  ): { plan: ExecutionPlan; contentOptions: ContentModeOptions } {
    let ocr = options.ocrMode !== 'off';
    let captions = options.captions;

    if (ocr && !this.ocrEngine) {
      ocr = false;
      this.logger.warn(
        '[PackageProcessor] OCR requested without an OCR engine; OCR disabled',
      );
      report.addNotice('OCR requested without an OCR engine; OCR disabled');
    }
    if (captions && !this.captionEngine) {
      captions = false;
      this.logger.warn(
        '[PackageProcessor] Captions requested without a caption engine; captions disabled',
      );
      report.addNotice(
        'Captions requested without a caption engine; captions disabled',
      );
    }

    const plan = this.scheduler.plan(
      options.workers,
      this.backend.capabilities,
      { ocr, captions },
      document.pages.length,
    );

    return {
      plan,
      contentOptions: {
        tableMode: options.tableMode,
        tableConfidenceThreshold: options.tableConfidenceThreshold,
        lowConfidenceRasterThreshold: options.lowConfidenceRasterThreshold,
        ocrMode:
          ocr && !plan.disabledFeatures.includes('ocr')
            ? options.ocrMode
            : 'off',
        textCoverageThreshold: options.textCoverageThreshold,
        captions: captions && !plan.disabledFeatures.includes('captions'),
      },
    };
  }

  private async assemble(
    document: ParsedDocument,
    structure: ResolvedStructure,
    options: ConversionOptions,
    run: {
      plan: ExecutionPlan;
      contentOptions: ContentModeOptions;
      report: RunReportBuilder;
      allocator: IdentityAllocator;
    },
    staged: StagedPackage,
  ): Promise<Omit<PackageResult, 'compiled'>> {
    const { plan, contentOptions, report, allocator } = run;

    const startTimeContent = Date.now();
    const pipeline = new ContentPipeline(this.logger, this.backend, allocator, {
      ocr: this.ocrEngine,
      caption: this.captionEngine,
    });
    const extraction = await pipeline.extractAll({
      document,
      structure,
      options: contentOptions,
      workers: plan.effectiveWorkers,
      timeoutMs: options.operationTimeoutMs ?? resolveOperationTimeout(),
      assets: staged,
      caches: createContentCaches(options.cacheCapacity),
      signal: this.abortSignal,
    });
    const contentTime = Date.now() - startTimeContent;
    this.logger.info(
      `[PackageProcessor] Content extraction took ${contentTime}ms`,
    );

    this.checkAborted();

    const startTimeLinks = Date.now();
    const linked = this.linkResolver.resolve(
      extraction.book,
      structure.sectionIndex,
    );
    const mapped = new ModuleMapper(this.logger, allocator).map(linked.book, {
      generateToc: options.generateToc,
      tocTitle: options.tocTitle,
    });
    const linkTime = Date.now() - startTimeLinks;
    this.logger.info(
      `[PackageProcessor] Link resolution and mapping took ${linkTime}ms`,
    );

    report.setStructure(structure.mode, linked.book);
    report.addPages(extraction.pages);
    report.addLinkWarnings(linked.warnings);
    for (const notice of mapped.notices) {
      report.addNotice(notice);
    }
    const runReport = report.build();
    report.logSummary(this.logger);

    this.checkAborted();

    const written = await this.writer.commit(staged, mapped.entries, runReport);

    return {
      book: linked.book,
      entries: mapped.entries,
      report: runReport,
      outputDir: written.outputDir,
      sources: written.sources,
    };
  }
}
