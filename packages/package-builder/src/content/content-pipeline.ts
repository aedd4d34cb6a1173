import type { LoggerMethods } from '@bookpack/logger';
import type {
  Book,
  BoundingBox,
  CaptionEngine,
  ContentBlock,
  ContentModeOptions,
  ContentWarning,
  ContentWarningKind,
  DocumentBackend,
  ImageBlock,
  OcrEngine,
  ParsedDocument,
  ParsedImageBlock,
  ParsedLinkAnnotation,
  ParsedTableBlock,
  ParsedTextBlock,
  RenderedImage,
  StructuredTableBlock,
  TextBlock,
} from '@bookpack/model';

import type { FlowPage } from '../structure/flow';
import type { SectionRef } from '../structure/section-index';
import type { ResolvedStructure } from '../structure/structure-resolver';
import type { IdentityAllocator } from '../utils/id-allocator';
import type { ContentCaches } from './content-caches';

import {
  ConcurrentPool,
  ConversionError,
  fingerprint,
  withTimeout,
} from '@bookpack/shared';
import { groupBy, sortBy } from 'es-toolkit';

import { HEADING_HEURISTIC } from '../config/constants';
import { ContentExtractionError } from '../errors/conversion-errors';
import { blockText } from '../structure/flow';
import { classifyHeading } from '../structure/heading-classifier';
import { blockSegment } from '../utils/id-allocator';
import { assetPath } from './asset-path';
import { decideTable } from './table-policy';

/**
 * Destination for extracted asset bytes, addressed by package-relative path
 */
export interface AssetSink {
  write(relativePath: string, data: Buffer): Promise<void>;
}

export interface ExtractionContext {
  document: ParsedDocument;
  structure: ResolvedStructure;
  options: ContentModeOptions;
  workers: number;
  timeoutMs: number;
  assets: AssetSink;
  caches: ContentCaches;
  signal?: AbortSignal;
}

export interface PageExtractionStats {
  structuredTables: number;
  rasterizedTables: number;
  tableFallbacks: number;
  ocrPagesProcessed: number;
  ocrPagesSkipped: number;
  captioned: number;
  captionsSkipped: number;
}

/**
 * Result of one page task, merged after every task has joined
 */
export interface PageExtraction {
  pageNo: number;
  items: DraftItem[];
  warnings: ContentWarning[];
  stats: PageExtractionStats;
}

export interface ExtractionResult {
  book: Book;
  pages: PageExtraction[];
}

export type DraftBlock<T = ContentBlock> = T extends unknown
  ? Omit<T, 'id' | 'order'>
  : never;

export interface DraftItem {
  sectionId: string;
  pageNo: number;
  index: number;
  sub: number;
  block: DraftBlock;
}

interface PlannedBlock {
  index: number;
  section: SectionRef;
  // Reserved per-section asset number for image and table blocks
  assetSequence?: number;
}

interface ReplacedText {
  planned: PlannedBlock;
  draft: DraftBlock<TextBlock>;
}

type WarnFn = (kind: ContentWarningKind, message: string) => void;

type EmitFn = (
  anchor: { index: number; section: SectionRef },
  block: DraftBlock,
  sub?: number,
) => void;

interface PagePlan {
  flowPage: FlowPage;
  blocks: PlannedBlock[];
  annotations: Map<number, ParsedLinkAnnotation[]>;
  looseLinks: ParsedLinkAnnotation[];
}

interface OcrTarget {
  entries: ReplacedText[];
  // Whole page when absent
  region?: BoundingBox;
}

function groupBySection(replaced: readonly ReplacedText[]): ReplacedText[][] {
  const groups = new Map<string, ReplacedText[]>();
  for (const entry of replaced) {
    const key = entry.planned.section.sectionId;
    groups.set(key, [...(groups.get(key) ?? []), entry]);
  }
  return [...groups.values()];
}

function unionBox(boxes: readonly BoundingBox[]): BoundingBox {
  return {
    l: Math.min(...boxes.map((box) => box.l)),
    t: Math.min(...boxes.map((box) => box.t)),
    r: Math.max(...boxes.map((box) => box.r)),
    b: Math.max(...boxes.map((box) => box.b)),
  };
}

function emptyStats(): PageExtractionStats {
  return {
    structuredTables: 0,
    rasterizedTables: 0,
    tableFallbacks: 0,
    ocrPagesProcessed: 0,
    ocrPagesSkipped: 0,
    captioned: 0,
    captionsSkipped: 0,
  };
}

function overlapArea(a: BoundingBox, b: BoundingBox): number {
  const width = Math.min(a.r, b.r) - Math.max(a.l, b.l);
  const height = Math.min(a.b, b.b) - Math.max(a.t, b.t);
  return width > 0 && height > 0 ? width * height : 0;
}

/**
 * Share of the page area covered by text blocks
 */
export function textCoverage(flowPage: FlowPage): number {
  const { width, height } = flowPage.page;
  const pageBox = { l: 0, t: 0, r: width, b: height };
  const covered = flowPage.blocks
    .filter((block) => block.kind === 'text')
    .reduce((sum, block) => sum + overlapArea(block.boundingBox, pageBox), 0);
  return width > 0 && height > 0 ? Math.min(1, covered / (width * height)) : 0;
}

/**
 * ContentPipeline
 *
 * Turns the blocks of each section into content blocks, one task per page.
 *
 * ## Stages
 *
 * 1. Plan (single-threaded): assign every block its section, reserve asset
 *    sequence numbers per section and attach link annotations to the text
 *    block they overlap most.
 * 2. Extract (bounded pool): each page task emits draft blocks tagged with
 *    their flow position. Collaborator failures and timeouts (rendering, OCR,
 *    captioning) become page warnings; asset write failures are fatal and
 *    cancel the remaining tasks.
 * 3. Assemble (after the join): drafts are sorted by flow position, grouped
 *    per section and given order numbers and ids, so completion order never
 *    shows in the output.
 */
export class ContentPipeline {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly backend: DocumentBackend,
    private readonly allocator: IdentityAllocator,
    private readonly engines: { ocr?: OcrEngine; caption?: CaptionEngine } = {},
  ) {}

  /**
   * Extract every page and return the book with its sections filled
   */
  async extractAll(context: ExtractionContext): Promise<ExtractionResult> {
    const plans = this.plan(context.structure);
    const startedAt = Date.now();

    const pages = await ConcurrentPool.run(
      plans,
      context.workers,
      (plan, _index, signal) => this.extractPage(plan, context, signal),
      (result) =>
        this.logger.debug(
          `[ContentPipeline] Page ${result.pageNo}: ${result.items.length} blocks, ${result.warnings.length} warnings`,
        ),
      context.signal,
    );

    const book = this.assemble(context.structure.book, pages);
    this.logger.info(
      `[ContentPipeline] Extracted ${pages.length} pages on ${context.workers} worker(s) in ${Date.now() - startedAt}ms`,
    );
    return { book, pages };
  }

  /**
   * Extract the content blocks of a single section
   */
  async extract(
    sectionId: string,
    context: ExtractionContext,
  ): Promise<ContentBlock[]> {
    const section = context.structure.book.chapters
      .flatMap((chapter) => chapter.sections)
      .find((candidate) => candidate.id === sectionId);
    if (!section) {
      throw new ConversionError(`Unknown section ${sectionId}`, 'content');
    }

    const { start, end } = section.range;
    const plans = this.plan(context.structure).filter(
      (plan) =>
        plan.flowPage.pageNo >= start.pageNo &&
        (end === null || plan.flowPage.pageNo <= end.pageNo),
    );
    const pages = await ConcurrentPool.run(
      plans,
      context.workers,
      (plan, _index, signal) => this.extractPage(plan, context, signal),
      undefined,
      context.signal,
    );

    const book = this.assemble(context.structure.book, pages);
    return (
      book.chapters
        .flatMap((chapter) => chapter.sections)
        .find((candidate) => candidate.id === sectionId)?.blocks ?? []
    );
  }

  private plan(structure: ResolvedStructure): PagePlan[] {
    const sequences = new Map<string, number>();

    return structure.flow.map((flowPage) => {
      const blocks = flowPage.blocks.map((block, index): PlannedBlock => {
        const section = this.sectionAt(structure, flowPage.pageNo, index);
        if (block.kind === 'text') {
          return { index, section };
        }
        const assetSequence = (sequences.get(section.sectionId) ?? 0) + 1;
        sequences.set(section.sectionId, assetSequence);
        return { index, section, assetSequence };
      });

      const annotations = new Map<number, ParsedLinkAnnotation[]>();
      const looseLinks: ParsedLinkAnnotation[] = [];
      for (const link of flowPage.page.links) {
        let best = -1;
        let bestArea = 0;
        flowPage.blocks.forEach((block, index) => {
          const area =
            block.kind === 'text'
              ? overlapArea(link.sourceBoundingBox, block.boundingBox)
              : 0;
          if (area > bestArea) {
            best = index;
            bestArea = area;
          }
        });
        if (best < 0) {
          looseLinks.push(link);
        } else {
          annotations.set(best, [...(annotations.get(best) ?? []), link]);
        }
      }

      return { flowPage, blocks, annotations, looseLinks };
    });
  }

  private sectionAt(
    structure: ResolvedStructure,
    pageNo: number,
    index: number,
  ): SectionRef {
    const section = structure.sectionIndex.lookup({ pageNo, index });
    if (!section) {
      throw new ContentExtractionError(
        `No section owns block ${index}`,
        pageNo,
      );
    }
    return section;
  }

  private async extractPage(
    plan: PagePlan,
    context: ExtractionContext,
    signal: AbortSignal,
  ): Promise<PageExtraction> {
    const { flowPage } = plan;
    const pageNo = flowPage.pageNo;
    const result: PageExtraction = {
      pageNo,
      items: [],
      warnings: [],
      stats: emptyStats(),
    };
    const warn: WarnFn = (kind, message) => {
      this.logger.warn(`[ContentPipeline] Page ${pageNo}: ${message}`);
      result.warnings.push({ kind, pageNo, message });
    };
    const emit: EmitFn = (anchor, block, sub = 0) => {
      result.items.push({
        sectionId: anchor.section.sectionId,
        pageNo,
        index: anchor.index,
        sub,
        block,
      });
    };

    const ocrMode = this.engines.ocr ? context.options.ocrMode : 'off';
    const replaceTextWithOcr = ocrMode === 'on';
    const replaced: ReplacedText[] = [];

    for (const planned of plan.blocks) {
      signal.throwIfAborted();
      const block = flowPage.blocks[planned.index];

      if (block.kind === 'text') {
        const annotations = plan.annotations.get(planned.index) ?? [];
        const draft = this.textDraft(block, context, annotations, pageNo);
        if (!draft) {
          continue;
        }
        if (replaceTextWithOcr && draft.role !== 'heading') {
          replaced.push({ planned, draft });
          continue;
        }
        emit(planned, draft);
      } else if (block.kind === 'image') {
        const draft = await this.imageDraft(
          block,
          planned,
          context,
          result,
          warn,
        );
        if (draft) {
          emit(planned, draft);
        }
      } else {
        const draft = await this.tableDraft(
          block,
          planned,
          context,
          result,
          warn,
        );
        if (draft) {
          emit(planned, draft);
        }
      }
    }

    if (ocrMode !== 'off') {
      signal.throwIfAborted();
      await this.applyOcr(plan, context, result, replaced, emit, warn);
    }

    const endIndex = flowPage.blocks.length;
    plan.looseLinks.forEach((annotation, i) => {
      const index = endIndex + 1 + i;
      emit(
        { index, section: this.sectionAt(context.structure, pageNo, index) },
        { kind: 'link', pageNo, annotation },
      );
    });

    return result;
  }

  private textDraft(
    block: ParsedTextBlock,
    context: ExtractionContext,
    annotations: ParsedLinkAnnotation[],
    pageNo: number,
  ): DraftBlock<TextBlock> | null {
    const text = blockText(block);
    if (!text) {
      return null;
    }

    const classified = classifyHeading(block, context.structure.fontStatistics);
    const role = classified !== null ? 'heading' : block.role;
    return {
      kind: 'text',
      pageNo,
      role,
      text,
      ...(role === 'heading'
        ? { level: classified ?? HEADING_HEURISTIC.MAX_LEVELS }
        : {}),
      ...(block.enumerated !== undefined ? { enumerated: block.enumerated } : {}),
      annotations,
      links: [],
    };
  }

  private async imageDraft(
    block: ParsedImageBlock,
    planned: PlannedBlock,
    context: ExtractionContext,
    result: PageExtraction,
    warn: WarnFn,
  ): Promise<DraftBlock<ImageBlock> | null> {
    const embedded = context.document.images[block.imageRef];
    if (!embedded) {
      warn(
        'image-dropped',
        `image ${block.imageRef} is missing from the document`,
      );
      return null;
    }

    const data = Buffer.from(embedded.data, 'base64');
    const path = assetPath(
      planned.section.sectionPathKey,
      'img',
      planned.assetSequence ?? 0,
      embedded.mimeType,
    );
    await this.writeAsset(context, path, data, result.pageNo);

    const caption = await this.captionFor(
      { mimeType: embedded.mimeType, data },
      context,
      result,
      warn,
    );

    return {
      kind: 'image',
      pageNo: result.pageNo,
      origin: 'embedded',
      assetPath: path,
      mimeType: embedded.mimeType,
      width: embedded.width,
      height: embedded.height,
      ...(caption ? { caption } : {}),
    };
  }

  private async tableDraft(
    block: ParsedTableBlock,
    planned: PlannedBlock,
    context: ExtractionContext,
    result: PageExtraction,
    warn: WarnFn,
  ): Promise<DraftBlock<ImageBlock | StructuredTableBlock> | null> {
    const pageNo = result.pageNo;
    const decision = decideTable(
      block.structure,
      context.options,
      this.backend.capabilities,
    );

    if (decision.render === 'drop') {
      warn('table-dropped', `table dropped: ${decision.reason}`);
      return null;
    }
    if (decision.fallbackReason) {
      result.stats.tableFallbacks++;
      warn('table-fallback', `table fell back: ${decision.fallbackReason}`);
    }

    if (decision.render === 'structured') {
      result.stats.structuredTables++;
      const copy = decision.rasterCopy
        ? await this.rasterize(block, planned, context, pageNo)
        : null;
      if (copy instanceof Error) {
        this.logger.debug(
          `[ContentPipeline] Page ${pageNo}: raster copy skipped: ${copy.message}`,
        );
      }
      return {
        kind: 'table',
        pageNo,
        mode: 'structured',
        rows: decision.structure.rows,
        headerRows: decision.structure.headerRows,
        confidence: decision.structure.confidence,
        ...(copy && !(copy instanceof Error)
          ? { rasterAssetPath: copy.assetPath }
          : {}),
      };
    }

    const raster = await this.rasterize(block, planned, context, pageNo);
    if (!(raster instanceof Error)) {
      result.stats.rasterizedTables++;
      return {
        kind: 'image',
        pageNo,
        origin: 'table',
        assetPath: raster.assetPath,
        mimeType: raster.mimeType,
        ...(decision.fallbackReason
          ? { fallbackReason: decision.fallbackReason }
          : {}),
      };
    }

    const structure = block.structure;
    if (structure && structure.rows.length > 0) {
      result.stats.tableFallbacks++;
      result.stats.structuredTables++;
      warn(
        'table-fallback',
        `rasterization failed, kept detected structure: ${raster.message}`,
      );
      return {
        kind: 'table',
        pageNo,
        mode: 'structured',
        rows: structure.rows,
        headerRows: structure.headerRows,
        confidence: structure.confidence,
      };
    }
    warn('table-dropped', `table dropped: rasterization failed: ${raster.message}`);
    return null;
  }

  /**
   * Render a table region and store it as an asset. Rendering failures come
   * back as an Error value; asset write failures throw.
   */
  private async rasterize(
    block: ParsedTableBlock,
    planned: PlannedBlock,
    context: ExtractionContext,
    pageNo: number,
  ): Promise<{ assetPath: string; mimeType: string } | Error> {
    let image: RenderedImage;
    try {
      image = await withTimeout(
        this.backend.renderRegion(context.document, pageNo, block.boundingBox),
        context.timeoutMs,
        `table render on page ${pageNo}`,
      );
    } catch (error) {
      return toError(error);
    }

    const path = assetPath(
      planned.section.sectionPathKey,
      'table',
      planned.assetSequence ?? 0,
      image.mimeType,
    );
    await this.writeAsset(context, path, image.data, pageNo);
    return { assetPath: path, mimeType: image.mimeType };
  }

  private async applyOcr(
    plan: PagePlan,
    context: ExtractionContext,
    result: PageExtraction,
    replaced: ReplacedText[],
    emit: EmitFn,
    warn: WarnFn,
  ): Promise<void> {
    const { flowPage } = plan;
    const pageNo = flowPage.pageNo;
    const keepNative = (entries: readonly ReplacedText[]): void => {
      for (const { planned, draft } of entries) {
        emit(planned, draft);
      }
    };

    if (context.options.ocrMode === 'auto') {
      const coverage = textCoverage(flowPage);
      if (coverage >= context.options.textCoverageThreshold) {
        return;
      }
      this.logger.debug(
        `[ContentPipeline] Page ${pageNo}: text coverage ${coverage.toFixed(3)} below ${context.options.textCoverageThreshold}, running OCR`,
      );
    }

    // One OCR region per owning section
    const groups = groupBySection(replaced);
    if (
      groups.length > 1 &&
      !this.backend.capabilities.supportsRegionRendering
    ) {
      result.stats.ocrPagesSkipped++;
      warn(
        'ocr-skipped',
        `OCR skipped: text spans ${groups.length} sections and region rendering is unavailable`,
      );
      keepNative(replaced);
      return;
    }

    const targets: OcrTarget[] =
      groups.length > 1
        ? groups.map((entries) => ({
            entries,
            region: unionBox(
              entries.map(
                ({ planned }) => flowPage.blocks[planned.index].boundingBox,
              ),
            ),
          }))
        : [{ entries: replaced }];

    let recognizedTargets = 0;
    for (const target of targets) {
      let recognized: string;
      try {
        recognized = await this.recognize(pageNo, target.region, context);
      } catch (error) {
        warn(
          'ocr-skipped',
          `OCR skipped: ${ConversionError.getErrorMessage(error)}`,
        );
        keepNative(target.entries);
        continue;
      }
      recognizedTargets++;

      const paragraphs = recognized
        .split(/\n\s*\n/)
        .map((paragraph) => paragraph.replace(/\s+/g, ' ').trim())
        .filter((paragraph) => paragraph.length > 0);
      if (paragraphs.length === 0) {
        this.logger.debug(
          `[ContentPipeline] Page ${pageNo}: OCR found no text`,
        );
        keepNative(target.entries);
        continue;
      }

      const index = target.entries[0]?.planned.index ?? flowPage.blocks.length;
      const anchor = {
        index,
        section: this.sectionAt(context.structure, pageNo, index),
      };
      const annotations = target.entries.flatMap(
        (entry) => entry.draft.annotations,
      );
      paragraphs.forEach((paragraph, sub) => {
        emit(
          anchor,
          {
            kind: 'text',
            pageNo,
            role: 'paragraph',
            text: paragraph,
            ocr: true,
            annotations: sub === 0 ? annotations : [],
            links: [],
          },
          sub,
        );
      });
    }

    if (recognizedTargets > 0) {
      result.stats.ocrPagesProcessed++;
    } else {
      result.stats.ocrPagesSkipped++;
    }
  }

  /**
   * OCR text of a page, or of one region of it
   */
  private async recognize(
    pageNo: number,
    region: BoundingBox | undefined,
    context: ExtractionContext,
  ): Promise<string> {
    const engine = this.engines.ocr;
    if (!engine) {
      throw new ConversionError('no OCR engine configured', 'configuration');
    }

    const image = region
      ? await withTimeout(
          this.backend.renderRegion(context.document, pageNo, region),
          context.timeoutMs,
          `region render on page ${pageNo}`,
        )
      : await context.caches.renders.get(pageNo, () =>
          withTimeout(
            this.backend.renderPage(context.document, pageNo),
            context.timeoutMs,
            `page render ${pageNo}`,
          ),
        );
    const key = fingerprint(image.data);
    const cached = context.caches.ocr.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const recognized = await withTimeout(
      engine.recognize(image),
      context.timeoutMs,
      `OCR of page ${pageNo}`,
    );
    context.caches.ocr.set(key, recognized);
    return recognized;
  }

  private async captionFor(
    image: RenderedImage,
    context: ExtractionContext,
    result: PageExtraction,
    warn: WarnFn,
  ): Promise<string | null> {
    const engine = this.engines.caption;
    if (!engine || !context.options.captions) {
      return null;
    }

    const key = fingerprint(image.data);
    let caption: string | null;
    if (context.caches.captions.has(key)) {
      caption = context.caches.captions.get(key) ?? null;
    } else {
      try {
        caption = await withTimeout(
          engine.caption(image),
          context.timeoutMs,
          'image captioning',
        );
      } catch (error) {
        result.stats.captionsSkipped++;
        warn(
          'caption-skipped',
          `caption skipped: ${ConversionError.getErrorMessage(error)}`,
        );
        return null;
      }
      context.caches.captions.set(key, caption);
    }

    const trimmed = caption?.trim() ?? '';
    if (!trimmed) {
      return null;
    }
    result.stats.captioned++;
    return trimmed;
  }

  private async writeAsset(
    context: ExtractionContext,
    path: string,
    data: Buffer,
    pageNo: number,
  ): Promise<void> {
    try {
      await context.assets.write(path, data);
    } catch (error) {
      throw ContentExtractionError.fromError(
        `Failed to write asset ${path}`,
        pageNo,
        error,
      );
    }
  }

  private assemble(book: Book, pages: PageExtraction[]): Book {
    const items = sortBy(
      pages.flatMap((page) => page.items),
      ['pageNo', 'index', 'sub'],
    );
    const bySection = groupBy(items, (item) => item.sectionId);

    return {
      ...book,
      chapters: book.chapters.map((chapter) => ({
        ...chapter,
        sections: chapter.sections.map((section) => ({
          ...section,
          blocks: (bySection[section.id] ?? []).map(
            (item, order): ContentBlock => ({
              ...item.block,
              id: this.allocator.allocate([
                ...section.pathKey,
                blockSegment(order),
              ]),
              order,
            }),
          ),
        })),
      })),
    };
  }
}

function toError(error: unknown): Error {
  return error instanceof Error
    ? error
    : new Error(ConversionError.getErrorMessage(error));
}
