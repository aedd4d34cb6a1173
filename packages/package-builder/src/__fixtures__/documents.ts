import type {
  BoundingBox,
  Capabilities,
  DocumentBackend,
  EmbeddedImage,
  OutlineEntry,
  ParsedBlock,
  ParsedDocument,
  ParsedLinkAnnotation,
  ParsedPage,
  ParsedTableStructure,
  ParsedTextBlock,
} from '@bookpack/model';

import { vi } from 'vitest';

export const PAGE_WIDTH = 600;
export const PAGE_HEIGHT = 800;

export function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function box(t: number, height = 20, l = 50, r = 550): BoundingBox {
  return { l, t, r, b: t + height };
}

interface TextOptions {
  size?: number;
  weight?: number;
  role?: ParsedTextBlock['role'];
  enumerated?: boolean;
  boundingBox?: BoundingBox;
}

export function text(
  content: string,
  t: number,
  options: TextOptions = {},
): ParsedTextBlock {
  const boundingBox = options.boundingBox ?? box(t);
  return {
    kind: 'text',
    role: options.role ?? 'paragraph',
    boundingBox,
    runs: [
      {
        text: content,
        fontSize: options.size ?? 10,
        fontWeight: options.weight ?? 400,
        boundingBox,
      },
    ],
    ...(options.enumerated !== undefined
      ? { enumerated: options.enumerated }
      : {}),
  };
}

export function heading(content: string, t: number, size: number) {
  return text(content, t, { size, role: 'heading' });
}

export function image(imageRef: string, t: number): ParsedBlock {
  return { kind: 'image', boundingBox: box(t, 200), imageRef };
}

export function table(
  t: number,
  structure: ParsedTableStructure | null,
): ParsedBlock {
  return { kind: 'table', boundingBox: box(t, 150), structure };
}

export function page(
  pageNo: number,
  blocks: ParsedBlock[],
  links: ParsedLinkAnnotation[] = [],
): ParsedPage {
  return { pageNo, width: PAGE_WIDTH, height: PAGE_HEIGHT, blocks, links };
}

export function documentOf(
  pages: ParsedPage[],
  extra: {
    title?: string;
    outline?: OutlineEntry[];
    images?: Record<string, EmbeddedImage>;
  } = {},
): ParsedDocument {
  return {
    title: extra.title ?? 'Field Guide',
    sourcePath: '/books/field-guide.pdf',
    pageCount: pages.length,
    pages,
    outline: extra.outline ?? [],
    images: extra.images ?? {},
  };
}

export const BODY =
  'Body text describing the topic at a comfortable length for reading.';

/**
 * Three chapters without an outline, each with two sections told apart by
 * font size (24pt chapters, 16pt sections, 10pt body)
 */
export function headingDocument(): ParsedDocument {
  const chapterNames = ['Getting Started', 'Working Safely', 'Advanced Use'];
  const pages = chapterNames.map((name, i) =>
    page(i + 1, [
      heading(name, 40, 24),
      heading(`${name} Basics`, 80, 16),
      text(BODY, 110),
      text(BODY, 140),
      heading(`${name} Details`, 200, 16),
      text(BODY, 230),
    ]),
  );
  return documentOf(pages);
}

export const PNG_BASE64 = Buffer.from('png-bytes').toString('base64');

export function embeddedPng(): EmbeddedImage {
  return { mimeType: 'image/png', data: PNG_BASE64, width: 64, height: 48 };
}

export function stubBackend(
  capabilities: Partial<Capabilities> = {},
  document: ParsedDocument = headingDocument(),
) {
  return {
    capabilities: {
      parserVersion: 'stub-parser-1',
      supportsParallelExtraction: true,
      supportsStructuredTables: true,
      supportsRegionRendering: true,
      ...capabilities,
    },
    parse: vi.fn(async () => document),
    renderPage: vi.fn(async (_document: ParsedDocument, pageNo: number) => ({
      mimeType: 'image/png',
      data: Buffer.from(`page-${pageNo}`),
    })),
    renderRegion: vi.fn(
      async (_document: ParsedDocument, pageNo: number, region: BoundingBox) => ({
        mimeType: 'image/png',
        data: Buffer.from(`region-${pageNo}-${region.t}`),
      }),
    ),
  } satisfies DocumentBackend;
}
