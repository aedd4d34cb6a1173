import { z } from 'zod/v4';

const boundingBoxSchema = z.object({
  l: z.number(),
  t: z.number(),
  r: z.number(),
  b: z.number(),
});

const textRunSchema = z.object({
  text: z.string(),
  fontSize: z.number().nonnegative(),
  fontWeight: z.number(),
  boundingBox: boundingBoxSchema,
});

const textBlockSchema = z.object({
  kind: z.literal('text'),
  role: z.enum(['paragraph', 'heading', 'list_item']),
  boundingBox: boundingBoxSchema,
  runs: z.array(textRunSchema),
  enumerated: z.boolean().optional(),
});

const imageBlockSchema = z.object({
  kind: z.literal('image'),
  boundingBox: boundingBoxSchema,
  imageRef: z.string(),
});

const tableBlockSchema = z.object({
  kind: z.literal('table'),
  boundingBox: boundingBoxSchema,
  structure: z
    .object({
      rows: z.array(z.array(z.string())),
      headerRows: z.number().int().nonnegative(),
      confidence: z.number().min(0).max(1),
    })
    .nullable(),
});

const linkAnnotationSchema = z.object({
  sourceBoundingBox: boundingBoxSchema,
  uri: z.string().optional(),
  targetPageNo: z.number().int().positive().optional(),
  targetTop: z.number().optional(),
  anchorText: z.string().optional(),
});

const pageSchema = z.object({
  pageNo: z.number().int().positive(),
  width: z.number().nonnegative(),
  height: z.number().nonnegative(),
  blocks: z.array(
    z.discriminatedUnion('kind', [
      textBlockSchema,
      imageBlockSchema,
      tableBlockSchema,
    ]),
  ),
  links: z.array(linkAnnotationSchema),
  columnCount: z.number().int().positive().optional(),
});

/**
 * Runtime shape of a ParsedDocument, used to validate cache files before
 * their contents reach the structure resolver
 */
export const parsedDocumentSchema = z.object({
  title: z.string(),
  sourcePath: z.string(),
  pageCount: z.number().int().nonnegative(),
  pages: z.array(pageSchema),
  outline: z.array(
    z.object({
      level: z.number().int().nonnegative(),
      title: z.string(),
      pageNo: z.number().int().positive(),
    }),
  ),
  images: z.record(
    z.string(),
    z.object({
      mimeType: z.string(),
      data: z.string(),
      width: z.number().nonnegative(),
      height: z.number().nonnegative(),
    }),
  ),
});

/**
 * Fixed fields of the cache envelope, checked before the document itself
 */
export const cacheHeaderSchema = z.object({
  schemaVersion: z.number().int(),
  parserVersion: z.string(),
});
