import type {
  ContentBlock,
  ImageBlock,
  LinkReference,
  StructuredTableBlock,
  TextBlock,
} from '@bookpack/model';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

// Braces delimit the label inside content-link markup
function linkLabel(label: string): string {
  return escapeHtml(label).replace(/[{}]/g, '');
}

/**
 * Markup for a usable link; null for references that render as plain text
 */
export function linkMarkup(reference: LinkReference): string | null {
  switch (reference.kind) {
    case 'resolved':
      return reference.targetSectionId
        ? `@UUID[JournalEntry.${reference.targetChapterId}.JournalEntryPage.${reference.targetSectionId}]{${linkLabel(reference.label)}}`
        : `@UUID[JournalEntry.${reference.targetChapterId}]{${linkLabel(reference.label)}}`;
    case 'external':
      return `<a href="${escapeHtml(reference.uri)}">${escapeHtml(reference.label)}</a>`;
    case 'unresolved':
      return null;
  }
}

interface Replacement {
  start: number;
  end: number;
  markup: string;
}

/**
 * Escape a text and weave link markup into it.
 *
 * Each link replaces the first free occurrence of its label; links whose
 * label is not in the text are appended after it.
 */
export function renderInline(
  text: string,
  links: readonly LinkReference[],
): string {
  const replacements: Replacement[] = [];
  const appended: string[] = [];

  for (const link of links) {
    const markup = linkMarkup(link);
    if (markup === null) {
      continue;
    }

    const start = findFree(text, link.label, replacements);
    if (start < 0) {
      appended.push(markup);
    } else {
      replacements.push({ start, end: start + link.label.length, markup });
    }
  }

  replacements.sort((a, b) => a.start - b.start);
  let html = '';
  let cursor = 0;
  for (const replacement of replacements) {
    html += escapeHtml(text.slice(cursor, replacement.start)) + replacement.markup;
    cursor = replacement.end;
  }
  html += escapeHtml(text.slice(cursor));

  return appended.length > 0 ? `${html} ${appended.join(' ')}` : html;
}

function findFree(
  text: string,
  label: string,
  taken: readonly Replacement[],
): number {
  if (!label) {
    return -1;
  }
  let start = text.indexOf(label);
  while (start >= 0) {
    const end = start + label.length;
    if (taken.every((range) => end <= range.start || start >= range.end)) {
      return start;
    }
    start = text.indexOf(label, start + 1);
  }
  return -1;
}

function renderText(block: TextBlock): string {
  const inner = renderInline(block.text, block.links);
  const ocr = block.ocr ? ' data-ocr="true"' : '';

  if (block.role === 'heading') {
    const level = Math.min(6, Math.max(1, block.level ?? 1));
    return `<h${level}${ocr}>${inner}</h${level}>`;
  }
  if (block.role === 'list_item') {
    return `<li${ocr}>${inner}</li>`;
  }
  return `<p${ocr}>${inner}</p>`;
}

export interface RenderOptions {
  /**
   * Maps a package-relative asset path to the `src` written into content
   */
  assetSrc?: (assetPath: string) => string;
}

function renderImage(block: ImageBlock, options: RenderOptions): string {
  const alt = escapeHtml(block.caption ?? '');
  const src = options.assetSrc?.(block.assetPath) ?? block.assetPath;
  const img = `<img src="${escapeHtml(src)}" alt="${alt}">`;
  const caption = block.caption
    ? `<figcaption>${escapeHtml(block.caption)}</figcaption>`
    : '';
  const kind = block.origin === 'table' ? ' data-table="true"' : '';
  return `<figure${kind}>${img}${caption}</figure>`;
}

function renderTable(
  block: StructuredTableBlock,
  options: RenderOptions,
): string {
  const row = (cells: string[], tag: 'th' | 'td'): string =>
    `<tr>${cells.map((cell) => `<${tag}>${escapeHtml(cell)}</${tag}>`).join('')}</tr>`;

  const head = block.rows.slice(0, block.headerRows);
  const body = block.rows.slice(block.headerRows);
  const thead =
    head.length > 0
      ? `<thead>${head.map((cells) => row(cells, 'th')).join('')}</thead>`
      : '';
  const tbody = `<tbody>${body.map((cells) => row(cells, 'td')).join('')}</tbody>`;
  const rasterPath = block.rasterAssetPath;
  const raster = rasterPath
    ? `<img src="${escapeHtml(options.assetSrc?.(rasterPath) ?? rasterPath)}" alt="" data-table="true">`
    : '';
  return `<table>${thead}${tbody}</table>${raster}`;
}

function renderBlock(block: ContentBlock, options: RenderOptions): string {
  switch (block.kind) {
    case 'text':
      return renderText(block);
    case 'image':
      return renderImage(block, options);
    case 'table':
      return renderTable(block, options);
    case 'link': {
      const markup = block.link ? linkMarkup(block.link) : null;
      return markup ? `<p>${markup}</p>` : '';
    }
  }
}

function listKind(block: ContentBlock): 'ol' | 'ul' | null {
  if (block.kind !== 'text' || block.role !== 'list_item') {
    return null;
  }
  return block.enumerated ? 'ol' : 'ul';
}

/**
 * HTML content of a unit. Consecutive list items of the same kind share one
 * `<ul>` or `<ol>`.
 */
export function renderBlocks(
  blocks: readonly ContentBlock[],
  options: RenderOptions = {},
): string {
  const parts: string[] = [];
  let openList: 'ol' | 'ul' | null = null;

  for (const block of blocks) {
    const list = listKind(block);
    if (list !== openList) {
      if (openList) {
        parts.push(`</${openList}>`);
      }
      if (list) {
        parts.push(`<${list}>`);
      }
      openList = list;
    }

    const html = renderBlock(block, options);
    if (html) {
      parts.push(html);
    }
  }
  if (openList) {
    parts.push(`</${openList}>`);
  }

  return parts.join('\n');
}
