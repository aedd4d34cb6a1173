import type {
  Capabilities,
  ContentModeOptions,
  ParsedTableStructure,
} from '@bookpack/model';

type TablePolicyOptions = Pick<
  ContentModeOptions,
  'tableMode' | 'tableConfidenceThreshold' | 'lowConfidenceRasterThreshold'
>;

/**
 * How one table region is emitted. `fallbackReason` is set whenever the
 * preferred form could not be used.
 */
export type TableDecision =
  | {
      render: 'structured';
      structure: ParsedTableStructure;
      rasterCopy: boolean;
      fallbackReason?: string;
    }
  | { render: 'raster'; fallbackReason?: string }
  | { render: 'drop'; reason: string };

function preferredForm(
  structure: ParsedTableStructure | null,
  options: TablePolicyOptions,
  capabilities: Capabilities,
): TableDecision {
  if (options.tableMode === 'image-only') {
    return { render: 'raster' };
  }
  if (!capabilities.supportsStructuredTables) {
    return {
      render: 'raster',
      fallbackReason: 'parser does not provide table structure',
    };
  }
  if (!structure || structure.rows.length === 0) {
    return { render: 'raster', fallbackReason: 'no table structure detected' };
  }
  if (
    options.tableMode === 'auto' &&
    structure.confidence < options.tableConfidenceThreshold
  ) {
    return {
      render: 'raster',
      fallbackReason: `structure confidence ${structure.confidence} below ${options.tableConfidenceThreshold}`,
    };
  }
  return {
    render: 'structured',
    structure,
    rasterCopy:
      options.tableMode === 'structured' &&
      structure.confidence < options.lowConfidenceRasterThreshold,
  };
}

/**
 * Choose between structured cells and a rasterized image for a table.
 *
 * - `image-only` always rasterizes.
 * - `auto` keeps the structure when its confidence reaches
 *   `tableConfidenceThreshold` and rasterizes otherwise.
 * - `structured` keeps any structure, adding a raster copy when confidence is
 *   under `lowConfidenceRasterThreshold`, and rasterizes when there is none.
 *
 * Without region rendering a raster decision falls back to the structure when
 * there is one, and drops the table when there is not.
 */
export function decideTable(
  structure: ParsedTableStructure | null,
  options: TablePolicyOptions,
  capabilities: Capabilities,
): TableDecision {
  const decision = preferredForm(structure, options, capabilities);
  if (capabilities.supportsRegionRendering) {
    return decision;
  }

  if (decision.render === 'structured') {
    return { ...decision, rasterCopy: false };
  }
  if (structure && structure.rows.length > 0) {
    return {
      render: 'structured',
      structure,
      rasterCopy: false,
      fallbackReason: 'region rendering unavailable; kept detected structure',
    };
  }
  return {
    render: 'drop',
    reason: 'no table structure and region rendering unavailable',
  };
}
