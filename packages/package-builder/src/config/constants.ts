/**
 * Configuration constants for IdentityAllocator
 */
export const IDENTITY = {
  /**
   * Separator placed between path-key segments before hashing
   */
  SEPARATOR: '|',

  /**
   * Number of hex characters kept from the digest
   */
  HEX_LENGTH: 16,
} as const;

/**
 * Heading heuristic thresholds (used when the document has no outline)
 */
export const HEADING_HEURISTIC = {
  /**
   * A font size counts as a heading size at this multiple of the body size
   */
  SIZE_RATIO: 1.15,

  /**
   * Number of distinct heading levels produced
   */
  MAX_LEVELS: 3,

  /**
   * Minimum font weight treated as bold
   */
  BOLD_WEIGHT: 700,

  /**
   * Text longer than this is never a heading
   */
  MAX_HEADING_CHARS: 120,
} as const;

/**
 * Column detection thresholds for pages without a parser-supplied layout
 */
export const COLUMN_DETECTION = {
  /**
   * Pages with fewer text blocks are treated as single-column
   */
  MIN_BLOCKS: 4,

  /**
   * Required gap between column centers, as a share of the center spread
   */
  MIN_GAP_SCORE: 0.3,

  /**
   * Required share of blocks on the smaller side of the split
   */
  MIN_BALANCE: 0.3,
} as const;

export const STRUCTURE = {
  FRONT_MATTER_TITLE: 'Front Matter',
} as const;

/**
 * Asset naming
 */
export const ASSETS = {
  DIRECTORY: 'assets',
  SEQUENCE_DIGITS: 4,
} as const;

/**
 * Package output layout
 */
export const PACKAGE_OUTPUT = {
  /**
   * Gap between consecutive sort values, leaving room for manual inserts
   */
  SORT_STEP: 1000,

  /**
   * Deepest display level of a content unit
   */
  MAX_UNIT_LEVEL: 3,

  SOURCES_DIRECTORY: 'sources',

  REPORT_FILE: 'report.json',

  JSON_INDENT: 2,

  /**
   * Class of the root element wrapping every unit's content
   */
  UNIT_ROOT_CLASS: 'bookpack',

  /**
   * Installed packages serve their assets from `modules/<packageId>/`
   */
  MODULE_ROOT: 'modules',
} as const;

/**
 * Run report sampling
 */
export const REPORT = {
  /**
   * Representative samples kept per category
   */
  MAX_SAMPLES: 5,
} as const;
