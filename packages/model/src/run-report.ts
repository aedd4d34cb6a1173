import type { CacheSafeFeature } from './pipeline-options';

/**
 * Record of an automatic reduction of parallelism or a disabled feature
 */
export interface SchedulingDowngrade {
  setting: 'workers' | CacheSafeFeature;
  reason: string;
  from: number | boolean;
  to: number | boolean;
}

export interface ExecutionPlan {
  requestedWorkers: number;
  effectiveWorkers: number;
  disabledFeatures: CacheSafeFeature[];
  decisions: SchedulingDowngrade[];
}

export type ContentWarningKind =
  | 'table-fallback'
  | 'table-dropped'
  | 'ocr-skipped'
  | 'caption-skipped'
  | 'image-dropped';

/**
 * Non-fatal content condition, recorded per page
 */
export interface ContentWarning {
  kind: ContentWarningKind;
  pageNo: number;
  message: string;
}

/**
 * Unresolved reference, kept as plain text in the output
 */
export interface LinkResolutionWarning {
  origin: 'annotation' | 'text';
  pageNo: number;
  sectionId: string;
  label: string;
  reason: string;
}

export interface SampledCount<T> {
  count: number;
  samples: T[];
}

export interface RunReport {
  source: 'cache' | 'parser';
  structureMode: 'outline' | 'heuristic';
  plan: ExecutionPlan;
  chapters: number;
  sections: number;
  blocks: number;
  tables: {
    structured: number;
    rasterized: number;
    fallbacks: number;
  };
  ocr: {
    pagesProcessed: number;
    pagesSkipped: number;
  };
  captions: {
    captioned: number;
    skipped: number;
  };
  unresolvedLinks: SampledCount<LinkResolutionWarning>;
  warnings: SampledCount<ContentWarning>;
  notices: string[];
}
