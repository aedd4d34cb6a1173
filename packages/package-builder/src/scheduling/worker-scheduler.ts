import type { LoggerMethods } from '@bookpack/logger';
import type {
  CacheSafeFeature,
  Capabilities,
  ExecutionPlan,
  SchedulingDowngrade,
} from '@bookpack/model';

export interface FeatureFlags {
  ocr: boolean;
  captions: boolean;
}

/**
 * WorkerScheduler
 *
 * Decides how many page tasks run at once and which features stay on.
 * Rules apply in order:
 *
 * 1. Backends without parallel extraction run on one worker.
 * 2. OCR and captioning are switched off when more than one worker remains,
 *    since their result caches are not safe to fill concurrently.
 * 3. The worker count never exceeds the number of selected pages.
 *
 * Every change is recorded as a downgrade; planning never fails.
 */
export class WorkerScheduler {
  constructor(private readonly logger: LoggerMethods) {}

  plan(
    requestedWorkers: number,
    capabilities: Capabilities,
    features: FeatureFlags,
    pageCount: number,
  ): ExecutionPlan {
    const decisions: SchedulingDowngrade[] = [];
    const disabledFeatures: CacheSafeFeature[] = [];
    let workers = Math.max(1, Math.floor(requestedWorkers));

    if (workers > 1 && !capabilities.supportsParallelExtraction) {
      decisions.push({
        setting: 'workers',
        reason: 'backend does not support parallel page extraction',
        from: workers,
        to: 1,
      });
      workers = 1;
    }

    if (workers > 1) {
      for (const feature of ['ocr', 'captions'] as const) {
        if (features[feature]) {
          disabledFeatures.push(feature);
          decisions.push({
            setting: feature,
            reason: `${feature} caches are unsafe under ${workers} workers`,
            from: true,
            to: false,
          });
        }
      }
    }

    const pages = Math.max(1, pageCount);
    if (workers > pages) {
      decisions.push({
        setting: 'workers',
        reason: `only ${pageCount} page(s) selected`,
        from: workers,
        to: pages,
      });
      workers = pages;
    }

    for (const decision of decisions) {
      this.logger.info(
        `[WorkerScheduler] ${decision.setting}: ${String(decision.from)} -> ${String(decision.to)} (${decision.reason})`,
      );
    }

    return {
      requestedWorkers,
      effectiveWorkers: workers,
      disabledFeatures,
      decisions,
    };
  }
}
