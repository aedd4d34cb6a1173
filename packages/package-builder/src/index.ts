export {
  PackageProcessor,
  type PackageProcessorOptions,
  type PackageResult,
} from './package-processor';
export {
  conversionOptionsSchema,
  parseConversionOptions,
  type CompileOptions,
  type ConversionOptions,
  type ConversionOptionsInput,
} from './config/conversion-options';
export { PACKAGE_OUTPUT, REPORT } from './config/constants';
export {
  ContentExtractionError,
  PackageCompileError,
  StructureError,
} from './errors/conversion-errors';
export {
  createIdAllocator,
  type IdAllocatorOptions,
  type IdentityAllocator,
} from './utils/id-allocator';
export { slugify } from './utils/slug';
export {
  StructureResolver,
  type ResolvedStructure,
  type StructureMode,
} from './structure/structure-resolver';
export { SectionIndex, type SectionRef } from './structure/section-index';
export {
  createContentCaches,
  type ContentCaches,
} from './content/content-caches';
export {
  ContentPipeline,
  type AssetSink,
  type ExtractionContext,
  type ExtractionResult,
  type PageExtraction,
} from './content/content-pipeline';
export {
  LinkResolver,
  type LinkResolutionResult,
  type LinkResolutionStats,
} from './links/link-resolver';
export {
  WorkerScheduler,
  type FeatureFlags,
} from './scheduling/worker-scheduler';
export {
  ModuleMapper,
  type MappingOptions,
  type MappingResult,
} from './mapping/module-mapper';
export { renderBlocks, type RenderOptions } from './mapping/markup';
export { moduleAssetPath, wrapUnitHtml } from './mapping/html-wrap';
export {
  PackageWriter,
  sourceFileName,
  type StagedPackage,
  type WrittenPackage,
} from './output/package-writer';
export { PackageCompiler } from './output/package-compiler';
export { RunReportBuilder } from './report/run-report-builder';
