import type { LoggerMethods } from '@bookpack/logger';
import type { ContainerEntry, RunReport } from '@bookpack/model';

import type { AssetSink } from '../content/content-pipeline';

import { mkdir, mkdtemp, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';

import { PACKAGE_OUTPUT } from '../config/constants';
import { slugify } from '../utils/slug';

/**
 * A package being assembled in a staging directory beside its final location
 */
export interface StagedPackage extends AssetSink {
  readonly outputDir: string;
  readonly stagingDir: string;
}

export interface WrittenPackage {
  outputDir: string;
  sources: string[];
}

/**
 * File name of a container entry's source document
 */
export function sourceFileName(entry: ContainerEntry): string {
  const position = String(
    Math.floor(entry.sort / PACKAGE_OUTPUT.SORT_STEP),
  ).padStart(2, '0');
  return `${position}-${slugify(entry.name)}-${entry.id}.json`;
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, PACKAGE_OUTPUT.JSON_INDENT)}\n`;
}

/**
 * PackageWriter
 *
 * Writes the package directory:
 *
 * ```
 * <out>/sources/<NN>-<slug>-<id>.json   one per container entry
 * <out>/assets/...                      extracted images and table renders
 * <out>/report.json                     run report
 * ```
 *
 * Everything goes into `<out>.staging-*` first and is renamed into place by
 * `commit`, so a failed run leaves no partial package behind.
 */
export class PackageWriter {
  constructor(private readonly logger: LoggerMethods) {}

  async begin(outputDir: string): Promise<StagedPackage> {
    const target = resolve(outputDir);
    await mkdir(dirname(target), { recursive: true });
    const stagingDir = await mkdtemp(`${target}.staging-`);

    this.logger.debug(
      `[PackageWriter] Staging ${basename(target)} in ${stagingDir}`,
    );

    return {
      outputDir: target,
      stagingDir,
      write: async (relativePath, data) => {
        const file = join(stagingDir, relativePath);
        await mkdir(dirname(file), { recursive: true });
        await writeFile(file, data);
      },
    };
  }

  async commit(
    staged: StagedPackage,
    entries: readonly ContainerEntry[],
    report: RunReport,
  ): Promise<WrittenPackage> {
    const sourcesDir = join(
      staged.stagingDir,
      PACKAGE_OUTPUT.SOURCES_DIRECTORY,
    );
    await mkdir(sourcesDir, { recursive: true });

    const sources: string[] = [];
    for (const entry of entries) {
      const name = sourceFileName(entry);
      await writeFile(join(sourcesDir, name), toJson(entry));
      sources.push(`${PACKAGE_OUTPUT.SOURCES_DIRECTORY}/${name}`);
    }
    await writeFile(
      join(staged.stagingDir, PACKAGE_OUTPUT.REPORT_FILE),
      toJson(report),
    );

    await rm(staged.outputDir, { recursive: true, force: true });
    await rename(staged.stagingDir, staged.outputDir);

    this.logger.info(
      `[PackageWriter] Wrote ${sources.length} source documents to ${staged.outputDir}`,
    );
    return { outputDir: staged.outputDir, sources };
  }

  async discard(staged: StagedPackage): Promise<void> {
    await rm(staged.stagingDir, { recursive: true, force: true });
    this.logger.debug(`[PackageWriter] Discarded ${staged.stagingDir}`);
  }
}
