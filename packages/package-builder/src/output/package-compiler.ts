import type { LoggerMethods } from '@bookpack/logger';
import type { SpawnResult } from '@bookpack/shared';

import type { CompileOptions } from '../config/conversion-options';

import { spawnAsync } from '@bookpack/shared';
import { join, resolve } from 'node:path';

import { PACKAGE_OUTPUT } from '../config/constants';
import { PackageCompileError } from '../errors/conversion-errors';

/**
 * PackageCompiler
 *
 * Hands a written package to the external compiler command. `{sources}`,
 * `{output}` and `{package}` in the configured arguments are replaced with
 * the sources directory, the compiled output path and the package directory.
 */
export class PackageCompiler {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly spawn: typeof spawnAsync = spawnAsync,
  ) {}

  /**
   * @throws {PackageCompileError} when the command exits with a non-zero code
   */
  async compile(
    packageDir: string,
    options: CompileOptions,
  ): Promise<SpawnResult> {
    const placeholders: Record<string, string> = {
      '{sources}': join(packageDir, PACKAGE_OUTPUT.SOURCES_DIRECTORY),
      '{output}': resolve(packageDir, options.output),
      '{package}': packageDir,
    };
    const args = options.args.map((arg) =>
      arg.replace(
        /\{(?:sources|output|package)\}/g,
        (placeholder) => placeholders[placeholder] ?? placeholder,
      ),
    );

    this.logger.info(
      `[PackageCompiler] Running ${options.command} ${args.join(' ')}`,
    );
    const result = await this.spawn(options.command, args, {
      cwd: packageDir,
      timeoutMs: options.timeoutMs,
    });

    if (result.code !== 0) {
      throw new PackageCompileError(
        `Package compiler exited with code ${result.code}: ${result.stderr.trim()}`,
        result.code,
        result.stderr,
      );
    }

    this.logger.info(`[PackageCompiler] Compiled ${placeholders['{output}']}`);
    return result;
  }
}
