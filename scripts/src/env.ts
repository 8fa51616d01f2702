/**
 * initforge - Build Environment
 * Resolves build directories and maps host paths into the builder container
 */

import { isAbsolute, join, posix, relative, resolve, sep } from 'path';
import type { BuildConfig, BuildEnvironment } from './types.js';

/**
 * Initialize build environment with all paths
 */
export function createBuildEnvironment(projectRoot: string, config: BuildConfig): BuildEnvironment {
  const root = resolve(projectRoot);
  const { builder, output } = config.settings;

  const mkosiOutputDir = join(root, output.mkosiOutput);
  const mkosiCacheDir = join(root, output.mkosiCache);

  return {
    projectRoot: root,
    configDir: join(root, 'config'),
    definitionFile: join(root, builder.definition),
    outputDir: join(root, output.dir),
    mkosiOutputDir,
    mkosiCacheDir,
    kernelOutputDir: join(mkosiOutputDir, 'kernel'),
    kernelBuildDir: join(mkosiCacheDir, 'kernel-build'),
    downloadDir: join(mkosiCacheDir, 'downloads'),

    builderRoot: builder.mount,
    kernelSrcMount: posix.join(builder.mount, 'kernel-src'),
  };
}

/**
 * Translate a host path below the project root into its path inside the
 * builder container
 */
export function toBuilderPath(env: BuildEnvironment, hostPath: string): string {
  const rel = relative(env.projectRoot, resolve(hostPath));
  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw new Error(`${hostPath} is outside the project root ${env.projectRoot}`);
  }
  return posix.join(env.builderRoot, ...rel.split(sep).filter(Boolean));
}

/**
 * Inverse of toBuilderPath
 */
export function fromBuilderPath(env: BuildEnvironment, builderPath: string): string {
  const rel = posix.relative(env.builderRoot, builderPath);
  if (rel.startsWith('..') || posix.isAbsolute(rel)) {
    throw new Error(`${builderPath} is outside the builder mount ${env.builderRoot}`);
  }
  return join(env.projectRoot, ...rel.split('/').filter(Boolean));
}
