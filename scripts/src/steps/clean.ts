/**
 * initforge - Clean
 */

import { rm } from 'fs/promises';
import { existsSync } from 'fs';
import { posix } from 'path';
import type { BuildStepResult, StepContext } from '../types.js';
import { logger } from '../logger.js';
import { toBuilderPath } from '../env.js';
import { runChecked, stepFailure } from '../exec.js';

/**
 * Paths removed inside the helper container. The default keeps the kernel
 * and tool tree in mkosi.output/kernel; `all` removes it too.
 */
export function cleanTargets(ctx: StepContext, all: boolean): string[] {
  const { env } = ctx;
  const mkosiOutput = toBuilderPath(env, env.mkosiOutputDir);
  const mkosiCache = toBuilderPath(env, env.mkosiCacheDir);

  return all
    ? [mkosiOutput, mkosiCache]
    : [posix.join(mkosiOutput, 'image*'), mkosiCache];
}

/**
 * Remove build artifacts. mkosi leaves root-owned files behind, so those are
 * deleted from a throwaway container.
 */
export async function cleanArtifacts(ctx: StepContext, all: boolean = false): Promise<BuildStepResult> {
  const { config, env, host } = ctx;
  const startTime = Date.now();

  logger.section('Cleaning Build Artifacts');

  try {
    if (existsSync(env.mkosiOutputDir) || existsSync(env.mkosiCacheDir)) {
      const targets = cleanTargets(ctx, all);
      logger.step(`Removing ${targets.join(' ')}...`);
      await runChecked(host, config.engine, [
        'run', '--rm',
        '-v', `${env.projectRoot}:${env.builderRoot}`,
        '-w', env.builderRoot,
        config.settings.builder.cleanImage,
        'sh', '-c', `rm -rf ${targets.join(' ')}`,
      ], { stdio: 'inherit' });
    }

    logger.step('Removing output directory...');
    await rm(env.outputDir, { recursive: true, force: true });
  } catch (error) {
    return stepFailure(error, startTime);
  }

  logger.success('Clean complete');

  return {
    success: true,
    duration: Date.now() - startTime,
  };
}
