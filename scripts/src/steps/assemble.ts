/**
 * initforge - Image Assembly
 * Runs mkosi in the builder and collects the kernel and initramfs into out/
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { copyFile, mkdir, readdir } from 'fs/promises';
import { join, relative } from 'path';
import { glob } from 'glob';
import type {
  BuildStepResult,
  CollectedArtifacts,
  FileChecksum,
  StepContext,
} from '../types.js';
import { logger } from '../logger.js';
import { archInfo, isCrossBuild } from '../arch.js';
import { getFileSize, runChecked, stepFailure } from '../exec.js';

export interface AssembleResult extends BuildStepResult {
  artifacts?: CollectedArtifacts;
}

export function initramfsName(arch: string): string {
  return `initramfs-${arch}.cpio.zst`;
}

export function kernelName(arch: string): string {
  return `vmlinuz-${arch}`;
}

/**
 * Register binfmt_misc handlers when the target cannot run natively. Failure
 * only warns: mkosi fails on its own if foreign binaries cannot execute.
 */
export async function ensureBinfmt(ctx: StepContext): Promise<boolean> {
  const { config, host } = ctx;

  if (!isCrossBuild(config.hostArch, config.arch)) {
    return false;
  }

  const image = config.settings.builder.binfmtImage;
  logger.info(`Registering binfmt_misc handlers for cross-architecture build (${config.hostArch} -> ${config.arch})...`);

  const result = await host.run(
    config.engine,
    ['run', '--rm', '--privileged', image, '--install', 'all'],
    { stdio: 'ignore' }
  );
  if (result.exitCode !== 0) {
    logger.warn('Could not auto-register binfmt handlers.');
    logger.warn(`Run manually: ${config.engine} run --privileged --rm ${image} --install all`);
  }
  return true;
}

/**
 * Run mkosi in the builder for the configured architecture
 */
export async function runMkosi(ctx: StepContext, args: string[], interactive: boolean = false): Promise<BuildStepResult> {
  const { config, builder } = ctx;
  const startTime = Date.now();

  await ensureBinfmt(ctx);

  try {
    await runChecked(
      builder,
      'mkosi',
      [`--architecture=${archInfo(config.arch).mkosiArch}`, ...args],
      { stdio: 'inherit', interactive }
    );
  } catch (error) {
    return stepFailure(error, startTime);
  }

  return { success: true, duration: Date.now() - startTime };
}

async function sha256File(path: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * SHA-256 of every regular file in the output directory, sorted by name
 */
export async function computeChecksums(outputDir: string): Promise<FileChecksum[]> {
  const entries = await readdir(outputDir, { withFileTypes: true });
  const files = entries
    .filter(entry => entry.isFile())
    .map(entry => join(outputDir, entry.name))
    .sort();

  const checksums: FileChecksum[] = [];
  for (const path of files) {
    checksums.push({ path, sha256: await sha256File(path) });
  }
  return checksums;
}

/**
 * Copy the initramfs and kernel into out/ and print checksums. Missing
 * artifacts only warn; callers must check the returned paths.
 */
export async function collectArtifacts(ctx: StepContext): Promise<CollectedArtifacts> {
  const { config, env } = ctx;

  logger.step('Collecting build artifacts...');
  await mkdir(env.outputDir, { recursive: true });

  const artifacts: CollectedArtifacts = { checksums: [] };

  const [initrdSrc] = (await glob('*.cpio*', { cwd: env.mkosiOutputDir, absolute: true, nodir: true })).sort();
  if (initrdSrc) {
    const dest = join(env.outputDir, initramfsName(config.arch));
    await copyFile(initrdSrc, dest);
    artifacts.initramfs = dest;
    logger.info(`initramfs: ${relative(env.projectRoot, dest)} (${await getFileSize(dest)})`);
  } else {
    logger.warn(`No initramfs CPIO found in ${relative(env.projectRoot, env.mkosiOutputDir)}/`);
  }

  const bootDir = join(env.kernelOutputDir, 'boot');
  const [vmlinuz] = (await glob('vmlinuz-*', { cwd: bootDir, absolute: true, nodir: true })).sort();
  if (vmlinuz) {
    const dest = join(env.outputDir, kernelName(config.arch));
    await copyFile(vmlinuz, dest);
    artifacts.kernel = dest;
    logger.info(`kernel: ${relative(env.projectRoot, dest)} (${await getFileSize(dest)})`);
  } else {
    logger.warn(`No kernel image found in ${relative(env.projectRoot, bootDir)}/`);
  }

  artifacts.checksums = await computeChecksums(env.outputDir);
  if (artifacts.checksums.length > 0) {
    logger.info('Checksums:');
    for (const { path, sha256 } of artifacts.checksums) {
      console.log(`  ${sha256}  ${relative(env.projectRoot, path)}`);
    }
  }

  return artifacts;
}

/**
 * mkosi build followed by artifact collection
 */
export async function assembleImage(ctx: StepContext, mkosiArgs: string[] = []): Promise<AssembleResult> {
  const startTime = Date.now();

  const mkosi = await runMkosi(ctx, ['build', ...mkosiArgs]);
  if (!mkosi.success) {
    return mkosi;
  }

  try {
    const artifacts = await collectArtifacts(ctx);
    return { success: true, duration: Date.now() - startTime, artifacts };
  } catch (error) {
    return stepFailure(error, startTime);
  }
}
