/**
 * initforge - Kernel Builder
 *
 * Compiles the kernel inside the builder container and installs it, with its
 * modules, into mkosi.output/kernel where mkosi picks it up as an extra tree.
 * The output tree is wiped and regenerated on every build; a tree that
 * already holds installed modules is left alone unless FORCE_KERNEL is set.
 */

import { posix, join } from 'path';
import { existsSync } from 'fs';
import { readdir } from 'fs/promises';
import { glob } from 'glob';
import type { BuildEnvironment, BuildStepResult, ExecOptions, KernelOutput, StepContext } from '../types.js';
import { logger } from '../logger.js';
import { archInfo } from '../arch.js';
import { toBuilderPath } from '../env.js';
import { getFileSize, runChecked, stepFailure } from '../exec.js';

// Modules per strip invocation
const STRIP_BATCH = 200;

export interface KernelBuildResult extends BuildStepResult {
  kernel?: KernelOutput;
}

/**
 * Expand {major} and {version} in the tarball URL template
 */
export function kernelTarballUrl(template: string, version: string): string {
  const major = version.split('.')[0];
  return template.replaceAll('{major}', major).replaceAll('{version}', version);
}

export function installedModulesDir(env: BuildEnvironment): string {
  return join(env.kernelOutputDir, 'usr', 'lib', 'modules');
}

function stagingUsrDir(env: BuildEnvironment): string {
  return join(env.kernelOutputDir, 'usr.tmp');
}

/**
 * A kernel counts as built once its modules are installed
 */
export function isKernelBuilt(env: BuildEnvironment): boolean {
  return existsSync(installedModulesDir(env));
}

function kernelOutputFor(env: BuildEnvironment, release: string): KernelOutput {
  const modulesDir = join(installedModulesDir(env), release);
  return {
    release,
    outputDir: env.kernelOutputDir,
    modulesDir,
    imagePath: join(modulesDir, 'vmlinuz'),
    bootImagePath: join(env.kernelOutputDir, 'boot', `vmlinuz-${release}`),
  };
}

/**
 * Describe a kernel left by a previous build
 */
export async function readExistingKernel(env: BuildEnvironment): Promise<KernelOutput | undefined> {
  const entries = await readdir(installedModulesDir(env), { withFileTypes: true });
  const release = entries
    .filter(entry => entry.isDirectory())
    .map(entry => entry.name)
    .sort()[0];
  return release ? kernelOutputFor(env, release) : undefined;
}

/**
 * Build the kernel unless it is already built
 */
export async function buildKernel(ctx: StepContext): Promise<KernelBuildResult> {
  const { config, env } = ctx;
  const startTime = Date.now();

  try {
    if (isKernelBuilt(env) && !config.forceKernel) {
      logger.info('Kernel already built (set FORCE_KERNEL=1 to rebuild)');
      return {
        success: true,
        duration: Date.now() - startTime,
        skipped: true,
        kernel: await readExistingKernel(env),
      };
    }

    logger.section(`Building Linux ${config.kernelVersion} (${config.arch})`);
    const kernel = await compileKernel(ctx);

    return {
      success: true,
      duration: Date.now() - startTime,
      kernel,
    };
  } catch (error) {
    return stepFailure(error, startTime);
  }
}

async function compileKernel(ctx: StepContext): Promise<KernelOutput> {
  const { config, env, builder } = ctx;
  const arch = archInfo(config.arch);
  const inBuilder = (path: string): string => toBuilderPath(env, path);

  // Full recreation, never an incremental update
  await runChecked(builder, 'rm', ['-rf', inBuilder(env.kernelOutputDir)]);
  await runChecked(builder, 'mkdir', ['-p', inBuilder(env.kernelBuildDir), inBuilder(env.kernelOutputDir)]);

  const srcDir = await prepareSource(ctx);

  const make = (args: string[], options: ExecOptions = {}) => {
    const makeArgs = [`ARCH=${arch.kernelArch}`];
    if (arch.crossCompile) {
      makeArgs.push(`CROSS_COMPILE=${arch.crossCompile}`);
    }
    return runChecked(builder, 'make', [...makeArgs, ...args], {
      cwd: inBuilder(srcDir),
      stdio: 'inherit',
      ...options,
    });
  };

  // Configuration
  const fragment = join(env.configDir, `defconfig.${config.arch}`);
  if (existsSync(fragment)) {
    logger.step(`Using defconfig: ${fragment}`);
    await runChecked(builder, 'cp', [inBuilder(fragment), inBuilder(join(srcDir, '.config'))]);
    await make(['olddefconfig']);

    const resolved = join(env.configDir, `.config.resolved.${config.arch}`);
    await runChecked(builder, 'cp', [inBuilder(join(srcDir, '.config')), inBuilder(resolved)]);
    logger.detail(`Resolved config saved to ${resolved}`);
  } else {
    logger.step(`No defconfig found at ${fragment}, using default`);
    await make(['defconfig']);
  }

  if (arch.kernelArch === 'x86_64') {
    const size = config.settings.kernel.commandLineSize;
    logger.step(`Setting COMMAND_LINE_SIZE to ${size} (x86_64)...`);
    await runChecked(builder, 'sed', [
      '-i', '-E',
      `s/#define COMMAND_LINE_SIZE[[:space:]]+[0-9]+/#define COMMAND_LINE_SIZE ${size}/`,
      'arch/x86/include/asm/setup.h',
    ], { cwd: inBuilder(srcDir) });
  }

  logger.step(`Building kernel with ${config.jobs} jobs...`);
  await make([`-j${config.jobs}`, arch.makeTarget, 'modules']);

  const release = (await make(['-s', 'kernelrelease'], { stdio: 'pipe' })).stdout.trim();
  if (!release) {
    throw new Error('make kernelrelease returned an empty version');
  }
  logger.info(`Built kernel version: ${release}`);

  logger.step('Installing modules...');
  await make([`INSTALL_MOD_PATH=${inBuilder(env.kernelOutputDir)}`, 'modules_install']);

  await stripModules(ctx, `${arch.crossCompile}strip`);

  // build/source links point into the build host's tree
  const legacyDir = join(env.kernelOutputDir, 'lib', 'modules', release);
  await runChecked(builder, 'rm', ['-f', inBuilder(join(legacyDir, 'build')), inBuilder(join(legacyDir, 'source'))]);

  // mkosi expects merged-usr: /usr/lib/modules/<release>/vmlinuz. The tree
  // is assembled under usr.tmp and only renamed to usr once complete, since
  // usr/lib/modules marks the kernel as built.
  const kernel = kernelOutputFor(env, release);
  const staging = stagingUsrDir(env);
  const stagedModules = join(staging, 'lib', 'modules', release);
  const stagedImage = join(stagedModules, 'vmlinuz');

  await runChecked(builder, 'mkdir', ['-p', inBuilder(stagedModules)]);
  if (existsSync(legacyDir)) {
    await runChecked(builder, 'cp', ['-a', `${inBuilder(legacyDir)}/.`, `${inBuilder(stagedModules)}/`]);
    await runChecked(builder, 'rm', ['-rf', inBuilder(join(env.kernelOutputDir, 'lib'))]);
  }

  await runChecked(builder, 'cp', [inBuilder(join(srcDir, arch.kernelImage)), inBuilder(stagedImage)]);
  await runChecked(builder, 'mkdir', ['-p', inBuilder(join(env.kernelOutputDir, 'boot'))]);
  await runChecked(builder, 'cp', [inBuilder(stagedImage), inBuilder(kernel.bootImagePath)]);
  await runChecked(builder, 'mv', [inBuilder(staging), inBuilder(join(env.kernelOutputDir, 'usr'))]);

  logger.success('Kernel build complete');
  logger.detail(`Image:   ${kernel.imagePath} (${await getFileSize(kernel.imagePath)})`);
  logger.detail(`Modules: ${kernel.modulesDir}`);
  logger.detail(`Version: ${release}`);

  return kernel;
}

/**
 * Resolve the source tree to build from. A local tree is mirrored into the
 * scratch area so the caller's copy is never written to.
 */
async function prepareSource(ctx: StepContext): Promise<string> {
  const { config, env, builder } = ctx;
  const inBuilder = (path: string): string => toBuilderPath(env, path);

  if (config.kernelSrc) {
    const mirror = join(env.kernelBuildDir, 'linux-local');
    logger.step(`Using provided kernel source at ${config.kernelSrc}`);
    await runChecked(
      builder,
      'rsync',
      ['-a', '--delete', `${env.kernelSrcMount}/`, `${inBuilder(mirror)}/`],
      { stdio: 'inherit' }
    );
    return mirror;
  }

  const srcDir = join(env.kernelBuildDir, `linux-${config.kernelVersion}`);
  if (existsSync(srcDir)) {
    logger.step(`Using cached kernel source at ${srcDir}`);
    return srcDir;
  }

  const url = kernelTarballUrl(config.settings.kernel.url, config.kernelVersion);
  const tarball = join(env.kernelBuildDir, posix.basename(url));

  logger.step(`Downloading kernel ${config.kernelVersion}...`);
  await runChecked(builder, 'curl', ['-fsSL', url, '-o', inBuilder(tarball)], { stdio: 'inherit' });

  logger.step('Extracting kernel source...');
  await runChecked(builder, 'tar', ['-xf', inBuilder(tarball), '-C', inBuilder(env.kernelBuildDir)]);
  await runChecked(builder, 'rm', ['-f', inBuilder(tarball)]);

  return srcDir;
}

/**
 * Strip debug symbols from every installed module
 */
async function stripModules(ctx: StepContext, strip: string): Promise<void> {
  const { env, builder } = ctx;

  const modules = (await glob('**/*.ko', { cwd: env.kernelOutputDir, absolute: true, nodir: true })).sort();
  logger.step(`Stripping debug symbols from ${modules.length} modules...`);

  for (let i = 0; i < modules.length; i += STRIP_BATCH) {
    const batch = modules.slice(i, i + STRIP_BATCH).map(path => toBuilderPath(env, path));
    await runChecked(builder, strip, ['--strip-unneeded', ...batch]);
  }
}
