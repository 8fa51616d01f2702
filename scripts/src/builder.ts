/**
 * initforge - Main Builder
 * Orchestrates the build pipeline and the auxiliary commands
 */

import { relative } from 'path';
import type {
  BuildConfig,
  BuildEnvironment,
  BuildStepResult,
  CommandRunner,
  StepContext,
} from './types.js';
import { createBuildConfig, loadBuildSettings } from './config.js';
import type { ConfigOverrides } from './config.js';
import { createBuildEnvironment } from './env.js';
import { logger } from './logger.js';
import { BuilderRunner, getFileSize, HostRunner, timedStep } from './exec.js';
import { runQemuTest } from './qemu.js';
import {
  assembleImage,
  buildKernel,
  cleanArtifacts,
  ensureBuilderImage,
  fetchTools,
  runMkosi,
} from './steps/index.js';

export interface BuilderRunners {
  host?: CommandRunner;
  builder?: CommandRunner;
}

/**
 * Process exit status for a finished command. A failed external command
 * keeps its own exit code.
 */
export function exitCodeFor(result: BuildStepResult): number {
  if (result.success) return 0;
  return result.exitCode !== undefined && result.exitCode !== 0 ? result.exitCode : 1;
}

export class Builder {
  private readonly ctx: StepContext;

  constructor(config: BuildConfig, env: BuildEnvironment, runners: BuilderRunners = {}) {
    const host = runners.host ?? new HostRunner();
    this.ctx = {
      config,
      env,
      host,
      builder: runners.builder ?? new BuilderRunner(host, config, env),
    };
  }

  /**
   * Load config/build.yaml and the environment for a project
   */
  static async create(
    projectRoot: string,
    source: NodeJS.ProcessEnv = process.env,
    overrides: ConfigOverrides = {}
  ): Promise<Builder> {
    const settings = await loadBuildSettings(projectRoot);
    const config = createBuildConfig(settings, source, overrides);
    return new Builder(config, createBuildEnvironment(projectRoot, config));
  }

  getContext(): StepContext {
    return this.ctx;
  }

  /**
   * Full build: builder image, kernel, tools, mkosi. Stops at the first
   * failing stage.
   */
  async buildAll(mkosiArgs: string[] = []): Promise<BuildStepResult> {
    const { config } = this.ctx;

    logger.section(`Building initramfs for ${config.arch} (kernel ${config.kernelVersion})`);
    logger.resetTimer();

    const startTime = Date.now();

    const builderResult = await timedStep('Step 1/4: Preparing builder image', () => ensureBuilderImage(this.ctx));
    if (!builderResult.success) return builderResult;

    const kernelResult = await timedStep('Step 2/4: Building kernel', () => buildKernel(this.ctx));
    if (!kernelResult.success) return kernelResult;

    const toolsResult = await timedStep('Step 3/4: Downloading tools', () => fetchTools(this.ctx));
    if (!toolsResult.success) return toolsResult;

    const assembleResult = await timedStep('Step 4/4: Building initramfs with mkosi', () =>
      assembleImage(this.ctx, mkosiArgs)
    );
    if (!assembleResult.success) return assembleResult;

    const artifacts: { name: string; path: string; size?: string }[] = [];
    const collected = assembleResult.artifacts;
    if (collected?.initramfs) {
      artifacts.push({
        name: 'Initramfs',
        path: relative(this.ctx.env.projectRoot, collected.initramfs),
        size: await getFileSize(collected.initramfs),
      });
    }
    if (collected?.kernel) {
      artifacts.push({
        name: 'Kernel',
        path: relative(this.ctx.env.projectRoot, collected.kernel),
        size: await getFileSize(collected.kernel),
      });
    }
    logger.summary(artifacts);

    return {
      success: true,
      duration: Date.now() - startTime,
    };
  }

  /**
   * Interactive shell in the builder container
   */
  async shell(): Promise<BuildStepResult> {
    const prepared = await ensureBuilderImage(this.ctx);
    if (!prepared.success) return prepared;

    const startTime = Date.now();
    const result = await this.ctx.builder.run('/bin/bash', [], { interactive: true });
    return {
      success: result.exitCode === 0,
      duration: Date.now() - startTime,
      exitCode: result.exitCode,
    };
  }

  async summary(): Promise<BuildStepResult> {
    return this.passthrough(['summary']);
  }

  /**
   * Forward arguments verbatim to mkosi in the builder
   */
  async passthrough(args: string[]): Promise<BuildStepResult> {
    const prepared = await ensureBuilderImage(this.ctx);
    if (!prepared.success) return prepared;

    return runMkosi(this.ctx, args);
  }

  async clean(all: boolean = false): Promise<BuildStepResult> {
    return cleanArtifacts(this.ctx, all);
  }

  /**
   * Boot out/ in QEMU. Missing artifacts raise ConfigError.
   */
  async qemuTest(): Promise<BuildStepResult> {
    return runQemuTest(this.ctx);
  }
}
