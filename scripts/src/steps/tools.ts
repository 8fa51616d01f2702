/**
 * initforge - Tool Fetcher
 *
 * Downloads the pinned container runtime tools listed in config/build.yaml
 * into the kernel output tree. Work is split in two phases: planToolSync()
 * diffs the desired tool set against what is installed, applyToolSync()
 * carries out the resulting operations.
 */

import { join } from 'path';
import { access, constants } from 'fs/promises';
import type {
  BuildEnvironment,
  BuildStepResult,
  StepContext,
  ToolOperation,
  ToolSettings,
  ToolSpec,
} from '../types.js';
import { logger } from '../logger.js';
import { archInfo, resolveArch } from '../arch.js';
import { toBuilderPath } from '../env.js';
import { runChecked, stepFailure } from '../exec.js';

export interface ToolFetchResult extends BuildStepResult {
  installed?: string[];
  present?: string[];
  removed?: string[];
}

/**
 * Resolve the desired tool set for an architecture
 */
export function resolveToolSet(tools: Record<string, ToolSettings>, arch: string): ToolSpec[] {
  const downloadArch = archInfo(resolveArch(arch)).downloadArch;

  return Object.entries(tools).map(([name, tool]) => ({
    ...tool,
    name,
    resolvedUrl: tool.url
      .replaceAll('{version}', tool.version)
      .replaceAll('{arch}', downloadArch),
  }));
}

export function toolDestDir(env: BuildEnvironment, tool: ToolSpec): string {
  return join(env.kernelOutputDir, tool.dest);
}

export function toolProbePath(env: BuildEnvironment, tool: ToolSpec): string {
  return join(toolDestDir(env, tool), tool.probe);
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Names of the desired tools whose probe executable is present
 */
export async function detectInstalledTools(
  env: BuildEnvironment,
  desired: ToolSpec[]
): Promise<Set<string>> {
  const installed = new Set<string>();
  for (const tool of desired) {
    if (await isExecutable(toolProbePath(env, tool))) {
      installed.add(tool.name);
    }
  }
  return installed;
}

/**
 * Diff desired tools against installed ones. Every tool that is missing, or
 * every tool when forced, gets an install; superseded files of a tool are
 * removed only when that tool is (re)installed.
 */
export function planToolSync(
  desired: ToolSpec[],
  installed: ReadonlySet<string>,
  force: boolean
): ToolOperation[] {
  const operations: ToolOperation[] = [];

  for (const tool of desired) {
    if (!force && installed.has(tool.name)) continue;

    operations.push({ kind: 'install', tool });
    if (tool.supersedes && tool.supersedes.length > 0) {
      operations.push({ kind: 'remove', tool, paths: tool.supersedes });
    }
  }

  return operations;
}

async function downloadTool(ctx: StepContext, tool: ToolSpec): Promise<string[]> {
  const { config, env, builder } = ctx;
  const inBuilder = (path: string): string => toBuilderPath(env, path);
  const dest = toolDestDir(env, tool);
  const downloadArch = archInfo(config.arch).downloadArch;

  if (tool.cleanDest) {
    await runChecked(builder, 'rm', ['-rf', inBuilder(dest)]);
  }
  await runChecked(builder, 'mkdir', ['-p', inBuilder(dest)]);

  let files: string[];
  if (tool.format === 'binary') {
    const target = join(dest, tool.probe);
    await runChecked(builder, 'curl', ['-fsSL', tool.resolvedUrl, '-o', inBuilder(target)]);
    files = [target];
  } else {
    const entries = tool.entries ?? [];
    const archive = join(env.downloadDir, `${tool.name}-${tool.version}-${downloadArch}.tar.gz`);

    await runChecked(builder, 'mkdir', ['-p', inBuilder(env.downloadDir)]);
    await runChecked(builder, 'curl', ['-fsSL', tool.resolvedUrl, '-o', inBuilder(archive)]);
    // Only the listed members are extracted
    await runChecked(builder, 'tar', ['-xzf', inBuilder(archive), '-C', inBuilder(dest), ...entries]);
    await runChecked(builder, 'rm', ['-f', inBuilder(archive)]);
    files = entries.map(entry => join(dest, entry));
  }

  await runChecked(builder, 'chmod', ['+x', ...files.map(inBuilder)]);
  return files;
}

async function installTool(ctx: StepContext, tool: ToolSpec): Promise<string[]> {
  const downloadArch = archInfo(ctx.config.arch).downloadArch;

  logger.startSpinner(`Installing ${tool.name} ${tool.version} (${downloadArch})...`);

  let files: string[];
  try {
    files = await downloadTool(ctx, tool);
  } catch (error) {
    logger.spinnerFail(`${tool.name} ${tool.version} failed`);
    throw error;
  }

  logger.spinnerSuccess(`${tool.name} ${tool.version} installed`);
  for (const file of files) {
    logger.detail(file);
  }
  return files;
}

/**
 * Carry out planned operations in order
 */
export async function applyToolSync(ctx: StepContext, operations: ToolOperation[]): Promise<string[]> {
  const { env, builder } = ctx;
  const removed: string[] = [];

  for (const operation of operations) {
    if (operation.kind === 'install') {
      await installTool(ctx, operation.tool);
      continue;
    }

    const dest = toolDestDir(env, operation.tool);
    const paths = operation.paths.map(path => join(dest, path));
    await runChecked(builder, 'rm', ['-f', ...paths.map(path => toBuilderPath(env, path))]);
    removed.push(...paths);
  }

  return removed;
}

/**
 * Download any missing tools
 */
export async function fetchTools(ctx: StepContext): Promise<ToolFetchResult> {
  const { config, env } = ctx;
  const startTime = Date.now();

  try {
    const desired = resolveToolSet(config.settings.tools, config.arch);
    const installed = await detectInstalledTools(env, desired);
    const operations = planToolSync(desired, installed, config.forceTools);

    const toInstall = new Set(
      operations.filter(op => op.kind === 'install').map(op => op.tool.name)
    );
    const present = desired.filter(tool => !toInstall.has(tool.name)).map(tool => tool.name);

    for (const name of present) {
      logger.info(`${name} already present (set FORCE_TOOLS=1 to re-download)`);
    }

    const removed = await applyToolSync(ctx, operations);

    return {
      success: true,
      duration: Date.now() - startTime,
      skipped: toInstall.size === 0,
      installed: [...toInstall],
      present,
      removed,
    };
  } catch (error) {
    return stepFailure(error, startTime);
  }
}
