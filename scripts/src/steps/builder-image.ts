/**
 * initforge - Builder Image
 *
 * The builder image is rebuilt when it is missing, when its definition file
 * is newer than the image, or when forced. If either timestamp cannot be
 * determined the image is rebuilt.
 */

import { stat } from 'fs/promises';
import type { BuilderImageHandle, BuildStepResult, RebuildReason, StepContext } from '../types.js';
import { logger } from '../logger.js';
import { runChecked, stepFailure } from '../exec.js';

export interface BuilderImageState {
  exists: boolean;
  imageCreated: Date | null;
  definitionModified: Date | null;
}

export interface RebuildDecision {
  rebuild: boolean;
  reason: RebuildReason;
}

export interface BuilderImageResult extends BuildStepResult {
  handle?: BuilderImageHandle;
}

/**
 * Decide whether the builder image must be (re)built
 */
export function needsRebuild(state: BuilderImageState, force: boolean): RebuildDecision {
  if (force) {
    return { rebuild: true, reason: 'forced' };
  }
  if (!state.exists) {
    return { rebuild: true, reason: 'missing' };
  }
  if (!state.imageCreated || !state.definitionModified) {
    return { rebuild: true, reason: 'unknown-timestamp' };
  }
  if (state.definitionModified.getTime() > state.imageCreated.getTime()) {
    return { rebuild: true, reason: 'definition-changed' };
  }
  return { rebuild: false, reason: 'up-to-date' };
}

/**
 * Parse the creation time reported by `image inspect`. Docker reports
 * RFC 3339 with nanoseconds, which Date does not accept, so the fraction is
 * cut to milliseconds first.
 */
export function parseImageTimestamp(raw: string): Date | null {
  const value = raw.trim().replace(/^(.*T\d{2}:\d{2}:\d{2}\.\d{3})\d+/, '$1');
  if (!value) return null;

  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Inspect the current builder image and its definition
 */
export async function inspectBuilderImage(ctx: StepContext): Promise<BuilderImageState> {
  const { config, env, host } = ctx;

  const inspect = await host.run(
    config.engine,
    ['image', 'inspect', config.builderImage, '--format', '{{.Created}}'],
    { stdio: 'pipe' }
  );

  let definitionModified: Date | null = null;
  try {
    definitionModified = (await stat(env.definitionFile)).mtime;
  } catch (error) {
    logger.warn(`Cannot read ${env.definitionFile}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const exists = inspect.exitCode === 0;
  return {
    exists,
    imageCreated: exists ? parseImageTimestamp(inspect.stdout) : null,
    definitionModified,
  };
}

const REASON_TEXT: Record<RebuildReason, string> = {
  'forced': 'rebuild forced, bypassing the build cache',
  'missing': 'image does not exist',
  'unknown-timestamp': 'image or definition timestamp unavailable',
  'definition-changed': 'definition is newer than the image',
  'up-to-date': 'up to date',
};

/**
 * Build the builder image if needed
 */
export async function ensureBuilderImage(ctx: StepContext): Promise<BuilderImageResult> {
  const { config, env, host } = ctx;
  const startTime = Date.now();

  logger.startSpinner(`Inspecting builder image '${config.builderImage}'...`);
  const state = await inspectBuilderImage(ctx);
  const decision = needsRebuild(state, config.forceBuilder);
  logger.stopSpinner();

  const handle: BuilderImageHandle = {
    image: config.builderImage,
    rebuilt: decision.rebuild,
    reason: decision.reason,
  };

  if (!decision.rebuild) {
    logger.info(`Builder image '${config.builderImage}' is up to date.`);
    return { success: true, duration: Date.now() - startTime, skipped: true, handle };
  }

  logger.info(`Building builder image '${config.builderImage}' (${REASON_TEXT[decision.reason]})...`);

  const args = ['build'];
  if (decision.reason === 'forced') {
    args.push('--no-cache');
  }
  args.push('-t', config.builderImage, '-f', env.definitionFile, env.projectRoot);

  try {
    await runChecked(host, config.engine, args, { stdio: 'inherit' });
  } catch (error) {
    return stepFailure(error, startTime);
  }

  logger.success(`Builder image '${config.builderImage}' built`);
  return { success: true, duration: Date.now() - startTime, handle };
}
