/**
 * initforge - Command Executor
 * Wraps execa for consistent command execution, on the host or inside the
 * builder container
 */

import { execa } from 'execa';
import { stat } from 'fs/promises';
import { logger } from './logger.js';
import { CommandFailedError } from './errors.js';
import type {
  BuildConfig,
  BuildEnvironment,
  BuildStepResult,
  CommandResult,
  CommandRunner,
  ExecOptions,
} from './types.js';

interface ExitInfo {
  failed: boolean;
  exitCode?: number;
}

// A process killed by a signal has no exit code but still failed
function exitCodeOf(result: ExitInfo): number {
  if (!result.failed) return 0;
  return result.exitCode !== undefined && result.exitCode !== 0 ? result.exitCode : 1;
}

/**
 * Execute a command with captured output
 */
export async function exec(
  command: string,
  args: string[],
  options: ExecOptions = {}
): Promise<CommandResult> {
  try {
    const result = await execa(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: options.stdio ?? 'pipe',
      reject: false,
    });

    return {
      stdout: String(result.stdout ?? ''),
      stderr: String(result.stderr ?? ''),
      exitCode: exitCodeOf(result),
    };
  } catch (error) {
    return {
      stdout: '',
      stderr: error instanceof Error ? error.message : String(error),
      exitCode: 1,
    };
  }
}

/**
 * Runs commands directly on the host
 */
export class HostRunner implements CommandRunner {
  run(command: string, args: string[], options: ExecOptions = {}): Promise<CommandResult> {
    if (options.interactive) {
      return exec(command, args, { ...options, stdio: 'inherit' });
    }
    return exec(command, args, options);
  }
}

/**
 * Arguments for `<engine> run` executing one command in the builder image.
 * The project root is mounted read-write, KERNEL_SRC read-only.
 */
export function builderRunArgs(
  config: BuildConfig,
  env: BuildEnvironment,
  command: string,
  args: string[],
  options: ExecOptions = {}
): string[] {
  const runArgs = ['run', '--rm', '--privileged'];

  if (options.interactive) {
    runArgs.push('-it');
  }

  runArgs.push('-v', `${env.projectRoot}:${env.builderRoot}`);

  if (config.kernelSrc) {
    runArgs.push('-v', `${config.kernelSrc}:${env.kernelSrcMount}:ro`);
  }

  runArgs.push('-w', options.cwd ?? env.builderRoot);

  for (const [key, value] of Object.entries(options.env ?? {})) {
    runArgs.push('-e', `${key}=${value}`);
  }

  runArgs.push('--entrypoint', command, config.builderImage, ...args);
  return runArgs;
}

/**
 * Runs every command in a fresh builder container. Paths given to it must be
 * builder paths (see toBuilderPath).
 */
export class BuilderRunner implements CommandRunner {
  constructor(
    private readonly host: CommandRunner,
    private readonly config: BuildConfig,
    private readonly env: BuildEnvironment
  ) {}

  run(command: string, args: string[], options: ExecOptions = {}): Promise<CommandResult> {
    return this.host.run(
      this.config.engine,
      builderRunArgs(this.config, this.env, command, args, options),
      { stdio: options.stdio, interactive: options.interactive }
    );
  }
}

/**
 * Render a command line for messages
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map(part => (/[\s'"]/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

/**
 * Run a command and throw CommandFailedError on a non-zero exit
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: ExecOptions = {}
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(formatCommand(command, args), result.exitCode, result.stderr);
  }
  return result;
}

/**
 * Turn an error raised inside a stage into a failed step result
 */
export function stepFailure(error: unknown, startTime: number): BuildStepResult {
  if (error instanceof CommandFailedError) {
    logger.error(error.message);
    if (error.stderr.trim()) {
      console.error(error.stderr.trim());
    }
    return {
      success: false,
      duration: Date.now() - startTime,
      exitCode: error.exitCode,
      error: error.message,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  logger.error(message);
  return {
    success: false,
    duration: Date.now() - startTime,
    exitCode: 1,
    error: message,
  };
}

/**
 * Get file size in human-readable format
 */
export async function getFileSize(path: string): Promise<string> {
  try {
    const stats = await stat(path);
    const bytes = stats.size;

    const units = ['B', 'KiB', 'MiB', 'GiB'];
    let size = bytes;
    let unitIndex = 0;

    while (size >= 1024 && unitIndex < units.length - 1) {
      size /= 1024;
      unitIndex++;
    }

    return `${size.toFixed(1)}${units[unitIndex]}`;
  } catch {
    return 'unknown';
  }
}

/**
 * Run a timed build step
 */
export async function timedStep<T extends BuildStepResult>(
  name: string,
  fn: () => Promise<T>
): Promise<T> {
  logger.step(name);
  logger.startTimer(name);

  const result = await fn();

  if (result.success) {
    logger.stepComplete(name);
  } else {
    logger.stepFailed(name);
  }
  return result;
}
