#!/usr/bin/env node
/**
 * initforge - CLI
 * Builds a kernel and mkosi initramfs inside a builder container
 */

import { Command } from 'commander';
import { resolve, dirname } from 'path';
import { existsSync } from 'fs';
import { Builder, exitCodeFor } from './builder.js';
import { logger } from './logger.js';
import { ConfigError } from './errors.js';
import type { ConfigOverrides } from './config.js';
import type { BuildStepResult } from './types.js';

// Find project root (go up until we find Dockerfile and config/build.yaml)
function findProjectRoot(): string {
  let dir = process.cwd();

  while (dir !== '/') {
    if (existsSync(resolve(dir, 'Dockerfile')) && existsSync(resolve(dir, 'config/build.yaml'))) {
      return dir;
    }
    dir = dirname(dir);
  }

  // Fallback to current directory
  return process.cwd();
}

async function runWithBuilder(
  action: (builder: Builder) => Promise<BuildStepResult>,
  overrides: ConfigOverrides = {}
): Promise<never> {
  try {
    const builder = await Builder.create(findProjectRoot(), process.env, overrides);
    const result = await action(builder);
    process.exit(exitCodeFor(result));
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error(`Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    }
    process.exit(1);
  }
}

interface BuildOptions {
  force?: boolean;
  forceKernel?: boolean;
  forceTools?: boolean;
  rebuildBuilder?: boolean;
  arch?: string;
}

const program = new Command();

program
  .name('initforge')
  .description('Build a minimal Linux provisioning image (kernel + initramfs) with mkosi')
  .version('0.1.0')
  .showHelpAfterError('(use "initforge --help" for available commands)')
  .configureOutput({
    outputError: (str, write) => write(`\x1b[31mError:\x1b[0m ${str}`)
  })
  .addHelpText('after', `
Environment:
  ARCH              amd64 (default) or arm64; x86_64 and aarch64 are accepted
  KERNEL_VERSION    Kernel version to build (default from config/build.yaml)
  KERNEL_SRC        Local kernel source tree, mounted read-only
  NO_CACHE=1        Rebuild the builder image without cache
  FORCE_KERNEL=1    Rebuild the kernel even if already built
  FORCE_TOOLS=1     Re-download container tools
  BUILDER_IMAGE     Builder image name (default: initforge-builder)
  CONTAINER_ENGINE  docker (default) or podman
  QEMU_MEM, QEMU_SMP, QEMU_APPEND   qemu-test settings

Any other command is passed to mkosi inside the builder.`);

// build (default)
program
  .command('build', { isDefault: true })
  .description('Build builder image, kernel, tools and initramfs')
  .argument('[mkosiArgs...]', 'Extra arguments for mkosi build')
  .option('-f, --force', 'Pass --force to mkosi')
  .option('--force-kernel', 'Rebuild the kernel (same as FORCE_KERNEL=1)')
  .option('--force-tools', 'Re-download tools (same as FORCE_TOOLS=1)')
  .option('--rebuild-builder', 'Rebuild the builder image without cache (same as NO_CACHE=1)')
  .option('-a, --arch <arch>', 'Target architecture (same as ARCH)')
  .allowUnknownOption()
  .action(async (mkosiArgs: string[], options: BuildOptions) => {
    const args = options.force ? ['--force', ...mkosiArgs] : mkosiArgs;
    await runWithBuilder(builder => builder.buildAll(args), {
      arch: options.arch,
      forceKernel: options.forceKernel,
      forceTools: options.forceTools,
      forceBuilder: options.rebuildBuilder,
    });
  });

program
  .command('shell')
  .description('Interactive shell inside the builder container')
  .action(async () => {
    await runWithBuilder(builder => builder.shell());
  });

program
  .command('clean')
  .description('Remove build artifacts (keeps the kernel and tools)')
  .option('--all', 'Also remove the built kernel and downloaded tools')
  .action(async (options: { all?: boolean }) => {
    await runWithBuilder(builder => builder.clean(options.all === true));
  });

program
  .command('summary')
  .description('Print the mkosi configuration summary')
  .action(async () => {
    await runWithBuilder(builder => builder.summary());
  });

program
  .command('qemu-test')
  .description('Boot out/ in QEMU on a serial console')
  .action(async () => {
    await runWithBuilder(builder => builder.qemuTest());
  });

// Anything that is not one of ours goes straight to mkosi
const validCommands = ['build', 'shell', 'clean', 'summary', 'qemu-test', 'help', '-V', '--version', '-h', '--help'];
const firstArg = process.argv[2];
if (firstArg && !validCommands.includes(firstArg) && !firstArg.startsWith('-')) {
  await runWithBuilder(builder => builder.passthrough(process.argv.slice(2)));
}

// Parse and execute
await program.parseAsync();
