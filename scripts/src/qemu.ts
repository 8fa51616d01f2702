/**
 * initforge - QEMU Boot Test
 * Boots the collected kernel and initramfs on a serial console
 */

import { existsSync } from 'fs';
import { join } from 'path';
import type { BuildStepResult, StepContext } from './types.js';
import { logger } from './logger.js';
import { archInfo } from './arch.js';
import { ConfigError } from './errors.js';
import { formatCommand, runChecked, stepFailure } from './exec.js';
import { initramfsName, kernelName } from './steps/assemble.js';

export interface QemuInvocation {
  command: string;
  args: string[];
  cmdline: string;
  kernel: string;
  initrd: string;
}

/**
 * Build the QEMU command line for the configured architecture
 */
export function qemuInvocation(ctx: StepContext): QemuInvocation {
  const { config, env } = ctx;
  const arch = archInfo(config.arch);

  const kernel = join(env.outputDir, kernelName(config.arch));
  const initrd = join(env.outputDir, initramfsName(config.arch));
  const cmdline = [`console=${arch.serialConsole}`, config.settings.qemu.cmdline, config.qemu.append]
    .map(part => part.trim())
    .filter(Boolean)
    .join(' ');

  return {
    command: arch.qemuBinary,
    args: [
      ...arch.qemuMachineArgs,
      '-kernel', kernel,
      '-initrd', initrd,
      '-append', cmdline,
      '-nographic',
      '-m', config.qemu.memory,
      '-smp', String(config.qemu.smp),
      '-nic', 'user,model=virtio-net-pci',
      '-no-reboot',
    ],
    cmdline,
    kernel,
    initrd,
  };
}

/**
 * Boot the built image in QEMU
 */
export async function runQemuTest(ctx: StepContext): Promise<BuildStepResult> {
  const invocation = qemuInvocation(ctx);

  if (!existsSync(invocation.kernel) || !existsSync(invocation.initrd)) {
    throw new ConfigError("Build artifacts not found. Run 'initforge build' first.");
  }

  const startTime = Date.now();
  logger.info('Booting in QEMU (Ctrl-A X to exit)...');
  logger.info(`Kernel cmdline: ${invocation.cmdline}`);
  logger.detail(formatCommand(invocation.command, invocation.args));

  try {
    await runChecked(ctx.host, invocation.command, invocation.args, { interactive: true });
  } catch (error) {
    return stepFailure(error, startTime);
  }

  return { success: true, duration: Date.now() - startTime };
}
