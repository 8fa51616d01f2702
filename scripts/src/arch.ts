/**
 * initforge - Architecture Mapping
 */

import type { Arch, ArchInfo } from './types.js';
import { ConfigError } from './errors.js';

export const ARCHITECTURES: Readonly<Record<Arch, ArchInfo>> = {
  amd64: {
    aliases: ['amd64', 'x86_64'],
    kernelArch: 'x86_64',
    crossCompile: '',
    makeTarget: 'bzImage',
    kernelImage: 'arch/x86/boot/bzImage',
    mkosiArch: 'x86-64',
    downloadArch: 'amd64',
    qemuBinary: 'qemu-system-x86_64',
    qemuMachineArgs: [],
    serialConsole: 'ttyS0',
  },
  arm64: {
    aliases: ['arm64', 'aarch64'],
    kernelArch: 'arm64',
    crossCompile: 'aarch64-linux-gnu-',
    makeTarget: 'Image',
    kernelImage: 'arch/arm64/boot/Image',
    mkosiArch: 'arm64',
    downloadArch: 'arm64',
    qemuBinary: 'qemu-system-aarch64',
    qemuMachineArgs: ['-machine', 'virt', '-cpu', 'max'],
    serialConsole: 'ttyAMA0',
  },
};

/**
 * Map an architecture name or alias to its canonical form, or undefined
 */
export function findArch(name: string): Arch | undefined {
  const needle = name.trim().toLowerCase();
  for (const [arch, info] of Object.entries(ARCHITECTURES)) {
    if (info.aliases.includes(needle) && isArch(arch)) {
      return arch;
    }
  }
  return undefined;
}

/**
 * Map an architecture name or alias to its canonical form
 */
export function resolveArch(name: string): Arch {
  const arch = findArch(name);
  if (!arch) {
    const supported = Object.values(ARCHITECTURES).flatMap(info => info.aliases).join(', ');
    throw new ConfigError(`Unsupported ARCH=${name} (supported: ${supported})`);
  }
  return arch;
}

export function isArch(value: string): value is Arch {
  return value === 'amd64' || value === 'arm64';
}

export function archInfo(arch: Arch): ArchInfo {
  return ARCHITECTURES[arch];
}

/**
 * Normalize a Node.js process.arch value. Unknown families are returned as-is
 * so that they never compare equal to a supported target.
 */
export function normalizeHostArch(nodeArch: string): string {
  switch (nodeArch) {
    case 'x64':
      return 'amd64';
    case 'arm64':
      return 'arm64';
    default:
      return findArch(nodeArch) ?? nodeArch;
  }
}

/**
 * True when the target cannot run natively on the host
 */
export function isCrossBuild(hostArch: string, target: Arch): boolean {
  return hostArch !== target;
}
