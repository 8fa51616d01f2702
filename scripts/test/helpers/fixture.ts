/**
 * Temporary project trees and emulated toolchains for stage tests
 */

import { appendFile, mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, dirname, join } from 'path';
import type { BuildConfig, BuildEnvironment, StepContext } from '../../src/types.js';
import { createBuildConfig, parseBuildSettings } from '../../src/config.js';
import type { ConfigOverrides } from '../../src/config.js';
import { createBuildEnvironment } from '../../src/env.js';
import { FakeRunner } from './fake-runner.js';
import type { RecordedCall } from './fake-runner.js';

export const TEST_RELEASE = '6.12.69';

export const TEST_SETTINGS = {
  kernel: { version: TEST_RELEASE },
  builder: { image: 'test-builder' },
  tools: {
    containerd: {
      version: '2.2.1',
      url: 'https://downloads.test/containerd-{version}-linux-{arch}.tar.gz',
      format: 'tar.gz',
      dest: 'usr/local',
      probe: 'bin/containerd',
      entries: ['bin/containerd', 'bin/containerd-shim-runc-v2'],
      supersedes: ['bin/ctr', 'bin/containerd-stress'],
    },
    runc: {
      version: '1.4.0',
      url: 'https://downloads.test/runc.{arch}',
      format: 'binary',
      dest: 'usr/local/bin',
      probe: 'runc',
    },
    nerdctl: {
      version: '2.2.1',
      url: 'https://downloads.test/nerdctl-{version}-linux-{arch}.tar.gz',
      format: 'tar.gz',
      dest: 'usr/local/bin',
      probe: 'nerdctl',
      entries: ['nerdctl'],
      supersedes: ['dockerd', 'docker', 'docker-init', 'docker-proxy'],
    },
    'cni-plugins': {
      version: '1.6.0',
      url: 'https://downloads.test/cni-plugins-linux-{arch}-v{version}.tgz',
      format: 'tar.gz',
      dest: 'opt/cni/bin',
      probe: 'bridge',
      cleanDest: true,
      entries: ['./bridge', './loopback'],
    },
  },
};

export interface FixtureOptions {
  arch?: string;
  hostArch?: string;
  vars?: Record<string, string>;
  overrides?: ConfigOverrides;
  settings?: unknown;
}

export interface Fixture {
  root: string;
  config: BuildConfig;
  env: BuildEnvironment;
  host: FakeRunner;
  builder: FakeRunner;
  calls: RecordedCall[];
  ctx: StepContext;
  cleanup(): Promise<void>;
}

/**
 * A project directory under the system temp dir with a builder definition,
 * and fake runners sharing one call log
 */
export async function createFixture(options: FixtureOptions = {}): Promise<Fixture> {
  const root = await mkdtemp(join(tmpdir(), 'initforge-test-'));
  await mkdir(join(root, 'config'), { recursive: true });
  await writeFile(join(root, 'Dockerfile'), 'FROM debian:trixie\n');

  const settings = parseBuildSettings(options.settings ?? TEST_SETTINGS);
  const config = createBuildConfig(
    settings,
    { ARCH: options.arch ?? 'amd64', ...options.vars },
    options.overrides,
    { arch: options.hostArch ?? 'amd64', jobs: 4 }
  );
  const env = createBuildEnvironment(root, config);

  const calls: RecordedCall[] = [];
  const host = new FakeRunner('host', calls);
  const builder = new FakeRunner('builder', calls, env);

  return {
    root,
    config,
    env,
    host,
    builder,
    calls,
    ctx: { config, env, host, builder },
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

function optionValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

async function touch(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}

/**
 * Emulate curl, tar, rsync, make and mkosi inside the builder well enough
 * for every stage to produce its files
 */
export function emulateToolchain(builder: FakeRunner, env: BuildEnvironment, release: string = TEST_RELEASE): FakeRunner {
  return builder
    .on('curl', async args => {
      const target = optionValue(args, '-o');
      if (target) {
        await touch(builder.hostPath(target), `download of ${args[1]}\n`);
      }
    })
    .on('tar', async args => {
      const archive = args[1];
      const dest = optionValue(args, '-C');
      if (!dest) return { exitCode: 2 };

      if (args[0] === '-xf') {
        // Kernel tarball: linux-<version>.tar.xz unpacks into linux-<version>/
        const tree = basename(archive).replace(/\.tar\.[a-z]+$/, '');
        await touch(join(builder.hostPath(dest), tree, 'Makefile'), 'VERSION = 6\n');
        return;
      }

      const entries = args.slice(args.indexOf('-C') + 2);
      for (const entry of entries) {
        await touch(join(builder.hostPath(dest), entry), `${entry} from ${basename(archive)}\n`);
      }
    })
    .on('rsync', async args => {
      const target = args[args.length - 1];
      await touch(join(builder.hostPath(target), 'Makefile'), 'VERSION = 6\n');
    })
    .on('make', async (args, options) => {
      const cwd = options.cwd ? builder.hostPath(options.cwd) : env.projectRoot;

      if (args.includes('kernelrelease')) {
        return { stdout: `${release}\n` };
      }
      if (args.includes('defconfig')) {
        await touch(join(cwd, '.config'), 'CONFIG_MODULES=y\n');
      }
      if (args.includes('olddefconfig')) {
        await appendFile(join(cwd, '.config'), 'CONFIG_RESOLVED=y\n');
      }
      if (args.includes('bzImage')) {
        await touch(join(cwd, 'arch/x86/boot/bzImage'), 'x86 kernel image\n');
      }
      if (args.includes('Image')) {
        await touch(join(cwd, 'arch/arm64/boot/Image'), 'arm64 kernel image\n');
      }

      const installPath = args.find(arg => arg.startsWith('INSTALL_MOD_PATH='));
      if (installPath) {
        const modules = join(builder.hostPath(installPath.slice('INSTALL_MOD_PATH='.length)), 'lib', 'modules', release);
        await touch(join(modules, 'kernel/drivers/net/dummy.ko'), 'module\n');
        await touch(join(modules, 'kernel/fs/overlayfs/overlay.ko'), 'module\n');
        await touch(join(modules, 'modules.dep'), '\n');
        await touch(join(modules, 'build'), 'link\n');
        await touch(join(modules, 'source'), 'link\n');
      }
    })
    .on('mkosi', async args => {
      if (args.includes('build')) {
        await touch(join(env.mkosiOutputDir, 'image.cpio.zst'), 'initramfs\n');
      }
    });
}

/**
 * Emulate the container engine on the host. With no creation time the
 * builder image does not exist.
 */
export function emulateEngine(host: FakeRunner, engine: string, imageCreated?: string): FakeRunner {
  return host.on(engine, args => {
    if (args[0] === 'image' && args[1] === 'inspect') {
      return imageCreated === undefined
        ? { exitCode: 1, stderr: 'Error: No such image' }
        : { stdout: `${imageCreated}\n` };
    }
    return undefined;
  });
}
