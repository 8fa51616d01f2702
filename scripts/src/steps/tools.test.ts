import { existsSync } from 'fs';
import { access, constants, mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { fetchTools, planToolSync, resolveToolSet } from './tools.js';
import { ConfigError } from '../errors.js';
import { callsOf, commandsOf } from '../../test/helpers/fake-runner.js';
import { createFixture, emulateToolchain } from '../../test/helpers/fixture.js';
import type { Fixture } from '../../test/helpers/fixture.js';

async function isExecutable(path: string): Promise<boolean> {
  return access(path, constants.X_OK).then(() => true, () => false);
}

describe('resolveToolSet', () => {
  let fixture: Fixture | undefined;

  afterEach(async () => {
    await fixture?.cleanup();
    fixture = undefined;
  });

  it('expands version and architecture in URLs', async () => {
    fixture = await createFixture();
    const tools = resolveToolSet(fixture.config.settings.tools, 'aarch64');

    expect(tools.map(tool => [tool.name, tool.resolvedUrl])).toEqual([
      ['containerd', 'https://downloads.test/containerd-2.2.1-linux-arm64.tar.gz'],
      ['runc', 'https://downloads.test/runc.arm64'],
      ['nerdctl', 'https://downloads.test/nerdctl-2.2.1-linux-arm64.tar.gz'],
      ['cni-plugins', 'https://downloads.test/cni-plugins-linux-arm64-v1.6.0.tgz'],
    ]);
  });

  it('rejects an unsupported architecture', async () => {
    fixture = await createFixture();
    expect(() => resolveToolSet(fixture?.config.settings.tools ?? {}, 'riscv64')).toThrow(ConfigError);
  });
});

describe('planToolSync', () => {
  let fixture: Fixture | undefined;

  afterEach(async () => {
    await fixture?.cleanup();
    fixture = undefined;
  });

  async function desiredTools() {
    fixture = await createFixture();
    return resolveToolSet(fixture.config.settings.tools, 'amd64');
  }

  it('installs only missing tools and removes what they supersede', async () => {
    const desired = await desiredTools();

    const plan = planToolSync(desired, new Set(['runc']), false);

    expect(plan.map(op => (op.kind === 'remove' ? ['remove', op.tool.name, op.paths] : ['install', op.tool.name]))).toEqual([
      ['install', 'containerd'],
      ['remove', 'containerd', ['bin/ctr', 'bin/containerd-stress']],
      ['install', 'nerdctl'],
      ['remove', 'nerdctl', ['dockerd', 'docker', 'docker-init', 'docker-proxy']],
      ['install', 'cni-plugins'],
    ]);
  });

  it('plans nothing when everything is installed', async () => {
    const desired = await desiredTools();
    expect(planToolSync(desired, new Set(['containerd', 'runc', 'nerdctl', 'cni-plugins']), false)).toEqual([]);
  });

  it('reinstalls everything when forced', async () => {
    const desired = await desiredTools();

    const plan = planToolSync(desired, new Set(['containerd', 'runc', 'nerdctl', 'cni-plugins']), true);

    expect(plan.filter(op => op.kind === 'install').map(op => op.tool.name)).toEqual([
      'containerd', 'runc', 'nerdctl', 'cni-plugins',
    ]);
  });
});

describe('fetchTools', () => {
  let fixture: Fixture | undefined;

  async function setup(): Promise<Fixture> {
    fixture = await createFixture();
    emulateToolchain(fixture.builder, fixture.env);
    return fixture;
  }

  afterEach(async () => {
    await fixture?.cleanup();
    fixture = undefined;
  });

  it('installs every tool into the kernel output tree', async () => {
    const { ctx, calls, env } = await setup();

    const result = await fetchTools(ctx);

    expect(result).toMatchObject({
      success: true,
      skipped: false,
      installed: ['containerd', 'runc', 'nerdctl', 'cni-plugins'],
      present: [],
    });
    expect(callsOf(calls, 'curl')).toHaveLength(4);
    expect(callsOf(calls, 'tar')[0].args).toEqual([
      '-xzf', '/work/mkosi.cache/downloads/containerd-2.2.1-amd64.tar.gz',
      '-C', '/work/mkosi.output/kernel/usr/local',
      'bin/containerd', 'bin/containerd-shim-runc-v2',
    ]);
    expect(callsOf(calls, 'curl')[1].args).toEqual([
      '-fsSL', 'https://downloads.test/runc.amd64', '-o', '/work/mkosi.output/kernel/usr/local/bin/runc',
    ]);

    for (const file of [
      'usr/local/bin/containerd',
      'usr/local/bin/containerd-shim-runc-v2',
      'usr/local/bin/runc',
      'usr/local/bin/nerdctl',
      'opt/cni/bin/bridge',
      'opt/cni/bin/loopback',
    ]) {
      expect(await isExecutable(join(env.kernelOutputDir, file))).toBe(true);
    }
    expect(existsSync(join(env.downloadDir, 'containerd-2.2.1-amd64.tar.gz'))).toBe(false);
  });

  it('downloads nothing when every tool is present', async () => {
    const { ctx, calls } = await setup();
    await fetchTools(ctx);
    const before = calls.length;

    const result = await fetchTools(ctx);

    expect(result).toMatchObject({
      success: true,
      skipped: true,
      installed: [],
      present: ['containerd', 'runc', 'nerdctl', 'cni-plugins'],
      removed: [],
    });
    expect(calls).toHaveLength(before);
  });

  it('downloads exactly the missing tool', async () => {
    const { ctx, calls, env } = await setup();
    await fetchTools(ctx);
    await rm(join(env.kernelOutputDir, 'usr/local/bin/runc'));
    const before = calls.length;

    const result = await fetchTools(ctx);

    const later = calls.slice(before);
    expect(result.installed).toEqual(['runc']);
    expect(commandsOf(later)).toEqual(['mkdir', 'curl', 'chmod']);
    expect(later[1].args[1]).toBe('https://downloads.test/runc.amd64');
  });

  it('removes superseded binaries when installing', async () => {
    const { ctx, calls, env } = await setup();
    const bin = join(env.kernelOutputDir, 'usr/local/bin');
    await mkdir(bin, { recursive: true });
    await writeFile(join(bin, 'ctr'), 'old\n');

    const result = await fetchTools(ctx);

    expect(existsSync(join(bin, 'ctr'))).toBe(false);
    expect(existsSync(join(bin, 'containerd'))).toBe(true);
    expect(result.removed).toEqual([
      join(bin, 'ctr'),
      join(bin, 'containerd-stress'),
      join(bin, 'dockerd'),
      join(bin, 'docker'),
      join(bin, 'docker-init'),
      join(bin, 'docker-proxy'),
    ]);
    expect(callsOf(calls, 'rm', '/work/mkosi.output/kernel/usr/local/bin/ctr')[0].args).toEqual([
      '-f',
      '/work/mkosi.output/kernel/usr/local/bin/ctr',
      '/work/mkosi.output/kernel/usr/local/bin/containerd-stress',
    ]);
  });

  it('removes the docker front-end when nerdctl is reinstalled', async () => {
    const { ctx, calls, env } = await setup();
    await fetchTools(ctx);
    const bin = join(env.kernelOutputDir, 'usr/local/bin');
    const docker = ['dockerd', 'docker', 'docker-init', 'docker-proxy'];
    for (const name of docker) {
      await writeFile(join(bin, name), 'docker\n');
    }
    await rm(join(bin, 'nerdctl'));
    const before = calls.length;

    const result = await fetchTools(ctx);

    expect(result).toMatchObject({
      success: true,
      skipped: false,
      installed: ['nerdctl'],
      present: ['containerd', 'runc', 'cni-plugins'],
      removed: docker.map(name => join(bin, name)),
    });
    expect(commandsOf(calls.slice(before))).toEqual(['mkdir', 'mkdir', 'curl', 'tar', 'rm', 'chmod', 'rm']);
    for (const name of docker) {
      expect(existsSync(join(bin, name))).toBe(false);
    }
    expect(await isExecutable(join(bin, 'nerdctl'))).toBe(true);
    expect(await isExecutable(join(bin, 'containerd'))).toBe(true);
  });

  it('empties a clean destination first', async () => {
    const { ctx, env } = await setup();
    const cni = join(env.kernelOutputDir, 'opt/cni/bin');
    await mkdir(cni, { recursive: true });
    await writeFile(join(cni, 'dhcp'), 'old plugin\n');

    await fetchTools(ctx);

    expect(existsSync(join(cni, 'dhcp'))).toBe(false);
    expect(existsSync(join(cni, 'bridge'))).toBe(true);
  });

  it('downloads everything again when forced', async () => {
    const { ctx, calls } = await setup();
    await fetchTools(ctx);
    const before = calls.length;

    const result = await fetchTools({ ...ctx, config: { ...ctx.config, forceTools: true } });

    expect(result.installed).toEqual(['containerd', 'runc', 'nerdctl', 'cni-plugins']);
    expect(callsOf(calls.slice(before), 'curl')).toHaveLength(4);
  });

  it('fails on a download error', async () => {
    const { ctx, builder } = await setup();
    builder.failOn('curl', 22);

    const result = await fetchTools(ctx);

    expect(result).toMatchObject({ success: false, exitCode: 22 });
  });
});
