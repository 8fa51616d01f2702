/**
 * initforge - Configuration Loader
 *
 * Static settings are read from config/build.yaml; per-invocation values come
 * from environment variables and CLI flags. createBuildConfig() merges them
 * once at start-up into a frozen BuildConfig, and nothing reads process.env
 * after that.
 */

import { readFile } from 'fs/promises';
import { existsSync, statSync } from 'fs';
import { arch as osArch, availableParallelism } from 'os';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { BuildConfig, BuildSettings } from './types.js';
import { normalizeHostArch, resolveArch } from './arch.js';
import { ConfigError } from './errors.js';

const toolSchema = z.object({
  version: z.string().min(1),
  url: z.string().min(1),
  format: z.enum(['binary', 'tar.gz']),
  dest: z.string().min(1),
  probe: z.string().min(1),
  entries: z.array(z.string().min(1)).optional(),
  supersedes: z.array(z.string().min(1)).optional(),
  cleanDest: z.boolean().optional(),
}).refine(
  tool => tool.format === 'binary' || (tool.entries?.length ?? 0) > 0,
  { message: 'tar.gz tools must list the entries to extract', path: ['entries'] },
);

const settingsSchema: z.ZodType<BuildSettings, z.ZodTypeDef, unknown> = z.object({
  kernel: z.object({
    version: z.coerce.string().default(''),
    url: z.string().default('https://cdn.kernel.org/pub/linux/kernel/v{major}.x/linux-{version}.tar.xz'),
    commandLineSize: z.number().int().positive().default(4096),
  }).default({}),
  builder: z.object({
    image: z.string().default('initforge-builder'),
    definition: z.string().default('Dockerfile'),
    engine: z.enum(['docker', 'podman']).default('docker'),
    mount: z.string().default('/work'),
    binfmtImage: z.string().default('tonistiigi/binfmt'),
    cleanImage: z.string().default('debian:trixie'),
  }).default({}),
  output: z.object({
    dir: z.string().default('out'),
    mkosiOutput: z.string().default('mkosi.output'),
    mkosiCache: z.string().default('mkosi.cache'),
  }).default({}),
  qemu: z.object({
    memory: z.string().default('2G'),
    smp: z.number().int().positive().default(2),
    cmdline: z.string().default('audit=0'),
  }).default({}),
  tools: z.record(toolSchema).default({}),
});

/**
 * Boolean flags are on only when set to exactly "1"
 */
const flag = z.string().optional().transform(value => value === '1');

const envSchema = z.object({
  ARCH: z.string().default('amd64'),
  KERNEL_VERSION: z.string().optional(),
  KERNEL_SRC: z.string().optional(),
  NO_CACHE: flag,
  FORCE_KERNEL: flag,
  FORCE_TOOLS: flag,
  BUILDER_IMAGE: z.string().optional(),
  CONTAINER_ENGINE: z.enum(['docker', 'podman']).optional(),
  QEMU_MEM: z.string().optional(),
  QEMU_SMP: z.coerce.number().int().positive().optional(),
  QEMU_APPEND: z.string().optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

// Values given on the command line win over the environment
export interface ConfigOverrides {
  arch?: string;
  forceBuilder?: boolean;
  forceKernel?: boolean;
  forceTools?: boolean;
}

export interface HostInfo {
  arch: string;
  jobs: number;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Validate already-parsed build settings
 */
export function parseBuildSettings(raw: unknown): BuildSettings {
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config/build.yaml:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Load config/build.yaml
 */
export async function loadBuildSettings(projectRoot: string): Promise<BuildSettings> {
  const configPath = join(projectRoot, 'config', 'build.yaml');

  if (!existsSync(configPath)) {
    throw new ConfigError(`Build configuration not found at ${configPath}`);
  }

  const content = await readFile(configPath, 'utf-8');
  return parseBuildSettings(parseYaml(content));
}

/**
 * Validate the environment variables we care about. Empty strings count as unset.
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvConfig {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment variables:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function detectHost(): HostInfo {
  return {
    arch: normalizeHostArch(osArch()),
    jobs: availableParallelism(),
  };
}

/**
 * Build the immutable per-invocation configuration
 */
export function createBuildConfig(
  settings: BuildSettings,
  source: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {},
  host: HostInfo = detectHost()
): BuildConfig {
  const env = parseEnv(source);

  const arch = resolveArch(overrides.arch ?? env.ARCH);

  const kernelVersion = (env.KERNEL_VERSION ?? settings.kernel.version).trim();
  if (!kernelVersion) {
    throw new ConfigError('KERNEL_VERSION must be set (environment or config/build.yaml)');
  }

  let kernelSrc: string | undefined;
  if (env.KERNEL_SRC) {
    kernelSrc = resolve(env.KERNEL_SRC);
    if (!existsSync(kernelSrc) || !statSync(kernelSrc).isDirectory()) {
      throw new ConfigError(`KERNEL_SRC=${env.KERNEL_SRC} does not exist`);
    }
  }

  return Object.freeze({
    arch,
    hostArch: host.arch,
    kernelVersion,
    kernelSrc,
    forceBuilder: overrides.forceBuilder ?? env.NO_CACHE,
    forceKernel: overrides.forceKernel ?? env.FORCE_KERNEL,
    forceTools: overrides.forceTools ?? env.FORCE_TOOLS,
    builderImage: env.BUILDER_IMAGE ?? settings.builder.image,
    engine: env.CONTAINER_ENGINE ?? settings.builder.engine,
    jobs: Math.max(1, host.jobs),
    qemu: Object.freeze({
      memory: env.QEMU_MEM ?? settings.qemu.memory,
      smp: env.QEMU_SMP ?? settings.qemu.smp,
      append: env.QEMU_APPEND ?? '',
    }),
    settings,
  });
}
