/**
 * initforge - Build Types
 *
 * Static settings come from config/build.yaml, per-invocation values from
 * environment variables and CLI flags. Both are merged once into a frozen
 * BuildConfig (see config.ts).
 */

// Canonical target architecture
export type Arch = 'amd64' | 'arm64';

// Container engine used to run the builder
export type ContainerEngine = 'docker' | 'podman';

// Per-architecture naming used by the external tools
export interface ArchInfo {
  aliases: string[];
  kernelArch: string;       // make ARCH=
  crossCompile: string;     // make CROSS_COMPILE=, empty for native
  makeTarget: string;       // image target passed to make
  kernelImage: string;      // image path relative to the kernel source tree
  mkosiArch: string;        // mkosi --architecture=
  downloadArch: string;     // arch token in release download URLs
  qemuBinary: string;
  qemuMachineArgs: string[];
  serialConsole: string;
}

// Tool definition from config/build.yaml
export interface ToolSettings {
  version: string;
  url: string;
  format: 'binary' | 'tar.gz';
  dest: string;
  probe: string;
  entries?: string[];
  supersedes?: string[];
  cleanDest?: boolean;
}

// config/build.yaml
export interface BuildSettings {
  kernel: {
    version: string;
    url: string;
    commandLineSize: number;
  };
  builder: {
    image: string;
    definition: string;
    engine: ContainerEngine;
    mount: string;
    binfmtImage: string;
    cleanImage: string;
  };
  output: {
    dir: string;
    mkosiOutput: string;
    mkosiCache: string;
  };
  qemu: {
    memory: string;
    smp: number;
    cmdline: string;
  };
  tools: Record<string, ToolSettings>;
}

// Immutable configuration for one invocation
export interface BuildConfig {
  arch: Arch;
  hostArch: string;
  kernelVersion: string;
  kernelSrc?: string;
  forceBuilder: boolean;
  forceKernel: boolean;
  forceTools: boolean;
  builderImage: string;
  engine: ContainerEngine;
  jobs: number;
  qemu: {
    memory: string;
    smp: number;
    append: string;
  };
  settings: BuildSettings;
}

// Build environment (resolved paths)
export interface BuildEnvironment {
  projectRoot: string;
  configDir: string;
  definitionFile: string;
  outputDir: string;
  mkosiOutputDir: string;
  mkosiCacheDir: string;
  kernelOutputDir: string;
  kernelBuildDir: string;
  downloadDir: string;

  // Mount points inside the builder container
  builderRoot: string;
  kernelSrcMount: string;
}

// Build step result
export interface BuildStepResult {
  success: boolean;
  duration: number;  // in milliseconds
  skipped?: boolean;
  exitCode?: number;
  output?: string;
  error?: string;
}

// Command execution options
export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  stdio?: 'inherit' | 'pipe' | 'ignore';
  interactive?: boolean;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Anything that can run an external command. Stages only talk to this, so
 * the same code drives the host, the builder container, or a test fake.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: ExecOptions): Promise<CommandResult>;
}

// Runners and resolved state handed to every stage
export interface StepContext {
  config: BuildConfig;
  env: BuildEnvironment;
  host: CommandRunner;
  builder: CommandRunner;
}

export interface BuilderImageHandle {
  image: string;
  rebuilt: boolean;
  reason: RebuildReason;
}

export type RebuildReason =
  | 'forced'
  | 'missing'
  | 'unknown-timestamp'
  | 'definition-changed'
  | 'up-to-date';

export interface KernelOutput {
  release: string;
  outputDir: string;
  modulesDir: string;
  imagePath: string;
  bootImagePath: string;
}

export interface ToolSpec extends ToolSettings {
  name: string;
  resolvedUrl: string;
}

export type ToolOperation =
  | { kind: 'install'; tool: ToolSpec }
  | { kind: 'remove'; tool: ToolSpec; paths: string[] };

export interface FileChecksum {
  path: string;
  sha256: string;
}

export interface CollectedArtifacts {
  initramfs?: string;
  kernel?: string;
  checksums: FileChecksum[];
}

// CLI commands
export type BuildCommand =
  | 'build'
  | 'shell'
  | 'clean'
  | 'summary'
  | 'qemu-test'
  | 'help';
