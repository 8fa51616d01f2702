/**
 * initforge - Errors
 */

/**
 * Invalid or incomplete configuration. Always raised before any external
 * command runs.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * An external command exited with a non-zero status.
 */
export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stderr: string = '') {
    super(`Command failed with exit code ${exitCode}: ${command}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
