/**
 * initforge - Logger
 * Console output with colors and spinners
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export class Logger {
  private static instance: Logger;
  private currentSpinner: Ora | null = null;
  private startTime: number = Date.now();
  private stepTimes: Map<string, number> = new Map();

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Log info message
   */
  info(message: string): void {
    this.stopSpinner();
    console.log(chalk.blue('[INFO]'), message);
  }

  /**
   * Log success message
   */
  success(message: string): void {
    this.stopSpinner();
    console.log(chalk.green('[✓]'), message);
  }

  /**
   * Log warning message
   */
  warn(message: string): void {
    this.stopSpinner();
    console.log(chalk.yellow('[WARN]'), message);
  }

  /**
   * Log error message
   */
  error(message: string): void {
    this.stopSpinner();
    console.error(chalk.red('[ERROR]'), message);
  }

  /**
   * Log a build step
   */
  step(message: string): void {
    this.stopSpinner();
    console.log(chalk.cyan('==>'), message);
  }

  /**
   * Indented detail line under the previous message
   */
  detail(message: string): void {
    this.stopSpinner();
    console.log(`    ${message}`);
  }

  /**
   * Log a section header
   */
  section(title: string): void {
    this.stopSpinner();
    const border = '='.repeat(40);
    console.log('');
    console.log(chalk.cyan(border));
    console.log(chalk.cyan(title));
    console.log(chalk.cyan(border));
    console.log('');
  }

  /**
   * Start a spinner. Only for operations whose output is captured; a
   * command writing to the terminal would garble it.
   */
  startSpinner(text: string): Ora {
    this.stopSpinner();
    this.currentSpinner = ora({
      text,
      color: 'cyan',
    }).start();
    return this.currentSpinner;
  }

  stopSpinner(): void {
    if (this.currentSpinner) {
      this.currentSpinner.stop();
      this.currentSpinner = null;
    }
  }

  spinnerSuccess(text?: string): void {
    if (this.currentSpinner) {
      this.currentSpinner.succeed(text);
      this.currentSpinner = null;
    }
  }

  spinnerFail(text?: string): void {
    if (this.currentSpinner) {
      this.currentSpinner.fail(text);
      this.currentSpinner = null;
    }
  }

  /**
   * Start timing a step
   */
  startTimer(name: string): void {
    this.stepTimes.set(name, Date.now());
  }

  /**
   * Get elapsed time for a step
   */
  getElapsed(name: string): number {
    const start = this.stepTimes.get(name);
    if (!start) return 0;
    return (Date.now() - start) / 1000;
  }

  /**
   * Log step completion with timing
   */
  stepComplete(name: string, message?: string): void {
    const elapsed = this.getElapsed(name);
    const text = message ?? name;
    this.success(`${text} (${elapsed.toFixed(1)}s)`);
    this.stepTimes.delete(name);
  }

  stepFailed(name: string): void {
    const elapsed = this.getElapsed(name);
    this.error(`${name} failed (${elapsed.toFixed(1)}s)`);
    this.stepTimes.delete(name);
  }

  resetTimer(): void {
    this.startTime = Date.now();
    this.stepTimes.clear();
  }

  getTotalTime(): number {
    return (Date.now() - this.startTime) / 1000;
  }

  /**
   * Log build summary
   */
  summary(artifacts: { name: string; path: string; size?: string }[]): void {
    const totalTime = this.getTotalTime();

    this.section(`Build Complete! (${totalTime.toFixed(1)}s)`);

    console.log('Artifacts:');
    for (const artifact of artifacts) {
      const sizeInfo = artifact.size ? ` (${artifact.size})` : '';
      console.log(`  - ${artifact.name}: ${artifact.path}${sizeInfo}`);
    }

    console.log('');
    console.log('To boot in QEMU:');
    console.log('  initforge qemu-test');
    console.log('');
  }
}

// Export singleton
export const logger = Logger.getInstance();
