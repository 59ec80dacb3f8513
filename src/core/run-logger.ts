import type { LogMode } from '../types/log-mode.js';
import type { OutputWriter } from '../types/output-writer.js';
import type { Colors } from './colors.js';
import { createColors } from './colors.js';

/**
 * Diagnostic logger for a run.
 * Writes to the given stream (stderr in the CLI) so it never mixes with formatted test output.
 */
export class RunLogger {
  private constructor(
    private readonly mode: LogMode,
    private readonly out: OutputWriter,
    private readonly colors: Colors,
  ) {}

  /**
   * Creates a new logger instance
   */
  static create(mode: LogMode, out: OutputWriter, colors: Colors = createColors(mode)): RunLogger {
    return new RunLogger(mode, out, colors);
  }

  /**
   * Logs a warning message
   */
  logWarning(message: string): void {
    this.out.write(`${this.colors.yellow('⚠️  warning:')} ${message}\n`);
  }

  /**
   * Logs a debug message
   */
  logDebug(message: string): void {
    if (this.isDebugEnabled()) {
      const timestamp = new Date().toISOString();
      this.out.write(`${this.colors.dim(`🐛 [${timestamp}]`)} ${message}\n`);
    }
  }

  /**
   * Logs command execution
   */
  logCommand(args: readonly string[]): void {
    this.logDebug(`exec: [${args.join(' ')}]`);
  }

  /**
   * Checks if debug logging is enabled
   */
  isDebugEnabled(): boolean {
    return this.mode.level === 'debug';
  }
}
