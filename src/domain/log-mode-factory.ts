import type { LogMode } from '../types/log-mode.js';

/**
 * Factory for creating LogMode instances
 */
export class LogModeFactory {
  /**
   * Creates a LogMode from the debug and no-color flags
   */
  static fromFlags(flags: { debug: boolean; noColor: boolean }): LogMode {
    return {
      level: flags.debug ? 'debug' : 'normal',
      color: !flags.noColor,
    };
  }
}
