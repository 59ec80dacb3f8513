/**
 * Log mode types and configurations
 */
export type LogLevel = 'normal' | 'debug';

/**
 * Logging and color configuration, fixed once at startup
 */
export interface LogMode {
  readonly level: LogLevel;
  readonly color: boolean;
}
