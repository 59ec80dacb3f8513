import pc from 'picocolors';
import type { LogMode } from '../types/log-mode.js';

/**
 * Color functions, enabled or disabled once for the whole run
 */
export type Colors = ReturnType<typeof pc.createColors>;

/**
 * Builds the color functions for a log mode.
 * Color stays off when the terminal does not support it or NO_COLOR is set.
 */
export function createColors(mode: LogMode): Colors {
  return pc.createColors(mode.color && pc.isColorSupported);
}
