/**
 * Formatting Domain
 * Exports all public interfaces and implementations
 */

export type { EventFormatter, FormatName } from './formatters.js';
export { createFormatter, FORMAT_NAMES, formatDuration } from './formatters.js';

export type {
  EventHandlerConfig,
  FileOpener,
  TextFileSink,
} from './event-handler.js';
export { FormattingEventHandler } from './event-handler.js';
