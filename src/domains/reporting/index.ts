/**
 * Reporting Domain
 * Exports all public interfaces and implementations
 */

export type { SummarySection } from './summary-sections.js';
export {
  computeSections,
  isSummarySection,
  SUMMARY_SECTIONS,
  SummarySections,
  unknownSectionNames,
} from './summary-sections.js';

export { formatDurationAsSeconds, formatSummary, printSummary } from './summary.js';

export type { FileWriter } from './junit-writer.js';
export { escapeXml, generateJunitXml, writeJunitFile } from './junit-writer.js';
