/**
 * End-of-run summary
 */

import type { Result } from '../../shared/result.js';
import { errorMessage, failure, success } from '../../shared/result.js';
import type { DomainError } from '../../shared/errors.js';
import { createDomainError } from '../../shared/errors.js';
import type { OutputWriter } from '../../types/output-writer.js';
import type { Execution, TestCase } from '../event-scanning/execution.js';
import type { SummarySections } from './summary-sections.js';

/**
 * Milliseconds as seconds with a fixed number of decimals
 */
export const formatDurationAsSeconds = (milliseconds: number, precision: number): string =>
  `${(milliseconds / 1000).toFixed(precision)}s`;

/**
 * Print the summary of an execution
 */
export const printSummary = (
  out: OutputWriter,
  execution: Execution,
  sections: SummarySections,
): Result<void, DomainError> => {
  try {
    out.write(formatSummary(execution, sections));
    return success(undefined);
  } catch (error) {
    return failure(createDomainError({
      domain: 'reporting',
      kind: 'SummaryWriteFailed',
      message: `failed to print summary: ${errorMessage(error)}`,
      cause: error,
    }));
  }
};

/**
 * Summary text: the DONE line, then skipped, failed and errors sections when enabled
 */
export const formatSummary = (execution: Execution, sections: SummarySections): string => {
  const skipped = execution.skipped();
  const failed = execution.failed();
  const errors = execution.errors();

  let text = `\nDONE ${execution.total()} tests` +
    formatCount(skipped.length, 'skipped', '') +
    formatCount(failed.length, 'failure', 's') +
    formatCount(errors.length, 'error', 's') +
    ` in ${formatDurationAsSeconds(execution.elapsed(), 3)}\n`;

  if (sections.includes('skipped')) {
    text += formatTestCases(execution, skipped, 'Skipped', 'SKIP');
  }
  if (sections.includes('failed')) {
    text += formatTestCases(execution, failed, 'Failed', 'FAIL');
  }
  if (sections.includes('errors') && errors.length > 0) {
    text += '\n=== Errors\n' + errors.map((line) => line + '\n').join('');
  }
  return text;
};

const formatCount = (count: number, category: string, plural: string): string => {
  if (count === 0) {
    return '';
  }
  return `, ${count} ${category}${count > 1 ? plural : ''}`;
};

const formatTestCases = (
  execution: Execution,
  testCases: readonly TestCase[],
  header: string,
  prefix: string,
): string => {
  if (testCases.length === 0) {
    return '';
  }

  let text = `\n=== ${header}\n`;
  for (const testCase of testCases) {
    text += `=== ${prefix}: ${testCase.package} ${testCase.test} (${testCase.elapsed.toFixed(2)}s)\n`;
    for (const line of execution.outputLines(testCase.package, testCase.test)) {
      if (!isFramingLine(line)) {
        text += line;
      }
    }
    text += '\n';
  }
  return text;
};

/**
 * `=== RUN`, `=== PAUSE` and `=== CONT` lines carry no information in a summary
 */
const isFramingLine = (line: string): boolean => {
  const trimmed = line.trimStart();
  return trimmed.startsWith('=== RUN') ||
    trimmed.startsWith('=== PAUSE') ||
    trimmed.startsWith('=== CONT');
};
