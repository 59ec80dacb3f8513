/**
 * Output formats for test events
 */

import type { Result } from '../../shared/result.js';
import { failure, success } from '../../shared/result.js';
import type { DomainError } from '../../shared/errors.js';
import { createDomainError } from '../../shared/errors.js';
import type { Colors } from '../../core/colors.js';
import type { Execution } from '../event-scanning/execution.js';
import { isCoverageOutput } from '../event-scanning/execution.js';
import type { TestEvent } from '../event-scanning/types.js';
import { Action, isPackageEvent } from '../event-scanning/types.js';

/**
 * Turns one event into the text to print (possibly empty)
 */
export type EventFormatter = (event: TestEvent, execution: Execution) => string;

export const FORMAT_NAMES = [
  'dots',
  'short',
  'short-verbose',
  'standard-quiet',
  'standard-verbose',
] as const;

export type FormatName = typeof FORMAT_NAMES[number];

const isFormatName = (name: string): name is FormatName =>
  FORMAT_NAMES.some((format) => format === name);

/**
 * Look up a formatter by name
 */
export const createFormatter = (
  format: string,
  colors: Colors,
): Result<EventFormatter, DomainError> => {
  if (!isFormatName(format)) {
    return failure(createDomainError({
      domain: 'application',
      kind: 'UnknownFormat',
      message: `unknown format ${format}`,
      details: { supported: FORMAT_NAMES },
    }));
  }

  switch (format) {
    case 'dots':
      return success(dotsFormat(colors));
    case 'short':
      return success(shortFormat(colors));
    case 'short-verbose':
      return success(shortVerboseFormat(colors));
    case 'standard-quiet':
      return success(standardQuietFormat);
    case 'standard-verbose':
      return success(standardVerboseFormat);
  }
};

/**
 * Duration as go prints it: `10ms`, `1.5s`
 */
export const formatDuration = (seconds: number): string => {
  const milliseconds = Math.round(seconds * 1000);
  if (milliseconds < 1000) {
    return `${milliseconds}ms`;
  }
  return `${Number((milliseconds / 1000).toFixed(3))}s`;
};

const standardVerboseFormat: EventFormatter = (event) =>
  event.action === Action.Output ? event.output : '';

const standardQuietFormat: EventFormatter = (event) => {
  if (!isPackageEvent(event) || event.action !== Action.Output) {
    return '';
  }
  if (event.output === 'PASS\n' || isCoverageOutput(event.output)) {
    return '';
  }
  return event.output;
};

const dotsFormat = (colors: Colors): EventFormatter => (event, execution) => {
  if (isPackageEvent(event)) {
    return '';
  }
  switch (event.action) {
    case Action.Run:
      return execution.package(event.package)?.total === 1 ? `[${event.package}]` : '';
    case Action.Pass:
      return colors.green('·');
    case Action.Fail:
      return colors.red('✖');
    case Action.Skip:
      return colors.yellow('↷');
  }
  return '';
};

const shortFormat = (colors: Colors): EventFormatter => (event, execution) => {
  if (!isPackageEvent(event)) {
    return '';
  }

  const pkg = execution.package(event.package);
  const line = (symbol: string): string => {
    const elapsed = event.elapsed > 0 ? ` (${formatDuration(event.elapsed)})` : '';
    const coverage = pkg && pkg.coverage !== '' ? ` (${pkg.coverage})` : '';
    return `${symbol}  ${event.package}${elapsed}${coverage}\n`;
  };

  switch (event.action) {
    case Action.Skip:
      return line(colors.yellow('∅'));
    case Action.Pass:
      return line(colors.green(pkg && pkg.total > 0 ? '✓' : '∅'));
    case Action.Fail:
      return line(colors.red('✖'));
  }
  return '';
};

const shortVerboseFormat = (colors: Colors): EventFormatter => (event, execution) => {
  const color = actionColor(colors, event.action);

  if (isPackageFailureOutput(event)) {
    return event.output;
  }

  if (isPackageEvent(event)) {
    switch (event.action) {
      case Action.Skip:
        return `${color('EMPTY')} ${event.package}\n`;
      case Action.Pass:
      case Action.Fail:
        return `${color(event.action.toUpperCase())} ${event.package}\n`;
    }
    return '';
  }

  const testLine = (): string =>
    `${color(event.action.toUpperCase())} ${event.package}.${event.test} (${event.elapsed.toFixed(2)}s)\n`;

  switch (event.action) {
    case Action.Fail:
      return execution.output(event.package, event.test) + testLine();
    case Action.Pass:
    case Action.Skip:
      return testLine();
  }
  return '';
};

const actionColor = (colors: Colors, action: string): (text: string) => string => {
  switch (action) {
    case Action.Pass:
      return colors.green;
    case Action.Fail:
      return colors.red;
    case Action.Skip:
      return colors.yellow;
  }
  return (text) => text;
};

/**
 * Package output that is not part of go test's own result framing,
 * e.g. a build failure or a panic outside of any test
 */
const isPackageFailureOutput = (event: TestEvent): boolean => {
  if (!isPackageEvent(event) || event.action !== Action.Output) {
    return false;
  }
  const output = event.output;
  return output !== 'PASS\n' &&
    output !== 'FAIL\n' &&
    !output.startsWith(`FAIL\t${event.package}`) &&
    !output.startsWith(`ok  \t${event.package}`) &&
    !output.startsWith('?   \t') &&
    !isCoverageOutput(output);
};
