import { expect, test } from 'vitest';
import { Execution } from '../src/domains/event-scanning/execution.js';
import { SummarySections } from '../src/domains/reporting/summary-sections.js';
import { formatSummary, printSummary } from '../src/domains/reporting/summary.js';
import { testEvent } from './test_helpers.js';

const PKG = 'example/a';

const buildExecution = (): Execution => {
  const execution = new Execution(() => 0);
  execution.add(testEvent({ action: 'run', package: PKG, test: 'TestOk' }));
  execution.add(testEvent({ action: 'pass', package: PKG, test: 'TestOk' }));
  execution.add(testEvent({ action: 'run', package: PKG, test: 'TestSkip' }));
  execution.add(testEvent({ action: 'output', package: PKG, test: 'TestSkip', output: '=== RUN   TestSkip\n' }));
  execution.add(testEvent({ action: 'output', package: PKG, test: 'TestSkip', output: '    a_test.go:9: not today\n' }));
  execution.add(testEvent({ action: 'skip', package: PKG, test: 'TestSkip' }));
  execution.add(testEvent({ action: 'run', package: PKG, test: 'TestBad' }));
  execution.add(testEvent({ action: 'output', package: PKG, test: 'TestBad', output: '=== RUN   TestBad\n' }));
  execution.add(testEvent({ action: 'output', package: PKG, test: 'TestBad', output: '    a_test.go:12: boom\n' }));
  execution.add(testEvent({ action: 'fail', package: PKG, test: 'TestBad', elapsed: 0.02 }));
  execution.addError('warning: something');
  return execution;
};

test('formatSummary - prints every section', () => {
  const text = formatSummary(buildExecution(), SummarySections.all());

  expect(text).toBe(
    '\nDONE 3 tests, 1 skipped, 1 failure, 1 error in 0.000s\n' +
      '\n=== Skipped\n' +
      `=== SKIP: ${PKG} TestSkip (0.00s)\n` +
      '    a_test.go:9: not today\n' +
      '\n' +
      '\n=== Failed\n' +
      `=== FAIL: ${PKG} TestBad (0.02s)\n` +
      '    a_test.go:12: boom\n' +
      '\n' +
      '\n=== Errors\n' +
      'warning: something\n',
  );
});

test('formatSummary - leaves out suppressed sections but keeps the counts', () => {
  const sections = SummarySections.all().without(['failed', 'skipped']);
  const text = formatSummary(buildExecution(), sections);

  expect(text).toBe(
    '\nDONE 3 tests, 1 skipped, 1 failure, 1 error in 0.000s\n' +
      '\n=== Errors\n' +
      'warning: something\n',
  );
});

test('formatSummary - prints only the DONE line for an empty run', () => {
  const text = formatSummary(new Execution(() => 0), SummarySections.all());

  expect(text).toBe('\nDONE 0 tests in 0.000s\n');
});

test('formatSummary - pluralises failures and errors', () => {
  const times = [0, 1234];
  const execution = new Execution(() => times.shift() ?? 0);
  for (const name of ['TestA', 'TestB']) {
    execution.add(testEvent({ action: 'run', package: PKG, test: name }));
    execution.add(testEvent({ action: 'fail', package: PKG, test: name }));
  }
  execution.addError('one');
  execution.addError('two');

  const text = formatSummary(execution, SummarySections.all().without(['failed', 'errors']));

  expect(text).toBe('\nDONE 2 tests, 2 failures, 2 errors in 1.234s\n');
});

test('printSummary - writes the summary', () => {
  let written = '';
  const result = printSummary(
    { write: (text: string) => (written += text) },
    new Execution(() => 0),
    SummarySections.all(),
  );

  expect(result.ok).toBe(true);
  expect(written).toBe('\nDONE 0 tests in 0.000s\n');
});

test('printSummary - reports a failing writer', () => {
  const result = printSummary(
    {
      write: () => {
        throw new Error('stream closed');
      },
    },
    new Execution(() => 0),
    SummarySections.all(),
  );

  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error.kind).toBe('SummaryWriteFailed');
    expect(result.error.message).toBe('failed to print summary: stream closed');
  }
});
