import type { Readable } from 'node:stream';
import { createColors } from '../src/core/colors.js';
import type { Colors } from '../src/core/colors.js';
import type { RunOptions, SystemEnvironment } from '../src/domains/application-control/types.js';
import type { TestEvent } from '../src/domains/event-scanning/types.js';
import type { OutputWriter } from '../src/types/output-writer.js';

/**
 * Environment backed by a fixed set of variables
 */
export const fakeEnvironment = (vars: Record<string, string> = {}): SystemEnvironment => {
  const values = new Map(Object.entries(vars));
  return {
    getEnv: (name) => values.get(name),
  };
};

/**
 * Collects everything written to it
 */
export class MemoryWriter implements OutputWriter {
  text = '';

  write(text: string): boolean {
    this.text += text;
    return true;
  }
}

export const plainColors: Colors = createColors({ level: 'normal', color: false });

export const testEvent = (fields: Partial<TestEvent> & { action: string }): TestEvent => ({
  package: '',
  test: '',
  elapsed: 0,
  output: '',
  raw: '',
  ...fields,
});

/**
 * One line of go test -json output
 */
export const jsonLine = (fields: {
  Action: string;
  Package?: string;
  Test?: string;
  Elapsed?: number;
  Output?: string;
}): string => JSON.stringify({ Time: '2024-01-01T00:00:00Z', ...fields });

export const runOptions = (overrides: Partial<RunOptions> = {}): RunOptions => ({
  args: [],
  format: 'short',
  debug: false,
  rawCommand: false,
  jsonFile: '',
  junitFile: '',
  noColor: true,
  noSummary: [],
  ...overrides,
});

/**
 * A node -e script that writes the given lines and exits with the given code
 */
export const childScript = (
  stdoutLines: readonly string[],
  exitCode: number,
  stderrLines: readonly string[] = [],
): string =>
  `process.stdout.write(${JSON.stringify(stdoutLines.map((line) => line + '\n').join(''))});` +
  `process.stderr.write(${JSON.stringify(stderrLines.map((line) => line + '\n').join(''))});` +
  `process.exitCode = ${exitCode};`;

export const readAll = async (stream: Readable): Promise<string> => {
  let text = '';
  for await (const chunk of stream) {
    text += String(chunk);
  }
  return text;
};
