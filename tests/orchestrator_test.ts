import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, expect, test } from 'vitest';
import { RunLogger } from '../src/core/run-logger.js';
import type { RunOptions } from '../src/domains/application-control/types.js';
import { RunOrchestrator } from '../src/domains/orchestrator/run-orchestrator.js';
import type { RunOutcome } from '../src/domains/orchestrator/types.js';
import { exitCodeWithDefault, translateOutcome } from '../src/domains/orchestrator/exit-translator.js';
import type { FileOpener, TextFileSink } from '../src/domains/formatting/event-handler.js';
import type { FileWriter } from '../src/domains/reporting/junit-writer.js';
import type { ChildProcessHandle, ProcessStarter } from '../src/domains/test-execution/types.js';
import { createFileSystemAdapter } from '../src/infrastructure/adapters/file-system-adapter.js';
import { ProcessLauncher } from '../src/infrastructure/adapters/process-launcher.js';
import { createChildExitError, createDomainError } from '../src/shared/errors.js';
import { failure, success } from '../src/shared/result.js';
import {
  childScript,
  fakeEnvironment,
  jsonLine,
  MemoryWriter,
  plainColors,
  runOptions,
} from './test_helpers.js';

const PKG = 'example/a';

const PASSING_RUN = [
  jsonLine({ Action: 'run', Package: PKG, Test: 'TestA' }),
  jsonLine({ Action: 'output', Package: PKG, Test: 'TestA', Output: '=== RUN   TestA\n' }),
  jsonLine({ Action: 'pass', Package: PKG, Test: 'TestA', Elapsed: 0.01 }),
  jsonLine({ Action: 'pass', Package: PKG, Elapsed: 0.1 }),
];

const FAILING_RUN = [
  jsonLine({ Action: 'run', Package: PKG, Test: 'TestB' }),
  jsonLine({ Action: 'output', Package: PKG, Test: 'TestB', Output: '    b_test.go:3: boom\n' }),
  jsonLine({ Action: 'fail', Package: PKG, Test: 'TestB', Elapsed: 0.02 }),
  jsonLine({ Action: 'fail', Package: PKG, Elapsed: 0.1 }),
];

let tempDir = '';

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'go-test-sum-run-'));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

interface Harness {
  readonly out: MemoryWriter;
  readonly err: MemoryWriter;
  run(options: RunOptions): Promise<RunOutcome>;
}

const createHarness = (
  overrides: { launcher?: ProcessStarter; files?: FileOpener & FileWriter } = {},
): Harness => {
  const out = new MemoryWriter();
  const err = new MemoryWriter();
  const logger = RunLogger.create({ level: 'normal', color: false }, err, plainColors);
  const orchestrator = new RunOrchestrator(
    {
      launcher: overrides.launcher ?? new ProcessLauncher(logger),
      environment: fakeEnvironment(),
      files: overrides.files ?? createFileSystemAdapter(),
      logger,
      colors: plainColors,
      clock: () => 0,
    },
    { out, err },
  );
  return { out, err, run: (options) => orchestrator.run(options) };
};

const nodeCommand = (script: string): Partial<RunOptions> => ({
  rawCommand: true,
  args: [process.execPath, '-e', script],
});

test('RunOrchestrator - formats events and prints the summary', async () => {
  const harness = createHarness();
  const outcome = await harness.run(runOptions(nodeCommand(childScript(PASSING_RUN, 0))));

  expect(outcome).toEqual({ type: 'success' });
  expect(harness.out.text).toBe(`✓  ${PKG} (100ms)\n` + '\nDONE 1 tests in 0.000s\n');
  expect(harness.err.text).toBe('');
});

test('RunOrchestrator - forwards the exit status of failing tests', async () => {
  const harness = createHarness();
  const outcome = await harness.run(
    runOptions({ format: 'short-verbose', ...nodeCommand(childScript(FAILING_RUN, 2)) }),
  );

  expect(outcome.type).toBe('child-failed');
  if (outcome.type === 'child-failed') {
    expect(outcome.error.exitCode).toBe(2);
  }
  expect(harness.out.text).toBe(
    `    b_test.go:3: boom\nFAIL ${PKG}.TestB (0.02s)\n` +
      `FAIL ${PKG}\n` +
      '\nDONE 1 tests, 1 failure in 0.000s\n' +
      '\n=== Failed\n' +
      `=== FAIL: ${PKG} TestB (0.02s)\n` +
      '    b_test.go:3: boom\n' +
      '\n',
  );
});

test('RunOrchestrator - prints stderr lines and lists them as errors', async () => {
  const harness = createHarness();
  const outcome = await harness.run(runOptions(nodeCommand(childScript([], 1, ['build failed']))));

  expect(outcome.type).toBe('child-failed');
  expect(harness.err.text).toBe('build failed\n');
  expect(harness.out.text).toBe('\nDONE 0 tests, 1 error in 0.000s\n\n=== Errors\nbuild failed\n');
});

test('RunOrchestrator - honours --no-summary', async () => {
  const harness = createHarness();
  await harness.run(
    runOptions({
      noSummary: ['failed', 'errors'],
      ...nodeCommand(childScript(FAILING_RUN, 1, ['warning'])),
    }),
  );

  expect(harness.out.text).toBe(
    `✖  ${PKG} (100ms)\n` + '\nDONE 1 tests, 1 failure, 1 error in 0.000s\n',
  );
});

test('RunOrchestrator - warns about unknown --no-summary values', async () => {
  const harness = createHarness();
  const outcome = await harness.run(
    runOptions({ noSummary: ['bogus', 'failed'], ...nodeCommand(childScript([], 0)) }),
  );

  expect(outcome).toEqual({ type: 'success' });
  expect(harness.err.text).toBe('⚠️  warning: ignoring unknown --no-summary value: bogus\n');
});

test('RunOrchestrator - writes the JSON and JUnit files', async () => {
  const jsonFile = join(tempDir, 'events.json');
  const junitFile = join(tempDir, 'junit.xml');
  const harness = createHarness();
  const outcome = await harness.run(
    runOptions({ jsonFile, junitFile, ...nodeCommand(childScript(PASSING_RUN, 0)) }),
  );

  expect(outcome).toEqual({ type: 'success' });
  expect(await readFile(jsonFile, 'utf8')).toBe(PASSING_RUN.join('\n') + '\n');
  expect(await readFile(junitFile, 'utf8')).toBe(
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
      '<testsuites tests="1" failures="0" time="0.000">\n' +
      `  <testsuite name="${PKG}" tests="1" failures="0" skipped="0" time="0.100">\n` +
      `    <testcase classname="${PKG}" name="TestA" time="0.010"/>\n` +
      '  </testsuite>\n' +
      '</testsuites>\n',
  );
});

test('RunOrchestrator - fails on output that is not a test event', async () => {
  const harness = createHarness();
  const outcome = await harness.run(runOptions(nodeCommand(childScript(['garbage'], 0))));

  expect(outcome.type).toBe('orchestration-failed');
  if (outcome.type === 'orchestration-failed') {
    expect(outcome.error.kind).toBe('DecodeFailed');
  }
  expect(harness.out.text).toBe('');
});

test('RunOrchestrator - leaves no child running after a failure', async () => {
  const handles: ChildProcessHandle[] = [];
  const out = new MemoryWriter();
  const logger = RunLogger.create({ level: 'normal', color: false }, out, plainColors);
  const real = new ProcessLauncher(logger);
  const launcher: ProcessStarter = {
    start: async (args, options) => {
      const started = await real.start(args, options);
      if (started.ok) {
        handles.push(started.data);
      }
      return started;
    },
  };
  const harness = createHarness({ launcher });
  const script = `process.stdout.write('garbage\\n'); setInterval(() => {}, 1000);`;
  const outcome = await harness.run(runOptions(nodeCommand(script)));

  expect(outcome.type).toBe('orchestration-failed');
  expect(handles).toHaveLength(1);
  const [handle] = handles;
  expect(handle?.stdout.destroyed).toBe(true);
  expect(handle?.stderr.destroyed).toBe(true);
  const pid = handle?.pid ?? 0;
  expect(pid).toBeGreaterThan(0);
  expect(() => process.kill(pid, 0)).toThrow();
});

test('RunOrchestrator - fails when the command cannot be started', async () => {
  const harness = createHarness();
  const outcome = await harness.run(
    runOptions({ rawCommand: true, args: ['go-test-sum-missing-command'] }),
  );

  expect(outcome.type).toBe('orchestration-failed');
  if (outcome.type === 'orchestration-failed') {
    expect(outcome.error.kind).toBe('ProcessSpawnFailed');
  }
});

test('RunOrchestrator - closes the JSON file once and reports a close failure', async () => {
  let closes = 0;
  const sink: TextFileSink = {
    write: () => Promise.resolve(success(undefined)),
    close: () => {
      closes++;
      return Promise.resolve(failure(new Error('disk full')));
    },
  };
  const files: FileOpener & FileWriter = {
    openForWriting: () => Promise.resolve(success(sink)),
    write: () => Promise.resolve(success(undefined)),
  };
  const harness = createHarness({ files });
  const outcome = await harness.run(
    runOptions({ jsonFile: 'events.json', ...nodeCommand(childScript(PASSING_RUN, 0)) }),
  );

  expect(closes).toBe(1);
  expect(outcome.type).toBe('orchestration-failed');
  if (outcome.type === 'orchestration-failed') {
    expect(outcome.error.kind).toBe('EventFileFailed');
    expect(outcome.error.message).toBe('failed to close JSON file events.json: disk full');
  }
});

test('RunOrchestrator - a failed run takes precedence over a close failure', async () => {
  const sink: TextFileSink = {
    write: () => Promise.resolve(success(undefined)),
    close: () => Promise.resolve(failure(new Error('disk full'))),
  };
  const files: FileOpener & FileWriter = {
    openForWriting: () => Promise.resolve(success(sink)),
    write: () => Promise.resolve(success(undefined)),
  };
  const harness = createHarness({ files });
  const outcome = await harness.run(
    runOptions({ jsonFile: 'events.json', ...nodeCommand(childScript(FAILING_RUN, 1)) }),
  );

  expect(outcome.type).toBe('child-failed');
});

test('RunOrchestrator - rejects an unknown format before starting anything', async () => {
  const started: string[][] = [];
  const launcher: ProcessStarter = {
    start: (args) => {
      started.push([...args]);
      return Promise.resolve(failure(createDomainError({
        domain: 'execution',
        kind: 'ProcessSpawnFailed',
        message: 'not expected',
        command: args,
      })));
    },
  };
  const harness = createHarness({ launcher });
  const outcome = await harness.run(runOptions({ format: 'fancy' }));

  expect(outcome.type).toBe('orchestration-failed');
  if (outcome.type === 'orchestration-failed') {
    expect(outcome.error.message).toBe('unknown format fancy');
  }
  expect(started).toEqual([]);
});

test('RunOrchestrator - runs go test -json by default', async () => {
  const started: string[][] = [];
  const launcher: ProcessStarter = {
    start: (args) => {
      started.push([...args]);
      return Promise.resolve(failure(createDomainError({
        domain: 'execution',
        kind: 'ProcessSpawnFailed',
        message: 'failed to run go test -json ./...: go is not installed',
        command: args,
      })));
    },
  };
  const harness = createHarness({ launcher });
  await harness.run(runOptions());

  expect(started).toEqual([['go', 'test', '-json', './...']]);
});

test('translateOutcome - exits 0 on success', () => {
  const stderr = new MemoryWriter();

  expect(translateOutcome({ type: 'success' }, { programName: 'gotestsum', stderr })).toBe(0);
  expect(stderr.text).toBe('');
});

test('translateOutcome - passes the child exit code through silently', () => {
  const stderr = new MemoryWriter();
  const error = createChildExitError(['go', 'test', '-json'], 2, null);

  expect(translateOutcome({ type: 'child-failed', error }, { programName: 'gotestsum', stderr }))
    .toBe(2);
  expect(stderr.text).toBe('');
});

test('translateOutcome - prints one line and exits 3 for other failures', () => {
  const stderr = new MemoryWriter();
  const error = createDomainError({
    domain: 'application',
    kind: 'UnknownFormat',
    message: 'unknown format fancy',
  });

  expect(
    translateOutcome({ type: 'orchestration-failed', error }, { programName: 'gotestsum', stderr }),
  ).toBe(3);
  expect(stderr.text).toBe('gotestsum: Error: unknown format fancy\n');
});

test('exitCodeWithDefault - falls back to 127 without an exit code', () => {
  expect(exitCodeWithDefault(createChildExitError(['go'], null, 'SIGKILL'))).toBe(127);
  expect(exitCodeWithDefault(createChildExitError(['go'], 1, null))).toBe(1);
});
