/**
 * Test output scanner
 * Reads stdout as `go test -json` events and stderr as plain lines, concurrently
 */

import type { Readable } from 'node:stream';
import type { Result } from '../../shared/result.js';
import { errorMessage, failure, success } from '../../shared/result.js';
import type { DomainError } from '../../shared/errors.js';
import { createDomainError } from '../../shared/errors.js';
import { Execution } from './execution.js';
import { splitLines } from './line-splitter.js';
import type { EventHandler, ScanConfig, TestEvent } from './types.js';
import { testEventSchema } from './types.js';

/**
 * Consume both streams until they end and return the aggregated execution.
 *
 * Events reach the handler in stdout line order; stderr lines are delivered
 * independently. The first failure destroys both streams and is returned.
 */
export const scanTestOutput = async (
  config: ScanConfig,
): Promise<Result<Execution, DomainError>> => {
  const execution = new Execution(config.clock);
  const state: { firstError?: DomainError } = {};
  const abort = (error: DomainError): void => {
    if (state.firstError !== undefined) {
      return;
    }
    state.firstError = error;
    config.stdout.destroy();
    config.stderr.destroy();
  };
  const aborted = (): boolean => state.firstError !== undefined;

  await Promise.all([
    readLines(config.stdout, 'stdout', abort, aborted, (line) =>
      handleEvent(line, execution, config.handler)),
    readLines(config.stderr, 'stderr', abort, aborted, (line) => {
      execution.addError(line);
      return callHandler(() => config.handler.err(line));
    }),
  ]);

  if (state.firstError !== undefined) {
    return failure(state.firstError);
  }
  return success(execution);
};

/**
 * Decode one line of `go test -json` output
 */
export const decodeTestEvent = (line: string): Result<TestEvent, DomainError> => {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    return failure(decodeFailed(line, errorMessage(error), error));
  }

  const parsed = testEventSchema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'event'}: ${issue.message}`)
      .join('; ');
    return failure(decodeFailed(line, reason, parsed.error));
  }

  const data = parsed.data;
  return success({
    time: data.Time,
    action: data.Action,
    package: data.Package ?? '',
    test: data.Test ?? '',
    elapsed: data.Elapsed ?? 0,
    output: data.Output ?? '',
    raw: line,
  });
};

const readLines = async (
  stream: Readable,
  streamName: 'stdout' | 'stderr',
  abort: (error: DomainError) => void,
  aborted: () => boolean,
  onLine: (line: string) => Promise<Result<void, DomainError>>,
): Promise<void> => {
  try {
    for await (const line of splitLines(stream)) {
      if (aborted()) {
        return;
      }
      const result = await onLine(line);
      if (!result.ok) {
        abort(result.error);
        return;
      }
    }
  } catch (error) {
    abort(createDomainError({
      domain: 'scanning',
      kind: 'StreamFailed',
      message: `failed to read ${streamName}: ${errorMessage(error)}`,
      cause: error,
    }));
  }
};

const handleEvent = (
  line: string,
  execution: Execution,
  handler: EventHandler,
): Promise<Result<void, DomainError>> => {
  const decoded = decodeTestEvent(line);
  if (!decoded.ok) {
    return Promise.resolve(decoded);
  }
  execution.add(decoded.data);
  return callHandler(() => handler.event(decoded.data, execution));
};

const callHandler = async (
  call: () => Promise<Result<void, DomainError>>,
): Promise<Result<void, DomainError>> => {
  try {
    return await call();
  } catch (error) {
    return failure(createDomainError({
      domain: 'scanning',
      kind: 'HandlerFailed',
      message: `failed to handle test output: ${errorMessage(error)}`,
      cause: error,
    }));
  }
};

const decodeFailed = (line: string, reason: string, cause: unknown): DomainError =>
  createDomainError({
    domain: 'scanning',
    kind: 'DecodeFailed',
    message: `failed to parse test output: ${line}: ${reason}`,
    line,
    cause,
  });
