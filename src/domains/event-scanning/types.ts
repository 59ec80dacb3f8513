/**
 * Event Scanning Domain Types
 */

import type { Readable } from 'node:stream';
import { z } from 'zod';
import type { Result } from '../../shared/result.js';
import type { DomainError } from '../../shared/errors.js';
import type { Execution } from './execution.js';

/**
 * Actions emitted by `go test -json`
 */
export const Action = {
  Run: 'run',
  Pause: 'pause',
  Cont: 'cont',
  Pass: 'pass',
  Bench: 'bench',
  Fail: 'fail',
  Output: 'output',
  Skip: 'skip',
} as const;

/**
 * One line of `go test -json` output as written by the test2json tool.
 * Unknown actions are kept; newer toolchains add some (start, build-output).
 */
export const testEventSchema = z.object({
  Time: z.string().optional(),
  Action: z.string(),
  Package: z.string().optional(),
  Test: z.string().optional(),
  Elapsed: z.number().optional(),
  Output: z.string().optional(),
});

/**
 * Decoded test event
 */
export interface TestEvent {
  readonly time?: string;
  readonly action: string;
  readonly package: string;
  /** Empty for package level events */
  readonly test: string;
  /** Seconds, set on pass and fail */
  readonly elapsed: number;
  readonly output: string;
  /** The line the event was decoded from */
  readonly raw: string;
}

/**
 * True when the event describes a package rather than a single test
 */
export const isPackageEvent = (event: TestEvent): boolean => event.test === '';

/**
 * Receives decoded events and diagnostic lines, in order per stream.
 * A failure aborts the scan.
 */
export interface EventHandler {
  event(event: TestEvent, execution: Execution): Promise<Result<void, DomainError>>;
  err(line: string): Promise<Result<void, DomainError>>;
}

/**
 * Scan configuration
 */
export interface ScanConfig {
  /** Destroyed by the scanner on the first failure */
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly handler: EventHandler;
  /** Millisecond clock used for elapsed time */
  readonly clock?: () => number;
}
