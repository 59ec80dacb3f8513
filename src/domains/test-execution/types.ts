/**
 * Test Execution Domain Types
 */

import type { Readable } from 'node:stream';
import type { Result } from '../../shared/result.js';
import type { ChildExitError, DomainError } from '../../shared/errors.js';

/**
 * Base command the test arguments are appended to
 */
export const GO_TEST_COMMAND: readonly string[] = ['go', 'test'];

/**
 * Flag that makes go test emit one JSON event per line
 */
export const JSON_FLAG = '-json';

/**
 * Spellings of the json flag recognised in user arguments
 */
export const JSON_FLAG_SPELLINGS: readonly string[] = ['-json', '--json'];

/**
 * Target used when no arguments and no TEST_DIRECTORY are given
 */
export const DEFAULT_TEST_PATH = './...';

/**
 * Options for starting a child process
 */
export interface LaunchOptions {
  /** Aborting this signal kills the child */
  readonly signal?: AbortSignal;
}

/**
 * One spawned command, owned by the orchestrator for the duration of a run
 */
export interface ChildProcessHandle {
  readonly args: readonly string[];
  readonly pid: number | undefined;
  readonly stdout: Readable;
  readonly stderr: Readable;
  /**
   * Kills the process if it is still running and closes both pipes.
   * Safe to call more than once.
   */
  cancel(): void;
  /**
   * Resolves once the process has exited and its pipes are closed.
   * A non-zero exit or a kill by signal is a ChildExited error.
   */
  wait(): Promise<Result<void, ChildExitError>>;
}

/**
 * Terminal status reported by the child process
 */
export interface ExitStatus {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
}

/**
 * Process starter interface (to be implemented by infrastructure)
 */
export interface ProcessStarter {
  /**
   * Start `args[0]` with the remaining arguments.
   * The returned handle must be cancelled by the caller on every exit path.
   */
  start(
    args: readonly string[],
    options?: LaunchOptions,
  ): Promise<Result<ChildProcessHandle, DomainError>>;
}
