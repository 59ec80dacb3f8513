/**
 * Maps a run outcome to the process exit code
 */

import type { ChildExitError } from '../../shared/errors.js';
import { formatError } from '../../shared/errors.js';
import type { OutputWriter } from '../../types/output-writer.js';
import type { RunOutcome } from './types.js';

/** Used when the child's exit code cannot be determined */
export const FALLBACK_EXIT_CODE = 127;

/** Used for failures outside the child process */
export const ORCHESTRATION_FAILURE_EXIT_CODE = 3;

/**
 * A failing child passes its own code through silently; any other
 * failure prints one `<program>: Error: <message>` line.
 */
export const translateOutcome = (
  outcome: RunOutcome,
  target: { programName: string; stderr: OutputWriter },
): number => {
  switch (outcome.type) {
    case 'success':
      return 0;
    case 'child-failed':
      return exitCodeWithDefault(outcome.error);
    case 'orchestration-failed':
      target.stderr.write(`${target.programName}: Error: ${formatError(outcome.error)}\n`);
      return ORCHESTRATION_FAILURE_EXIT_CODE;
  }
};

export const exitCodeWithDefault = (error: ChildExitError): number =>
  error.exitCode !== undefined && error.exitCode > 0 ? error.exitCode : FALLBACK_EXIT_CODE;
