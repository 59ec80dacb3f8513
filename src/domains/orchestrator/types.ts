/**
 * Orchestrator Types
 */

import type { Colors } from '../../core/colors.js';
import type { RunLogger } from '../../core/run-logger.js';
import type { ChildExitError, DomainError } from '../../shared/errors.js';
import type { OutputWriter } from '../../types/output-writer.js';
import type { SystemEnvironment } from '../application-control/types.js';
import type { FileOpener } from '../formatting/event-handler.js';
import type { FileWriter } from '../reporting/junit-writer.js';
import type { ProcessStarter } from '../test-execution/types.js';

/**
 * How a run ended
 */
export type RunOutcome =
  | { type: 'success' }
  | { type: 'child-failed'; error: ChildExitError }
  | { type: 'orchestration-failed'; error: DomainError };

/**
 * Streams a run prints to
 */
export interface RunIO {
  readonly out: OutputWriter;
  readonly err: OutputWriter;
}

/**
 * Collaborators of the orchestrator
 */
export interface OrchestratorDependencies {
  readonly launcher: ProcessStarter;
  readonly environment: SystemEnvironment;
  readonly files: FileOpener & FileWriter;
  readonly logger: RunLogger;
  readonly colors: Colors;
  /** Clock for elapsed times, Date.now by default */
  readonly clock?: () => number;
}

/**
 * Per-run settings not carried by the options
 */
export interface RunContext {
  /** Aborting stops the child process */
  readonly signal?: AbortSignal;
}
