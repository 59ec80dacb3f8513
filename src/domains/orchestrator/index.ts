/**
 * Orchestrator Domain
 * Exports all public interfaces and implementations
 */

export type {
  OrchestratorDependencies,
  RunContext,
  RunIO,
  RunOutcome,
} from './types.js';

export { RunOrchestrator } from './run-orchestrator.js';

export {
  exitCodeWithDefault,
  FALLBACK_EXIT_CODE,
  ORCHESTRATION_FAILURE_EXIT_CODE,
  translateOutcome,
} from './exit-translator.js';
