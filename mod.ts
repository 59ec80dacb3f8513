#!/usr/bin/env node
/**
 * go-test-sum - runs `go test -json` and prints formatted results and a summary
 *
 * This module provides:
 * - Streaming formatters for test events (dots, short, short-verbose, standard)
 * - An end-of-run summary of skipped tests, failures and errors
 * - A copy of every event in a JSON file
 * - A JUnit XML report
 *
 * @module
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { main } from './src/main.js';

export { main, PROGRAM_NAME } from './src/main.js';
export type { MainIO } from './src/main.js';

// Orchestrator Domain
export {
  RunOrchestrator,
  translateOutcome,
} from './src/domains/orchestrator/index.js';
export type { RunOutcome } from './src/domains/orchestrator/index.js';

// Application Control Domain
export { createHelpText, parseCli } from './src/domains/application-control/index.js';
export type { CliCommand, RunOptions } from './src/domains/application-control/index.js';

// Test Execution Domain
export { GoTestCommandBuilder } from './src/domains/test-execution/index.js';
export type { ChildProcessHandle, ProcessStarter } from './src/domains/test-execution/index.js';

// Event Scanning Domain
export { decodeTestEvent, Execution, scanTestOutput } from './src/domains/event-scanning/index.js';
export type { EventHandler, TestEvent } from './src/domains/event-scanning/index.js';

// Formatting Domain
export { createFormatter, FORMAT_NAMES, FormattingEventHandler } from './src/domains/formatting/index.js';

// Reporting Domain
export {
  computeSections,
  generateJunitXml,
  printSummary,
  SummarySections,
} from './src/domains/reporting/index.js';

// Infrastructure Adapters
export { createInfrastructureAdapters, ProcessLauncher } from './src/infrastructure/index.js';

// Shared Components
export type { Result } from './src/shared/result.js';
export { failure, success } from './src/shared/result.js';
export type { DomainError, RunError } from './src/shared/errors.js';

const isEntryPoint = (): boolean => {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
};

// If this file is run directly, execute the main function
if (isEntryPoint()) {
  process.exitCode = await main(process.argv.slice(2));
}
