/**
 * Infrastructure Adapters
 * Creates concrete implementations for domain interfaces
 */

import type { RunLogger } from '../core/run-logger.js';
import type { SystemEnvironment } from '../domains/application-control/types.js';
import type { FileOpener } from '../domains/formatting/event-handler.js';
import type { FileWriter } from '../domains/reporting/junit-writer.js';
import type { ProcessStarter } from '../domains/test-execution/types.js';

import { createFileSystemAdapter } from './adapters/file-system-adapter.js';
import { ProcessLauncher } from './adapters/process-launcher.js';
import { createSystemEnvironment } from './adapters/system-environment.js';

/**
 * Infrastructure adapters collection
 */
export interface InfrastructureAdapters {
  readonly launcher: ProcessStarter;
  readonly environment: SystemEnvironment;
  readonly files: FileOpener & FileWriter;
}

/**
 * Create all infrastructure adapters
 */
export function createInfrastructureAdapters(
  logger: RunLogger,
  environment: SystemEnvironment = createSystemEnvironment(),
): InfrastructureAdapters {
  return {
    launcher: new ProcessLauncher(logger),
    environment,
    files: createFileSystemAdapter(),
  };
}

export { createFileSystemAdapter } from './adapters/file-system-adapter.js';
export { ProcessLauncher } from './adapters/process-launcher.js';
export { createSystemEnvironment } from './adapters/system-environment.js';
