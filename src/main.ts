import { LogModeFactory } from './domain/log-mode-factory.js';
import { createColors } from './core/colors.js';
import { RunLogger } from './core/run-logger.js';
import { getVersionInfo } from './core/version.js';
import { createHelpText, parseCli } from './domains/application-control/cli-parser.js';
import type { SystemEnvironment } from './domains/application-control/types.js';
import {
  ORCHESTRATION_FAILURE_EXIT_CODE,
  RunOrchestrator,
  translateOutcome,
} from './domains/orchestrator/index.js';
import { createInfrastructureAdapters, createSystemEnvironment } from './infrastructure/index.js';
import { errorMessage } from './shared/result.js';
import type { OutputWriter } from './types/output-writer.js';

export const PROGRAM_NAME = 'gotestsum';

/**
 * Process-level collaborators of main, replaceable in tests
 */
export interface MainIO {
  readonly out: OutputWriter;
  readonly err: OutputWriter;
  readonly environment: SystemEnvironment;
  readonly programName: string;
  readonly signal?: AbortSignal;
}

/**
 * Main entry point
 * Parses the command line, runs the test command once and returns the exit code
 */
export async function main(args: readonly string[], io: Partial<MainIO> = {}): Promise<number> {
  const out = io.out ?? process.stdout;
  const err = io.err ?? process.stderr;
  const environment = io.environment ?? createSystemEnvironment();
  const programName = io.programName ?? PROGRAM_NAME;

  const parsed = parseCli(args, environment);
  if (!parsed.ok) {
    err.write(`${programName}: ${parsed.error.message}\n${createHelpText(programName)}`);
    return 1;
  }

  const command = parsed.data;
  if (command.type === 'help') {
    out.write(createHelpText(programName));
    return 0;
  }
  if (command.type === 'version') {
    const info = getVersionInfo();
    out.write(`${info.name} version ${info.version}\n`);
    return 0;
  }

  const { options } = command;
  const mode = LogModeFactory.fromFlags({ debug: options.debug, noColor: options.noColor });
  const colors = createColors(mode);
  const logger = RunLogger.create(mode, err, colors);
  logger.logDebug(`options: ${JSON.stringify(options)}`);

  try {
    const adapters = createInfrastructureAdapters(logger, environment);
    const orchestrator = new RunOrchestrator({ ...adapters, logger, colors }, { out, err });
    const outcome = await orchestrator.run(options, { signal: io.signal });
    return translateOutcome(outcome, { programName, stderr: err });
  } catch (error) {
    err.write(`${programName}: Error: ${errorMessage(error)}\n`);
    return ORCHESTRATION_FAILURE_EXIT_CODE;
  }
}
