/**
 * Run Orchestrator
 * Runs the test command once and reports on it
 */

import type { Result } from '../../shared/result.js';
import type { DomainError, RunError } from '../../shared/errors.js';
import { isChildExitError } from '../../shared/errors.js';
import type { RunOptions } from '../application-control/types.js';
import { scanTestOutput } from '../event-scanning/scanner.js';
import { FormattingEventHandler } from '../formatting/event-handler.js';
import { writeJunitFile } from '../reporting/junit-writer.js';
import { printSummary } from '../reporting/summary.js';
import type { SummarySections } from '../reporting/summary-sections.js';
import { computeSections, unknownSectionNames } from '../reporting/summary-sections.js';
import { GoTestCommandBuilder } from '../test-execution/command-builder.js';
import type { OrchestratorDependencies, RunContext, RunIO, RunOutcome } from './types.js';

export class RunOrchestrator {
  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly io: RunIO,
  ) {}

  /**
   * Build the command, stream its events through the handler, then print the
   * summary and write the JUnit file. The child's exit status is checked last.
   */
  async run(options: RunOptions, context: RunContext = {}): Promise<RunOutcome> {
    const result = await this.execute(options, context);
    if (result.ok) {
      return { type: 'success' };
    }
    if (isChildExitError(result.error)) {
      return { type: 'child-failed', error: result.error };
    }
    return { type: 'orchestration-failed', error: result.error };
  }

  private async execute(
    options: RunOptions,
    context: RunContext,
  ): Promise<Result<void, RunError>> {
    const ignored = unknownSectionNames(options.noSummary);
    if (ignored.length > 0) {
      this.deps.logger.logWarning(`ignoring unknown --no-summary value: ${ignored.join(', ')}`);
    }
    const sections = computeSections(options.noSummary);

    const created = await FormattingEventHandler.create(
      { format: options.format, jsonFile: options.jsonFile },
      this.io,
      this.deps.colors,
      this.deps.files,
    );
    if (!created.ok) {
      return created;
    }
    const handler = created.data;

    let result: Result<void, RunError>;
    let closed: Result<void, DomainError>;
    try {
      result = await this.runCommand(options, sections, handler, context);
    } finally {
      closed = await handler.close();
    }
    // a failed run reports its own error; a close failure only surfaces otherwise
    if (!result.ok) {
      return result;
    }
    return closed;
  }

  private async runCommand(
    options: RunOptions,
    sections: SummarySections,
    handler: FormattingEventHandler,
    context: RunContext,
  ): Promise<Result<void, RunError>> {
    const args = GoTestCommandBuilder.build(options, this.deps.environment);
    const started = await this.deps.launcher.start(args, { signal: context.signal });
    if (!started.ok) {
      return started;
    }
    const proc = started.data;

    try {
      const scanned = await scanTestOutput({
        stdout: proc.stdout,
        stderr: proc.stderr,
        handler,
        clock: this.deps.clock,
      });
      if (!scanned.ok) {
        return scanned;
      }
      const execution = scanned.data;

      const printed = printSummary(this.io.out, execution, sections);
      if (!printed.ok) {
        return printed;
      }

      const junit: Result<void, DomainError> = await writeJunitFile(
        options.junitFile,
        execution,
        this.deps.files,
      );
      if (!junit.ok) {
        return junit;
      }

      return await proc.wait();
    } finally {
      proc.cancel();
      // reap the child before returning
      await proc.wait();
    }
  }
}
