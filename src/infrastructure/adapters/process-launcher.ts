/**
 * Process Launcher Adapter
 * Starts the test command with piped output under its own cancellation handle
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import type { Result } from '../../shared/result.js';
import { errorMessage, failure, success } from '../../shared/result.js';
import type { DomainError } from '../../shared/errors.js';
import { createChildExitError, createDomainError } from '../../shared/errors.js';
import type { RunLogger } from '../../core/run-logger.js';
import type {
  ChildProcessHandle,
  ExitStatus,
  LaunchOptions,
  ProcessStarter,
} from '../../domains/test-execution/types.js';

/**
 * node:child_process based launcher
 */
export class ProcessLauncher implements ProcessStarter {
  constructor(private readonly logger: RunLogger) {}

  /**
   * Start `args[0]` with the remaining arguments.
   * The returned handle must be cancelled by the caller on every exit path.
   */
  async start(
    args: readonly string[],
    options: LaunchOptions = {},
  ): Promise<Result<ChildProcessHandle, DomainError>> {
    const [command, ...commandArgs] = args;
    if (command === undefined || command === '') {
      return failure(spawnFailed(args, 'no command to run'));
    }

    const controller = new AbortController();
    const unlinkParent = linkSignal(options.signal, controller);
    if (controller.signal.aborted) {
      unlinkParent();
      return failure(spawnFailed(args, 'cancelled before start'));
    }

    this.logger.logCommand(args);

    let child: ChildProcess;
    try {
      child = spawn(command, commandArgs, {
        stdio: ['ignore', 'pipe', 'pipe'],
        signal: controller.signal,
        killSignal: 'SIGKILL',
      });
    } catch (error) {
      unlinkParent();
      return failure(spawnFailed(args, errorMessage(error), error));
    }

    // Registered before anything can emit so nothing is missed
    const exited = new Promise<ExitStatus>((resolve) => {
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        resolve({ code, signal });
      });
    });
    const started = new Promise<Result<void, unknown>>((resolve) => {
      child.once('spawn', () => resolve(success(undefined)));
      child.once('error', (error) => resolve(failure(error)));
    });
    child.on('error', (error) => {
      this.logger.logDebug(`${args.join(' ')}: ${error.message}`);
    });

    const { stdout, stderr } = child;
    if (stdout === null || stderr === null) {
      controller.abort();
      unlinkParent();
      return failure(createDomainError({
        domain: 'execution',
        kind: 'PipeSetupFailed',
        message: `failed to run ${args.join(' ')}: output pipes are not available`,
        command: args,
      }));
    }

    const startResult = await started;
    if (!startResult.ok) {
      unlinkParent();
      stdout.destroy();
      stderr.destroy();
      return failure(spawnFailed(args, errorMessage(startResult.error), startResult.error));
    }

    if (child.pid !== undefined) {
      this.logger.logDebug(`${command} pid: ${child.pid}`);
    }

    let cancelled = false;
    return success({
      args,
      pid: child.pid,
      stdout,
      stderr,
      cancel: () => {
        if (cancelled) {
          return;
        }
        cancelled = true;
        unlinkParent();
        controller.abort();
        stdout.destroy();
        stderr.destroy();
      },
      wait: async () => {
        const { code, signal } = await exited;
        if (code === 0) {
          return success(undefined);
        }
        return failure(createChildExitError(args, code, signal));
      },
    });
  }
}

/**
 * Propagates cancellation of an optional parent signal to the child controller
 */
const linkSignal = (
  parent: AbortSignal | undefined,
  controller: AbortController,
): () => void => {
  if (parent === undefined) {
    return () => undefined;
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return () => undefined;
  }
  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
};

const spawnFailed = (args: readonly string[], message: string, cause?: unknown): DomainError =>
  createDomainError({
    domain: 'execution',
    kind: 'ProcessSpawnFailed',
    message: `failed to run ${args.join(' ')}: ${message}`,
    command: args,
    cause,
  });
