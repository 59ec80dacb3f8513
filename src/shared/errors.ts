/**
 * Error types for all domains
 * Following Discriminated Union pattern for type safety
 */

/**
 * Child process terminated with a non-zero status or by a signal.
 * Not an orchestration failure: the exit code is forwarded as-is.
 */
export interface ChildExitError {
  readonly domain: 'execution';
  readonly kind: 'ChildExited';
  readonly message: string;
  readonly command: readonly string[];
  readonly exitCode?: number;
  readonly signal?: string;
}

// Domain-specific errors
export type DomainError =
  | {
    readonly domain: 'application';
    readonly kind: 'CliParseFailed' | 'UnknownFormat';
    readonly message: string;
    readonly details?: unknown;
  }
  | {
    readonly domain: 'execution';
    readonly kind: 'ProcessSpawnFailed' | 'PipeSetupFailed';
    readonly message: string;
    readonly command: readonly string[];
    readonly cause?: unknown;
  }
  | {
    readonly domain: 'scanning';
    readonly kind: 'DecodeFailed' | 'HandlerFailed' | 'StreamFailed';
    readonly message: string;
    readonly line?: string;
    readonly cause?: unknown;
  }
  | {
    readonly domain: 'reporting';
    readonly kind: 'SummaryWriteFailed' | 'JunitWriteFailed' | 'EventFileFailed';
    readonly message: string;
    readonly path?: string;
    readonly cause?: unknown;
  };

/**
 * Every error a run can end with
 */
export type RunError = DomainError | ChildExitError;

/**
 * Error creation helpers
 */
export const createDomainError = (error: DomainError): DomainError => error;

export const createChildExitError = (
  command: readonly string[],
  exitCode: number | null,
  signal: string | null,
): ChildExitError => ({
  domain: 'execution',
  kind: 'ChildExited',
  message: signal
    ? `${command.join(' ')}: terminated by signal ${signal}`
    : `${command.join(' ')}: exit status ${exitCode ?? 'unknown'}`,
  command,
  ...(exitCode !== null ? { exitCode } : {}),
  ...(signal !== null ? { signal } : {}),
});

/**
 * Error message formatting
 */
export const formatError = (error: RunError): string => error.message;

/**
 * Type guard
 */
export const isChildExitError = (error: RunError): error is ChildExitError => {
  return error.domain === 'execution' && error.kind === 'ChildExited';
};
