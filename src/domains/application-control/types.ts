/**
 * Application Control Domain Types
 */

/**
 * Environment variables consulted for defaults
 */
export const ENV_VARS = {
  format: 'GOTESTSUM_FORMAT',
  jsonFile: 'GOTESTSUM_JSONFILE',
  junitFile: 'GOTESTSUM_JUNITFILE',
  testDirectory: 'TEST_DIRECTORY',
} as const;

export const DEFAULT_FORMAT = 'short';

/**
 * Immutable configuration snapshot for one run
 */
export interface RunOptions {
  /** Positional arguments passed through to the test command */
  readonly args: readonly string[];
  readonly format: string;
  readonly debug: boolean;
  /** Run args as-is instead of prepending `go test -json` */
  readonly rawCommand: boolean;
  readonly jsonFile: string;
  readonly junitFile: string;
  readonly noColor: boolean;
  /** Summary sections to leave out */
  readonly noSummary: readonly string[];
}

/**
 * What the command line asks for - Discriminated Union
 */
export type CliCommand =
  | { type: 'run'; options: RunOptions }
  | { type: 'help' }
  | { type: 'version' };

/**
 * Read access to the process environment (implemented by infrastructure)
 */
export interface SystemEnvironment {
  getEnv(name: string): string | undefined;
}

/**
 * Value of an environment variable, or the default when it is not set at all.
 * A variable set to the empty string counts as set.
 */
export const lookupEnvWithDefault = (
  env: SystemEnvironment,
  name: string,
  defaultValue: string,
): string => env.getEnv(name) ?? defaultValue;
