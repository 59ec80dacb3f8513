/**
 * Test command builder - pure function of the options and the environment
 */

import type { RunOptions, SystemEnvironment } from '../application-control/types.js';
import { ENV_VARS, lookupEnvWithDefault } from '../application-control/types.js';
import { DEFAULT_TEST_PATH, GO_TEST_COMMAND, JSON_FLAG, JSON_FLAG_SPELLINGS } from './types.js';

/**
 * Builds the argument vector of the test command
 */
export class GoTestCommandBuilder {
  /**
   * Build the command to execute
   *
   * - raw command: the user arguments unchanged
   * - no arguments: `go test -json <TEST_DIRECTORY or ./...>`
   * - otherwise: `go test [-json] <args...> [TEST_DIRECTORY]`, with `-json`
   *   added only when the arguments do not already carry it
   */
  static build(
    options: Pick<RunOptions, 'args' | 'rawCommand'>,
    env: SystemEnvironment,
  ): string[] {
    const args = [...options.args];

    if (options.rawCommand) {
      return args;
    }

    if (args.length === 0) {
      return [...GO_TEST_COMMAND, JSON_FLAG, testPathFromEnv(env, DEFAULT_TEST_PATH)];
    }

    const command = [...GO_TEST_COMMAND];
    if (!hasJsonArg(args)) {
      command.push(JSON_FLAG);
    }

    const testPath = testPathFromEnv(env, '');
    if (testPath !== '') {
      args.push(testPath);
    }

    return [...command, ...args];
  }
}

/**
 * Exact token match against both spellings of the json flag
 */
export const hasJsonArg = (args: readonly string[]): boolean =>
  args.some((arg) => JSON_FLAG_SPELLINGS.includes(arg));

const testPathFromEnv = (env: SystemEnvironment, defaultPath: string): string =>
  lookupEnvWithDefault(env, ENV_VARS.testDirectory, defaultPath);
