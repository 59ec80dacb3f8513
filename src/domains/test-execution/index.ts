/**
 * Test Execution Domain
 * Exports all public interfaces and implementations
 */

export type {
  ChildProcessHandle,
  ExitStatus,
  LaunchOptions,
  ProcessStarter,
} from './types.js';

export {
  DEFAULT_TEST_PATH,
  GO_TEST_COMMAND,
  JSON_FLAG,
  JSON_FLAG_SPELLINGS,
} from './types.js';

export { GoTestCommandBuilder, hasJsonArg } from './command-builder.js';
