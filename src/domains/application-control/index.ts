/**
 * Application Control Domain
 * Exports all public interfaces and implementations
 */

export type { CliCommand, RunOptions, SystemEnvironment } from './types.js';
export { DEFAULT_FORMAT, ENV_VARS, lookupEnvWithDefault } from './types.js';

export { createHelpText, parseCli } from './cli-parser.js';
