/**
 * CLI Parser
 * No side effects, returns Result types
 */

import yargsParser from 'yargs-parser';
import type { Result } from '../../shared/result.js';
import { failure, success } from '../../shared/result.js';
import type { DomainError } from '../../shared/errors.js';
import { createDomainError } from '../../shared/errors.js';
import type { CliCommand, RunOptions, SystemEnvironment } from './types.js';
import { DEFAULT_FORMAT, ENV_VARS, lookupEnvWithDefault } from './types.js';

/**
 * Help text content (pure data, no side effects)
 */
export const createHelpText = (programName: string): string => `Usage:
    ${programName} [flags] [--] [go test flags]

Flags:
      --debug              enabled debug
      --format string      print format of test input (default "${DEFAULT_FORMAT}", env ${ENV_VARS.format})
      --jsonfile string    write all TestEvents to file (env ${ENV_VARS.jsonFile})
      --junitfile string   write a JUnit XML file (env ${ENV_VARS.junitFile})
      --no-color           disable color output
      --no-summary list    do not print summary of: failed, skipped, errors
      --raw-command        don't prepend 'go test -json' to the 'go test' command
  -h, --help               show this help message
      --version            show version information

Formats:
    dots              print a character for each test
    short             print a line for each package
    short-verbose     print a line for each test and package
    standard-quiet    default go test format
    standard-verbose  default go test -v format

Environment:
    ${ENV_VARS.testDirectory}    test target appended to the go test arguments (default ./...)
`;

const STRING_FLAGS = ['format', 'jsonfile', 'junitfile', 'no-summary'];
const BOOLEAN_FLAGS = ['debug', 'raw-command', 'no-color', 'help', 'version'];
const KNOWN_KEYS = new Set(['_', 'h', ...STRING_FLAGS, ...BOOLEAN_FLAGS]);

/**
 * Parse CLI arguments into a command
 * Flag parsing stops at the first positional argument; everything from there on
 * (including a later `--`) is passed through untouched.
 */
export const parseCli = (
  args: readonly string[],
  env: SystemEnvironment,
): Result<CliCommand, DomainError> => {
  const { flagArgs, positional } = splitAtFirstPositional(args);
  const parsed = yargsParser(flagArgs, {
    string: STRING_FLAGS,
    boolean: BOOLEAN_FLAGS,
    alias: { help: ['h'] },
    configuration: {
      'halt-at-non-option': true,
      'boolean-negation': false,
      'camel-case-expansion': false,
      'dot-notation': false,
      'parse-numbers': false,
      'parse-positional-numbers': false,
      'strip-aliased': false,
      'strip-dashed': false,
    },
  });

  const unknownKey = Object.keys(parsed).find((key) => !KNOWN_KEYS.has(key));
  if (unknownKey !== undefined) {
    const flag = unknownKey.length === 1 ? `-${unknownKey}` : `--${unknownKey}`;
    return failure(createDomainError({
      domain: 'application',
      kind: 'CliParseFailed',
      message: `unknown flag: ${flag}`,
      details: { args },
    }));
  }

  if (parsed['help'] === true) {
    return success({ type: 'help' });
  }
  if (parsed['version'] === true) {
    return success({ type: 'version' });
  }

  const options: RunOptions = {
    args: Object.freeze([...positional]),
    format: lastString(parsed['format']) ??
      lookupEnvWithDefault(env, ENV_VARS.format, DEFAULT_FORMAT),
    debug: parsed['debug'] === true,
    rawCommand: parsed['raw-command'] === true,
    jsonFile: lastString(parsed['jsonfile']) ??
      lookupEnvWithDefault(env, ENV_VARS.jsonFile, ''),
    junitFile: lastString(parsed['junitfile']) ??
      lookupEnvWithDefault(env, ENV_VARS.junitFile, ''),
    noColor: parsed['no-color'] === true,
    noSummary: Object.freeze(splitList(parsed['no-summary'])),
  };

  return success({ type: 'run', options: Object.freeze(options) });
};

/**
 * Flags end at `--` or at the first token that is neither a flag nor the
 * value of a string flag. A boolean flag never takes the next token.
 */
const splitAtFirstPositional = (
  args: readonly string[],
): { flagArgs: string[]; positional: string[] } => {
  const flagArgs: string[] = [];
  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';
    if (arg === '--') {
      return { flagArgs, positional: args.slice(i + 1) };
    }
    if (arg === '-' || !arg.startsWith('-')) {
      break;
    }
    const value = args[i + 1];
    if (takesSeparateValue(arg) && value !== undefined) {
      // joined so a value starting with `-` is not read as a flag
      flagArgs.push(`${arg}=${value}`);
      i += 2;
    } else {
      flagArgs.push(arg);
      i += 1;
    }
  }
  return { flagArgs, positional: args.slice(i) };
};

const takesSeparateValue = (arg: string): boolean =>
  arg.startsWith('--') && !arg.includes('=') && STRING_FLAGS.includes(arg.slice(2));

/**
 * A repeated string flag keeps its last value
 */
const lastString = (value: unknown): string | undefined => {
  const values = stringValues(value);
  return values.length > 0 ? values[values.length - 1] : undefined;
};

/**
 * Comma separated, repeatable list flag
 */
const splitList = (value: unknown): string[] =>
  stringValues(value)
    .flatMap((item) => item.split(','))
    .filter((item) => item.length > 0);

const stringValues = (value: unknown): string[] => {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return [];
};
