/**
 * CLI Parser following Totality principle
 * No side effects, returns Result types
 */

import { parseArgs } from '../../deps.ts';
import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { ValidationError } from '../../shared/errors.ts';
import { createValidationError } from '../../shared/errors.ts';
import type { LogLevel } from '../../core/logger.ts';
import { isLogLevel, LOG_LEVELS } from '../../core/logger.ts';
import { VERSION } from '../../core/version.ts';
import type { ParsedCliArgs } from './types.ts';

/**
 * Help text content (pure data, no side effects)
 */
export const HELP_TEXT = `
pkgtest - concurrent Go package test harness

Usage: pkgtest [options] <command> [args]

Commands:
  run [test...]             Run named tests from the configuration file
                            (default: the comma-separated list in $TEST)
  list                      List configured tests
  poll [test...]            Show projects with new upstream commits and the tests they trigger
  project <name...>         Run every test attached to the given projects

Options:
  --config, -c <file>       Configuration file (default: $PKGTEST_CONFIG or pkgtest.json)
  --num-test-workers, -n    Number of test workers (default: CPU count)
  --output-dir, -o <dir>    Report directory (default: $WORKSPACE or $HOME/tmp/<test>)
  --pkgs <a,b>              Package expressions to test instead of the configured ones
  --part, -p <i>            Part of a sharded test to run (default: $PART or -1 for all)
  --clean-go                Run "go clean -testcache" first (default: on; --no-clean-go to skip)
  --log-level, -l <level>   Log level: debug, info, warn, error, silent (default: info)
  --color                   Colour ok/fail lines (default: on; --no-color to disable)
  --verbose, -v             Enable verbose output
  --help, -h                Show this help message
  --version                 Show version information

Examples:
  pkgtest list
  pkgtest run go-test go-race
  pkgtest -n 4 --part=0 run go-test
  pkgtest --pkgs ./cmd/...,./lib/... run go-test
`;

const FLAGS = new Set([
  'config',
  'c',
  'num-test-workers',
  'n',
  'output-dir',
  'o',
  'pkgs',
  'part',
  'p',
  'clean-go',
  'log-level',
  'l',
  'color',
  'verbose',
  'v',
  'help',
  'h',
  'version',
]);

const flagName = (arg: string): string => {
  const name = arg.replace(/^-+/, '').split('=')[0];
  return name.startsWith('no-') ? name.slice(3) : name;
};

const optionalString = (value: unknown): string | undefined => {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  // a repeated flag keeps its last value
  if (Array.isArray(value)) {
    return optionalString(value[value.length - 1]);
  }
  return String(value);
};

const parseInteger = (field: string, value: string | undefined): Result<number | undefined, ValidationError> => {
  if (value === undefined) {
    return success(undefined);
  }
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    return failure(createValidationError({
      kind: 'InvalidFormat',
      field,
      expected: 'integer',
      actual: value,
    }));
  }
  return success(Number(trimmed));
};

const validateLogLevel = (level: string): Result<LogLevel, ValidationError> => {
  if (isLogLevel(level)) {
    return success(level);
  }
  return failure(createValidationError({
    kind: 'PatternMismatch',
    field: 'log-level',
    pattern: LOG_LEVELS.join('|'),
    value: level,
  }));
};

export const splitList = (value: string | undefined): string[] => {
  return (value ?? '').split(',').map((item) => item.trim()).filter((item) => item.length > 0);
};

/**
 * Parse CLI arguments into structured data
 * Total function - returns Result instead of throwing
 */
export const parseCli = (args: readonly string[]): Result<ParsedCliArgs, ValidationError> => {
  const unknown: string[] = [];
  const parsed = parseArgs([...args], {
    alias: {
      'c': 'config',
      'n': 'num-test-workers',
      'o': 'output-dir',
      'p': 'part',
      'l': 'log-level',
      'v': 'verbose',
      'h': 'help',
    },
    boolean: ['clean-go', 'color', 'verbose', 'help', 'version'],
    string: ['config', 'num-test-workers', 'output-dir', 'pkgs', 'part', 'log-level'],
    default: {
      'clean-go': true,
      'color': true,
      'log-level': 'info',
      'verbose': false,
    },
    unknown: (arg: string) => {
      if (arg.startsWith('-') && arg !== '-' && !FLAGS.has(flagName(arg))) {
        unknown.push(arg);
        return false;
      }
      return true;
    },
  });

  if (unknown.length > 0) {
    return failure(createValidationError({
      kind: 'InvalidFormat',
      field: 'flag',
      expected: 'a known option, see --help',
      actual: unknown.join(' '),
    }));
  }

  const workers = parseInteger('num-test-workers', optionalString(parsed['num-test-workers']));
  if (!workers.ok) {
    return workers;
  }

  const part = parseInteger('part', optionalString(parsed.part));
  if (!part.ok) {
    return part;
  }

  const logLevel = validateLogLevel(optionalString(parsed['log-level']) ?? 'info');
  if (!logLevel.ok) {
    return logLevel;
  }

  const positional = parsed._.map(String);
  const flag = (name: string): boolean => parsed[name] === true;

  return success({
    command: positional[0],
    args: positional.slice(1),
    config: optionalString(parsed.config),
    numTestWorkers: workers.data,
    outputDir: optionalString(parsed['output-dir']),
    pkgs: splitList(optionalString(parsed.pkgs)),
    part: part.data,
    cleanGo: flag('clean-go'),
    logLevel: logLevel.data,
    color: flag('color'),
    verbose: flag('verbose'),
    help: flag('help'),
    version: flag('version'),
  });
};

/**
 * Create help output data structure (no side effects)
 */
export const createHelpOutput = (): { content: string; exitCode: number } => ({
  content: HELP_TEXT,
  exitCode: 0,
});

/**
 * Create version output data structure (no side effects)
 */
export const createVersionOutput = (): { content: string; exitCode: number } => ({
  content: `pkgtest version ${VERSION}`,
  exitCode: 0,
});
