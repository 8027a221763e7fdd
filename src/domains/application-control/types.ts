/**
 * Application Control Domain Types
 * Following Totality principle with Smart Constructors and Discriminated Unions
 */

import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { ValidationError } from '../../shared/errors.ts';
import type { LogLevel } from '../../core/logger.ts';
import type { WorkerCount } from '../test-execution/types.ts';

/**
 * Application state - Discriminated Union pattern
 */
export type ApplicationState =
  | { type: 'initializing'; startTime: number }
  | { type: 'running'; config: ApplicationConfig; startTime: number }
  | { type: 'shutting-down'; reason: string; exitCode: number }
  | { type: 'terminated'; exitCode: number; duration: number };

export type Command = 'run' | 'list' | 'poll' | 'project';

export const COMMANDS: readonly Command[] = ['run', 'list', 'poll', 'project'];

export const isCommand = (value: string): value is Command => {
  return COMMANDS.some((command) => command === value);
};

/**
 * Application configuration with validation
 */
export interface ApplicationConfig {
  readonly command: Command;
  /** Positional arguments after the command */
  readonly args: readonly string[];
  readonly configPath: string;
  readonly workerCount: WorkerCount;
  readonly outputDir?: OutputDirectory;
  readonly pkgs: readonly string[];
  readonly partIndex: PartIndex;
  readonly cleanGo: boolean;
  readonly logLevel: LogLevel;
  readonly color: boolean;
  readonly verbose: boolean;
}

/**
 * Shard index - Smart Constructor; -1 selects every package
 */
export class PartIndex {
  private constructor(private readonly index: number) {}

  static create(index: number): Result<PartIndex, ValidationError> {
    if (!Number.isInteger(index)) {
      return failure({
        kind: 'InvalidFormat',
        field: 'part',
        expected: 'integer',
        actual: String(index),
      });
    }

    if (index < -1) {
      return failure({
        kind: 'OutOfRange',
        field: 'part',
        min: -1,
        value: index,
      });
    }

    return success(new PartIndex(index));
  }

  get value(): number {
    return this.index;
  }

  getValue(): number {
    return this.index;
  }
}

/**
 * Report directory - Smart Constructor
 */
export class OutputDirectory {
  private constructor(private readonly path: string) {}

  static create(path: string): Result<OutputDirectory, ValidationError> {
    if (!path || path.trim().length === 0) {
      return failure({
        kind: 'EmptyInput',
        field: 'outputDir',
      });
    }

    return success(new OutputDirectory(path.trim()));
  }

  getValue(): string {
    return this.path;
  }

  get value(): string {
    return this.path;
  }
}

/**
 * CLI arguments after parsing
 */
export interface ParsedCliArgs {
  readonly command?: string;
  readonly args: readonly string[];
  readonly config?: string;
  readonly numTestWorkers?: number;
  readonly outputDir?: string;
  readonly pkgs: readonly string[];
  readonly part?: number;
  readonly cleanGo: boolean;
  readonly logLevel: LogLevel;
  readonly color: boolean;
  readonly verbose: boolean;
  readonly help: boolean;
  readonly version: boolean;
}

/**
 * State transition rules
 */
export const isValidStateTransition = (
  from: ApplicationState['type'],
  to: ApplicationState['type'],
): boolean => {
  const validTransitions: Record<ApplicationState['type'], ApplicationState['type'][]> = {
    'initializing': ['running', 'terminated'],
    'running': ['shutting-down', 'terminated'],
    'shutting-down': ['terminated'],
    'terminated': [],
  };

  return validTransitions[from].includes(to);
};
