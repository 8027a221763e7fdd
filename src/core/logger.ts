import { Chalk, chalk } from '../deps.ts';
import type { ChalkInstance } from '../deps.ts';
import type { Result } from '../shared/result.ts';
import { failure, success } from '../shared/result.ts';
import type { ValidationError } from '../shared/errors.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * What a level lets through
 */
export interface LogMode {
  readonly level: LogLevel;
  readonly showProgress: boolean;
  readonly showWarnings: boolean;
  readonly showErrors: boolean;
  readonly showDebug: boolean;
}

/**
 * Destination for log lines; console by default, captured in tests
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface LoggerOptions {
  readonly color?: boolean;
  readonly sink?: LogSink;
}

export const isLogLevel = (value: string): value is LogLevel => {
  return LOG_LEVELS.some((level) => level === value);
};

export const createLogMode = (level: LogLevel): LogMode => ({
  level,
  showProgress: level === 'debug' || level === 'info',
  showWarnings: level === 'debug' || level === 'info' || level === 'warn',
  showErrors: level !== 'silent',
  showDebug: level === 'debug',
});

/**
 * Logger for harness operations
 */
export class HarnessLogger {
  private readonly colors: ChalkInstance;

  private constructor(
    private readonly mode: LogMode,
    private readonly sink: LogSink,
    color: boolean,
  ) {
    this.colors = new Chalk({ level: color ? (chalk.level || 1) : 0 });
  }

  /**
   * Creates a new logger instance
   */
  static create(level: string, options: LoggerOptions = {}): Result<HarnessLogger, ValidationError> {
    if (!isLogLevel(level)) {
      return failure({
        kind: 'PatternMismatch',
        field: 'logLevel',
        pattern: LOG_LEVELS.join('|'),
        value: level,
      });
    }
    return success(
      new HarnessLogger(createLogMode(level), options.sink ?? consoleSink, options.color ?? true),
    );
  }

  logInfo(message: string): void {
    if (this.mode.showProgress) {
      this.sink.out(`ℹ️  ${message}`);
    }
  }

  logError(message: string): void {
    if (this.mode.showErrors) {
      this.sink.err(`❌ ${message}`);
    }
  }

  logWarning(message: string): void {
    if (this.mode.showWarnings) {
      this.sink.err(`⚠️  ${message}`);
    }
  }

  logDebug(message: string): void {
    if (this.mode.showDebug) {
      const timestamp = new Date().toISOString();
      this.sink.out(`🐛 [${timestamp}] ${message}`);
    }
  }

  /**
   * Logs the start of a stage
   */
  logStageStart(stageName: string): void {
    if (this.mode.showProgress) {
      this.sink.out(`🚀 Starting ${stageName}...`);
    }
  }

  /**
   * Logs the completion of a stage
   */
  logStageComplete(stageName: string, duration: number, ok: boolean): void {
    if (this.mode.showProgress) {
      const status = ok ? '✅' : '❌';
      this.sink.out(`${status} ${stageName} completed in ${duration.toFixed(0)}ms`);
    }
  }

  /**
   * Logs progress information
   */
  logProgress(current: number, total: number, item: string): void {
    if (this.mode.showProgress && total > 0) {
      const percentage = Math.round((current / total) * 100);
      this.sink.out(`📊 [${current}/${total}] (${percentage}%) ${item}`);
    }
  }

  logSummary(summary: string): void {
    if (this.mode.level !== 'silent') {
      this.sink.out('\n' + '='.repeat(60));
      this.sink.out('📋 SUMMARY');
      this.sink.out('='.repeat(60));
      this.sink.out(summary);
      this.sink.out('='.repeat(60));
    }
  }

  /**
   * Logs command execution
   */
  logCommand(command: readonly string[]): void {
    if (this.mode.showDebug) {
      this.sink.out(`🔧 Executing: ${command.join(' ')}`);
    }
  }

  /**
   * Prints a passing result line: `ok   <message>`
   */
  pass(message: string): void {
    if (this.mode.level !== 'silent') {
      this.sink.out(`${this.colors.green('ok')}   ${message}`);
    }
  }

  /**
   * Prints a failing result line: `fail <message>`
   */
  fail(message: string): void {
    if (this.mode.level !== 'silent') {
      this.sink.err(`${this.colors.red('fail')} ${message}`);
    }
  }

  /**
   * Writes raw text with no decoration, e.g. listing output
   */
  print(text: string): void {
    this.sink.out(text);
  }

  getMode(): LogMode {
    return this.mode;
  }

  isDebugEnabled(): boolean {
    return this.mode.showDebug;
  }
}
