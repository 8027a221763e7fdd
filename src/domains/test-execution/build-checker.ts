/**
 * Build check: `go build -v` over top-level package patterns
 */

import type { TestCase, TestSuite } from '../reporting/types.ts';
import { createTestSuite } from '../reporting/xunit.ts';
import { GoTestCommandBuilder } from './command-builder.ts';
import type { ProcessExecutor } from './types.ts';

export const BUILD_CASE = 'Build';
export const BUILD_FAILURE = 'build failure';

export interface BuildCheckOptions {
  readonly args: readonly string[];
  readonly cwd?: string;
  readonly env?: Record<string, string>;
}

export interface BuildCheckResult {
  readonly passed: boolean;
  readonly suites: readonly TestSuite[];
}

/**
 * One `Build` failure case per `# <pkg>` section of the compiler output.
 * A section holding only a linker warning is not a failure.
 */
export const suiteFromBuildOutput = (pattern: string, output: string): TestSuite => {
  const cases: TestCase[] = [];
  const seen = new Set<string>();

  const flush = (pkg: string | undefined, lines: readonly string[]): void => {
    if (pkg === undefined) {
      return;
    }
    if (lines.length === 1 && lines[0].startsWith('link: warning')) {
      return;
    }
    if (seen.has(pkg)) {
      return;
    }
    seen.add(pkg);
    cases.push({
      classname: pkg,
      name: BUILD_CASE,
      time: '0.00',
      failure: { message: BUILD_FAILURE, data: lines.join('\n') },
    });
  };

  let current: string | undefined;
  let lines: string[] = [];
  const body = output.endsWith('\n') ? output.slice(0, -1) : output;
  for (const line of body.split('\n')) {
    if (line.startsWith('# ')) {
      flush(current, lines);
      current = line.slice(2);
      lines = [];
    } else {
      lines.push(line);
    }
  }
  // output without any header still names the pattern that failed
  flush(current ?? pattern, lines);

  return createTestSuite(pattern, cases, 0);
};

export class BuildChecker {
  constructor(
    private readonly executor: ProcessExecutor,
    private readonly options: BuildCheckOptions,
  ) {}

  /**
   * Builds each pattern in turn; only failing patterns produce a suite
   */
  async check(patterns: readonly string[]): Promise<BuildCheckResult> {
    const suites: TestSuite[] = [];

    for (const pattern of patterns) {
      const command = GoTestCommandBuilder.goBuild(pattern, this.options.args);
      const execution = await this.executor.execute(command, {
        cwd: this.options.cwd,
        env: this.options.env,
      });

      if (execution.ok && execution.data.exitCode === 0 && !execution.data.timedOut) {
        continue;
      }
      const output = execution.ok ? execution.data.output : `${command.join(' ')}: ${execution.error.message}`;
      suites.push(suiteFromBuildOutput(pattern, output));
    }

    return { passed: suites.length === 0, suites };
  }
}
