/**
 * Go command builders - pure functions
 */

import type { GoTestOptions, TestTask } from './types.ts';

const RUN_FLAGS = ['-run', '--run'];
const RUN_PREFIXES = ['-run=', '--run='];

/**
 * `^(A|B)$` selecting exactly the given top-level tests
 */
export const testsExpression = (tests: readonly string[]): string => `^(${tests.join('|')})$`;

/**
 * Points every `-run` in `args` at `expr`, appending one when none exists
 */
export const overrideRunFlag = (args: readonly string[], expr: string): string[] => {
  const result = [...args];
  let found = false;

  for (let i = 0; i < result.length; i++) {
    const arg = result[i];
    if (RUN_FLAGS.includes(arg)) {
      if (i + 1 < result.length) {
        result[i + 1] = expr;
      } else {
        result.push(expr);
      }
      found = true;
      i++;
    } else if (RUN_PREFIXES.some((prefix) => arg.startsWith(prefix))) {
      result[i] = `-run=${expr}`;
      found = true;
    }
  }

  if (!found) {
    result.push('-run', expr);
  }
  return result;
};

export class GoTestCommandBuilder {
  /**
   * go test [-json] -timeout <t> -v [args] [-run ^(A|B)$] <pkg> [nonTestArgs]
   */
  static build(task: TestTask, options: Pick<GoTestOptions, 'timeout' | 'args' | 'nonTestArgs' | 'json'>): string[] {
    let args = ['go', 'test'];
    if (options.json) {
      args.push('-json');
    }
    args.push('-timeout', options.timeout, '-v', ...options.args);

    if (task.specificTests.length > 0) {
      args = overrideRunFlag(args, testsExpression(task.specificTests));
    }

    args.push(task.pkg, ...options.nonTestArgs);
    return args;
  }

  /**
   * Compiles test dependencies without running any test
   */
  static buildDependencies(pkgs: readonly string[], args: readonly string[] = []): string[] {
    return ['go', 'test', ...args, '-run', '^$', ...pkgs];
  }

  /**
   * go build -v [args] <pkg>
   */
  static goBuild(pkg: string, args: readonly string[] = []): string[] {
    return ['go', 'build', '-v', ...args, pkg];
  }

  /**
   * go test -cover -coverprofile <file> -timeout <t> -v [args] <pkg>
   */
  static coverage(
    pkg: string,
    profile: string,
    timeout: string,
    args: readonly string[] = [],
  ): string[] {
    return ['go', 'test', '-cover', '-coverprofile', profile, '-timeout', timeout, '-v', ...args, pkg];
  }
}
