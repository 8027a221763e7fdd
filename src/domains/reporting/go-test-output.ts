/**
 * Folds `go test` output into xUnit suites.
 * Structured `-json` events are preferred; plain `-v` text is the fallback.
 */

import { z } from '../../deps.ts';
import { formatSeconds } from '../test-execution/duration.ts';
import type { TestCase, TestSuite } from './types.ts';
import { createTestSuite } from './xunit.ts';

const GoTestEventSchema = z.object({
  Time: z.string().optional(),
  Action: z.string(),
  Package: z.string().optional(),
  Test: z.string().optional(),
  Elapsed: z.number().optional(),
  Output: z.string().optional(),
  ImportPath: z.string().optional(),
  FailedBuild: z.string().optional(),
});

export type GoTestEvent = z.infer<typeof GoTestEventSchema>;

type Outcome = 'pass' | 'fail' | 'skip';

interface CaseState {
  readonly name: string;
  readonly output: string[];
  outcome?: Outcome;
  elapsed?: number; // seconds
}

interface PackageState {
  readonly name: string;
  readonly cases: Map<string, CaseState>;
  readonly output: string[];
  outcome?: Outcome;
  elapsed?: number; // seconds
  buildFailed: boolean;
}

export interface ParsedGoTestOutput {
  readonly events: readonly GoTestEvent[];
  /** Lines that are not JSON events: compiler diagnostics, early panics */
  readonly plain: readonly string[];
}

const FAILURE_MESSAGE = 'error';

const TEXT_PATTERNS = {
  // === RUN   TestName
  testRun: /^=== RUN\s+(\S+)/,
  // --- PASS: TestName (0.00s)
  testResult: /^--- (PASS|FAIL|SKIP):\s+(\S+)\s+\(([0-9.]+)s\)/,
  // FAIL    package/name    0.123s
  packageFail: /^FAIL\s+(\S+)\s+/,
  // ok      package/name    0.123s
  packagePass: /^ok\s+(\S+)\s+/,
};

/**
 * Splits output into decoded events and everything else
 */
export const parseGoTestOutput = (output: string): ParsedGoTestOutput => {
  const events: GoTestEvent[] = [];
  const plain: string[] = [];

  for (const line of output.split('\n')) {
    if (line.trim().length === 0) {
      continue;
    }
    const event = decodeEvent(line);
    if (event) {
      events.push(event);
    } else {
      plain.push(line);
    }
  }

  return { events, plain };
};

const decodeEvent = (line: string): GoTestEvent | undefined => {
  if (!line.startsWith('{')) {
    return undefined;
  }
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = GoTestEventSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
};

/**
 * True when the events report a failed build for `pkg`
 */
export const hasBuildFailEvent = (output: string, pkg: string): boolean => {
  const { events } = parseGoTestOutput(output);
  return events.some((event) => {
    if (event.Action === 'build-fail') {
      return importPathOf(event) === pkg;
    }
    if (event.Action === 'fail' && event.Package === pkg && event.FailedBuild !== undefined) {
      return true;
    }
    return event.Action === 'output' && event.Package === pkg &&
      (event.Output ?? '').startsWith(`FAIL\t${pkg} [build failed]`);
  });
};

// "pkg [pkg.test]" names the test variant of pkg
const importPathOf = (event: GoTestEvent): string | undefined => {
  return event.ImportPath?.split(' ')[0] ?? event.Package;
};

const topLevel = (test: string): string => test.split('/')[0];

const packageState = (packages: Map<string, PackageState>, name: string): PackageState => {
  let state = packages.get(name);
  if (!state) {
    state = { name, cases: new Map(), output: [], buildFailed: false };
    packages.set(name, state);
  }
  return state;
};

const caseState = (pkg: PackageState, name: string): CaseState => {
  let state = pkg.cases.get(name);
  if (!state) {
    state = { name, output: [] };
    pkg.cases.set(name, state);
  }
  return state;
};

const isOutcome = (action: string): action is Outcome => {
  return action === 'pass' || action === 'fail' || action === 'skip';
};

const foldEvents = (events: readonly GoTestEvent[], defaultPkg: string): Map<string, PackageState> => {
  const packages = new Map<string, PackageState>();

  for (const event of events) {
    if (event.Action === 'build-output' || event.Action === 'build-fail') {
      const pkg = packageState(packages, importPathOf(event) ?? defaultPkg);
      if (event.Action === 'build-fail') {
        pkg.buildFailed = true;
      } else if (event.Output) {
        pkg.output.push(event.Output);
      }
      continue;
    }

    const pkg = packageState(packages, event.Package ?? defaultPkg);
    if (!event.Test) {
      if (event.Action === 'output' && event.Output) {
        pkg.output.push(event.Output);
      } else if (isOutcome(event.Action)) {
        pkg.outcome = event.Action;
        pkg.elapsed = event.Elapsed;
        if (event.FailedBuild !== undefined) {
          pkg.buildFailed = true;
        }
      }
      continue;
    }

    const isSubtest = event.Test.includes('/');
    const test = caseState(pkg, topLevel(event.Test));
    if (event.Action === 'output' && event.Output) {
      test.output.push(event.Output);
    } else if (!isSubtest && isOutcome(event.Action)) {
      test.outcome = event.Action;
      test.elapsed = event.Elapsed;
    }
  }

  return packages;
};

const foldText = (lines: readonly string[], defaultPkg: string): Map<string, PackageState> => {
  const pkg = packageState(new Map(), defaultPkg);
  let current: CaseState | undefined;

  for (const line of lines) {
    const run = TEXT_PATTERNS.testRun.exec(line);
    if (run) {
      if (!run[1].includes('/')) {
        current = caseState(pkg, run[1]);
      }
      continue;
    }

    const result = TEXT_PATTERNS.testResult.exec(line);
    if (result) {
      const test = caseState(pkg, result[2]);
      test.outcome = result[1] === 'PASS' ? 'pass' : result[1] === 'FAIL' ? 'fail' : 'skip';
      test.elapsed = Number.parseFloat(result[3]);
      current = undefined;
      continue;
    }

    if (TEXT_PATTERNS.packageFail.test(line) || line === 'FAIL') {
      pkg.outcome = 'fail';
      continue;
    }
    if (TEXT_PATTERNS.packagePass.test(line) || line === 'PASS') {
      pkg.outcome ??= 'pass';
      continue;
    }

    if (current) {
      current.output.push(`${line}\n`);
    } else {
      pkg.output.push(`${line}\n`);
    }
  }

  return new Map([[pkg.name, pkg]]);
};

const toTestCase = (pkg: PackageState, test: CaseState): TestCase => {
  const time = formatSeconds((test.elapsed ?? 0) * 1000);
  const base = { classname: pkg.name, name: test.name, time };

  if (test.outcome === 'skip') {
    return { ...base, skipped: true };
  }
  // a test with no outcome never finished: the binary crashed or was killed
  if (test.outcome === 'fail' || (test.outcome === undefined && pkg.outcome !== 'pass')) {
    return { ...base, failure: { message: FAILURE_MESSAGE, data: test.output.join('') } };
  }
  return base;
};

/**
 * One suite per package found in the output of a single `go test` run
 */
export const suitesFromGoTestOutput = (
  pkg: string,
  output: string,
  durationMs: number,
): TestSuite[] => {
  const parsed = parseGoTestOutput(output);
  const packages = parsed.events.length > 0
    ? foldEvents(parsed.events, pkg)
    : foldText(output.split('\n'), pkg);

  const suites: TestSuite[] = [];
  for (const state of packages.values()) {
    const cases = [...state.cases.values()].map((test) => toTestCase(state, test));
    const failed = state.buildFailed || state.outcome === 'fail';

    if (failed && !cases.some((c) => c.failure)) {
      const data = [...state.output, ...parsed.plain.map((line) => `${line}\n`)].join('');
      cases.push({
        classname: state.name,
        name: 'Test',
        time: formatSeconds(durationMs),
        failure: { message: state.buildFailed ? 'build failure' : FAILURE_MESSAGE, data },
      });
    }

    const elapsedMs = state.elapsed !== undefined ? state.elapsed * 1000 : durationMs;
    suites.push(createTestSuite(state.name, cases, elapsedMs));
  }

  return suites;
};
