/**
 * Exclusion Engine
 * Decides which tests of a package are skipped as known-flaky
 */

import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { ValidationError } from '../../shared/errors.ts';
import { createValidationError } from '../../shared/errors.ts';
import { matchesHost } from './predicates.ts';
import type { ExclusionFilter, ExclusionRule, ExclusionRuleConfig, HostInfo } from './types.ts';

const compilePattern = (field: string, source: string): Result<RegExp, ValidationError> => {
  try {
    return success(new RegExp(source));
  } catch {
    return failure(createValidationError({
      kind: 'InvalidFormat',
      field,
      expected: 'regular expression',
      actual: source,
    }));
  }
};

/**
 * Compiles configured rules and evaluates their predicates against `host`
 */
export const compileExclusions = (
  rules: readonly ExclusionRuleConfig[],
  host: HostInfo,
): Result<ExclusionRule[], ValidationError> => {
  const compiled: ExclusionRule[] = [];

  for (const rule of rules) {
    const packagePattern = compilePattern('exclusion.package', rule.package);
    if (!packagePattern.ok) {
      return packagePattern;
    }
    const testPattern = compilePattern('exclusion.test', rule.test);
    if (!testPattern.ok) {
      return testPattern;
    }
    compiled.push({
      packagePattern: packagePattern.data,
      testPattern: testPattern.data,
      exclude: matchesHost(rule.when, host),
      reason: rule.reason,
    });
  }

  return success(compiled);
};

/**
 * Splits a package's tests into those to run and those excluded.
 * With nothing excluded every name is returned; `include` is false only
 * when no test remains.
 */
export const filterExcludedTests = (
  pkg: string,
  testNames: readonly string[],
  rules: readonly ExclusionRule[],
): ExclusionFilter => {
  const excluded = testNames.filter((name) =>
    rules.some((rule) => rule.exclude && rule.packagePattern.test(pkg) && rule.testPattern.test(name))
  );

  if (excluded.length === 0) {
    return { include: true, specificTests: [...testNames], excludedTests: [] };
  }

  const remaining = testNames.filter((name) => !excluded.includes(name));
  return { include: remaining.length > 0, specificTests: remaining, excludedTests: excluded };
};

/**
 * One `pkg: <re>, name: <re>` line per active rule
 */
export const describeExclusions = (rules: readonly ExclusionRule[]): string[] => {
  return rules
    .filter((rule) => rule.exclude)
    .map((rule) => `pkg: ${rule.packagePattern.source}, name: ${rule.testPattern.source}`);
};
