/**
 * Splitting one test's packages into parts.
 *
 * A test with parts `[a, b]` has three: index 0 runs the packages of `a`,
 * index 1 those of `b` not already in `a`, and index 2 everything else.
 */

import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { AppError } from '../../shared/errors.ts';
import { createDomainError } from '../../shared/errors.ts';

/** Expands comma separated package patterns to import paths */
export type PackageExpander = (patterns: readonly string[]) => Promise<Result<string[], AppError>>;

export const NO_PART = -1;

export const splitPart = (part: string): string[] => {
  return part.split(',').map((p) => p.trim()).filter((p) => p.length > 0);
};

/**
 * Packages part `index` covers. Without parts, or with index -1, the
 * patterns of `allPackages` come back as they are.
 */
export const identifyPackagesToTest = async (
  parts: readonly string[],
  index: number,
  allPackages: readonly string[],
  expand: PackageExpander,
): Promise<Result<string[], AppError>> => {
  if (parts.length === 0 || index === NO_PART) {
    return success([...allPackages]);
  }
  if (!Number.isInteger(index) || index < 0 || index > parts.length) {
    return failure(createDomainError({
      domain: 'registry',
      kind: 'InvalidPart',
      details: { index, parts: parts.length },
    }));
  }

  const existing = new Set<string>();
  for (let i = 0; i < index; i++) {
    const expanded = await expand(splitPart(parts[i]));
    if (!expanded.ok) {
      return expanded;
    }
    for (const pkg of expanded.data) {
      existing.add(pkg);
    }
  }

  const selected = await expand(index < parts.length ? splitPart(parts[index]) : allPackages);
  if (!selected.ok) {
    return selected;
  }
  return success(selected.data.filter((pkg) => !existing.has(pkg)));
};
