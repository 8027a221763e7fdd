/**
 * Test Function Finder
 * Scans Go test files for top-level test function declarations
 */

import { join } from '../../deps.ts';
import type { Result } from '../../shared/result.ts';
import { failure, success, toError } from '../../shared/result.ts';
import type { DomainError } from '../../shared/errors.ts';
import { createDomainError } from '../../shared/errors.ts';
import type { GoPackageLister, ListOptions } from './package-lister.ts';
import type { DiscoveredTests, GoPackage, SourceReader, TestFunctionMatcher } from './types.ts';
import { DEFAULT_TEST_NAME_PATTERN } from './types.ts';

// func Name( ... but not methods, whose receiver comes first
const FUNC_DECL = /^func\s+([A-Za-z_]\w*)\s*\(/;
// func Name(t *testing.T) {
const TESTING_T_DECL = /^func\s+[A-Za-z_]\w*\s*\(\s*(?:[A-Za-z_]\w*\s+)?\*testing\.T\s*\)\s*(?:\{|$)/;

export const createMatcher = (
  namePattern: string = DEFAULT_TEST_NAME_PATTERN,
  requireTestingT = false,
): Result<TestFunctionMatcher, DomainError> => {
  try {
    return success({ namePattern: new RegExp(namePattern), requireTestingT });
  } catch (error) {
    return failure(createDomainError({
      domain: 'discovery',
      kind: 'ParseFailed',
      details: { pattern: namePattern, message: toError(error).message },
    }));
  }
};

/**
 * Names of the matching test functions declared in one source file, in order
 */
export const parseTestFunctions = (content: string, matcher: TestFunctionMatcher): string[] => {
  const names: string[] = [];

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    const match = FUNC_DECL.exec(line);
    if (!match || !matcher.namePattern.test(match[1])) {
      continue;
    }
    if (matcher.requireTestingT && !TESTING_T_DECL.test(line)) {
      continue;
    }
    names.push(match[1]);
  }

  return names;
};

export class TestFunctionFinder {
  constructor(private readonly reader: SourceReader) {}

  /**
   * Matching tests across every test file of the package, without duplicates
   */
  async find(
    pkg: GoPackage,
    matcher: TestFunctionMatcher,
  ): Promise<Result<string[], DomainError>> {
    const names: string[] = [];

    for (const file of pkg.testFiles) {
      const path = join(pkg.dir, file);
      let content: string;
      try {
        content = await this.reader.readFile(path);
      } catch (error) {
        return failure(createDomainError({
          domain: 'discovery',
          kind: 'ParseFailed',
          details: { path, message: toError(error).message },
        }));
      }
      for (const name of parseTestFunctions(content, matcher)) {
        if (!names.includes(name)) {
          names.push(name);
        }
      }
    }

    return success(names);
  }
}

/**
 * Lists packages and their tests; packages with no matching test are dropped
 */
export const discoverTests = async (
  lister: GoPackageLister,
  finder: TestFunctionFinder,
  patterns: readonly string[],
  matcher: TestFunctionMatcher,
  options: ListOptions = {},
): Promise<Result<DiscoveredTests, DomainError>> => {
  const listed = await lister.list(patterns, options);
  if (!listed.ok) {
    return listed;
  }

  const packages: string[] = [];
  const tests = new Map<string, readonly string[]>();
  for (const pkg of listed.data) {
    const found = await finder.find(pkg, matcher);
    if (!found.ok) {
      return found;
    }
    if (found.data.length > 0) {
      packages.push(pkg.importPath);
      tests.set(pkg.importPath, found.data);
    }
  }

  return success({ packages, tests });
};
