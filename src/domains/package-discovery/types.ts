/**
 * Package Discovery Domain Types
 */

/**
 * A Go package as reported by `go list`
 */
export interface GoPackage {
  readonly importPath: string;
  readonly dir: string;
  /** In-package and external (`_test` package) test files, relative to `dir` */
  readonly testFiles: readonly string[];
}

/**
 * Selects test functions by name and, optionally, by signature
 */
export interface TestFunctionMatcher {
  readonly namePattern: RegExp;
  /** Only accept `func Name(t *testing.T)` with no results */
  readonly requireTestingT: boolean;
}

/**
 * Packages that have at least one matching test, in listing order
 */
export interface DiscoveredTests {
  readonly packages: readonly string[];
  readonly tests: ReadonlyMap<string, readonly string[]>;
}

/**
 * Source access for test files
 */
export interface SourceReader {
  readFile(path: string): Promise<string>;
}

export const DEFAULT_TEST_NAME_PATTERN = '^Test';
