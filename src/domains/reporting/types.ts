/**
 * Reporting Domain Types
 */

import type { Result } from '../../shared/result.ts';

/**
 * xUnit failure element: `<failure message="…">data</failure>`
 */
export interface TestFailure {
  readonly message: string;
  readonly data: string;
}

export interface TestCase {
  readonly classname: string;
  readonly name: string;
  readonly time: string; // seconds, two decimals
  readonly failure?: TestFailure;
  readonly skipped?: boolean;
}

export interface TestSuite {
  readonly name: string;
  readonly tests: number;
  readonly failures: number;
  readonly errors: number;
  readonly skip: number;
  readonly time: string;
  readonly cases: readonly TestCase[];
}

/**
 * Coverage block from a Go cover profile line:
 * `file.go:startLine.startCol,endLine.endCol numStatements count`
 */
export interface CoverageBlock {
  readonly file: string;
  readonly startLine: number;
  readonly startCol: number;
  readonly endLine: number;
  readonly endCol: number;
  readonly statements: number;
  readonly count: number;
}

export interface CoverageProfile {
  readonly mode: string;
  readonly blocks: readonly CoverageBlock[];
}

export interface CoverageLine {
  readonly number: number;
  readonly hits: number;
}

export interface CoverageClass {
  readonly name: string;
  readonly filename: string;
  readonly lines: readonly CoverageLine[];
}

export interface CoveragePackage {
  readonly name: string;
  readonly classes: readonly CoverageClass[];
}

export interface CoverageReport {
  readonly sources: readonly string[];
  readonly packages: readonly CoveragePackage[];
  readonly timestamp: number; // epoch milliseconds
}

/**
 * JSON document written beside the xUnit report
 */
export interface StatusDocument {
  readonly testName: string;
  readonly result: string;
  readonly timestamp: string; // ISO 8601
  readonly excludedTests: Readonly<Record<string, readonly string[]>>;
  readonly skippedTests: Readonly<Record<string, readonly string[]>>;
  readonly axisValues: {
    readonly os: string;
    readonly arch: string;
    readonly partIndex: number;
  };
}

/**
 * File writer interface
 */
export interface FileWriter {
  write(path: string, content: string): Promise<Result<void, Error>>;
}
