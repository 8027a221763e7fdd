/**
 * Report Writer
 * Places xUnit, Cobertura and status files in the output directory
 */

import { join } from '../../deps.ts';
import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { DomainError } from '../../shared/errors.ts';
import { createDomainError } from '../../shared/errors.ts';
import { renderCoberturaReport } from './cobertura.ts';
import { renderStatusDocument } from './status-file.ts';
import type { CoverageReport, FileWriter, StatusDocument, TestSuite } from './types.ts';
import { createTestSuiteWithFailure, renderXunitReport } from './xunit.ts';

export type ReportKind = 'tests' | 'status' | 'cobertura';

export const INTERNAL_ERROR = 'Internal Error';

/**
 * `tests_my_test.xml` for kind `tests` and test `my-test`
 */
export const reportFileName = (kind: ReportKind, testName: string): string => {
  const extension = kind === 'status' ? 'json' : 'xml';
  return `${kind}_${testName.replace(/-/g, '_')}.${extension}`;
};

/**
 * One-case suite standing in for a test that could not run
 */
export const errorSuite = (testName: string, message: string): TestSuite => {
  return createTestSuiteWithFailure(
    testName,
    INTERNAL_ERROR,
    INTERNAL_ERROR,
    `Error message:\n${message}\n`,
    0,
  );
};

export class ReportWriter {
  constructor(
    private readonly writer: FileWriter,
    private readonly outputDir: string,
  ) {}

  pathFor(kind: ReportKind, testName: string): string {
    return join(this.outputDir, reportFileName(kind, testName));
  }

  writeXunit(testName: string, suites: readonly TestSuite[]): Promise<Result<string, DomainError>> {
    return this.write(this.pathFor('tests', testName), renderXunitReport(suites));
  }

  writeCobertura(testName: string, report: CoverageReport): Promise<Result<string, DomainError>> {
    return this.write(this.pathFor('cobertura', testName), renderCoberturaReport(report));
  }

  writeStatus(document: StatusDocument): Promise<Result<string, DomainError>> {
    return this.write(this.pathFor('status', document.testName), renderStatusDocument(document));
  }

  writeErrorReport(testName: string, message: string): Promise<Result<string, DomainError>> {
    return this.writeXunit(testName, [errorSuite(testName, message)]);
  }

  private async write(path: string, content: string): Promise<Result<string, DomainError>> {
    const written = await this.writer.write(path, content);
    if (!written.ok) {
      return failure(createDomainError({
        domain: 'reporting',
        kind: 'FileWriteFailed',
        details: { path, error: written.error.message },
      }));
    }
    return success(path);
  }
}
