/**
 * Go Package Lister
 * Enumerates packages matching `go list` patterns such as ./... or example.com/x/...
 */

import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { DomainError } from '../../shared/errors.ts';
import { createDomainError } from '../../shared/errors.ts';
import type { ProcessExecutor } from '../test-execution/types.ts';
import type { GoPackage } from './types.ts';

const LIST_TEMPLATE =
  '{{.ImportPath}}\t{{.Dir}}\t{{join .TestGoFiles ","}}\t{{join .XTestGoFiles ","}}';

const splitFiles = (field: string | undefined): string[] => {
  return (field ?? '').split(',').filter((file) => file.length > 0);
};

/**
 * Parses the tab-separated lines printed for LIST_TEMPLATE
 */
export const parseGoListOutput = (output: string): GoPackage[] => {
  return output
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => {
      const [importPath, dir, testFiles, xTestFiles] = line.split('\t');
      return {
        importPath: importPath.trim(),
        dir: dir ?? '',
        testFiles: [...splitFiles(testFiles), ...splitFiles(xTestFiles)],
      };
    });
};

export interface ListOptions {
  readonly cwd?: string;
  readonly env?: Record<string, string>;
  readonly flags?: readonly string[];
}

export class GoPackageLister {
  constructor(private readonly executor: ProcessExecutor) {}

  async list(
    patterns: readonly string[],
    options: ListOptions = {},
  ): Promise<Result<GoPackage[], DomainError>> {
    const command = ['go', 'list', ...(options.flags ?? []), '-f', LIST_TEMPLATE, ...patterns];
    const execution = await this.executor.execute(command, { cwd: options.cwd, env: options.env });

    if (!execution.ok) {
      return failure(createDomainError({
        domain: 'discovery',
        kind: 'ListFailed',
        details: { patterns, message: execution.error.message },
      }));
    }
    if (execution.data.exitCode !== 0) {
      return failure(createDomainError({
        domain: 'discovery',
        kind: 'ListFailed',
        details: { patterns, exitCode: execution.data.exitCode, output: execution.data.stderr },
      }));
    }

    return success(parseGoListOutput(execution.data.stdout));
  }

  async listImportPaths(
    patterns: readonly string[],
    options: ListOptions = {},
  ): Promise<Result<string[], DomainError>> {
    const listed = await this.list(patterns, options);
    return listed.ok ? success(listed.data.map((pkg) => pkg.importPath)) : listed;
  }
}
