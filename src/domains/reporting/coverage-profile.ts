/**
 * Go cover profiles
 *
 * Profile lines read `file.go:startLine.startCol,endLine.endCol numStatements count`
 * under a leading `mode: <set|count|atomic>` line.
 */

import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';
import type { DomainError } from '../../shared/errors.ts';
import { createDomainError } from '../../shared/errors.ts';
import type {
  CoverageBlock,
  CoverageClass,
  CoverageLine,
  CoveragePackage,
  CoverageProfile,
  CoverageReport,
} from './types.ts';

export const SET_MODE = 'set';

const MODE_LINE = /^mode:\s*(\S+)$/;
const BLOCK_LINE = /^(.+):(\d+)\.(\d+),(\d+)\.(\d+)\s+(\d+)\s+(\d+)$/;

export const parseCoverProfile = (text: string): Result<CoverageProfile, DomainError> => {
  let mode: string | undefined;
  const blocks: CoverageBlock[] = [];

  for (const [index, raw] of text.split('\n').entries()) {
    const line = raw.trim();
    if (line.length === 0) {
      continue;
    }

    const modeMatch = MODE_LINE.exec(line);
    if (modeMatch) {
      mode ??= modeMatch[1];
      continue;
    }

    const match = BLOCK_LINE.exec(line);
    if (!match) {
      return failure(createDomainError({
        domain: 'reporting',
        kind: 'ParseFailed',
        details: { line: index + 1, text: line },
      }));
    }

    const [, file, startLine, startCol, endLine, endCol, statements, count] = match;
    blocks.push({
      file,
      startLine: Number(startLine),
      startCol: Number(startCol),
      endLine: Number(endLine),
      endCol: Number(endCol),
      statements: Number(statements),
      count: Number(count),
    });
  }

  return success({ mode: mode ?? SET_MODE, blocks });
};

const blockKey = (block: CoverageBlock): string =>
  `${block.file}:${block.startLine}.${block.startCol},${block.endLine}.${block.endCol}`;

/**
 * Combines per-package profiles into one `mode: set` profile.
 * A block is covered when any profile covered it.
 */
export const mergeProfiles = (profiles: readonly CoverageProfile[]): CoverageProfile => {
  const merged = new Map<string, CoverageBlock>();

  for (const profile of profiles) {
    for (const block of profile.blocks) {
      const key = blockKey(block);
      const count = block.count > 0 ? 1 : 0;
      const previous = merged.get(key);
      merged.set(key, { ...block, count: Math.max(previous?.count ?? 0, count) });
    }
  }

  return { mode: SET_MODE, blocks: [...merged.values()] };
};

export const renderCoverProfile = (profile: CoverageProfile): string => {
  const lines = profile.blocks.map((block) =>
    `${blockKey(block)} ${block.statements} ${block.count}`
  );
  return [`mode: ${profile.mode}`, ...lines].join('\n') + '\n';
};

const packageOf = (file: string): string => {
  const slash = file.lastIndexOf('/');
  return slash === -1 ? '.' : file.slice(0, slash);
};

const classOf = (file: string): string => {
  const name = file.slice(file.lastIndexOf('/') + 1);
  return name.endsWith('.go') ? name.slice(0, -3) : name;
};

/**
 * Line hits per source file, one class per file, grouped by package directory
 */
export const coverageReportFromProfile = (
  profile: CoverageProfile,
  sources: readonly string[],
  timestamp: number,
): CoverageReport => {
  const files = new Map<string, Map<number, number>>();

  for (const block of profile.blocks) {
    let hits = files.get(block.file);
    if (!hits) {
      hits = new Map();
      files.set(block.file, hits);
    }
    for (let line = block.startLine; line <= block.endLine; line++) {
      hits.set(line, Math.max(hits.get(line) ?? 0, block.count));
    }
  }

  const packages = new Map<string, CoverageClass[]>();
  for (const file of [...files.keys()].sort()) {
    const hits = files.get(file) ?? new Map<number, number>();
    const lines: CoverageLine[] = [...hits.entries()]
      .sort(([a], [b]) => a - b)
      .map(([number, count]) => ({ number, hits: count }));

    const pkg = packageOf(file);
    const classes = packages.get(pkg) ?? [];
    classes.push({ name: classOf(file), filename: file, lines });
    packages.set(pkg, classes);
  }

  const result: CoveragePackage[] = [...packages.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, classes]) => ({ name, classes }));

  return { sources, packages: result, timestamp };
};
