/**
 * Status file for one named test
 */

import type { HostInfo } from '../exclusion/types.ts';
import type { TestOutcome } from '../test-registry/types.ts';
import { STATUS_LABELS } from '../test-registry/types.ts';
import type { StatusDocument } from './types.ts';

export interface StatusInput {
  readonly testName: string;
  readonly outcome: TestOutcome;
  readonly host: HostInfo;
  readonly partIndex: number;
  readonly now: Date;
}

export const createStatusDocument = (input: StatusInput): StatusDocument => ({
  testName: input.testName,
  result: STATUS_LABELS[input.outcome.status],
  timestamp: input.now.toISOString(),
  excludedTests: input.outcome.excludedTests,
  skippedTests: input.outcome.skippedTests,
  axisValues: {
    os: input.host.os,
    arch: input.host.arch,
    partIndex: input.partIndex,
  },
});

export const renderStatusDocument = (document: StatusDocument): string => {
  return `${JSON.stringify(document, null, 2)}\n`;
};
