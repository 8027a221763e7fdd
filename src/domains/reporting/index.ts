/**
 * Reporting Domain
 */

export type * from './types.ts';
export { coverageReportFromProfile, mergeProfiles, parseCoverProfile, renderCoverProfile, SET_MODE } from './coverage-profile.ts';
export { lineRate, renderCoberturaReport } from './cobertura.ts';
export { hasBuildFailEvent, parseGoTestOutput, suitesFromGoTestOutput } from './go-test-output.ts';
export type { GoTestEvent, ParsedGoTestOutput } from './go-test-output.ts';
export { errorSuite, INTERNAL_ERROR, reportFileName, ReportWriter } from './report-writer.ts';
export type { ReportKind } from './report-writer.ts';
export { createStatusDocument, renderStatusDocument } from './status-file.ts';
export type { StatusInput } from './status-file.ts';
export {
  countFailures,
  createTestSuite,
  createTestSuiteWithFailure,
  escapeXml,
  renderXunitReport,
  withCaseSuffix,
} from './xunit.ts';
