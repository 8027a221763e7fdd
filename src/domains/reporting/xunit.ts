/**
 * xUnit suite construction and XML rendering
 */

import { formatSeconds } from '../test-execution/duration.ts';
import type { TestCase, TestSuite } from './types.ts';

export const escapeXml = (str: string): string => {
  return str
    // characters XML 1.0 cannot carry at all, e.g. terminal escapes in test output
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\uFFFE\uFFFF]/g, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
};

export const createTestSuite = (
  name: string,
  cases: readonly TestCase[],
  durationMs: number,
): TestSuite => ({
  name,
  tests: cases.length,
  failures: cases.filter((c) => c.failure !== undefined).length,
  errors: 0,
  skip: cases.filter((c) => c.skipped === true).length,
  time: formatSeconds(durationMs),
  cases,
});

/**
 * A suite holding a single failed case
 */
export const createTestSuiteWithFailure = (
  pkg: string,
  testName: string,
  message: string,
  data: string,
  durationMs: number,
): TestSuite => {
  const time = formatSeconds(durationMs);
  return createTestSuite(pkg, [{
    classname: pkg,
    name: testName,
    time,
    failure: { message, data },
  }], durationMs);
};

/**
 * Appends ` <suffix>` to every case name
 */
export const withCaseSuffix = (suite: TestSuite, suffix: string): TestSuite => {
  if (suffix.length === 0) {
    return suite;
  }
  return {
    ...suite,
    cases: suite.cases.map((c) => ({ ...c, name: `${c.name} ${suffix}` })),
  };
};

const renderCase = (testCase: TestCase): string => {
  const open = `    <testcase classname="${escapeXml(testCase.classname)}" ` +
    `name="${escapeXml(testCase.name)}" time="${testCase.time}"`;

  if (testCase.failure) {
    return `${open}>\n` +
      `      <failure message="${escapeXml(testCase.failure.message)}">` +
      `${escapeXml(testCase.failure.data)}</failure>\n` +
      '    </testcase>\n';
  }
  if (testCase.skipped) {
    return `${open}>\n      <skipped/>\n    </testcase>\n`;
  }
  return `${open}/>\n`;
};

/**
 * Renders the `<testsuites>` document
 */
export const renderXunitReport = (suites: readonly TestSuite[]): string => {
  let xml = '<?xml version="1.0" encoding="UTF-8"?>\n';
  xml += '<testsuites>\n';

  for (const suite of suites) {
    xml += `  <testsuite name="${escapeXml(suite.name)}" `;
    xml += `tests="${suite.tests}" `;
    xml += `failures="${suite.failures}" `;
    xml += `errors="${suite.errors}" `;
    xml += `skip="${suite.skip}" `;
    xml += `time="${suite.time}">\n`;

    for (const testCase of suite.cases) {
      xml += renderCase(testCase);
    }

    xml += '  </testsuite>\n';
  }

  xml += '</testsuites>\n';
  return xml;
};

export const countFailures = (suites: readonly TestSuite[]): number => {
  return suites.reduce((total, suite) => total + suite.failures, 0);
};
