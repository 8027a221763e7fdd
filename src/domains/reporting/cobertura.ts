/**
 * Cobertura XML rendering
 */

import { VERSION } from '../../core/version.ts';
import type { CoverageLine, CoverageReport } from './types.ts';
import { escapeXml } from './xunit.ts';

interface LineCounts {
  readonly valid: number;
  readonly covered: number;
}

const countLines = (lines: readonly CoverageLine[]): LineCounts => ({
  valid: lines.length,
  covered: lines.filter((line) => line.hits > 0).length,
});

const addCounts = (a: LineCounts, b: LineCounts): LineCounts => ({
  valid: a.valid + b.valid,
  covered: a.covered + b.covered,
});

const EMPTY: LineCounts = { valid: 0, covered: 0 };

export const lineRate = (counts: LineCounts): string => {
  if (counts.valid === 0) {
    return '0';
  }
  return String(Number((counts.covered / counts.valid).toFixed(4)));
};

export const renderCoberturaReport = (report: CoverageReport): string => {
  const packageCounts = report.packages.map((pkg) =>
    pkg.classes.map((c) => countLines(c.lines)).reduce(addCounts, EMPTY)
  );
  const total = packageCounts.reduce(addCounts, EMPTY);

  let xml = '<?xml version="1.0" encoding="UTF-8"?>\n';
  xml += `<coverage line-rate="${lineRate(total)}" branch-rate="0" ` +
    `lines-covered="${total.covered}" lines-valid="${total.valid}" ` +
    `version="${VERSION}" timestamp="${report.timestamp}">\n`;

  xml += '  <sources>\n';
  for (const source of report.sources) {
    xml += `    <source>${escapeXml(source)}</source>\n`;
  }
  xml += '  </sources>\n';

  xml += '  <packages>\n';
  report.packages.forEach((pkg, index) => {
    xml += `    <package name="${escapeXml(pkg.name)}" ` +
      `line-rate="${lineRate(packageCounts[index])}" branch-rate="0" complexity="0">\n`;
    xml += '      <classes>\n';
    for (const cls of pkg.classes) {
      xml += `        <class name="${escapeXml(cls.name)}" filename="${escapeXml(cls.filename)}" ` +
        `line-rate="${lineRate(countLines(cls.lines))}" branch-rate="0" complexity="0">\n`;
      xml += '          <methods/>\n';
      xml += '          <lines>\n';
      for (const line of cls.lines) {
        xml += `            <line number="${line.number}" hits="${line.hits}"/>\n`;
      }
      xml += '          </lines>\n';
      xml += '        </class>\n';
    }
    xml += '      </classes>\n';
    xml += '    </package>\n';
  });
  xml += '  </packages>\n';

  xml += '</coverage>\n';
  return xml;
};
