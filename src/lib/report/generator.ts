/**
 * Rollup Report Generator
 *
 * Renders a rollup as JSON and markdown and writes both next to the
 * per-folder artifacts. Output contains no timestamps: the same inputs
 * always produce the same bytes.
 */

import type { ArtifactStore } from '../cost/index.js';
import type { RollupReport } from '../rollup/index.js';
import { formatMoney, formatPercent, formatSignedMoney } from './format.js';

export interface RollupReportResult {
  jsonPath: string;
  markdownPath: string;
  markdown: string;
}

export function rollupMarkdown(report: RollupReport, title: string = 'Infracost cost rollup'): string {
  const { currency } = report;
  const lines = [
    `## 💰 ${title}`,
    '',
    `**Total monthly change**: ${formatSignedMoney(report.grandTotalAbsolute, currency)} ` +
      `(${formatPercent(report.weightedPercent)})`,
    `**Baseline**: ${formatMoney(report.grandTotalBaseline, currency)} → ` +
      `**New**: ${formatMoney(report.grandTotalNew, currency)}`,
    `**Folders changed**: ${report.changedCount} of ${report.folders.length}`,
    '',
    '| Folder | Baseline | New | Delta | % |',
    '|---|---:|---:|---:|---:|',
    ...report.folders.map(
      d =>
        `| \`${d.folder}\` | ${formatMoney(d.baselineTotal, currency)} | ${formatMoney(d.newTotal, currency)} | ` +
        `${formatSignedMoney(d.absolute, currency)} | ${formatPercent(d.percent)} |`
    ),
  ];

  if (report.skipped.length > 0) {
    lines.push('', '### ⚠️ Skipped', '');
    for (const skip of report.skipped) {
      lines.push(`- \`${skip.folder}\`: ${skip.reason}`);
    }
  }

  return lines.join('\n') + '\n';
}

export class ReportGenerator {
  private store: ArtifactStore;
  private title?: string;

  constructor(store: ArtifactStore, title?: string) {
    this.store = store;
    this.title = title;
  }

  async generateRollup(report: RollupReport): Promise<RollupReportResult> {
    const markdown = rollupMarkdown(report, this.title);
    const paths = await this.store.writeRollup(report, markdown);
    return { ...paths, markdown };
  }
}

export function createReportGenerator(store: ArtifactStore, title?: string): ReportGenerator {
  return new ReportGenerator(store, title);
}
