/**
 * Chat message text (Slack mrkdwn)
 */

import type { CommentContext } from './comments.js';
import { runUrl } from './comments.js';
import { formatPercent, formatSignedMoney } from './format.js';
import type { RollupReport } from '../rollup/index.js';

export function runFailureMessage(step: string, reason: string, ctx: CommentContext): string {
  const lines = [
    `:x: *${step} failed* for \`${ctx.folder}\` (${ctx.mode})`,
    `*Cause*: ${reason}`,
  ];
  if (ctx.github.owner && ctx.github.repo) lines.push(`*Repo*: ${ctx.github.owner}/${ctx.github.repo}`);
  if (ctx.commitSha) lines.push(`*Commit*: \`${ctx.commitSha.slice(0, 7)}\``);
  if (ctx.actor) lines.push(`*Actor*: ${ctx.actor}`);
  if (ctx.runId) lines.push(`<${runUrl(ctx)}|View run logs>`);
  return lines.join('\n');
}

export function rollupSlackMessage(report: RollupReport): string {
  const lines = [
    `:moneybag: *Cost rollup*: ${formatSignedMoney(report.grandTotalAbsolute, report.currency)} / month ` +
      `(${formatPercent(report.weightedPercent)}) across ${report.folders.length} folder(s), ` +
      `${report.changedCount} changed`,
  ];
  for (const delta of report.folders) {
    lines.push(`• \`${delta.folder}\`: ${formatSignedMoney(delta.absolute, report.currency)} (${formatPercent(delta.percent)})`);
  }
  if (report.skipped.length > 0) {
    lines.push(`:warning: ${report.skipped.length} folder(s) skipped: ${report.skipped.map(s => s.folder).join(', ')}`);
  }
  return lines.join('\n');
}
