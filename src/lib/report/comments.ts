/**
 * PR Comment bodies
 *
 * Markdown for the plan, lint, cost and failure comments. Identity
 * markers are added by the comment manager, not here.
 */

import type { InvocationContext } from '../config/index.js';
import type { CostDelta } from '../cost/index.js';
import type { LintReport } from '../lint/index.js';
import type { ToolResult } from '../runner/index.js';
import type { PlanOutcome } from '../terraform/index.js';
import {
  clipHead,
  clipTail,
  escapeHtml,
  formatMoney,
  formatPercent,
  formatSignedMoney,
  plural,
  tail,
} from './format.js';

// ============================================================================
// Types
// ============================================================================

export type CommentContext = Pick<
  InvocationContext,
  'mode' | 'folder' | 'actor' | 'runId' | 'commitSha' | 'github' | 'terraformVersion'
>;

export const MAX_LINT_ROWS = 500;
export const MAX_FAILURE_LINES = 60;
export const MAX_COST_RESOURCES = 25;
/** GitHub rejects bodies over 65536 characters; leaves room for the marker */
export const MAX_COMMENT_CHARS = 65000;

const LEVEL_EMOJI = { error: '❌', warning: '⚠️', info: 'ℹ️' } as const;

// ============================================================================
// Shared pieces
// ============================================================================

function repoWebUrl(ctx: CommentContext): string {
  return `${ctx.github.serverUrl.replace(/\/$/, '')}/${ctx.github.owner}/${ctx.github.repo}`;
}

export function runUrl(ctx: CommentContext): string {
  return `${repoWebUrl(ctx)}/actions/runs/${ctx.runId}`;
}

export function footer(ctx: CommentContext): string {
  const lines = ['---'];
  if (ctx.actor) lines.push(`🧑‍💻 **Actor**: @${ctx.actor}`);
  lines.push(`📂 **Dir**: \`${ctx.folder}\``);
  if (ctx.runId) lines.push(`🔗 **Run**: [logs](${runUrl(ctx)})`);
  if (ctx.commitSha) {
    lines.push(`🔧 **Commit**: [${ctx.commitSha.slice(0, 7)}](${repoWebUrl(ctx)}/commit/${ctx.commitSha})`);
  }
  return lines.join('\n') + '\n';
}

function details(summary: string, content: string): string {
  return `<details>\n<summary>${summary}</summary>\n\n${content}\n\n</details>\n`;
}

function truncationNote(ctx: CommentContext): string {
  return `⏳ Output truncated to fit a PR comment. See full details in the run logs: ${runUrl(ctx)}`;
}

/**
 * Render with all of `content`, or with as much of it (from the head or
 * the tail) as keeps the body within MAX_COMMENT_CHARS.
 */
function fitComment(
  content: string,
  keep: 'head' | 'tail',
  render: (content: string, truncated: boolean) => string
): string {
  const full = render(content, false);
  if (full.length <= MAX_COMMENT_CHARS) return full;

  const budget = MAX_COMMENT_CHARS - render('', true).length;
  return render(keep === 'head' ? clipHead(content, budget) : clipTail(content, budget), true);
}

// ============================================================================
// Plan
// ============================================================================

export function planComment(plan: PlanOutcome, ctx: CommentContext): string {
  const { add, change, destroy } = plan.summary;
  const status = plan.hasChanges ? '✅ **Plan succeeded** (changes present)' : '✅ **Plan succeeded** (no changes)';

  return fitComment(plan.details, 'head', (text, truncated) =>
    [
      `## 📦 Terraform Plan for \`${ctx.folder}\``,
      '',
      '### 🚀 Plan Summary',
      `- ➕ **Add**: \`${add}\``,
      `- ♻️ **Change**: \`${change}\``,
      `- 🗑️ **Destroy**: \`${destroy}\``,
      '',
      status,
      '',
      details('📖 Details (Click me)', plan.details ? '```terraform\n' + text + '\n```' : '_Not available._'),
      ...(truncated ? [truncationNote(ctx), ''] : []),
      footer(ctx),
    ].join('\n')
  );
}

// ============================================================================
// Lint
// ============================================================================

export function lintStatus(report: LintReport): string {
  const { error, warning, info } = report.totals;
  const parts: string[] = [];
  if (error) parts.push(`${plural(error, 'error')} ❌`);
  if (warning) parts.push(`${plural(warning, 'warning')} ⚠️`);
  if (parts.length === 0 && info) parts.push(`${info} info ℹ️`);
  return parts.length === 0 ? 'no issues' : parts.join(', ');
}

function lintTables(report: LintReport, ctx: CommentContext): string {
  if (report.files.length === 0) return '_No issues to display._';

  const parts: string[] = [];
  let rows = 0;
  let truncated = false;

  for (const group of report.files) {
    parts.push(
      `<details><summary>📄 <code>${escapeHtml(group.file)}</code> — <strong>${group.findings.length}</strong> issue(s)</summary>\n`
    );
    parts.push(
      "<table><thead><tr><th align='right'>Line</th><th align='right'>Col</th>" +
        "<th align='left'>Level</th><th align='left'>Rule</th><th align='left'>Message</th></tr></thead><tbody>"
    );

    for (const finding of group.findings) {
      if (rows >= MAX_LINT_ROWS) {
        truncated = true;
        break;
      }
      const line = ctx.commitSha
        ? `<a href='${repoWebUrl(ctx)}/blob/${ctx.commitSha}/${escapeHtml(group.file)}#L${finding.line}'>${finding.line}</a>`
        : String(finding.line);
      const level = finding.level.charAt(0).toUpperCase() + finding.level.slice(1);
      parts.push(
        `<tr><td align='right'>${line}</td><td align='right'>${finding.col}</td>` +
          `<td>${LEVEL_EMOJI[finding.level]} <strong>${level}</strong></td>` +
          `<td><code>${escapeHtml(finding.rule)}</code></td><td>${escapeHtml(finding.message)}</td></tr>`
      );
      rows++;
    }

    parts.push('</tbody></table>\n</details>\n');
    if (truncated) break;
  }

  if (truncated) {
    parts.push(
      `<p>⏳ Output truncated to ${MAX_LINT_ROWS} rows for readability. See full details in the run logs: ${runUrl(ctx)}</p>`
    );
  }

  return parts.join('\n');
}

export function lintComment(report: LintReport, ctx: CommentContext): string {
  const { error, warning, info, total } = report.totals;
  const verdict = report.passed ? '✅ **Lint check succeeded**' : '❌ **Lint check failed**';

  return [
    `## 🧹 TFLint for \`${ctx.folder}\` — ${lintStatus(report)}`,
    '',
    '### 🧹 TFLint Summary',
    `- ❌ **Errors**: \`${error}\``,
    `- ⚠️ **Warnings**: \`${warning}\``,
    `- ℹ️ **Info**: \`${info}\``,
    `- 📦 **Total**: \`${total}\``,
    '',
    verdict,
    '',
    '_How to read_: **Errors** block merges, **Warnings** need attention, **Info** is advisory.',
    '_Fix locally_: run `tflint --init && tflint` in this folder.',
    '',
    details('📖 Details (Click me)', lintTables(report, ctx)),
    footer(ctx),
  ].join('\n');
}

// ============================================================================
// Cost
// ============================================================================

export function costComment(delta: CostDelta, title: string, ctx: CommentContext): string {
  const { currency } = delta;
  const signed = formatSignedMoney(delta.absolute, currency);
  const direction = signed.startsWith('+') ? '📈' : signed.startsWith('-') ? '📉' : '➖';

  const changed = delta.resources.filter(r => r.change !== 'unchanged');
  const shown = changed.slice(0, MAX_COST_RESOURCES);
  const rows = shown.map(
    r =>
      `| \`${r.address}\` | ${r.change} | ${formatMoney(r.baseline, currency)} | ` +
      `${formatMoney(r.next, currency)} | ${formatSignedMoney(r.absolute, currency)} |`
  );

  const table =
    changed.length === 0
      ? '_No resource cost changes._'
      : [
          '| Resource | Change | Baseline | New | Delta |',
          '|---|---|---:|---:|---:|',
          ...rows,
          ...(changed.length > shown.length ? ['', `_…and ${changed.length - shown.length} more._`] : []),
        ].join('\n');

  return [
    `## 💰 ${title} for \`${ctx.folder}\``,
    '',
    `${direction} Monthly cost will change by **${signed}** ` +
      `(${delta.percent.kind === 'new' ? 'new cost' : formatPercent(delta.percent)})`,
    '',
    '| | Monthly |',
    '|---|---:|',
    `| Baseline | ${formatMoney(delta.baselineTotal, currency)} |`,
    `| New | ${formatMoney(delta.newTotal, currency)} |`,
    `| **Delta** | **${signed}** |`,
    '',
    details('📖 Per-resource changes (Click me)', table),
    footer(ctx),
  ].join('\n');
}

// ============================================================================
// Failure
// ============================================================================

export interface FailureDetails {
  step: string;
  reason: string;
  result?: ToolResult;
}

export function failureComment(failure: FailureDetails, ctx: CommentContext): string {
  const output = failure.result?.output ? tail(failure.result.output, MAX_FAILURE_LINES) : '';

  return fitComment(output, 'tail', (text, truncated) =>
    [
      `## ❌ ${failure.step} failed for \`${ctx.folder}\``,
      '',
      `**Cause**: ${failure.reason}`,
      failure.result?.timedOut ? '\n⏱️ The step timed out.' : '',
      '',
      output ? details('📖 Tool output (Click me)', '```text\n' + text + '\n```') : '',
      ...(truncated ? [truncationNote(ctx), ''] : []),
      footer(ctx),
    ].join('\n')
  );
}
