/**
 * Report Formatting Tests
 */

import { describe, it, expect } from 'vitest';
import { diff } from '../src/lib/cost/index.js';
import type { LintFinding, LintReport } from '../src/lib/lint/index.js';
import { groupFindings, totalFindings } from '../src/lib/lint/index.js';
import {
  clipHead,
  clipTail,
  costComment,
  escapeHtml,
  failureComment,
  footer,
  formatMoney,
  formatPercent,
  formatSignedMoney,
  lintComment,
  lintStatus,
  MAX_COMMENT_CHARS,
  planComment,
  runFailureMessage,
  tail,
  type CommentContext,
} from '../src/lib/report/index.js';
import type { ToolResult } from '../src/lib/runner/index.js';

const ctx: CommentContext = {
  mode: 'pr',
  folder: 'infra/prod',
  actor: 'octocat',
  runId: '99',
  commitSha: 'abcdef1234567',
  terraformVersion: 'latest',
  github: {
    owner: 'acme',
    repo: 'infra',
    apiUrl: 'https://api.github.com',
    serverUrl: 'https://github.com',
    eventName: 'pull_request',
    runId: '99',
    workflow: 'infra',
  },
};

function toolResult(overrides: Partial<ToolResult> = {}): ToolResult {
  return {
    tool: 'terraform plan',
    command: 'terraform plan',
    exitCode: 1,
    output: '',
    durationMs: 10,
    outcome: 'failure',
    timedOut: false,
    truncated: false,
    ...overrides,
  };
}

function lintReport(findings: LintFinding[]): LintReport {
  const totals = totalFindings(findings);
  return {
    result: toolResult({ tool: 'tflint', exitCode: 0, outcome: 'success' }),
    configPath: '.tflint.hcl',
    files: groupFindings(findings),
    totals,
    passed: totals.error === 0,
  };
}

describe('format helpers', () => {
  it('formats money with two decimals', () => {
    expect(formatMoney(10, 'USD')).toBe('$10.00');
    expect(formatMoney(1234.5, 'USD')).toBe('$1,234.50');
    expect(formatMoney(10, 'EUR')).toBe('€10.00');
  });

  it('signs money deltas', () => {
    expect(formatSignedMoney(10, 'USD')).toBe('+$10.00');
    expect(formatSignedMoney(-4, 'USD')).toBe('-$4.00');
    expect(formatSignedMoney(0, 'USD')).toBe('$0.00');
    expect(formatSignedMoney(-0.001, 'USD')).toBe('$0.00');
  });

  it('formats percentages', () => {
    expect(formatPercent({ kind: 'percent', value: 12.46 })).toBe('+12.5%');
    expect(formatPercent({ kind: 'percent', value: -100 })).toBe('-100.0%');
    expect(formatPercent({ kind: 'percent', value: -0.04 })).toBe('0.0%');
    expect(formatPercent({ kind: 'new' })).toBe('new');
    expect(formatPercent({ kind: 'not-applicable' })).toBe('n/a');
  });

  it('escapes HTML', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#x27;&amp;&#x27;&lt;/a&gt;');
  });

  it('keeps the last lines of long output', () => {
    expect(tail('a\nb\nc\nd\ne\n', 2)).toBe('… (3 earlier lines omitted)\nd\ne');
    expect(tail('a\nb', 5)).toBe('a\nb');
  });

  it('clips text to a character budget at line boundaries', () => {
    expect(clipHead('aaa\nbbb\nccc', 9)).toBe('aaa\nbbb');
    expect(clipTail('aaa\nbbb\nccc', 9)).toBe('bbb\nccc');
    expect(clipHead('short', 9)).toBe('short');
  });

  it('never splits a surrogate pair', () => {
    expect(clipHead('ab😀', 3)).toBe('ab');
    expect(clipTail('😀ab', 3)).toBe('ab');
  });
});

describe('comment bodies', () => {
  it('ends every comment with the run footer', () => {
    expect(footer(ctx)).toBe(
      [
        '---',
        '🧑‍💻 **Actor**: @octocat',
        '📂 **Dir**: `infra/prod`',
        '🔗 **Run**: [logs](https://github.com/acme/infra/actions/runs/99)',
        '🔧 **Commit**: [abcdef1](https://github.com/acme/infra/commit/abcdef1234567)',
      ].join('\n') + '\n'
    );
  });

  it('summarizes a plan', () => {
    const body = planComment(
      {
        result: toolResult({ exitCode: 2, outcome: 'success' }),
        hasChanges: true,
        summary: { add: 2, change: 1, destroy: 0 },
        details: '  # aws_s3_bucket.logs will be created',
      },
      ctx
    );
    const lines = body.split('\n');

    expect(lines[0]).toBe('## 📦 Terraform Plan for `infra/prod`');
    expect(lines).toContain('- ➕ **Add**: `2`');
    expect(lines).toContain('- ♻️ **Change**: `1`');
    expect(lines).toContain('- 🗑️ **Destroy**: `0`');
    expect(lines).toContain('✅ **Plan succeeded** (changes present)');
    expect(body).toContain('```terraform\n  # aws_s3_bucket.logs will be created\n```');
  });

  it('truncates a large plan to fit a PR comment', () => {
    const details = Array.from({ length: 4000 }, (_, i) => `  # aws_s3_bucket.b${i} will be created`).join('\n');
    const body = planComment(
      {
        result: toolResult({ exitCode: 2, outcome: 'success' }),
        hasChanges: true,
        summary: { add: 4000, change: 0, destroy: 0 },
        details,
      },
      ctx
    );

    expect(body.length).toBeLessThanOrEqual(MAX_COMMENT_CHARS);
    expect(body).toContain('```terraform\n  # aws_s3_bucket.b0 will be created\n');
    expect(body).not.toContain('aws_s3_bucket.b3999 ');
    expect(body).toContain('\n```\n\n</details>\n');
    expect(body).toContain(
      '⏳ Output truncated to fit a PR comment. See full details in the run logs: https://github.com/acme/infra/actions/runs/99'
    );
    expect(body.endsWith(footer(ctx))).toBe(true);
  });

  it('shows a placeholder when plan details are missing', () => {
    const body = planComment(
      { result: toolResult({ exitCode: 0, outcome: 'success' }), hasChanges: false, summary: { add: 0, change: 0, destroy: 0 }, details: '' },
      ctx
    );
    expect(body).toContain('<summary>📖 Details (Click me)</summary>\n\n_Not available._\n\n</details>');
    expect(body).toContain('✅ **Plan succeeded** (no changes)');
  });

  it('describes lint status by severity', () => {
    const finding = (level: LintFinding['level'], line: number): LintFinding => ({
      file: 'main.tf',
      line,
      col: 1,
      level,
      rule: 'r',
      message: 'm',
    });

    expect(lintStatus(lintReport([]))).toBe('no issues');
    expect(lintStatus(lintReport([finding('error', 1), finding('warning', 2), finding('warning', 3)]))).toBe(
      '1 error ❌, 2 warnings ⚠️'
    );
    expect(lintStatus(lintReport([finding('info', 1), finding('info', 2), finding('info', 3)]))).toBe('3 info ℹ️');
  });

  it('renders lint findings as escaped, linked table rows', () => {
    const body = lintComment(
      lintReport([
        {
          file: 'main.tf',
          line: 12,
          col: 3,
          level: 'error',
          rule: 'aws_instance_invalid_type',
          message: '"t2.nano" <bad>',
        },
      ]),
      ctx
    );

    expect(body.split('\n')[0]).toBe('## 🧹 TFLint for `infra/prod` — 1 error ❌');
    expect(body).toContain('❌ **Lint check failed**');
    expect(body).toContain(
      "<tr><td align='right'><a href='https://github.com/acme/infra/blob/abcdef1234567/main.tf#L12'>12</a></td>" +
        "<td align='right'>3</td><td>❌ <strong>Error</strong></td>" +
        '<td><code>aws_instance_invalid_type</code></td><td>&quot;t2.nano&quot; &lt;bad&gt;</td></tr>'
    );
  });

  it('caps the lint table at 500 rows', () => {
    const findings = Array.from({ length: 501 }, (_, i): LintFinding => ({
      file: 'main.tf',
      line: i + 1,
      col: 1,
      level: 'warning',
      rule: 'r',
      message: 'm',
    }));

    const body = lintComment(lintReport(findings), ctx);

    expect(body.split('<tr><td').length - 1).toBe(500);
    expect(body).toContain(
      '<p>⏳ Output truncated to 500 rows for readability. See full details in the run logs: https://github.com/acme/infra/actions/runs/99</p>'
    );
  });

  it('reports a cost delta with per-resource changes', () => {
    const delta = diff(
      { currency: 'USD', totalMonthlyCost: 10, resources: { 'aws_instance.web': 10 } },
      { currency: 'USD', totalMonthlyCost: 25, resources: { 'aws_instance.web': 10, 'aws_nat_gateway.main': 15 } },
      'infra/prod'
    );

    const lines = costComment(delta, 'Infracost cost estimate', ctx).split('\n');

    expect(lines[0]).toBe('## 💰 Infracost cost estimate for `infra/prod`');
    expect(lines[2]).toBe('📈 Monthly cost will change by **+$15.00** (+150.0%)');
    expect(lines).toContain('| Baseline | $10.00 |');
    expect(lines).toContain('| New | $25.00 |');
    expect(lines).toContain('| `aws_nat_gateway.main` | added | $0.00 | $15.00 | +$15.00 |');
    expect(lines.some(line => line.startsWith('| `aws_instance.web`'))).toBe(false);
  });

  it('labels cost from a zero baseline as new', () => {
    const delta = diff(
      { currency: 'USD', totalMonthlyCost: 0, resources: {} },
      { currency: 'USD', totalMonthlyCost: 25, resources: { 'aws_nat_gateway.main': 25 } },
      'network'
    );

    expect(costComment(delta, 'Cost', { ...ctx, folder: 'network' }).split('\n')[2]).toBe(
      '📈 Monthly cost will change by **+$25.00** (new cost)'
    );
  });

  it('names the failed step and embeds the output tail', () => {
    const body = failureComment(
      {
        step: 'Terraform plan',
        reason: 'terraform plan exited with code 1',
        result: toolResult({ output: 'Error: Missing required argument\n  on main.tf line 3' }),
      },
      ctx
    );

    expect(body.split('\n')[0]).toBe('## ❌ Terraform plan failed for `infra/prod`');
    expect(body).toContain('**Cause**: terraform plan exited with code 1');
    expect(body).toContain('```text\nError: Missing required argument\n  on main.tf line 3\n```');
    expect(body).not.toContain('timed out');
    expect(body).not.toContain('Output truncated');
  });

  it('keeps the end of oversized failure output', () => {
    const output = Array.from({ length: 60 }, (_, i) => `line ${i} ${'x'.repeat(2000)}`).join('\n');
    const body = failureComment(
      { step: 'Terraform plan', reason: 'terraform plan exited with code 1', result: toolResult({ output }) },
      ctx
    );

    expect(body.length).toBeLessThanOrEqual(MAX_COMMENT_CHARS);
    expect(body).toContain('line 59 ');
    expect(body).not.toContain('line 0 ');
    expect(body).toContain('Output truncated to fit a PR comment');
  });
});

describe('chat messages', () => {
  it('describes a failed run', () => {
    expect(runFailureMessage('Terraform apply', 'terraform apply exited with code 1', { ...ctx, mode: 'merge' })).toBe(
      [
        ':x: *Terraform apply failed* for `infra/prod` (merge)',
        '*Cause*: terraform apply exited with code 1',
        '*Repo*: acme/infra',
        '*Commit*: `abcdef1`',
        '*Actor*: octocat',
        '<https://github.com/acme/infra/actions/runs/99|View run logs>',
      ].join('\n')
    );
  });
});
