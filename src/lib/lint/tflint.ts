/**
 * TFLint facade
 *
 * Runs with `--format compact --force`, so a non-zero exit means TFLint
 * itself broke, not that it found issues.
 */

import { access } from 'fs/promises';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { ToolRunner, ToolResult } from '../runner/index.js';

// ============================================================================
// Types
// ============================================================================

export type LintLevel = 'error' | 'warning' | 'info';

export interface LintFinding {
  file: string;
  line: number;
  col: number;
  level: LintLevel;
  rule: string;
  message: string;
}

export interface LintFileGroup {
  file: string;
  findings: LintFinding[];
}

export interface LintTotals {
  error: number;
  warning: number;
  info: number;
  total: number;
}

export interface LintReport {
  result: ToolResult;
  configPath: string;
  files: LintFileGroup[];
  totals: LintTotals;
  /** Tool ran and reported no error-level findings */
  passed: boolean;
}

export interface TflintCliOptions {
  binary?: string;
  timeoutMs?: number;
  /** Override the bundled fallback config */
  defaultConfigPath?: string;
}

export const REPO_LINT_CONFIG = '.tflint.hcl';
export const DEFAULT_LINT_CONFIG = fileURLToPath(
  new URL('../../../config/default.tflint.hcl', import.meta.url)
);

const SEVERITY_WEIGHT: Record<LintLevel, number> = { error: 3, warning: 2, info: 1 };

const LINE_RE =
  /^(?<file>[^:\n]+):(?<line>\d+):(?<col>\d+):\s*(?<level>[A-Za-z]+)\s*-\s*(?<msg>.*?)(?:\s*\((?<rule>[^)]+)\))?\s*$/;

// ============================================================================
// Parsing
// ============================================================================

function toLevel(raw: string): LintLevel {
  const level = raw.toLowerCase();
  if (level === 'error' || level === 'warning') return level;
  return 'info';
}

/**
 * Parse `tflint --format compact` output. Summary lines and anything
 * that doesn't look like a finding are ignored.
 */
export function parseTflintOutput(text: string): LintFinding[] {
  const findings: LintFinding[] = [];

  for (const raw of text.split(/\r?\n/)) {
    if (!raw.trim()) continue;
    const lower = raw.toLowerCase();
    if (lower.includes('issue(s) found') || lower.includes('no issues')) continue;

    const groups = LINE_RE.exec(raw)?.groups;
    if (!groups) continue;

    findings.push({
      file: groups.file.trim(),
      line: parseInt(groups.line, 10),
      col: parseInt(groups.col, 10),
      level: toLevel(groups.level),
      rule: (groups.rule ?? '').trim(),
      message: (groups.msg ?? '').trim(),
    });
  }

  return findings;
}

/**
 * Group by file (case-insensitive order); within a file, most severe
 * first, then by position.
 */
export function groupFindings(findings: LintFinding[]): LintFileGroup[] {
  const byFile = new Map<string, LintFinding[]>();
  for (const finding of findings) {
    const list = byFile.get(finding.file) ?? [];
    list.push(finding);
    byFile.set(finding.file, list);
  }

  return [...byFile.entries()]
    .sort(([a], [b]) => {
      const la = a.toLowerCase();
      const lb = b.toLowerCase();
      return la < lb ? -1 : la > lb ? 1 : 0;
    })
    .map(([file, list]) => ({
      file,
      findings: [...list].sort(
        (a, b) =>
          SEVERITY_WEIGHT[b.level] - SEVERITY_WEIGHT[a.level] ||
          a.line - b.line ||
          a.col - b.col
      ),
    }));
}

export function totalFindings(findings: LintFinding[]): LintTotals {
  const totals: LintTotals = { error: 0, warning: 0, info: 0, total: 0 };
  for (const finding of findings) {
    totals[finding.level]++;
    totals.total++;
  }
  return totals;
}

/**
 * Repo-provided `.tflint.hcl` wins over the bundled default
 */
export async function resolveLintConfig(workingDir: string, fallback: string = DEFAULT_LINT_CONFIG): Promise<string> {
  const repoConfig = join(workingDir, REPO_LINT_CONFIG);
  try {
    await access(repoConfig);
    return repoConfig;
  } catch {
    return fallback;
  }
}

// ============================================================================
// TFLint CLI
// ============================================================================

export class TflintCli {
  private runner: ToolRunner;
  private binary: string;
  private timeoutMs?: number;
  private defaultConfigPath: string;

  constructor(runner: ToolRunner, options: TflintCliOptions = {}) {
    this.runner = runner;
    this.binary = options.binary ?? 'tflint';
    this.timeoutMs = options.timeoutMs;
    this.defaultConfigPath = options.defaultConfigPath ?? DEFAULT_LINT_CONFIG;
  }

  async lint(workingDir: string): Promise<LintReport> {
    const configPath = await resolveLintConfig(workingDir, this.defaultConfigPath);

    const init = await this.runner.execute(
      this.binary,
      ['--init', `--config=${configPath}`],
      { cwd: workingDir, tool: 'tflint --init', timeoutMs: this.timeoutMs }
    );
    if (init.outcome !== 'success') {
      return this.report(init, configPath, []);
    }

    const result = await this.runner.execute(
      this.binary,
      [`--config=${configPath}`, '--format=compact', '--force', '--no-color'],
      { cwd: workingDir, tool: 'tflint', timeoutMs: this.timeoutMs }
    );

    const findings = result.outcome === 'success' ? parseTflintOutput(result.output) : [];
    return this.report(result, configPath, findings);
  }

  private report(result: ToolResult, configPath: string, findings: LintFinding[]): LintReport {
    const totals = totalFindings(findings);
    return {
      result,
      configPath,
      files: groupFindings(findings),
      totals,
      passed: result.outcome === 'success' && totals.error === 0,
    };
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createTflintCli(runner: ToolRunner, options?: TflintCliOptions): TflintCli {
  return new TflintCli(runner, options);
}
