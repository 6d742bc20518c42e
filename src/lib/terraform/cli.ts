/**
 * Terraform CLI facade
 *
 * Exit codes for `plan -detailed-exitcode`: 0 no changes, 2 changes
 * present, anything else is a failure.
 */

import { writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { describeError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import type { ToolRunner, ToolResult } from '../runner/index.js';

// ============================================================================
// Types
// ============================================================================

export interface PlanSummary {
  add: number;
  change: number;
  destroy: number;
}

export interface PlanOutcome {
  result: ToolResult;
  hasChanges: boolean;
  summary: PlanSummary;
  /** Plan text without init noise; empty when the plan failed */
  details: string;
}

export interface TerraformCliOptions {
  binary?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export const PLAN_FILE = 'tfplan';
export const PLAN_TEXT_FILE = 'plan.txt';

const PLAN_START = 'Terraform used the selected providers to generate the following execution';

const PlanJsonSchema = z.object({
  resource_changes: z
    .array(
      z.object({
        address: z.string(),
        change: z.object({ actions: z.array(z.string()) }),
      })
    )
    .optional(),
});

const VersionJsonSchema = z.object({
  terraform_version: z.string(),
});

// ============================================================================
// Parsing helpers
// ============================================================================

/**
 * Count planned actions the way `terraform plan` reports them: a replace
 * counts once as add and once as destroy.
 */
export function countPlanChanges(planJson: unknown): PlanSummary {
  const parsed = PlanJsonSchema.parse(planJson);
  const summary: PlanSummary = { add: 0, change: 0, destroy: 0 };

  for (const rc of parsed.resource_changes ?? []) {
    const actions = rc.change.actions;
    if (actions.includes('create')) summary.add++;
    if (actions.includes('delete')) summary.destroy++;
    if (actions.length === 1 && actions[0] === 'update') summary.change++;
  }

  return summary;
}

/**
 * Fallback when the JSON plan is unavailable: read the
 * "Plan: 1 to add, 2 to change, 0 to destroy." line.
 */
export function parsePlanSummaryLine(text: string): PlanSummary | null {
  const match = text.match(/Plan:\s+(\d+) to add,\s+(\d+) to change,\s+(\d+) to destroy/);
  if (!match) {
    if (/No changes\./.test(text)) return { add: 0, change: 0, destroy: 0 };
    return null;
  }
  return {
    add: parseInt(match[1], 10),
    change: parseInt(match[2], 10),
    destroy: parseInt(match[3], 10),
  };
}

/**
 * Keep only the plan body, dropping provider/init chatter before it
 */
export function extractPlanBody(text: string): string {
  const lines = text.split(/\r?\n/);
  const start = lines.findIndex(line => line.includes(PLAN_START));
  return lines.slice(start === -1 ? 0 : start).join('\n').trim();
}

// ============================================================================
// Terraform CLI
// ============================================================================

export class TerraformCli {
  private runner: ToolRunner;
  private binary: string;
  private timeoutMs?: number;
  private logger?: Logger;

  constructor(runner: ToolRunner, options: TerraformCliOptions = {}) {
    this.runner = runner;
    this.binary = options.binary ?? 'terraform';
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  /**
   * Installed version, or null when it cannot be determined
   */
  async version(cwd: string): Promise<string | null> {
    const result = await this.run(cwd, 'terraform version', ['version', '-json']);
    if (result.outcome !== 'success') return null;
    try {
      return VersionJsonSchema.parse(JSON.parse(result.output)).terraform_version;
    } catch {
      const match = result.output.match(/Terraform v(\d+\.\d+\.\d+)/);
      return match ? match[1] : null;
    }
  }

  fmtCheck(cwd: string): Promise<ToolResult> {
    return this.run(cwd, 'terraform fmt', ['fmt', '-check', '-recursive', '-no-color']);
  }

  init(cwd: string): Promise<ToolResult> {
    return this.run(cwd, 'terraform init', ['init', '-input=false', '-no-color']);
  }

  validate(cwd: string): Promise<ToolResult> {
    return this.run(cwd, 'terraform validate', ['validate', '-no-color']);
  }

  /**
   * Plan into `tfplan`, then render it to `plan.txt` and count changes
   */
  async plan(cwd: string): Promise<PlanOutcome> {
    const result = await this.run(
      cwd,
      'terraform plan',
      ['plan', '-input=false', '-no-color', '-detailed-exitcode', `-out=${PLAN_FILE}`],
      [0, 2]
    );

    if (result.outcome !== 'success') {
      return { result, hasChanges: false, summary: { add: 0, change: 0, destroy: 0 }, details: '' };
    }

    const hasChanges = result.exitCode === 2;

    const shown = await this.run(cwd, 'terraform show', ['show', '-no-color', PLAN_FILE]);
    const planText = shown.outcome === 'success' ? shown.output : result.output;
    await writeFile(join(cwd, PLAN_TEXT_FILE), planText);

    let summary = parsePlanSummaryLine(planText) ?? { add: 0, change: 0, destroy: 0 };
    const json = await this.run(cwd, 'terraform show -json', ['show', '-json', PLAN_FILE]);
    if (json.outcome === 'success') {
      try {
        summary = countPlanChanges(JSON.parse(json.output));
      } catch (error) {
        this.logger?.warn(`Could not read JSON plan, using text summary: ${describeError(error)}`);
      }
    }

    return { result, hasChanges, summary, details: extractPlanBody(planText) };
  }

  apply(cwd: string): Promise<ToolResult> {
    return this.run(cwd, 'terraform apply', [
      'apply',
      '-input=false',
      '-no-color',
      '-auto-approve',
      PLAN_FILE,
    ]);
  }

  private run(
    cwd: string,
    tool: string,
    args: string[],
    successExitCodes?: number[]
  ): Promise<ToolResult> {
    return this.runner.execute(this.binary, args, {
      cwd,
      tool,
      timeoutMs: this.timeoutMs,
      successExitCodes,
    });
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createTerraformCli(runner: ToolRunner, options?: TerraformCliOptions): TerraformCli {
  return new TerraformCli(runner, options);
}
