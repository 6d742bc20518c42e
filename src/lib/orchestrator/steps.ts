/**
 * Shared steps
 *
 * Building blocks the mode handlers compose. Reporting helpers
 * (publish, notify) log API failures and never throw: a broken comment
 * or chat call must not change the run's result.
 */

import { stat } from 'fs/promises';
import { join } from 'path';
import type { InvocationContext } from '../config/index.js';
import { RAW_INFRACOST_FILE, diff, emptySnapshot, type CostDelta, type CostSnapshot } from '../cost/index.js';
import { ConfigurationError, describeError } from '../errors/index.js';
import type { CommentIdentity, CommentKind, PublishPolicy } from '../github/index.js';
import type { NotifyTrigger } from '../notify/index.js';
import { failureComment, runFailureMessage } from '../report/index.js';
import type { ToolResult } from '../runner/index.js';
import type { PlanOutcome } from '../terraform/index.js';
import type { ExitStatus, OrchestratorDeps } from './types.js';

// ============================================================================
// Preflight
// ============================================================================

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * @throws {ConfigurationError} when the mode's input directory is missing
 */
export async function preflight(context: InvocationContext): Promise<void> {
  if (context.mode === 'rollup') {
    if (!(await isDirectory(context.rollupInputDir))) {
      throw new ConfigurationError(`Rollup input directory does not exist: ${context.rollupInputDir}`);
    }
    return;
  }

  if (!(await isDirectory(context.workingDir))) {
    throw new ConfigurationError(`Working directory does not exist: ${context.workingDir}`);
  }
  const baseline = baselineFolder(context);
  if (baseline && !(await isDirectory(baseline))) {
    throw new ConfigurationError(`Baseline directory does not exist: ${baseline}`);
  }
}

/**
 * The working folder inside the base-branch checkout, when one is given
 */
export function baselineFolder(context: InvocationContext): string | undefined {
  return context.baselineDir ? join(context.baselineDir, context.folder) : undefined;
}

// ============================================================================
// Bookkeeping
// ============================================================================

export function record(status: ExitStatus, result: ToolResult, detail?: string): ToolResult {
  status.steps.push({
    name: result.tool,
    outcome: result.outcome,
    durationMs: result.durationMs,
    detail,
  });
  return result;
}

export function fail(status: ExitStatus, step: string, reason: string): ExitStatus {
  status.exitCode = 1;
  status.failure = { step, reason };
  return status;
}

export function identity(context: InvocationContext, kind: CommentKind): CommentIdentity {
  return {
    mode: context.mode,
    folder: context.folder,
    kind,
    marker: kind === 'plan' ? context.prCommentMarker : undefined,
  };
}

export function failureReason(result: ToolResult): string {
  if (result.timedOut) return `${result.tool} timed out`;
  if (result.exitCode === null) return `${result.tool} could not be run`;
  return `${result.tool} exited with code ${result.exitCode}`;
}

// ============================================================================
// Reporting
// ============================================================================

export async function publish(
  deps: OrchestratorDeps,
  status: ExitStatus,
  target: CommentIdentity,
  body: string,
  policy?: PublishPolicy
): Promise<void> {
  if (!deps.comments) {
    deps.logger.debug(`No pull request; ${target.kind} comment not published`);
    return;
  }
  try {
    status.comments[target.kind] = await deps.comments.publish(target, body, policy);
  } catch (error) {
    status.comments[target.kind] = 'error';
    deps.logger.warn(`Failed to publish ${target.kind} comment: ${describeError(error)}`);
  }
}

/**
 * Post the failure comment for a fatal step
 */
export async function publishFailure(
  context: InvocationContext,
  deps: OrchestratorDeps,
  status: ExitStatus,
  step: string,
  reason: string,
  result?: ToolResult
): Promise<void> {
  await publish(deps, status, identity(context, 'failure'), failureComment({ step, reason, result }, context));
}

/**
 * Remove a comment an earlier run left for this folder, if any
 */
export async function clearComment(
  context: InvocationContext,
  deps: OrchestratorDeps,
  status: ExitStatus,
  kind: CommentKind
): Promise<void> {
  await publish(deps, status, identity(context, kind), '', { silentSkipOnZero: true, isZero: true });
}

export async function clearFailure(context: InvocationContext, deps: OrchestratorDeps, status: ExitStatus): Promise<void> {
  await clearComment(context, deps, status, 'failure');
}

export async function notify(
  context: InvocationContext,
  deps: OrchestratorDeps,
  status: ExitStatus,
  message: string,
  trigger: NotifyTrigger
): Promise<void> {
  try {
    status.notification = await deps.notifier.notify(context.slack.channel, message, trigger);
  } catch (error) {
    status.notification = 'error';
    deps.logger.warn(`Failed to send Slack notification: ${describeError(error)}`);
  }
}

export async function notifyFailure(
  context: InvocationContext,
  deps: OrchestratorDeps,
  status: ExitStatus,
  step: string,
  reason: string
): Promise<void> {
  await notify(context, deps, status, runFailureMessage(step, reason, context), {
    mode: context.mode,
    succeeded: false,
  });
}

// ============================================================================
// Terraform
// ============================================================================

export async function checkTerraformVersion(context: InvocationContext, deps: OrchestratorDeps): Promise<void> {
  if (context.terraformVersion === 'latest') return;
  const installed = await deps.terraform.version(context.workingDir);
  if (installed === null) {
    deps.logger.warn('Could not determine installed Terraform version');
  } else if (installed !== context.terraformVersion.replace(/^v/, '')) {
    deps.logger.warn(`Terraform ${installed} is installed but ${context.terraformVersion} was requested`);
  }
}

export type PlanStep =
  | { ok: true; plan: PlanOutcome }
  | { ok: false; step: string; reason: string; result: ToolResult };

/**
 * init, optionally fmt -check and validate, then plan. Stops at the
 * first failing command.
 */
export async function runPlan(
  context: InvocationContext,
  deps: OrchestratorDeps,
  status: ExitStatus,
  options: { checks: boolean }
): Promise<PlanStep> {
  const cwd = context.workingDir;

  deps.logger.group(`terraform init (${context.folder})`);
  const init = record(status, await deps.terraform.init(cwd));
  deps.logger.endGroup();
  if (init.outcome !== 'success') {
    return { ok: false, step: 'Terraform init', reason: failureReason(init), result: init };
  }

  if (options.checks) {
    const fmt = record(status, await deps.terraform.fmtCheck(cwd));
    if (fmt.outcome !== 'success') {
      return { ok: false, step: 'Terraform fmt', reason: 'files are not formatted (run `terraform fmt -recursive`)', result: fmt };
    }

    const validate = record(status, await deps.terraform.validate(cwd));
    if (validate.outcome !== 'success') {
      return { ok: false, step: 'Terraform validate', reason: failureReason(validate), result: validate };
    }
  }

  deps.logger.group(`terraform plan (${context.folder})`);
  const plan = await deps.terraform.plan(cwd);
  deps.logger.endGroup();
  const { add, change, destroy } = plan.summary;
  record(status, plan.result, `${add} to add, ${change} to change, ${destroy} to destroy`);

  if (plan.result.outcome !== 'success') {
    return { ok: false, step: 'Terraform plan', reason: failureReason(plan.result), result: plan.result };
  }

  status.planHasChanges = plan.hasChanges;
  deps.logger.info(`📋 Plan: ${add} to add, ${change} to change, ${destroy} to destroy`);
  return { ok: true, plan };
}

// ============================================================================
// Cost
// ============================================================================

export interface CostRun {
  baseline: CostSnapshot;
  next: CostSnapshot;
  delta: CostDelta;
}

/**
 * Capture the baseline (base-branch checkout, else the last persisted
 * snapshot, else nothing), then the current cost, then diff.
 *
 * @throws {ToolExecutionError | DataError}
 */
export async function computeCost(context: InvocationContext, deps: OrchestratorDeps): Promise<CostRun> {
  const dir = await deps.artifacts.ensureFolder(context.folder);

  const baselineDir = baselineFolder(context);
  let baseline: CostSnapshot;
  if (baselineDir) {
    deps.logger.info(`💰 Estimating baseline cost from ${baselineDir}`);
    baseline = await deps.cost.breakdown(baselineDir, join(dir, `baseline-${RAW_INFRACOST_FILE}`));
  } else {
    const stored = await deps.artifacts.readLatestSnapshot(context.folder);
    if (stored) {
      deps.logger.info('💰 Using last persisted cost snapshot as baseline');
      baseline = stored;
    } else {
      deps.logger.warn(`No cost baseline for ${context.folder}; treating all resources as new`);
      baseline = emptySnapshot(context.currency);
    }
  }

  deps.logger.info(`💰 Estimating current cost for ${context.folder}`);
  const next = await deps.cost.breakdown(context.workingDir, join(dir, RAW_INFRACOST_FILE));

  return { baseline, next, delta: diff(baseline, next, context.folder) };
}
