/**
 * Pull request mode
 *
 * lint (optional) -> fmt/validate/plan -> cost diff (optional), each
 * result published as its own PR comment. Lint errors and plan failures
 * stop the run; cost problems only stop it when cost is the only check
 * requested. A stopped run removes the plan and cost comments of earlier
 * runs, which no longer describe the branch.
 */

import type { InvocationContext } from '../config/index.js';
import { isZeroDelta } from '../cost/index.js';
import { describeError } from '../errors/index.js';
import type { CommentKind } from '../github/index.js';
import { costComment, lintComment, planComment } from '../report/index.js';
import type { ToolResult } from '../runner/index.js';
import {
  checkTerraformVersion,
  clearComment,
  clearFailure,
  computeCost,
  fail,
  failureReason,
  identity,
  publish,
  publishFailure,
  record,
  runPlan,
} from './steps.js';
import type { ExitStatus, ModeHandler, OrchestratorDeps } from './types.js';

async function stopRun(
  context: InvocationContext,
  deps: OrchestratorDeps,
  status: ExitStatus,
  stale: CommentKind[],
  failure: { step: string; reason: string; result?: ToolResult }
): Promise<ExitStatus> {
  await publishFailure(context, deps, status, failure.step, failure.reason, failure.result);
  for (const kind of stale) {
    await clearComment(context, deps, status, kind);
  }
  return fail(status, failure.step, failure.reason);
}

export const runPullRequest: ModeHandler = async (context, deps, status) => {
  const { toggles } = context;
  const { logger } = deps;

  await checkTerraformVersion(context, deps);

  const staleOnStop: CommentKind[] = [];
  if (toggles.planComment) staleOnStop.push('plan');
  if (toggles.cost) staleOnStop.push('cost');

  // Lint
  if (toggles.lint) {
    logger.info(`🧹 Linting ${context.folder}`);
    const report = await deps.lint.lint(context.workingDir);
    record(status, report.result, `${report.totals.total} finding(s)`);

    if (report.result.outcome !== 'success') {
      logger.warn(`TFLint could not run (${failureReason(report.result)}); continuing without lint`);
    } else {
      await publish(deps, status, identity(context, 'lint'), lintComment(report, context), {
        silentSkipOnZero: toggles.lintDeleteOnClean,
        isZero: report.totals.total === 0,
      });

      if (!report.passed) {
        const reason = `${report.totals.error} lint error(s)`;
        logger.error(`Lint failed: ${reason}`);
        return stopRun(context, deps, status, staleOnStop, { step: 'TFLint', reason });
      }
    }
  }

  // Plan
  const planStep = await runPlan(context, deps, status, { checks: true });
  if (!planStep.ok) {
    logger.error(`${planStep.step} failed: ${planStep.reason}`);
    return stopRun(context, deps, status, staleOnStop, planStep);
  }

  if (toggles.planComment) {
    await publish(deps, status, identity(context, 'plan'), planComment(planStep.plan, context));
  }

  // Cost
  if (toggles.cost) {
    const costOnly = !toggles.lint && !toggles.planComment;
    try {
      const { delta } = await computeCost(context, deps);
      status.costDelta = delta;
      await publish(deps, status, identity(context, 'cost'), costComment(delta, context.costCommentTitle, context), {
        silentSkipOnZero: toggles.silentSkipOnZeroDelta,
        isZero: isZeroDelta(delta),
      });
    } catch (error) {
      const reason = describeError(error);
      if (costOnly) {
        logger.error(`Cost estimation failed: ${reason}`);
        return stopRun(context, deps, status, ['cost'], { step: 'Cost estimation', reason });
      }
      logger.warn(`Cost estimation failed, no cost comment posted: ${reason}`);
    }
  }

  await clearFailure(context, deps, status);
  return status;
};
