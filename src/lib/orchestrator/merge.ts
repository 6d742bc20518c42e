/**
 * Merge mode
 *
 * plan -> apply (when enabled and the plan succeeded) -> cost artifacts
 * (when enabled) -> Slack alert on failure.
 */

import { describeError } from '../errors/index.js';
import { formatSignedMoney } from '../report/index.js';
import {
  checkTerraformVersion,
  computeCost,
  fail,
  failureReason,
  notify,
  notifyFailure,
  record,
  runPlan,
} from './steps.js';
import type { ModeHandler } from './types.js';

export const runMerge: ModeHandler = async (context, deps, status) => {
  const { toggles } = context;
  const { logger } = deps;

  await checkTerraformVersion(context, deps);

  const planStep = await runPlan(context, deps, status, { checks: false });
  if (!planStep.ok) {
    logger.error(`${planStep.step} failed: ${planStep.reason}; apply will not run`);
    await notifyFailure(context, deps, status, planStep.step, planStep.reason);
    return fail(status, planStep.step, planStep.reason);
  }

  if (toggles.apply) {
    logger.group(`terraform apply (${context.folder})`);
    const apply = record(status, await deps.terraform.apply(context.workingDir));
    logger.endGroup();

    if (apply.outcome !== 'success') {
      const reason = failureReason(apply);
      logger.error(`Terraform apply failed: ${reason}`);
      await notifyFailure(context, deps, status, 'Terraform apply', reason);
      return fail(status, 'Terraform apply', reason);
    }
    logger.info('🚀 Apply complete');
  } else {
    logger.info('Apply disabled; plan only');
  }

  if (toggles.cost) {
    try {
      const { baseline, next, delta } = await computeCost(context, deps);
      await deps.artifacts.writeRun(context.folder, baseline, next, delta);
      status.costDelta = delta;
      logger.info(`💰 Cost delta: ${formatSignedMoney(delta.absolute, delta.currency)} / month`);
    } catch (error) {
      logger.warn(`Cost artifacts not written: ${describeError(error)}`);
    }
  }

  await notify(context, deps, status, `Merge run for ${context.folder} succeeded`, {
    mode: 'merge',
    succeeded: true,
  });
  return status;
};
