/**
 * Rollup mode
 *
 * Read every folder's delta artifact, aggregate, write the rollup and
 * optionally announce it.
 */

import { describeError } from '../errors/index.js';
import { createReportGenerator, formatSignedMoney, rollupSlackMessage } from '../report/index.js';
import { aggregate, loadDeltaArtifacts, type RollupReport } from '../rollup/index.js';
import { fail, notify, notifyFailure } from './steps.js';
import type { ModeHandler } from './types.js';

export const runRollup: ModeHandler = async (context, deps, status) => {
  const { logger } = deps;

  logger.info(`📊 Rolling up cost artifacts from ${context.rollupInputDir}`);
  const loaded = await loadDeltaArtifacts(context.rollupInputDir, logger);

  let report: RollupReport;
  try {
    report = aggregate(loaded.deltas, { skipped: loaded.skipped });
  } catch (error) {
    const reason = describeError(error);
    logger.error(`Rollup failed: ${reason}`);
    await notifyFailure(context, deps, status, 'Cost rollup', reason);
    return fail(status, 'Cost rollup', reason);
  }

  for (const skip of report.skipped) {
    logger.warn(`Skipped ${skip.folder}: ${skip.reason}`);
  }

  const generated = await createReportGenerator(deps.artifacts).generateRollup(report);
  status.rollup = report;
  logger.info(
    `📊 ${report.folders.length} folder(s), ${report.changedCount} changed, total ` +
      `${formatSignedMoney(report.grandTotalAbsolute, report.currency)} / month → ${generated.markdownPath}`
  );

  await notify(context, deps, status, rollupSlackMessage(report), { mode: 'rollup', succeeded: true });
  return status;
};
