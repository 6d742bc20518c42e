/**
 * Terraform Module
 *
 * Provides:
 * - fmt / init / validate / plan / apply invocations through the tool runner
 * - Plan summary (add / change / destroy) from `terraform show -json`
 * - Human-readable plan extraction for PR comments
 */

export {
  TerraformCli,
  createTerraformCli,
  countPlanChanges,
  parsePlanSummaryLine,
  extractPlanBody,
  PLAN_FILE,
  PLAN_TEXT_FILE,
  type PlanSummary,
  type PlanOutcome,
  type TerraformCliOptions,
} from './cli.js';
