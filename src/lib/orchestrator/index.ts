/**
 * Orchestrator Module
 *
 * Provides:
 * - Mode dispatch (pr, merge, rollup)
 * - Per-mode step sequencing and exit status
 */

export { Orchestrator, createOrchestrator, handlerFor } from './orchestrator.js';
export { runPullRequest } from './pr.js';
export { runMerge } from './merge.js';
export { runRollup } from './rollup.js';
export { baselineFolder, computeCost, preflight, runPlan, type CostRun, type PlanStep } from './steps.js';
export type {
  CommentOutcome,
  CommentPublisher,
  CostTool,
  ExitStatus,
  LintTool,
  ModeHandler,
  Notifier,
  OrchestratorDeps,
  RunFailure,
  StepRecord,
  TerraformTool,
} from './types.js';
