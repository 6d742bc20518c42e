/**
 * Orchestrator types
 *
 * Tool facades are narrowed to the methods the orchestrator calls so
 * tests can hand in small fakes.
 */

import type { InvocationContext, Mode } from '../config/index.js';
import type { ArtifactStore, CostDelta, CostSnapshot } from '../cost/index.js';
import type { CommentAction, CommentManager } from '../github/index.js';
import type { LintReport } from '../lint/index.js';
import type { Logger } from '../logging/index.js';
import type { NotifyResult, NotifyTrigger } from '../notify/index.js';
import type { RollupReport } from '../rollup/index.js';
import type { ToolOutcome } from '../runner/index.js';
import type { TerraformCli } from '../terraform/index.js';

export type TerraformTool = Pick<TerraformCli, 'version' | 'init' | 'fmtCheck' | 'validate' | 'plan' | 'apply'>;

export interface LintTool {
  lint(workingDir: string): Promise<LintReport>;
}

export interface CostTool {
  breakdown(path: string, outFile: string): Promise<CostSnapshot>;
}

export interface Notifier {
  notify(channel: string | undefined, message: string, trigger: NotifyTrigger): Promise<NotifyResult>;
}

export type CommentPublisher = Pick<CommentManager, 'publish'>;

export interface OrchestratorDeps {
  terraform: TerraformTool;
  lint: LintTool;
  cost: CostTool;
  artifacts: ArtifactStore;
  /** null when there is no pull request to comment on */
  comments: CommentPublisher | null;
  notifier: Notifier;
  logger: Logger;
}

export interface StepRecord {
  name: string;
  outcome: ToolOutcome;
  durationMs: number;
  detail?: string;
}

export interface RunFailure {
  step: string;
  reason: string;
}

export type CommentOutcome = CommentAction | 'error';

export interface ExitStatus {
  mode: Mode;
  /** 0 when every mandatory step of the mode succeeded */
  exitCode: 0 | 1;
  steps: StepRecord[];
  comments: Partial<Record<string, CommentOutcome>>;
  notification?: NotifyResult | 'error';
  failure?: RunFailure;
  planHasChanges?: boolean;
  costDelta?: CostDelta;
  rollup?: RollupReport;
}

export type ModeHandler = (context: InvocationContext, deps: OrchestratorDeps, status: ExitStatus) => Promise<ExitStatus>;
