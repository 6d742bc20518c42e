/**
 * Action Runner
 *
 * Wires an InvocationContext to real tools (terraform, tflint,
 * infracost), GitHub comments and Slack, runs the orchestrator and
 * exposes the result as workflow outputs.
 */

import { appendFile } from 'fs/promises';
import type { InvocationContext } from '../config/index.js';
import { ArtifactStore, InfracostCli } from '../cost/index.js';
import { describeError } from '../errors/index.js';
import {
  CommentManager,
  GitHubClient,
  GitHubCommentsClient,
  isPullRequestEvent,
  resolvePullRequestNumber,
} from '../github/index.js';
import { TflintCli } from '../lint/index.js';
import { Logger } from '../logging/index.js';
import { SlackNotifier } from '../notify/index.js';
import { Orchestrator, type CommentPublisher, type ExitStatus, type OrchestratorDeps } from '../orchestrator/index.js';
import { ToolRunner, type SpawnFn } from '../runner/index.js';
import { TerraformCli } from '../terraform/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ActionRunnerOptions {
  logger?: Logger;
  /** Process spawner handed to the tool runner */
  spawn?: SpawnFn;
}

export type ActionOutputs = Record<'exit-status' | 'plan-has-changes' | 'cost-delta' | 'comment-action', string>;

// ============================================================================
// Outputs
// ============================================================================

/**
 * Workflow outputs for a finished run. `comment-action` lists
 * `kind:action` pairs, e.g. `lint:deleted,plan:updated`.
 */
export function actionOutputs(status: ExitStatus): ActionOutputs {
  const comments: string[] = [];
  for (const kind of Object.keys(status.comments).sort()) {
    const action = status.comments[kind];
    if (action) comments.push(`${kind}:${action}`);
  }

  return {
    'exit-status': String(status.exitCode),
    'plan-has-changes': status.planHasChanges === undefined ? '' : String(status.planHasChanges),
    'cost-delta': status.costDelta ? status.costDelta.absolute.toFixed(2) : '',
    'comment-action': comments.join(','),
  };
}

/**
 * Append `name=value` lines to the file GitHub names in GITHUB_OUTPUT
 */
export async function writeActionOutputs(outputs: ActionOutputs, outputFile: string): Promise<void> {
  const lines = Object.entries(outputs).map(([name, value]) => `${name}=${value}\n`);
  await appendFile(outputFile, lines.join(''), 'utf-8');
}

// ============================================================================
// Action Runner
// ============================================================================

export class ActionRunner {
  private context: InvocationContext;
  private logger: Logger;
  private spawn?: SpawnFn;

  constructor(context: InvocationContext, options: ActionRunnerOptions = {}) {
    this.context = context;
    this.logger = options.logger ?? new Logger({ scope: 'iac-pilot' });
    this.spawn = options.spawn;
  }

  async run(): Promise<ExitStatus> {
    const deps = await this.buildDeps();
    return new Orchestrator(this.context, deps).run();
  }

  /**
   * Log outputs and append them to GITHUB_OUTPUT when it is set
   */
  async output(status: ExitStatus, outputFile?: string): Promise<void> {
    const outputs = actionOutputs(status);
    for (const [name, value] of Object.entries(outputs)) {
      this.logger.debug(`output ${name}=${value}`);
    }
    if (outputFile) {
      await writeActionOutputs(outputs, outputFile);
    }
  }

  async buildDeps(): Promise<OrchestratorDeps> {
    const { context, logger } = this;
    const timeoutMs = context.toolTimeoutMs;
    const runner = new ToolRunner({
      spawn: this.spawn,
      logger: logger.child('runner'),
      defaultTimeoutMs: timeoutMs,
    });

    return {
      terraform: new TerraformCli(runner, { timeoutMs, logger: logger.child('terraform') }),
      lint: new TflintCli(runner, { timeoutMs }),
      cost: new InfracostCli(runner, { timeoutMs, currency: context.currency }),
      artifacts: new ArtifactStore(context.artifactDir, logger.child('artifacts')),
      comments: context.mode === 'pr' ? await this.commentPublisher() : null,
      notifier: new SlackNotifier({
        botToken: context.slack.botToken,
        onError: context.toggles.slackOnError,
        onRollupSuccess: context.toggles.slackOnRollupSuccess,
        logger: logger.child('slack'),
      }),
      logger,
    };
  }

  /**
   * Comment publisher for the current PR, or null when there is no
   * token or no PR to comment on
   */
  private async commentPublisher(): Promise<CommentPublisher | null> {
    const { github, commitSha } = this.context;
    const logger = this.logger.child('github');

    if (!github.token) {
      logger.notice('No github_token given; PR comments disabled');
      return null;
    }
    if (!github.owner || !github.repo) {
      logger.warn('GITHUB_REPOSITORY is not set; PR comments disabled');
      return null;
    }

    const clientConfig = { token: github.token, owner: github.owner, repo: github.repo, apiUrl: github.apiUrl };
    const prNumber = await resolvePullRequestNumber({
      eventPath: github.eventPath,
      sha: commitSha || undefined,
      client: new GitHubClient(clientConfig),
      logger,
    });

    if (prNumber === null) {
      const event = isPullRequestEvent(github.eventName) ? github.eventName : `${github.eventName || 'unknown'} event`;
      logger.notice(`No pull request found for ${event}; skipping PR comments`);
      return null;
    }

    logger.info(`💬 Commenting on PR #${prNumber}`);
    return new CommentManager(new GitHubCommentsClient({ ...clientConfig, prNumber }), logger);
  }
}

// ============================================================================
// Entry
// ============================================================================

export function createActionRunner(context: InvocationContext, options?: ActionRunnerOptions): ActionRunner {
  return new ActionRunner(context, options);
}

/**
 * Run to completion and report the exit code; never throws
 */
export async function runAction(context: InvocationContext, options: ActionRunnerOptions & { outputFile?: string } = {}): Promise<number> {
  const runner = new ActionRunner(context, options);
  const status = await runner.run();
  try {
    await runner.output(status, options.outputFile);
  } catch (error) {
    (options.logger ?? new Logger()).warn(`Failed writing action outputs: ${describeError(error)}`);
  }
  return status.exitCode;
}
