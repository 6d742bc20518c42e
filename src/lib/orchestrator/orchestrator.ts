/**
 * Orchestrator
 *
 * Dispatches a validated invocation to its mode handler and turns every
 * outcome, thrown or not, into an ExitStatus.
 */

import type { InvocationContext, Mode } from '../config/index.js';
import { ModeSchema } from '../config/index.js';
import { ConfigurationError, describeError, isPilotError } from '../errors/index.js';
import { runMerge } from './merge.js';
import { runPullRequest } from './pr.js';
import { runRollup } from './rollup.js';
import { fail, preflight } from './steps.js';
import type { ExitStatus, ModeHandler, OrchestratorDeps } from './types.js';

const HANDLERS: Record<Mode, ModeHandler> = {
  pr: runPullRequest,
  merge: runMerge,
  rollup: runRollup,
};

export function handlerFor(mode: string): ModeHandler {
  const parsed = ModeSchema.safeParse(mode);
  if (!parsed.success) {
    throw new ConfigurationError(`Unknown mode "${mode}" (expected one of: ${ModeSchema.options.join(', ')})`);
  }
  return HANDLERS[parsed.data];
}

export class Orchestrator {
  private context: InvocationContext;
  private deps: OrchestratorDeps;

  constructor(context: InvocationContext, deps: OrchestratorDeps) {
    this.context = context;
    this.deps = deps;
  }

  async run(): Promise<ExitStatus> {
    const { logger } = this.deps;
    const status: ExitStatus = {
      mode: this.context.mode,
      exitCode: 0,
      steps: [],
      comments: {},
    };

    logger.info(`▶️  ${this.context.mode} run for ${this.context.folder}`);

    try {
      const handler = handlerFor(this.context.mode);
      await preflight(this.context);
      await handler(this.context, this.deps, status);
    } catch (error) {
      const reason = describeError(error);
      if (isPilotError(error, 'configuration')) {
        logger.error(`Configuration error: ${reason}`);
        fail(status, 'Configuration', reason);
      } else {
        logger.error(`Unexpected error: ${reason}`);
        fail(status, 'Unexpected error', reason);
      }
    }

    if (status.exitCode === 0) {
      logger.info(`✅ ${this.context.mode} run succeeded`);
    } else if (status.failure) {
      logger.info(`❌ ${this.context.mode} run failed at ${status.failure.step}`);
    }
    return status;
  }
}

export function createOrchestrator(context: InvocationContext, deps: OrchestratorDeps): Orchestrator {
  return new Orchestrator(context, deps);
}
