/**
 * GitHub Action Module
 *
 * Provides:
 * - ActionRunner wiring tools, comments and Slack to the orchestrator
 * - Workflow outputs ($GITHUB_OUTPUT)
 */

export {
  ActionRunner,
  actionOutputs,
  createActionRunner,
  runAction,
  writeActionOutputs,
  type ActionOutputs,
  type ActionRunnerOptions,
} from './runner.js';
