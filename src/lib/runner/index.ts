/**
 * Runner Module
 *
 * Provides:
 * - Bounded, timed execution of external tools
 * - Per-tool classification of exit codes
 */

export {
  ToolRunner,
  createToolRunner,
  skippedResult,
  DEFAULT_MAX_OUTPUT_BYTES,
  DEFAULT_TIMEOUT_MS,
  type ExecuteOptions,
  type SpawnFn,
  type SpawnedProcess,
  type ToolOutcome,
  type ToolResult,
  type ToolRunnerOptions,
} from './executor.js';
