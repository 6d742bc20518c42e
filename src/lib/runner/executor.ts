/**
 * Tool Runner
 *
 * Runs an external executable, captures combined stdout/stderr up to a
 * fixed size and enforces a timeout. Exit codes are interpreted per call:
 * `terraform plan -detailed-exitcode` exits 2 when changes are present,
 * which is still a success.
 */

import { spawn } from 'child_process';
import type { Readable } from 'stream';
import type { Logger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

export type ToolOutcome = 'success' | 'failure' | 'skipped';

export interface ToolResult {
  /** Logical tool name ("terraform plan", "tflint") */
  tool: string;
  /** Command line as executed */
  command: string;
  /** null when the process never started or was killed by a signal */
  exitCode: number | null;
  /** Combined output, bounded by maxOutputBytes */
  output: string;
  durationMs: number;
  outcome: ToolOutcome;
  timedOut: boolean;
  truncated: boolean;
}

export interface ExecuteOptions {
  cwd: string;
  /** Defaults to the command itself */
  tool?: string;
  timeoutMs?: number;
  maxOutputBytes?: number;
  /** Exit codes that count as success (default [0]) */
  successExitCodes?: number[];
  env?: NodeJS.ProcessEnv;
}

/** The part of a child process the runner relies on */
export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (
  command: string,
  args: string[],
  options: { cwd: string; env: NodeJS.ProcessEnv }
) => SpawnedProcess;

export interface ToolRunnerOptions {
  spawn?: SpawnFn;
  logger?: Logger;
  defaultTimeoutMs?: number;
  maxOutputBytes?: number;
  /** Grace period between SIGTERM and SIGKILL on timeout */
  killGraceMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_MAX_OUTPUT_BYTES = 256 * 1024;

const defaultSpawn: SpawnFn = (command, args, options) =>
  spawn(command, args, { cwd: options.cwd, env: options.env, stdio: ['ignore', 'pipe', 'pipe'] });

// ============================================================================
// Output buffer
// ============================================================================

class BoundedOutput {
  private chunks: Buffer[] = [];
  private kept = 0;
  private dropped = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.kept;
    if (room <= 0) {
      this.dropped += chunk.length;
      return;
    }
    if (chunk.length > room) {
      this.chunks.push(chunk.subarray(0, room));
      this.kept += room;
      this.dropped += chunk.length - room;
      return;
    }
    this.chunks.push(chunk);
    this.kept += chunk.length;
  }

  get truncated(): boolean {
    return this.dropped > 0;
  }

  toString(): string {
    const buffer = Buffer.concat(this.chunks);
    if (!this.truncated) return buffer.toString('utf-8');

    const end = completeLength(buffer);
    const omitted = this.dropped + buffer.length - end;
    return `${buffer.subarray(0, end).toString('utf-8')}\n…[output truncated: ${omitted} bytes omitted]`;
  }
}

/**
 * Length of `buffer` without a trailing partial UTF-8 sequence
 */
function completeLength(buffer: Buffer): number {
  let start = buffer.length - 1;
  while (start > 0 && buffer.length - start < 4 && (buffer[start] & 0xc0) === 0x80) start--;
  if (start < 0) return 0;

  const lead = buffer[start];
  const size = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;
  return start + size > buffer.length ? start : buffer.length;
}

// ============================================================================
// Tool Runner
// ============================================================================

export class ToolRunner {
  private spawnFn: SpawnFn;
  private logger?: Logger;
  private defaultTimeoutMs: number;
  private maxOutputBytes: number;
  private killGraceMs: number;

  constructor(options: ToolRunnerOptions = {}) {
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.logger = options.logger;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.killGraceMs = options.killGraceMs ?? 5000;
  }

  /**
   * Run a command to completion. Never rejects: spawn errors and timeouts
   * come back as a `failure` outcome.
   */
  execute(command: string, args: string[], options: ExecuteOptions): Promise<ToolResult> {
    const tool = options.tool ?? command;
    const commandLine = [command, ...args].join(' ');
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const successCodes = options.successExitCodes ?? [0];
    const output = new BoundedOutput(options.maxOutputBytes ?? this.maxOutputBytes);
    const startedAt = Date.now();

    this.logger?.debug(`exec: ${commandLine} (cwd=${options.cwd})`);

    return new Promise(resolve => {
      let settled = false;
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;

      const finish = (exitCode: number | null, spawnError?: Error): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);

        let text = output.toString();
        if (spawnError) {
          text = `${text}${text ? '\n' : ''}[failed to start ${command}: ${spawnError.message}]`;
        }
        if (timedOut) {
          text = `${text}${text ? '\n' : ''}[timed out after ${Math.round(timeoutMs / 1000)}s]`;
        }

        const outcome: ToolOutcome =
          !spawnError && !timedOut && exitCode !== null && successCodes.includes(exitCode)
            ? 'success'
            : 'failure';

        const durationMs = Date.now() - startedAt;
        this.logger?.debug(`${tool} finished: exit=${exitCode} outcome=${outcome} (${durationMs}ms)`);

        resolve({
          tool,
          command: commandLine,
          exitCode,
          output: text,
          durationMs,
          outcome,
          timedOut,
          truncated: output.truncated,
        });
      };

      let child: SpawnedProcess;
      try {
        child = this.spawnFn(command, args, {
          cwd: options.cwd,
          env: options.env ?? process.env,
        });
      } catch (error) {
        finish(null, error instanceof Error ? error : new Error(String(error)));
        return;
      }

      timer = setTimeout(() => {
        timedOut = true;
        this.logger?.warn(`${tool} exceeded ${Math.round(timeoutMs / 1000)}s, terminating`);
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), this.killGraceMs);
      }, timeoutMs);

      child.stdout?.on('data', (chunk: Buffer) => output.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => output.push(chunk));
      child.on('error', error => finish(null, error));
      child.on('close', code => finish(code));
    });
  }
}

/**
 * Result for a step that was configured off
 */
export function skippedResult(tool: string, reason: string): ToolResult {
  return {
    tool,
    command: '',
    exitCode: null,
    output: reason,
    durationMs: 0,
    outcome: 'skipped',
    timedOut: false,
    truncated: false,
  };
}

// ============================================================================
// Factory
// ============================================================================

export function createToolRunner(options?: ToolRunnerOptions): ToolRunner {
  return new ToolRunner(options);
}
