/**
 * Error taxonomy
 *
 * Every failure the orchestrator reasons about is one of these kinds.
 * Configuration and tool errors decide the exit status; comment and
 * notification errors are only ever logged.
 */

import { ZodError } from 'zod';

export type PilotErrorKind =
  | 'configuration'
  | 'tool-execution'
  | 'data'
  | 'comment-api'
  | 'notification';

export class PilotError extends Error {
  readonly kind: PilotErrorKind;

  constructor(kind: PilotErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Invalid mode, missing directory, unparseable input. Fatal before any tool runs. */
export class ConfigurationError extends PilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
  }
}

export class ToolExecutionError extends PilotError {
  readonly tool: string;
  readonly exitCode: number | null;
  readonly output: string;

  constructor(tool: string, exitCode: number | null, output: string, message?: string) {
    super(
      'tool-execution',
      message ?? `${tool} failed${exitCode === null ? '' : ` with exit code ${exitCode}`}`
    );
    this.tool = tool;
    this.exitCode = exitCode;
    this.output = output;
  }
}

/** Malformed snapshot or artifact, currency mismatch. */
export class DataError extends PilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('data', message, options);
  }
}

export class CommentApiError extends PilotError {
  readonly status: number;

  constructor(message: string, status: number) {
    super('comment-api', message);
    this.status = status;
  }
}

export class NotificationError extends PilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('notification', message, options);
  }
}

/**
 * Render a zod failure as "path: message; path: message"
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function describeError(error: unknown): string {
  if (error instanceof ZodError) return formatZodIssues(error);
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isPilotError(error: unknown, kind?: PilotErrorKind): error is PilotError {
  return error instanceof PilotError && (kind === undefined || error.kind === kind);
}
