/**
 * Console Logger
 *
 * Writes plain progress lines to stdout and raises GitHub workflow
 * commands (::notice::, ::warning::, ::error::) so problems show up as
 * annotations on the run summary.
 */

// ============================================================================
// Types
// ============================================================================

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface LoggerOptions {
  /** Prefix shown as "[Scope]" */
  scope?: string;
  /** Emit ::debug:: lines (GitHub sets RUNNER_DEBUG=1 on re-run with debug) */
  debug?: boolean;
  /** Drop all output (tests) */
  silent?: boolean;
  /** Where lines go; defaults to console */
  sink?: LogSink;
}

const CONSOLE_SINK: LogSink = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/**
 * Workflow command data must not contain raw newlines or '%'
 */
export function escapeCommandData(value: string): string {
  return value.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

// ============================================================================
// Logger
// ============================================================================

export class Logger {
  private scope: string;
  private debugEnabled: boolean;
  private silent: boolean;
  private sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.scope = options.scope ?? '';
    this.debugEnabled = options.debug ?? process.env.RUNNER_DEBUG === '1';
    this.silent = options.silent ?? false;
    this.sink = options.sink ?? CONSOLE_SINK;
  }

  /**
   * Logger sharing sink and flags, with a different scope
   */
  child(scope: string): Logger {
    return new Logger({
      scope,
      debug: this.debugEnabled,
      silent: this.silent,
      sink: this.sink,
    });
  }

  info(message: string): void {
    this.write('out', this.prefixed(message));
  }

  notice(message: string): void {
    this.write('out', `::notice::${escapeCommandData(this.prefixed(message))}`);
  }

  warn(message: string): void {
    this.write('out', `::warning::${escapeCommandData(this.prefixed(message))}`);
  }

  error(message: string): void {
    this.write('err', `::error::${escapeCommandData(this.prefixed(message))}`);
  }

  debug(message: string): void {
    if (!this.debugEnabled) return;
    this.write('out', `::debug::${escapeCommandData(this.prefixed(message))}`);
  }

  group(title: string): void {
    this.write('out', `::group::${title}`);
  }

  endGroup(): void {
    this.write('out', '::endgroup::');
  }

  private prefixed(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }

  private write(stream: 'out' | 'err', line: string): void {
    if (this.silent) return;
    this.sink[stream](line);
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
