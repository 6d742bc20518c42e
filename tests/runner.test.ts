/**
 * Tool Runner Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ToolRunner, skippedResult, type SpawnFn } from '../src/lib/runner/index.js';
import { FakeChild } from './helpers/fake-process.js';

function runnerWith(child: FakeChild, options: { maxOutputBytes?: number; killGraceMs?: number } = {}) {
  const calls: Array<{ command: string; args: string[]; cwd: string }> = [];
  const spawn: SpawnFn = (command, args, opts) => {
    calls.push({ command, args, cwd: opts.cwd });
    return child;
  };
  return { runner: new ToolRunner({ spawn, ...options }), calls };
}

describe('ToolRunner', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('captures combined output of a successful command', async () => {
    const child = new FakeChild();
    const { runner, calls } = runnerWith(child);

    const pending = runner.execute('terraform', ['init', '-no-color'], { cwd: '/work', tool: 'terraform init' });
    child.finish(0, 'Initializing...\n', 'warning: something\n');
    const result = await pending;

    expect(calls).toEqual([{ command: 'terraform', args: ['init', '-no-color'], cwd: '/work' }]);
    expect(result.tool).toBe('terraform init');
    expect(result.command).toBe('terraform init -no-color');
    expect(result.exitCode).toBe(0);
    expect(result.outcome).toBe('success');
    expect(result.output).toBe('Initializing...\nwarning: something\n');
    expect(result.timedOut).toBe(false);
    expect(result.truncated).toBe(false);
  });

  it('treats a non-zero exit as failure by default', async () => {
    const child = new FakeChild();
    const { runner } = runnerWith(child);

    const pending = runner.execute('tflint', [], { cwd: '.' });
    child.finish(1, '', 'boom');
    const result = await pending;

    expect(result.tool).toBe('tflint');
    expect(result.exitCode).toBe(1);
    expect(result.outcome).toBe('failure');
    expect(result.output).toBe('boom');
  });

  it('accepts extra success exit codes', async () => {
    const child = new FakeChild();
    const { runner } = runnerWith(child);

    const pending = runner.execute('terraform', ['plan'], { cwd: '.', successExitCodes: [0, 2] });
    child.finish(2);
    const result = await pending;

    expect(result.exitCode).toBe(2);
    expect(result.outcome).toBe('success');
  });

  it('truncates output beyond maxOutputBytes with a marker', async () => {
    const child = new FakeChild();
    const { runner } = runnerWith(child, { maxOutputBytes: 10 });

    const pending = runner.execute('terraform', ['show'], { cwd: '.' });
    child.finish(0, 'abcdefghijklmno');
    const result = await pending;

    expect(result.truncated).toBe(true);
    expect(result.output).toBe('abcdefghij\n…[output truncated: 5 bytes omitted]');
  });

  it('cuts truncated output on a character boundary', async () => {
    const child = new FakeChild();
    const { runner } = runnerWith(child, { maxOutputBytes: 10 });

    const pending = runner.execute('terraform', ['show'], { cwd: '.' });
    child.finish(0, 'abcdefghiéxyz');
    const result = await pending;

    expect(result.output).toBe('abcdefghi\n…[output truncated: 5 bytes omitted]');
  });

  it('reports a command that cannot be spawned as failure', async () => {
    const spawn: SpawnFn = () => {
      throw new Error('spawn infracost ENOENT');
    };
    const runner = new ToolRunner({ spawn });

    const result = await runner.execute('infracost', ['breakdown'], { cwd: '.' });

    expect(result.outcome).toBe('failure');
    expect(result.exitCode).toBeNull();
    expect(result.output).toBe('[failed to start infracost: spawn infracost ENOENT]');
  });

  it('reports a spawn error event as failure and ignores the later close', async () => {
    const child = new FakeChild();
    const { runner } = runnerWith(child);

    const pending = runner.execute('tflint', ['--init'], { cwd: '.' });
    child.emit('error', new Error('not found'));
    child.emit('close', 0, null);
    const result = await pending;

    expect(result.outcome).toBe('failure');
    expect(result.exitCode).toBeNull();
    expect(result.output).toBe('[failed to start tflint: not found]');
  });

  it('terminates a command that exceeds its timeout', async () => {
    vi.useFakeTimers();
    const child = new FakeChild();
    const { runner } = runnerWith(child, { killGraceMs: 500 });

    const pending = runner.execute('terraform', ['apply'], { cwd: '.', timeoutMs: 2000 });
    child.stdout.emit('data', Buffer.from('Applying...'));

    vi.advanceTimersByTime(2000);
    expect(child.signals).toEqual(['SIGTERM']);
    vi.advanceTimersByTime(500);
    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);

    child.emit('close', null, 'SIGKILL');
    const result = await pending;

    expect(result.timedOut).toBe(true);
    expect(result.outcome).toBe('failure');
    expect(result.exitCode).toBeNull();
    expect(result.output).toBe('Applying...\n[timed out after 2s]');
  });

  it('does not kill a command that finishes in time', async () => {
    vi.useFakeTimers();
    const child = new FakeChild();
    const { runner } = runnerWith(child);

    const pending = runner.execute('terraform', ['validate'], { cwd: '.', timeoutMs: 2000 });
    child.finish(0);
    const result = await pending;
    vi.advanceTimersByTime(10000);

    expect(result.outcome).toBe('success');
    expect(child.signals).toEqual([]);
  });
});

describe('skippedResult', () => {
  it('builds a skipped result carrying the reason', () => {
    expect(skippedResult('tflint', 'lint disabled')).toEqual({
      tool: 'tflint',
      command: '',
      exitCode: null,
      output: 'lint disabled',
      durationMs: 0,
      outcome: 'skipped',
      timedOut: false,
      truncated: false,
    });
  });
});
