/**
 * Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { Logger, escapeCommandData } from '../src/lib/logging/index.js';

function capture(options: { scope?: string; debug?: boolean } = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const logger = new Logger({ ...options, sink: { out: line => out.push(line), err: line => err.push(line) } });
  return { logger, out, err };
}

describe('Logger', () => {
  it('prefixes info lines with the scope', () => {
    const { logger, out } = capture({ scope: 'terraform' });
    logger.info('Plan: 1 to add');
    expect(out).toEqual(['[terraform] Plan: 1 to add']);
  });

  it('writes warnings and errors as workflow commands', () => {
    const { logger, out, err } = capture();
    logger.notice('no PR');
    logger.warn('cost skipped');
    logger.error('plan failed\nexit 1');
    expect(out).toEqual(['::notice::no PR', '::warning::cost skipped']);
    expect(err).toEqual(['::error::plan failed%0Aexit 1']);
  });

  it('only emits debug lines when enabled', () => {
    const quiet = capture({ debug: false });
    quiet.logger.debug('hidden');
    expect(quiet.out).toEqual([]);

    const loud = capture({ debug: true, scope: 'runner' });
    loud.logger.debug('exec: terraform init');
    expect(loud.out).toEqual(['::debug::[runner] exec: terraform init']);
  });

  it('shares the sink with child loggers', () => {
    const { logger, out } = capture({ scope: 'iac-pilot' });
    logger.child('slack').info('sent');
    logger.group('terraform plan');
    logger.endGroup();
    expect(out).toEqual(['[slack] sent', '::group::terraform plan', '::endgroup::']);
  });

  it('drops everything when silent', () => {
    const out: string[] = [];
    const logger = new Logger({ silent: true, sink: { out: line => out.push(line), err: line => out.push(line) } });
    logger.info('a');
    logger.error('b');
    expect(out).toEqual([]);
  });
});

describe('escapeCommandData', () => {
  it('escapes percent signs and newlines', () => {
    expect(escapeCommandData('50%\r\ndone')).toBe('50%25%0D%0Adone');
  });
});
