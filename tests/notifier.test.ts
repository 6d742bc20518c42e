/**
 * Slack Notifier Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SlackNotifier, suppressionReason } from '../src/lib/notify/index.js';
import { NotificationError } from '../src/lib/errors/index.js';
import { Logger } from '../src/lib/logging/index.js';

const mockFetch = vi.fn();
const logger = new Logger({ silent: true });

function slackResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status });
}

describe('suppressionReason', () => {
  const on = { onError: true, onRollupSuccess: true };
  const off = { onError: false, onRollupSuccess: false };

  it('sends failures only when error notifications are on', () => {
    expect(suppressionReason({ mode: 'merge', succeeded: false }, on)).toBeNull();
    expect(suppressionReason({ mode: 'merge', succeeded: false }, off)).toBe('error notifications disabled');
  });

  it('sends rollup success only when enabled', () => {
    expect(suppressionReason({ mode: 'rollup', succeeded: true }, on)).toBeNull();
    expect(suppressionReason({ mode: 'rollup', succeeded: true }, off)).toBe('rollup success notifications disabled');
  });

  it('never sends success for pr and merge runs', () => {
    expect(suppressionReason({ mode: 'merge', succeeded: true }, on)).toBe('merge runs only notify on failure');
    expect(suppressionReason({ mode: 'pr', succeeded: true }, on)).toBe('pr runs only notify on failure');
  });
});

describe('SlackNotifier', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function notifier(overrides: Partial<ConstructorParameters<typeof SlackNotifier>[0]> = {}) {
    return new SlackNotifier({ botToken: 'test-secret', onError: true, onRollupSuccess: true, logger, ...overrides });
  }

  it('posts the message to chat.postMessage', async () => {
    mockFetch.mockResolvedValueOnce(slackResponse({ ok: true, ts: '1.2' }));

    const result = await notifier().notify('#infra-alerts', 'apply failed', { mode: 'merge', succeeded: false });

    expect(result).toBe('sent');
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://slack.com/api/chat.postMessage');
    expect(init.headers.Authorization).toBe('Bearer test-secret');
    expect(JSON.parse(init.body)).toEqual({ channel: '#infra-alerts', text: 'apply failed', mrkdwn: true });
  });

  it('does not call Slack for a suppressed trigger', async () => {
    const result = await notifier({ onError: false }).notify('#c', 'x', { mode: 'merge', succeeded: false });

    expect(result).toBe('suppressed');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('does not call Slack without a channel or token', async () => {
    expect(await notifier().notify(undefined, 'x', { mode: 'merge', succeeded: false })).toBe('suppressed');
    expect(await notifier({ botToken: undefined }).notify('#c', 'x', { mode: 'merge', succeeded: false })).toBe(
      'suppressed'
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('raises NotificationError when Slack rejects the message', async () => {
    mockFetch.mockResolvedValueOnce(slackResponse({ ok: false, error: 'channel_not_found' }));

    await expect(notifier().notify('#nope', 'x', { mode: 'rollup', succeeded: true })).rejects.toThrow(
      'Slack rejected message: channel_not_found'
    );
  });

  it('raises NotificationError on HTTP errors', async () => {
    mockFetch.mockResolvedValueOnce(slackResponse({}, 500));

    await expect(notifier().notify('#c', 'x', { mode: 'rollup', succeeded: true })).rejects.toThrow(NotificationError);
  });

  it('raises NotificationError when the request fails', async () => {
    mockFetch.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(notifier().notify('#c', 'x', { mode: 'rollup', succeeded: true })).rejects.toThrow(
      'Slack request failed'
    );
  });
});
