/**
 * Slack Notifier
 *
 * Posts run outcomes to a channel with a bot token. Whether a message is
 * sent at all depends on the mode, the outcome and two toggles:
 * merge runs only ever report failures; rollups report failures when
 * error notifications are on and successes when rollup notifications are.
 */

import { z } from 'zod';
import { NotificationError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

export type NotifyResult = 'sent' | 'suppressed';

export interface NotifyTrigger {
  mode: 'pr' | 'merge' | 'rollup';
  succeeded: boolean;
}

export interface NotifierConfig {
  botToken?: string;
  /** Notify when a run fails */
  onError: boolean;
  /** Notify when a rollup succeeds */
  onRollupSuccess: boolean;
  apiUrl?: string;
  requestTimeoutMs?: number;
  logger?: Logger;
}

const PostMessageResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
  ts: z.string().optional(),
});

// ============================================================================
// Policy
// ============================================================================

/**
 * Why a trigger is suppressed, or null when it should be sent
 */
export function suppressionReason(
  trigger: NotifyTrigger,
  toggles: Pick<NotifierConfig, 'onError' | 'onRollupSuccess'>
): string | null {
  if (!trigger.succeeded) {
    return toggles.onError ? null : 'error notifications disabled';
  }
  if (trigger.mode === 'rollup') {
    return toggles.onRollupSuccess ? null : 'rollup success notifications disabled';
  }
  return `${trigger.mode} runs only notify on failure`;
}

// ============================================================================
// Notifier
// ============================================================================

export class SlackNotifier {
  private config: NotifierConfig;

  constructor(config: NotifierConfig) {
    this.config = config;
  }

  /**
   * @throws {NotificationError} when Slack rejects the message
   */
  async notify(channel: string | undefined, message: string, trigger: NotifyTrigger): Promise<NotifyResult> {
    const reason = suppressionReason(trigger, this.config);
    if (reason) {
      this.config.logger?.info(`Slack notification suppressed: ${reason}`);
      return 'suppressed';
    }

    if (!channel || !this.config.botToken) {
      this.config.logger?.warn('Slack notification requested but channel or bot token is not configured');
      return 'suppressed';
    }

    const apiUrl = this.config.apiUrl ?? 'https://slack.com/api';
    let response: Response;
    try {
      response = await fetch(`${apiUrl}/chat.postMessage`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.botToken}`,
          'Content-Type': 'application/json; charset=utf-8',
        },
        body: JSON.stringify({ channel, text: message, mrkdwn: true }),
        signal: AbortSignal.timeout(this.config.requestTimeoutMs ?? 15000),
      });
    } catch (error) {
      throw new NotificationError('Slack request failed', { cause: error });
    }

    if (!response.ok) {
      throw new NotificationError(`Slack API error: ${response.status}`);
    }

    const parsed = PostMessageResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new NotificationError('Unexpected Slack response');
    }
    if (!parsed.data.ok) {
      throw new NotificationError(`Slack rejected message: ${parsed.data.error ?? 'unknown error'}`);
    }

    this.config.logger?.info(`Sent Slack notification to ${channel}`);
    return 'sent';
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createSlackNotifier(config: NotifierConfig): SlackNotifier {
  return new SlackNotifier(config);
}
