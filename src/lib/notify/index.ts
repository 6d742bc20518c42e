/**
 * Notify Module
 *
 * Provides:
 * - Slack chat.postMessage delivery
 * - Outcome/toggle based suppression
 */

export {
  SlackNotifier,
  createSlackNotifier,
  suppressionReason,
  type NotifierConfig,
  type NotifyResult,
  type NotifyTrigger,
} from './slack.js';
