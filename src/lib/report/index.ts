/**
 * Report Module
 *
 * Provides:
 * - PR comment bodies (plan, lint, cost, failure)
 * - Rollup JSON + markdown reports
 * - Slack message text
 */

export {
  planComment,
  lintComment,
  lintStatus,
  costComment,
  failureComment,
  footer,
  runUrl,
  MAX_LINT_ROWS,
  MAX_FAILURE_LINES,
  MAX_COST_RESOURCES,
  MAX_COMMENT_CHARS,
  type CommentContext,
  type FailureDetails,
} from './comments.js';

export {
  ReportGenerator,
  createReportGenerator,
  rollupMarkdown,
  type RollupReportResult,
} from './generator.js';

export { runFailureMessage, rollupSlackMessage } from './slack.js';

export {
  clipHead,
  clipTail,
  escapeHtml,
  formatMoney,
  formatPercent,
  formatSignedMoney,
  plural,
  roundMoney,
  tail,
} from './format.js';
