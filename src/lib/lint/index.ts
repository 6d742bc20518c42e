/**
 * Lint Module
 *
 * Provides:
 * - TFLint invocation with repo or bundled configuration
 * - Compact-format output parsing into grouped, ordered findings
 */

export {
  TflintCli,
  createTflintCli,
  parseTflintOutput,
  groupFindings,
  totalFindings,
  resolveLintConfig,
  DEFAULT_LINT_CONFIG,
  REPO_LINT_CONFIG,
  type LintFinding,
  type LintLevel,
  type LintFileGroup,
  type LintTotals,
  type LintReport,
  type TflintCliOptions,
} from './tflint.js';
