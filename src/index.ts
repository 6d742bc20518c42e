/**
 * iac-pilot - Terraform plan, lint and cost checks for CI
 *
 * Runs terraform, tflint and infracost for a working directory, reports
 * results as pull request comments and Slack messages, and rolls up
 * per-folder cost deltas.
 */

// Ambient
export * from './lib/errors/index.js';
export * from './lib/logging/index.js';
export * from './lib/config/index.js';

// Tools
export * from './lib/runner/index.js';
export * from './lib/terraform/index.js';
export * from './lib/lint/index.js';
export * from './lib/cost/index.js';
export * from './lib/rollup/index.js';

// Reporting
export * from './lib/report/index.js';
export * from './lib/github/index.js';
export * from './lib/notify/index.js';

// Runs
export * from './lib/orchestrator/index.js';
export * from './lib/action/index.js';

// Version
export const VERSION = '0.1.0';
