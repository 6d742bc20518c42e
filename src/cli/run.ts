#!/usr/bin/env tsx
/**
 * CLI: Local Run
 *
 * Usage:
 *   iac-pilot --mode <pr|merge|rollup> [options]
 *
 * Example:
 *   iac-pilot --mode merge --dir infra/prod
 */

import { runAction } from '../lib/action/index.js';
import { ConfigParser, loadContext, type EnvSource } from '../lib/config/index.js';
import { describeError } from '../lib/errors/index.js';
import { Logger } from '../lib/logging/index.js';

function flag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index === -1 ? undefined : args[index + 1];
}

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(`
iac-pilot - Terraform plan, lint and cost checks

Usage:
  npx tsx src/cli/run.ts --mode <pr|merge|rollup> [options]

Options:
  --mode            Run mode (required unless set in the config file)
  --dir             Terraform working directory (default: .)
  --rollup-dir      Directory of per-folder cost artifacts (rollup mode)
  --config          Config file (default: .iac-pilot.yml when present)
  --example-config  Print an example config file and exit

Any other setting is read from INPUT_<NAME> or <NAME> environment variables.

Example:
  npx tsx src/cli/run.ts --mode pr --dir infra/staging
`);
    process.exit(0);
  }

  if (args.includes('--example-config')) {
    console.log(ConfigParser.generateExample());
    process.exit(0);
  }

  const env: EnvSource = { ...process.env };
  const overrides: Array<[string, string | undefined]> = [
    ['INPUT_MODE', flag(args, '--mode')],
    ['INPUT_WORKING_DIR', flag(args, '--dir')],
    ['INPUT_ROLLUP_INPUT_DIR', flag(args, '--rollup-dir')],
  ];
  for (const [name, value] of overrides) {
    if (value !== undefined) env[name] = value;
  }

  const logger = new Logger({ scope: 'iac-pilot' });
  let exitCode: number;
  try {
    const context = await loadContext(env, { configFile: flag(args, '--config') });
    exitCode = await runAction(context, { logger, outputFile: env.GITHUB_OUTPUT });
  } catch (error) {
    logger.error(describeError(error));
    exitCode = 1;
  }
  process.exit(exitCode);
}

main().catch(error => {
  console.error(describeError(error));
  process.exit(1);
});
