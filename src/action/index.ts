/**
 * GitHub Action Entry Point
 *
 * Reads INPUT_* variables, runs the selected mode, writes outputs and
 * exits with the run's status.
 */

import { runAction } from '../lib/action/index.js';
import { loadContext } from '../lib/config/index.js';
import { describeError } from '../lib/errors/index.js';
import { Logger } from '../lib/logging/index.js';

async function run(): Promise<void> {
  const logger = new Logger({ scope: 'iac-pilot' });

  let exitCode: number;
  try {
    const context = await loadContext(process.env);
    exitCode = await runAction(context, { logger, outputFile: process.env.GITHUB_OUTPUT });
  } catch (error) {
    logger.error(`Configuration error: ${describeError(error)}`);
    exitCode = 1;
  }

  process.exit(exitCode);
}

run().catch(error => {
  console.error('::error::' + describeError(error));
  process.exit(1);
});
