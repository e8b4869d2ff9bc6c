#!/usr/bin/env node
/**
 * agent-coordinator CLI
 */

import { Command } from 'commander';
import { logger, initErrorTracking } from '../utils/logger.js';
import { createPlanCommand, createConfigCommand } from './commands/index.js';

const VERSION = '1.0.0';

async function main(): Promise<void> {
  initErrorTracking();

  const program = new Command();

  program
    .name('agent-coordinator')
    .description('Dependency-aware task scheduling for a pool of agents')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Suppress output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts<{ verbose?: boolean; quiet?: boolean }>();

      if (opts.verbose) {
        logger.setLevel('debug');
      } else if (opts.quiet) {
        logger.setLevel('error');
      }
    });

  program.addCommand(createPlanCommand());
  program.addCommand(createConfigCommand());

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
