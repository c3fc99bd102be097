#!/usr/bin/env node

import { Command } from 'commander';
import { reportCommand, ReportOptions } from './cli/commands/report';
import { logger } from './utils/logger';

const program = new Command();

program
  .name('timew-report')
  .description('Parse the report Timewarrior passes on stdin and print it')
  .option('-v, --verbose', 'Output debug messages.')
  .option('--format <format>', 'Output format: "terminal" (default) or "json"', 'terminal')
  .option('--time-zone <zone>', 'IANA time zone for displayed times (default: system zone)')
  .version('1.0.0');

// Hook to enable verbose logging before the command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.optsWithGlobals();
  if (opts.verbose) {
    logger.setVerbose(true);
    logger.debug('Verbose mode enabled');
  }
});

program.action((options: ReportOptions) => reportCommand(options));

program.parseAsync().catch((error: unknown) => {
  logger.failure(error);
  process.exit(1);
});
