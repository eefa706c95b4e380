#!/usr/bin/env node
/**
 * Help Center copy tool
 * Usage: helpcenter-copy <copy|cleanup|verify> [options]
 */

import 'dotenv/config';
import { Command } from 'commander';
import { HelpCenterConfigError, HelpCenterConnectionError, describeError } from '../lib/zendesk/errors';
import { logger } from '../lib/migration/logging';
import { registerCopyCommand } from './commands/copy';
import { registerCleanupCommand } from './commands/cleanup';
import { registerVerifyCommand } from './commands/verify';

const program = new Command();

program
  .name('helpcenter-copy')
  .description('Copy Zendesk Help Center content between instances')
  .version('0.1.0');

registerCopyCommand(program);
registerCleanupCommand(program);
registerVerifyCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof HelpCenterConfigError || error instanceof HelpCenterConnectionError) {
    console.error(`\n✗ ${error.message}`);
  } else {
    logger.error('Command failed', { error: describeError(error) });
  }
  process.exitCode = 1;
});
