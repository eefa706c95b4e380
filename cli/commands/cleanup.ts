/**
 * `cleanup`: delete every category (and with it every section and
 * article) from a Help Center
 */

import { Command } from 'commander';
import { createHelpCenterGateway } from '../../lib/zendesk/gateway';
import { deleteAllCategories } from '../../lib/migration/deletion';
import { collectTenantConfig, describeTenant } from '../options';
import { ask, isInteractive } from '../prompt';
import { ensureConnection } from './copy';

interface CleanupOptions {
  subdomain?: string;
  email?: string;
  token?: string;
  yes?: boolean;
}

export const CONFIRMATION_WORD = 'DELETE';

async function runCleanup(options: CleanupOptions): Promise<void> {
  console.log('Zendesk Help Center cleanup: deletes ALL categories, sections and articles');

  const config = await collectTenantConfig('destination', {
    subdomain: options.subdomain,
    email: options.email,
    apiToken: options.token,
  });
  console.log(describeTenant('destination', config));
  const gateway = createHelpCenterGateway(config);

  await ensureConnection(gateway, 'target');

  console.log('\nFetching categories...');
  const categories = await gateway.listCategories();

  if (categories.length === 0) {
    console.log('No categories found. Help Center is already empty.');
    return;
  }

  console.log(`Found ${categories.length} categories:`);
  for (const category of categories.slice(0, 10)) {
    console.log(`  • ${category.name}`);
  }
  if (categories.length > 10) {
    console.log(`  ... and ${categories.length - 10} more`);
  }

  if (!options.yes) {
    if (!isInteractive()) {
      console.error('Refusing to delete without confirmation. Pass --yes to run non-interactively.');
      process.exitCode = 1;
      return;
    }
    console.log(`\nThis will PERMANENTLY DELETE all ${categories.length} categories`);
    console.log(`and ALL their sections and articles from ${gateway.label}.`);
    console.log('This action CANNOT be undone!');

    const answer = await ask(`Type '${CONFIRMATION_WORD}' to confirm`, { defaultValue: 'no' });
    if (answer !== CONFIRMATION_WORD) {
      console.log('Cancelled. No categories were deleted.');
      return;
    }
  }

  console.log('\nDeleting all categories...');
  const result = await deleteAllCategories(gateway, {
    onItem: item => {
      if (item.status === 'deleted') {
        console.log(`  ✓ Deleted '${item.name}'`);
      } else {
        console.log(`  ✗ Failed to delete '${item.name}': ${item.error}`);
      }
    },
  });

  console.log('\n✓ Cleanup completed');
  console.log(`  • Deleted: ${result.deletedCount} categories`);
  if (result.failedCount > 0) {
    console.log(`  • Failed: ${result.failedCount} categories`);
    process.exitCode = 1;
  }
}

export function registerCleanupCommand(program: Command): void {
  program
    .command('cleanup')
    .description('Delete ALL categories, sections and articles from a Help Center')
    .option('--subdomain <subdomain>', 'Zendesk subdomain to clean (default: DEST_ZENDESK_SUBDOMAIN)')
    .option('--email <email>', 'Zendesk email')
    .option('--token <token>', 'Zendesk API token')
    .option('-y, --yes', 'Skip confirmation prompts', false)
    .action(async (options: CleanupOptions) => {
      await runCleanup(options);
    });
}
