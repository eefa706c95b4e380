/**
 * `copy`: replicate Help Center content from a source to a destination tenant
 */

import { Command } from 'commander';
import { createHelpCenterGateway, HelpCenterGateway } from '../../lib/zendesk/gateway';
import { HelpCenterConnectionError } from '../../lib/zendesk/errors';
import { runMigration } from '../../lib/migration/engine';
import { parseLocaleMap } from '../../lib/migration/locale-map';
import { formatMigrationSummary, hasFailures } from '../../lib/migration/reporter';
import { collectTenantConfig, describeTenant, parseArticleExtraFields } from '../options';
import { confirm, isInteractive } from '../prompt';
import { createConsoleObserver } from '../console-observer';

interface CopyOptions {
  sourceSubdomain?: string;
  sourceEmail?: string;
  sourceToken?: string;
  destSubdomain?: string;
  destEmail?: string;
  destToken?: string;
  localeMap?: string;
  forwardArticleFields?: string;
  json?: boolean;
  yes?: boolean;
}

/**
 * Check a tenant and fail the whole run if it is unreachable
 *
 * @throws {HelpCenterConnectionError}
 */
export async function ensureConnection(gateway: HelpCenterGateway, role: string): Promise<void> {
  process.stdout.write(`Testing ${role} connection (${gateway.label})... `);
  if (!(await gateway.testConnection())) {
    console.log('✗ Failed');
    throw new HelpCenterConnectionError(
      `Could not connect to ${role} Zendesk at ${gateway.label}. Check credentials and try again.`,
      gateway.label
    );
  }
  console.log('✓ Connected');
}

async function runCopy(options: CopyOptions): Promise<void> {
  const localeMap = parseLocaleMap(options.localeMap ?? process.env.LOCALE_MAP);
  const articleExtraFields = parseArticleExtraFields(
    options.forwardArticleFields ?? process.env.FORWARD_ARTICLE_FIELDS
  );

  const sourceConfig = await collectTenantConfig('source', {
    subdomain: options.sourceSubdomain,
    email: options.sourceEmail,
    apiToken: options.sourceToken,
  });
  const destinationConfig = await collectTenantConfig('destination', {
    subdomain: options.destSubdomain,
    email: options.destEmail,
    apiToken: options.destToken,
  });

  console.log('');
  console.log(describeTenant('source', sourceConfig));
  console.log(describeTenant('destination', destinationConfig));

  const source = createHelpCenterGateway(sourceConfig);
  const destination = createHelpCenterGateway(destinationConfig);

  console.log('\nConnecting to Zendesk instances...');
  await ensureConnection(source, 'source');
  await ensureConnection(destination, 'destination');

  if (!options.yes) {
    if (!isInteractive()) {
      console.error('Refusing to copy without confirmation. Pass --yes to run non-interactively.');
      process.exitCode = 1;
      return;
    }
    console.log(`\nReady to copy from ${source.label} to ${destination.label}.`);
    console.log('Missing categories, sections, articles and translations will be created in the destination.');
    if (!(await confirm('Proceed with copy?'))) {
      console.log('Copy cancelled.');
      return;
    }
  }

  const report = await runMigration(source, destination, {
    localeMap,
    articleExtraFields,
    observer: createConsoleObserver(),
  });

  console.log('');
  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatMigrationSummary(report)) {
      console.log(line);
    }
  }

  if (hasFailures(report)) {
    process.exitCode = 1;
  }
}

export function registerCopyCommand(program: Command): void {
  program
    .command('copy')
    .description('Copy categories, sections, articles and translations between Help Centers')
    .option('--source-subdomain <subdomain>', 'Source Zendesk subdomain')
    .option('--source-email <email>', 'Source Zendesk email')
    .option('--source-token <token>', 'Source Zendesk API token')
    .option('--dest-subdomain <subdomain>', 'Destination Zendesk subdomain')
    .option('--dest-email <email>', 'Destination Zendesk email')
    .option('--dest-token <token>', 'Destination Zendesk API token')
    .option('--locale-map <map>', 'Locale substitutions, e.g. "de:de-ch,fr:fr-ch" or JSON')
    .option('--forward-article-fields <fields>', 'Extra article fields to send on creation (draft,promoted,position)')
    .option('--json', 'Print the full report as JSON', false)
    .option('-y, --yes', 'Skip confirmation prompts', false)
    .action(async (options: CopyOptions) => {
      await runCopy(options);
    });
}
