/**
 * `verify`: print what a Help Center currently holds
 */

import { Command } from 'commander';
import { createHelpCenterGateway } from '../../lib/zendesk/gateway';
import { inspectHelpCenter } from '../../lib/migration/inspection';
import { formatInspection } from '../../lib/migration/reporter';
import { collectTenantConfig } from '../options';
import { ensureConnection } from './copy';

interface VerifyOptions {
  subdomain?: string;
  email?: string;
  token?: string;
  source?: boolean;
}

async function runVerify(options: VerifyOptions): Promise<void> {
  const role = options.source ? 'source' : 'destination';
  const config = await collectTenantConfig(role, {
    subdomain: options.subdomain,
    email: options.email,
    apiToken: options.token,
  });
  const gateway = createHelpCenterGateway(config);

  await ensureConnection(gateway, role);

  const inspection = await inspectHelpCenter(gateway);
  console.log('');
  for (const line of formatInspection(inspection)) {
    console.log(line);
  }
}

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Summarize the content and enabled locales of a Help Center')
    .option('--subdomain <subdomain>', 'Zendesk subdomain')
    .option('--email <email>', 'Zendesk email')
    .option('--token <token>', 'Zendesk API token')
    .option('--source', 'Read credentials from the SOURCE_ZENDESK_* variables', false)
    .action(async (options: VerifyOptions) => {
      await runVerify(options);
    });
}
