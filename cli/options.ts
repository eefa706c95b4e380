/**
 * Shared option parsing for the CLI commands
 */

import { TenantConfig, TenantRole, parseTenantConfig, readTenantEnv } from '../lib/zendesk/config';
import { HelpCenterConfigError } from '../lib/zendesk/errors';
import { ArticleExtraField } from '../lib/migration/types';
import { ask, isInteractive } from './prompt';

const ARTICLE_EXTRA_FIELDS: readonly ArticleExtraField[] = ['draft', 'promoted', 'position'];

function isArticleExtraField(value: string): value is ArticleExtraField {
  return ARTICLE_EXTRA_FIELDS.some(field => field === value);
}

/**
 * Parse `--forward-article-fields draft,promoted`
 *
 * @throws {HelpCenterConfigError} On unknown field names
 */
export function parseArticleExtraFields(raw: string | undefined): ArticleExtraField[] {
  if (!raw || !raw.trim()) {
    return [];
  }

  const fields: ArticleExtraField[] = [];
  for (const token of raw.split(',')) {
    const name = token.trim().toLowerCase();
    if (!name) continue;
    if (!isArticleExtraField(name)) {
      throw new HelpCenterConfigError(
        `Unknown article field "${name}". Allowed: ${ARTICLE_EXTRA_FIELDS.join(', ')}`
      );
    }
    if (!fields.includes(name)) {
      fields.push(name);
    }
  }
  return fields;
}

/**
 * Mask a token for display, keeping the first and last four characters
 */
export function maskToken(token: string): string {
  return token.length > 8 ? `${token.slice(0, 4)}...${token.slice(-4)}` : '***';
}

/**
 * One-line tenant summary with the token masked, e.g.
 * `Source: agent@example.com @ acme (token abcd...5678)`
 */
export function describeTenant(role: TenantRole, config: TenantConfig): string {
  const label = role === 'source' ? 'Source' : 'Destination';
  return `${label}: ${config.email} @ ${config.subdomain} (token ${maskToken(config.apiToken)})`;
}

/**
 * Resolve tenant credentials from options, then the environment, then
 * (on a terminal) interactive prompts
 *
 * @throws {HelpCenterConfigError} When values are still missing or invalid
 */
export async function collectTenantConfig(
  role: TenantRole,
  overrides: Partial<TenantConfig>,
  interactive: boolean = isInteractive()
): Promise<TenantConfig> {
  const fromEnv = readTenantEnv(role);
  let subdomain = overrides.subdomain ?? fromEnv.subdomain;
  let email = overrides.email ?? fromEnv.email;
  let apiToken = overrides.apiToken ?? fromEnv.apiToken;

  if (interactive && (!subdomain || !email || !apiToken)) {
    console.log(`\nConfigure ${role.toUpperCase()} Zendesk instance`);
    if (!subdomain) {
      subdomain = await ask("Zendesk subdomain (e.g. 'mycompany' for mycompany.zendesk.com)");
    }
    if (!email) {
      email = await ask('Email address');
    }
    if (!apiToken) {
      apiToken = await ask('API token', { secret: true });
    }
  }

  return parseTenantConfig(role, { subdomain, email, apiToken });
}
