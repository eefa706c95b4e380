import { z } from 'zod';
import { HelpCenterConfigError } from './errors';

/**
 * Zendesk tenant credential schema
 * Validates the subdomain/email/token triple for one Help Center instance
 */
const TenantConfigSchema = z.object({
  subdomain: z
    .string()
    .trim()
    .min(1, 'subdomain is required')
    .regex(/^[a-z0-9.-]+$/i, 'subdomain may only contain letters, digits, dots and dashes'),
  email: z.string().trim().email('email must be a valid email'),
  apiToken: z.string().trim().min(1, 'API token is required'),
});

export type TenantConfig = z.infer<typeof TenantConfigSchema>;

export type TenantRole = 'source' | 'destination';

const ENV_PREFIX: Record<TenantRole, string> = {
  source: 'SOURCE_ZENDESK',
  destination: 'DEST_ZENDESK',
};

/**
 * Names of the environment variables holding a tenant's credentials
 */
export function getTenantEnvNames(role: TenantRole): Record<keyof TenantConfig, string> {
  const prefix = ENV_PREFIX[role];
  return {
    subdomain: `${prefix}_SUBDOMAIN`,
    email: `${prefix}_EMAIL`,
    apiToken: `${prefix}_API_TOKEN`,
  };
}

/**
 * Validate tenant credentials
 *
 * @throws {HelpCenterConfigError} If any field is missing or invalid
 */
export function parseTenantConfig(role: TenantRole, input: Partial<TenantConfig>): TenantConfig {
  const result = TenantConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    const missing = getMissingTenantConfig(role);
    const envNames = (missing.length > 0 ? missing : Object.values(getTenantEnvNames(role))).join(', ');
    throw new HelpCenterConfigError(
      `Zendesk ${role} configuration validation failed:\n${issues}\n\n` +
      `Provide the values as command-line options or set ${envNames} in .env`
    );
  }

  return result.data;
}

/**
 * Read whatever credentials the environment provides for a tenant
 */
export function readTenantEnv(role: TenantRole): Partial<TenantConfig> {
  const names = getTenantEnvNames(role);
  return {
    subdomain: process.env[names.subdomain] || undefined,
    email: process.env[names.email] || undefined,
    apiToken: process.env[names.apiToken] || undefined,
  };
}

/**
 * Load and validate tenant configuration, command-line overrides first
 *
 * @throws {HelpCenterConfigError} If required values are missing or invalid
 */
export function loadTenantConfig(
  role: TenantRole,
  overrides: Partial<TenantConfig> = {}
): TenantConfig {
  const fromEnv = readTenantEnv(role);
  return parseTenantConfig(role, {
    subdomain: overrides.subdomain ?? fromEnv.subdomain,
    email: overrides.email ?? fromEnv.email,
    apiToken: overrides.apiToken ?? fromEnv.apiToken,
  });
}

/**
 * Get missing tenant environment variables
 *
 * @returns Array of missing environment variable names
 */
export function getMissingTenantConfig(role: TenantRole): string[] {
  const names = getTenantEnvNames(role);
  const missing: string[] = [];

  if (!process.env[names.subdomain]) missing.push(names.subdomain);
  if (!process.env[names.email]) missing.push(names.email);
  if (!process.env[names.apiToken]) missing.push(names.apiToken);

  return missing;
}

/**
 * Build the API base URL for a tenant.
 * A subdomain containing a dot is taken as a full host name.
 */
export function getApiBase(subdomain: string): string {
  const host = subdomain.includes('.') ? subdomain : `${subdomain}.zendesk.com`;
  return `https://${host}/api/v2`;
}
