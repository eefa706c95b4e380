/**
 * Guide permission group helpers
 * Endpoint: https://{subdomain}.zendesk.com/api/v2/guide/permission_groups
 */

import { HelpCenterHttpClient } from '../http/client';
import { PermissionGroup } from '../types';

/**
 * GET /guide/permission_groups.json
 */
export async function listPermissionGroups(client: HelpCenterHttpClient): Promise<PermissionGroup[]> {
  return client.paginate<'permission_groups', PermissionGroup>(
    '/guide/permission_groups.json',
    'permission_groups'
  );
}
