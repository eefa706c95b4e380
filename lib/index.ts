export { runMigration, HelpCenterMigrator } from './migration/engine';
export { deleteAllCategories } from './migration/deletion';
export type { DeletionObserver, DeletionItemResult } from './migration/deletion';
export { inspectHelpCenter } from './migration/inspection';
export type { HelpCenterInspection } from './migration/inspection';
export { CorrespondenceTable } from './migration/correspondence';
export type { NodeLevel, CorrespondenceSnapshot } from './migration/correspondence';
export { mapLocale, ensureBody, parseLocaleMap, PLACEHOLDER_BODY } from './migration/locale-map';
export { formatMigrationSummary, formatInspection, hasFailures } from './migration/reporter';
export * from './migration/types';

export { createHelpCenterGateway, ZendeskHelpCenter } from './zendesk/gateway';
export type { HelpCenterGateway } from './zendesk/gateway';
export { HelpCenterHttpClient } from './zendesk/http/client';
export { loadTenantConfig, parseTenantConfig } from './zendesk/config';
export type { TenantConfig, TenantRole } from './zendesk/config';
export {
  HelpCenterApiError,
  HelpCenterConfigError,
  HelpCenterConnectionError,
} from './zendesk/errors';
export * from './zendesk/types';
