/**
 * Migration reporting utilities
 * Creates human-readable summaries from migration reports
 */

import { formatDuration } from './logging';
import { HelpCenterInspection } from './inspection';
import { MIGRATION_PHASES, MigrationPhase, MigrationReport, PhaseStats } from './types';

const PHASE_LABELS: Record<MigrationPhase, string> = {
  categories: 'Categories',
  category_translations: 'Category translations',
  sections: 'Sections',
  section_translations: 'Section translations',
  articles: 'Articles',
  article_translations: 'Article translations',
};

export function getPhaseLabel(phase: MigrationPhase): string {
  return PHASE_LABELS[phase];
}

/**
 * One summary line for a phase, e.g.
 * `Sections: 3 created, 1 skipped, 0 failed, 2 unresolved`
 */
export function formatPhaseStats(phase: MigrationPhase, stats: PhaseStats): string {
  const parts = [
    `${stats.created} created`,
    `${stats.skipped} skipped`,
    `${stats.failed} failed`,
  ];
  if (stats.unresolved > 0) {
    parts.push(`${stats.unresolved} unresolved`);
  }
  return `${PHASE_LABELS[phase]}: ${parts.join(', ')}`;
}

export function hasFailures(report: MigrationReport): boolean {
  return MIGRATION_PHASES.some(phase => report.phases[phase].failed > 0);
}

/**
 * Calculate total migration duration
 */
function calculateTotalDuration(report: MigrationReport): string {
  const start = new Date(report.startedAt).getTime();
  const end = new Date(report.completedAt).getTime();
  return formatDuration(end - start);
}

/**
 * Generate recommendations based on results
 */
export function generateRecommendations(report: MigrationReport): string[] {
  const recommendations: string[] = [];

  const failed = MIGRATION_PHASES.reduce((sum, phase) => sum + report.phases[phase].failed, 0);
  if (failed > 0) {
    recommendations.push(
      `Review ${failed} failed item(s) in the log and run the copy again; existing content is skipped`
    );
  }

  const unresolved = report.phases.sections.unresolved + report.phases.articles.unresolved;
  if (unresolved > 0) {
    recommendations.push(
      `${unresolved} section(s)/article(s) were left out because their parent was not copied`
    );
  }

  if (report.rejectedLocales.length > 0) {
    recommendations.push(
      `Enable locale(s) ${report.rejectedLocales.join(', ')} in the destination Help Center, then run the copy again`
    );
  }

  if (report.collisions.length > 0) {
    recommendations.push(
      `${report.collisions.length} group(s) of source items share a name and were merged; rename them in the source to keep them apart`
    );
  }

  return recommendations;
}

/**
 * Render the full run summary
 */
export function formatMigrationSummary(report: MigrationReport): string[] {
  const lines = [
    `Copy ${report.source} → ${report.destination} (${calculateTotalDuration(report)})`,
    ...MIGRATION_PHASES.map(phase => `  ${formatPhaseStats(phase, report.phases[phase])}`),
  ];

  const recommendations = generateRecommendations(report);
  if (recommendations.length > 0) {
    lines.push('Next steps:');
    lines.push(...recommendations.map(r => `  - ${r}`));
  }

  return lines;
}

/**
 * Render an inspection as display lines
 */
export function formatInspection(inspection: HelpCenterInspection): string[] {
  const lines = [
    `Help Center ${inspection.host}`,
    `  Categories: ${inspection.counts.categories}`,
    `  Sections: ${inspection.counts.sections}`,
    `  Articles: ${inspection.counts.articles}`,
  ];

  for (const sample of inspection.samples) {
    lines.push(`  First of ${sample.level} '${sample.name}' has ${sample.translations.length} translation(s):`);
    for (const t of sample.translations) {
      lines.push(`    - ${t.locale}: ${t.title.slice(0, 50)} (${t.status})`);
    }
  }

  if (inspection.locales) {
    const defaultLocale = inspection.locales.default_locale
      ? ` (default ${inspection.locales.default_locale})`
      : '';
    lines.push(`  Enabled locales: ${inspection.locales.locales.join(', ')}${defaultLocale}`);
  } else {
    lines.push('  Enabled locales: unavailable');
  }

  return lines;
}
