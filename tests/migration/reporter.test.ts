/**
 * Tests for migration summaries
 */

import { describe, it, expect } from '@jest/globals';
import {
  formatInspection,
  formatMigrationSummary,
  formatPhaseStats,
  generateRecommendations,
  hasFailures,
} from '../../lib/migration/reporter';
import { emptyStats } from '../../lib/migration/phases/context';
import { MigrationReport } from '../../lib/migration/types';

function makeReport(overrides: Partial<MigrationReport> = {}): MigrationReport {
  return {
    runId: 'run-1',
    startedAt: '2024-01-01T00:00:00.000Z',
    completedAt: '2024-01-01T00:00:02.500Z',
    source: 'source.zendesk.com',
    destination: 'dest.zendesk.com',
    phases: {
      categories: { processed: 2, created: 1, skipped: 1, unresolved: 0, failed: 0 },
      category_translations: emptyStats(),
      sections: { processed: 3, created: 1, skipped: 0, unresolved: 2, failed: 0 },
      section_translations: emptyStats(),
      articles: { processed: 1, created: 0, skipped: 0, unresolved: 0, failed: 1 },
      article_translations: emptyStats(),
    },
    correspondence: { categories: {}, sections: {}, articles: {} },
    collisions: [],
    rejectedLocales: [],
    ...overrides,
  };
}

describe('formatPhaseStats', () => {
  it('should omit unresolved when zero', () => {
    expect(formatPhaseStats('categories', { processed: 2, created: 1, skipped: 1, unresolved: 0, failed: 0 })).toBe(
      'Categories: 1 created, 1 skipped, 0 failed'
    );
  });

  it('should append unresolved when present', () => {
    expect(formatPhaseStats('sections', { processed: 3, created: 1, skipped: 0, unresolved: 2, failed: 0 })).toBe(
      'Sections: 1 created, 0 skipped, 0 failed, 2 unresolved'
    );
  });
});

describe('hasFailures', () => {
  it('should detect any failed item', () => {
    expect(hasFailures(makeReport())).toBe(true);
  });

  it('should ignore unresolved items', () => {
    const report = makeReport();
    report.phases.articles = emptyStats();
    expect(hasFailures(report)).toBe(false);
  });
});

describe('generateRecommendations', () => {
  it('should return nothing for a clean run', () => {
    const report = makeReport();
    report.phases.sections = emptyStats();
    report.phases.articles = emptyStats();
    expect(generateRecommendations(report)).toEqual([]);
  });

  it('should name rejected locales and collisions', () => {
    const report = makeReport({
      rejectedLocales: ['fr', 'it'],
      collisions: [{ level: 'categories', key: 'FAQ', sourceIds: [1, 2], destinationId: 9 }],
    });

    expect(generateRecommendations(report)).toEqual([
      'Review 1 failed item(s) in the log and run the copy again; existing content is skipped',
      '2 section(s)/article(s) were left out because their parent was not copied',
      'Enable locale(s) fr, it in the destination Help Center, then run the copy again',
      '1 group(s) of source items share a name and were merged; rename them in the source to keep them apart',
    ]);
  });
});

describe('formatMigrationSummary', () => {
  it('should render a header, one line per phase and next steps', () => {
    expect(formatMigrationSummary(makeReport())).toEqual([
      'Copy source.zendesk.com → dest.zendesk.com (2.5s)',
      '  Categories: 1 created, 1 skipped, 0 failed',
      '  Category translations: 0 created, 0 skipped, 0 failed',
      '  Sections: 1 created, 0 skipped, 0 failed, 2 unresolved',
      '  Section translations: 0 created, 0 skipped, 0 failed',
      '  Articles: 0 created, 0 skipped, 1 failed',
      '  Article translations: 0 created, 0 skipped, 0 failed',
      'Next steps:',
      '  - Review 1 failed item(s) in the log and run the copy again; existing content is skipped',
      '  - 2 section(s)/article(s) were left out because their parent was not copied',
    ]);
  });
});

describe('formatInspection', () => {
  it('should render counts, samples and locales', () => {
    expect(
      formatInspection({
        host: 'help.example.com',
        counts: { categories: 1, sections: 0, articles: 0 },
        locales: { locales: ['en-us', 'de'], default_locale: 'en-us' },
        samples: [
          {
            level: 'categories',
            id: 1,
            name: 'FAQ',
            translations: [{ locale: 'de', title: 'Fragen', status: 'draft' }],
          },
        ],
      })
    ).toEqual([
      'Help Center help.example.com',
      '  Categories: 1',
      '  Sections: 0',
      '  Articles: 0',
      "  First of categories 'FAQ' has 1 translation(s):",
      '    - de: Fragen (draft)',
      '  Enabled locales: en-us, de (default en-us)',
    ]);
  });

  it('should mark locales unavailable', () => {
    const lines = formatInspection({
      host: 'help.example.com',
      counts: { categories: 0, sections: 0, articles: 0 },
      locales: null,
      samples: [],
    });
    expect(lines[lines.length - 1]).toBe('  Enabled locales: unavailable');
  });
});
