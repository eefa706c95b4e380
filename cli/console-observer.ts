/**
 * Console rendering for migration progress and log lines
 */

import { isDebugEnabled, redactSensitiveData, LogLevel } from '../lib/zendesk/logging';
import { formatPhaseStats, getPhaseLabel } from '../lib/migration/reporter';
import { MigrationObserver, MigrationPhase } from '../lib/migration/types';

export function createConsoleObserver(): MigrationObserver {
  let processed = 0;
  const showProgress = Boolean(process.stdout.isTTY);

  const clearProgress = () => {
    if (showProgress && processed > 0) {
      process.stdout.write('\r\x1b[K');
    }
  };

  return {
    onPhaseStart(phase: MigrationPhase, count: number) {
      processed = 0;
      console.log(`\n${getPhaseLabel(phase)}: ${count} to process`);
    },

    onItem() {
      processed++;
      if (showProgress) {
        process.stdout.write(`\r  ${processed} item(s) processed`);
      }
    },

    onPhaseComplete(phase, stats) {
      clearProgress();
      console.log(`✓ ${formatPhaseStats(phase, stats)}`);
    },

    log(level: LogLevel, message: string, context?: Record<string, unknown>) {
      clearProgress();
      switch (level) {
        case 'error':
          console.error(`✗ ${message}`);
          if (context) {
            console.error(JSON.stringify(redactSensitiveData(context), null, 2));
          }
          break;
        case 'warn':
          console.warn(`⚠ ${message}`);
          break;
        case 'debug':
          if (isDebugEnabled()) {
            console.debug(`  ${message} ${context ? JSON.stringify(redactSensitiveData(context)) : ''}`);
          }
          break;
        default:
          console.log(message);
      }
    },
  };
}
