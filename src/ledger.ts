import type { OutcomeStatus, StatsLedger } from './types.js';

export const createLedger = (): StatsLedger => ({ total: 0, successful: 0, failed: 0, skipped: 0 });

/**
 * Counts one processed item. Only the run coordinator calls this.
 */
export const recordOutcome = (ledger: StatsLedger, status: OutcomeStatus): void => {
  switch (status) {
    case 'success':
      ledger.successful += 1;
      break;
    case 'failure':
      ledger.failed += 1;
      break;
    case 'skipped':
      ledger.skipped += 1;
      break;
  }
};

export const countedOutcomes = (ledger: StatsLedger): number =>
  ledger.successful + ledger.failed + ledger.skipped;

export const isBalanced = (ledger: StatsLedger): boolean => countedOutcomes(ledger) === ledger.total;

export const summarizeStats = (ledger: StatsLedger): string =>
  `Totals => total: ${ledger.total}, successful: ${ledger.successful}, skipped: ${ledger.skipped}, failed: ${ledger.failed}`;
