// =====================================================
// Rank Synchronisation Types
// =====================================================

import type { Rank } from './rank.types';

export type SyncAction = 'NO_CHANGE' | 'UPDATED' | 'SKIPPED';

/**
 * Result of reconciling one member against the external platform.
 * Reported, never stored.
 */
export interface SyncOutcome {
  action: SyncAction;
  oldRankOrder: number;
  newRankOrder: number;
  reason: string;
  // false only when the ledger moved but the grant update failed
  grantOk: boolean;
}

export interface BulkSyncFailure {
  memberId: string;
  message: string;
}

export interface BulkSyncSummary {
  total: number;
  updated: number;
  noChange: number;
  skipped: number;
  errors: number;
  failures: BulkSyncFailure[];
  durationMs: number;
}

export type PromotionStep = 'ledger' | 'grant' | 'external';

export interface PromotionResult {
  memberId: string;
  fromRankOrder: number;
  toRank: Rank;
  preSync: SyncOutcome | null;
  // Set when the pre-sync left the member at or above the target; nothing was written
  skipped: boolean;
  ledgerOk: boolean;
  grantOk: boolean;
  externalOk: boolean;
  failedSteps: PromotionStep[];
  reason: string | null;
  remediationHint: string | null;
}
