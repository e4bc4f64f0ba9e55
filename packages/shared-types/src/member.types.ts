// =====================================================
// Member Types
// =====================================================

import type { Rank } from './rank.types';
import type { SyncOutcome } from './sync.types';

export interface Member {
  externalId: string;
  externalAccount: string | null;
  rankOrder: number;
  points: number;
  createdAt: Date;
}

export interface MemberStatus {
  member: Member;
  rank: Rank | null;
  isAdminOnlyRank: boolean;
  nextPointRank: Rank | null;
  pointsNeeded: number | null;
  eligibleForPromotion: boolean;
  progressBar: string | null;
  sync: SyncOutcome | null;
  syncError: string | null;
}

export interface LeaderboardEntry {
  position: number;
  externalId: string;
  externalAccount: string | null;
  points: number;
  rankName: string | null;
}

export interface PointsAdjustmentResult {
  member: Member;
  previousPoints: number;
  delta: number;
}

export interface LinkAccountResult {
  member: Member;
  created: boolean;
  sync: SyncOutcome | null;
  syncError: string | null;
}
