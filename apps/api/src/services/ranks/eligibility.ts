// =====================================================
// Eligibility Evaluator
// =====================================================
// Point-based promotion checks. Admin-only ranks are never
// reachable by points.

import { Member, Rank } from '@rank-ledger/shared-types';
import { RankTable } from '../../lib/rank-table';

export function nextPointRank(ranks: RankTable, currentOrder: number): Rank | null {
  return ranks.nextRank(currentOrder, { includeAdminOnly: false }) ?? null;
}

/**
 * Returns the next point-based rank when the member already has
 * enough points for it, otherwise null.
 */
export function isEligible(ranks: RankTable, member: Pick<Member, 'rankOrder' | 'points'>): Rank | null {
  const next = nextPointRank(ranks, member.rankOrder);

  if (next && member.points >= next.pointsRequired) {
    return next;
  }

  return null;
}

export function pointsNeeded(member: Pick<Member, 'points'>, rank: Rank): number {
  return Math.max(0, rank.pointsRequired - member.points);
}

/**
 * Ten-cell progress bar from the current rank's threshold to the next.
 */
export function progressBar(current: number, target: number, base: number = 0): string {
  const span = target - base;
  const ratio = span <= 0 ? 1 : (current - base) / span;
  const progress = Math.min(1, Math.max(0, ratio));
  const filled = Math.floor(progress * 10);
  return `[${'█'.repeat(filled)}${'░'.repeat(10 - filled)}] ${Math.floor(progress * 100)}%`;
}

/**
 * Points threshold of the highest point-based rank at or below
 * `currentOrder`. Admin-only ranks carry no threshold of their own.
 */
export function currentThreshold(ranks: RankTable, currentOrder: number): number {
  return ranks
    .pointRanks()
    .filter((rank) => rank.order <= currentOrder)
    .reduce((threshold, rank) => Math.max(threshold, rank.pointsRequired), 0);
}
