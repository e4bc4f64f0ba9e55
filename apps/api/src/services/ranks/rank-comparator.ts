// =====================================================
// Rank Comparator
// =====================================================
// Compares a member's locally recorded rank with a freshly
// fetched external role. Pure and total: an unknown local rank
// is simply a mismatch.

import { ExternalRankDescriptor, Rank } from '@rank-ledger/shared-types';

export type RankComparison =
  | { kind: 'MATCH'; rank: Rank }
  | { kind: 'MISMATCH'; rank: Rank | undefined; external: ExternalRankDescriptor };

/**
 * The rank reference may hold either the external role id or its
 * numeric level, so both are accepted.
 * When both happen to coincide for different intended ranks the
 * id wins; that ambiguity is left to the rank configuration.
 */
export function matchesExternalRank(rank: Rank, external: ExternalRankDescriptor): boolean {
  return rank.externalRankRef === external.externalId || rank.externalRankRef === external.externalLevel;
}

export function compareRank(
  localRank: Rank | undefined,
  external: ExternalRankDescriptor
): RankComparison {
  if (localRank && matchesExternalRank(localRank, external)) {
    return { kind: 'MATCH', rank: localRank };
  }

  return { kind: 'MISMATCH', rank: localRank, external };
}

export function describeExternalRank(external: ExternalRankDescriptor): string {
  const name = external.name ? `"${external.name}" ` : '';
  return `${name}(id ${external.externalId}, level ${external.externalLevel})`;
}
