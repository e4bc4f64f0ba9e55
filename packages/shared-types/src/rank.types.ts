// =====================================================
// Rank Types
// =====================================================

/**
 * One row of the rank table.
 * `order` is dense from 1 and defines "next rank" lookups.
 * `externalRankRef` may hold either the external role id or its numeric level.
 */
export interface Rank {
  order: number;
  name: string;
  pointsRequired: number;
  externalRankRef: number;
  adminOnly: boolean;
}

/**
 * A member's role as reported by the external group platform.
 */
export interface ExternalRankDescriptor {
  externalId: number;
  externalLevel: number;
  name?: string;
}

export interface RankListing {
  pointRanks: Rank[];
  adminRanks: Rank[];
}
