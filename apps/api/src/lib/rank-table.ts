// =====================================================
// Rank Table
// =====================================================
// Ordered reference data loaded once at startup.
// Orders are unique and dense from 1.

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ERROR_CODES, ExternalRankDescriptor, Rank, RankListing } from '@rank-ledger/shared-types';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

// ===========================================
// Validation
// ===========================================

export const rankSchema = z.object({
  order: z.number().int().min(1),
  name: z.string().trim().min(1).max(100),
  pointsRequired: z.number().int().min(0),
  externalRankRef: z.number().int(),
  adminOnly: z.boolean(),
});

export const rankConfigSchema = z.array(rankSchema).min(1, 'At least one rank is required');

export class RankConfigError extends AppError {
  constructor(message: string) {
    super(message, 500, ERROR_CODES.INVALID_RANK_CONFIG, false);
  }
}

/**
 * Parses raw rank configuration and checks the ordering invariant.
 */
export function parseRankConfig(raw: unknown): Rank[] {
  const result = rankConfigSchema.safeParse(raw);

  if (!result.success) {
    const details = result.error.errors
      .map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
      .join('; ');
    throw new RankConfigError(`Invalid rank configuration: ${details}`);
  }

  const ranks = [...result.data].sort((a, b) => a.order - b.order);

  ranks.forEach((rank, index) => {
    if (rank.order !== index + 1) {
      throw new RankConfigError(
        `Rank orders must be unique and dense from 1; expected ${index + 1} but found ${rank.order} (${rank.name})`
      );
    }
  });

  return ranks;
}

export async function loadRankConfig(filePath: string): Promise<Rank[]> {
  const content = await readFile(filePath, 'utf-8');
  const ranks = parseRankConfig(JSON.parse(content));
  logger.info(`Loaded ${ranks.length} ranks from ${filePath}`);
  return ranks;
}

// ===========================================
// Rank Table
// ===========================================

export interface NextRankOptions {
  includeAdminOnly?: boolean;
}

export class RankTable {
  private readonly ranks: readonly Rank[];
  private readonly byOrderIndex: ReadonlyMap<number, Rank>;

  constructor(ranks: Rank[]) {
    this.ranks = [...ranks].sort((a, b) => a.order - b.order).map((rank) => ({ ...rank }));
    this.byOrderIndex = new Map(this.ranks.map((rank) => [rank.order, rank]));
  }

  all(): Rank[] {
    return [...this.ranks];
  }

  byOrder(order: number): Rank | undefined {
    return this.byOrderIndex.get(order);
  }

  lowest(): Rank | undefined {
    return this.ranks[0];
  }

  pointRanks(): Rank[] {
    return this.ranks.filter((rank) => !rank.adminOnly);
  }

  adminRanks(): Rank[] {
    return this.ranks.filter((rank) => rank.adminOnly);
  }

  listing(): RankListing {
    return { pointRanks: this.pointRanks(), adminRanks: this.adminRanks() };
  }

  /**
   * Two-phase lookup: a rank whose reference equals the external role id,
   * falling back to one whose reference equals the coarse level.
   */
  findByExternalRef(descriptor: ExternalRankDescriptor): Rank | undefined {
    return (
      this.ranks.find((rank) => rank.externalRankRef === descriptor.externalId) ??
      this.ranks.find((rank) => rank.externalRankRef === descriptor.externalLevel)
    );
  }

  nextRank(currentOrder: number, options: NextRankOptions = {}): Rank | undefined {
    return this.ranks.find(
      (rank) => rank.order > currentOrder && (options.includeAdminOnly || !rank.adminOnly)
    );
  }
}
