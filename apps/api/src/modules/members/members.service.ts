// =====================================================
// Members Service
// =====================================================
// Account linking, status views, leaderboard and admin point
// corrections. Status views run an on-demand sync first.

import {
  ERROR_CODES,
  LeaderboardEntry,
  LinkAccountResult,
  Member,
  MemberStatus,
  PointsAdjustmentResult,
  RankListing,
  SyncOutcome,
} from '@rank-ledger/shared-types';
import { RankConfigError, RankTable } from '../../lib/rank-table';
import { callWithRetry, RetryOptions } from '../../lib/retry';
import { logger } from '../../utils/logger';
import {
  ConflictError,
  errorMessage,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../../utils/errors';
import { LedgerStore } from '../../store/ledger-store';
import { ExternalRankPlatform, GrantProvider, MemberNotifier } from '../../services/external/types';
import { RankSyncService, SyncOptions } from '../../services/ranks/rank-sync.service';
import {
  currentThreshold,
  isEligible,
  nextPointRank,
  pointsNeeded,
  progressBar,
} from '../../services/ranks/eligibility';

export const LEADERBOARD_DEFAULT_LIMIT = 10;
export const LEADERBOARD_MAX_LIMIT = 50;

export interface MembersDeps {
  store: LedgerStore;
  ranks: RankTable;
  platform: ExternalRankPlatform;
  grants: GrantProvider;
  notifier: MemberNotifier;
  sync: RankSyncService;
  retry?: RetryOptions;
}

export class MembersService {
  constructor(private readonly deps: MembersDeps) {}

  // ===========================================
  // Linking
  // ===========================================

  /**
   * Links an external account after checking it belongs to the group.
   * New members start at the lowest rank; the follow-up sync then
   * adopts whatever rank the platform reports.
   */
  async linkAccount(memberId: string, account: string): Promise<LinkAccountResult> {
    const { store, ranks } = this.deps;
    const trimmed = account.trim();

    const owner = await store.getMemberByAccount(trimmed);
    if (owner && owner.externalId !== memberId) {
      throw new ConflictError(`Account ${trimmed} is already linked to another member`);
    }

    // Raises when the account is unknown or outside the group
    await this.deps.platform.fetchRank(trimmed);

    const existing = await store.getMember(memberId);
    let member: Member;
    let created = false;

    if (existing) {
      member = await store.updateMemberAccount(memberId, trimmed);
    } else {
      const initial = ranks.lowest();
      if (!initial) {
        throw new RankConfigError('No ranks configured');
      }
      member = await store.createMember({
        externalId: memberId,
        externalAccount: trimmed,
        rankOrder: initial.order,
      });
      created = true;
      await this.grantInitialRank(member);
    }

    logger.info(`${created ? 'Registered' : 'Relinked'} ${memberId} as ${trimmed}`);

    const { sync, syncError } = await this.trySync(member, { reassertGrant: !created });
    const latest = (await store.getMember(memberId)) ?? member;

    return { member: latest, created, sync, syncError };
  }

  // ===========================================
  // Status
  // ===========================================

  async getStatus(memberId: string): Promise<MemberStatus> {
    let member = await this.requireMember(memberId);
    const { sync, syncError } = await this.trySync(member);

    if (sync?.action === 'UPDATED') {
      member = await this.requireMember(memberId);
    }

    return this.buildStatus(member, sync, syncError);
  }

  buildStatus(member: Member, sync: SyncOutcome | null, syncError: string | null): MemberStatus {
    const { ranks } = this.deps;
    const rank = ranks.byOrder(member.rankOrder) ?? null;
    const next = nextPointRank(ranks, member.rankOrder);

    return {
      member,
      rank,
      isAdminOnlyRank: rank?.adminOnly ?? false,
      nextPointRank: next,
      pointsNeeded: next ? pointsNeeded(member, next) : null,
      eligibleForPromotion: isEligible(ranks, member) !== null,
      progressBar: next
        ? progressBar(member.points, next.pointsRequired, currentThreshold(ranks, member.rankOrder))
        : null,
      sync,
      syncError,
    };
  }

  // ===========================================
  // Leaderboard & Ranks
  // ===========================================

  async leaderboard(limit: number = LEADERBOARD_DEFAULT_LIMIT): Promise<LeaderboardEntry[]> {
    const capped = Math.min(Math.max(1, Math.floor(limit)), LEADERBOARD_MAX_LIMIT);
    const members = await this.deps.store.listTopMembers(capped);

    return members.map((member, index) => ({
      position: index + 1,
      externalId: member.externalId,
      externalAccount: member.externalAccount,
      points: member.points,
      rankName: this.deps.ranks.byOrder(member.rankOrder)?.name ?? null,
    }));
  }

  listRanks(): RankListing {
    return this.deps.ranks.listing();
  }

  // ===========================================
  // Admin Corrections
  // ===========================================

  /**
   * Manual correction. Never auto-promotes.
   */
  async adjustPoints(adminId: string, memberId: string, delta: number): Promise<PointsAdjustmentResult> {
    if (!Number.isInteger(delta) || delta === 0) {
      throw new ValidationError('Point adjustment must be a non-zero whole number');
    }
    if (adminId === memberId) {
      throw new ForbiddenError('You cannot adjust your own points', ERROR_CODES.CANNOT_TARGET_SELF);
    }

    const current = await this.requireMember(memberId);
    if (current.points + delta < 0) {
      throw new ValidationError(
        `Adjustment would leave ${memberId} with ${current.points + delta} points`,
        ERROR_CODES.POINTS_WOULD_BE_NEGATIVE
      );
    }

    const member = await this.deps.store.addPoints(memberId, delta);
    logger.info(`${adminId} adjusted points of ${memberId} by ${delta} (${current.points} -> ${member.points})`);

    try {
      await this.deps.notifier.notifyPointsAwarded(member, delta, null);
    } catch (error) {
      logger.warn(`Could not notify ${memberId} of point adjustment: ${errorMessage(error)}`);
    }

    return { member, previousPoints: current.points, delta };
  }

  // ===========================================
  // Private Methods
  // ===========================================

  private async requireMember(memberId: string): Promise<Member> {
    const member = await this.deps.store.getMember(memberId);
    if (!member) {
      throw new NotFoundError(`Member ${memberId} not found`, ERROR_CODES.MEMBER_NOT_FOUND);
    }
    return member;
  }

  private async trySync(
    member: Member,
    options: SyncOptions = {}
  ): Promise<{ sync: SyncOutcome | null; syncError: string | null }> {
    try {
      return { sync: await this.deps.sync.sync(member, options), syncError: null };
    } catch (error) {
      const message = errorMessage(error);
      logger.warn(`On-demand sync failed for ${member.externalId}: ${message}`);
      return { sync: null, syncError: message };
    }
  }

  private async grantInitialRank(member: Member): Promise<void> {
    const rank = this.deps.ranks.byOrder(member.rankOrder);
    if (!rank) return;

    try {
      await callWithRetry(() => this.deps.grants.grant(member, rank), {
        ...this.deps.retry,
        label: `grant ${rank.name} to ${member.externalId}`,
      });
    } catch (error) {
      logger.warn(`Could not grant initial rank to ${member.externalId}: ${errorMessage(error)}`);
    }
  }
}
