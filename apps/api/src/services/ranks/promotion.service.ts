// =====================================================
// Promotion Service
// =====================================================
// Moves a member to a target rank across the ledger, the grant
// and the external platform. Steps after the ledger write are
// independent: failures are recorded in the result, logged as a
// desync and never rolled back.

import {
  ERROR_CODES,
  Member,
  PromotionResult,
  PromotionStep,
  Rank,
  SyncOutcome,
} from '@rank-ledger/shared-types';
import { RankTable } from '../../lib/rank-table';
import { callWithRetry, RetryOptions } from '../../lib/retry';
import { logger } from '../../utils/logger';
import {
  errorMessage,
  ForbiddenError,
  InsufficientPointsError,
  NotFoundError,
  ValidationError,
} from '../../utils/errors';
import { LedgerStore } from '../../store/ledger-store';
import { ExternalRankPlatform, GrantProvider, MemberNotifier } from '../external/types';
import { RankSyncService } from './rank-sync.service';
import { updateGrant } from './grant-update';

export interface PromotionDeps {
  store: LedgerStore;
  ranks: RankTable;
  platform: ExternalRankPlatform;
  grants: GrantProvider;
  notifier: MemberNotifier;
  sync: RankSyncService;
  retry?: RetryOptions;
}

export interface PromoteOptions {
  // Defaults to the next rank by order, admin-only ranks included
  targetOrder?: number;
  // Admin performing the promotion; may not promote themself
  actorId?: string;
  // Skip without writes when the target is not above the member's synced rank
  onlyIfHigher?: boolean;
}

export class PromotionService {
  constructor(private readonly deps: PromotionDeps) {}

  async promote(memberId: string, options: PromoteOptions = {}): Promise<PromotionResult> {
    const { store, ranks } = this.deps;

    if (options.actorId !== undefined && options.actorId === memberId) {
      throw new ForbiddenError('You cannot promote yourself', ERROR_CODES.CANNOT_TARGET_SELF);
    }

    let member = await this.requireMember(memberId);

    // ---- Pre-sync ----
    const preSync = await this.preSync(member);
    if (preSync?.action === 'UPDATED') {
      member = await this.requireMember(memberId);
    }

    // ---- Target ----
    if (options.onlyIfHigher && options.targetOrder !== undefined) {
      const skipped = this.skipIfNotHigher(member, options.targetOrder, preSync);
      if (skipped) {
        return skipped;
      }
    }

    const target = this.resolveTarget(member, options.targetOrder);

    if (!target.adminOnly && member.points < target.pointsRequired) {
      throw new InsufficientPointsError(target.name, target.pointsRequired, member.points);
    }

    const fromRank = ranks.byOrder(member.rankOrder);
    const result: PromotionResult = {
      memberId,
      fromRankOrder: member.rankOrder,
      toRank: target,
      preSync,
      skipped: false,
      ledgerOk: false,
      grantOk: false,
      externalOk: false,
      failedSteps: [],
      reason: null,
      remediationHint: null,
    };
    const reasons: string[] = [];

    // ---- Ledger ----
    try {
      await store.setMemberRank(memberId, target.order);
      result.ledgerOk = true;
    } catch (error) {
      logger.error(`Promotion of ${memberId} to ${target.name} failed at the ledger write:`, error);
      result.failedSteps = ['ledger'];
      result.reason = `ledger: ${errorMessage(error)}`;
      return result;
    }

    // ---- Grant ----
    const grant = await updateGrant(
      this.deps.grants,
      member,
      fromRank,
      target,
      'remove-then-add',
      this.deps.retry
    );
    result.grantOk = grant.ok;
    if (!grant.ok) {
      reasons.push(`grant: ${grant.errors.join('; ')}`);
    }

    // ---- External ----
    try {
      await this.pushExternal(member, target);
      result.externalOk = true;
    } catch (error) {
      reasons.push(`external: ${errorMessage(error)}`);
    }

    // ---- Notify ----
    try {
      await this.deps.notifier.notifyPromotion({ ...member, rankOrder: target.order }, target);
    } catch (error) {
      logger.warn(`Could not notify ${memberId} of promotion: ${errorMessage(error)}`);
    }

    const failed: PromotionStep[] = [];
    if (!result.grantOk) failed.push('grant');
    if (!result.externalOk) failed.push('external');
    result.failedSteps = failed;

    if (failed.length > 0) {
      result.reason = reasons.join(' | ');
      result.remediationHint = `Run a rank sync for ${memberId} once the ${failed.join(' and ')} side is corrected`;
      logger.warn(
        `Desync: ${memberId} promoted to ${target.name} in the ledger but ${failed.join(', ')} failed: ${result.reason}`
      );
    } else {
      logger.info(`Promoted ${memberId} to ${target.name}`);
    }

    return result;
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

  private async preSync(member: Member): Promise<SyncOutcome | null> {
    try {
      // The promotion rewrites the grant itself
      return await this.deps.sync.sync(member, { reassertGrant: false });
    } catch (error) {
      logger.warn(`Pre-promotion sync failed for ${member.externalId}: ${errorMessage(error)}`);
      return null;
    }
  }

  private skipIfNotHigher(
    member: Member,
    targetOrder: number,
    preSync: SyncOutcome | null
  ): PromotionResult | null {
    const target = this.deps.ranks.byOrder(targetOrder);
    if (!target || target.order > member.rankOrder) {
      return null;
    }

    const reason = `${member.externalId} is already at or above ${target.name}`;
    logger.info(`Skipping promotion: ${reason}`);
    return {
      memberId: member.externalId,
      fromRankOrder: member.rankOrder,
      toRank: target,
      preSync,
      skipped: true,
      ledgerOk: false,
      grantOk: false,
      externalOk: false,
      failedSteps: [],
      reason,
      remediationHint: null,
    };
  }

  private resolveTarget(member: Member, targetOrder: number | undefined): Rank {
    const { ranks } = this.deps;

    if (targetOrder === undefined) {
      const next = ranks.nextRank(member.rankOrder, { includeAdminOnly: true });
      if (!next) {
        throw new ValidationError(`${member.externalId} is already at the highest rank`, ERROR_CODES.MAX_RANK_REACHED);
      }
      return next;
    }

    const target = ranks.byOrder(targetOrder);
    if (!target) {
      throw new NotFoundError(`Rank ${targetOrder} not found`, ERROR_CODES.RANK_NOT_FOUND);
    }
    if (target.order === member.rankOrder) {
      throw new ValidationError(`${member.externalId} is already at ${target.name}`, ERROR_CODES.ALREADY_AT_RANK);
    }
    return target;
  }

  private async pushExternal(member: Member, target: Rank): Promise<void> {
    const account = member.externalAccount;
    if (!account) {
      throw new ValidationError('No external account linked', ERROR_CODES.ACCOUNT_NOT_LINKED);
    }
    await callWithRetry(() => this.deps.platform.pushRank(account, target.externalRankRef), {
      ...this.deps.retry,
      label: `push ${target.name} for ${account}`,
    });
  }
}
