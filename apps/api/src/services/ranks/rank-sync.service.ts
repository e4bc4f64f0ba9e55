// =====================================================
// Rank Sync Service
// =====================================================
// Reconciles the ledger's recorded rank with the external
// platform. Shared by on-demand triggers, the pre-promotion
// check and the periodic queue job.

import {
  ERROR_CODES,
  BulkSyncFailure,
  BulkSyncSummary,
  Member,
  SyncOutcome,
} from '@rank-ledger/shared-types';
import { RankTable } from '../../lib/rank-table';
import { RetryOptions, Sleep, sleep } from '../../lib/retry';
import { config } from '../../config';
import { logger } from '../../utils/logger';
import { errorMessage, NotFoundError } from '../../utils/errors';
import { LedgerStore } from '../../store/ledger-store';
import { ExternalRankPlatform, GrantProvider } from '../external/types';
import { compareRank, describeExternalRank } from './rank-comparator';
import { updateGrant } from './grant-update';

export interface RankSyncDeps {
  store: LedgerStore;
  ranks: RankTable;
  platform: ExternalRankPlatform;
  grants: GrantProvider;
  retry?: RetryOptions;
  bulkDelayMs?: number;
  sleep?: Sleep;
}

export interface SyncOptions {
  // Re-apply the grant for an unchanged rank. Defaults to true.
  reassertGrant?: boolean;
}

export class RankSyncService {
  private readonly store: LedgerStore;
  private readonly ranks: RankTable;
  private readonly platform: ExternalRankPlatform;
  private readonly grants: GrantProvider;
  private readonly retry: RetryOptions;
  private readonly bulkDelayMs: number;
  private readonly wait: Sleep;

  constructor(deps: RankSyncDeps) {
    this.store = deps.store;
    this.ranks = deps.ranks;
    this.platform = deps.platform;
    this.grants = deps.grants;
    this.retry = deps.retry ?? {};
    this.bulkDelayMs = deps.bulkDelayMs ?? config.rankSync.bulkDelayMs;
    this.wait = deps.sleep ?? sleep;
  }

  /**
   * Reconciles one member. Fetch failures propagate; an external role
   * with no local rank is reported as SKIPPED. An unchanged rank has
   * its grant re-applied, which repairs a grant update that failed on
   * an earlier pass.
   */
  async sync(member: Member, options: SyncOptions = {}): Promise<SyncOutcome> {
    const localRank = this.ranks.byOrder(member.rankOrder);

    if (!member.externalAccount) {
      return {
        action: 'SKIPPED',
        oldRankOrder: member.rankOrder,
        newRankOrder: member.rankOrder,
        reason: 'No external account linked',
        grantOk: true,
      };
    }

    const external = await this.platform.fetchRank(member.externalAccount);
    const comparison = compareRank(localRank, external);

    if (comparison.kind === 'MATCH') {
      let grantOk = true;

      if (options.reassertGrant ?? true) {
        const grant = await updateGrant(
          this.grants,
          member,
          undefined,
          comparison.rank,
          'add-then-remove',
          this.retry
        );
        grantOk = grant.ok;
        if (!grant.ok) {
          logger.warn(
            `Desync: ${member.externalId} holds ${comparison.rank.name} in the ledger but the grant could not be re-applied (${grant.errors.join('; ')}). The next sync pass will retry.`
          );
        }
      }

      return {
        action: 'NO_CHANGE',
        oldRankOrder: member.rankOrder,
        newRankOrder: member.rankOrder,
        reason: `${comparison.rank.name} matches external role ${describeExternalRank(external)}`,
        grantOk,
      };
    }

    const target = this.ranks.findByExternalRef(external);

    if (!target) {
      const reason = `No local rank matches external role ${describeExternalRank(external)}`;
      logger.warn(`Sync skipped for ${member.externalId}: ${reason}`);
      return {
        action: 'SKIPPED',
        oldRankOrder: member.rankOrder,
        newRankOrder: member.rankOrder,
        reason,
        grantOk: true,
      };
    }

    await this.store.setMemberRank(member.externalId, target.order);

    const grant = await updateGrant(
      this.grants,
      member,
      localRank,
      target,
      'add-then-remove',
      this.retry
    );

    if (!grant.ok) {
      logger.warn(
        `Desync: ${member.externalId} moved to ${target.name} in the ledger but the grant update failed (${grant.errors.join('; ')}). The next sync pass will retry.`
      );
    }

    const from = localRank ? localRank.name : `order ${member.rankOrder}`;
    logger.info(`Synced ${member.externalId}: ${from} -> ${target.name}`);

    return {
      action: 'UPDATED',
      oldRankOrder: member.rankOrder,
      newRankOrder: target.order,
      reason: `Rank changed from ${from} to ${target.name} to match external role ${describeExternalRank(external)}`,
      grantOk: grant.ok,
    };
  }

  async syncById(externalId: string): Promise<SyncOutcome> {
    const member = await this.store.getMember(externalId);
    if (!member) {
      throw new NotFoundError(`Member ${externalId} not found`, ERROR_CODES.MEMBER_NOT_FOUND);
    }
    return this.sync(member);
  }

  /**
   * Syncs every member in turn with a fixed delay between calls.
   * A failing member is counted and the pass continues.
   */
  async bulkSync(): Promise<BulkSyncSummary> {
    const startedAt = Date.now();
    const members = await this.store.listMembers();
    const failures: BulkSyncFailure[] = [];
    let updated = 0;
    let noChange = 0;
    let skipped = 0;

    for (const [index, member] of members.entries()) {
      if (index > 0 && this.bulkDelayMs > 0) {
        await this.wait(this.bulkDelayMs);
      }

      try {
        const outcome = await this.sync(member);
        if (outcome.action === 'UPDATED') updated++;
        else if (outcome.action === 'NO_CHANGE') noChange++;
        else skipped++;
      } catch (error) {
        const message = errorMessage(error);
        failures.push({ memberId: member.externalId, message });
        logger.error(`Sync failed for ${member.externalId}: ${message}`);
      }
    }

    const summary: BulkSyncSummary = {
      total: members.length,
      updated,
      noChange,
      skipped,
      errors: failures.length,
      failures,
      durationMs: Date.now() - startedAt,
    };

    logger.info(
      `Bulk sync complete: ${summary.total} members, ${updated} updated, ${noChange} unchanged, ${skipped} skipped, ${summary.errors} errors (${summary.durationMs}ms)`
    );

    return summary;
  }
}
