import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { ExternalRankDescriptor } from '@rank-ledger/shared-types';
import { createTestContext, TestContext } from '../../../test/helpers/context';
import { rateLimited } from '../../../test/helpers/fakes';
import { createTestMember } from '../../../test/fixtures/member.fixture';
import { EXTERNAL_ROLES } from '../../../test/fixtures/ranks.fixture';
import { ExternalServiceError } from '../external/errors';
import {
  ForbiddenError,
  InsufficientPointsError,
  NotFoundError,
  ValidationError,
} from '../../utils/errors';
import { logger } from '../../utils/logger';

describe('PromotionService', () => {
  let ctx: TestContext;

  function setup(rankOrder: number, points: number, role: ExternalRankDescriptor) {
    ctx = createTestContext([createTestMember({ rankOrder, points })]);
    ctx.platform.setRole('PlayerOne', role);
  }

  async function storedRank(): Promise<number | undefined> {
    return (await ctx.store.getMember('member-1'))?.rankOrder;
  }

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should promote to an admin-only rank with zero points', async () => {
    setup(4, 0, EXTERNAL_ROLES.sergeant);

    const result = await ctx.services.promotions.promote('member-1', { targetOrder: 5 });

    expect(result).toMatchObject({
      ledgerOk: true,
      grantOk: true,
      externalOk: true,
      skipped: false,
      failedSteps: [],
      reason: null,
      remediationHint: null,
      fromRankOrder: 4,
    });
    expect(result.toRank.name).toBe('Envoy');
    expect(await storedRank()).toBe(5);
    expect(ctx.grants.revoked).toEqual([{ memberId: 'member-1', rank: 'Sergeant' }]);
    expect(ctx.grants.granted).toEqual([{ memberId: 'member-1', rank: 'Envoy' }]);
    expect(ctx.platform.pushCalls).toEqual([{ account: 'PlayerOne', rankRef: 50 }]);
    expect(ctx.notifier.promotions).toEqual([{ memberId: 'member-1', rank: 'Envoy' }]);
  });

  it('should report the exact deficit and write nothing', async () => {
    setup(3, 75, EXTERNAL_ROLES.corporal);

    const promise = ctx.services.promotions.promote('member-1', { targetOrder: 4 });

    await expect(promise).rejects.toBeInstanceOf(InsufficientPointsError);
    await expect(promise).rejects.toMatchObject({ deficit: 25, required: 100, points: 75 });
    expect(await storedRank()).toBe(3);
    expect(ctx.grants.granted).toEqual([]);
    expect(ctx.grants.revoked).toEqual([]);
    expect(ctx.platform.pushCalls).toEqual([]);
  });

  it('should record a failed external push and converge on the next sync', async () => {
    setup(3, 120, EXTERNAL_ROLES.corporal);
    ctx.platform.pushFailures.push(new ExternalServiceError('forbidden', 'fake-platform', 403));

    const result = await ctx.services.promotions.promote('member-1', { targetOrder: 4 });

    expect(result).toMatchObject({
      ledgerOk: true,
      grantOk: true,
      externalOk: false,
      failedSteps: ['external'],
      reason: 'external: forbidden',
      remediationHint: 'Run a rank sync for member-1 once the external side is corrected',
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Desync: member-1 promoted to Sergeant in the ledger but external failed: external: forbidden'
    );

    // Someone fixes the role on the platform by hand
    ctx.platform.setRole('PlayerOne', EXTERNAL_ROLES.sergeant);
    const outcome = await ctx.services.rankSync.syncById('member-1');

    expect(outcome.action).toBe('NO_CHANGE');
    expect(ctx.platform.pushCalls).toHaveLength(1);
    expect(await storedRank()).toBe(4);
  });

  it('should report a grant that stays rate limited', async () => {
    setup(3, 120, EXTERNAL_ROLES.corporal);
    ctx.grants.grantFailures.push(rateLimited(), rateLimited(), rateLimited());

    const result = await ctx.services.promotions.promote('member-1', { targetOrder: 4 });

    expect(result.grantOk).toBe(false);
    expect(result.externalOk).toBe(true);
    expect(result.failedSteps).toEqual(['grant']);
    expect(ctx.grants.grantAttempts).toBe(3);
    expect(ctx.sleeps).toEqual([1000, 2000]);
  });

  it('should default to the next rank including admin-only ranks', async () => {
    setup(4, 500, EXTERNAL_ROLES.sergeant);

    const result = await ctx.services.promotions.promote('member-1');

    expect(result.toRank.name).toBe('Envoy');
  });

  it('should promote from the state found by the pre-sync', async () => {
    setup(1, 100, EXTERNAL_ROLES.corporal);

    const result = await ctx.services.promotions.promote('member-1');

    expect(result.preSync?.action).toBe('UPDATED');
    expect(result.fromRankOrder).toBe(3);
    expect(result.toRank.name).toBe('Sergeant');
    expect(await storedRank()).toBe(4);
  });

  it('should go ahead when the pre-sync fails', async () => {
    setup(3, 120, EXTERNAL_ROLES.corporal);
    ctx.platform.fetchFailures.push(rateLimited());

    const result = await ctx.services.promotions.promote('member-1', { targetOrder: 4 });

    expect(result.preSync).toBeNull();
    expect(result.ledgerOk).toBe(true);
  });

  it('should not let a failed notification change the result', async () => {
    setup(3, 120, EXTERNAL_ROLES.corporal);
    ctx.notifier.failing = true;

    const result = await ctx.services.promotions.promote('member-1', { targetOrder: 4 });

    expect(result.failedSteps).toEqual([]);
  });

  it('should refuse to let an admin promote themself', async () => {
    setup(1, 0, EXTERNAL_ROLES.recruit);
    await expect(
      ctx.services.promotions.promote('member-1', { actorId: 'member-1' })
    ).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('should reject promotion past the highest rank', async () => {
    setup(6, 500, EXTERNAL_ROLES.lieutenant);
    await expect(ctx.services.promotions.promote('member-1')).rejects.toMatchObject({
      code: 'RANK_004',
    });
  });

  it('should reject the current rank as a target', async () => {
    setup(3, 500, EXTERNAL_ROLES.corporal);
    const promise = ctx.services.promotions.promote('member-1', { targetOrder: 3 });
    await expect(promise).rejects.toBeInstanceOf(ValidationError);
    await expect(promise).rejects.toMatchObject({ code: 'RANK_003' });
  });

  it('should skip without writes when the pre-sync lands above an automatic target', async () => {
    setup(3, 120, EXTERNAL_ROLES.lieutenant);

    const result = await ctx.services.promotions.promote('member-1', { targetOrder: 4, onlyIfHigher: true });

    expect(result).toMatchObject({
      skipped: true,
      fromRankOrder: 6,
      ledgerOk: false,
      failedSteps: [],
      reason: 'member-1 is already at or above Sergeant',
      remediationHint: null,
    });
    expect(result.preSync?.action).toBe('UPDATED');
    expect(await storedRank()).toBe(6);
    expect(ctx.platform.pushCalls).toEqual([]);
    expect(ctx.notifier.promotions).toEqual([]);
    expect(logger.info).toHaveBeenCalledWith('Skipping promotion: member-1 is already at or above Sergeant');
  });

  it('should still promote an automatic target that remains above the member', async () => {
    setup(3, 120, EXTERNAL_ROLES.corporal);

    const result = await ctx.services.promotions.promote('member-1', { targetOrder: 4, onlyIfHigher: true });

    expect(result).toMatchObject({ skipped: false, ledgerOk: true, grantOk: true, externalOk: true });
    expect(await storedRank()).toBe(4);
    expect(ctx.platform.pushCalls).toEqual([{ account: 'PlayerOne', rankRef: 4004 }]);
  });

  it('should reject an unknown target rank', async () => {
    setup(3, 500, EXTERNAL_ROLES.corporal);
    await expect(
      ctx.services.promotions.promote('member-1', { targetOrder: 42 })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should reject an unknown member', async () => {
    setup(1, 0, EXTERNAL_ROLES.recruit);
    await expect(ctx.services.promotions.promote('nobody')).rejects.toBeInstanceOf(NotFoundError);
  });
});
