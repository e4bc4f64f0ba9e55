import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import { createTestContext, TestContext } from '../../../test/helpers/context';
import { createTestMember } from '../../../test/fixtures/member.fixture';
import { EXTERNAL_ROLES } from '../../../test/fixtures/ranks.fixture';
import { ExternalServiceError } from '../../services/external/errors';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError } from '../../utils/errors';

describe('MembersService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    vi.clearAllMocks();
    ctx = createTestContext();
  });

  // ===========================================
  // linkAccount
  // ===========================================

  describe('linkAccount', () => {
    it('should register a new member at the lowest rank', async () => {
      ctx.platform.setRole('NewPlayer', EXTERNAL_ROLES.recruit);

      const result = await ctx.services.members.linkAccount('member-9', 'NewPlayer');

      expect(result.created).toBe(true);
      expect(result.member).toMatchObject({ externalId: 'member-9', externalAccount: 'NewPlayer', rankOrder: 1, points: 0 });
      expect(result.sync?.action).toBe('NO_CHANGE');
      expect(result.syncError).toBeNull();
      expect(ctx.grants.granted).toEqual([{ memberId: 'member-9', rank: 'Recruit' }]);
    });

    it('should adopt the rank reported by the platform after linking', async () => {
      ctx.platform.setRole('NewPlayer', EXTERNAL_ROLES.corporal);

      const result = await ctx.services.members.linkAccount('member-9', 'NewPlayer');

      expect(result.sync?.action).toBe('UPDATED');
      expect(result.member.rankOrder).toBe(3);
      expect(ctx.grants.granted).toEqual([
        { memberId: 'member-9', rank: 'Recruit' },
        { memberId: 'member-9', rank: 'Corporal' },
      ]);
      expect(ctx.grants.revoked).toEqual([{ memberId: 'member-9', rank: 'Recruit' }]);
    });

    it('should not register an account outside the group', async () => {
      await expect(ctx.services.members.linkAccount('member-9', 'Outsider')).rejects.toBeInstanceOf(
        ExternalServiceError
      );
      expect(await ctx.store.getMember('member-9')).toBeNull();
    });

    it('should refuse an account linked to another member', async () => {
      ctx = createTestContext([createTestMember({ externalId: 'member-1', externalAccount: 'PlayerOne' })]);
      ctx.platform.setRole('PlayerOne', EXTERNAL_ROLES.recruit);

      await expect(ctx.services.members.linkAccount('member-2', 'playerone')).rejects.toBeInstanceOf(
        ConflictError
      );
      expect(ctx.platform.fetchCalls).toEqual([]);
    });

    it('should relink an existing member', async () => {
      ctx = createTestContext([createTestMember({ externalId: 'member-1', externalAccount: 'OldName', points: 40 })]);
      ctx.platform.setRole('NewName', EXTERNAL_ROLES.recruit);

      const result = await ctx.services.members.linkAccount('member-1', ' NewName ');

      expect(result.created).toBe(false);
      expect(result.member).toMatchObject({ externalAccount: 'NewName', points: 40 });
      expect(result.sync).toMatchObject({ action: 'NO_CHANGE', grantOk: true });
      // The unchanged rank's grant is re-applied for the new account
      expect(ctx.grants.granted).toEqual([{ memberId: 'member-1', rank: 'Recruit' }]);
    });
  });

  // ===========================================
  // getStatus
  // ===========================================

  describe('getStatus', () => {
    it('should describe progress towards the next point rank', async () => {
      ctx = createTestContext([createTestMember({ rankOrder: 3, points: 80 })]);
      ctx.platform.setRole('PlayerOne', EXTERNAL_ROLES.corporal);

      const status = await ctx.services.members.getStatus('member-1');

      expect(status.rank?.name).toBe('Corporal');
      expect(status.nextPointRank?.name).toBe('Sergeant');
      expect(status.pointsNeeded).toBe(20);
      expect(status.eligibleForPromotion).toBe(false);
      expect(status.progressBar).toBe('[█████░░░░░] 50%');
      expect(status.sync?.action).toBe('NO_CHANGE');
    });

    it('should skip admin-only ranks when picking the next rank', async () => {
      ctx = createTestContext([createTestMember({ rankOrder: 5, points: 120 })]);
      ctx.platform.setRole('PlayerOne', EXTERNAL_ROLES.envoy);

      const status = await ctx.services.members.getStatus('member-1');

      expect(status.isAdminOnlyRank).toBe(true);
      expect(status.nextPointRank?.name).toBe('Lieutenant');
      expect(status.pointsNeeded).toBe(30);
      expect(status.progressBar).toBe('[████░░░░░░] 40%');
    });

    it('should report the rank after an on-demand sync', async () => {
      ctx = createTestContext([createTestMember({ rankOrder: 1, points: 150 })]);
      ctx.platform.setRole('PlayerOne', EXTERNAL_ROLES.sergeant);

      const status = await ctx.services.members.getStatus('member-1');

      expect(status.member.rankOrder).toBe(4);
      expect(status.eligibleForPromotion).toBe(true);
    });

    it('should still answer when the sync fails', async () => {
      ctx = createTestContext([createTestMember({ rankOrder: 2, points: 30 })]);

      const status = await ctx.services.members.getStatus('member-1');

      expect(status.sync).toBeNull();
      expect(status.syncError).toBe('PlayerOne is not a member of the group');
      expect(status.rank?.name).toBe('Private');
    });

    it('should raise NotFoundError for an unregistered member', async () => {
      await expect(ctx.services.members.getStatus('nobody')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  // ===========================================
  // leaderboard
  // ===========================================

  describe('leaderboard', () => {
    beforeEach(() => {
      ctx = createTestContext([
        createTestMember({ externalId: 'a', externalAccount: 'Alpha', rankOrder: 2, points: 25 }),
        createTestMember({ externalId: 'b', externalAccount: 'Bravo', rankOrder: 4, points: 110 }),
        createTestMember({ externalId: 'c', externalAccount: 'Charlie', rankOrder: 1, points: 3 }),
      ]);
    });

    it('should rank members by points with their rank names', async () => {
      const entries = await ctx.services.members.leaderboard(2);

      expect(entries).toEqual([
        { position: 1, externalId: 'b', externalAccount: 'Bravo', points: 110, rankName: 'Sergeant' },
        { position: 2, externalId: 'a', externalAccount: 'Alpha', points: 25, rankName: 'Private' },
      ]);
    });

    it('should clamp the requested size', async () => {
      const spy = vi.spyOn(ctx.store, 'listTopMembers');

      await ctx.services.members.leaderboard(500);
      await ctx.services.members.leaderboard(0);

      expect(spy.mock.calls).toEqual([[50], [1]]);
    });
  });

  // ===========================================
  // adjustPoints
  // ===========================================

  describe('adjustPoints', () => {
    beforeEach(() => {
      ctx = createTestContext([createTestMember({ rankOrder: 1, points: 15 })]);
    });

    it('should apply the delta and report the previous balance', async () => {
      const result = await ctx.services.members.adjustPoints('admin-1', 'member-1', 10);

      expect(result.previousPoints).toBe(15);
      expect(result.member.points).toBe(25);
      expect(ctx.notifier.awards).toEqual([{ memberId: 'member-1', points: 10, submissionId: null }]);
    });

    it('should not promote even when the member becomes eligible', async () => {
      await ctx.services.members.adjustPoints('admin-1', 'member-1', 100);

      expect((await ctx.store.getMember('member-1'))?.rankOrder).toBe(1);
      expect(ctx.grants.granted).toEqual([]);
    });

    it('should refuse to take the balance below zero', async () => {
      await expect(ctx.services.members.adjustPoints('admin-1', 'member-1', -16)).rejects.toMatchObject({
        code: 'MEMBER_004',
      });
      expect((await ctx.store.getMember('member-1'))?.points).toBe(15);
    });

    it('should reject a zero delta', async () => {
      await expect(ctx.services.members.adjustPoints('admin-1', 'member-1', 0)).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('should refuse self-adjustment', async () => {
      await expect(ctx.services.members.adjustPoints('member-1', 'member-1', 5)).rejects.toBeInstanceOf(
        ForbiddenError
      );
    });
  });

  describe('listRanks', () => {
    it('should separate point ranks from admin-only ranks', () => {
      const listing = ctx.services.members.listRanks();

      expect(listing.pointRanks.map((r) => r.name)).toEqual([
        'Recruit',
        'Private',
        'Corporal',
        'Sergeant',
        'Lieutenant',
      ]);
      expect(listing.adminRanks.map((r) => r.name)).toEqual(['Envoy']);
    });
  });
});
