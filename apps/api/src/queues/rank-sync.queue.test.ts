import { describe, it, expect, vi, beforeEach } from 'vitest';

const queueMock = vi.hoisted(() => ({
  getRepeatableJobs: vi.fn(),
  removeRepeatableByKey: vi.fn(),
  add: vi.fn(),
  close: vi.fn(),
}));

vi.mock('bullmq', () => ({
  Queue: class {
    constructor() {
      return queueMock;
    }
  },
  Worker: class {},
}));

vi.mock('./connection', () => ({
  getQueueConnection: vi.fn(() => ({})),
  getWorkerConnection: vi.fn(() => ({})),
}));

vi.mock('../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import {
  createRankSyncProcessor,
  PERIODIC_RANK_SYNC_JOB,
  schedulePeriodicRankSync,
} from './rank-sync.queue';
import { createTestContext } from '../../test/helpers/context';
import { createTestMember } from '../../test/fixtures/member.fixture';
import { EXTERNAL_ROLES } from '../../test/fixtures/ranks.fixture';

describe('Rank Sync Queue', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('createRankSyncProcessor', () => {
    it('should run a bulk sync and return its summary', async () => {
      const ctx = createTestContext([
        createTestMember({ externalId: 'm1', externalAccount: 'One', rankOrder: 1 }),
        createTestMember({ externalId: 'm2', externalAccount: 'Two', rankOrder: 1 }),
      ]);
      ctx.platform.setRole('One', EXTERNAL_ROLES.recruit);
      ctx.platform.setRole('Two', EXTERNAL_ROLES.private);

      const processJob = createRankSyncProcessor(ctx.services.rankSync);
      const result = await processJob({ id: 'job-1', data: { triggeredBy: 'scheduled' } });

      expect(result).toMatchObject({ total: 2, updated: 1, noChange: 1, skipped: 0, errors: 0 });
      expect((await ctx.store.getMember('m2'))?.rankOrder).toBe(2);
    });
  });

  describe('schedulePeriodicRankSync', () => {
    it('should replace the existing repeatable job', async () => {
      queueMock.getRepeatableJobs.mockResolvedValue([
        { name: PERIODIC_RANK_SYNC_JOB, key: 'old-key' },
        { name: 'something-else', key: 'other-key' },
      ]);
      queueMock.add.mockResolvedValue({ id: 'repeat-1' });

      await schedulePeriodicRankSync(60000);

      expect(queueMock.removeRepeatableByKey).toHaveBeenCalledTimes(1);
      expect(queueMock.removeRepeatableByKey).toHaveBeenCalledWith('old-key');
      expect(queueMock.add).toHaveBeenCalledWith(
        PERIODIC_RANK_SYNC_JOB,
        { triggeredBy: 'scheduled' },
        { repeat: { every: 60000 }, jobId: PERIODIC_RANK_SYNC_JOB }
      );
    });
  });
});
