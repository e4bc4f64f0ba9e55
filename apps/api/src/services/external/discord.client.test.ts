import { describe, it, expect, vi } from 'vitest';

vi.mock('../../utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import {
  buildSubmissionMessage,
  DiscordGrantClient,
  DiscordNotifier,
  DiscordRestClient,
  DiscordSubmissionPresenter,
} from './discord.client';
import { createTestAdapter, RouteTable } from '../../../test/helpers/axios-adapter';
import { createTestMember } from '../../../test/fixtures/member.fixture';
import { rankByOrder } from '../../../test/fixtures/ranks.fixture';
import { Submission } from '@rank-ledger/shared-types';

const API = 'https://discord.com/api/v10';

function createRest(routes: RouteTable) {
  const { adapter, requests } = createTestAdapter(routes);
  const rest = new DiscordRestClient({
    botToken: 'test-token',
    guildId: 'guild-1',
    adminChannelId: 'admin-channel',
    adapter,
  });
  return { rest, requests };
}

const SUBMISSION: Submission = {
  id: 7,
  submitterId: 'member-1',
  eventType: 'Patrol',
  participantIds: ['member-1', 'member-2'],
  startTime: new Date('2026-02-01T18:00:00.000Z'),
  endTime: new Date('2026-02-01T19:00:00.000Z'),
  proofReference: 'https://example.com/proof.png',
  status: 'PENDING',
  pointsAwarded: null,
  reviewerId: null,
  createdAt: new Date('2026-02-01T19:05:00.000Z'),
};

describe('DiscordRestClient', () => {
  it('should require a bot token', () => {
    expect(() => new DiscordRestClient({ botToken: '' })).toThrow('DISCORD_BOT_TOKEN is required');
  });

  it('should cache guild roles by lowercased name', async () => {
    const { rest, requests } = createRest({
      [`GET ${API}/guilds/guild-1/roles`]: () => ({ status: 200, data: [{ id: 'r1', name: 'Corporal' }] }),
    });

    expect(await rest.findRoleId('corporal')).toBe('r1');
    expect(await rest.findRoleId('CORPORAL')).toBe('r1');
    expect(requests).toHaveLength(1);
    expect(requests[0].headers.get('Authorization')).toBe('Bot test-token');
  });

  it('should treat removing an absent role as done', async () => {
    const { rest } = createRest({});

    await expect(rest.removeMemberRole('member-1', 'r1')).resolves.toBeUndefined();
  });
});

describe('DiscordGrantClient', () => {
  it('should create a missing role before adding it', async () => {
    const { rest, requests } = createRest({
      [`GET ${API}/guilds/guild-1/roles`]: () => ({ status: 200, data: [] }),
      [`POST ${API}/guilds/guild-1/roles`]: () => ({ status: 200, data: { id: 'r9', name: 'Sergeant' } }),
      [`PUT ${API}/guilds/guild-1/members/member-1/roles/r9`]: () => ({ status: 204 }),
    });

    await new DiscordGrantClient(rest).grant(createTestMember(), rankByOrder(4));

    expect(requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      `GET ${API}/guilds/guild-1/roles`,
      `POST ${API}/guilds/guild-1/roles`,
      `PUT ${API}/guilds/guild-1/members/member-1/roles/r9`,
    ]);
    expect(requests[1].body).toEqual({ name: 'Sergeant', mentionable: false });
  });

  it('should skip revoking a role the guild does not have', async () => {
    const { rest, requests } = createRest({
      [`GET ${API}/guilds/guild-1/roles`]: () => ({ status: 200, data: [] }),
    });

    await new DiscordGrantClient(rest).revoke(createTestMember(), rankByOrder(1));

    expect(requests).toHaveLength(1);
  });

  it('should map a rate-limited call to a retryable error', async () => {
    const { rest } = createRest({
      [`GET ${API}/guilds/guild-1/roles`]: () => ({ status: 200, data: [{ id: 'r1', name: 'Recruit' }] }),
      [`PUT ${API}/guilds/guild-1/members/member-1/roles/r1`]: () => ({
        status: 429,
        headers: { 'retry-after': '1.5' },
      }),
    });

    await expect(new DiscordGrantClient(rest).grant(createTestMember(), rankByOrder(1))).rejects.toMatchObject({
      code: 'EXTERNAL_001',
      retryAfterSeconds: 1.5,
    });
  });
});

describe('DiscordNotifier', () => {
  function dmRoutes(): RouteTable {
    return {
      [`POST ${API}/users/@me/channels`]: () => ({ status: 200, data: { id: 'dm-1' } }),
      [`POST ${API}/channels/dm-1/messages`]: () => ({ status: 200, data: {} }),
    };
  }

  it('should direct-message a promotion', async () => {
    const { rest, requests } = createRest(dmRoutes());

    await new DiscordNotifier(rest).notifyPromotion(createTestMember(), rankByOrder(2));

    expect(requests[0].body).toEqual({ recipient_id: 'member-1' });
    expect(requests[1].body).toEqual({
      content: "🎉 **Congratulations!** You've been promoted to **Private**!",
    });
  });

  it('should describe a deduction', async () => {
    const { rest, requests } = createRest(dmRoutes());

    await new DiscordNotifier(rest).notifyPointsAwarded(createTestMember({ points: 12 }), -3, null);

    expect(requests[1].body).toEqual({ content: "You've been deducted **3 points**. Total: **12**." });
  });

  it('should name the reviewer of a declined submission', async () => {
    const { rest, requests } = createRest(dmRoutes());

    await new DiscordNotifier(rest).notifySubmissionDeclined(SUBMISSION, 'admin-1');

    expect(requests[1].body).toEqual({
      content: '❌ Your submission #7 has been declined by <@admin-1>.',
    });
  });
});

describe('DiscordSubmissionPresenter', () => {
  it('should post the review message to the admin channel', async () => {
    const { rest, requests } = createRest({
      [`POST ${API}/channels/admin-channel/messages`]: () => ({ status: 200, data: {} }),
    });

    await new DiscordSubmissionPresenter(rest).presentSubmission(SUBMISSION);

    expect(requests).toHaveLength(1);
  });

  it('should attach approve and decline buttons', () => {
    const message = buildSubmissionMessage(SUBMISSION);

    expect(message.components?.[0].components.map((b) => b.custom_id)).toEqual([
      'submission:approve:7',
      'submission:decline:7',
    ]);
    expect(message.embeds?.[0].fields?.[1]).toEqual({ name: 'Participants', value: '<@member-1>, <@member-2>' });
  });
});
