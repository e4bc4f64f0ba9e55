// =====================================================
// Discord REST Client
// =====================================================
// Guild role grants, direct-message notifications and the
// submission review post, all over the bot's REST API.

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { Member, Rank, Submission } from '@rank-ledger/shared-types';
import { config } from '../../config';
import { logger } from '../../utils/logger';
import { ExternalServiceError } from './errors';
import { isNotFoundResponse, toExternalError } from './http-errors';
import { GrantProvider, MemberNotifier, SubmissionPresenter } from './types';

// ===========================================
// Discord Payload Types
// ===========================================

interface DiscordRole {
  id: string;
  name: string;
}

interface DiscordChannel {
  id: string;
}

interface DiscordButton {
  type: 2;
  style: 3 | 4;
  label: string;
  custom_id: string;
}

interface DiscordMessagePayload {
  content?: string;
  embeds?: Array<{
    title: string;
    description?: string;
    color?: number;
    fields?: Array<{ name: string; value: string; inline?: boolean }>;
    timestamp?: string;
  }>;
  components?: Array<{ type: 1; components: DiscordButton[] }>;
}

export interface DiscordClientOptions {
  botToken?: string;
  guildId?: string;
  adminChannelId?: string;
  adapter?: AxiosAdapter;
}

const PROVIDER = 'discord';

export const SUBMISSION_APPROVE_PREFIX = 'submission:approve:';
export const SUBMISSION_DECLINE_PREFIX = 'submission:decline:';

// ===========================================
// Discord REST Client
// ===========================================

export class DiscordRestClient {
  private readonly client: AxiosInstance;
  readonly guildId: string;
  readonly adminChannelId: string;

  // role name (lowercased) -> role id
  private readonly roleCache = new Map<string, string>();

  constructor(options: DiscordClientOptions = {}) {
    const token = options.botToken ?? config.discord.botToken;
    if (!token) {
      throw new Error('DISCORD_BOT_TOKEN is required for the Discord client');
    }

    this.guildId = options.guildId ?? config.discord.guildId;
    this.adminChannelId = options.adminChannelId ?? config.discord.adminChannelId;

    this.client = axios.create({
      baseURL: config.discord.apiBaseUrl,
      timeout: 15000,
      headers: {
        Authorization: `Bot ${token}`,
        'Content-Type': 'application/json',
      },
      adapter: options.adapter,
    });
  }

  // ---- Roles ----

  async findRoleId(name: string): Promise<string | null> {
    const key = name.toLowerCase();
    const cached = this.roleCache.get(key);
    if (cached) return cached;

    let roles: DiscordRole[];
    try {
      const response = await this.client.get<DiscordRole[]>(`/guilds/${this.guildId}/roles`);
      roles = response.data;
    } catch (error) {
      throw toExternalError(error, PROVIDER, 'list guild roles');
    }

    for (const role of roles) {
      this.roleCache.set(role.name.toLowerCase(), role.id);
    }
    return this.roleCache.get(key) ?? null;
  }

  async ensureRole(name: string): Promise<string> {
    const existing = await this.findRoleId(name);
    if (existing) return existing;

    try {
      const response = await this.client.post<DiscordRole>(`/guilds/${this.guildId}/roles`, {
        name,
        mentionable: false,
      });
      this.roleCache.set(name.toLowerCase(), response.data.id);
      logger.info(`[Discord] Created guild role "${name}"`);
      return response.data.id;
    } catch (error) {
      throw toExternalError(error, PROVIDER, `create role ${name}`);
    }
  }

  async addMemberRole(userId: string, roleId: string): Promise<void> {
    try {
      await this.client.put(`/guilds/${this.guildId}/members/${userId}/roles/${roleId}`);
    } catch (error) {
      throw toExternalError(error, PROVIDER, `add role ${roleId} to ${userId}`);
    }
  }

  async removeMemberRole(userId: string, roleId: string): Promise<void> {
    try {
      await this.client.delete(`/guilds/${this.guildId}/members/${userId}/roles/${roleId}`);
    } catch (error) {
      // Already gone
      if (isNotFoundResponse(error)) return;
      throw toExternalError(error, PROVIDER, `remove role ${roleId} from ${userId}`);
    }
  }

  // ---- Messages ----

  async sendDirectMessage(userId: string, payload: DiscordMessagePayload): Promise<void> {
    try {
      const channel = await this.client.post<DiscordChannel>('/users/@me/channels', {
        recipient_id: userId,
      });
      await this.client.post(`/channels/${channel.data.id}/messages`, payload);
    } catch (error) {
      throw toExternalError(error, PROVIDER, `direct message ${userId}`);
    }
  }

  async sendChannelMessage(channelId: string, payload: DiscordMessagePayload): Promise<void> {
    if (!channelId) {
      throw new ExternalServiceError('No channel configured for message', PROVIDER);
    }
    try {
      await this.client.post(`/channels/${channelId}/messages`, payload);
    } catch (error) {
      throw toExternalError(error, PROVIDER, `post to channel ${channelId}`);
    }
  }
}

// ===========================================
// Grant Provider
// ===========================================

/**
 * One guild role per rank, matched by rank name.
 */
export class DiscordGrantClient implements GrantProvider {
  constructor(private readonly rest: DiscordRestClient) {}

  async grant(member: Member, rank: Rank): Promise<void> {
    const roleId = await this.rest.ensureRole(rank.name);
    await this.rest.addMemberRole(member.externalId, roleId);
  }

  async revoke(member: Member, rank: Rank): Promise<void> {
    const roleId = await this.rest.findRoleId(rank.name);
    if (!roleId) return;
    await this.rest.removeMemberRole(member.externalId, roleId);
  }
}

// ===========================================
// Notifier
// ===========================================

export class DiscordNotifier implements MemberNotifier {
  constructor(private readonly rest: DiscordRestClient) {}

  async notifyPromotion(member: Member, rank: Rank): Promise<void> {
    await this.rest.sendDirectMessage(member.externalId, {
      content: `🎉 **Congratulations!** You've been promoted to **${rank.name}**!`,
    });
  }

  async notifyPointsAwarded(member: Member, points: number, submissionId: number | null): Promise<void> {
    const verb = points >= 0 ? 'awarded' : 'deducted';
    const source = submissionId !== null ? ` for submission #${submissionId}` : '';
    await this.rest.sendDirectMessage(member.externalId, {
      content: `You've been ${verb} **${Math.abs(points)} points**${source}. Total: **${member.points}**.`,
    });
  }

  async notifySubmissionDeclined(submission: Submission, reviewerId: string): Promise<void> {
    await this.rest.sendDirectMessage(submission.submitterId, {
      content: `❌ Your submission #${submission.id} has been declined by <@${reviewerId}>.`,
    });
  }
}

// ===========================================
// Submission Presenter
// ===========================================

export function buildSubmissionMessage(submission: Submission): DiscordMessagePayload {
  return {
    embeds: [
      {
        title: `Submission #${submission.id}: ${submission.eventType}`,
        color: 0xf1c40f,
        fields: [
          { name: 'Submitted by', value: `<@${submission.submitterId}>`, inline: true },
          {
            name: 'Participants',
            value: submission.participantIds.map((id) => `<@${id}>`).join(', '),
          },
          { name: 'Start', value: submission.startTime.toISOString(), inline: true },
          { name: 'End', value: submission.endTime.toISOString(), inline: true },
          { name: 'Proof', value: submission.proofReference },
        ],
        timestamp: submission.createdAt.toISOString(),
      },
    ],
    components: [
      {
        type: 1,
        components: [
          { type: 2, style: 3, label: 'Approve', custom_id: `${SUBMISSION_APPROVE_PREFIX}${submission.id}` },
          { type: 2, style: 4, label: 'Decline', custom_id: `${SUBMISSION_DECLINE_PREFIX}${submission.id}` },
        ],
      },
    ],
  };
}

export class DiscordSubmissionPresenter implements SubmissionPresenter {
  constructor(private readonly rest: DiscordRestClient) {}

  async presentSubmission(submission: Submission): Promise<void> {
    await this.rest.sendChannelMessage(this.rest.adminChannelId, buildSubmissionMessage(submission));
  }
}
