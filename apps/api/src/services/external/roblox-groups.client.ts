// =====================================================
// Roblox Groups Client
// =====================================================
// Reads group roles through the public users/groups APIs and
// writes membership roles through Open Cloud.

import axios, { AxiosAdapter, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { ERROR_CODES, ExternalRankDescriptor } from '@rank-ledger/shared-types';
import { config } from '../../config';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import { ExternalServiceError } from './errors';
import { toExternalError } from './http-errors';
import { ExternalRankPlatform } from './types';

// ===========================================
// Roblox Response Types (Raw)
// ===========================================

interface RobloxUsernameLookup {
  data: Array<{ id: number; name: string; requestedUsername?: string }>;
}

interface RobloxRole {
  id: number;
  name: string;
  rank: number;
  memberCount?: number;
}

interface RobloxUserGroupRoles {
  data: Array<{ group: { id: number; name: string }; role: RobloxRole }>;
}

interface RobloxGroupRoles {
  groupId: number;
  roles: RobloxRole[];
}

interface RobloxGroupInfo {
  id: number;
  name: string;
  memberCount?: number;
}

export interface RobloxConnectionReport {
  groupInfo: boolean;
  groupRoles: boolean;
  authentication: boolean;
  errors: string[];
}

export interface RobloxGroupsClientOptions {
  groupId?: number;
  apiKey?: string;
  // Replaces the HTTP transport (tests)
  adapter?: AxiosAdapter;
}

const PROVIDER = 'roblox';

// ===========================================
// Roblox Groups Client
// ===========================================

export class RobloxGroupsClient implements ExternalRankPlatform {
  readonly providerName = PROVIDER;

  private readonly client: AxiosInstance;
  private readonly groupId: number;
  private readonly apiKey: string;

  constructor(options: RobloxGroupsClientOptions = {}) {
    this.groupId = options.groupId ?? config.roblox.groupId;
    this.apiKey = options.apiKey ?? config.roblox.apiKey;

    this.client = axios.create({
      timeout: 15000,
      headers: { Accept: 'application/json' },
      adapter: options.adapter,
    });

    this.client.interceptors.request.use((requestConfig: InternalAxiosRequestConfig) => {
      logger.debug(`[Roblox] ${requestConfig.method?.toUpperCase()} ${requestConfig.url}`);
      return requestConfig;
    });
  }

  // ===========================================
  // Public Methods
  // ===========================================

  async fetchRank(account: string): Promise<ExternalRankDescriptor> {
    const userId = await this.resolveUserId(account);
    const membership = await this.findMembership(userId);

    if (!membership) {
      throw new ExternalServiceError(
        `${account} is not a member of group ${this.groupId}`,
        PROVIDER,
        null,
        ERROR_CODES.EXTERNAL_ACCOUNT_NOT_IN_GROUP
      );
    }

    return {
      externalId: membership.role.id,
      externalLevel: membership.role.rank,
      name: membership.role.name,
    };
  }

  /**
   * Sets the member's group role. `rankRef` may be a role id or a
   * numeric role level; the id is tried first.
   */
  async pushRank(account: string, rankRef: number): Promise<void> {
    if (!this.apiKey) {
      throw new ExternalServiceError('ROBLOX_API_KEY is not configured', PROVIDER);
    }

    const userId = await this.resolveUserId(account);
    const roles = await this.getGroupRoles();
    const role = roles.find((r) => r.id === rankRef) ?? roles.find((r) => r.rank === rankRef);

    if (!role) {
      throw new ExternalServiceError(
        `No role in group ${this.groupId} matches reference ${rankRef}`,
        PROVIDER,
        null,
        ERROR_CODES.EXTERNAL_ROLE_NOT_FOUND
      );
    }

    try {
      await this.client.patch(
        `${config.roblox.cloudApiUrl}/groups/${this.groupId}/memberships/${userId}`,
        { role: `groups/${this.groupId}/roles/${role.id}` },
        { headers: { 'x-api-key': this.apiKey, 'Content-Type': 'application/json' } }
      );
    } catch (error) {
      throw toExternalError(error, PROVIDER, `update role of ${account}`);
    }

    logger.info(`[Roblox] Set ${account} to role "${role.name}" (id ${role.id}, level ${role.rank})`);
  }

  async getGroupRoles(): Promise<RobloxRole[]> {
    try {
      const response = await this.client.get<RobloxGroupRoles>(
        `${config.roblox.groupsApiUrl}/groups/${this.groupId}/roles`
      );
      return response.data.roles ?? [];
    } catch (error) {
      throw toExternalError(error, PROVIDER, 'list group roles');
    }
  }

  async getGroupInfo(): Promise<RobloxGroupInfo> {
    try {
      const response = await this.client.get<RobloxGroupInfo>(
        `${config.roblox.groupsApiUrl}/groups/${this.groupId}`
      );
      return response.data;
    } catch (error) {
      throw toExternalError(error, PROVIDER, 'read group info');
    }
  }

  /**
   * Startup diagnostics. Never throws.
   */
  async checkConnection(): Promise<RobloxConnectionReport> {
    const report: RobloxConnectionReport = {
      groupInfo: false,
      groupRoles: false,
      authentication: this.apiKey.length > 0,
      errors: [],
    };

    try {
      const info = await this.getGroupInfo();
      report.groupInfo = true;
      logger.info(`[Roblox] Connected to group: ${info.name}`);
    } catch (error) {
      report.errors.push(`Failed to get group info: ${errorMessage(error)}`);
    }

    try {
      const roles = await this.getGroupRoles();
      report.groupRoles = roles.length > 0;
      logger.info(`[Roblox] Retrieved ${roles.length} group roles`);
    } catch (error) {
      report.errors.push(`Failed to get group roles: ${errorMessage(error)}`);
    }

    if (!report.authentication) {
      report.errors.push('No Open Cloud API key configured');
    }

    return report;
  }

  // ===========================================
  // Private Methods
  // ===========================================

  private async resolveUserId(username: string): Promise<number> {
    let lookup: RobloxUsernameLookup;
    try {
      const response = await this.client.post<RobloxUsernameLookup>(
        `${config.roblox.usersApiUrl}/usernames/users`,
        { usernames: [username], excludeBannedUsers: true }
      );
      lookup = response.data;
    } catch (error) {
      throw toExternalError(error, PROVIDER, `resolve user ${username}`);
    }

    const user = lookup.data?.[0];
    if (!user) {
      throw new ExternalServiceError(
        `Roblox user ${username} not found`,
        PROVIDER,
        null,
        ERROR_CODES.EXTERNAL_ACCOUNT_NOT_FOUND
      );
    }
    return user.id;
  }

  private async findMembership(userId: number): Promise<RobloxUserGroupRoles['data'][number] | undefined> {
    try {
      const response = await this.client.get<RobloxUserGroupRoles>(
        `${config.roblox.groupsApiUrl}/users/${userId}/groups/roles`
      );
      return (response.data.data ?? []).find((entry) => entry.group.id === this.groupId);
    } catch (error) {
      throw toExternalError(error, PROVIDER, `read group roles of user ${userId}`);
    }
  }
}
