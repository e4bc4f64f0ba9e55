// =====================================================
// Service Container
// =====================================================
// Wires the ledger store, the rank table and the external
// collaborators into the domain services used by the HTTP
// layer and the queue worker.

import { Rank } from '@rank-ledger/shared-types';
import { config } from '../config';
import { logger } from '../utils/logger';
import { LedgerStore } from '../store/ledger-store';
import { MemoryLedgerStore } from '../store/memory.store';
import { DrizzleLedgerStore } from '../store/drizzle.store';
import { createDatabase } from './db';
import { loadRankConfig, RankConfigError, RankTable } from './rank-table';
import { RetryOptions, Sleep } from './retry';
import {
  ExternalRankPlatform,
  GrantProvider,
  MemberNotifier,
  NoopGrantProvider,
  NoopNotifier,
  NoopSubmissionPresenter,
  SubmissionPresenter,
} from '../services/external/types';
import { RobloxGroupsClient } from '../services/external/roblox-groups.client';
import {
  DiscordGrantClient,
  DiscordNotifier,
  DiscordRestClient,
  DiscordSubmissionPresenter,
} from '../services/external/discord.client';
import { RankSyncService } from '../services/ranks/rank-sync.service';
import { PromotionService } from '../services/ranks/promotion.service';
import { SubmissionService } from '../services/submissions/submission.service';
import { MembersService } from '../modules/members/members.service';

export interface ServiceCollaborators {
  store: LedgerStore;
  ranks: RankTable;
  platform: ExternalRankPlatform;
  grants: GrantProvider;
  notifier: MemberNotifier;
  presenter: SubmissionPresenter;
  retry?: RetryOptions;
  bulkDelayMs?: number;
  sleep?: Sleep;
}

export interface AppServices {
  store: LedgerStore;
  ranks: RankTable;
  rankSync: RankSyncService;
  promotions: PromotionService;
  submissions: SubmissionService;
  members: MembersService;
}

export function buildServices(collaborators: ServiceCollaborators): AppServices {
  const { store, ranks, platform, grants, notifier, presenter, retry } = collaborators;

  const rankSync = new RankSyncService({
    store,
    ranks,
    platform,
    grants,
    retry,
    bulkDelayMs: collaborators.bulkDelayMs,
    sleep: collaborators.sleep,
  });
  const promotions = new PromotionService({ store, ranks, platform, grants, notifier, sync: rankSync, retry });
  const submissions = new SubmissionService({ store, ranks, promotions, notifier, presenter });
  const members = new MembersService({ store, ranks, platform, grants, notifier, sync: rankSync, retry });

  return { store, ranks, rankSync, promotions, submissions, members };
}

/**
 * Writes the configured ranks to the ledger and builds the rank
 * table from the rows read back.
 */
export async function loadRankTable(store: LedgerStore, rankList: Rank[]): Promise<RankTable> {
  await store.replaceRanks(rankList);

  const stored = await store.getRanks();
  if (stored.length === 0) {
    throw new RankConfigError('The ledger holds no ranks after loading the configuration');
  }
  return new RankTable(stored);
}

/**
 * Production wiring from configuration.
 */
export async function bootstrapServices(): Promise<AppServices> {
  const rankList = await loadRankConfig(config.ranks.configPath);

  let store: LedgerStore;
  if (config.databaseUrl) {
    store = new DrizzleLedgerStore(createDatabase(config.databaseUrl));
  } else {
    logger.warn('DATABASE_URL not set, using the in-memory ledger (data is lost on restart)');
    store = new MemoryLedgerStore();
  }
  const ranks = await loadRankTable(store, rankList);

  const platform = new RobloxGroupsClient();
  const report = await platform.checkConnection();
  for (const problem of report.errors) {
    logger.warn(`[Roblox] ${problem}`);
  }

  let grants: GrantProvider;
  let notifier: MemberNotifier;
  let presenter: SubmissionPresenter;

  if (config.discord.botToken) {
    const rest = new DiscordRestClient();
    grants = new DiscordGrantClient(rest);
    notifier = new DiscordNotifier(rest);
    presenter = new DiscordSubmissionPresenter(rest);
  } else {
    logger.warn('DISCORD_BOT_TOKEN not set, grants and notifications are disabled');
    grants = new NoopGrantProvider();
    notifier = new NoopNotifier();
    presenter = new NoopSubmissionPresenter();
  }

  return buildServices({
    store,
    ranks,
    platform,
    grants,
    notifier,
    presenter,
    bulkDelayMs: config.rankSync.bulkDelayMs,
  });
}
