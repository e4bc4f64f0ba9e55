// =====================================================
// Application Configuration
// =====================================================

import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || 'info').toLowerCase();
  // WARNING is accepted as an alias of warn
  if (normalized === 'warning') return 'warn';
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? 'info';
}

function parseIdList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  // Empty = any origin
  corsOrigins: parseIdList(process.env.CORS_ORIGINS),

  // Database (empty = in-memory ledger)
  databaseUrl: process.env.DATABASE_URL || '',

  // Redis (BullMQ)
  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379',
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
    password: process.env.REDIS_PASSWORD || undefined,
  },

  // JWT
  jwt: {
    accessSecret: process.env.JWT_ACCESS_SECRET || 'dev-access-secret',
  },

  adminUserIds: parseIdList(process.env.ADMIN_USER_IDS),

  // Discord (grants, notifications, submission review channel)
  discord: {
    botToken: process.env.DISCORD_BOT_TOKEN || '',
    guildId: process.env.DISCORD_GUILD_ID || '',
    adminChannelId: process.env.DISCORD_ADMIN_CHANNEL_ID || '',
    apiBaseUrl: 'https://discord.com/api/v10',
  },

  // Roblox group (source of truth for rank identity)
  roblox: {
    groupId: parseInt(process.env.ROBLOX_GROUP_ID || '0', 10),
    apiKey: process.env.ROBLOX_API_KEY || '',
    usersApiUrl: 'https://users.roblox.com/v1',
    groupsApiUrl: 'https://groups.roblox.com/v1',
    cloudApiUrl: 'https://apis.roblox.com/cloud/v2',
  },

  // Retry wrapper for mutating external calls
  retry: {
    maxAttempts: parseInt(process.env.MAX_RATE_LIMIT_RETRIES || '3', 10),
    baseDelayMs: parseInt(process.env.RATE_LIMIT_RETRY_DELAY_MS || '1000', 10),
  },

  // Rank reconciliation
  rankSync: {
    enabled: process.env.RANK_SYNC_ENABLED !== 'false',
    intervalMs: parseInt(process.env.RANK_SYNC_INTERVAL_MS || '3600000', 10), // hourly
    bulkDelayMs: parseInt(process.env.BULK_SYNC_DELAY_MS || '500', 10),
  },

  ranks: {
    configPath: process.env.RANKS_CONFIG_PATH || path.resolve(__dirname, '../../data/ranks.json'),
  },

  submissions: {
    minPoints: 1,
    maxPoints: parseInt(process.env.SUBMISSION_MAX_POINTS || '30', 10),
  },
} as const;

// Validate required environment variables
export function validateConfig(): void {
  const required = [
    'DATABASE_URL',
    'JWT_ACCESS_SECRET',
    'DISCORD_BOT_TOKEN',
    'DISCORD_GUILD_ID',
    'ROBLOX_GROUP_ID',
    'ROBLOX_API_KEY',
  ];

  for (const key of required) {
    if (!process.env[key]) {
      console.warn(`Warning: Missing environment variable: ${key}`);
    }
  }
}
