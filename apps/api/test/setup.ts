// =====================================================
// Global Test Setup
// =====================================================
// Runs before each test file, ahead of any application import,
// so the configuration module sees these values.

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.DEBUG ? 'debug' : 'error';
process.env.JWT_ACCESS_SECRET = 'test-secret';
process.env.ADMIN_USER_IDS = 'admin-from-env';
process.env.DATABASE_URL = '';
process.env.DISCORD_BOT_TOKEN = '';
process.env.ROBLOX_GROUP_ID = '4242';
process.env.ROBLOX_API_KEY = 'test-api-key';
process.env.RATE_LIMIT_RETRY_DELAY_MS = '1000';
process.env.MAX_RATE_LIMIT_RETRIES = '3';
