// =====================================================
// Simple Logger Utility
// =====================================================
// The minimum level is passed in when a logger is built;
// there is no process-wide mutable threshold.

import { config, LogLevel } from '../config';

const LOG_COLORS = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m',  // Green
  warn: '\x1b[33m',  // Yellow
  error: '\x1b[31m', // Red
  reset: '\x1b[0m',
};

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const REDACT_PATTERNS: Array<[RegExp, string]> = [
  [/x-api-key["']?\s*[=:]\s*["']?[^\s,"'}\]]+/gi, 'x-api-key: <REDACTED>'],
  [/authorization["']?\s*[=:]\s*["']?(bot|bearer)\s+[^\s,"'}\]]+/gi, 'authorization: <REDACTED>'],
  [/\.ROBLOSECURITY[=:][^\s,}\]]*/gi, '.ROBLOSECURITY=<REDACTED>'],
  [/cookie["']?\s*[=:]\s*["']?[^\s,"'}\]]+/gi, 'cookie: <REDACTED>'],
  [/(DISCORD_BOT_TOKEN|ROBLOX_API_KEY|JWT_ACCESS_SECRET)[=:][^\s,}\]]*/g, '$1=<REDACTED>'],
];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  level: LogLevel;
  colors?: boolean;
}

export function redactSecrets(text: string): string {
  return REDACT_PATTERNS.reduce(
    (result, [pattern, replacement]) => result.replace(pattern, replacement),
    text
  );
}

function serializeArg(arg: unknown): unknown {
  if (arg instanceof Error) {
    return { name: arg.name, message: arg.message };
  }
  return arg;
}

export function formatMessage(
  level: LogLevel,
  message: string,
  args: unknown[],
  colors: boolean = true
): string {
  const timestamp = new Date().toISOString();
  const color = colors ? LOG_COLORS[level] : '';
  const reset = colors ? LOG_COLORS.reset : '';
  const levelUpper = level.toUpperCase().padEnd(5);
  const extra = args.length ? ` ${JSON.stringify(args.map(serializeArg))}` : '';

  return redactSecrets(`${color}[${timestamp}] [${levelUpper}]${reset} ${message}${extra}`);
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = LEVEL_WEIGHT[options.level];
  const colors = options.colors ?? true;
  const enabled = (level: LogLevel): boolean => LEVEL_WEIGHT[level] >= threshold;

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) console.debug(formatMessage('debug', message, args, colors));
    },

    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) console.info(formatMessage('info', message, args, colors));
    },

    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) console.warn(formatMessage('warn', message, args, colors));
    },

    error(message: string, ...args: unknown[]): void {
      if (enabled('error')) console.error(formatMessage('error', message, args, colors));
    },
  };
}

export const logger: Logger = createLogger({
  level: config.logLevel,
  colors: config.nodeEnv !== 'production',
});
