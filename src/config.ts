import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { LogLevel } from './logger.js';

export interface AppConfig {
  irc: {
    host: string;
    port: number;
    serverName: string;
    username: string;
    oauthKey: string;
    connectTimeoutMs: number;
    readTimeoutMs: number;
    reconnectBackoffMs: number;
  };
  logs: {
    apiBase: string;
    linkBase: string;
    requestTimeoutMs: number;
  };
  relay: {
    pollIntervalMs: number;
    spoilerDelayMs: number;
    staleThresholdMs: number;
    announceElapsed: boolean;
  };
  channelsFile: string;
  logLevel: LogLevel;
}

const envSchema = z.object({
  LOGS_BOT_USERNAME: z.string().trim().min(1),
  LOGS_BOT_OAUTH_KEY: z.string().trim().min(1),
  CHANNELS_FILE: z.string().min(1).default('channels.json'),
  IRC_HOST: z.string().min(1).default('irc.chat.twitch.tv'),
  IRC_PORT: z.coerce.number().int().min(1).max(65535).default(6667),
  IRC_SERVER_NAME: z.string().min(1).default('tmi.twitch.tv'),
  IRC_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120_000).default(10_000),
  IRC_READ_TIMEOUT_MS: z.coerce.number().int().min(10_000).max(3_600_000).default(360_000),
  RECONNECT_BACKOFF_MS: z.coerce.number().int().min(1000).max(600_000).default(30_000),
  LOGS_API_BASE: z
    .string()
    .url()
    .default('http://logs.tf')
    .transform((value) => value.replace(/\/+$/, '')),
  LOG_LINK_BASE: z
    .string()
    .url()
    .default('http://logs.tf')
    .transform((value) => value.replace(/\/+$/, '')),
  LOGS_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(500).max(60_000).default(10_000),
  POLL_INTERVAL_MS: z.coerce.number().int().min(1000).max(300_000).default(10_000),
  SPOILER_DELAY_MS: z.coerce.number().int().min(0).max(600_000).default(15_000),
  STALE_THRESHOLD_MS: z.coerce.number().int().min(1000).max(3_600_000).default(60_000),
  ANNOUNCE_ELAPSED: z
    .enum(['0', '1', 'true', 'false'])
    .default('0')
    .transform((value) => value === '1' || value === 'true'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${fields.join('; ')}`, { cause: result.error });
  }
  const parsed = result.data;

  const oauthKey = parsed.LOGS_BOT_OAUTH_KEY.startsWith('oauth:')
    ? parsed.LOGS_BOT_OAUTH_KEY
    : `oauth:${parsed.LOGS_BOT_OAUTH_KEY}`;

  return {
    irc: {
      host: parsed.IRC_HOST,
      port: parsed.IRC_PORT,
      serverName: parsed.IRC_SERVER_NAME,
      username: parsed.LOGS_BOT_USERNAME.toLowerCase(),
      oauthKey,
      connectTimeoutMs: parsed.IRC_CONNECT_TIMEOUT_MS,
      readTimeoutMs: parsed.IRC_READ_TIMEOUT_MS,
      reconnectBackoffMs: parsed.RECONNECT_BACKOFF_MS,
    },
    logs: {
      apiBase: parsed.LOGS_API_BASE,
      linkBase: parsed.LOG_LINK_BASE,
      requestTimeoutMs: parsed.LOGS_REQUEST_TIMEOUT_MS,
    },
    relay: {
      pollIntervalMs: parsed.POLL_INTERVAL_MS,
      spoilerDelayMs: parsed.SPOILER_DELAY_MS,
      staleThresholdMs: parsed.STALE_THRESHOLD_MS,
      announceElapsed: parsed.ANNOUNCE_ELAPSED,
    },
    channelsFile: resolve(parsed.CHANNELS_FILE),
    logLevel: parsed.LOG_LEVEL,
  };
}
