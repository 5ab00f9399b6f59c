import { z } from 'zod';
import { isValidTimeZone } from '../format/time.js';
import { LOG_LEVELS } from '../utils/logger.js';

const TelegramSchema = z.object({
  token: z.string().optional(),
  /** Chat ids to bridge; empty bridges every chat the bot is in. */
  allowedChatIds: z.array(z.coerce.string()).default([]),
});

const ZulipSchema = z.object({
  site: z.string().url().optional(),
  email: z.string().optional(),
  apiKey: z.string().optional(),
  stream: z.string().min(1).default('From Telegram'),
  /** Empty: one topic per day, named after the message date. */
  topic: z.string().default(''),
});

const RetrySchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  baseDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().min(0).default(30_000),
});

const BridgeSchema = z.object({
  timeZone: z.string().default('Europe/Zurich').refine(isValidTimeZone, { message: 'Unknown IANA time zone' }),
  usersFile: z.string().default('zulip_users.json'),
  notifyMentions: z.boolean().default(false),
  requestTimeoutMs: z.number().int().positive().default(15_000),
  shutdownGraceMs: z.number().int().min(0).default(5000),
  retry: RetrySchema.optional().transform(v => RetrySchema.parse(v ?? {})),
});

const DatabaseSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().default('.bridge/bridge.db'),
});

const LogSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
});

export const BridgeConfigSchema = z.object({
  telegram: TelegramSchema.optional().transform(v => TelegramSchema.parse(v ?? {})),
  zulip: ZulipSchema.optional().transform(v => ZulipSchema.parse(v ?? {})),
  bridge: BridgeSchema.optional().transform(v => BridgeSchema.parse(v ?? {})),
  database: DatabaseSchema.optional().transform(v => DatabaseSchema.parse(v ?? {})),
  log: LogSchema.optional().transform(v => LogSchema.parse(v ?? {})),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
