import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { Audience, OnDemandDedup } from './types.js';

export function loadEnvFiles(cwd = process.cwd()) {
  const base = path.join(cwd, '.env');
  const local = path.join(cwd, '.env.local');
  if (fs.existsSync(base)) {
    dotenv.config({ path: base });
  }
  // .env.local wins over .env
  if (fs.existsSync(local)) {
    dotenv.config({ path: local, override: true });
  }
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(v => (v ? v : undefined));

const flag = z
  .string()
  .optional()
  .transform(v => v !== undefined && ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase()));

const minutesDividingHour = z.coerce
  .number()
  .int()
  .positive()
  .refine(n => n <= 60 && 60 % n === 0, { message: 'must divide 60 (1, 2, 5, 10, 15, 30, 60)' });

const timeOfDay = /^([01]?\d|2[0-3]):([0-5]\d)$/;

const envSchema = z.object({
  DISCORD_TOKEN: optionalString,
  APP_ID: optionalString,
  GUILD_IDS: optionalString,
  GUILD_ID: optionalString,
  STATE_DIR: z.string().default('./data'),
  STATE_BACKEND: z.enum(['json', 'sqlite']).default('json'),
  DB_PATH: optionalString,
  GOOGLE_SERVICE_ACCOUNT_FILE: z.string().default('private/service_account.json'),

  EVENTS_CALENDAR_ID: optionalString,
  EVENTS_CHANNEL_ID: optionalString,
  EVENTS_AUDIENCES: optionalString,
  EVENTS_INTERVAL_MINUTES: minutesDividingHour.default(1),

  TRAIN_CALENDAR_ID: optionalString,
  TRAIN_EVENTS_CHANNEL_ID: optionalString,
  TRAIN_EVENTS_CHANNEL_ID_2: optionalString,
  TRAIN_AUDIENCES: optionalString,
  TRAIN_INTERVAL_MINUTES: minutesDividingHour.default(1),

  GOOGLE_CALENDAR_ID: optionalString,
  SUMMARY_CHANNEL_ID: optionalString,
  SUMMARY_TIMES: z
    .string()
    .default('13:00,01:00')
    .transform(v => v.split(',').map(s => s.trim()).filter(Boolean))
    .pipe(z.array(z.string().regex(timeOfDay, 'expected HH:MM')).min(1)),
  SUMMARY_TIMEZONE: z.string().default('UTC'),
  SUMMARY_LIMIT: z.coerce.number().int().min(1).max(25).default(5),

  DISPLAY_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(-120),

  TRANSLATION_ENABLED: flag,
  TRANSLATE_URL: optionalString,
  TRANSLATE_API_KEY: optionalString,
  SOURCE_LOCALE: z.string().default('en'),

  DEDUP_RETENTION_HOURS: z.coerce.number().positive().default(96),
  ON_DEMAND_DEDUP: z.enum(['ignore', 'consult', 'update']).default('ignore'),
  RUN_ONCE: flag,
});

export type AppConfig = {
  discord: { token?: string; appId?: string; guildIds: string[] };
  state: { dir: string; backend: 'json' | 'sqlite'; dbPath: string };
  google: { serviceAccountFile: string };
  events: { calendarId?: string; audiences: Audience[]; intervalMinutes: number };
  trains: { calendarId?: string; audiences: Audience[]; intervalMinutes: number };
  summary: { calendarId?: string; channelId?: string; times: string[]; timezone: string; limit: number };
  display: { utcOffsetMinutes: number };
  translation: { enabled: boolean; url?: string; apiKey?: string; sourceLocale: string };
  dedup: { retentionHours: number; onDemand: OnDemandDedup };
  runOnce: boolean;
  warnings: string[];
};

const snowflake = /^\d{5,25}$/;

/**
 * Parses `name=channelId[/locale]` entries separated by commas. Entries that do
 * not parse are returned in `invalid` rather than failing the whole list.
 */
export function parseAudiences(raw: string | undefined): { audiences: Audience[]; invalid: string[] } {
  const audiences: Audience[] = [];
  const invalid: string[] = [];
  if (!raw) return { audiences, invalid };

  for (const entry of raw.split(',').map(s => s.trim()).filter(Boolean)) {
    const match = /^([\w-]+)=(\d+)(?:\/([A-Za-z]{2,3}(?:-[A-Za-z]{2,4})?))?$/.exec(entry);
    if (!match || !snowflake.test(match[2]) || audiences.some(a => a.key === match[1])) {
      invalid.push(entry);
      continue;
    }
    const audience: Audience = { key: match[1], channelId: match[2] };
    if (match[3]) audience.locale = match[3].toLowerCase();
    audiences.push(audience);
  }
  return { audiences, invalid };
}

function legacyAudiences(
  entries: [key: string, value: string | undefined, variable: string][],
  warnings: string[],
): Audience[] {
  const audiences: Audience[] = [];
  for (const [key, value, variable] of entries) {
    if (!value) continue;
    if (!snowflake.test(value)) {
      warnings.push(`Invalid ${variable}: ${value}. Must be a channel id.`);
      continue;
    }
    audiences.push({ key, channelId: value });
  }
  return audiences;
}

function audiencesFor(
  listVar: string,
  list: string | undefined,
  legacy: [key: string, value: string | undefined, variable: string][],
  warnings: string[],
): Audience[] {
  if (list) {
    const { audiences, invalid } = parseAudiences(list);
    for (const entry of invalid) warnings.push(`Ignoring invalid ${listVar} entry '${entry}'`);
    return audiences;
  }
  return legacyAudiences(legacy, warnings);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  const warnings: string[] = [];

  const guildIds = (e.GUILD_IDS ?? e.GUILD_ID ?? '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);

  let summaryChannel = e.SUMMARY_CHANNEL_ID ?? e.EVENTS_CHANNEL_ID;
  if (summaryChannel && !snowflake.test(summaryChannel)) {
    warnings.push(`Invalid SUMMARY_CHANNEL_ID: ${summaryChannel}. Must be a channel id.`);
    summaryChannel = undefined;
  }

  return {
    discord: { token: e.DISCORD_TOKEN, appId: e.APP_ID, guildIds },
    state: {
      dir: e.STATE_DIR,
      backend: e.STATE_BACKEND,
      dbPath: e.DB_PATH ?? path.join(e.STATE_DIR, 'state.db'),
    },
    google: { serviceAccountFile: e.GOOGLE_SERVICE_ACCOUNT_FILE },
    events: {
      calendarId: e.EVENTS_CALENDAR_ID,
      audiences: audiencesFor(
        'EVENTS_AUDIENCES',
        e.EVENTS_AUDIENCES,
        [['default', e.EVENTS_CHANNEL_ID, 'EVENTS_CHANNEL_ID']],
        warnings,
      ),
      intervalMinutes: e.EVENTS_INTERVAL_MINUTES,
    },
    trains: {
      calendarId: e.TRAIN_CALENDAR_ID,
      audiences: audiencesFor(
        'TRAIN_AUDIENCES',
        e.TRAIN_AUDIENCES,
        [
          ['default', e.TRAIN_EVENTS_CHANNEL_ID, 'TRAIN_EVENTS_CHANNEL_ID'],
          ['secondary', e.TRAIN_EVENTS_CHANNEL_ID_2, 'TRAIN_EVENTS_CHANNEL_ID_2'],
        ],
        warnings,
      ),
      intervalMinutes: e.TRAIN_INTERVAL_MINUTES,
    },
    summary: {
      calendarId: e.GOOGLE_CALENDAR_ID,
      channelId: summaryChannel,
      times: e.SUMMARY_TIMES,
      timezone: e.SUMMARY_TIMEZONE,
      limit: e.SUMMARY_LIMIT,
    },
    display: { utcOffsetMinutes: e.DISPLAY_UTC_OFFSET_MINUTES },
    translation: {
      enabled: e.TRANSLATION_ENABLED,
      url: e.TRANSLATE_URL,
      apiKey: e.TRANSLATE_API_KEY,
      sourceLocale: e.SOURCE_LOCALE.toLowerCase(),
    },
    dedup: { retentionHours: e.DEDUP_RETENTION_HOURS, onDemand: e.ON_DEMAND_DEDUP },
    runOnce: e.RUN_ONCE,
    warnings,
  };
}
