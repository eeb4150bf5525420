/**
 * Persisted guild configuration
 */

import fs from 'fs/promises';
import path from 'path';
import JSONbig from 'json-bigint';
import { GuildSchedule, MENTION_MODES, MentionMode, createDefaultSchedule } from '../system/types';
import { RelayLogger, createModuleLogger } from '../system/logger';

export interface ConfigStore {
  loadAll(): Promise<GuildSchedule[]>;
  saveAll(schedules: GuildSchedule[]): Promise<void>;
}

// integers beyond 15 digits come back as digit strings, so stored snowflakes keep every digit
const storedJson = JSONbig({ storeAsString: true });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asId(value: unknown): string | null {
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return String(value);
  }
  return null;
}

function asBoundedInt(value: unknown, min: number, max: number, fallback: number): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed === 'number' && Number.isInteger(parsed) && parsed >= min && parsed <= max) {
    return parsed;
  }
  return fallback;
}

function asMentionMode(value: unknown): MentionMode {
  return MENTION_MODES.find(mode => mode === value) ?? 'none';
}

/**
 * Build a schedule from one stored record, falling back to defaults field by field
 */
export function parseStoredGuild(guildId: string, raw: unknown): GuildSchedule {
  const schedule = createDefaultSchedule(guildId);
  if (!isRecord(raw)) {
    return schedule;
  }

  schedule.channelId = asId(raw.channel_id);
  schedule.postHour = asBoundedInt(raw.post_hour, 0, 23, schedule.postHour);
  schedule.postMinute = asBoundedInt(raw.post_minute, 0, 59, schedule.postMinute);
  schedule.apiKey = typeof raw.gemini_api_key === 'string' ? raw.gemini_api_key : '';
  schedule.lastPostDate =
    typeof raw.last_post_date === 'string' && /^\d{8}$/.test(raw.last_post_date) ? raw.last_post_date : null;
  schedule.mentionMode = asMentionMode(raw.mention_mode);
  schedule.mentionRoleId = asId(raw.mention_role_id);
  return schedule;
}

export function toStoredGuild(schedule: GuildSchedule): Record<string, unknown> {
  return {
    channel_id: schedule.channelId,
    post_hour: schedule.postHour,
    post_minute: schedule.postMinute,
    gemini_api_key: schedule.apiKey,
    last_post_date: schedule.lastPostDate,
    mention_mode: schedule.mentionMode,
    mention_role_id: schedule.mentionRoleId
  };
}

/**
 * One JSON object keyed by guild id. Writes go to a temp file that is renamed
 * over the target, so a crash mid-write leaves the previous file intact.
 */
export class JsonFileConfigStore implements ConfigStore {
  private readonly filePath: string;
  private readonly logger: RelayLogger;

  constructor(filePath: string, logger: RelayLogger = createModuleLogger('config-store')) {
    this.filePath = path.resolve(filePath);
    this.logger = logger;
  }

  async loadAll(): Promise<GuildSchedule[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        this.logger.info('No guild configuration file yet, starting empty', { path: this.filePath });
        return [];
      }
      throw error;
    }

    const parsed: unknown = storedJson.parse(content);
    if (!isRecord(parsed)) {
      throw new Error(`${this.filePath} must contain a JSON object keyed by guild id`);
    }

    const schedules: GuildSchedule[] = [];
    for (const [key, raw] of Object.entries(parsed)) {
      const guildId = asId(key);
      if (!guildId) {
        this.logger.warn('Skipping guild entry with a non-numeric id', { key });
        continue;
      }
      const schedule = parseStoredGuild(guildId, raw);
      if (isRecord(raw)) {
        this.warnDroppedId(guildId, 'channel_id', raw.channel_id, schedule.channelId);
        this.warnDroppedId(guildId, 'mention_role_id', raw.mention_role_id, schedule.mentionRoleId);
      }
      schedules.push(schedule);
    }

    this.logger.info(`Loaded ${schedules.length} guild configuration(s)`, { path: this.filePath });
    return schedules;
  }

  private warnDroppedId(guildId: string, field: string, stored: unknown, parsed: string | null): void {
    if (stored !== null && stored !== undefined && parsed === null) {
      this.logger.warn(`Ignoring unreadable ${field}`, { guildId, value: String(stored) });
    }
  }

  async saveAll(schedules: GuildSchedule[]): Promise<void> {
    const document: Record<string, Record<string, unknown>> = {};
    for (const schedule of schedules) {
      document[schedule.guildId] = toStoredGuild(schedule);
    }

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    await fs.rename(tempPath, this.filePath);
  }
}
