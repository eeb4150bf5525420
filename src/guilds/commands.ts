/**
 * Guild configuration commands and the manual test trigger
 */

import { GuildSchedule, MENTION_MODES, MentionMode } from '../system/types';
import { RelayError } from '../system/error-handling';
import { formatPostTime } from '../system/clock';
import { resolveAnnouncement } from '../system/dispatcher';
import { GuildScheduleRegistry } from './registry';

export interface ManualDispatcher {
  submit(guildId: string, schedule: GuildSchedule, trigger: 'manual'): void;
}

export interface GuildSummary {
  guildId: string;
  channel: string | null;
  postTime: string;
  apiKey: string; // masked
  mention: string;
  lastPostDate: string | null;
}

export function maskSecret(secret: string): string {
  if (!secret) {
    return '';
  }
  if (secret.length <= 8) {
    return '*'.repeat(secret.length);
  }
  return `${secret.slice(0, 4)}${'*'.repeat(secret.length - 8)}${secret.slice(-4)}`;
}

export function summarizeGuild(schedule: GuildSchedule): GuildSummary {
  return {
    guildId: schedule.guildId,
    channel: schedule.channelId,
    postTime: formatPostTime(schedule.postHour, schedule.postMinute),
    apiKey: maskSecret(schedule.apiKey),
    mention: resolveAnnouncement(schedule) ?? 'none',
    lastPostDate: schedule.lastPostDate
  };
}

function requireSnowflake(value: string, field: string): string {
  const trimmed = value.trim();
  if (!/^\d{1,20}$/.test(trimmed)) {
    throw RelayError.configuration(`${field} must be a numeric id`, { value });
  }
  return trimmed;
}

export function isMentionMode(value: string): value is MentionMode {
  return MENTION_MODES.some(mode => mode === value);
}

export class GuildCommands {
  constructor(
    private readonly registry: GuildScheduleRegistry,
    private readonly dispatcher: ManualDispatcher
  ) {}

  async setChannel(guildId: string, channelId: string): Promise<GuildSummary> {
    const id = requireSnowflake(channelId, 'channelId');
    const { schedule } = await this.registry.mutate(requireSnowflake(guildId, 'guildId'), draft => {
      draft.channelId = id;
    });
    return summarizeGuild(schedule);
  }

  async setApiKey(guildId: string, apiKey: string): Promise<GuildSummary> {
    const key = apiKey.trim();
    if (!key) {
      throw RelayError.configuration('apiKey must not be empty');
    }
    const { schedule } = await this.registry.mutate(requireSnowflake(guildId, 'guildId'), draft => {
      draft.apiKey = key;
    });
    return summarizeGuild(schedule);
  }

  async setPostTime(guildId: string, hour: number, minute: number = 0): Promise<GuildSummary> {
    if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
      throw RelayError.configuration('hour must be an integer between 0 and 23', { hour });
    }
    if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
      throw RelayError.configuration('minute must be an integer between 0 and 59', { minute });
    }
    const { schedule } = await this.registry.mutate(requireSnowflake(guildId, 'guildId'), draft => {
      draft.postHour = hour;
      draft.postMinute = minute;
    });
    return summarizeGuild(schedule);
  }

  async setMention(guildId: string, mode: string, roleId?: string | null): Promise<GuildSummary> {
    if (!isMentionMode(mode)) {
      throw RelayError.configuration(`mode must be one of ${MENTION_MODES.join(', ')}`, { mode });
    }
    if (mode === 'role' && !roleId) {
      throw RelayError.configuration('roleId is required when mode is role');
    }
    const mentionMode: MentionMode = mode;
    const role = mentionMode === 'role' && roleId ? requireSnowflake(roleId, 'roleId') : null;

    const { schedule } = await this.registry.mutate(requireSnowflake(guildId, 'guildId'), draft => {
      draft.mentionMode = mentionMode;
      draft.mentionRoleId = role;
    });
    return summarizeGuild(schedule);
  }

  describe(guildId: string): GuildSummary {
    return summarizeGuild(this.registry.getOrCreateDefault(guildId));
  }

  list(): GuildSummary[] {
    return this.registry.list().map(summarizeGuild);
  }

  /**
   * Queue a manual dispatch. The day marker is neither checked nor written.
   */
  triggerTest(guildId: string): GuildSummary {
    const schedule = this.registry.getOrCreateDefault(guildId);
    if (!schedule.channelId) {
      throw RelayError.destinationUnresolvable(guildId);
    }
    if (!schedule.apiKey) {
      throw RelayError.credentialMissing(guildId);
    }
    this.dispatcher.submit(guildId, schedule, 'manual');
    return summarizeGuild(schedule);
  }
}
