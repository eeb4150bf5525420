/**
 * Common types shared by the relay core
 */

export type MentionMode = 'none' | 'everyone' | 'role';

export const MENTION_MODES: readonly MentionMode[] = ['none', 'everyone', 'role'];

/**
 * Per-guild posting configuration and dispatch state
 */
export interface GuildSchedule {
  guildId: string;
  channelId: string | null;
  postHour: number; // 0-23, process timezone
  postMinute: number; // 0-59
  apiKey: string; // empty when not configured
  lastPostDate: string | null; // YYYYMMDD of the last scheduled dispatch
  mentionMode: MentionMode;
  mentionRoleId: string | null;
}

/**
 * One ranking entry as published by the source, before translation
 */
export interface RawItem {
  rank: string; // e.g. "1位"
  signCode: string; // "01".."12"
  sign: string;
  description: string;
}

/**
 * One translated ranking entry
 */
export interface RankedItem {
  rank: string;
  sourceSign: string;
  sign: string;
  description: string;
}

export interface CacheEntry {
  day: string; // YYYYMMDD
  items: RankedItem[];
}

export type DispatchTrigger = 'scheduled' | 'manual';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export const EXPECTED_ITEM_COUNT = 12;

export function createDefaultSchedule(guildId: string): GuildSchedule {
  return {
    guildId,
    channelId: null,
    postHour: 8,
    postMinute: 0,
    apiKey: '',
    lastPostDate: null,
    mentionMode: 'none',
    mentionRoleId: null
  };
}
