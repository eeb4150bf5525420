/**
 * Message layout for the daily ranking post
 */

import { RankedItem } from '../types';
import { formatDayKey } from '../clock';

export const DISCORD_MESSAGE_LIMIT = 2000;
export const EMBED_FIELD_LIMIT = 1024;
export const EMBED_COLOR = 0x4e72b7;

export interface EmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface Embed {
  title: string;
  description?: string;
  color: number;
  fields: EmbedField[];
}

export interface RankingSections {
  top: RankedItem[];
  bottom: RankedItem[];
}

export const LOADING_TEXT = "✨ **[Daily Zodiac Ranking]** Fetching today's ranking...";

/**
 * Placeholder posted while the ranking is produced; it carries the announcement
 */
export function buildLoadingText(announcement: string | null): string {
  return announcement ? `${announcement} ${LOADING_TEXT}` : LOADING_TEXT;
}

export function splitRanking(items: RankedItem[]): RankingSections {
  return {
    top: items.slice(0, 6),
    bottom: items.slice(6)
  };
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit - 1)}…` : text;
}

function rankingList(items: RankedItem[]): string {
  if (items.length === 0) {
    return 'No data';
  }
  return truncate(items.map(item => `**${item.rank}** — ${item.sign}`).join('\n'), EMBED_FIELD_LIMIT);
}

export function buildSummaryEmbed(items: RankedItem[], day: string, sourceUrl: string): Embed {
  const { top, bottom } = splitRanking(items);
  return {
    title: `📅 Zodiac ranking for ${formatDayKey(day)}`,
    description: `[Source](<${sourceUrl}>)`,
    color: EMBED_COLOR,
    fields: [
      { name: '🥇 Top ranks', value: rankingList(top), inline: true },
      { name: '⬇️ Lower ranks', value: rankingList(bottom), inline: true }
    ]
  };
}

export function buildDetailText(title: string, items: RankedItem[]): string {
  let text = `**${title}**\n`;
  for (const item of items) {
    text += `\n**${item.rank} ${item.sign}**\n> ${item.description.replace(/\n/g, '\n> ')}\n`;
  }
  return text;
}

/**
 * Split text into chunks no longer than `limit`, preferring line breaks
 */
export function chunkMessage(text: string, limit: number = DISCORD_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const line of text.split('\n')) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    if (current) {
      chunks.push(current);
    }

    let rest = line;
    while (rest.length > limit) {
      chunks.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
    current = rest;
  }

  if (current.trim()) {
    chunks.push(current);
  }
  return chunks;
}
