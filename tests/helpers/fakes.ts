/**
 * In-process stand-ins for the relay's collaborators
 */

import { GuildSchedule, RankedItem, RawItem, createDefaultSchedule } from '../../src/system/types';
import { ConfigStore } from '../../src/guilds/config-store';
import { SourceFetcher } from '../../src/pipeline/source-fetcher';
import { Publisher } from '../../src/system/notification';
import { Clock } from '../../src/system/clock';
import { RelayLogger } from '../../src/system/logger';
import { Result } from '../../src/system/error-handling';

export const SIGNS = [
  ['01', '牡羊座', 'Aries'],
  ['02', '牡牛座', 'Taurus'],
  ['03', '双子座', 'Gemini'],
  ['04', '蟹座', 'Cancer'],
  ['05', '獅子座', 'Leo'],
  ['06', '乙女座', 'Virgo'],
  ['07', '天秤座', 'Libra'],
  ['08', '蠍座', 'Scorpio'],
  ['09', '射手座', 'Sagittarius'],
  ['10', '山羊座', 'Capricorn'],
  ['11', '水瓶座', 'Aquarius'],
  ['12', '魚座', 'Pisces']
] as const;

export function silentLogger(): RelayLogger {
  return new RelayLogger({ consoleOutput: false });
}

export function makeRawItems(count: number = 12): RawItem[] {
  return SIGNS.slice(0, count).map(([code, sign], index) => ({
    rank: `${index + 1}位`,
    signCode: code,
    sign,
    description: `今日の運勢 ${index + 1}`
  }));
}

export function makeRankedItems(count: number = 12): RankedItem[] {
  return SIGNS.slice(0, count).map(([, sourceSign, sign], index) => ({
    rank: `${index + 1}`,
    sourceSign,
    sign,
    description: `Fortune ${index + 1}`
  }));
}

export function makeSchedule(guildId: string, overrides: Partial<GuildSchedule> = {}): GuildSchedule {
  return { ...createDefaultSchedule(guildId), ...overrides };
}

export class MemoryConfigStore implements ConfigStore {
  private snapshot: GuildSchedule[];
  public saveCount = 0;
  public failNextSaves = 0;

  constructor(initial: GuildSchedule[] = []) {
    this.snapshot = initial.map(schedule => ({ ...schedule }));
  }

  async loadAll(): Promise<GuildSchedule[]> {
    return this.snapshot.map(schedule => ({ ...schedule }));
  }

  async saveAll(schedules: GuildSchedule[]): Promise<void> {
    if (this.failNextSaves > 0) {
      this.failNextSaves--;
      throw new Error('disk full');
    }
    this.saveCount++;
    this.snapshot = schedules.map(schedule => ({ ...schedule }));
  }

  saved(guildId: string): GuildSchedule | undefined {
    return this.snapshot.find(schedule => schedule.guildId === guildId);
  }
}

export class CountingSourceFetcher implements SourceFetcher {
  public calls = 0;

  constructor(private items: RawItem[] = makeRawItems(), private failWith?: Error) {}

  async fetchToday(): Promise<RawItem[]> {
    this.calls++;
    if (this.failWith) {
      throw this.failWith;
    }
    return this.items.map(item => ({ ...item }));
  }
}

export class FakeTranslator {
  public calls: Array<{ items: RawItem[]; apiKey: string }> = [];
  private queue: Array<Result<RankedItem[]>> = [];

  constructor(private fallback: Result<RankedItem[]> = { ok: true, value: makeRankedItems() }) {}

  respondWith(...results: Array<Result<RankedItem[]>>): this {
    this.queue.push(...results);
    return this;
  }

  async translate(items: RawItem[], apiKey: string): Promise<Result<RankedItem[]>> {
    this.calls.push({ items, apiKey });
    return this.queue.shift() ?? this.fallback;
  }
}

export interface PublishCall {
  channelId: string;
  items: RankedItem[];
  announcement: string | null;
  day: string;
}

export class RecordingPublisher implements Publisher {
  public placeholders: Array<{ channelId: string; announcement: string | null }> = [];
  public published: PublishCall[] = [];
  public failures: Array<{ channelId: string; message: string }> = [];
  /** Placeholder each publish or failure notice replaced, null when it posted a new message */
  public replaced: Array<string | null> = [];
  public placeholderError?: Error;
  public publishError?: Error;

  async postPlaceholder(channelId: string, announcement: string | null): Promise<string> {
    if (this.placeholderError) {
      throw this.placeholderError;
    }
    this.placeholders.push({ channelId, announcement });
    return `placeholder-${this.placeholders.length}`;
  }

  async publish(
    channelId: string,
    items: RankedItem[],
    announcement: string | null,
    day: string,
    placeholderId: string | null = null
  ): Promise<void> {
    if (this.publishError) {
      throw this.publishError;
    }
    this.published.push({ channelId, items, announcement, day });
    this.replaced.push(placeholderId);
  }

  async reportFailure(channelId: string, message: string, placeholderId: string | null = null): Promise<void> {
    this.failures.push({ channelId, message });
    this.replaced.push(placeholderId);
  }
}

export class FixedClock implements Clock {
  constructor(private current: Date) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = date;
  }
}

/**
 * A promise whose resolution the test controls
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Let queued promise callbacks run
 */
export async function flushPromises(rounds: number = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}

export function utc(year: number, month: number, day: number, hour: number, minute: number, second: number = 0): Date {
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}
