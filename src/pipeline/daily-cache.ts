/**
 * Per-guild, per-day memoization of the content pipeline
 *
 * One entry per guild, valid only for the day it was stamped with. Concurrent
 * misses for the same (guild, day) share a single pipeline run.
 */

import { CacheEntry, RankedItem } from '../system/types';
import { RelayErrorType, Result, fail, toRelayError } from '../system/error-handling';
import { RelayLogger, createModuleLogger } from '../system/logger';
import { ContentProducer } from './content-pipeline';

export class DailyCache {
  private entries: Map<string, CacheEntry> = new Map();
  private inFlight: Map<string, Promise<Result<RankedItem[]>>> = new Map();

  constructor(
    private readonly producer: ContentProducer,
    private readonly logger: RelayLogger = createModuleLogger('cache')
  ) {}

  async getOrCompute(guildId: string, today: string): Promise<Result<RankedItem[]>> {
    const cached = this.entries.get(guildId);
    if (cached && cached.day === today) {
      this.logger.debug('Serving cached ranking', { guildId, day: today });
      return { ok: true, value: [...cached.items] };
    }

    const key = `${guildId}:${today}`;
    const pending = this.inFlight.get(key);
    if (pending) {
      this.logger.debug('Joining in-flight pipeline run', { guildId, day: today });
      return pending;
    }

    const run = this.compute(guildId, today).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  peek(guildId: string): CacheEntry | undefined {
    return this.entries.get(guildId);
  }

  invalidate(guildId: string): void {
    this.entries.delete(guildId);
  }

  get size(): number {
    return this.entries.size;
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  private async compute(guildId: string, today: string): Promise<Result<RankedItem[]>> {
    this.logger.info('Computing ranking for the day', { guildId, day: today });

    let result: Result<RankedItem[]>;
    try {
      result = await this.producer.produce(guildId);
    } catch (error) {
      result = fail(toRelayError(error, RelayErrorType.TRANSLATION_UNAVAILABLE));
    }

    if (!result.ok) {
      this.logger.warn(`Pipeline failed, nothing cached: ${result.error.message}`, { guildId, day: today });
      return result;
    }

    const current = this.entries.get(guildId);
    // a run for an older day must not replace a newer entry
    if (!current || current.day <= today) {
      this.entries.set(guildId, { day: today, items: [...result.value] });
    }
    return result;
  }
}
