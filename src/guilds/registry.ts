/**
 * In-memory view of every guild's schedule, kept in step with the ConfigStore
 */

import { GuildSchedule, createDefaultSchedule } from '../system/types';
import { RelayError, errorMessage } from '../system/error-handling';
import { RelayLogger, createModuleLogger } from '../system/logger';
import { ConfigStore } from './config-store';

export class GuildScheduleRegistry {
  private schedules: Map<string, GuildSchedule> = new Map();
  private mutationChain: Promise<void> = Promise.resolve();
  private readonly store: ConfigStore;
  private readonly logger: RelayLogger;

  constructor(store: ConfigStore, logger: RelayLogger = createModuleLogger('registry')) {
    this.store = store;
    this.logger = logger;
  }

  /**
   * Replace the in-memory view with the store's contents
   */
  async load(): Promise<Map<string, GuildSchedule>> {
    const loaded = await this.store.loadAll();
    this.schedules = new Map(loaded.map(schedule => [schedule.guildId, { ...schedule }]));
    return new Map(Array.from(this.schedules, ([id, schedule]) => [id, { ...schedule }]));
  }

  get(guildId: string): GuildSchedule | undefined {
    const schedule = this.schedules.get(guildId);
    return schedule ? { ...schedule } : undefined;
  }

  /**
   * Returns the stored schedule, or the defaults a new guild would get.
   * Nothing is stored until the first mutation.
   */
  getOrCreateDefault(guildId: string): GuildSchedule {
    return this.get(guildId) ?? createDefaultSchedule(guildId);
  }

  list(): GuildSchedule[] {
    return Array.from(this.schedules.values(), schedule => ({ ...schedule }));
  }

  get size(): number {
    return this.schedules.size;
  }

  /**
   * Apply `fn` to the guild's schedule (created with defaults when absent) and
   * persist every schedule before resolving. Mutations run one at a time in call
   * order, each starting from the state the previous one committed.
   * When the save fails the change is rolled back and a PERSISTENCE_FAILURE is thrown.
   */
  mutate<T>(guildId: string, fn: (draft: GuildSchedule) => T): Promise<{ schedule: GuildSchedule; result: T }> {
    const run = this.mutationChain.then(() => this.applyAndSave(guildId, fn));
    this.mutationChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async applyAndSave<T>(
    guildId: string,
    fn: (draft: GuildSchedule) => T
  ): Promise<{ schedule: GuildSchedule; result: T }> {
    const previous = this.schedules.get(guildId);
    const draft: GuildSchedule = previous ? { ...previous } : createDefaultSchedule(guildId);
    const result = fn(draft);
    draft.guildId = guildId;

    this.schedules.set(guildId, draft);

    try {
      await this.store.saveAll(this.list());
    } catch (error) {
      if (previous) {
        this.schedules.set(guildId, previous);
      } else {
        this.schedules.delete(guildId);
      }
      this.logger.error('Failed to persist guild configuration', error instanceof Error ? error : undefined, {
        guildId
      });
      throw RelayError.persistenceFailure(`Could not save configuration for guild ${guildId}: ${errorMessage(error)}`, error);
    }

    return { schedule: { ...draft }, result };
  }
}
