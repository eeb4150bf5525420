/**
 * Dispatcher Module
 *
 * One end-to-end run for one guild: loading placeholder, cached ranking, then
 * publish over the placeholder. Used the same way for scheduled and manual
 * triggers; neither path touches the day marker here.
 */

import { DispatchTrigger, GuildSchedule, RankedItem } from '../types';
import { RelayError, RelayErrorType, Result, describeFailure, fail, toRelayError } from '../error-handling';
import { RelayLogger, createModuleLogger } from '../logger';
import { Clock, dayKey, systemClock } from '../clock';
import { Publisher } from '../notification';
import { TaskRunner } from './task-runner';

export interface RankingSource {
  getOrCompute(guildId: string, today: string): Promise<Result<RankedItem[]>>;
}

export interface DispatchOutcome {
  guildId: string;
  trigger: DispatchTrigger;
  day: string;
  success: boolean;
  itemCount: number;
  errorType?: RelayErrorType;
  error?: string;
  duration: number; // milliseconds
  timestamp: Date;
}

export interface DispatcherOptions {
  cache: RankingSource;
  publisher: Publisher;
  timezone: string;
  maxConcurrentDispatches?: number;
  clock?: Clock;
  logger?: RelayLogger;
  historyLimit?: number;
}

export function resolveAnnouncement(schedule: Pick<GuildSchedule, 'mentionMode' | 'mentionRoleId'>): string | null {
  switch (schedule.mentionMode) {
    case 'everyone':
      return '@everyone';
    case 'role':
      return schedule.mentionRoleId ? `<@&${schedule.mentionRoleId}>` : null;
    default:
      return null;
  }
}

export class Dispatcher {
  private readonly cache: RankingSource;
  private readonly publisher: Publisher;
  private readonly timezone: string;
  private readonly clock: Clock;
  private readonly logger: RelayLogger;
  private readonly runner: TaskRunner;
  private readonly historyLimit: number;
  private history: Map<string, DispatchOutcome[]> = new Map();

  constructor(options: DispatcherOptions) {
    this.cache = options.cache;
    this.publisher = options.publisher;
    this.timezone = options.timezone;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createModuleLogger('dispatcher');
    this.runner = new TaskRunner(options.maxConcurrentDispatches ?? 5, this.logger.createSubLogger('runner'));
    this.historyLimit = options.historyLimit ?? 10;
  }

  /**
   * Queue a dispatch and return at once; the outcome is logged and kept in history
   */
  submit(guildId: string, schedule: GuildSchedule, trigger: DispatchTrigger, day?: string): void {
    this.runner.submit(`dispatch:${guildId}:${trigger}`, async () => {
      await this.dispatch(guildId, schedule, trigger, day);
    });
  }

  /**
   * Run a dispatch to completion. Never rejects. `day` defaults to today.
   */
  async dispatch(
    guildId: string,
    schedule: GuildSchedule,
    trigger: DispatchTrigger,
    day: string = dayKey(this.clock.now(), this.timezone)
  ): Promise<DispatchOutcome> {
    const startTime = Date.now();
    const channelId = schedule.channelId;

    const finish = (items: number, error?: RelayError): DispatchOutcome => {
      const outcome: DispatchOutcome = {
        guildId,
        trigger,
        day,
        success: !error,
        itemCount: items,
        errorType: error?.type,
        error: error?.message,
        duration: Date.now() - startTime,
        timestamp: new Date()
      };
      this.record(outcome);
      return outcome;
    };

    if (!channelId) {
      const error = RelayError.destinationUnresolvable(guildId, channelId);
      this.logger.error('Dispatch skipped: no destination channel', error, { guildId, trigger });
      return finish(0, error);
    }

    this.logger.info('Dispatch started', { guildId, channelId, trigger, day });
    const announcement = resolveAnnouncement(schedule);

    let placeholderId: string | null = null;
    try {
      placeholderId = await this.publisher.postPlaceholder(channelId, announcement);
    } catch (error) {
      const relayError = toRelayError(error, RelayErrorType.PUBLISH_FAILED);
      if (relayError.type === RelayErrorType.DESTINATION_UNRESOLVABLE) {
        this.logger.error('Dispatch aborted: destination channel cannot be reached', relayError, { guildId, trigger });
        return finish(0, relayError);
      }
      this.logger.warn(`Could not post the loading message: ${relayError.message}`, { guildId, channelId });
    }

    let result: Result<RankedItem[]>;
    try {
      result = await this.cache.getOrCompute(guildId, day);
    } catch (error) {
      result = fail(toRelayError(error, RelayErrorType.TRANSLATION_UNAVAILABLE));
    }
    if (!result.ok) {
      this.logger.error('Ranking unavailable for dispatch', result.error, { guildId, trigger });
      await this.notifyFailure(channelId, result.error, guildId, placeholderId);
      return finish(0, result.error);
    }

    try {
      await this.publisher.publish(channelId, result.value, announcement, day, placeholderId);
    } catch (error) {
      const relayError = toRelayError(error, RelayErrorType.PUBLISH_FAILED);
      this.logger.error('Publishing failed', relayError, { guildId, channelId, trigger });
      if (relayError.type !== RelayErrorType.DESTINATION_UNRESOLVABLE) {
        await this.notifyFailure(channelId, relayError, guildId, null);
      }
      return finish(0, relayError);
    }

    const outcome = finish(result.value.length);
    this.logger.info('Dispatch completed', { guildId, trigger, items: outcome.itemCount, duration: outcome.duration });
    return outcome;
  }

  getHistory(guildId: string): DispatchOutcome[] {
    return [...(this.history.get(guildId) ?? [])];
  }

  getAllHistory(): Map<string, DispatchOutcome[]> {
    return new Map(Array.from(this.history, ([id, outcomes]) => [id, [...outcomes]]));
  }

  get activeCount(): number {
    return this.runner.activeCount;
  }

  get queuedCount(): number {
    return this.runner.queuedCount;
  }

  /**
   * Wait for running and queued dispatches, up to `timeoutMs`
   */
  drain(timeoutMs?: number): Promise<boolean> {
    return this.runner.onIdle(timeoutMs);
  }

  private async notifyFailure(
    channelId: string,
    error: RelayError,
    guildId: string,
    placeholderId: string | null
  ): Promise<void> {
    try {
      await this.publisher.reportFailure(channelId, describeFailure(error), placeholderId);
    } catch (notifyError) {
      this.logger.error(
        'Could not deliver the failure notice',
        notifyError instanceof Error ? notifyError : undefined,
        { guildId, channelId }
      );
    }
  }

  private record(outcome: DispatchOutcome): void {
    const history = this.history.get(outcome.guildId) ?? [];
    history.push(outcome);
    if (history.length > this.historyLimit) {
      history.shift();
    }
    this.history.set(outcome.guildId, history);
  }
}
