/**
 * Scheduler Module
 *
 * A node-cron job ticks every few seconds. On each tick every guild whose
 * post time equals the current minute, and which has not been served today,
 * gets its day marker persisted and a dispatch queued.
 */

import * as cron from 'node-cron';
import { EventEmitter } from 'events';
import { GuildSchedule } from '../types';
import { RelayErrorType, toRelayError } from '../error-handling';
import { RelayLogger, createModuleLogger } from '../logger';
import { Clock, WallClock, formatPostTime, systemClock, toWallClock } from '../clock';

export interface ScheduleRegistry {
  list(): GuildSchedule[];
  get(guildId: string): GuildSchedule | undefined;
  mutate<T>(guildId: string, fn: (draft: GuildSchedule) => T): Promise<{ schedule: GuildSchedule; result: T }>;
}

export interface DispatchQueue {
  submit(guildId: string, schedule: GuildSchedule, trigger: 'scheduled', day: string): void;
}

export interface SchedulerOptions {
  registry: ScheduleRegistry;
  dispatcher: DispatchQueue;
  timezone: string;
  tickSeconds?: number;
  clock?: Clock;
  logger?: RelayLogger;
}

export type SkipReason = 'unconfigured' | 'already-dispatched' | 'not-due';

export interface TickResult {
  at: WallClock;
  dispatched: string[];
  failed: string[];
}

export interface SchedulerStatus {
  isRunning: boolean;
  tickSeconds: number;
  timezone: string;
  lastTick: Date | null;
  tickCount: number;
  dispatchCount: number;
  skippedTicks: number;
}

/**
 * Why a guild is not dispatched at `now`, or null when it is due
 */
export function evaluateGuild(schedule: GuildSchedule, now: WallClock): SkipReason | null {
  if (!schedule.channelId || !schedule.apiKey) {
    return 'unconfigured';
  }
  if (schedule.lastPostDate === now.day) {
    return 'already-dispatched';
  }
  if (schedule.postHour !== now.hour || schedule.postMinute !== now.minute) {
    return 'not-due';
  }
  return null;
}

export class SchedulerLoop extends EventEmitter {
  private readonly registry: ScheduleRegistry;
  private readonly dispatcher: DispatchQueue;
  private readonly timezone: string;
  private readonly tickSeconds: number;
  private readonly clock: Clock;
  private readonly logger: RelayLogger;
  private job: cron.ScheduledTask | null = null;
  private ticking = false;
  private lastTick: Date | null = null;
  private tickCount = 0;
  private dispatchCount = 0;
  private skippedTicks = 0;

  constructor(options: SchedulerOptions) {
    super();
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.timezone = options.timezone;
    this.tickSeconds = options.tickSeconds ?? 30;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createModuleLogger('scheduler');
  }

  get cronExpression(): string {
    return `*/${this.tickSeconds} * * * * *`;
  }

  start(): void {
    if (this.job) {
      this.logger.warn('Scheduler is already running');
      return;
    }

    if (!cron.validate(this.cronExpression)) {
      throw new Error(`Invalid tick interval: ${this.tickSeconds} seconds`);
    }

    this.job = cron.schedule(
      this.cronExpression,
      () => {
        void this.runGuardedTick();
      },
      { scheduled: true, timezone: this.timezone }
    );

    this.emit('schedulerStarted');
    this.logger.info(`Scheduler started, ticking every ${this.tickSeconds}s`, { timezone: this.timezone });
  }

  stop(): void {
    if (!this.job) {
      return;
    }
    this.job.stop();
    this.job = null;
    this.emit('schedulerStopped');
    this.logger.info('Scheduler stopped');
  }

  getStatus(): SchedulerStatus {
    return {
      isRunning: this.job !== null,
      tickSeconds: this.tickSeconds,
      timezone: this.timezone,
      lastTick: this.lastTick,
      tickCount: this.tickCount,
      dispatchCount: this.dispatchCount,
      skippedTicks: this.skippedTicks
    };
  }

  /**
   * Evaluate every guild once against a single reading of the clock
   */
  async tick(now: Date = this.clock.now()): Promise<TickResult> {
    const at = toWallClock(now, this.timezone);
    const result: TickResult = { at, dispatched: [], failed: [] };
    this.lastTick = now;
    this.tickCount++;

    for (const schedule of this.registry.list()) {
      try {
        if (await this.evaluateAndDispatch(schedule.guildId, at)) {
          result.dispatched.push(schedule.guildId);
        }
      } catch (error) {
        const relayError = toRelayError(error, RelayErrorType.PERSISTENCE_FAILURE);
        result.failed.push(schedule.guildId);
        this.logger.error('Guild evaluation failed, dispatch aborted', relayError, {
          guildId: schedule.guildId,
          day: at.day
        });
        this.emit('dispatchAborted', schedule.guildId, relayError);
      }
    }

    return result;
  }

  private async evaluateAndDispatch(guildId: string, at: WallClock): Promise<boolean> {
    const current = this.registry.get(guildId);
    if (!current || evaluateGuild(current, at) !== null) {
      return false;
    }

    // re-checked inside the mutation so a concurrent claim for the same day wins once
    const { schedule, result: claimed } = await this.registry.mutate(guildId, draft => {
      if (evaluateGuild(draft, at) !== null) {
        return false;
      }
      draft.lastPostDate = at.day;
      return true;
    });

    if (!claimed) {
      return false;
    }

    this.logger.info('Scheduled dispatch triggered', {
      guildId,
      channelId: schedule.channelId,
      day: at.day,
      time: formatPostTime(at.hour, at.minute)
    });
    this.dispatcher.submit(guildId, schedule, 'scheduled', at.day);
    this.dispatchCount++;
    this.emit('dispatchScheduled', guildId, at.day);
    return true;
  }

  /**
   * Tick unless the previous one is still running; resolves null when skipped
   */
  async runGuardedTick(): Promise<TickResult | null> {
    if (this.ticking) {
      this.skippedTicks++;
      this.logger.warn('Previous tick still running, skipping this one');
      return null;
    }

    this.ticking = true;
    try {
      return await this.tick();
    } catch (error) {
      this.logger.error('Scheduler tick failed', error instanceof Error ? error : new Error(String(error)));
      return null;
    } finally {
      this.ticking = false;
    }
  }
}
