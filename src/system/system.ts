/**
 * Relay System - wires the components together and owns their lifecycle
 */

import { RelayConfig } from './config';
import { RelayLogger, defaultLogger, parseLogLevel } from './logger';
import { Clock, dayKey, systemClock } from './clock';
import { SchedulerLoop } from './scheduler';
import { Dispatcher } from './dispatcher';
import { DiscordPublisher, Publisher } from './notification';
import { ConfigStore, JsonFileConfigStore } from '../guilds/config-store';
import { GuildScheduleRegistry } from '../guilds/registry';
import { GuildCommands } from '../guilds/commands';
import { SourceFetcher, HoroscopeSourceFetcher } from '../pipeline/source-fetcher';
import { TranslationClient } from '../pipeline/translation-client';
import { ContentPipeline } from '../pipeline/content-pipeline';
import { DailyCache } from '../pipeline/daily-cache';
import { AdminService } from '../admin/admin-service';

export interface SystemDependencies {
  store?: ConfigStore;
  source?: SourceFetcher;
  translator?: Pick<TranslationClient, 'translate'>;
  publisher?: Publisher;
  clock?: Clock;
  logger?: RelayLogger;
}

export class RelaySystem {
  public readonly registry: GuildScheduleRegistry;
  public readonly cache: DailyCache;
  public readonly dispatcher: Dispatcher;
  public readonly scheduler: SchedulerLoop;
  public readonly commands: GuildCommands;
  public readonly admin: AdminService | null;

  private readonly config: RelayConfig;
  private readonly clock: Clock;
  private readonly logger: RelayLogger;
  private isStarted = false;

  constructor(config: RelayConfig, deps: SystemDependencies = {}) {
    this.config = config;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? defaultLogger;
    this.logger.setLevel(parseLogLevel(config.logLevel));

    const timezone = config.scheduler.timezone;

    this.registry = new GuildScheduleRegistry(
      deps.store ?? new JsonFileConfigStore(config.storage.guildConfigPath, this.logger.createSubLogger('config-store')),
      this.logger.createSubLogger('registry')
    );

    const translator =
      deps.translator ??
      new TranslationClient({ config: config.translation, logger: this.logger.createSubLogger('translation') });
    const source =
      deps.source ?? new HoroscopeSourceFetcher(config.source, undefined, this.logger.createSubLogger('source'));

    const pipeline = new ContentPipeline(this.registry, source, translator, this.logger.createSubLogger('pipeline'));
    this.cache = new DailyCache(pipeline, this.logger.createSubLogger('cache'));

    const publisher =
      deps.publisher ??
      new DiscordPublisher({
        botToken: config.discord.botToken,
        apiBaseUrl: config.discord.apiBaseUrl,
        sourceUrl: config.source.refererUrl,
        logger: this.logger.createSubLogger('publisher')
      });

    this.dispatcher = new Dispatcher({
      cache: this.cache,
      publisher,
      timezone,
      maxConcurrentDispatches: config.scheduler.maxConcurrentDispatches,
      clock: this.clock,
      logger: this.logger.createSubLogger('dispatcher')
    });

    this.scheduler = new SchedulerLoop({
      registry: this.registry,
      dispatcher: this.dispatcher,
      timezone,
      tickSeconds: config.scheduler.tickSeconds,
      clock: this.clock,
      logger: this.logger.createSubLogger('scheduler')
    });

    this.commands = new GuildCommands(this.registry, this.dispatcher);

    this.admin = config.admin.enabled
      ? new AdminService(
          this.commands,
          {
            scheduler: () => this.scheduler.getStatus(),
            cacheSize: () => this.cache.size,
            activeDispatches: () => this.dispatcher.activeCount,
            history: () => this.dispatcher.getAllHistory()
          },
          { port: config.admin.port, token: config.admin.token },
          this.logger.createSubLogger('admin')
        )
      : null;
  }

  /**
   * Load guild configuration without starting anything
   */
  async init(): Promise<void> {
    await this.registry.load();
  }

  async start(): Promise<void> {
    if (this.isStarted) {
      this.logger.warn('Relay is already started');
      return;
    }

    await this.init();
    this.logger.info(`Loaded ${this.registry.size} guild(s)`);

    this.warmUp();
    this.scheduler.start();
    if (this.admin) {
      await this.admin.start();
    }

    this.isStarted = true;
    this.logger.info('Relay started');
  }

  /**
   * Stop ticking, then give running dispatches up to the grace period
   */
  async stop(): Promise<void> {
    if (!this.isStarted) {
      return;
    }
    this.isStarted = false;

    this.scheduler.stop();
    if (this.admin) {
      await this.admin.stop();
    }

    const drained = await this.dispatcher.drain(this.config.scheduler.shutdownGraceMs);
    if (!drained) {
      this.logger.warn('Shutdown grace period elapsed with dispatches still running');
    }
    this.logger.info('Relay stopped');
  }

  get started(): boolean {
    return this.isStarted;
  }

  /**
   * Prefetch today's ranking for every guild that has a key
   */
  private warmUp(): void {
    const today = dayKey(this.clock.now(), this.config.scheduler.timezone);
    for (const schedule of this.registry.list()) {
      if (!schedule.apiKey) {
        continue;
      }
      this.cache.getOrCompute(schedule.guildId, today).then(
        result => {
          if (!result.ok) {
            this.logger.warn(`Warm-up failed for guild ${schedule.guildId}: ${result.error.message}`);
          }
        },
        (error: unknown) => {
          this.logger.error('Warm-up crashed', error instanceof Error ? error : undefined, {
            guildId: schedule.guildId
          });
        }
      );
    }
  }
}
