/**
 * Configuration Management Module
 *
 * Defaults, then an optional YAML file, then environment variables
 * (a `.env` file in the working directory is loaded first).
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import yaml from 'js-yaml';
import { assertTimezone, defaultTimezone } from '../clock';
import { LogLevelName } from '../types';

export interface DiscordConfig {
  botToken: string;
  apiBaseUrl: string;
}

export interface StorageConfig {
  guildConfigPath: string;
}

export interface SchedulerConfig {
  tickSeconds: number;
  timezone: string;
  maxConcurrentDispatches: number;
  shutdownGraceMs: number;
}

export interface TranslationConfig {
  endpoint: string;
  model: string;
  targetLanguage: string;
  maxAttempts: number;
  retryDelayMs: number;
  timeoutMs: number;
}

export interface SourceConfig {
  url: string;
  refererUrl: string;
  timeoutMs: number;
}

export interface AdminConfig {
  enabled: boolean;
  port: number;
  /** Bearer token every /guilds request must carry */
  token: string;
}

export interface RelayConfig {
  discord: DiscordConfig;
  storage: StorageConfig;
  scheduler: SchedulerConfig;
  translation: TranslationConfig;
  source: SourceConfig;
  admin: AdminConfig;
  logLevel: LogLevelName;
}

export type RelayConfigOverrides = {
  [K in keyof RelayConfig]?: RelayConfig[K] extends object ? Partial<RelayConfig[K]> : RelayConfig[K];
};

export const DEFAULT_CONFIG_PATH = './config/relay.yaml';

export function defaultConfig(): RelayConfig {
  return {
    discord: {
      botToken: '',
      apiBaseUrl: 'https://discord.com/api/v10'
    },
    storage: {
      guildConfigPath: 'guild_config.json'
    },
    scheduler: {
      tickSeconds: 30,
      timezone: defaultTimezone(),
      maxConcurrentDispatches: 5,
      shutdownGraceMs: 10000
    },
    translation: {
      endpoint: 'https://generativelanguage.googleapis.com/v1beta',
      model: 'gemini-2.5-flash',
      targetLanguage: 'Korean',
      maxAttempts: 3,
      retryDelayMs: 1000,
      timeoutMs: 60000
    },
    source: {
      url: 'https://www.asahi.co.jp/data/ohaasa2020/horoscope.json',
      refererUrl: 'https://www.asahi.co.jp/ohaasa/week/horoscope/',
      timeoutMs: 15000
    },
    admin: {
      enabled: false,
      port: 8080,
      token: ''
    },
    logLevel: 'info'
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const lower = value.toLowerCase();
  return lower === 'true' || lower === '1' || lower === 'yes';
}

function isLogLevel(value: unknown): value is LogLevelName {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function pickString(patch: Record<string, unknown>, key: string, fallback: string): string {
  const value = patch[key];
  return typeof value === 'string' ? value : fallback;
}

function pickNumber(patch: Record<string, unknown>, key: string, fallback: number): number {
  const value = patch[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickBoolean(patch: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = patch[key];
  return typeof value === 'boolean' ? value : fallback;
}

/**
 * Overlay a partial document on a full config; values of the wrong type are ignored
 */
function applyPatch(base: RelayConfig, patch: Record<string, unknown>): RelayConfig {
  const discord: Record<string, unknown> = isRecord(patch.discord) ? patch.discord : {};
  const storage: Record<string, unknown> = isRecord(patch.storage) ? patch.storage : {};
  const scheduler: Record<string, unknown> = isRecord(patch.scheduler) ? patch.scheduler : {};
  const translation: Record<string, unknown> = isRecord(patch.translation) ? patch.translation : {};
  const source: Record<string, unknown> = isRecord(patch.source) ? patch.source : {};
  const admin: Record<string, unknown> = isRecord(patch.admin) ? patch.admin : {};

  return {
    discord: {
      botToken: pickString(discord, 'botToken', base.discord.botToken),
      apiBaseUrl: pickString(discord, 'apiBaseUrl', base.discord.apiBaseUrl)
    },
    storage: {
      guildConfigPath: pickString(storage, 'guildConfigPath', base.storage.guildConfigPath)
    },
    scheduler: {
      tickSeconds: pickNumber(scheduler, 'tickSeconds', base.scheduler.tickSeconds),
      timezone: pickString(scheduler, 'timezone', base.scheduler.timezone),
      maxConcurrentDispatches: pickNumber(scheduler, 'maxConcurrentDispatches', base.scheduler.maxConcurrentDispatches),
      shutdownGraceMs: pickNumber(scheduler, 'shutdownGraceMs', base.scheduler.shutdownGraceMs)
    },
    translation: {
      endpoint: pickString(translation, 'endpoint', base.translation.endpoint),
      model: pickString(translation, 'model', base.translation.model),
      targetLanguage: pickString(translation, 'targetLanguage', base.translation.targetLanguage),
      maxAttempts: pickNumber(translation, 'maxAttempts', base.translation.maxAttempts),
      retryDelayMs: pickNumber(translation, 'retryDelayMs', base.translation.retryDelayMs),
      timeoutMs: pickNumber(translation, 'timeoutMs', base.translation.timeoutMs)
    },
    source: {
      url: pickString(source, 'url', base.source.url),
      refererUrl: pickString(source, 'refererUrl', base.source.refererUrl),
      timeoutMs: pickNumber(source, 'timeoutMs', base.source.timeoutMs)
    },
    admin: {
      enabled: pickBoolean(admin, 'enabled', base.admin.enabled),
      port: pickNumber(admin, 'port', base.admin.port),
      token: pickString(admin, 'token', base.admin.token)
    },
    logLevel: isLogLevel(patch.logLevel) ? patch.logLevel : base.logLevel
  };
}

export class ConfigManager {
  private config: RelayConfig;
  private configPath: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: { configPath?: string; env?: NodeJS.ProcessEnv; loadDotenv?: boolean } = {}) {
    if (options.loadDotenv ?? true) {
      dotenv.config();
    }
    this.env = options.env ?? process.env;
    this.configPath = options.configPath || this.env.RELAY_CONFIG_PATH || DEFAULT_CONFIG_PATH;
    this.config = defaultConfig();
    this.loadConfig();
  }

  getConfig(): RelayConfig {
    return structuredClone(this.config);
  }

  getSchedulerConfig(): SchedulerConfig {
    return { ...this.config.scheduler };
  }

  getTranslationConfig(): TranslationConfig {
    return { ...this.config.translation };
  }

  updateConfig(updates: RelayConfigOverrides): void {
    this.config = applyPatch(this.config, { ...updates });
  }

  /**
   * Problems that prevent the service from running, empty when valid
   */
  validate(options: { requireBotToken?: boolean } = {}): string[] {
    const errors: string[] = [];
    const { scheduler, translation, source, admin, discord } = this.config;

    if (options.requireBotToken && !discord.botToken) {
      errors.push('DISCORD_BOT_TOKEN is required');
    }

    if (!Number.isInteger(scheduler.tickSeconds) || scheduler.tickSeconds < 1 || scheduler.tickSeconds > 59) {
      errors.push('scheduler.tickSeconds must be an integer between 1 and 59');
    }

    try {
      assertTimezone(scheduler.timezone);
    } catch {
      errors.push(`scheduler.timezone is not a valid IANA timezone: ${scheduler.timezone}`);
    }

    if (scheduler.maxConcurrentDispatches < 1) {
      errors.push('scheduler.maxConcurrentDispatches must be at least 1');
    }

    if (translation.maxAttempts < 1) {
      errors.push('translation.maxAttempts must be at least 1');
    }

    if (translation.retryDelayMs < 0) {
      errors.push('translation.retryDelayMs must not be negative');
    }

    if (!translation.endpoint || !translation.model) {
      errors.push('translation.endpoint and translation.model are required');
    }

    if (!source.url) {
      errors.push('source.url is required');
    }

    if (admin.enabled && (admin.port < 0 || admin.port > 65535)) {
      errors.push('admin.port must be between 0 and 65535');
    }

    if (admin.enabled && !admin.token) {
      errors.push('ADMIN_TOKEN is required when the admin service is enabled');
    }

    return errors;
  }

  private loadConfig(): void {
    const fileConfig = this.loadFileConfig();
    if (fileConfig) {
      this.config = applyPatch(this.config, fileConfig);
    }
    this.applyEnvironmentOverrides();
  }

  /**
   * Load the YAML file; a missing file is not an error, an unreadable one is
   */
  private loadFileConfig(): Record<string, unknown> | null {
    const resolved = path.resolve(this.configPath);
    if (!fs.existsSync(resolved)) {
      return null;
    }

    const parsed = yaml.load(fs.readFileSync(resolved, 'utf-8'));
    if (parsed === undefined || parsed === null) {
      return null;
    }
    if (!isRecord(parsed)) {
      throw new Error(`Configuration file ${resolved} must contain a mapping`);
    }
    return parsed;
  }

  private applyEnvironmentOverrides(): void {
    const env = this.env;
    const config = this.config;

    if (env.DISCORD_BOT_TOKEN) {
      config.discord.botToken = env.DISCORD_BOT_TOKEN;
    }
    if (env.DISCORD_API_BASE_URL) {
      config.discord.apiBaseUrl = env.DISCORD_API_BASE_URL;
    }
    if (env.GUILD_CONFIG_PATH) {
      config.storage.guildConfigPath = env.GUILD_CONFIG_PATH;
    }

    const tickSeconds = parseInteger(env.RELAY_TICK_SECONDS);
    if (tickSeconds !== undefined) {
      config.scheduler.tickSeconds = tickSeconds;
    }
    if (env.RELAY_TIMEZONE) {
      config.scheduler.timezone = env.RELAY_TIMEZONE;
    }
    const maxConcurrent = parseInteger(env.RELAY_MAX_CONCURRENT_DISPATCHES);
    if (maxConcurrent !== undefined) {
      config.scheduler.maxConcurrentDispatches = maxConcurrent;
    }

    if (env.GEMINI_API_URL) {
      config.translation.endpoint = env.GEMINI_API_URL;
    }
    if (env.GEMINI_MODEL) {
      config.translation.model = env.GEMINI_MODEL;
    }
    if (env.TRANSLATION_TARGET_LANGUAGE) {
      config.translation.targetLanguage = env.TRANSLATION_TARGET_LANGUAGE;
    }
    const maxAttempts = parseInteger(env.TRANSLATION_MAX_ATTEMPTS);
    if (maxAttempts !== undefined) {
      config.translation.maxAttempts = maxAttempts;
    }

    if (env.SOURCE_URL) {
      config.source.url = env.SOURCE_URL;
    }

    const adminEnabled = parseBoolean(env.ADMIN_ENABLED);
    if (adminEnabled !== undefined) {
      config.admin.enabled = adminEnabled;
    }
    const adminPort = parseInteger(env.ADMIN_PORT ?? env.PORT);
    if (adminPort !== undefined) {
      config.admin.port = adminPort;
    }
    if (env.ADMIN_TOKEN) {
      config.admin.token = env.ADMIN_TOKEN;
    }

    if (isLogLevel(env.LOG_LEVEL)) {
      config.logLevel = env.LOG_LEVEL;
    }
  }
}
