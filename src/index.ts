/**
 * Daily Ranking Relay
 */

export * from './system';
export * from './guilds/config-store';
export * from './guilds/registry';
export * from './guilds/commands';
export * from './pipeline/source-fetcher';
export * from './pipeline/translation-client';
export * from './pipeline/content-pipeline';
export * from './pipeline/daily-cache';
export * from './admin/admin-service';
