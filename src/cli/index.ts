#!/usr/bin/env node

/**
 * Command line entry point
 */

import { Command } from 'commander';
import { Table } from 'console-table-printer';
import chalk from 'chalk';
import { ConfigManager } from '../system/config';
import { RelaySystem } from '../system/system';
import { summarizeGuild } from '../guilds/commands';
import { errorMessage } from '../system/error-handling';

const program = new Command();

program
  .name('ranking-relay')
  .description('Posts the translated daily zodiac ranking to Discord guilds')
  .version('1.0.0')
  .option('-c, --config <path>', 'YAML configuration file');

function loadConfig(requireBotToken: boolean): ConfigManager {
  const options = program.opts<{ config?: string }>();
  const manager = new ConfigManager({ configPath: options.config });
  const errors = manager.validate({ requireBotToken });
  if (errors.length > 0) {
    console.error(chalk.red('Invalid configuration:'));
    errors.forEach(error => console.error(chalk.red(`  - ${error}`)));
    process.exit(1);
  }
  return manager;
}

program
  .command('start')
  .description('Run the scheduler (and the admin API when enabled)')
  .action(async () => {
    const system = new RelaySystem(loadConfig(true).getConfig());

    let stopping = false;
    const shutdown = (signal: string): void => {
      if (stopping) {
        return;
      }
      stopping = true;
      console.log(chalk.yellow(`${signal} received, shutting down...`));
      system.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error(chalk.red('Shutdown failed:'), errorMessage(error));
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    await system.start();
    console.log(chalk.green('✓ Relay running'));
  });

program
  .command('guilds')
  .description('List configured guilds')
  .option('-j, --json', 'Print JSON')
  .action(async (options: { json?: boolean }) => {
    const system = new RelaySystem(loadConfig(false).getConfig());
    await system.init();

    const guilds = system.registry.list().map(summarizeGuild);
    if (options.json) {
      console.log(JSON.stringify(guilds, null, 2));
      return;
    }

    if (guilds.length === 0) {
      console.log(chalk.yellow('No guilds configured yet'));
      return;
    }

    const table = new Table({
      columns: [
        { name: 'guildId', title: 'Guild', alignment: 'left' },
        { name: 'channel', title: 'Channel', alignment: 'left' },
        { name: 'postTime', title: 'Time', alignment: 'center' },
        { name: 'apiKey', title: 'API key', alignment: 'left' },
        { name: 'mention', title: 'Mention', alignment: 'left' },
        { name: 'lastPostDate', title: 'Last post', alignment: 'center' }
      ]
    });
    for (const guild of guilds) {
      table.addRow({
        ...guild,
        channel: guild.channel ?? chalk.gray('not set'),
        apiKey: guild.apiKey || chalk.red('missing'),
        lastPostDate: guild.lastPostDate ?? '-'
      });
    }
    table.printTable();
  });

program
  .command('test <guildId>')
  .description("Post today's ranking to a guild now, ignoring the daily limit")
  .action(async (guildId: string) => {
    const system = new RelaySystem(loadConfig(true).getConfig());
    await system.init();

    const schedule = system.registry.get(guildId);
    if (!schedule) {
      console.error(chalk.red(`Guild ${guildId} is not configured`));
      process.exit(1);
    }

    console.log(chalk.blue(`Posting to guild ${guildId}...`));
    const outcome = await system.dispatcher.dispatch(guildId, schedule, 'manual');
    if (outcome.success) {
      console.log(chalk.green(`✓ Posted ${outcome.itemCount} entries in ${outcome.duration}ms`));
      return;
    }

    console.error(chalk.red(`✗ ${outcome.error ?? 'Dispatch failed'}`));
    process.exit(1);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('✗'), errorMessage(error));
  process.exit(1);
});
