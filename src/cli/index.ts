#!/usr/bin/env node
import { Command } from 'commander';
import { handleError } from '../utils/errorHandler';
import {
  backendsCommand,
  cacheCleanCommand,
  cacheClearCommand,
  cacheStatsCommand,
  fetchCommand,
  FetchOptions,
  CacheCommandOptions,
} from './commands';

const program = new Command();

program
  .name('wallpaper-fetcher')
  .description('Fetch a random wallpaper from online sources into a local cache')
  .version('1.0.0');

program
  .command('fetch', { isDefault: true })
  .description('Download (or reuse from cache) a wallpaper and print its path')
  .option('-W, --width <pixels>', 'minimum image width')
  .option('-H, --height <pixels>', 'minimum image height')
  .option('-k, --keywords <words...>', 'search keywords (ignored by backends without keyword support)')
  .option('-b, --backend <name>', 'use only this backend')
  .option('-c, --config <path>', 'path to a config file')
  .action(async (options: FetchOptions) => {
    try {
      console.log(await fetchCommand(options));
    } catch (error) {
      handleError(error, 'fetch');
      process.exit(1);
    }
  });

program
  .command('backends')
  .description('List available backends')
  .action(() => {
    for (const line of backendsCommand()) {
      console.log(line);
    }
  });

const cache = program
  .command('cache')
  .description('Inspect or prune the image cache');

cache
  .command('stats')
  .option('-c, --config <path>', 'path to a config file')
  .action(async (options: CacheCommandOptions) => {
    try {
      console.log(await cacheStatsCommand(options));
    } catch (error) {
      handleError(error, 'cache stats');
      process.exit(1);
    }
  });

cache
  .command('clean')
  .description('Remove files older than --max-age seconds (defaults to the configured TTL)')
  .option('--max-age <seconds>', 'maximum age in seconds')
  .option('-c, --config <path>', 'path to a config file')
  .action(async (options: CacheCommandOptions) => {
    try {
      console.log(`Removed ${await cacheCleanCommand(options)} files`);
    } catch (error) {
      handleError(error, 'cache clean');
      process.exit(1);
    }
  });

cache
  .command('clear')
  .description('Remove every cached file')
  .option('-c, --config <path>', 'path to a config file')
  .action(async (options: CacheCommandOptions) => {
    try {
      console.log(`Removed ${await cacheClearCommand(options)} files`);
    } catch (error) {
      handleError(error, 'cache clear');
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  handleError(error, 'cli');
  process.exit(1);
});
