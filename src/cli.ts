#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { devicesCommand } from './commands/devices';
import { mountCommand, unmountCommand } from './commands/mount';
import { statusCommand } from './commands/status';
import { albumsCommand } from './commands/albums';
import {
  keywordsListCommand,
  keywordsAddCommand,
  keywordsRemoveCommand,
  keywordsHelpCommand,
} from './commands/keywords';
import { imagesCommand } from './commands/images';
import { configShowCommand, configSetCommand } from './commands/config';
import { describeError } from './utils/logger';

const program = new Command();

function run<Args extends unknown[]>(action: (...args: Args) => Promise<void>): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await action(...args);
    } catch (error) {
      console.error(chalk.red('❌ Error:'), describeError(error));
      process.exit(1);
    }
  };
}

program
  .name('usbframe')
  .description('Photo frame source for USB storage devices')
  .version('1.0.0');

// List candidate partitions
program
  .command('devices')
  .description('List USB partitions with a supported filesystem')
  .option('--mounted', 'Only mounted partitions')
  .option('--unmounted', 'Only unmounted partitions')
  .action(run(async (options: { mounted?: boolean; unmounted?: boolean }) => {
    await devicesCommand(options);
  }));

// Mount the freshest device
program
  .command('mount')
  .description('Mount the freshest USB device that contains the content directory')
  .option('-v, --verbose', 'Show debug output')
  .option('--log-file', 'Also append log entries to ~/.usbframe/logs/usbframe.log')
  .action(run(async (options: { verbose?: boolean; logFile?: boolean }) => {
    await mountCommand(options);
  }));

// Unmount
program
  .command('unmount')
  .description('Unmount the mount root')
  .option('-v, --verbose', 'Show debug output')
  .option('--log-file', 'Also append log entries to ~/.usbframe/logs/usbframe.log')
  .action(run(async (options: { verbose?: boolean; logFile?: boolean }) => {
    await unmountCommand(options);
  }));

// Source state
program
  .command('status')
  .description('Show the state of the photo source')
  .option('-d, --directory <path>', 'Use a directory instead of a USB device')
  .option('-v, --verbose', 'Show debug output')
  .option('--log-file', 'Also append log entries to ~/.usbframe/logs/usbframe.log')
  .action(run(async (options: { directory?: string; verbose?: boolean; logFile?: boolean }) => {
    await statusCommand(options);
  }));

// Albums
program
  .command('albums')
  .description('List albums in the content directory')
  .option('-d, --directory <path>', 'Use a directory instead of a USB device')
  .action(run(async (options: { directory?: string }) => {
    await albumsCommand(options);
  }));

// Keywords
const keywords = program
  .command('keywords')
  .description('Manage album keywords');

keywords
  .command('list', { isDefault: true })
  .description('Show stored and active keywords')
  .option('-d, --directory <path>', 'Use a directory instead of a USB device')
  .action(run(async (options: { directory?: string }) => {
    await keywordsListCommand(options);
  }));

keywords
  .command('add')
  .description('Add an album keyword (case-sensitive)')
  .argument('<keyword>', 'Album name, ALLALBUMS or _PHOTOFRAME_')
  .option('-d, --directory <path>', 'Use a directory instead of a USB device')
  .action(run(async (keyword: string, options: { directory?: string }) => {
    await keywordsAddCommand(keyword, options);
  }));

keywords
  .command('remove')
  .description('Remove a stored keyword by index')
  .argument('<index>', 'Index shown by "keywords list"')
  .action(run(async (index: string) => {
    await keywordsRemoveCommand(index);
  }));

keywords
  .command('help')
  .description('Explain how albums map to keywords')
  .action(run(async () => {
    await keywordsHelpCommand();
  }));

// Image selection preview
program
  .command('images')
  .description('Preview the images selected for a keyword (or all keywords)')
  .argument('[keyword]', 'Album keyword')
  .option('-d, --directory <path>', 'Use a directory instead of a USB device')
  .option('-l, --limit <number>', 'Rows to show (default: 20)', parseInt)
  .action(run(async (keyword: string | undefined, options: { directory?: string; limit?: number }) => {
    await imagesCommand(keyword, options);
  }));

// Configuration
const config = program
  .command('config')
  .description('Show or change configuration');

config
  .command('show', { isDefault: true })
  .description('Show configuration')
  .action(run(async () => {
    await configShowCommand();
  }));

config
  .command('set')
  .description('Set a configuration value')
  .argument('<key>', 'Configuration key')
  .argument('<value>', 'New value')
  .action(run(async (key: string, value: string) => {
    await configSetCommand(key, value);
  }));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('❌ Error:'), describeError(error));
  process.exit(1);
});
