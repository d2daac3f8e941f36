import chalk from 'chalk';
import { createStorageSource } from '../lib/source-factory';

export async function keywordsListCommand(options: { directory?: string }): Promise<void> {
  const { store, registry } = await createStorageSource({ directory: options.directory });

  const stored = await store.loadKeywords();
  const active = await registry.list();

  if (stored.length === 0 && active.length === 0) {
    console.log(chalk.yellow('No keywords configured.'));
    console.log(chalk.dim('\nAdd one: usbframe keywords add <album>'));
    return;
  }

  console.log(chalk.blue('Stored keywords:'));
  stored.forEach((keyword, index) => {
    console.log(`  ${chalk.dim(`[${index}]`)} ${keyword}`);
  });

  console.log(chalk.blue('\nActive keywords:'));
  for (const keyword of active) {
    console.log(`  ${keyword}`);
  }
}

export async function keywordsAddCommand(keyword: string, options: { directory?: string }): Promise<void> {
  const { registry } = await createStorageSource({ directory: options.directory });

  const result = await registry.add(keyword);
  if (!result.valid) {
    throw new Error(result.error ?? `Invalid keyword: ${keyword}`);
  }
  console.log(chalk.green(`✅ Keyword "${result.keyword}" added`));
}

export async function keywordsRemoveCommand(index: string): Promise<void> {
  const position = parseInt(index, 10);
  if (isNaN(position)) {
    throw new Error(`Invalid index: ${index}. Use: usbframe keywords list`);
  }

  const { registry } = await createStorageSource();
  const removed = await registry.remove(position);
  if (!removed) {
    throw new Error(`No keyword at index ${position}. Use: usbframe keywords list`);
  }
  console.log(chalk.green(`✅ Keyword at index ${position} removed`));
}

export async function keywordsHelpCommand(): Promise<void> {
  const { registry } = await createStorageSource();
  console.log(registry.helpText());
}
