import chalk from 'chalk';
import Table from 'cli-table3';
import { ConfigStore, CONFIG_KEYS, parseConfigValue } from '../lib/config-store';
import { resolveMountRoot } from '../types/source-config';

export async function configShowCommand(): Promise<void> {
  const store = new ConfigStore();
  const config = await store.loadConfig();

  const table = new Table({ head: ['KEY', 'VALUE'] });
  for (const key of CONFIG_KEYS) {
    const value = config[key];
    table.push([key, value === undefined ? chalk.dim('-') : String(value)]);
  }

  console.log(table.toString());
  console.log(chalk.dim(`\nMount root: ${resolveMountRoot(config)}`));
  console.log(chalk.dim(`Config file: ${store.getConfigPath()}`));
}

export async function configSetCommand(key: string, value: string): Promise<void> {
  const updates = parseConfigValue(key, value);
  const store = new ConfigStore();
  await store.updateConfig(updates);
  console.log(chalk.green(`✅ ${key} = ${value}`));
}
