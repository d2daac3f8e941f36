import chalk from 'chalk';
import { createStorageSource } from '../lib/source-factory';
import { SourceMessage } from '../types/source-state';

function colorFor(level: SourceMessage['level']): (text: string) => string {
  switch (level) {
    case 'SUCCESS':
      return chalk.green;
    case 'WARNING':
      return chalk.yellow;
    case 'ERROR':
      return chalk.red;
  }
}

export interface StatusOptions {
  directory?: string;
  verbose?: boolean;
  logFile?: boolean;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const { service } = await createStorageSource({
    directory: options.directory,
    verbose: options.verbose,
    logToFile: options.logFile,
  });

  await service.setup();
  const state = await service.updateState();

  const label = state.state === 'ready' ? chalk.green('✅ READY') : chalk.yellow('⚠️  NO IMAGES');
  console.log(`${label}${state.subState ? chalk.dim(` (${state.subState})`) : ''}`);
  console.log(chalk.dim(`Content directory: ${service.contentRoot()}`));

  const explanation = service.explainState();
  if (explanation) {
    console.log(chalk.yellow(`\n${explanation}`));
  }

  const messages = await service.getMessages();
  if (messages.length > 0) {
    console.log('');
    for (const message of messages) {
      console.log(colorFor(message.level)(message.message));
    }
  }
}
