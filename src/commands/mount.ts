import chalk from 'chalk';
import { createStorageSource } from '../lib/source-factory';
import { resolveMountRoot } from '../types/source-config';
import { getStorageUnitName } from '../types/storage-unit';

export interface MountOptions {
  verbose?: boolean;
  logFile?: boolean;
}

export async function mountCommand(options: MountOptions): Promise<void> {
  const { config, mountManager } = await createStorageSource({
    verbose: options.verbose,
    logToFile: options.logFile,
  });
  const mountRoot = resolveMountRoot(config);

  console.log(chalk.blue(`💾 Mounting storage device to ${mountRoot}...`));
  const result = await mountManager.mount(mountRoot);

  for (const attempt of result.attempts) {
    const outcome =
      attempt.outcome === 'mounted'
        ? chalk.green('mounted')
        : attempt.outcome === 'no-content'
          ? chalk.yellow(`no /${config.contentDirName}/ directory`)
          : chalk.red('failed');
    console.log(chalk.dim(`  ${attempt.device}: `) + outcome);
  }

  if (!result.success || !result.device) {
    throw new Error(result.error ?? 'Unable to mount any storage device');
  }

  console.log(chalk.green(`✅ Storage device "${getStorageUnitName(result.device)}" mounted`));
}

export async function unmountCommand(options: MountOptions): Promise<void> {
  const { config, mountManager } = await createStorageSource({
    verbose: options.verbose,
    logToFile: options.logFile,
  });
  const mountRoot = resolveMountRoot(config);

  console.log(chalk.blue(`⏏️  Unmounting ${mountRoot}...`));
  const unmounted = await mountManager.unmount(mountRoot);

  if (unmounted) {
    console.log(chalk.green('✅ Storage device unmounted'));
  } else {
    console.log(chalk.yellow(`⚠️  Nothing was mounted at ${mountRoot}`));
  }
}
