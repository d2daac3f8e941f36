import * as path from 'path';
import chalk from 'chalk';
import Table from 'cli-table3';
import { createStorageSource } from '../lib/source-factory';
import { formatDateShort } from '../utils/format-utils';

export async function albumsCommand(options: { directory?: string }): Promise<void> {
  const { service, cache } = await createStorageSource({ directory: options.directory });
  const contentRoot = service.contentRoot();

  console.log(chalk.blue(`📁 Albums in ${contentRoot}\n`));

  const { files, dirs } = await cache.scan(contentRoot);

  if (dirs.length === 0 && files.length === 0) {
    console.log(chalk.yellow('No albums or images found.'));
    console.log(chalk.dim(`\n${service.keywords.helpText()}`));
    return;
  }

  const table = new Table({
    head: ['ALBUM', 'IMAGES', 'MODIFIED'],
    colWidths: [40, 10, 15],
  });

  for (const dir of dirs) {
    const albumFiles = await cache.fileNames(path.join(contentRoot, dir.name));
    table.push([dir.name, albumFiles.length.toString(), formatDateShort(dir.mtimeMs)]);
  }
  if (files.length > 0) {
    table.push([chalk.dim('(root images)'), files.length.toString(), formatDateShort(files[0].mtimeMs)]);
  }

  console.log(table.toString());
  console.log(chalk.dim(`\nTotal: ${dirs.length} album(s)`));
}
