import chalk from 'chalk';
import Table from 'cli-table3';
import { createStorageSource } from '../lib/source-factory';
import { truncate } from '../utils/format-utils';

export interface ImagesOptions {
  directory?: string;
  limit?: number;
}

export async function imagesCommand(keyword: string | undefined, options: ImagesOptions): Promise<void> {
  const { service } = await createStorageSource({ directory: options.directory });

  await service.setup();
  const state = await service.updateState();
  if (state.state !== 'ready') {
    const holder = await service.noImagesHolder();
    console.log(chalk.yellow(holder.error ?? 'No images available'));
    return;
  }

  const images = keyword ? await service.getImagesFor(keyword) : await service.getImages();
  if (images.length === 0) {
    console.log(chalk.yellow(keyword ? `No images found for "${keyword}".` : 'No images found.'));
    return;
  }

  const limit = options.limit && options.limit > 0 ? options.limit : 20;
  const table = new Table({
    head: ['#', 'FILE', 'TYPE', 'ID'],
    colWidths: [6, 50, 14, 34],
  });

  images.slice(0, limit).forEach((image, index) => {
    table.push([
      (index + 1).toString(),
      truncate(image.filename ?? '-', 48),
      image.mimetype ?? chalk.dim('unknown'),
      image.id ?? '-',
    ]);
  });

  console.log(table.toString());
  console.log(chalk.dim(`\nSelected ${images.length} image(s)${images.length > limit ? `, showing ${limit}` : ''}`));
}
