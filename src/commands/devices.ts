import chalk from 'chalk';
import Table from 'cli-table3';
import { DeviceDiscovery } from '../lib/device-discovery';
import { getStorageUnitName } from '../types/storage-unit';
import { formatBytes } from '../utils/format-utils';

export interface DevicesOptions {
  mounted?: boolean;
  unmounted?: boolean;
}

export async function devicesCommand(options: DevicesOptions): Promise<void> {
  if (options.mounted && options.unmounted) {
    throw new Error('Use either --mounted or --unmounted, not both');
  }

  const discovery = new DeviceDiscovery();
  const units = await discovery.enumerate({
    onlyMounted: options.mounted,
    onlyUnmounted: options.unmounted,
  });

  if (units.length === 0) {
    console.log(chalk.yellow('No USB storage devices with a supported filesystem found.'));
    return;
  }

  const table = new Table({
    head: ['DEVICE', 'NAME', 'FS', 'SIZE', 'MOUNTPOINT', 'UUID'],
  });

  for (const unit of units) {
    table.push([
      unit.device,
      getStorageUnitName(unit),
      unit.filesystem,
      formatBytes(unit.size),
      unit.mountpoint ?? chalk.dim('-'),
      unit.uuid ?? chalk.dim('-'),
    ]);
  }

  console.log(table.toString());
  console.log(chalk.dim(`\nTotal: ${units.length} partition(s), freshest first`));
}
