// Configuration management command

import chalk from 'chalk';
import { getConfigFile } from '../../utils/app-paths.js';
import { loadConfig, setConfigValue, getConfigValue } from '../../utils/config.js';
import { log } from '../../utils/index.js';

export async function configCommand(options: {
  set?: string;
  get?: string;
  list?: boolean;
}): Promise<void> {
  if (options.list) {
    const config = await loadConfig();
    log.info(chalk.bold('\nConfiguration:') + chalk.gray(` (${getConfigFile()})`));
    log.info(JSON.stringify(config, null, 2));
    log.newline();
    return;
  }

  if (options.get) {
    const value = await getConfigValue(options.get);
    if (value !== undefined) {
      log.info(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
    } else {
      log.info(chalk.yellow(`Key not found: ${options.get}`));
    }
    return;
  }

  if (options.set) {
    const eqIndex = options.set.indexOf('=');
    if (eqIndex === -1) {
      throw new Error('Invalid format. Use: --set key=value');
    }

    const key = options.set.slice(0, eqIndex);
    const value = options.set.slice(eqIndex + 1);

    await setConfigValue(key, value);
    log.info(chalk.green(`✓ Set ${key} = ${value}`));
    return;
  }

  log.info(chalk.yellow('Use --set, --get, or --list'));
  log.info(chalk.gray('Examples:'));
  log.info(chalk.gray('  pinned-region config --list'));
  log.info(chalk.gray('  pinned-region config --get region.height'));
  log.info(chalk.gray('  pinned-region config --set region.height=4'));
}
