// Configuration management command

import chalk from 'chalk';
import { loadConfig, setConfigValue, getConfigValue } from '../../utils/config.js';
import { HandledError } from '../../utils/error-handler.js';

export type Writer = (line: string) => void;

const stdoutWriter: Writer = line => {
  process.stdout.write(line + '\n');
};

export async function configCommand(
  options: { set?: string; get?: string; list?: boolean },
  write: Writer = stdoutWriter
): Promise<void> {
  if (options.list) {
    write(JSON.stringify(await loadConfig(), null, 2));
    return;
  }

  if (options.get) {
    const value = await getConfigValue(options.get);
    if (value === undefined) {
      throw new HandledError(`Key not found: ${options.get}`, 'config');
    }
    write(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
    return;
  }

  if (options.set) {
    const eqIndex = options.set.indexOf('=');
    if (eqIndex === -1) {
      throw new HandledError('Invalid format. Use: --set key=value', 'config');
    }

    const key = options.set.slice(0, eqIndex);
    const value = options.set.slice(eqIndex + 1);

    await setConfigValue(key, value);
    write(chalk.green(`✓ Set ${key} = ${value}`));
    return;
  }

  write(chalk.yellow('Use --set, --get, or --list'));
  write(chalk.gray('Examples:'));
  write(chalk.gray('  threadpack config --list'));
  write(chalk.gray('  threadpack config --get context.defaultModel'));
  write(chalk.gray('  threadpack config --set context.safetyMarginPercent=5'));
}
