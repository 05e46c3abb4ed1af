// Where threadpack keeps its state

import os from 'os';
import path from 'path';

export const HOME_ENV_VAR = 'THREADPACK_HOME';

/**
 * `$THREADPACK_HOME` when set, otherwise `~/.threadpack`
 */
export function getThreadpackHomeDir(): string {
  const override = process.env[HOME_ENV_VAR]?.trim();
  return override ? path.resolve(override) : path.join(os.homedir(), '.threadpack');
}

export function getConfigFilePath(): string {
  return path.join(getThreadpackHomeDir(), 'config.json');
}

/** Used when `storage.threadsDir` is not configured */
export function getDefaultThreadsDir(): string {
  return path.join(getThreadpackHomeDir(), 'threads');
}
