import os from 'os';
import path from 'path';
import { getConfigFilePath, getDefaultThreadsDir, getThreadpackHomeDir } from './app-paths.js';

describe('app paths', () => {
  const saved = process.env.THREADPACK_HOME;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.THREADPACK_HOME;
    } else {
      process.env.THREADPACK_HOME = saved;
    }
  });

  test('defaults to a dot directory in the user home', () => {
    delete process.env.THREADPACK_HOME;
    expect(getThreadpackHomeDir()).toBe(path.join(os.homedir(), '.threadpack'));
  });

  test('THREADPACK_HOME overrides the base directory', () => {
    process.env.THREADPACK_HOME = '  /srv/tp  ';
    expect(getThreadpackHomeDir()).toBe(path.resolve('/srv/tp'));
    expect(getConfigFilePath()).toBe(path.join(path.resolve('/srv/tp'), 'config.json'));
    expect(getDefaultThreadsDir()).toBe(path.join(path.resolve('/srv/tp'), 'threads'));
  });

  test('a blank override is ignored', () => {
    process.env.THREADPACK_HOME = '   ';
    expect(getThreadpackHomeDir()).toBe(path.join(os.homedir(), '.threadpack'));
  });
});
