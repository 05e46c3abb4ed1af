import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { deepMerge, getConfigValue, getDefaultConfig, loadConfig, setConfigValue } from './config.js';
import { HandledError } from './error-handler.js';

const ENV_KEYS = ['THREADPACK_HOME', 'THREADPACK_MODEL', 'THREADPACK_SAFETY_MARGIN', 'THREADPACK_LOG_LEVEL'] as const;

describe('config', () => {
  let home: string;
  const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(async () => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    home = await fs.mkdtemp(path.join(os.tmpdir(), 'threadpack-config-'));
    process.env.THREADPACK_HOME = home;
  });

  afterEach(async () => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await fs.rm(home, { recursive: true, force: true });
  });

  test('defaults apply when no config file exists', async () => {
    const config = await loadConfig();
    expect(config).toEqual(getDefaultConfig());
    expect(config.context.safetyMarginPercent).toBe(2);
    expect(config.context.overheads.perMessage).toBe(4);
    expect(config.storage.lockTimeoutMs).toBe(5000);
  });

  test('file values merge over defaults', async () => {
    await fs.writeFile(
      path.join(home, 'config.json'),
      JSON.stringify({ context: { safetyMarginPercent: 5, overheads: { perTool: 30 } } })
    );

    const config = await loadConfig();
    expect(config.context.safetyMarginPercent).toBe(5);
    expect(config.context.overheads.perTool).toBe(30);
    expect(config.context.overheads.perMessage).toBe(4);
    expect(config.context.defaultModel).toBe('claude-sonnet-4-5-20250929');
  });

  test('environment overrides the file', async () => {
    await fs.writeFile(path.join(home, 'config.json'), JSON.stringify({ context: { defaultModel: 'gpt-4o' } }));
    process.env.THREADPACK_MODEL = 'gemini-2.5-pro';
    process.env.THREADPACK_SAFETY_MARGIN = '10';
    process.env.THREADPACK_LOG_LEVEL = 'DEBUG';

    const config = await loadConfig();
    expect(config.context.defaultModel).toBe('gemini-2.5-pro');
    expect(config.context.safetyMarginPercent).toBe(10);
    expect(config.logging.level).toBe('debug');
  });

  test('non-numeric safety margin in the environment is ignored', async () => {
    process.env.THREADPACK_SAFETY_MARGIN = 'lots';
    const config = await loadConfig();
    expect(config.context.safetyMarginPercent).toBe(2);
  });

  test('invalid JSON is reported', async () => {
    await fs.writeFile(path.join(home, 'config.json'), '{ not json');
    await expect(loadConfig()).rejects.toBeInstanceOf(HandledError);
  });

  test('schema violations are reported with their path', async () => {
    await fs.writeFile(path.join(home, 'config.json'), JSON.stringify({ context: { safetyMarginPercent: 150 } }));
    await expect(loadConfig()).rejects.toThrow('context.safetyMarginPercent');
  });

  test('setConfigValue parses JSON values and persists them', async () => {
    await setConfigValue('context.safetyMarginPercent', '7');
    await setConfigValue('context.defaultModel', 'o3-mini');

    expect(await getConfigValue('context.safetyMarginPercent')).toBe(7);
    expect(await getConfigValue('context.defaultModel')).toBe('o3-mini');

    const written: unknown = JSON.parse(await fs.readFile(path.join(home, 'config.json'), 'utf-8'));
    expect(written).toEqual({ context: { safetyMarginPercent: 7, defaultModel: 'o3-mini' } });
  });

  test('setConfigValue refuses values that fail validation', async () => {
    await expect(setConfigValue('storage.lockTimeoutMs', '-1')).rejects.toBeInstanceOf(HandledError);
    await expect(fs.access(path.join(home, 'config.json'))).rejects.toThrow();
  });

  test('getConfigValue returns undefined for unknown keys', async () => {
    expect(await getConfigValue('context.nope')).toBeUndefined();
    expect(await getConfigValue('context.defaultModel.deeper')).toBeUndefined();
  });

  test('deepMerge replaces arrays and merges nested objects', () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] } }, { a: { c: [3] }, d: true })).toEqual({
      a: { b: 1, c: [3] },
      d: true,
    });
  });
});
