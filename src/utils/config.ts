// Configuration management

import { promises as fs } from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_TOKEN_OVERHEADS } from '../context/token-counter.js';
import { getConfigFilePath } from './app-paths.js';
import { HandledError } from './error-handler.js';
import { createFilesystemError, isNotFound } from './filesystem-errors.js';
import { logger as rootLogger } from './logger.js';

const logger = rootLogger.child('config');

// Load .env file
dotenv.config();

const OverheadsSchema = z.object({
  perMessage: z.number().int().nonnegative(),
  messageBatch: z.number().int().nonnegative(),
  toolUse: z.number().int().nonnegative(),
  toolResult: z.number().int().nonnegative(),
  imageTokens: z.number().int().nonnegative(),
  perTool: z.number().int().nonnegative(),
});

export const ConfigSchema = z.object({
  context: z.object({
    defaultModel: z.string().min(1),
    safetyMarginPercent: z.number().min(0).max(100),
    maxOutputTokens: z.number().int().positive().optional(),
    overheads: OverheadsSchema,
  }),
  storage: z.object({
    threadsDir: z.string().min(1).optional(),
    lockTimeoutMs: z.number().int().positive(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type PlainObject = Record<string, unknown>;

export function getDefaultConfig(): AppConfig {
  return {
    context: {
      defaultModel: 'claude-sonnet-4-5-20250929',
      safetyMarginPercent: 2,
      overheads: { ...DEFAULT_TOKEN_OVERHEADS },
    },
    storage: {
      lockTimeoutMs: 5000,
    },
    logging: {
      level: 'info',
    },
  };
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Environment overrides, shaped like a partial config file
 */
function readEnvOverrides(): PlainObject {
  const overrides: PlainObject = {};
  const context: PlainObject = {};

  const model = process.env.THREADPACK_MODEL?.trim();
  if (model) context.defaultModel = model;

  const margin = process.env.THREADPACK_SAFETY_MARGIN?.trim();
  if (margin) {
    const parsed = Number(margin);
    if (Number.isFinite(parsed)) {
      context.safetyMarginPercent = parsed;
    } else {
      logger.warn(`Ignoring THREADPACK_SAFETY_MARGIN=${margin}: not a number`);
    }
  }

  if (Object.keys(context).length > 0) overrides.context = context;

  const level = process.env.THREADPACK_LOG_LEVEL?.trim().toLowerCase();
  if (level) overrides.logging = { level };

  return overrides;
}

async function readConfigFile(): Promise<PlainObject> {
  const file = getConfigFilePath();
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return {};
    throw createFilesystemError(error, file, 'read');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new HandledError(`Config file ${file} is not valid JSON`, 'config', error);
  }
  if (!isPlainObject(parsed)) {
    throw new HandledError(`Config file ${file} must contain a JSON object`, 'config');
  }
  return parsed;
}

function validate(candidate: PlainObject, source: string): AppConfig {
  const result = ConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new HandledError(`Invalid configuration (${source}): ${issues}`, 'config', result.error);
  }
  return result.data;
}

/**
 * Defaults, then `<home>/config.json`, then THREADPACK_* environment variables.
 */
export async function loadConfig(): Promise<AppConfig> {
  const fileConfig = await readConfigFile();
  const merged = deepMerge(deepMerge(getDefaultConfig(), fileConfig), readEnvOverrides());
  return validate(merged, getConfigFilePath());
}

export async function saveConfig(config: PlainObject): Promise<void> {
  const file = getConfigFilePath();
  const next = deepMerge(await readConfigFile(), config);
  validate(deepMerge(getDefaultConfig(), next), file);

  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify(next, null, 2), 'utf-8');
  } catch (error) {
    throw createFilesystemError(error, file, 'write');
  }
}

export async function getConfigValue(key: string): Promise<unknown> {
  const config = await loadConfig();
  let value: unknown = config;

  for (const k of key.split('.')) {
    if (!isPlainObject(value)) return undefined;
    value = value[k];
  }

  return value;
}

export async function setConfigValue(key: string, value: string): Promise<void> {
  const keys = key.split('.').filter(Boolean);
  if (keys.length === 0) {
    throw new HandledError('Config key must not be empty', 'config');
  }

  // Try to parse as JSON, otherwise use string
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    parsed = value;
  }

  let patch: unknown = parsed;
  for (let i = keys.length - 1; i >= 0; i--) {
    patch = { [keys[i]]: patch };
  }
  if (!isPlainObject(patch)) {
    throw new HandledError(`Cannot set ${key}`, 'config');
  }

  await saveConfig(patch);
}

export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const incoming = source[key];
    const existing = result[key];
    if (isPlainObject(incoming)) {
      result[key] = deepMerge(isPlainObject(existing) ? existing : {}, incoming);
    } else {
      result[key] = incoming;
    }
  }
  return result;
}
