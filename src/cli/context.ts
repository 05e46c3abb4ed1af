// Shared dependencies for CLI commands

import { ContextManager } from '../context/manager.js';
import { getDefaultCatalog, type ModelCatalog } from '../context/models.js';
import { DefaultTokenCounter } from '../context/token-counter.js';
import { DiskThreadStore } from '../thread/disk-store.js';
import type { ThreadStore } from '../thread/store.js';
import { loadConfig, type AppConfig } from '../utils/config.js';
import { logger, parseLogLevel } from '../utils/logger.js';

export interface CommandContext {
  config: AppConfig;
  store: ThreadStore;
  catalog: ModelCatalog;
  /** Command output; diagnostics go through the logger instead */
  write(line: string): void;
}

export async function createCommandContext(): Promise<CommandContext> {
  const config = await loadConfig();
  logger.setLevel(parseLogLevel(config.logging.level));

  return {
    config,
    store: new DiskThreadStore({
      directory: config.storage.threadsDir,
      lockTimeoutMs: config.storage.lockTimeoutMs,
    }),
    catalog: getDefaultCatalog(),
    write: line => {
      process.stdout.write(line + '\n');
    },
  };
}

export function createContextManager(ctx: CommandContext): ContextManager {
  const counter = new DefaultTokenCounter({ catalog: ctx.catalog, overheads: ctx.config.context.overheads });
  return new ContextManager({
    catalog: ctx.catalog,
    counter,
    safetyMarginPercent: ctx.config.context.safetyMarginPercent,
    maxOutputTokens: ctx.config.context.maxOutputTokens,
  });
}
