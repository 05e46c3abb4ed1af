// Disk-backed thread store - one JSON file per thread

import { promises as fs } from 'fs';
import path from 'path';
import writeFileAtomic from 'write-file-atomic';
import { z } from 'zod';
import { getDefaultThreadsDir } from '../utils/app-paths.js';
import { getErrorMessage, HandledError } from '../utils/error-handler.js';
import { createFilesystemError, isNotFound } from '../utils/filesystem-errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import { LRUCache } from '../utils/lru-cache.js';
import { KeyedReadWriteLock } from '../utils/rw-lock.js';
import { deserializeThread, serializeThread, type ThreadRecord } from './serialization.js';
import {
  sortSummaries,
  ThreadStoreError,
  type ThreadMutator,
  type ThreadStore,
  type ThreadSummary,
} from './store.js';
import type { AgentThread } from './thread.js';

const logger = rootLogger.child('disk-store');

const THREAD_FILE_EXT = '.json';

const StoredIdSchema = z.object({ id: z.string().min(1) });

function storedId(stored: { raw: unknown } | null): string | undefined {
  const parsed = StoredIdSchema.safeParse(stored?.raw);
  return parsed.success ? parsed.data.id : undefined;
}

export interface DiskThreadStoreOptions {
  /** Defaults to `<home>/threads` */
  directory?: string;
  lockTimeoutMs?: number;
  /** Parsed records kept in memory */
  cacheSize?: number;
}

interface CachedRecord {
  raw: unknown;
  mtimeMs: number;
}

/**
 * Map a thread id onto a safe file stem. Path separators, dots and anything
 * outside [A-Za-z0-9_-] become underscores.
 */
export function sanitizeThreadId(id: string): string {
  const stem = id.replace(/[^A-Za-z0-9_-]/g, '_');
  if (!stem || /^_+$/.test(stem)) {
    throw new HandledError(`Invalid thread id: ${JSON.stringify(id)}`, 'thread id');
  }
  return stem;
}

export class DiskThreadStore implements ThreadStore {
  readonly directory: string;
  private locks: KeyedReadWriteLock;
  private cache: LRUCache<string, CachedRecord>;
  private initialized = false;

  constructor(options: DiskThreadStoreOptions = {}) {
    this.directory = options.directory ?? getDefaultThreadsDir();
    this.locks = new KeyedReadWriteLock(options.lockTimeoutMs ?? 5000);
    this.cache = new LRUCache(options.cacheSize ?? 32, key => {
      logger.debug(`Evicted cached record ${key}`);
    });
  }

  /**
   * Create the threads directory
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    try {
      await fs.mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw createFilesystemError(error, this.directory, 'create');
    }
    this.initialized = true;
  }

  filePath(id: string): string {
    return this.locate(id).file;
  }

  // Locks and cache entries are keyed by file stem, so ids that sanitize alike share them
  private locate(id: string): { key: string; file: string } {
    const key = sanitizeThreadId(id);
    return { key, file: path.join(this.directory, `${key}${THREAD_FILE_EXT}`) };
  }

  /**
   * The stored record when it belongs to `id`. A file holding a different id
   * whose name sanitizes the same way counts as absent.
   */
  private async readOwnRecord(id: string, key: string, file: string): Promise<{ raw: unknown } | null> {
    const stored = await this.readRecord(key, file);
    const owner = storedId(stored);
    return owner !== undefined && owner !== id ? null : stored;
  }

  async get(id: string): Promise<AgentThread | null> {
    try {
      const { key, file } = this.locate(id);
      return await this.locks.withRead(key, async () => {
        const stored = await this.readOwnRecord(id, key, file);
        return stored ? deserializeThread(stored.raw, file).thread : null;
      });
    } catch (error) {
      throw ThreadStoreError.wrap(error, 'get', id);
    }
  }

  async save(thread: AgentThread): Promise<void> {
    try {
      const { key, file } = this.locate(thread.id);
      const record = serializeThread(thread);
      await this.locks.withWrite(key, async () => {
        const owner = storedId(await this.readRecord(key, file));
        if (owner !== undefined && owner !== thread.id) {
          throw new HandledError(`Thread id ${thread.id} maps to the file of thread ${owner}`, 'save');
        }
        await this.writeRecord(key, file, record);
      });
    } catch (error) {
      throw ThreadStoreError.wrap(error, 'save', thread.id);
    }
  }

  async update(id: string, mutate: ThreadMutator): Promise<AgentThread | null> {
    try {
      const { key, file } = this.locate(id);
      return await this.locks.withWrite(key, async () => {
        const stored = await this.readOwnRecord(id, key, file);
        if (!stored) return null;
        const { thread } = deserializeThread(stored.raw, file);
        await mutate(thread);
        await this.writeRecord(key, file, serializeThread(thread));
        return thread;
      });
    } catch (error) {
      throw ThreadStoreError.wrap(error, 'save', id);
    }
  }

  async delete(id: string): Promise<void> {
    try {
      const { key, file } = this.locate(id);
      await this.locks.withWrite(key, async () => {
        let owner: string | undefined;
        try {
          owner = storedId(await this.readRecord(key, file));
        } catch (error) {
          // Unreadable files can still be deleted
          logger.debug(`Deleting unreadable thread file ${file}: ${getErrorMessage(error)}`);
        }
        if (owner !== undefined && owner !== id) return;

        this.cache.delete(key);
        try {
          await fs.unlink(file);
        } catch (error) {
          if (!isNotFound(error)) throw createFilesystemError(error, file, 'delete');
        }
      });
    } catch (error) {
      throw ThreadStoreError.wrap(error, 'delete', id);
    }
  }

  /**
   * Ids of stored threads, read from the records. Temp, hidden and non-JSON
   * files are ignored; unreadable records are skipped with a warning.
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw ThreadStoreError.wrap(createFilesystemError(error, this.directory, 'list'), 'list');
    }

    const ids: string[] = [];
    for (const name of entries) {
      if (!name.endsWith(THREAD_FILE_EXT) || name.startsWith('.')) continue;
      const key = name.slice(0, -THREAD_FILE_EXT.length);
      const file = path.join(this.directory, name);
      try {
        const id = storedId(await this.locks.withRead(key, () => this.readRecord(key, file)));
        if (id === undefined) {
          logger.warn(`Skipping ${file}: no thread id`);
        } else {
          ids.push(id);
        }
      } catch (error) {
        logger.warn(`Skipping unreadable thread file ${file}: ${getErrorMessage(error)}`);
      }
    }
    return ids.sort();
  }

  async listSummary(): Promise<ThreadSummary[]> {
    const summaries: ThreadSummary[] = [];

    for (const id of await this.list()) {
      try {
        const thread = await this.get(id);
        if (!thread) continue;
        summaries.push({
          id: thread.id,
          title: thread.title,
          model: thread.model,
          updatedAt: thread.updatedAt,
          segmentCount: thread.segments.length,
        });
      } catch (error) {
        logger.warn(`Skipping unreadable thread file for ${id}: ${getErrorMessage(error)}`);
      }
    }

    return sortSummaries(summaries);
  }

  /**
   * Parsed file contents, or null when the file does not exist.
   * Served from cache while the file's mtime is unchanged.
   */
  private async readRecord(key: string, file: string): Promise<{ raw: unknown } | null> {
    let mtimeMs: number;
    try {
      mtimeMs = (await fs.stat(file)).mtimeMs;
    } catch (error) {
      if (isNotFound(error)) {
        this.cache.delete(key);
        return null;
      }
      throw createFilesystemError(error, file, 'read');
    }

    const cached = this.cache.get(key);
    if (cached && cached.mtimeMs === mtimeMs) {
      return { raw: structuredClone(cached.raw) };
    }

    let text: string;
    try {
      text = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw createFilesystemError(error, file, 'read');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new HandledError(`Thread file ${file} is not valid JSON`, 'read', error);
    }

    this.cache.set(key, { raw: structuredClone(raw), mtimeMs });
    return { raw };
  }

  private async writeRecord(key: string, file: string, record: ThreadRecord): Promise<void> {
    await this.initialize();

    try {
      await writeFileAtomic(file, JSON.stringify(record, null, 2));
    } catch (error) {
      throw createFilesystemError(error, file, 'write');
    }

    const { mtimeMs } = await fs.stat(file);
    this.cache.set(key, { raw: structuredClone(record), mtimeMs });
  }
}
