// Thread storage contract and the in-memory backend

import { HandledError, getErrorMessage } from '../utils/error-handler.js';
import { KeyedReadWriteLock } from '../utils/rw-lock.js';
import { deserializeThread, serializeThread, type ThreadRecord } from './serialization.js';
import type { AgentThread } from './thread.js';

export interface ThreadSummary {
  id: string;
  title: string;
  model: string;
  updatedAt: Date;
  segmentCount: number;
}

export interface ThreadStore {
  get(id: string): Promise<AgentThread | null>;
  save(thread: AgentThread): Promise<void>;
  delete(id: string): Promise<void>;
  list(): Promise<string[]>;
  /** Most recently updated first */
  listSummary(): Promise<ThreadSummary[]>;
  /**
   * Read, mutate and write back under one exclusive lock.
   * Resolves to null when the thread does not exist.
   */
  update(id: string, mutate: ThreadMutator): Promise<AgentThread | null>;
}

export type ThreadMutator = (thread: AgentThread) => Promise<void> | void;

export type ThreadStoreOperation = 'get' | 'save' | 'delete' | 'list';

/**
 * Recoverable storage failure: lock timeout, I/O error or unreadable record
 */
export class ThreadStoreError extends HandledError {
  constructor(
    message: string,
    public readonly operation: ThreadStoreOperation,
    public readonly threadId?: string,
    originalError?: unknown
  ) {
    super(message, `thread store ${operation}`, originalError);
    this.name = 'ThreadStoreError';
  }

  static wrap(error: unknown, operation: ThreadStoreOperation, threadId?: string): ThreadStoreError {
    if (error instanceof ThreadStoreError) return error;
    const target = threadId ? ` ${threadId}` : '';
    return new ThreadStoreError(
      `Failed to ${operation} thread${target}: ${getErrorMessage(error)}`,
      operation,
      threadId,
      error
    );
  }
}

export function summarize(thread: AgentThread): ThreadSummary {
  return {
    id: thread.id,
    title: thread.title,
    model: thread.model,
    updatedAt: thread.updatedAt,
    segmentCount: thread.segments.length,
  };
}

export function sortSummaries(summaries: ThreadSummary[]): ThreadSummary[] {
  return summaries.sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime() || a.id.localeCompare(b.id));
}

export interface InMemoryThreadStoreOptions {
  lockTimeoutMs?: number;
}

/**
 * Keeps serialized records, so callers never share thread objects with the store
 */
export class InMemoryThreadStore implements ThreadStore {
  private records = new Map<string, ThreadRecord>();
  private locks: KeyedReadWriteLock;

  constructor(options: InMemoryThreadStoreOptions = {}) {
    this.locks = new KeyedReadWriteLock(options.lockTimeoutMs ?? 5000);
  }

  async get(id: string): Promise<AgentThread | null> {
    try {
      return await this.locks.withRead(id, () => {
        const record = this.records.get(id);
        if (!record) return null;
        return deserializeThread(structuredClone(record), `memory:${id}`).thread;
      });
    } catch (error) {
      throw ThreadStoreError.wrap(error, 'get', id);
    }
  }

  async save(thread: AgentThread): Promise<void> {
    try {
      const record = serializeThread(thread);
      await this.locks.withWrite(thread.id, () => {
        this.records.set(thread.id, structuredClone(record));
      });
    } catch (error) {
      throw ThreadStoreError.wrap(error, 'save', thread.id);
    }
  }

  async update(id: string, mutate: ThreadMutator): Promise<AgentThread | null> {
    try {
      return await this.locks.withWrite(id, async () => {
        const record = this.records.get(id);
        if (!record) return null;
        const { thread } = deserializeThread(structuredClone(record), `memory:${id}`);
        await mutate(thread);
        this.records.set(id, structuredClone(serializeThread(thread)));
        return thread;
      });
    } catch (error) {
      throw ThreadStoreError.wrap(error, 'save', id);
    }
  }

  async delete(id: string): Promise<void> {
    try {
      await this.locks.withWrite(id, () => {
        this.records.delete(id);
      });
    } catch (error) {
      throw ThreadStoreError.wrap(error, 'delete', id);
    }
  }

  async list(): Promise<string[]> {
    return Array.from(this.records.keys()).sort();
  }

  async listSummary(): Promise<ThreadSummary[]> {
    const summaries = Array.from(this.records.values(), record => ({
      id: record.id,
      title: record.title,
      model: record.model,
      updatedAt: new Date(record.updatedAt),
      segmentCount: record.segments.length,
    }));
    return sortSummaries(summaries);
  }
}
