/**
 * Async reader/writer locks.
 *
 * Readers share the lock, writers hold it alone. Waiters are granted strictly
 * in arrival order: a reader queued behind a writer waits for that writer even
 * while other readers hold the lock.
 */

import { HandledError } from './error-handler.js';

export type LockMode = 'read' | 'write';

export class LockTimeoutError extends HandledError {
  constructor(
    public readonly mode: LockMode,
    public readonly timeoutMs: number,
    context?: string
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for ${mode} lock${context ? ` on ${context}` : ''}`, context);
    this.name = 'LockTimeoutError';
  }
}

interface Waiter {
  mode: LockMode;
  grant: () => void;
  timer?: NodeJS.Timeout;
}

export type Release = () => void;

export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private queue: Waiter[] = [];

  constructor(private readonly name?: string) {}

  /**
   * Wait for the lock in the given mode.
   * @param timeoutMs - reject with LockTimeoutError after this long; 0 or less waits forever
   * @returns a release function, safe to call more than once
   */
  acquire(mode: LockMode, timeoutMs: number = 0): Promise<Release> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      return Promise.resolve(this.take(mode));
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        mode,
        grant: () => {
          if (waiter.timer) clearTimeout(waiter.timer);
          resolve(this.take(mode));
        },
      };

      if (timeoutMs > 0) {
        waiter.timer = setTimeout(() => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) {
            this.queue.splice(index, 1);
            reject(new LockTimeoutError(mode, timeoutMs, this.name));
            // A timed-out writer at the head may have been holding readers back
            this.drain();
          }
        }, timeoutMs);
      }

      this.queue.push(waiter);
    });
  }

  async withRead<T>(fn: () => Promise<T> | T, timeoutMs?: number): Promise<T> {
    const release = await this.acquire('read', timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T, timeoutMs?: number): Promise<T> {
    const release = await this.acquire('write', timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** True when nobody holds or waits for the lock */
  get idle(): boolean {
    return this.readers === 0 && !this.writer && this.queue.length === 0;
  }

  get activeReaders(): number {
    return this.readers;
  }

  get writeLocked(): boolean {
    return this.writer;
  }

  get pending(): number {
    return this.queue.length;
  }

  private canGrant(mode: LockMode): boolean {
    if (mode === 'read') return !this.writer;
    return !this.writer && this.readers === 0;
  }

  private take(mode: LockMode): Release {
    if (mode === 'read') {
      this.readers++;
    } else {
      this.writer = true;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'read') {
        this.readers--;
      } else {
        this.writer = false;
      }
      this.drain();
    };
  }

  private drain(): void {
    while (this.queue.length > 0 && this.canGrant(this.queue[0].mode)) {
      const next = this.queue.shift();
      next?.grant();
    }
  }
}

/**
 * One ReadWriteLock per key, created on demand and dropped once idle.
 */
export class KeyedReadWriteLock {
  private locks = new Map<string, ReadWriteLock>();

  constructor(private readonly timeoutMs: number = 0) {}

  async withRead<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    return this.run(key, 'read', fn);
  }

  async withWrite<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    return this.run(key, 'write', fn);
  }

  /** Number of keys with a live lock */
  get size(): number {
    return this.locks.size;
  }

  private async run<T>(key: string, mode: LockMode, fn: () => Promise<T> | T): Promise<T> {
    const lock = this.lockFor(key);
    try {
      const release = await lock.acquire(mode, this.timeoutMs);
      try {
        return await fn();
      } finally {
        release();
      }
    } finally {
      if (lock.idle && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }

  private lockFor(key: string): ReadWriteLock {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new ReadWriteLock(key);
      this.locks.set(key, lock);
    }
    return lock;
  }
}
