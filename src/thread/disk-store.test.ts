import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { chatSegment } from '../context/segment.js';
import { userMessage } from '../llm/types.js';
import { logger, LogLevel } from '../utils/logger.js';
import { DiskThreadStore, sanitizeThreadId } from './disk-store.js';
import { ThreadStoreError } from './store.js';
import { AgentThread } from './thread.js';

function threadAt(id: string, iso: string): AgentThread {
  return new AgentThread('gpt-4o', { id, title: `title ${id}`, clock: () => new Date(iso) });
}

describe('sanitizeThreadId', () => {
  test('keeps safe ids as they are', () => {
    expect(sanitizeThreadId('T-abc_123')).toBe('T-abc_123');
  });

  test('replaces path separators and dots', () => {
    expect(sanitizeThreadId('../etc/passwd')).toBe('___etc_passwd');
    expect(sanitizeThreadId('a.b')).toBe('a_b');
  });

  test('rejects ids with nothing usable', () => {
    expect(() => sanitizeThreadId('')).toThrow('Invalid thread id');
    expect(() => sanitizeThreadId('../')).toThrow('Invalid thread id');
  });
});

describe('DiskThreadStore', () => {
  let directory: string;
  let store: DiskThreadStore;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'threadpack-store-'));
    store = new DiskThreadStore({ directory: path.join(directory, 'threads') });
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  test('writes one pretty-printed JSON file per thread', async () => {
    const thread = threadAt('T-1', '2025-01-01T00:00:00.000Z');
    thread.addSegment(chatSegment([userMessage('hello')]));
    await store.save(thread);

    const file = path.join(directory, 'threads', 'T-1.json');
    expect(store.filePath('T-1')).toBe(file);
    const text = await fs.readFile(file, 'utf-8');
    expect(text.startsWith('{\n  "version": 1,\n  "id": "T-1",')).toBe(true);

    const loaded = await store.get('T-1');
    expect(loaded?.title).toBe('title T-1');
    expect(loaded?.segments).toEqual(thread.segments);
  });

  test('leaves no temp files behind', async () => {
    await store.save(threadAt('T-1', '2025-01-01T00:00:00.000Z'));
    await store.save(threadAt('T-1', '2025-01-02T00:00:00.000Z'));
    expect(await fs.readdir(path.join(directory, 'threads'))).toEqual(['T-1.json']);
  });

  test('missing threads and directories', async () => {
    expect(await store.get('T-none')).toBeNull();
    expect(await store.list()).toEqual([]);
    expect(await store.listSummary()).toEqual([]);
    await expect(store.delete('T-none')).resolves.toBeUndefined();
  });

  test('sees changes made to the file by another process', async () => {
    await store.save(threadAt('T-1', '2025-01-01T00:00:00.000Z'));
    await store.get('T-1');

    const other = new DiskThreadStore({ directory: path.join(directory, 'threads') });
    await other.update('T-1', thread => {
      thread.setTitle('changed elsewhere');
    });
    // Make sure the modification time moves even on coarse filesystems
    const later = new Date(Date.now() + 5000);
    await fs.utimes(store.filePath('T-1'), later, later);

    expect((await store.get('T-1'))?.title).toBe('changed elsewhere');
  });

  test('update persists the mutation', async () => {
    await store.save(threadAt('T-1', '2025-01-01T00:00:00.000Z'));
    await store.update('T-1', thread => {
      thread.addSegment(chatSegment([userMessage('more')]));
    });

    const fresh = new DiskThreadStore({ directory: path.join(directory, 'threads') });
    expect((await fresh.get('T-1'))?.segments).toHaveLength(1);
  });

  test('list ignores non-thread files', async () => {
    await store.save(threadAt('T-b', '2025-01-01T00:00:00.000Z'));
    await store.save(threadAt('T-a', '2025-01-01T00:00:00.000Z'));
    const threads = path.join(directory, 'threads');
    await fs.writeFile(path.join(threads, 'notes.txt'), 'x');
    await fs.writeFile(path.join(threads, '.hidden.json'), '{}');
    await fs.writeFile(path.join(threads, 'T-a.json.1234.tmp'), '{}');

    expect(await store.list()).toEqual(['T-a', 'T-b']);
  });

  test('ids that share a file name do not overwrite each other', async () => {
    await store.save(threadAt('a.b', '2025-01-01T00:00:00.000Z'));

    expect(await store.list()).toEqual(['a.b']);
    expect(await store.get('a_b')).toBeNull();
    expect(await store.update('a_b', thread => thread.setTitle('stolen'))).toBeNull();
    await expect(store.save(threadAt('a_b', '2025-01-02T00:00:00.000Z'))).rejects.toThrow(
      'Failed to save thread a_b: Thread id a_b maps to the file of thread a.b'
    );
    await store.delete('a_b');

    expect((await store.get('a.b'))?.title).toBe('title a.b');
  });

  test('evicted cache entries are logged at debug level', async () => {
    const small = new DiskThreadStore({ directory: path.join(directory, 'threads'), cacheSize: 1 });
    const previous = logger.getLevel();
    const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    logger.setLevel(LogLevel.DEBUG);

    try {
      await small.save(threadAt('T-1', '2025-01-01T00:00:00.000Z'));
      await small.save(threadAt('T-2', '2025-01-01T00:00:00.000Z'));
      expect(stderr).toHaveBeenCalledWith(expect.stringContaining('[disk-store] Evicted cached record T-1'));
    } finally {
      logger.setLevel(previous);
      stderr.mockRestore();
    }
  });

  test('listSummary skips unreadable files and sorts by recency', async () => {
    await store.save(threadAt('T-old', '2025-01-01T00:00:00.000Z'));
    await store.save(threadAt('T-new', '2025-06-01T00:00:00.000Z'));
    await fs.writeFile(path.join(directory, 'threads', 'T-broken.json'), '{ not json');

    const summaries = await store.listSummary();
    expect(summaries.map(s => s.id)).toEqual(['T-new', 'T-old']);
    expect(summaries[0]).toEqual({
      id: 'T-new',
      title: 'title T-new',
      model: 'gpt-4o',
      updatedAt: new Date('2025-06-01T00:00:00.000Z'),
      segmentCount: 0,
    });
  });

  test('a corrupt file is reported on get', async () => {
    await fs.mkdir(path.join(directory, 'threads'), { recursive: true });
    await fs.writeFile(path.join(directory, 'threads', 'T-bad.json'), '{ not json');

    const error = await store.get('T-bad').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ThreadStoreError);
    expect(error).toMatchObject({ operation: 'get' });
  });

  test('invalid ids are reported as store errors', async () => {
    await expect(store.get('..')).rejects.toBeInstanceOf(ThreadStoreError);
  });

  test('delete removes the file', async () => {
    await store.save(threadAt('T-1', '2025-01-01T00:00:00.000Z'));
    await store.delete('T-1');
    expect(await store.get('T-1')).toBeNull();
    expect(await store.list()).toEqual([]);
  });
});
