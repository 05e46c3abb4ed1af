import { HandledError } from './error-handler.js';
import { createFilesystemError, isNotFound, safeFilesystemOperation } from './filesystem-errors.js';

function errno(code: string): Error {
  return Object.assign(new Error(`${code}: failed`), { code });
}

describe('filesystem errors', () => {
  test('maps known error codes to readable messages', () => {
    const error = createFilesystemError(errno('EACCES'), '/tmp/x.json', 'write');
    expect(error).toBeInstanceOf(HandledError);
    expect(error.message).toBe('Permission denied: /tmp/x.json');
    expect(error.context).toBe('write');
  });

  test('falls back to a generic message', () => {
    const error = createFilesystemError(new Error('odd'), '/tmp/x.json', 'read');
    expect(error.message).toBe('Filesystem error during read of /tmp/x.json: odd');
  });

  test('isNotFound only matches ENOENT', () => {
    expect(isNotFound(errno('ENOENT'))).toBe(true);
    expect(isNotFound(errno('EACCES'))).toBe(false);
    expect(isNotFound('ENOENT')).toBe(false);
  });

  test('safeFilesystemOperation wraps failures', async () => {
    await expect(
      safeFilesystemOperation(() => Promise.reject(errno('ENOENT')), '/tmp/missing', 'read')
    ).rejects.toThrow('File not found: /tmp/missing');
    await expect(safeFilesystemOperation(() => Promise.resolve(5), '/tmp/ok', 'read')).resolves.toBe(5);
  });
});

describe('filesystem error wording', () => {
  test('uses the operation name where the message needs one', () => {
    expect(createFilesystemError(errno('ENOSPC'), '/tmp/t.json', 'write').message).toBe('Disk full: cannot write /tmp/t.json');
    expect(createFilesystemError(errno('EBUSY'), '/tmp/t.json', 'rename').message).toBe('Resource busy: /tmp/t.json');
  });

  test('keeps the original error', () => {
    const original = errno('EISDIR');
    expect(createFilesystemError(original, '/tmp', 'read').originalError).toBe(original);
  });
});
