// Readable messages for failed filesystem calls

import { getErrorMessage, HandledError } from './error-handler.js';

export type ErrnoError = Error & { code: string };

export function isErrnoError(error: unknown): error is ErrnoError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function isNotFound(error: unknown): boolean {
  return isErrnoError(error) && error.code === 'ENOENT';
}

type Describe = (filePath: string, operation: string) => string;

const DESCRIPTIONS: Partial<Record<string, Describe>> = {
  ENOENT: file => `File not found: ${file}`,
  EACCES: file => `Permission denied: ${file}`,
  EPERM: file => `Permission denied: ${file}`,
  EISDIR: file => `Path is a directory, not a file: ${file}`,
  ENOTDIR: file => `Not a directory: ${file}`,
  EEXIST: file => `File already exists: ${file}`,
  ENOSPC: (file, operation) => `Disk full: cannot ${operation} ${file}`,
  EROFS: file => `Read-only filesystem: ${file}`,
  EMFILE: () => 'Too many open files',
  EBUSY: file => `Resource busy: ${file}`,
};

/**
 * Wrap a filesystem failure. The original error is kept as `originalError`.
 * @param operation - verb for the message, e.g. 'read' or 'write'
 */
export function createFilesystemError(error: unknown, filePath: string, operation: string): HandledError {
  const describe = isErrnoError(error) ? DESCRIPTIONS[error.code] : undefined;
  const message = describe
    ? describe(filePath, operation)
    : `Filesystem error during ${operation} of ${filePath}: ${getErrorMessage(error)}`;
  return new HandledError(message, operation, error);
}

export async function safeFilesystemOperation<T>(
  operation: () => Promise<T>,
  filePath: string,
  operationName: string
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw createFilesystemError(error, filePath, operationName);
  }
}
