import { causeChain, ErrorHandler, getErrorMessage, handleError, HandledError } from './error-handler.js';

describe('getErrorMessage', () => {
  test('reads Error messages and stringifies anything else', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(42)).toBe('42');
  });
});

describe('causeChain', () => {
  test('walks wrapped errors outermost first', () => {
    const root = new Error('EACCES');
    const middle = new HandledError('Permission denied: a.json', 'write', root);
    const outer = new HandledError('Failed to save thread T-1', 'thread store save', middle);

    expect(causeChain(outer)).toEqual(['Permission denied: a.json', 'EACCES']);
  });

  test('is empty for plain errors', () => {
    expect(causeChain(new Error('x'))).toEqual([]);
    expect(causeChain(new HandledError('no cause'))).toEqual([]);
  });
});

describe('ErrorHandler', () => {
  let writes: string[];
  let stderr: jest.SpyInstance;

  beforeEach(() => {
    writes = [];
    stderr = jest.spyOn(process.stderr, 'write').mockImplementation(chunk => {
      writes.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    stderr.mockRestore();
  });

  test('format includes context and message', () => {
    const text = ErrorHandler.format(new Error('bad input'), { context: 'budget' });
    expect(text).toContain('Error in budget:');
    expect(text).toContain('bad input');
    expect(text).not.toContain('caused by');
  });

  test('format lists causes when stacks are requested', () => {
    const error = new HandledError('outer', 'x', new Error('inner'));
    const text = ErrorHandler.format(error, { includeStack: true });
    expect(text).toContain('caused by: inner');
    expect(text).toContain('Stack trace:');
  });

  test('handle writes to stderr unless silent', () => {
    handleError(new Error('loud'), { includeStack: false });
    handleError(new Error('quiet'), { silent: true });
    expect(writes).toHaveLength(1);
    expect(writes[0]).toContain('loud');
  });

  test('handle exits with the requested code', () => {
    const exit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit called');
    });
    expect(() => ErrorHandler.handle(new Error('fatal'), { exitProcess: true, exitCode: 3, includeStack: false }))
      .toThrow('exit called');
    expect(exit).toHaveBeenCalledWith(3);
    exit.mockRestore();
  });
});
