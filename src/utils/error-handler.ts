/**
 * Error reporting for the CLI and library entry points.
 *
 * Library code throws HandledError (or a subclass) with the failure it wraps
 * kept in `originalError`; the CLI prints it through handleError.
 */

import chalk from 'chalk';

export class HandledError extends Error {
  constructor(
    message: string,
    /** Where the failure happened, e.g. 'config' or 'thread store save' */
    public readonly context?: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'HandledError';
  }
}

export interface ErrorHandlingOptions {
  /** Printed as a heading above the message */
  context?: string;
  /** Add wrapped causes and the stack trace */
  includeStack?: boolean;
  exitProcess?: boolean;
  exitCode?: number;
  /** Print nothing (JSON output modes) */
  silent?: boolean;
}

export function debugEnabled(): boolean {
  return process.env.NODE_ENV === 'development' || !!process.env.DEBUG;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Messages of the errors wrapped beneath `error`, outermost first
 */
export function causeChain(error: unknown): string[] {
  const causes: string[] = [];
  let current: unknown = error instanceof HandledError ? error.originalError : undefined;

  while (current !== undefined) {
    causes.push(getErrorMessage(current));
    current = current instanceof HandledError ? current.originalError : undefined;
  }

  return causes;
}

export class ErrorHandler {
  static format(error: unknown, options: Pick<ErrorHandlingOptions, 'context' | 'includeStack'> = {}): string {
    const lines: string[] = [];

    if (options.context) {
      lines.push(chalk.red.bold(`Error in ${options.context}:`));
    }
    lines.push(chalk.red(getErrorMessage(error)));

    if (options.includeStack) {
      for (const cause of causeChain(error)) {
        lines.push(chalk.gray(`  caused by: ${cause}`));
      }
      if (error instanceof Error && error.stack) {
        lines.push('', chalk.dim('Stack trace:'), chalk.gray(error.stack));
      }
    }

    return lines.join('\n') + '\n';
  }

  static handle(error: unknown, options: ErrorHandlingOptions = {}): void {
    const { includeStack = debugEnabled(), exitProcess = false, exitCode = 1, silent = false } = options;

    if (!silent) {
      process.stderr.write(ErrorHandler.format(error, { context: options.context, includeStack }));
    }

    if (exitProcess) {
      process.exit(exitCode);
    }
  }
}

export function handleError(error: unknown, options?: ErrorHandlingOptions): void {
  ErrorHandler.handle(error, options);
}
