// CLI setup with Commander

import { Command, InvalidArgumentError } from 'commander';
import { budgetCommand } from './commands/budget.js';
import { configCommand } from './commands/config.js';
import {
  appendCommand,
  createThreadCommand,
  deleteThreadCommand,
  listThreadsCommand,
  repairCommand,
  showThreadCommand,
} from './commands/threads.js';
import { createCommandContext } from './context.js';

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('threadpack')
    .description('Fit long LLM conversation threads into bounded requests')
    .version('0.1.0');

  const threads = program
    .command('threads')
    .description('Manage stored conversation threads');

  threads
    .command('list')
    .description('List threads, most recently updated first')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      await listThreadsCommand(await createCommandContext(), options);
    });

  threads
    .command('show <id>')
    .description('Show a thread with per-segment token costs')
    .action(async (id: string) => {
      await showThreadCommand(await createCommandContext(), id);
    });

  threads
    .command('create')
    .description('Create an empty thread and print its id')
    .option('-m, --model <model>', 'Target model (default: context.defaultModel)')
    .option('-t, --title <title>', 'Thread title')
    .action(async (options: { model?: string; title?: string }) => {
      await createThreadCommand(await createCommandContext(), options);
    });

  threads
    .command('append <id>')
    .description('Append a text message as a new segment')
    .requiredOption('--text <text>', 'Message text')
    .option('--role <role>', 'user or assistant', 'user')
    .option('--kind <kind>', 'Segment kind', 'chat_history')
    .action(async (id: string, options: { text: string; role?: string; kind?: string }) => {
      await appendCommand(await createCommandContext(), id, options);
    });

  threads
    .command('repair <id>')
    .description('Remove orphaned tool results and empty segments')
    .action(async (id: string) => {
      await repairCommand(await createCommandContext(), id);
    });

  threads
    .command('delete <id>')
    .description('Delete a thread')
    .action(async (id: string) => {
      await deleteThreadCommand(await createCommandContext(), id);
    });

  program
    .command('budget <id>')
    .description('Build the bounded request for a thread and report what fits')
    .option('-m, --model <model>', 'Override the thread model')
    .option('--max-output <n>', 'Reserved output tokens', parseNonNegativeInt)
    .option('--system <file>', 'Read the full system prompt from a file')
    .option('--short-system <file>', 'Read the abbreviated system prompt from a file')
    .option('--tools <file>', 'JSON array of tool declarations')
    .option('--json', 'Output as JSON')
    .action(async (id: string, options: {
      model?: string;
      maxOutput?: number;
      system?: string;
      shortSystem?: string;
      tools?: string;
      json?: boolean;
    }) => {
      await budgetCommand(await createCommandContext(), id, options);
    });

  program
    .command('config')
    .description('Manage threadpack configuration')
    .option('--set <key=value>', 'Set configuration value')
    .option('--get <key>', 'Get configuration value')
    .option('--list', 'List all configuration')
    .action(async (options: { set?: string; get?: string; list?: boolean }) => {
      await configCommand(options);
    });

  return program;
}
