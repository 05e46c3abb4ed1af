// Request budgeting report for a stored thread

import chalk from 'chalk';
import { promises as fs } from 'fs';
import { z } from 'zod';
import { SystemPromptBuilder } from '../../agent/prompt.js';
import { percentUsed } from '../../context/budget.js';
import type { BuiltContext } from '../../context/manager.js';
import type { ToolDefinition } from '../../llm/types.js';
import { JsonValueSchema } from '../../thread/serialization.js';
import { HandledError } from '../../utils/error-handler.js';
import { safeFilesystemOperation } from '../../utils/filesystem-errors.js';
import { createContextManager, type CommandContext } from '../context.js';

export interface BudgetOptions {
  model?: string;
  maxOutput?: number;
  system?: string;
  shortSystem?: string;
  tools?: string;
  json?: boolean;
}

const ToolFileSchema = z.array(
  z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    inputSchema: JsonValueSchema.default({ type: 'object', properties: {} }),
  })
);

async function readText(file: string): Promise<string> {
  return safeFilesystemOperation(() => fs.readFile(file, 'utf-8'), file, 'read');
}

export async function loadToolDefinitions(file: string): Promise<ToolDefinition[]> {
  const text = await readText(file);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new HandledError(`Tools file ${file} is not valid JSON`, 'budget', error);
  }
  const parsed = ToolFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new HandledError(`Tools file ${file} must be an array of {name, description, inputSchema}`, 'budget', parsed.error);
  }
  return parsed.data;
}

function progressBar(percent: number): string {
  const width = 20;
  const filled = Math.round((percent / 100) * width);
  const empty = width - filled;

  let color = chalk.green;
  if (percent > 90) {
    color = chalk.red;
  } else if (percent > 70) {
    color = chalk.yellow;
  }

  return color('█'.repeat(filled)) + chalk.gray('░'.repeat(empty));
}

export function budgetReport(built: BuiltContext): Record<string, string | number | boolean> {
  return {
    model: built.request.model,
    budget: built.budget,
    totalTokens: built.totalTokens,
    mandatoryTokens: built.mandatoryTokens,
    maxOutputTokens: built.request.maxTokens,
    truncated: built.truncated,
    segmentsIncluded: built.segmentsIncluded,
    segmentsDropped: built.segmentsDropped,
    usedShortSystemPrompt: built.usedShortSystemPrompt,
    orphanToolResultsRemoved: built.orphanToolResultsRemoved,
    messages: built.request.messages.length,
  };
}

export async function budgetCommand(ctx: CommandContext, id: string, options: BudgetOptions): Promise<BuiltContext> {
  const thread = await ctx.store.get(id);
  if (!thread) {
    throw new HandledError(`Thread not found: ${id}`, 'budget');
  }

  if (options.maxOutput !== undefined && (!Number.isInteger(options.maxOutput) || options.maxOutput < 0)) {
    throw new HandledError(`--max-output must be a non-negative integer`, 'budget');
  }

  const builder = new SystemPromptBuilder();
  const systemPrompt = options.system ? await readText(options.system) : builder.build();
  const shortSystemPrompt = options.shortSystem ? await readText(options.shortSystem) : builder.buildShort();
  const tools = options.tools ? await loadToolDefinitions(options.tools) : [];

  const built = createContextManager(ctx).buildRequest({
    model: options.model ?? thread.model,
    systemPrompt,
    shortSystemPrompt,
    tools,
    segments: thread.segments,
    maxOutputTokens: options.maxOutput,
  });

  if (options.json) {
    ctx.write(JSON.stringify(budgetReport(built), null, 2));
    return built;
  }

  const percent = percentUsed(built.totalTokens, built.budget);
  ctx.write(`${progressBar(percent)} ${Math.round(percent)}% of budget`);
  for (const [key, value] of Object.entries(budgetReport(built))) {
    ctx.write(`${key}: ${value}`);
  }
  if (built.truncated) {
    ctx.write(chalk.yellow(`${built.segmentsDropped} older segment(s) did not fit and were left out`));
  }
  return built;
}
