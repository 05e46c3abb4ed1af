// Thread management commands

import chalk from 'chalk';
import { formatDistanceToNow } from 'date-fns';
import { createSegment, isSegmentKind, segmentCost, type SegmentKind } from '../../context/segment.js';
import { textMessage, type MessageRole } from '../../llm/types.js';
import { repairThreadWithReport, type RepairReport } from '../../thread/repair.js';
import { AgentThread } from '../../thread/thread.js';
import { HandledError } from '../../utils/error-handler.js';
import { createContextManager, type CommandContext } from '../context.js';

function notFound(id: string): HandledError {
  return new HandledError(`Thread not found: ${id}`, 'threads');
}

export async function listThreadsCommand(ctx: CommandContext, options: { json?: boolean }): Promise<void> {
  const summaries = await ctx.store.listSummary();

  if (options.json) {
    ctx.write(JSON.stringify(
      summaries.map(s => ({ ...s, updatedAt: s.updatedAt.toISOString() })),
      null,
      2
    ));
    return;
  }

  if (summaries.length === 0) {
    ctx.write('No threads found');
    return;
  }

  for (const summary of summaries) {
    const age = formatDistanceToNow(summary.updatedAt, { addSuffix: true });
    ctx.write(
      `${chalk.cyan(summary.id)}  ${summary.title}  ${chalk.gray(summary.model)}  ` +
      `${summary.segmentCount} segment(s)  ${chalk.gray(age)}`
    );
  }
}

export async function showThreadCommand(ctx: CommandContext, id: string): Promise<void> {
  const thread = await ctx.store.get(id);
  if (!thread) throw notFound(id);

  const counter = createContextManager(ctx).getCounter();

  ctx.write(`${chalk.bold(thread.title)} (${thread.id})`);
  ctx.write(`model: ${thread.model}`);
  ctx.write(`created: ${thread.createdAt.toISOString()}  updated: ${thread.updatedAt.toISOString()}`);
  for (const [key, value] of Object.entries(thread.metadata)) {
    ctx.write(`${key}: ${value}`);
  }

  if (thread.segments.length === 0) {
    ctx.write('(no segments)');
    return;
  }

  for (const segment of thread.segments) {
    const tokens = segmentCost(segment, thread.model, counter);
    ctx.write(`#${segment.sequence} ${segment.kind} ${tokens} tokens ${segment.messages.length} message(s)`);
  }
}

export async function createThreadCommand(
  ctx: CommandContext,
  options: { model?: string; title?: string }
): Promise<AgentThread> {
  const thread = new AgentThread(options.model ?? ctx.config.context.defaultModel, { title: options.title });
  await ctx.store.save(thread);
  ctx.write(thread.id);
  return thread;
}

export async function appendCommand(
  ctx: CommandContext,
  id: string,
  options: { text: string; role?: string; kind?: string }
): Promise<number> {
  const role = options.role ?? 'user';
  if (role !== 'user' && role !== 'assistant') {
    throw new HandledError(`Invalid role: ${role} (expected user or assistant)`, 'threads append');
  }
  const roleName: MessageRole = role;

  const kindName = options.kind ?? 'chat_history';
  if (!isSegmentKind(kindName)) {
    throw new HandledError(`Invalid segment kind: ${kindName}`, 'threads append');
  }
  const kind: SegmentKind = kindName;

  let sequence = -1;
  const thread = await ctx.store.update(id, t => {
    sequence = t.addSegment(createSegment(kind, [textMessage(roleName, options.text)]));
  });
  if (!thread) throw notFound(id);

  ctx.write(`Appended segment #${sequence} to ${id}`);
  return sequence;
}

export async function repairCommand(ctx: CommandContext, id: string): Promise<RepairReport> {
  let report: RepairReport = { toolResultsRemoved: 0, segmentsRemoved: 0 };
  const thread = await ctx.store.update(id, t => {
    report = repairThreadWithReport(t);
  });
  if (!thread) throw notFound(id);

  ctx.write(
    `Removed ${report.toolResultsRemoved} orphaned tool result(s) and ${report.segmentsRemoved} empty segment(s)`
  );
  return report;
}

export async function deleteThreadCommand(ctx: CommandContext, id: string): Promise<void> {
  const thread = await ctx.store.get(id);
  if (!thread) throw notFound(id);
  await ctx.store.delete(id);
  ctx.write(`Deleted ${id}`);
}
