// Thread consistency repair

import type { Message } from '../llm/types.js';
import type { Segment } from '../context/segment.js';
import { logger as rootLogger } from '../utils/logger.js';
import type { AgentThread } from './thread.js';

const logger = rootLogger.child('repair');

export interface RepairResult {
  /** Segments after repair, in original order */
  segments: Segment[];
  toolResultsRemoved: number;
  segmentsRemoved: number;
}

/**
 * Compute the repaired segment list without touching the thread.
 *
 * Tool results are orphaned when no assistant message anywhere in the log
 * carries a tool_use with their id. Messages and segments left empty by the
 * removal are dropped, as are segments that were already empty.
 */
export function planRepair(segments: readonly Segment[]): RepairResult {
  const toolUseIds = new Set<string>();
  for (const segment of segments) {
    for (const message of segment.messages) {
      if (message.role !== 'assistant') continue;
      for (const block of message.content) {
        if (block.type === 'tool_use') toolUseIds.add(block.id);
      }
    }
  }

  let toolResultsRemoved = 0;
  let segmentsRemoved = 0;
  const repaired: Segment[] = [];

  for (const segment of segments) {
    let changed = false;
    const messages: Message[] = [];

    for (const message of segment.messages) {
      if (message.role !== 'user') {
        messages.push(message);
        continue;
      }
      const content = message.content.filter(
        block => block.type !== 'tool_result' || toolUseIds.has(block.toolUseId)
      );
      const removedHere = message.content.length - content.length;
      if (removedHere === 0) {
        messages.push(message);
        continue;
      }
      toolResultsRemoved += removedHere;
      changed = true;
      if (content.length > 0) {
        messages.push({ ...message, content });
      }
    }

    const blockCount = messages.reduce((total, message) => total + message.content.length, 0);
    if (blockCount === 0) {
      segmentsRemoved++;
      continue;
    }

    // Token memo no longer matches the content
    repaired.push(changed ? { kind: segment.kind, messages, sequence: segment.sequence } : segment);
  }

  return { segments: repaired, toolResultsRemoved, segmentsRemoved };
}

export interface RepairReport {
  toolResultsRemoved: number;
  segmentsRemoved: number;
}

/**
 * Remove orphaned tool results and empty segments in place.
 * The thread is only touched when something was removed.
 */
export function repairThreadWithReport(thread: AgentThread): RepairReport {
  const plan = planRepair(thread.segments);

  if (plan.toolResultsRemoved > 0 || plan.segmentsRemoved > 0) {
    thread.replaceSegments(plan.segments);
    logger.info(
      `Repaired thread ${thread.id}: removed ${plan.toolResultsRemoved} orphaned tool result(s) ` +
      `and ${plan.segmentsRemoved} empty segment(s)`
    );
  }

  return { toolResultsRemoved: plan.toolResultsRemoved, segmentsRemoved: plan.segmentsRemoved };
}

/**
 * @returns the number of tool results removed
 */
export function repairThread(thread: AgentThread): number {
  return repairThreadWithReport(thread).toolResultsRemoved;
}
