// Context Manager - packs a thread's segments into one bounded request

import type { LLMRequest, Message, ToolDefinition } from '../llm/types.js';
import { logger as rootLogger } from '../utils/logger.js';
import { computeBudget, DEFAULT_SAFETY_MARGIN_PERCENT } from './budget.js';
import { splitLastTurn } from './last-turn.js';
import { getDefaultCatalog, type ModelCatalog } from './models.js';
import { segmentCost, type Segment } from './segment.js';
import { DefaultTokenCounter, type TokenCounter } from './token-counter.js';

const logger = rootLogger.child('context');

export interface ContextManagerConfig {
  /** Percentage of the context window held back for estimation error */
  safetyMarginPercent: number;
  /** Reserved output when neither the request nor the catalog sets one */
  maxOutputTokens?: number;
}

export interface BuildContextParams {
  model: string;
  systemPrompt: string;
  /** Substituted when the mandatory payload would not fit */
  shortSystemPrompt?: string;
  tools?: ToolDefinition[];
  segments: readonly Segment[];
  maxOutputTokens?: number;
}

export interface BuiltContext {
  request: LLMRequest;
  totalTokens: number;
  budget: number;
  truncated: boolean;
  segmentsIncluded: number;
  segmentsDropped: number;
  /** System prompt + tools + last turn (+ segments pinned to it by tool ids) */
  mandatoryTokens: number;
  usedShortSystemPrompt: boolean;
  orphanToolResultsRemoved: number;
}

const DEFAULT_CONFIG: ContextManagerConfig = {
  safetyMarginPercent: DEFAULT_SAFETY_MARGIN_PERCENT,
};

interface PackingUnit {
  /** Indices into the segment list, ascending */
  members: number[];
  newestSequence: number;
}

export interface ContextManagerOptions extends Partial<ContextManagerConfig> {
  catalog?: ModelCatalog;
  counter?: TokenCounter;
}

export class ContextManager {
  private config: ContextManagerConfig;
  private readonly catalog: ModelCatalog;
  private readonly counter: TokenCounter;

  constructor(options: ContextManagerOptions = {}) {
    const { catalog, counter, ...config } = options;
    this.config = { ...DEFAULT_CONFIG, ...stripUndefined(config) };
    this.catalog = catalog ?? getDefaultCatalog();
    this.counter = counter ?? new DefaultTokenCounter({ catalog: this.catalog });
  }

  getConfig(): ContextManagerConfig {
    return { ...this.config };
  }

  getCounter(): TokenCounter {
    return this.counter;
  }

  /**
   * Build a request that fits the model's budget.
   *
   * Never throws for budget reasons: when even the mandatory content is over
   * budget the request is returned anyway, shrunk as far as allowed.
   */
  buildRequest(params: BuildContextParams): BuiltContext {
    const { model, segments } = params;
    const tools = params.tools ?? [];
    const info = this.catalog.infoFor(model);

    const reservedOutput = params.maxOutputTokens ?? this.config.maxOutputTokens ?? info.defaultMaxOutputTokens;
    const { budget } = computeBudget(info.contextWindowTokens, reservedOutput, this.config.safetyMarginPercent);

    const { older, preserved, boundary } = splitLastTurn(segments);
    const units = this.groupByToolIds(segments);

    // Units reaching into the last turn are sent with it
    const pinned = new Set<number>();
    const candidates: PackingUnit[] = [];
    for (const unit of units) {
      const olderMembers = unit.members.filter(i => i < boundary);
      if (olderMembers.length === 0) continue;
      if (olderMembers.length < unit.members.length) {
        olderMembers.forEach(i => pinned.add(i));
      } else {
        candidates.push(unit);
      }
    }

    const cost = (index: number): number => segmentCost(segments[index], model, this.counter);

    const toolsTokens = this.counter.countTools(model, tools);
    let segmentTokens = 0;
    for (let i = boundary; i < segments.length; i++) segmentTokens += cost(i);
    for (const i of pinned) segmentTokens += cost(i);

    let system = params.systemPrompt;
    let usedShortSystemPrompt = false;
    let mandatoryTokens = this.counter.countText(model, system) + toolsTokens + segmentTokens;

    if (mandatoryTokens > budget && params.shortSystemPrompt !== undefined) {
      system = params.shortSystemPrompt;
      usedShortSystemPrompt = true;
      mandatoryTokens = this.counter.countText(model, system) + toolsTokens + segmentTokens;
    }

    let remaining = Math.max(0, budget - mandatoryTokens);

    // Newest first; each unit goes in whole or not at all
    candidates.sort((a, b) => b.newestSequence - a.newestSequence);
    const included = new Set<number>(pinned);
    let segmentsDropped = 0;

    for (const unit of candidates) {
      const unitTokens = unit.members.reduce((sum, i) => sum + cost(i), 0);
      if (unitTokens <= remaining) {
        unit.members.forEach(i => included.add(i));
        remaining -= unitTokens;
      } else {
        segmentsDropped += unit.members.length;
      }
    }

    const olderIncluded = older
      .map((segment, index) => ({ segment, index }))
      .filter(({ index }) => included.has(index))
      .sort((a, b) => a.segment.sequence - b.segment.sequence || a.index - b.index)
      .map(({ segment }) => segment);

    const assembled: Message[] = [];
    for (const segment of [...olderIncluded, ...preserved]) {
      assembled.push(...segment.messages);
    }
    const { messages, removed: orphanToolResultsRemoved } = stripOrphanToolResults(assembled);

    if (orphanToolResultsRemoved > 0) {
      logger.warn(`Removed ${orphanToolResultsRemoved} tool result(s) with no matching tool use from request for ${model}`);
    }

    const totalTokens = Math.max(0, budget - remaining);
    const built: BuiltContext = {
      request: {
        model,
        system,
        messages,
        tools: [...tools],
        maxTokens: reservedOutput,
        stream: true,
      },
      totalTokens,
      budget,
      truncated: segmentsDropped > 0,
      segmentsIncluded: olderIncluded.length + preserved.length,
      segmentsDropped,
      mandatoryTokens,
      usedShortSystemPrompt,
      orphanToolResultsRemoved,
    };

    logger.debug(
      `context: model=${model} budget=${budget} used=${totalTokens} mandatory=${mandatoryTokens} ` +
      `included=${built.segmentsIncluded} dropped=${segmentsDropped}${usedShortSystemPrompt ? ' short-prompt' : ''}`
    );

    return built;
  }

  /**
   * Segments joined by a tool_use id and its tool_result form one unit
   */
  private groupByToolIds(segments: readonly Segment[]): PackingUnit[] {
    const parent = segments.map((_, i) => i);
    const find = (i: number): number => {
      while (parent[i] !== i) {
        parent[i] = parent[parent[i]];
        i = parent[i];
      }
      return i;
    };
    const union = (a: number, b: number): void => {
      const ra = find(a);
      const rb = find(b);
      if (ra !== rb) parent[Math.max(ra, rb)] = Math.min(ra, rb);
    };

    const useOwner = new Map<string, number>();
    segments.forEach((segment, index) => {
      for (const message of segment.messages) {
        if (message.role !== 'assistant') continue;
        for (const block of message.content) {
          if (block.type === 'tool_use' && !useOwner.has(block.id)) {
            useOwner.set(block.id, index);
          }
        }
      }
    });

    segments.forEach((segment, index) => {
      for (const message of segment.messages) {
        for (const block of message.content) {
          if (block.type !== 'tool_result') continue;
          const owner = useOwner.get(block.toolUseId);
          if (owner !== undefined) union(owner, index);
        }
      }
    });

    const byRoot = new Map<number, PackingUnit>();
    segments.forEach((segment, index) => {
      const root = find(index);
      const unit = byRoot.get(root);
      if (unit) {
        unit.members.push(index);
        unit.newestSequence = Math.max(unit.newestSequence, segment.sequence);
      } else {
        byRoot.set(root, { members: [index], newestSequence: segment.sequence });
      }
    });

    return Array.from(byRoot.values());
  }
}

/**
 * Drop tool_result blocks whose tool_use is not among `messages`,
 * and any user message left with no content.
 */
export function stripOrphanToolResults(messages: readonly Message[]): { messages: Message[]; removed: number } {
  const toolUseIds = new Set<string>();
  for (const message of messages) {
    if (message.role !== 'assistant') continue;
    for (const block of message.content) {
      if (block.type === 'tool_use') toolUseIds.add(block.id);
    }
  }

  let removed = 0;
  const result: Message[] = [];
  for (const message of messages) {
    if (message.role !== 'user') {
      result.push(message);
      continue;
    }
    const content = message.content.filter(block => {
      if (block.type === 'tool_result' && !toolUseIds.has(block.toolUseId)) {
        removed++;
        return false;
      }
      return true;
    });
    if (content.length === message.content.length) {
      result.push(message);
    } else if (content.length > 0) {
      result.push({ ...message, content });
    }
  }

  return { messages: result, removed };
}

function stripUndefined(config: Partial<ContextManagerConfig>): Partial<ContextManagerConfig> {
  const result: Partial<ContextManagerConfig> = {};
  if (config.safetyMarginPercent !== undefined) result.safetyMarginPercent = config.safetyMarginPercent;
  if (config.maxOutputTokens !== undefined) result.maxOutputTokens = config.maxOutputTokens;
  return result;
}
