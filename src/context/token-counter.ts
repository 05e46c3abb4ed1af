// Token counting for messages and tool declarations

import { encode } from 'gpt-tokenizer';
import type { ContentBlock, Message, ToolDefinition } from '../llm/types.js';
import { getErrorMessage } from '../utils/error-handler.js';
import { logger as rootLogger } from '../utils/logger.js';
import { getDefaultCatalog, type ModelCatalog, type TokenizerKind } from './models.js';

const logger = rootLogger.child('tokens');

/**
 * Fixed structural costs added on top of encoded text
 */
export interface TokenOverheads {
  /** Role and formatting metadata, per message */
  perMessage: number;
  /** Protocol framing, once per countMessages call */
  messageBatch: number;
  toolUse: number;
  toolResult: number;
  /** Flat cost of an image block or image tool result */
  imageTokens: number;
  perTool: number;
}

export const DEFAULT_TOKEN_OVERHEADS: TokenOverheads = {
  perMessage: 4,
  messageBatch: 3,
  toolUse: 10,
  toolResult: 10,
  imageTokens: 1000,
  perTool: 20,
};

export interface TokenCounter {
  countText(model: string, text: string): number;
  countMessages(model: string, messages: readonly Message[]): number;
  countTools(model: string, tools: readonly ToolDefinition[]): number;
}

/** Returns the number of BPE tokens in `text` */
export type BpeEncoder = (text: string) => number;

const NO_SPECIAL_TOKENS = new Set<string>();

// Special-token markers in user text are counted as ordinary text
const cl100kEncoder: BpeEncoder = text => encode(text, { disallowedSpecial: NO_SPECIAL_TOKENS }).length;

export function heuristicTokenCount(text: string): number {
  // Code points, not UTF-16 units
  return Math.ceil(Array.from(text).length / 4);
}

export interface TokenCounterOptions {
  catalog?: ModelCatalog;
  overheads?: Partial<TokenOverheads>;
  encoder?: BpeEncoder;
}

export class DefaultTokenCounter implements TokenCounter {
  private readonly catalog: ModelCatalog;
  private readonly encoder: BpeEncoder;
  readonly overheads: TokenOverheads;

  constructor(options: TokenCounterOptions = {}) {
    this.catalog = options.catalog ?? getDefaultCatalog();
    this.encoder = options.encoder ?? cl100kEncoder;
    this.overheads = { ...DEFAULT_TOKEN_OVERHEADS, ...options.overheads };
  }

  countText(model: string, text: string): number {
    return this.countWith(this.catalog.infoFor(model).tokenizer, text);
  }

  countMessages(model: string, messages: readonly Message[]): number {
    const tokenizer = this.catalog.infoFor(model).tokenizer;
    let total = 0;

    for (const message of messages) {
      total += this.overheads.perMessage;
      for (const block of message.content) {
        total += this.countBlock(tokenizer, block);
      }
    }

    return total + this.overheads.messageBatch;
  }

  countTools(model: string, tools: readonly ToolDefinition[]): number {
    const tokenizer = this.catalog.infoFor(model).tokenizer;
    return tools.reduce((total, tool) => {
      return total
        + this.countWith(tokenizer, tool.name)
        + this.countWith(tokenizer, tool.description)
        + this.countWith(tokenizer, JSON.stringify(tool.inputSchema))
        + this.overheads.perTool;
    }, 0);
  }

  private countBlock(tokenizer: TokenizerKind, block: ContentBlock): number {
    switch (block.type) {
      case 'text':
        return this.countWith(tokenizer, block.text);
      case 'thinking':
        return this.countWith(tokenizer, block.thinking);
      case 'tool_use':
        return this.countWith(tokenizer, block.name)
          + this.countWith(tokenizer, JSON.stringify(block.input))
          + this.overheads.toolUse;
      case 'tool_result': {
        const payload = block.content;
        let tokens: number;
        switch (payload.type) {
          case 'text':
            tokens = this.countWith(tokenizer, payload.text);
            break;
          case 'json':
            tokens = this.countWith(tokenizer, JSON.stringify(payload.value));
            break;
          case 'image':
            tokens = this.overheads.imageTokens;
            break;
        }
        return tokens + this.overheads.toolResult;
      }
      case 'image':
        return this.overheads.imageTokens;
    }
  }

  private countWith(tokenizer: TokenizerKind, text: string): number {
    if (tokenizer === 'heuristic' || text.length === 0) {
      return heuristicTokenCount(text);
    }
    try {
      return this.encoder(text);
    } catch (error) {
      logger.debug(`BPE encode failed, using character heuristic: ${getErrorMessage(error)}`);
      return heuristicTokenCount(text);
    }
  }
}
