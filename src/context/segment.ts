// Context segments: typed, sequenced groups of messages in a thread

import type { Message } from '../llm/types.js';
import type { TokenCounter } from './token-counter.js';

/**
 * Ordered by intended retention priority, highest first
 */
export const SEGMENT_KINDS = [
  'system',
  'instructions',
  'repo_context',
  'chat_history',
  'tool_exchange',
  'summary',
] as const;

export type SegmentKind = (typeof SEGMENT_KINDS)[number];

export function isSegmentKind(value: string): value is SegmentKind {
  return SEGMENT_KINDS.some(kind => kind === value);
}

/**
 * Cached cost. Only valid for the model and counter that produced it; never persisted.
 */
export interface TokenMemo {
  model: string;
  counter: TokenCounter;
  tokens: number;
}

export interface Segment {
  readonly kind: SegmentKind;
  readonly messages: readonly Message[];
  /** Assigned by the owning thread on insertion */
  readonly sequence: number;
  tokenCount?: TokenMemo;
}

export function createSegment(kind: SegmentKind, messages: readonly Message[]): Segment {
  return { kind, messages: [...messages], sequence: 0 };
}

export function chatSegment(messages: readonly Message[]): Segment {
  return createSegment('chat_history', messages);
}

export function toolExchangeSegment(messages: readonly Message[]): Segment {
  return createSegment('tool_exchange', messages);
}

export function systemSegment(text: string): Segment {
  return createSegment('system', [{ role: 'user', content: [{ type: 'text', text }] }]);
}

/**
 * Token cost of a segment's messages, memoized per model and counter
 */
export function segmentCost(segment: Segment, model: string, counter: TokenCounter): number {
  const memo = segment.tokenCount;
  if (memo && memo.model === model && memo.counter === counter) {
    return memo.tokens;
  }
  const tokens = counter.countMessages(model, segment.messages);
  segment.tokenCount = { model, counter, tokens };
  return tokens;
}

export function segmentBlockCount(segment: Segment): number {
  return segment.messages.reduce((total, message) => total + message.content.length, 0);
}
