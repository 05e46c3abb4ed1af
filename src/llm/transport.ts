// Streaming transport contract and stream accumulation

import type { ContentBlock, JsonValue, LLMRequest, Message, ToolUseBlock } from './types.js';

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'stop_sequence' | 'cancelled';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type StreamEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'thinking_delta'; thinking: string }
  | { type: 'tool_use'; id: string; name: string; input: JsonValue }
  | { type: 'stop'; reason: StopReason; usage?: TokenUsage };

/**
 * Sends a bounded request to a provider. Wire formats stay behind this interface.
 */
export interface LLMTransport {
  stream(request: LLMRequest, signal?: AbortSignal): AsyncIterable<StreamEvent>;
}

/**
 * Accumulates streamed events into one assistant message
 */
export class StreamAccumulator {
  private text = '';
  private thinking = '';
  private toolUses: ToolUseBlock[] = [];
  private stopReason?: StopReason;
  private usage?: TokenUsage;

  addEvent(event: StreamEvent): void {
    switch (event.type) {
      case 'text_delta':
        this.text += event.text;
        break;
      case 'thinking_delta':
        this.thinking += event.thinking;
        break;
      case 'tool_use':
        this.toolUses.push({ type: 'tool_use', id: event.id, name: event.name, input: event.input });
        break;
      case 'stop':
        this.stopReason = event.reason;
        this.usage = event.usage;
        break;
    }
  }

  getText(): string {
    return this.text;
  }

  getToolUses(): ToolUseBlock[] {
    return [...this.toolUses];
  }

  getStopReason(): StopReason | undefined {
    return this.stopReason;
  }

  getUsage(): TokenUsage | undefined {
    return this.usage;
  }

  isEmpty(): boolean {
    return this.text === '' && this.thinking === '' && this.toolUses.length === 0;
  }

  /**
   * Thinking first, then text, then tool uses in arrival order
   */
  toMessage(): Message {
    const content: ContentBlock[] = [];
    if (this.thinking) content.push({ type: 'thinking', thinking: this.thinking });
    if (this.text) content.push({ type: 'text', text: this.text });
    content.push(...this.toolUses);
    return { role: 'assistant', content };
  }
}
