// Conversation engine - drives agent turns over a persisted thread

import { EventEmitter } from 'events';
import { ContextManager } from '../context/manager.js';
import { chatSegment, toolExchangeSegment } from '../context/segment.js';
import { StreamAccumulator, type LLMTransport, type StopReason, type StreamEvent, type TokenUsage } from '../llm/transport.js';
import { toolResultMessage, userMessage, type JsonValue, type ToolDefinition, type ToolUseBlock } from '../llm/types.js';
import { planRepair, repairThreadWithReport } from '../thread/repair.js';
import { ThreadStoreError, type ThreadStore } from '../thread/store.js';
import { AgentThread } from '../thread/thread.js';
import { HandledError, getErrorMessage } from '../utils/error-handler.js';
import { logger as rootLogger } from '../utils/logger.js';
import { SystemPromptBuilder } from './prompt.js';

const logger = rootLogger.child('engine');

export type AgentState =
  | 'idle'
  | 'awaiting_user_input'
  | 'preparing_request'
  | 'streaming_response'
  | 'executing_tools'
  | 'finalizing_turn'
  | 'error';

export interface ContextTruncatedInfo {
  segmentsDropped: number;
  tokensUsed: number;
  budget: number;
}

export interface TurnCompleteInfo {
  stopReason: StopReason;
  usage?: TokenUsage;
}

export interface ConversationEngineEvents {
  state: (state: AgentState, previous: AgentState) => void;
  chunk: (event: StreamEvent) => void;
  tool_use_requested: (toolUse: ToolUseBlock) => void;
  context_truncated: (info: ContextTruncatedInfo) => void;
  turn_complete: (info: TurnCompleteInfo) => void;
  error: (error: Error) => void;
}

export interface ToolResultInput {
  toolUseId: string;
  output: string | JsonValue;
  isError?: boolean;
}

export type TurnOutcome =
  | { status: 'complete'; stopReason: StopReason; usage?: TokenUsage; saved: boolean }
  | { status: 'tool_use'; toolUses: ToolUseBlock[] }
  | { status: 'cancelled' }
  | { status: 'error'; error: Error };

export interface ConversationEngineOptions {
  transport: LLMTransport;
  store: ThreadStore;
  contextManager?: ContextManager;
  promptBuilder?: SystemPromptBuilder;
  tools?: ToolDefinition[];
  /** Reserved output override for every request */
  maxOutputTokens?: number;
}

const BUSY_STATES: ReadonlySet<AgentState> = new Set(['preparing_request', 'streaming_response', 'finalizing_turn']);

export declare interface ConversationEngine {
  on<K extends keyof ConversationEngineEvents>(event: K, listener: ConversationEngineEvents[K]): this;
  once<K extends keyof ConversationEngineEvents>(event: K, listener: ConversationEngineEvents[K]): this;
  off<K extends keyof ConversationEngineEvents>(event: K, listener: ConversationEngineEvents[K]): this;
  emit<K extends keyof ConversationEngineEvents>(event: K, ...args: Parameters<ConversationEngineEvents[K]>): boolean;
}

export class ConversationEngine extends EventEmitter {
  private readonly transport: LLMTransport;
  private readonly store: ThreadStore;
  private readonly contextManager: ContextManager;
  private readonly promptBuilder: SystemPromptBuilder;
  private readonly tools: ToolDefinition[];
  private readonly maxOutputTokens?: number;

  private _state: AgentState = 'idle';
  private currentThread: AgentThread | null = null;
  private pendingToolUses: ToolUseBlock[] = [];
  private abortController?: AbortController;

  constructor(options: ConversationEngineOptions) {
    super();
    this.transport = options.transport;
    this.store = options.store;
    this.contextManager = options.contextManager ?? new ContextManager();
    this.promptBuilder = options.promptBuilder ?? new SystemPromptBuilder();
    this.tools = options.tools ?? [];
    this.maxOutputTokens = options.maxOutputTokens;
  }

  get state(): AgentState {
    return this._state;
  }

  get thread(): AgentThread | null {
    return this.currentThread;
  }

  getPendingToolUses(): ToolUseBlock[] {
    return [...this.pendingToolUses];
  }

  newThread(model: string, title?: string): AgentThread {
    this.assertNotBusy();
    this.currentThread = new AgentThread(model, { title });
    this.pendingToolUses = [];
    this.transition('awaiting_user_input');
    return this.currentThread;
  }

  /**
   * Load, repair and activate a stored thread. Repairs are written back under
   * the store's write lock, so concurrent writers are not overwritten.
   */
  async loadThread(id: string): Promise<AgentThread | null> {
    this.assertNotBusy();
    let thread = await this.store.get(id);
    if (!thread) return null;

    const plan = planRepair(thread.segments);
    if (plan.toolResultsRemoved > 0 || plan.segmentsRemoved > 0) {
      thread = await this.store.update(id, stored => {
        repairThreadWithReport(stored);
      });
      if (!thread) return null;
    }

    this.currentThread = thread;
    this.pendingToolUses = [];
    this.transition('awaiting_user_input');
    return thread;
  }

  async saveThread(): Promise<void> {
    await this.store.save(this.requireThread());
  }

  async sendMessage(text: string): Promise<TurnOutcome> {
    this.assertNotBusy();
    const thread = this.requireThread();
    if (this.pendingToolUses.length > 0) {
      throw new HandledError(
        `${this.pendingToolUses.length} tool call(s) are waiting for results; call continueAfterTools first`,
        'sendMessage'
      );
    }

    thread.addSegment(chatSegment([userMessage(text)]));
    return this.runTurn();
  }

  async continueAfterTools(results: readonly ToolResultInput[]): Promise<TurnOutcome> {
    this.assertNotBusy();
    const thread = this.requireThread();
    if (results.length === 0) {
      throw new HandledError('No tool results supplied', 'continueAfterTools');
    }
    this.assertAnswersPending(results);

    thread.addSegment(
      toolExchangeSegment(results.map(r => toolResultMessage(r.toolUseId, r.output, r.isError ?? false)))
    );
    this.pendingToolUses = [];
    return this.runTurn();
  }

  /**
   * Abort the in-flight stream, if any
   */
  cancel(): void {
    this.abortController?.abort();
  }

  private async runTurn(): Promise<TurnOutcome> {
    const thread = this.requireThread();
    this.transition('preparing_request');

    const built = this.contextManager.buildRequest({
      model: thread.model,
      systemPrompt: this.promptBuilder.build(),
      shortSystemPrompt: this.promptBuilder.buildShort(),
      tools: this.tools,
      segments: thread.segments,
      maxOutputTokens: this.maxOutputTokens,
    });

    if (built.truncated) {
      this.emit('context_truncated', {
        segmentsDropped: built.segmentsDropped,
        tokensUsed: built.totalTokens,
        budget: built.budget,
      });
    }

    const controller = new AbortController();
    this.abortController = controller;
    const accumulator = new StreamAccumulator();
    this.transition('streaming_response');

    try {
      for await (const event of this.transport.stream(built.request, controller.signal)) {
        if (controller.signal.aborted) break;
        accumulator.addEvent(event);
        this.emit('chunk', event);
        if (event.type === 'tool_use') {
          this.emit('tool_use_requested', { type: 'tool_use', id: event.id, name: event.name, input: event.input });
        }
      }
    } catch (error) {
      if (!controller.signal.aborted) {
        return this.fail(new HandledError(`LLM stream failed: ${getErrorMessage(error)}`, 'stream', error));
      }
    } finally {
      this.abortController = undefined;
    }

    if (controller.signal.aborted) {
      logger.debug(`Turn cancelled for thread ${thread.id}`);
      this.transition('awaiting_user_input');
      return { status: 'cancelled' };
    }

    if (!accumulator.isEmpty()) {
      thread.addSegment(chatSegment([accumulator.toMessage()]));
    }

    const toolUses = accumulator.getToolUses();
    if (toolUses.length > 0) {
      this.pendingToolUses = toolUses;
      this.transition('executing_tools');
      return { status: 'tool_use', toolUses };
    }

    return this.finalizeTurn(accumulator.getStopReason() ?? 'end_turn', accumulator.getUsage());
  }

  private async finalizeTurn(stopReason: StopReason, usage?: TokenUsage): Promise<TurnOutcome> {
    const thread = this.requireThread();
    this.transition('finalizing_turn');

    let saved = true;
    try {
      await this.store.save(thread);
    } catch (error) {
      // The in-memory thread stays as it is; the caller may retry saveThread()
      saved = false;
      this.emitError(ThreadStoreError.wrap(error, 'save', thread.id));
    }

    this.emit('turn_complete', { stopReason, usage });
    this.transition('awaiting_user_input');
    return { status: 'complete', stopReason, usage, saved };
  }

  private fail(error: Error): TurnOutcome {
    this.emitError(error);
    this.transition('error');
    return { status: 'error', error };
  }

  private emitError(error: Error): void {
    // An 'error' event without listeners would throw
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    } else {
      logger.error(error.message);
    }
  }

  private transition(next: AgentState): void {
    if (this._state === next) return;
    const previous = this._state;
    this._state = next;
    this.emit('state', next, previous);
  }

  private requireThread(): AgentThread {
    if (!this.currentThread) {
      throw new HandledError('No active thread', 'engine');
    }
    return this.currentThread;
  }

  /**
   * Every pending tool call must get exactly one result, and nothing else
   */
  private assertAnswersPending(results: readonly ToolResultInput[]): void {
    const pending = new Set(this.pendingToolUses.map(toolUse => toolUse.id));
    const answered = new Set<string>();
    const unexpected: string[] = [];

    for (const { toolUseId } of results) {
      if (!pending.has(toolUseId) || answered.has(toolUseId)) {
        unexpected.push(toolUseId);
      }
      answered.add(toolUseId);
    }
    const missing = [...pending].filter(id => !answered.has(id));

    if (missing.length > 0 || unexpected.length > 0) {
      const parts: string[] = [];
      if (missing.length > 0) parts.push(`missing: ${missing.join(', ')}`);
      if (unexpected.length > 0) parts.push(`unexpected: ${unexpected.join(', ')}`);
      throw new HandledError(
        `Tool results must answer each pending tool call once (${parts.join('; ')})`,
        'continueAfterTools'
      );
    }
  }

  private assertNotBusy(): void {
    if (BUSY_STATES.has(this._state)) {
      throw new HandledError(`Engine is busy (${this._state})`, 'engine');
    }
  }
}
