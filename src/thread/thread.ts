// Agent thread - the append-only segment log behind one conversation

import { v4 as uuidv4 } from 'uuid';
import type { Segment } from '../context/segment.js';

export const DEFAULT_THREAD_TITLE = 'New conversation';

export type Clock = () => Date;

export interface ThreadInit {
  id?: string;
  title?: string;
  createdAt?: Date;
  clock?: Clock;
}

/**
 * State restored from storage, bypassing sequence stamping
 */
export interface ThreadSnapshot {
  id: string;
  title: string;
  model: string;
  segments: Segment[];
  createdAt: Date;
  updatedAt: Date;
  nextSequence: number;
  metadata: Record<string, string>;
}

export function newThreadId(): string {
  return `T-${uuidv4()}`;
}

export class AgentThread {
  readonly id: string;
  private _title: string;
  private _model: string;
  private _segments: Segment[] = [];
  private nextSequence = 0;
  private _metadata: Record<string, string> = {};
  readonly createdAt: Date;
  private _updatedAt: Date;
  private readonly clock: Clock;

  constructor(model: string, init: ThreadInit = {}) {
    this.clock = init.clock ?? (() => new Date());
    this.id = init.id ?? newThreadId();
    this._title = init.title ?? DEFAULT_THREAD_TITLE;
    this._model = model;
    this.createdAt = init.createdAt ? new Date(init.createdAt.getTime()) : this.clock();
    this._updatedAt = this.createdAt;
  }

  static restore(snapshot: ThreadSnapshot, clock?: Clock): AgentThread {
    const thread = new AgentThread(snapshot.model, {
      id: snapshot.id,
      title: snapshot.title,
      createdAt: snapshot.createdAt,
      clock,
    });
    const maxSequence = snapshot.segments.reduce((max, s) => Math.max(max, s.sequence), -1);

    thread._segments = [...snapshot.segments];
    thread.nextSequence = Math.max(snapshot.nextSequence, maxSequence + 1);
    thread._metadata = { ...snapshot.metadata };
    thread._updatedAt = new Date(snapshot.updatedAt.getTime());
    return thread;
  }

  get title(): string {
    return this._title;
  }

  get model(): string {
    return this._model;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get segments(): readonly Segment[] {
    return this._segments;
  }

  get metadata(): Readonly<Record<string, string>> {
    return this._metadata;
  }

  /**
   * Append a segment. Any sequence or token count the caller set is replaced.
   * @returns the sequence assigned
   */
  addSegment(segment: Segment): number {
    const sequence = this.nextSequence++;
    this._segments.push({ kind: segment.kind, messages: [...segment.messages], sequence });
    this.touch();
    return sequence;
  }

  peekSequence(): number {
    return this.nextSequence;
  }

  clear(): void {
    this._segments = [];
    this.nextSequence = 0;
    this.touch();
  }

  setTitle(title: string): void {
    this._title = title;
    this.touch();
  }

  setModel(model: string): void {
    this._model = model;
    this.touch();
  }

  setMetadata(key: string, value: string): void {
    this._metadata[key] = value;
    this.touch();
  }

  /**
   * Swap in a rewritten segment list. The sequence counter is left alone.
   */
  replaceSegments(segments: readonly Segment[]): void {
    this._segments = [...segments];
    this.touch();
  }

  snapshot(): ThreadSnapshot {
    return {
      id: this.id,
      title: this._title,
      model: this._model,
      segments: [...this._segments],
      createdAt: this.createdAt,
      updatedAt: this._updatedAt,
      nextSequence: this.nextSequence,
      metadata: { ...this._metadata },
    };
  }

  private touch(): void {
    this._updatedAt = this.clock();
  }
}
