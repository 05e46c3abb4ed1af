// Persisted thread record format

import { z } from 'zod';
import type { JsonValue } from '../llm/types.js';
import { SEGMENT_KINDS, type Segment } from '../context/segment.js';
import { HandledError } from '../utils/error-handler.js';
import { logger as rootLogger } from '../utils/logger.js';
import { AgentThread, type Clock } from './thread.js';

const logger = rootLogger.child('thread');

export const THREAD_RECORD_VERSION = 1;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const ImageDataSchema = z.object({
  source: z.discriminatedUnion('type', [
    z.object({ type: z.literal('base64'), data: z.string() }),
    z.object({ type: z.literal('url'), url: z.string() }),
  ]),
  mediaType: z.string(),
});

const ToolResultContentSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('json'), value: JsonValueSchema }),
  z.object({ type: z.literal('image'), image: ImageDataSchema }),
]);

const ContentBlockSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({ type: z.literal('thinking'), thinking: z.string() }),
  z.object({ type: z.literal('image'), image: ImageDataSchema }),
  z.object({ type: z.literal('tool_use'), id: z.string().min(1), name: z.string(), input: JsonValueSchema }),
  z.object({
    type: z.literal('tool_result'),
    toolUseId: z.string().min(1),
    content: ToolResultContentSchema,
    isError: z.boolean().default(false),
  }),
]);

const MessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.array(ContentBlockSchema),
});

export const SegmentSchema = z.object({
  kind: z.enum(SEGMENT_KINDS),
  messages: z.array(MessageSchema),
  sequence: z.number().int().nonnegative(),
});

const IsoDate = z.string().datetime({ offset: true });

export const ThreadRecordSchema = z.object({
  version: z.literal(THREAD_RECORD_VERSION),
  id: z.string().min(1),
  title: z.string(),
  model: z.string(),
  // Checked one by one so a bad segment does not take the thread down with it
  segments: z.array(z.unknown()),
  createdAt: IsoDate,
  updatedAt: IsoDate,
  nextSequence: z.number().int().nonnegative(),
  metadata: z.record(z.string()).default({}),
});

/** Segment as written to storage; token memos are not persisted */
export type StoredSegment = Pick<Segment, 'kind' | 'messages' | 'sequence'>;

export type ThreadRecord = Omit<z.infer<typeof ThreadRecordSchema>, 'segments'> & {
  segments: StoredSegment[];
};

export function serializeThread(thread: AgentThread): ThreadRecord {
  const snapshot = thread.snapshot();
  return {
    version: THREAD_RECORD_VERSION,
    id: snapshot.id,
    title: snapshot.title,
    model: snapshot.model,
    segments: snapshot.segments.map(segment => ({
      kind: segment.kind,
      messages: segment.messages.map(message => ({ role: message.role, content: [...message.content] })),
      sequence: segment.sequence,
    })),
    createdAt: snapshot.createdAt.toISOString(),
    updatedAt: snapshot.updatedAt.toISOString(),
    nextSequence: snapshot.nextSequence,
    metadata: snapshot.metadata,
  };
}

export interface DeserializeResult {
  thread: AgentThread;
  skippedSegments: number;
}

/**
 * Rebuild a thread from a stored record.
 * Throws HandledError when the record itself is unusable; skips bad segments.
 */
export function deserializeThread(raw: unknown, source: string = 'thread record', clock?: Clock): DeserializeResult {
  const parsed = ThreadRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new HandledError(`Invalid thread record in ${source}: ${issues}`, 'deserialize', parsed.error);
  }

  const record = parsed.data;
  const segments: Segment[] = [];
  let skippedSegments = 0;

  record.segments.forEach((candidate, index) => {
    const segment = SegmentSchema.safeParse(candidate);
    if (segment.success) {
      segments.push(segment.data);
    } else {
      skippedSegments++;
      logger.warn(`Skipping malformed segment #${index} in ${source}: ${segment.error.issues[0]?.message ?? 'invalid'}`);
    }
  });

  segments.sort((a, b) => a.sequence - b.sequence);
  const ordered = segments.filter((segment, index) => {
    if (index > 0 && segments[index - 1].sequence === segment.sequence) {
      skippedSegments++;
      logger.warn(`Skipping segment with duplicate sequence ${segment.sequence} in ${source}`);
      return false;
    }
    return true;
  });

  const thread = AgentThread.restore(
    {
      id: record.id,
      title: record.title,
      model: record.model,
      segments: ordered,
      createdAt: new Date(record.createdAt),
      updatedAt: new Date(record.updatedAt),
      nextSequence: record.nextSequence,
      metadata: record.metadata,
    },
    clock
  );

  return { thread, skippedSegments };
}
