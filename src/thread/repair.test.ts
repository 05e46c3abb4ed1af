import { chatSegment, createSegment, toolExchangeSegment, type Segment } from '../context/segment.js';
import { DefaultTokenCounter } from '../context/token-counter.js';
import { assistantMessage, toolResultMessage, toolUseMessage, userMessage, type Message } from '../llm/types.js';
import { planRepair, repairThread, repairThreadWithReport } from './repair.js';
import { AgentThread } from './thread.js';

function threadWith(segments: Segment[]): AgentThread {
  const thread = new AgentThread('gpt-4o', { clock: () => new Date('2025-03-01T00:00:00.000Z') });
  segments.forEach(segment => thread.addSegment(segment));
  return thread;
}

describe('thread repair', () => {
  test('removes an orphaned result and the segment it leaves empty', () => {
    const thread = threadWith([
      chatSegment([userMessage('list files')]),
      // The tool call that produced this result was lost
      toolExchangeSegment([toolResultMessage('lost-call', 'a.ts\nb.ts')]),
      chatSegment([assistantMessage('done')]),
    ]);

    expect(repairThreadWithReport(thread)).toEqual({ toolResultsRemoved: 1, segmentsRemoved: 1 });
    expect(thread.segments).toHaveLength(2);
    expect(thread.segments.map(s => s.sequence)).toEqual([0, 2]);
  });

  test('keeps the rest of a message that loses a result', () => {
    const mixed: Message = {
      role: 'user',
      content: [
        { type: 'tool_result', toolUseId: 'gone', content: { type: 'text', text: 'x' }, isError: false },
        { type: 'text', text: 'and another thing' },
      ],
    };
    const thread = threadWith([toolExchangeSegment([mixed])]);

    expect(repairThread(thread)).toBe(1);
    expect(thread.segments).toHaveLength(1);
    expect(thread.segments[0].messages).toEqual([userMessage('and another thing')]);
  });

  test('results are matched against calls anywhere in the log', () => {
    const thread = threadWith([
      toolExchangeSegment([toolResultMessage('late', 'ok')]),
      chatSegment([toolUseMessage('late', 'read', {})]),
    ]);
    expect(repairThread(thread)).toBe(0);
    expect(thread.segments).toHaveLength(2);
  });

  test('drops segments that were already empty', () => {
    const thread = threadWith([createSegment('summary', []), chatSegment([userMessage('hi')])]);
    expect(repairThreadWithReport(thread)).toEqual({ toolResultsRemoved: 0, segmentsRemoved: 1 });
    expect(thread.segments).toHaveLength(1);
  });

  test('a clean thread is left untouched', () => {
    const thread = new AgentThread('gpt-4o', { clock: () => new Date('2025-03-01T00:00:00.000Z') });
    thread.addSegment(chatSegment([toolUseMessage('c1', 'read', {})]));
    thread.addSegment(toolExchangeSegment([toolResultMessage('c1', 'ok')]));
    const before = thread.segments;

    expect(repairThreadWithReport(thread)).toEqual({ toolResultsRemoved: 0, segmentsRemoved: 0 });
    expect(thread.segments).toBe(before);
  });

  test('repair is idempotent', () => {
    const thread = threadWith([
      chatSegment([toolUseMessage('kept', 'read', {})]),
      toolExchangeSegment([toolResultMessage('kept', 'ok'), toolResultMessage('orphan-1', 'x')]),
      toolExchangeSegment([toolResultMessage('orphan-2', 'y')]),
    ]);

    expect(repairThreadWithReport(thread)).toEqual({ toolResultsRemoved: 2, segmentsRemoved: 1 });
    expect(repairThreadWithReport(thread)).toEqual({ toolResultsRemoved: 0, segmentsRemoved: 0 });
  });

  test('changed segments lose their cached token count', () => {
    const segment: Segment = {
      ...toolExchangeSegment([toolResultMessage('gone', 'x'), userMessage('text')]),
      tokenCount: { model: 'gpt-4o', counter: new DefaultTokenCounter(), tokens: 50 },
    };
    const plan = planRepair([segment]);
    expect(plan.segments[0].tokenCount).toBeUndefined();
    expect(plan.toolResultsRemoved).toBe(1);
  });

  test('planRepair does not modify its input', () => {
    const segments = [toolExchangeSegment([toolResultMessage('gone', 'x')])];
    planRepair(segments);
    expect(segments[0].messages).toHaveLength(1);
  });
});
