import type { SegmentKind } from './segment.js';

export interface TurnSplit<T> {
  /** Everything before the boundary, chronological */
  older: T[];
  /** The in-progress turn, always sent, chronological */
  preserved: T[];
  /** Index of the first preserved segment (equals length when nothing is preserved) */
  boundary: number;
}

/**
 * Index where the last turn begins.
 *
 * Scans backward. Tool exchanges pull the boundary back through the chat
 * segment that requested them; the turn ends at the first chat segment
 * reached outside a tool sequence, or at any other kind outside one.
 */
export function findLastTurnBoundary(segments: ReadonlyArray<{ kind: SegmentKind }>): number {
  let boundary = segments.length;
  let inToolSequence = false;

  for (let i = segments.length - 1; i >= 0; i--) {
    const kind = segments[i].kind;
    if (kind === 'tool_exchange') {
      inToolSequence = true;
      boundary = i;
    } else if (kind === 'chat_history') {
      boundary = i;
      if (!inToolSequence) break;
      inToolSequence = false;
    } else if (!inToolSequence) {
      break;
    }
  }

  return boundary;
}

export function splitLastTurn<T extends { kind: SegmentKind }>(segments: readonly T[]): TurnSplit<T> {
  const boundary = findLastTurnBoundary(segments);
  return {
    older: segments.slice(0, boundary),
    preserved: segments.slice(boundary),
    boundary,
  };
}
