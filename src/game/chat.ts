import type { ChatEvent } from './types.js';

// Game message prefixes. Round end comes from a broadcast whose wording varies, so it's matched loosely.
const ROUND_END_MARKER = 'subdued';
const HAZARD_OUT_PREFIX = 'The brazier has gone out';
const HAZARD_BROKEN_PREFIX = 'The brazier is broken and shrapnel';
const DAMAGE_PREFIXES = ['The cold of', 'The freezing cold attack'] as const;

export interface ChatClassification {
  event: ChatEvent;
  lastSeenLine: string;
}

/**
 * Classify the newest chat line. A line identical to the previous one is still on screen
 * from an earlier tick and never counts twice; every distinct line is classified exactly once.
 */
export function classifyChatLine(rawLine: string, lastSeenLine: string): ChatClassification {
  if (!rawLine || rawLine === lastSeenLine) {
    return { event: 'none', lastSeenLine };
  }
  return { event: eventOf(rawLine), lastSeenLine: rawLine };
}

function eventOf(line: string): ChatEvent {
  if (line.toLowerCase().includes(ROUND_END_MARKER)) return 'round-end';
  if (line.startsWith(HAZARD_OUT_PREFIX)) return 'hazard-out';
  if (line.startsWith(HAZARD_BROKEN_PREFIX)) return 'hazard-broken';
  if (DAMAGE_PREFIXES.some(prefix => line.startsWith(prefix))) return 'damaged';
  return 'none';
}
