import type { Millis } from './types';

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}

export function formatTimestamp(ms: Millis): string {
  const clamped = Math.max(0, Math.round(ms));
  const hours = Math.floor(clamped / 3_600_000);
  const minutes = Math.floor((clamped % 3_600_000) / 60_000);
  const seconds = Math.floor((clamped % 60_000) / 1000);
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(clamped % 1000, 3)}`;
}

/**
 * On-screen time of a single cue. Cues whose end precedes their start count as zero.
 */
export function cueSpanMs(start: Millis, end: Millis): Millis {
  return Math.max(0, end - start);
}
