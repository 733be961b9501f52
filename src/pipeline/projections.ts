import { formatTimestamp } from './timecode';
import type { Block, SpeakerCorrection } from './types';

export function transcriptText(blocks: readonly Block[]): string {
  return blocks.map((b) => b.speech).join('\n');
}

/**
 * Total speaking seconds per speaker, keyed in order of first appearance.
 * Sums are rounded to the millisecond to keep float noise out of the output.
 */
export function speakerTimes(blocks: readonly Block[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const block of blocks) {
    totals.set(block.speaker, (totals.get(block.speaker) ?? 0) + block.duration);
  }
  for (const [speaker, seconds] of totals) {
    totals.set(speaker, Math.round(seconds * 1000) / 1000);
  }
  return totals;
}

export function correctionLines(corrections: readonly SpeakerCorrection[]): string[] {
  return corrections.map((c) => `Inferred ${c.raw} -> ${c.canonical}`);
}

export interface BlockRecord {
  start: string;
  end: string;
  duration: number;
  speaker: string;
  speech: string;
}

export function toBlockRecord(block: Block): BlockRecord {
  return {
    start: formatTimestamp(block.start),
    end: formatTimestamp(block.end),
    duration: block.duration,
    speaker: block.speaker,
    speech: block.speech,
  };
}

function withCorrections(corrections: readonly SpeakerCorrection[], body: string): string {
  return [...correctionLines(corrections), '', body].join('\n');
}

export function renderSpeakerTimes(
  blocks: readonly Block[],
  corrections: readonly SpeakerCorrection[]
): string {
  const totals = Object.fromEntries(speakerTimes(blocks));
  return withCorrections(corrections, JSON.stringify(totals, null, 2));
}

export function renderBlocks(
  blocks: readonly Block[],
  corrections: readonly SpeakerCorrection[]
): string {
  return withCorrections(corrections, JSON.stringify(blocks.map(toBlockRecord), null, 2));
}

export function blocksJsonl(blocks: readonly Block[]): string {
  const lines = blocks.map((b) => JSON.stringify(toBlockRecord(b)));
  return lines.join('\n') + (lines.length ? '\n' : '');
}
