import { parse } from '@plussub/srt-vtt-parser';
import { CueParseError, errorMessage } from './errors';
import { repairHeader } from './preprocess';
import type { Cue } from './types';

/**
 * Anything that can turn header-repaired caption text into an ordered cue list.
 */
export type CueSource = (content: string) => Cue[];

const TIMESTAMP = String.raw`(?:\d{2,}:)?\d\d:\d\d\.\d\d\d`;
const TIMING_LINE = new RegExp(`^${TIMESTAMP}[ \t]+-->[ \t]+${TIMESTAMP}(?:[ \t].*)?$`);

/**
 * The parser reads a bad timestamp as 0 and folds the cue after an empty one
 * into its text, so every "-->" line is checked up front and the cue count
 * must match the timing lines afterwards.
 */
export const webvttCueSource: CueSource = (content) => {
  const timingLines = content.split(/\r?\n/).filter((line) => line.includes('-->'));
  const malformed = timingLines.find((line) => !TIMING_LINE.test(line.trim()));
  if (malformed !== undefined) {
    throw new Error(`Malformed timing line: ${malformed.trim()}`);
  }

  const { entries } = parse(content);
  if (entries.length !== timingLines.length) {
    throw new Error(`Expected ${timingLines.length} cues, parser returned ${entries.length}`);
  }
  return entries.map((entry, index) => {
    if (entry.text.includes('-->')) {
      throw new Error(`Cue ${index} absorbed a timing line`);
    }
    return { start: entry.from, end: entry.to, text: entry.text };
  });
};

/**
 * Repair the header of raw caption text and read it into cues. Nothing partial
 * is returned: a parser failure or a cue without usable timestamps fails the
 * whole file.
 */
export function readCues(content: string, source: CueSource = webvttCueSource): Cue[] {
  const repaired = repairHeader(content);
  let cues: Cue[];
  try {
    cues = source(repaired);
  } catch (e) {
    throw new CueParseError(`Malformed cue data: ${errorMessage(e)}`);
  }
  cues.forEach((cue, index) => {
    if (!Number.isFinite(cue.start) || !Number.isFinite(cue.end)) {
      throw new CueParseError(`Cue ${index} has an unreadable timestamp`, {
        index,
        start: cue.start,
        end: cue.end,
      });
    }
  });
  return cues;
}
