import { DuplicateFilter, normalizeLine } from './normalize';
import { SpeakerResolver, UNKNOWN_SPEAKER } from './speakers';
import { cueSpanMs } from './timecode';
import type { Block, Cue, Millis, SpeechBlocksResult } from './types';

/** Hand-entered by the captioner at the start of every new speaker turn. */
export const SPEAKER_MARKER = '>>';

export interface SegmenterOptions {
  /**
   * Discard the block still open when the cues run out, as earlier releases
   * did. Off by default, since it loses the last speaker's remarks.
   */
  dropTrailingBlock?: boolean;
}

interface ActiveBlock {
  start: Millis;
  end: Millis;
  durationMs: Millis;
  speaker: string;
  speech: string;
}

function freeze(b: ActiveBlock): Block {
  return {
    start: b.start,
    end: b.end,
    duration: b.durationMs / 1000,
    speaker: b.speaker,
    speech: b.speech,
  };
}

/**
 * Label between the marker and the first colon, e.g. ">> Smith: ..." -> "smith".
 * Lines without a colon are not attributed.
 */
export function speakerLabel(line: string): string | null {
  const colon = line.indexOf(':');
  if (colon < 0) return null;
  return line.slice(SPEAKER_MARKER.length, colon).trim().toLowerCase();
}

export class BlockSegmenter {
  private readonly blocks: Block[] = [];
  private current: ActiveBlock | null = null;
  private readonly dedup = new DuplicateFilter();

  constructor(
    private readonly resolver: SpeakerResolver,
    private readonly opts: SegmenterOptions = {}
  ) {}

  push(cue: Cue): void {
    const line = normalizeLine(cue.text);
    if (!this.dedup.accept(line)) return;

    // Display time, not end - start of the whole block, so pauses between captions are not counted
    const span = cueSpanMs(cue.start, cue.end);

    if (line.startsWith(SPEAKER_MARKER)) {
      if (this.current) this.blocks.push(freeze(this.current));
      const label = speakerLabel(line);
      this.current = {
        start: cue.start,
        end: cue.end,
        durationMs: 0,
        speaker: label === null ? UNKNOWN_SPEAKER : this.resolver.resolve(label),
        speech: line,
      };
    } else if (this.current) {
      this.current.speech += ' ' + line;
      this.current.end = cue.end;
    }

    // Captions before the first marker belong to nobody; their time is dropped
    if (this.current) this.current.durationMs += span;
  }

  finish(): Block[] {
    if (this.current && !this.opts.dropTrailingBlock) {
      this.blocks.push(freeze(this.current));
    }
    this.current = null;
    return this.blocks;
  }
}

export function buildSpeechBlocks(
  cues: Iterable<Cue>,
  resolver: SpeakerResolver,
  opts: SegmenterOptions = {}
): SpeechBlocksResult {
  const segmenter = new BlockSegmenter(resolver, opts);
  for (const cue of cues) segmenter.push(cue);
  return { blocks: segmenter.finish(), corrections: resolver.corrections() };
}
