/** Milliseconds since 00:00:00.000 on the caption clock. */
export type Millis = number;

export interface Cue {
  readonly start: Millis;
  readonly end: Millis;
  readonly text: string;
}

export interface Block {
  readonly start: Millis;
  readonly end: Millis;
  /** Seconds the block's (non-duplicate) captions were on screen. */
  readonly duration: number;
  readonly speaker: string;
  readonly speech: string;
}

export interface SpeakerCorrection {
  raw: string;
  canonical: string;
}

export interface SpeechBlocksResult {
  blocks: Block[];
  corrections: SpeakerCorrection[];
}

export interface BatchSummary {
  total: number;
  processed: number;
  skipped: number;
  failed: number;
}
