import fs from 'fs-extra';
import { distance } from 'fuzzball';
import { SpeakerListError, errorMessage } from './errors';
import { debug } from './log';
import type { SpeakerCorrection } from './types';

export const UNKNOWN_SPEAKER = 'UNKNOWN';

export type DistanceFn = (a: string, b: string) => number;

export interface SpeakerResolverOptions {
  /** When false, labels are returned verbatim and the map is never touched. */
  infer?: boolean;
  distance?: DistanceFn;
}

/**
 * Names from a known-speaker list, one per line, blanks skipped, with the
 * UNKNOWN placeholder appended.
 */
export function parseKnownSpeakers(text: string): string[] {
  const names = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
  names.push(UNKNOWN_SPEAKER);
  return names;
}

export async function loadKnownSpeakers(filePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    throw new SpeakerListError(filePath, errorMessage(e));
  }
  const names = parseKnownSpeakers(text);
  debug('speakers.load', { filePath, count: names.length });
  return names;
}

/**
 * Maps hand-typed speaker labels onto the fixed cast. A label seen for the
 * first time is matched to the known name with the lowest Levenshtein
 * distance (earliest in list order on ties) and the answer is cached for the
 * rest of the run.
 */
export class SpeakerResolver {
  private readonly known: readonly string[];
  private readonly infer: boolean;
  private readonly distanceFn: DistanceFn;
  private readonly map = new Map<string, string>();

  constructor(knownSpeakers: readonly string[], opts: SpeakerResolverOptions = {}) {
    this.known = knownSpeakers.includes(UNKNOWN_SPEAKER)
      ? [...knownSpeakers]
      : [...knownSpeakers, UNKNOWN_SPEAKER];
    this.infer = opts.infer ?? true;
    // Raw strings, code points: fuzzball lowercases and strips punctuation unless told not to
    this.distanceFn = opts.distance ?? ((a, b) => distance(a, b, { full_process: false, astral: true }));
    for (const name of this.known) this.map.set(name, name);
  }

  resolve(raw: string): string {
    if (!this.infer) return raw;
    const cached = this.map.get(raw);
    if (cached !== undefined) return cached;

    let best = this.known[0];
    let bestScore = Infinity;
    for (const candidate of this.known) {
      const score = this.distanceFn(raw, candidate);
      if (score < bestScore) {
        bestScore = score;
        best = candidate;
      }
    }
    this.map.set(raw, best);
    debug('speakers.infer', { raw, canonical: best, distance: bestScore });
    return best;
  }

  get speakerMap(): ReadonlyMap<string, string> {
    return this.map;
  }

  get knownSpeakers(): readonly string[] {
    return this.known;
  }

  corrections(): SpeakerCorrection[] {
    const out: SpeakerCorrection[] = [];
    for (const [raw, canonical] of this.map) {
      if (raw !== canonical) out.push({ raw, canonical });
    }
    return out;
  }
}
