import { PreprocessError } from './errors';

const TIMESTAMP_LINE = /^\d\d:\d\d:\d\d\.\d\d\d/;

export const MINIMAL_HEADER = 'WEBVTT\r\n\r\n';

/**
 * Drop everything before the first line that starts with a HH:MM:SS.mmm
 * timestamp and put a bare WEBVTT header in its place. Caption exports from
 * the studio carry header blocks the cue parser rejects; the cue lines
 * themselves are passed through byte for byte.
 */
export function repairHeader(content: string): string {
  let offset = 0;
  // Split after each newline so line endings stay attached and offsets add up
  for (const line of content.split(/(?<=\n)/)) {
    if (TIMESTAMP_LINE.test(line)) {
      return MINIMAL_HEADER + content.slice(offset);
    }
    offset += line.length;
  }
  throw new PreprocessError('No timestamp-like lines found', { length: content.length });
}
