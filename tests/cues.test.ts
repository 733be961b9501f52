import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import { describe, it, expect, vi } from 'vitest';
import { readCues, webvttCueSource } from '../src/pipeline/cues';
import { CueParseError, PreprocessError } from '../src/pipeline/errors';
import { MINIMAL_HEADER, repairHeader } from '../src/pipeline/preprocess';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe('repairHeader', () => {
  it('replaces everything before the first timestamp line', () => {
    const raw = 'WEBVTT\nKind: captions\nLanguage: en\n\n00:00:01.000 --> 00:00:02.000\nhello\n';
    expect(repairHeader(raw)).toBe('WEBVTT\r\n\r\n00:00:01.000 --> 00:00:02.000\nhello\n');
  });

  it('keeps CRLF cue lines byte for byte', () => {
    const raw = 'junk\r\n00:00:01.000 --> 00:00:02.000\r\nhi\u0000\r\n';
    expect(repairHeader(raw)).toBe(MINIMAL_HEADER + '00:00:01.000 --> 00:00:02.000\r\nhi\u0000\r\n');
  });

  it('prepends the header when the first line is already a cue', () => {
    const raw = '00:00:00.000 --> 00:00:01.000\nx\n';
    expect(repairHeader(raw)).toBe(MINIMAL_HEADER + raw);
  });

  it('only accepts a strict HH:MM:SS.mmm prefix', () => {
    const raw = '1:00:00.000 --> 1:00:01.000\nnote 00:00:01.000\n00:00:05.250 --> 00:00:06.000\nok\n';
    expect(repairHeader(raw)).toBe(MINIMAL_HEADER + '00:00:05.250 --> 00:00:06.000\nok\n');
  });

  it('fails without any timestamp line', () => {
    expect(() => repairHeader('WEBVTT\n\nnothing here\n')).toThrow(PreprocessError);
    expect(() => repairHeader('')).toThrow('No timestamp-like lines found');
  });
});

describe('readCues', () => {
  const raw = 'header\n00:00:01.000 --> 00:00:02.000\nhi\n';

  it('hands the repaired text to the cue source', () => {
    const source = vi.fn(() => [{ start: 1000, end: 2000, text: 'hi' }]);
    expect(readCues(raw, source)).toEqual([{ start: 1000, end: 2000, text: 'hi' }]);
    expect(source).toHaveBeenCalledWith(MINIMAL_HEADER + '00:00:01.000 --> 00:00:02.000\nhi\n');
  });

  it('wraps parser failures in CueParseError', () => {
    const source = () => {
      throw new Error('bad cue');
    };
    expect(() => readCues(raw, source)).toThrow(CueParseError);
    expect(() => readCues(raw, source)).toThrow('Malformed cue data: bad cue');
  });

  it('rejects cues with unreadable timestamps', () => {
    const source = () => [
      { start: 0, end: 1000, text: 'ok' },
      { start: Number.NaN, end: 2000, text: 'broken' },
    ];
    const err = (() => {
      try {
        readCues(raw, source);
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(CueParseError);
    expect(err).toMatchObject({ code: 'CUE_PARSE_FAILED', details: { index: 1, start: Number.NaN, end: 2000 } });
  });

  it('does not reach the cue source when preprocessing fails', () => {
    const source = vi.fn(() => []);
    expect(() => readCues('no cues', source)).toThrow(PreprocessError);
    expect(source).not.toHaveBeenCalled();
  });

  it('rejects a cue whose timestamp the WebVTT parser would read as zero', () => {
    const content = '00:00:01.000 --> 00:00:02.000\nok\n\n00:00:0x.000 --> 00:00:03.000\nbroken\n';
    expect(() => readCues(content, webvttCueSource)).toThrow(CueParseError);
    expect(() => readCues(content, webvttCueSource)).toThrow(
      'Malformed cue data: Malformed timing line: 00:00:0x.000 --> 00:00:03.000'
    );
  });

  it('rejects an empty cue instead of merging the next one into it', () => {
    const content = '00:00:01.000 --> 00:00:02.000\n\n\n00:00:03.000 --> 00:00:04.000\nb\n';
    expect(() => readCues(content, webvttCueSource)).toThrow(CueParseError);
  });

  it('reads a studio export with the WebVTT parser', async () => {
    const content = await fs.readFile(fixture('council.vtt'), 'utf8');
    const cues = readCues(content, webvttCueSource);
    expect(cues).toHaveLength(5);
    expect(cues[0]).toEqual({ start: 1000, end: 3000, text: '>> MAYR: The meeting will come to order.' });
    expect(cues[2]).toEqual({ start: 5000, end: 6500, text: 'Please rise.' });
  });
});
