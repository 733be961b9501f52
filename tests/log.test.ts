import { afterEach, describe, it, expect, vi } from 'vitest';
import { info, isLogLevel, setLogLevel, startStep, warn } from '../src/pipeline/log';

describe('log', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('writes JSON lines to stderr at or above the current level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');

    info('batch.file.done', { file: 'a.vtt' });
    warn('batch.file.fail', { file: 'b.vtt', error: 'No timestamp-like lines found' });

    expect(spy).toHaveBeenCalledTimes(1);
    const payload = JSON.parse(String(spy.mock.calls[0][0]));
    expect(payload).toMatchObject({
      level: 'warn',
      msg: 'batch.file.fail',
      file: 'b.vtt',
      error: 'No timestamp-like lines found',
    });
  });

  it('keeps stdout free for transcript output', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('debug');
    info('parse.complete');
    expect(stdout).not.toHaveBeenCalled();
  });

  it('brackets a step with start and end lines', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('info');

    const timer = startStep('batch.parse', { total: 2 });
    timer.end();

    const messages = spy.mock.calls.map((c) => JSON.parse(String(c[0])).msg);
    expect(messages).toEqual(['start:batch.parse', 'end:batch.parse']);
  });

  it('stays quiet on progress when there is nothing to count', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');
    const timer = startStep('batch.parse');
    setLogLevel('info');

    timer.eta(0, 0);

    expect(spy).not.toHaveBeenCalled();
  });

  it('recognises level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
