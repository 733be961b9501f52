import fs from 'fs-extra';
import path from 'path';
import { readCues, type CueSource } from './cues';
import { errorMeta } from './errors';
import { info, warn, debug, startStep } from './log';
import { blocksJsonl, transcriptText } from './projections';
import { buildSpeechBlocks, type SegmenterOptions } from './segment';
import { SpeakerResolver } from './speakers';
import type { BatchSummary, SpeechBlocksResult } from './types';

export interface ParseOptions extends SegmenterOptions {
  knownSpeakers: readonly string[];
  inferSpeakers?: boolean;
  cueSource?: CueSource;
}

/**
 * Whole-file transform: header repair, cue parsing, then block reconstruction
 * with a resolver scoped to this one caption text.
 */
export function parseCaptionText(content: string, opts: ParseOptions): SpeechBlocksResult {
  const cues = readCues(content, opts.cueSource);
  const resolver = new SpeakerResolver(opts.knownSpeakers, { infer: opts.inferSpeakers ?? true });
  const result = buildSpeechBlocks(cues, resolver, { dropTrailingBlock: opts.dropTrailingBlock });
  debug('parse.complete', {
    cues: cues.length,
    blocks: result.blocks.length,
    corrections: result.corrections.length,
  });
  return result;
}

export async function parseCaptionFile(filePath: string, opts: ParseOptions): Promise<SpeechBlocksResult> {
  const content = await fs.readFile(filePath, 'utf8');
  return parseCaptionText(content, opts);
}

export interface BatchOptions extends ParseOptions {
  force?: boolean;
  /** Also write <name>.blocks.jsonl next to each transcript. */
  jsonl?: boolean;
}

/**
 * Turn every *.vtt in srcDir into <name>.txt in dstDir. Files that already
 * have a transcript are skipped unless forced; a file that fails is logged
 * and counted, and the run moves on.
 */
export async function parseCaptionDir(
  srcDir: string,
  dstDir: string,
  opts: BatchOptions
): Promise<BatchSummary> {
  await fs.ensureDir(dstDir);
  const files = (await fs.readdir(srcDir)).filter((f) => f.endsWith('.vtt')).sort();
  const stats: BatchSummary = { total: files.length, processed: 0, skipped: 0, failed: 0 };
  const timer = startStep('batch.parse', { srcDir, dstDir, total: files.length });

  for (const [i, file] of files.entries()) {
    const base = file.slice(0, -'.vtt'.length);
    const transcriptPath = path.join(dstDir, `${base}.txt`);
    if (!opts.force && (await fs.pathExists(transcriptPath))) {
      debug('batch.file.skip', { file, reason: 'transcript exists' });
      stats.skipped++;
    } else {
      try {
        const result = await parseCaptionFile(path.join(srcDir, file), opts);
        await fs.writeFile(transcriptPath, transcriptText(result.blocks));
        if (opts.jsonl) {
          await fs.writeFile(path.join(dstDir, `${base}.blocks.jsonl`), blocksJsonl(result.blocks));
        }
        info('batch.file.done', { file, blocks: result.blocks.length });
        stats.processed++;
      } catch (e) {
        warn('batch.file.fail', { file, ...errorMeta(e) });
        stats.failed++;
      }
    }
    timer.eta(i + 1, files.length);
  }

  timer.end();
  info('batch.complete', { ...stats });
  return stats;
}
