import * as dotenv from 'dotenv';
dotenv.config();

function flag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

export const ENV = {
    // One lowercase name per line; UNKNOWN is appended in code
    speakerListFile: process.env.SPEAKER_LIST_FILE || 'known_speakers.txt',
    captionsDir: process.env.CAPTIONS_DIR || 'raw_captions',
    transcriptsDir: process.env.TRANSCRIPTS_DIR || 'transcripts',
    inferSpeakers: flag(process.env.INFER_SPEAKERS, true),
    // Reproduce the old behaviour of losing the block still open at end of stream
    dropTrailingBlock: flag(process.env.DROP_TRAILING_BLOCK, false),
    force: flag(process.env.FORCE, false),
    logFile: process.env.LOG_FILE || '',
};
