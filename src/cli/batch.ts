import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { errorMeta } from '../pipeline/errors';
import { closeLogFile, error, setLogFile } from '../pipeline/log';
import { parseCaptionDir } from '../pipeline/run';
import { loadKnownSpeakers } from '../pipeline/speakers';

async function main() {
    const argv = await yargs(hideBin(process.argv))
        .option('src', { type: 'string', default: ENV.captionsDir, describe: 'Directory of .vtt caption files' })
        .option('out', { type: 'string', default: ENV.transcriptsDir, describe: 'Directory for .txt transcripts' })
        .option('speaker-list-file', { type: 'string', default: ENV.speakerListFile })
        // The scheduled job has always run without name correction
        .option('infer-speakers', { type: 'boolean', default: false })
        .option('drop-trailing-block', { type: 'boolean', default: ENV.dropTrailingBlock })
        .option('force', { type: 'boolean', default: ENV.force, describe: 'Rewrite transcripts that already exist' })
        .option('jsonl', { type: 'boolean', default: false, describe: 'Also write <name>.blocks.jsonl' })
        .help()
        .parse();

    if (ENV.logFile) setLogFile(ENV.logFile);

    const knownSpeakers = await loadKnownSpeakers(argv['speaker-list-file']);
    const stats = await parseCaptionDir(argv.src, argv.out, {
        knownSpeakers,
        inferSpeakers: argv['infer-speakers'],
        dropTrailingBlock: argv['drop-trailing-block'],
        force: argv.force,
        jsonl: argv.jsonl,
    });

    console.log(`\n=== Batch Summary ===`);
    console.log(`Output dir:   ${path.resolve(argv.out)}`);
    console.log(`Total found:  ${stats.total}`);
    console.log(`Processed:    ${stats.processed}`);
    console.log(`Skipped:      ${stats.skipped}`);
    console.log(`Failed:       ${stats.failed}`);
    closeLogFile();
    if (stats.failed > 0) process.exitCode = 1;
}

main().catch((e) => {
    error('batch.fail', errorMeta(e));
    process.exit(1);
});
