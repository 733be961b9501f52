import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { ENV } from '../pipeline/env';
import { errorMeta } from '../pipeline/errors';
import { closeLogFile, error, setLogFile } from '../pipeline/log';
import { renderBlocks, renderSpeakerTimes, transcriptText } from '../pipeline/projections';
import { parseCaptionFile } from '../pipeline/run';
import { loadKnownSpeakers } from '../pipeline/speakers';

const MODES = ['get-transcript', 'get-speaker-times', 'get-blocks'] as const;

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage('$0 <captions-file> --get-transcript|--get-speaker-times|--get-blocks')
    .demandCommand(1, 'Provide a captions file')
    .option('get-transcript', {
      type: 'boolean',
      default: false,
      describe: 'Output a reconstructed text transcript of all the captions',
    })
    .option('get-speaker-times', {
      type: 'boolean',
      default: false,
      describe: 'Calculate approximate total speaking times for each speaker',
    })
    .option('get-blocks', {
      type: 'boolean',
      default: false,
      describe: 'Output raw information about all reconstructed speech blocks',
    })
    .option('infer-speakers', {
      type: 'boolean',
      default: ENV.inferSpeakers,
      describe: 'Correct speaker-name typos against the known speaker list (--no-infer-speakers to disable)',
    })
    .option('speaker-list-file', {
      type: 'string',
      default: ENV.speakerListFile,
      describe: 'Known speaker names, lowercase, one per line',
    })
    .option('drop-trailing-block', {
      type: 'boolean',
      default: ENV.dropTrailingBlock,
      describe: 'Leave out the block still open at the end of the captions',
    })
    .check((a) => {
      const chosen = MODES.filter((m) => a[m]);
      if (chosen.length !== 1) {
        throw new Error(`Choose exactly one of ${MODES.map((m) => `--${m}`).join(', ')}`);
      }
      return true;
    })
    .help()
    .parse();

  if (ENV.logFile) setLogFile(ENV.logFile);

  const knownSpeakers = await loadKnownSpeakers(argv['speaker-list-file']);
  const { blocks, corrections } = await parseCaptionFile(String(argv._[0]), {
    knownSpeakers,
    inferSpeakers: argv['infer-speakers'],
    dropTrailingBlock: argv['drop-trailing-block'],
  });

  if (argv['get-transcript']) {
    console.log(transcriptText(blocks));
  } else if (argv['get-speaker-times']) {
    console.log(renderSpeakerTimes(blocks, corrections));
  } else {
    console.log(renderBlocks(blocks, corrections));
  }
  closeLogFile();
}

main().catch((e) => {
  error('parse.fail', errorMeta(e));
  process.exit(1);
});
