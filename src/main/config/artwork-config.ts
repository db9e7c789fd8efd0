import os from 'node:os';
import { parseArgs } from 'node:util';
import type { ArtworkRunRequest, EncoderName } from '../../shared/types/artwork-job.js';
import { UsageError, toError } from '../errors.js';

export const ARTWORK_CANDIDATES = [
  'cover.jpg',
  'cover.jpeg',
  'cover.png',
  'folder.jpg',
  'folder.jpeg',
  'folder.png'
] as const;

export const AUDIO_EXTENSION = '.mp3';

export const ENCODER_CANDIDATES: readonly EncoderName[] = ['ffmpeg', 'avconv'];

export const COVER_OUTPUT_OPTIONS = [
  '-map', '0:a',
  '-map', '1:0',
  '-c', 'copy',
  '-id3v2_version', '3',
  '-metadata:s:v', 'title=Album cover',
  '-metadata:s:v', 'comment=Cover (Front)'
];

export const defaultConcurrency = (): number => Math.max(1, os.availableParallelism());

export const ARTWORK_USAGE = [
  'Usage: apply-artwork [-svh] [-f artfile] [-j jobs] [-r report] [--probe] [directory]',
  '\t-f <file> - Use <file> as artwork instead of looking for common artwork files',
  '\t-s - convert files sequentially instead of using the worker pool',
  '\t-v - be verbose',
  '\t-h - print this usage information',
  '\t-j X - Number of concurrent jobs (default: one per core)',
  '\t-r <file> - Write a JSON run report to <file> (plus a CSV beside it)',
  '\t--probe - Check each output with ffprobe for an attached cover stream'
].join('\n');

export interface ArtworkCliOptions {
  request: ArtworkRunRequest;
  verbose: boolean;
}

const parseJobs = (raw: string | undefined): number | undefined => {
  if (raw === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new UsageError(`Job count must be a positive integer: '${raw}'`, ARTWORK_USAGE);
  }
  return Number(raw);
};

const readArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        file: { type: 'string', short: 'f' },
        sequential: { type: 'boolean', short: 's', default: false },
        verbose: { type: 'boolean', short: 'v', default: false },
        jobs: { type: 'string', short: 'j' },
        report: { type: 'string', short: 'r' },
        probe: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false }
      }
    });
  } catch (error) {
    throw new UsageError(toError(error).message, ARTWORK_USAGE);
  }
};

export const parseArtworkArgs = (argv: string[]): ArtworkCliOptions => {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    throw new UsageError('', ARTWORK_USAGE);
  }
  if (positionals.length > 1) {
    throw new UsageError(`Expected at most one directory, got ${positionals.length}`, ARTWORK_USAGE);
  }

  return {
    verbose: values.verbose,
    request: {
      directory: positionals[0] ?? '.',
      artworkPath: values.file,
      mode: values.sequential ? 'sequential' : 'parallel',
      jobs: parseJobs(values.jobs),
      probe: values.probe,
      reportPath: values.report
    }
  };
};
