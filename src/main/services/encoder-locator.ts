import path from 'node:path';
import type { EncoderBinary, EncoderName } from '../../shared/types/artwork-job.js';
import { ENCODER_CANDIDATES } from '../config/artwork-config.js';
import { SetupError } from '../errors.js';
import { isFile } from '../utils/files.js';
import log from '../logger.js';

export interface EncoderLookupEnv {
  PATH?: string;
  FFMPEG_PATH?: string;
}

const executableNames = (name: string): string[] =>
  process.platform === 'win32' ? [`${name}.exe`, name] : [name];

export const findOnPath = async (name: string, searchPath: string | undefined): Promise<string | null> => {
  for (const dir of (searchPath ?? '').split(path.delimiter)) {
    if (!dir) continue;
    for (const candidate of executableNames(name)) {
      const full = path.join(dir, candidate);
      if (await isFile(full)) {
        return full;
      }
    }
  }
  return null;
};

const nameFromOverride = (overridePath: string): EncoderName =>
  path.basename(overridePath).toLowerCase().startsWith('avconv') ? 'avconv' : 'ffmpeg';

export const locateEncoder = async (env: EncoderLookupEnv = process.env): Promise<EncoderBinary> => {
  if (env.FFMPEG_PATH) {
    if (await isFile(env.FFMPEG_PATH)) {
      log.verbose('Using encoder from FFMPEG_PATH: %s', env.FFMPEG_PATH);
      return { name: nameFromOverride(env.FFMPEG_PATH), path: env.FFMPEG_PATH };
    }
    log.warn('FFMPEG_PATH points at %s, which is not a file; searching PATH instead.', env.FFMPEG_PATH);
  }

  for (const name of ENCODER_CANDIDATES) {
    const found = await findOnPath(name, env.PATH);
    if (found) {
      log.verbose('Using %s at %s', name, found);
      return { name, path: found };
    }
  }
  throw new SetupError('Could not find either ffmpeg or avconv to encode with');
};
