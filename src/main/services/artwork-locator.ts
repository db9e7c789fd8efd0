import path from 'node:path';
import sharp from 'sharp';
import mime from 'mime-types';
import { ARTWORK_CANDIDATES } from '../config/artwork-config.js';
import { SetupError, toError } from '../errors.js';
import { isFile } from '../utils/files.js';
import { detectMagicType } from '../utils/magic-bytes.js';
import log from '../logger.js';

export interface ArtworkInfo {
  path: string;
  width: number;
  height: number;
  format?: string;
}

/** First conventional cover file in `dir`, or null. */
export const findArtwork = async (dir: string): Promise<string | null> => {
  for (const name of ARTWORK_CANDIDATES) {
    const candidate = path.join(dir, name);
    if (await isFile(candidate)) {
      return candidate;
    }
  }
  return null;
};

export const resolveArtwork = async (dir: string, explicitPath?: string): Promise<string> => {
  if (explicitPath) {
    if (!(await isFile(explicitPath))) {
      throw new SetupError(`Artwork file not found: '${explicitPath}'`);
    }
    return explicitPath;
  }
  const found = await findArtwork(dir);
  if (!found) {
    throw new SetupError('Could not find an artwork file. Use the -f flag to specify one');
  }
  return found;
};

export const inspectArtwork = async (artworkPath: string): Promise<ArtworkInfo> => {
  const declared = mime.lookup(artworkPath);
  if (declared && !declared.startsWith('image/')) {
    throw new SetupError(`Artwork '${artworkPath}' is not an image (${declared})`);
  }

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(artworkPath).metadata();
  } catch (error) {
    throw new SetupError(`Unable to read artwork '${artworkPath}': ${toError(error).message}`);
  }
  if (!metadata.width || !metadata.height) {
    throw new SetupError(`Unable to read image dimensions of '${artworkPath}'`);
  }
  // the MP3 muxer only carries JPEG or PNG covers when copying streams
  const magic = await detectMagicType(artworkPath);
  if (magic !== 'jpg' && magic !== 'png') {
    throw new SetupError(`Artwork '${artworkPath}' must be a JPEG or PNG image (detected ${metadata.format ?? magic})`);
  }
  log.verbose('Artwork %s (%dx%d %s)', artworkPath, metadata.width, metadata.height, metadata.format ?? 'unknown');
  return { path: artworkPath, width: metadata.width, height: metadata.height, format: metadata.format };
};
