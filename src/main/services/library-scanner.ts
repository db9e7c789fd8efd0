import path from 'node:path';
import { AUDIO_EXTENSION } from '../config/artwork-config.js';
import { TEMP_SUFFIX, listFiles } from '../utils/files.js';

const isAudioFile = (file: string): boolean => {
  const lower = file.toLowerCase();
  return path.extname(lower) === AUDIO_EXTENSION && !lower.endsWith(TEMP_SUFFIX);
};

export const scanAudioFiles = async (root: string): Promise<string[]> => {
  const files = await listFiles(root);
  return files.filter(isAudioFile);
};
