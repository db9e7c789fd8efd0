import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import sharp from 'sharp';

export const makeTempDir = (): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), 'cover-tools-'));

export const ID3_OUTPUT = Buffer.concat([Buffer.from('ID3'), Buffer.from([3, 0, 0, 0, 0, 0, 0]), Buffer.from('encoded')]);

export const writeCoverImage = async (filePath: string): Promise<void> => {
  await sharp({ create: { width: 4, height: 3, channels: 3, background: { r: 200, g: 40, b: 40 } } })
    .png()
    .toFile(filePath);
};

export const writeAudio = async (filePath: string, content = 'original audio'): Promise<void> => {
  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, content);
};
