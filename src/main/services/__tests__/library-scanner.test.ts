import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { scanAudioFiles } from '../library-scanner.js';
import { makeTempDir, writeAudio } from './helpers.js';

describe('scanAudioFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('finds MP3 files recursively', async () => {
    await writeAudio(path.join(dir, 'a.mp3'));
    await writeAudio(path.join(dir, 'disc 1', 'b.MP3'));
    await writeAudio(path.join(dir, 'disc 1', 'nested', 'c.mp3'));
    await writeAudio(path.join(dir, 'd.flac'));
    await writeAudio(path.join(dir, 'cover.jpg'));

    const files = await scanAudioFiles(dir);
    expect(files.sort()).toEqual(
      [path.join(dir, 'a.mp3'), path.join(dir, 'disc 1', 'b.MP3'), path.join(dir, 'disc 1', 'nested', 'c.mp3')].sort()
    );
  });

  it('follows symlinked tracks but not dangling links', async () => {
    const store = await makeTempDir();
    try {
      await writeAudio(path.join(dir, 'plain.mp3'));
      await writeAudio(path.join(store, 'real.mp3'));
      await fs.symlink(path.join(store, 'real.mp3'), path.join(dir, 'linked.mp3'));
      await fs.symlink(path.join(store, 'gone.mp3'), path.join(dir, 'dangling.mp3'));

      const files = await scanAudioFiles(dir);
      expect(files.sort()).toEqual([path.join(dir, 'linked.mp3'), path.join(dir, 'plain.mp3')]);
    } finally {
      await fs.remove(store);
    }
  });

  it('skips leftover temp outputs', async () => {
    await writeAudio(path.join(dir, 'a.mp3'));
    await writeAudio(path.join(dir, 'a.mp3.out.mp3'));
    expect(await scanAudioFiles(dir)).toEqual([path.join(dir, 'a.mp3')]);
  });

  it('returns an empty list for an empty directory', async () => {
    expect(await scanAudioFiles(dir)).toEqual([]);
  });
});
