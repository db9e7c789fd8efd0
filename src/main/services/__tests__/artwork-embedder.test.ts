import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ArtworkJob } from '../../../shared/types/artwork-job.js';
import { ArtworkEmbedder, encodeWithFfmpeg } from '../artwork-embedder.js';
import type { EncodeFn } from '../artwork-embedder.js';
import { VerificationService } from '../verification-service.js';
import { ID3_OUTPUT, makeTempDir, writeAudio } from './helpers.js';

const fakeFfmpeg = vi.hoisted(() => {
  type Handler = (arg?: unknown) => void;
  const state = {
    sources: [] as string[],
    ffmpegPath: '',
    inputs: [] as string[],
    outputOptions: [] as string[][],
    savedTo: '',
    failWith: null as Error | null
  };
  const handlers = new Map<string, Handler>();
  const command = {
    setFfmpegPath(binary: string) {
      state.ffmpegPath = binary;
      return command;
    },
    input(source: string) {
      state.inputs.push(source);
      return command;
    },
    outputOptions(...options: string[]) {
      state.outputOptions.push(options);
      return command;
    },
    save(target: string) {
      state.savedTo = target;
      setTimeout(() => {
        if (state.failWith) {
          handlers.get('error')?.(state.failWith);
        } else {
          handlers.get('end')?.();
        }
      }, 0);
      return command;
    },
    on(event: string, handler: Handler) {
      handlers.set(event, handler);
      return command;
    }
  };
  const factory = (source: string) => {
    state.sources.push(source);
    return command;
  };
  const reset = () => {
    state.sources = [];
    state.ffmpegPath = '';
    state.inputs = [];
    state.outputOptions = [];
    state.savedTo = '';
    state.failWith = null;
    handlers.clear();
  };
  return { state, factory, reset };
});

vi.mock('fluent-ffmpeg', () => ({ default: fakeFfmpeg.factory }));

describe('encodeWithFfmpeg', () => {
  const job: ArtworkJob = {
    audioPath: '/music/album/01 Intro.mp3',
    artworkPath: '/music/album/cover.jpg',
    encoder: { name: 'avconv', path: '/opt/libav/bin/avconv' }
  };

  beforeEach(() => {
    fakeFfmpeg.reset();
  });

  it('muxes the audio and cover into the temp output with front-cover tags', async () => {
    await encodeWithFfmpeg(job, '/music/album/01 Intro.mp3.out.mp3');

    expect(fakeFfmpeg.state.sources).toEqual(['/music/album/01 Intro.mp3']);
    expect(fakeFfmpeg.state.ffmpegPath).toBe('/opt/libav/bin/avconv');
    expect(fakeFfmpeg.state.inputs).toEqual(['/music/album/cover.jpg']);
    expect(fakeFfmpeg.state.outputOptions).toEqual([
      [
        '-map', '0:a',
        '-map', '1:0',
        '-c', 'copy',
        '-id3v2_version', '3',
        '-metadata:s:v', 'title=Album cover',
        '-metadata:s:v', 'comment=Cover (Front)'
      ]
    ]);
    expect(fakeFfmpeg.state.savedTo).toBe('/music/album/01 Intro.mp3.out.mp3');
  });

  it('rejects when the encoder emits an error', async () => {
    fakeFfmpeg.state.failWith = new Error('ffmpeg exited with code 1: Invalid data found when processing input');
    await expect(encodeWithFfmpeg(job, '/music/album/01 Intro.mp3.out.mp3')).rejects.toThrow(
      'ffmpeg exited with code 1: Invalid data found when processing input'
    );
  });
});

describe('ArtworkEmbedder', () => {
  let dir: string;
  let job: ArtworkJob;

  beforeEach(async () => {
    dir = await makeTempDir();
    job = {
      audioPath: path.join(dir, 'track.mp3'),
      artworkPath: path.join(dir, 'cover.jpg'),
      encoder: { name: 'ffmpeg', path: '/usr/bin/ffmpeg' }
    };
    await writeAudio(job.audioPath);
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  const embedderWith = (encode: EncodeFn) => new ArtworkEmbedder(new VerificationService({ probe: false }), encode);

  it('replaces the original with the verified output', async () => {
    const encode = vi.fn(async (_job: ArtworkJob, outputPath: string) => {
      await fs.writeFile(outputPath, ID3_OUTPUT);
    });
    const result = await embedderWith(encode).apply(job);

    expect(result.ok).toBe(true);
    expect(encode).toHaveBeenCalledWith(job, `${job.audioPath}.out.mp3`);
    expect(await fs.readFile(job.audioPath)).toEqual(ID3_OUTPUT);
    expect(await fs.pathExists(`${job.audioPath}.out.mp3`)).toBe(false);
  });

  it('keeps the original when the encoder fails', async () => {
    const result = await embedderWith(async (_job, outputPath) => {
      await fs.writeFile(outputPath, 'partial');
      throw new Error('ffmpeg exited with code 1');
    }).apply(job);

    expect(result).toMatchObject({ ok: false, audioPath: job.audioPath, stage: 'encode', error: 'ffmpeg exited with code 1' });
    expect(await fs.readFile(job.audioPath, 'utf8')).toBe('original audio');
    expect(await fs.pathExists(`${job.audioPath}.out.mp3`)).toBe(false);
  });

  it('keeps the original when the encoder produces an empty file', async () => {
    const result = await embedderWith(async (_job, outputPath) => {
      await fs.writeFile(outputPath, '');
    }).apply(job);

    expect(result).toMatchObject({ ok: false, stage: 'verify', error: 'Encoder output is empty.' });
    expect(await fs.readFile(job.audioPath, 'utf8')).toBe('original audio');
    expect(await fs.pathExists(`${job.audioPath}.out.mp3`)).toBe(false);
  });

  it('keeps the original when the encoder reports success without output', async () => {
    const result = await embedderWith(async () => undefined).apply(job);

    expect(result).toMatchObject({ ok: false, stage: 'verify', error: 'Encoder output missing on disk.' });
    expect(await fs.readFile(job.audioPath, 'utf8')).toBe('original audio');
  });
});
