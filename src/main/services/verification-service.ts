import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import type { FfprobeData, FfprobeStream } from 'fluent-ffmpeg';
import ffprobeStatic from 'ffprobe-static';
import { detectMagicType } from '../utils/magic-bytes.js';
import { isFile } from '../utils/files.js';
import log from '../logger.js';

export type StreamProber = (filePath: string) => Promise<FfprobeStream[]>;

export interface VerificationOptions {
  probe: boolean;
}

const resolveFfprobe = (): string | null => {
  const override = process.env.FFPROBE_PATH;
  if (override) {
    return override;
  }
  const bundled = ffprobeStatic?.path ?? null;
  if (!bundled || !fs.existsSync(bundled)) {
    log.warn('ffprobe binary not provided by ffprobe-static; falling back to PATH.');
    return null;
  }
  return bundled;
};

let ffprobeConfigured = false;

export const ffprobeStreams: StreamProber = async (filePath) => {
  if (!ffprobeConfigured) {
    const resolved = resolveFfprobe();
    if (resolved) {
      ffmpeg.setFfprobePath(resolved);
    }
    ffprobeConfigured = true;
  }
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (error: Error | null, data: FfprobeData) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(data.streams ?? []);
    });
  });
};

/** Checks an encoder output before it is allowed to replace the original. */
export class VerificationService {
  constructor(
    private readonly options: VerificationOptions,
    private readonly prober: StreamProber = ffprobeStreams
  ) {}

  async verify(outputPath: string): Promise<void> {
    if (!(await isFile(outputPath))) {
      throw new Error('Encoder output missing on disk.');
    }
    const stats = await fs.stat(outputPath);
    if (stats.size === 0) {
      throw new Error('Encoder output is empty.');
    }
    const magic = await detectMagicType(outputPath);
    if (magic !== 'id3') {
      throw new Error(`Encoder output has no ID3v2 header (detected ${magic}).`);
    }
    if (this.options.probe) {
      await this.probeCover(outputPath);
    }
  }

  private async probeCover(outputPath: string): Promise<void> {
    const streams = await this.prober(outputPath);
    if (!streams.some((stream) => stream.codec_type === 'audio')) {
      throw new Error('Audio stream missing from output.');
    }
    const cover = streams.find((stream) => stream.codec_type === 'video' && stream.disposition?.attached_pic === 1);
    if (!cover) {
      throw new Error('Attached cover stream missing from output.');
    }
  }
}
