import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import type { ArtworkJob, FailureStage, JobResult } from '../../shared/types/artwork-job.js';
import { COVER_OUTPUT_OPTIONS } from '../config/artwork-config.js';
import { toError } from '../errors.js';
import { tempOutputPath } from '../utils/files.js';
import type { VerificationService } from './verification-service.js';
import log from '../logger.js';

export type EncodeFn = (job: ArtworkJob, outputPath: string) => Promise<void>;

export const encodeWithFfmpeg: EncodeFn = (job, outputPath) =>
  new Promise<void>((resolve, reject) => {
    ffmpeg(job.audioPath)
      .setFfmpegPath(job.encoder.path)
      .input(job.artworkPath)
      // spread, not an array: fluent-ffmpeg splits array items on their first space
      .outputOptions(...COVER_OUTPUT_OPTIONS)
      .save(outputPath)
      .on('end', () => resolve())
      .on('error', (err: Error) => reject(err));
  });

class StageError extends Error {
  constructor(readonly stage: FailureStage, cause: unknown) {
    super(toError(cause).message);
    this.name = 'StageError';
  }
}

export class ArtworkEmbedder {
  constructor(
    private readonly verifier: VerificationService,
    private readonly encode: EncodeFn = encodeWithFfmpeg
  ) {}

  async apply(job: ArtworkJob): Promise<JobResult> {
    const startedAt = Date.now();
    const outputPath = tempOutputPath(job.audioPath);
    log.verbose("Beginning '%s'.", job.audioPath);

    try {
      await this.runStage('encode', () => this.encode(job, outputPath));
      await this.runStage('verify', () => this.verifier.verify(outputPath));
      // rename(2) swaps the file in one step; fs.move would unlink the original first
      await this.runStage('replace', () => fs.rename(outputPath, job.audioPath));
    } catch (error) {
      await this.discardOutput(outputPath);
      const stage = error instanceof StageError ? error.stage : 'encode';
      const message = toError(error).message;
      log.error("Failed '%s' (%s): %s", job.audioPath, stage, message);
      return { ok: false, audioPath: job.audioPath, stage, error: message, durationMs: Date.now() - startedAt };
    }

    log.verbose("Completed '%s'.", job.audioPath);
    return { ok: true, audioPath: job.audioPath, durationMs: Date.now() - startedAt };
  }

  private async runStage(stage: FailureStage, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      throw new StageError(stage, error);
    }
  }

  private async discardOutput(outputPath: string): Promise<void> {
    try {
      await fs.remove(outputPath);
    } catch (error) {
      log.warn('Failed to remove temp output %s: %s', outputPath, toError(error).message);
    }
  }
}
