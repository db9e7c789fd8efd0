import path from 'node:path';
import PQueue from 'p-queue';
import type { ArtworkJob, ArtworkRunRequest, BatchSummary, EncoderBinary, JobFailure, JobResult } from '../../shared/types/artwork-job.js';
import { defaultConcurrency } from '../config/artwork-config.js';
import { SetupError } from '../errors.js';
import { ArtworkEmbedder, encodeWithFfmpeg } from '../services/artwork-embedder.js';
import type { EncodeFn } from '../services/artwork-embedder.js';
import { inspectArtwork, resolveArtwork } from '../services/artwork-locator.js';
import { locateEncoder } from '../services/encoder-locator.js';
import { scanAudioFiles } from '../services/library-scanner.js';
import { ReportService } from '../services/report-service.js';
import { VerificationService, ffprobeStreams } from '../services/verification-service.js';
import type { StreamProber } from '../services/verification-service.js';
import { isDirectory } from '../utils/files.js';
import { toIsoUtc } from '../utils/date.js';
import type { ProgressCallback } from '../types.js';
import log from '../logger.js';

export interface ArtworkBatchDeps {
  locateEncoder: () => Promise<EncoderBinary>;
  encode: EncodeFn;
  prober: StreamProber;
}

interface PreparedBatch {
  encoder: EncoderBinary;
  directory: string;
  artworkPath: string;
  files: string[];
}

export class ArtworkBatchRunner {
  private readonly deps: ArtworkBatchDeps;
  private readonly reportService = new ReportService();

  constructor(deps: Partial<ArtworkBatchDeps> = {}) {
    this.deps = {
      locateEncoder: deps.locateEncoder ?? (() => locateEncoder()),
      encode: deps.encode ?? encodeWithFfmpeg,
      prober: deps.prober ?? ffprobeStreams
    };
  }

  async run(request: ArtworkRunRequest, progress: ProgressCallback = () => undefined): Promise<BatchSummary> {
    const startedAt = new Date();

    progress({ type: 'phase', phase: 'setup' });
    const batch = await this.prepare(request);

    const concurrency = request.mode === 'sequential' ? 1 : request.jobs ?? defaultConcurrency();
    if (request.mode === 'sequential') {
      log.verbose('Encoding sequentially.');
      if (request.jobs !== undefined) {
        log.warn('Ignoring -j %d in sequential mode.', request.jobs);
      }
    } else {
      log.verbose('Encoding in parallel with %d workers.', concurrency);
    }

    progress({ type: 'phase', phase: 'encode' });
    const embedder = new ArtworkEmbedder(new VerificationService({ probe: request.probe }, this.deps.prober), this.deps.encode);
    const results = await this.dispatch(batch, embedder, concurrency, progress);

    const finishedAt = new Date();
    const failures = results.filter((result): result is JobFailure => !result.ok);
    const summary: BatchSummary = {
      startedAt: toIsoUtc(startedAt),
      finishedAt: toIsoUtc(finishedAt),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      directory: batch.directory,
      artworkPath: batch.artworkPath,
      encoder: batch.encoder,
      mode: request.mode,
      concurrency,
      total: results.length,
      succeeded: results.length - failures.length,
      failed: failures.length,
      results,
      failures
    };

    if (request.reportPath) {
      progress({ type: 'phase', phase: 'report' });
      summary.reportPath = await this.reportService.create(summary, request.reportPath);
    }

    progress({ type: 'phase', phase: 'complete' });
    return summary;
  }

  /** Setup phase: every check that can fail runs before any audio file is opened. */
  private async prepare(request: ArtworkRunRequest): Promise<PreparedBatch> {
    const encoder = await this.deps.locateEncoder();

    const directory = request.directory;
    if (!(await isDirectory(directory))) {
      throw new SetupError(`Not a directory: '${directory}'`);
    }

    const artworkPath = await resolveArtwork(directory, request.artworkPath);
    await inspectArtwork(artworkPath);

    const files = await scanAudioFiles(directory);
    log.verbose('Found %d MP3 files under %s.', files.length, path.resolve(directory));
    return { encoder, directory, artworkPath, files };
  }

  private async dispatch(
    batch: PreparedBatch,
    embedder: ArtworkEmbedder,
    concurrency: number,
    progress: ProgressCallback
  ): Promise<JobResult[]> {
    const queue = new PQueue({ concurrency });
    const jobs = batch.files.map(
      (audioPath): ArtworkJob => ({ audioPath, artworkPath: batch.artworkPath, encoder: batch.encoder })
    );

    return Promise.all(
      jobs.map((job) =>
        queue.add(
          async () => {
            progress({ type: 'job', job, message: 'Encoding' });
            const result = await embedder.apply(job);
            if (result.ok) {
              progress({ type: 'job', job, result, message: 'Encoded' });
            } else {
              progress({ type: 'error', job, result, error: new Error(result.error) });
            }
            return result;
          },
          { throwOnTimeout: true }
        )
      )
    );
  }
}
