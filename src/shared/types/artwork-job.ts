export type EncoderName = 'ffmpeg' | 'avconv';

export interface EncoderBinary {
  name: EncoderName;
  path: string;
}

export type DispatchMode = 'sequential' | 'parallel';

export type FailureStage = 'encode' | 'verify' | 'replace';

export interface ArtworkJob {
  audioPath: string;
  artworkPath: string;
  encoder: EncoderBinary;
}

export type JobResult =
  | { ok: true; audioPath: string; durationMs: number }
  | { ok: false; audioPath: string; stage: FailureStage; error: string; durationMs: number };

export type JobFailure = Extract<JobResult, { ok: false }>;

export interface ArtworkRunRequest {
  directory: string;
  artworkPath?: string;
  mode: DispatchMode;
  jobs?: number;
  probe: boolean;
  reportPath?: string;
}

export interface BatchSummary {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  directory: string;
  artworkPath: string;
  encoder: EncoderBinary;
  mode: DispatchMode;
  concurrency: number;
  total: number;
  succeeded: number;
  failed: number;
  results: JobResult[];
  failures: JobFailure[];
  reportPath?: string;
}
