import type { ArtworkJob, JobResult } from '../shared/types/artwork-job.js';

export type ProgressCallback = (event: {
  type: 'phase' | 'job' | 'error';
  phase?: string;
  job?: ArtworkJob;
  result?: JobResult;
  message?: string;
  error?: Error;
}) => void;
