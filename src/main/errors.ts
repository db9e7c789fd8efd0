export const EXIT_USAGE = 1;
export const EXIT_SETUP = 2;
export const EXIT_JOB_FAILURES = 3;

/** Bad invocation; the caller prints usage and exits 1. */
export class UsageError extends Error {
  readonly exitCode = EXIT_USAGE;

  constructor(message: string, readonly usage?: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Anything that stops a run before the first file is touched. */
export class SetupError extends Error {
  readonly exitCode = EXIT_SETUP;

  constructor(message: string) {
    super(message);
    this.name = 'SetupError';
  }
}

export class ScrapeError extends Error {
  readonly exitCode = EXIT_SETUP;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScrapeError';
  }
}

export const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

export const exitCodeFor = (error: unknown): number => {
  if (error instanceof UsageError || error instanceof SetupError || error instanceof ScrapeError) {
    return error.exitCode;
  }
  return EXIT_SETUP;
};
