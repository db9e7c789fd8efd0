import { parseArtworkArgs } from '../config/artwork-config.js';
import { EXIT_JOB_FAILURES, UsageError, exitCodeFor, toError } from '../errors.js';
import { ArtworkBatchRunner } from '../pipeline/artwork-batch-runner.js';
import type { ArtworkBatchDeps } from '../pipeline/artwork-batch-runner.js';
import log, { setVerbose } from '../logger.js';

export const runApplyArtworkCli = async (argv: string[], deps: Partial<ArtworkBatchDeps> = {}): Promise<number> => {
  try {
    const { request, verbose } = parseArtworkArgs(argv);
    setVerbose(verbose);

    const runner = new ArtworkBatchRunner(deps);
    const summary = await runner.run(request, (event) => {
      if (event.type === 'phase') {
        log.verbose('Phase: %s', event.phase);
      }
    });

    if (summary.reportPath) {
      log.info('Report written to %s', summary.reportPath);
    }
    log.info('All done. %d/%d files encoded with artwork.', summary.succeeded, summary.total);
    if (summary.failed > 0) {
      log.error('%d files failed:', summary.failed);
      for (const failure of summary.failures) {
        log.error("  '%s' (%s): %s", failure.audioPath, failure.stage, failure.error);
      }
      return EXIT_JOB_FAILURES;
    }
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      if (error.message) {
        log.error(error.message);
      }
      if (error.usage) {
        log.info(error.usage);
      }
      return error.exitCode;
    }
    log.error('Fatal: %s. Exiting.', toError(error).message);
    return exitCodeFor(error);
  }
};
