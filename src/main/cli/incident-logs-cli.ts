import { parseIncidentArgs } from '../config/incident-config.js';
import { UsageError, exitCodeFor, toError } from '../errors.js';
import { IncidentScrapeRunner } from '../pipeline/incident-scrape-runner.js';
import type { FetchFn } from '../services/incident-log-client.js';
import log from '../logger.js';

export const runIncidentLogsCli = async (argv: string[], fetchImpl?: FetchFn, cwd?: string): Promise<number> => {
  try {
    const request = parseIncidentArgs(argv, cwd);
    await new IncidentScrapeRunner(fetchImpl).run(request);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      if (error.message && error.message !== error.usage) {
        log.error(error.message);
      }
      log.error(error.usage ?? error.message);
      return error.exitCode;
    }
    log.error('Fatal: %s', toError(error).message);
    return exitCodeFor(error);
  }
};
