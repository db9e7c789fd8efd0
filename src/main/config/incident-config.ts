import { parseArgs } from 'node:util';
import type { IncidentScrapeRequest } from '../../shared/types/incident-record.js';
import { UsageError, toError } from '../errors.js';
import { currentYear } from '../utils/date.js';

export const INCIDENT_LOG_URL = 'http://www.umpd.umd.edu/stats/incident_logs.cfm';

// Logs before November 2010 used a different table layout.
export const EARLIEST_YEAR = 2011;

export const INCIDENT_USAGE = 'Usage: incident-logs [--strict] [-o dir] <month> <year>';

export const buildIncidentLogUrl = (month: number, year: number): string => {
  const url = new URL(INCIDENT_LOG_URL);
  url.searchParams.set('year', String(year));
  url.searchParams.set('month', String(month));
  return url.toString();
};

const parseInteger = (raw: string | undefined): number | undefined => {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) {
    return undefined;
  }
  return Number(raw.trim());
};

export const validateMonthYear = (month: number | undefined, year: number | undefined): { month: number; year: number } => {
  if (
    month === undefined ||
    year === undefined ||
    month < 1 ||
    month > 12 ||
    year < EARLIEST_YEAR ||
    year > currentYear()
  ) {
    throw new UsageError(INCIDENT_USAGE, INCIDENT_USAGE);
  }
  return { month, year };
};

const readArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        strict: { type: 'boolean', default: false },
        'out-dir': { type: 'string', short: 'o' }
      }
    });
  } catch (error) {
    throw new UsageError(toError(error).message, INCIDENT_USAGE);
  }
};

export const parseIncidentArgs = (argv: string[], cwd: string = process.cwd()): IncidentScrapeRequest => {
  const { values, positionals } = readArgs(argv);
  const { month, year } = validateMonthYear(parseInteger(positionals[0]), parseInteger(positionals[1]));
  return {
    month,
    year,
    strict: values.strict,
    outDir: values['out-dir'] ?? cwd
  };
};
