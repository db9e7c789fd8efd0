import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { IncidentLog, IncidentRecord } from '../../shared/types/incident-record.js';
import { ScrapeError } from '../errors.js';
import log from '../logger.js';

// Cell position of each field once a record's two <tr> rows are joined; position 0 is the report id.
const FIELD_COLUMNS: ReadonlyArray<readonly [keyof IncidentRecord, number]> = [
  ['occurred_date', 1],
  ['report_date', 2],
  ['type', 3],
  ['disposition', 4],
  ['location', 5]
];

export const CELLS_PER_RECORD = 6;

export interface IncidentParseOptions {
  strict: boolean;
}

export interface IncidentParseResult {
  incidents: IncidentLog;
  rowCount: number;
  droppedTrailingRow: boolean;
}

/**
 * Reads the first table of an incident log page. Each incident spans two
 * consecutive rows after the header row.
 */
export class IncidentTableParser {
  constructor(private readonly options: IncidentParseOptions = { strict: false }) {}

  parse(html: string): IncidentParseResult {
    const $ = cheerio.load(html);
    const table = $('table').first();
    if (!table.length) {
      throw new ScrapeError('No table found in incident log page.');
    }

    const rows = table
      .find('tr')
      .toArray()
      .slice(1)
      .map((row: Element) =>
        $(row)
          .find('td')
          .toArray()
          .map((cell: Element) => $(cell).text().trim())
      );

    const droppedTrailingRow = rows.length % 2 === 1;
    if (droppedTrailingRow) {
      if (this.options.strict) {
        throw new ScrapeError(`Incident table has an unpaired trailing row (${rows.length} data rows).`);
      }
      log.warn('Incident table has an odd number of data rows (%d); dropping the last one.', rows.length);
    }

    const incidents = new Map<string, IncidentRecord>();
    for (let i = 0; i + 1 < rows.length; i += 2) {
      const cells = [...rows[i], ...rows[i + 1]];
      if (this.options.strict && cells.length !== CELLS_PER_RECORD) {
        throw new ScrapeError(
          `Incident at rows ${i + 2}-${i + 3} has ${cells.length} cells, expected ${CELLS_PER_RECORD}.`
        );
      }
      const [id, record] = this.toRecord(cells);
      incidents.set(id, record);
    }

    return { incidents: Object.fromEntries(incidents), rowCount: rows.length, droppedTrailingRow };
  }

  private toRecord(cells: string[]): [string, IncidentRecord] {
    const record: IncidentRecord = {
      occurred_date: '',
      report_date: '',
      type: '',
      disposition: '',
      location: ''
    };
    for (const [field, column] of FIELD_COLUMNS) {
      record[field] = cells[column] ?? '';
    }
    return [cells[0] ?? '', record];
  }
}
