import type { IncidentScrapeRequest, IncidentScrapeSummary } from '../../shared/types/incident-record.js';
import { buildIncidentLogUrl, validateMonthYear } from '../config/incident-config.js';
import { IncidentLogClient } from '../services/incident-log-client.js';
import type { FetchFn } from '../services/incident-log-client.js';
import { IncidentTableParser } from '../services/incident-table-parser.js';
import { writeIncidentLog } from '../services/incident-log-writer.js';
import log from '../logger.js';

export class IncidentScrapeRunner {
  private readonly client: IncidentLogClient;

  constructor(fetchImpl?: FetchFn) {
    this.client = new IncidentLogClient(fetchImpl);
  }

  async run(request: IncidentScrapeRequest): Promise<IncidentScrapeSummary> {
    const { month, year } = validateMonthYear(request.month, request.year);
    const url = buildIncidentLogUrl(month, year);

    const html = await this.client.fetchPage(url);
    const parsed = new IncidentTableParser({ strict: request.strict }).parse(html);
    const incidentCount = Object.keys(parsed.incidents).length;

    const outputPath = await writeIncidentLog(request.outDir, month, year, parsed.incidents);
    log.info('Wrote %d incidents to %s', incidentCount, outputPath);

    return {
      url,
      outputPath,
      rowCount: parsed.rowCount,
      incidentCount,
      droppedTrailingRow: parsed.droppedTrailingRow
    };
  }
}
