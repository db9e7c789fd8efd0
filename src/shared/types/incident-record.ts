export interface IncidentRecord {
  occurred_date: string;
  report_date: string;
  type: string;
  disposition: string;
  location: string;
}

export type IncidentLog = Record<string, IncidentRecord>;

export interface IncidentScrapeRequest {
  month: number;
  year: number;
  strict: boolean;
  outDir: string;
}

export interface IncidentScrapeSummary {
  url: string;
  outputPath: string;
  rowCount: number;
  incidentCount: number;
  droppedTrailingRow: boolean;
}
