import path from 'node:path';
import fs from 'fs-extra';
import type { IncidentLog } from '../../shared/types/incident-record.js';

export const incidentFileName = (month: number, year: number): string => `${month}-${year}.json`;

/** Overwrites `<outDir>/<month>-<year>.json` with the pretty-printed log. */
export const writeIncidentLog = async (outDir: string, month: number, year: number, incidents: IncidentLog): Promise<string> => {
  const outputPath = path.join(outDir, incidentFileName(month, year));
  await fs.ensureDir(outDir);
  await fs.writeJson(outputPath, incidents, { spaces: 2 });
  return outputPath;
};
