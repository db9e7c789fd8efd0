import path from 'node:path';
import fs from 'fs-extra';
import type { BatchSummary } from '../../shared/types/artwork-job.js';
import { replaceExtension } from '../utils/files.js';

export class ReportService {
  /** Writes the summary as JSON to `reportPath` and the per-file results as CSV beside it. */
  async create(summary: BatchSummary, reportPath: string): Promise<string> {
    const jsonPath = path.resolve(reportPath);
    let csvPath = replaceExtension(jsonPath, '.csv');
    if (csvPath === jsonPath) {
      csvPath = `${jsonPath}.csv`;
    }
    await fs.ensureDir(path.dirname(jsonPath));
    await fs.writeJson(jsonPath, summary, { spaces: 2 });
    await fs.writeFile(csvPath, this.buildCsv(summary));
    return jsonPath;
  }

  buildCsv(summary: BatchSummary): string {
    const header = ['file', 'status', 'stage', 'durationMs', 'error'];
    const rows = summary.results.map((result) => [
      result.audioPath,
      result.ok ? 'ok' : 'failed',
      result.ok ? '' : result.stage,
      result.durationMs,
      result.ok ? '' : result.error
    ]);
    return [header, ...rows]
      .map((cols) =>
        cols
          .map((value) => {
            if (typeof value === 'string') {
              const escaped = value.replace(/"/g, '""');
              return `"${escaped}"`;
            }
            return value;
          })
          .join(',')
      )
      .join('\n');
  }
}
