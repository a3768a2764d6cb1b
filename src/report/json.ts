import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { ReportFormat, ReportSink } from '../collaborators/types.js';
import type { AnalysisReport } from '../rightsizing/types.js';

/** Format report as JSON string for file export */
export function renderJson(report: AnalysisReport): string {
  return JSON.stringify(
    {
      ...report,
      totalAnnualSavings: report.totalPotentialSavings * 12,
    },
    null,
    2,
  );
}

export class JsonReportSink implements ReportSink {
  readonly format: ReportFormat = 'json';

  constructor(private readonly path: string) {}

  async write(report: AnalysisReport): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, renderJson(report), 'utf-8');
  }
}
