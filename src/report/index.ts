import { extname } from 'path';
import type { ReportFormat, ReportSink } from '../collaborators/types.js';
import type { AnalysisReport } from '../rightsizing/types.js';
import { CsvReportSink, renderCsv } from './csv.js';
import { JsonReportSink, renderJson } from './json.js';

export { CSV_COLUMNS, CsvReportSink, escapeCsvField, recommendedSkuOf, renderCsv, toCsvRow } from './csv.js';
export { JsonReportSink, renderJson } from './json.js';
export { formatTable } from './table.js';
export { formatCurrency, formatPercent } from './format.js';

const EXTENSION_FORMATS: Record<string, ReportFormat> = {
  '.json': 'json',
  '.csv': 'csv',
};

export function formatFromPath(path: string): ReportFormat {
  const ext = extname(path).toLowerCase();
  return Object.hasOwn(EXTENSION_FORMATS, ext) ? EXTENSION_FORMATS[ext] : 'json';
}

export function formatReport(report: AnalysisReport, format: ReportFormat): string {
  return format === 'csv' ? renderCsv(report) : renderJson(report);
}

export function createReportSink(path: string, format: ReportFormat = formatFromPath(path)): ReportSink {
  return format === 'csv' ? new CsvReportSink(path) : new JsonReportSink(path);
}

/**
 * Write a report to disk, picking the format from the file extension
 * unless one is given. Returns the format written.
 */
export async function exportReport(
  report: AnalysisReport,
  path: string,
  format?: ReportFormat,
): Promise<ReportFormat> {
  const sink = createReportSink(path, format);
  await sink.write(report);
  return sink.format;
}
