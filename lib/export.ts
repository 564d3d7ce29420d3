/**
 * Export Module
 *
 * Writes a run's result as JSON (metadata plus full records), a flat CSV with
 * one row per person and, on request, an Excel workbook.
 */

import ExcelJS from 'exceljs';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ConfidenceLevel, FacultyRecord } from '../types/faculty';
import { logger } from './monitoring';
import type { PipelineResult, RunMetadata } from './pipeline';

export const CSV_COLUMNS = [
  'name',
  'h_index',
  'works_count',
  'cited_by_count',
  'email',
  'email_source',
  'email_confidence',
  'email_method',
  'website',
  'website_source',
  'website_confidence',
  'website_type',
  'fields',
  'research_topics',
  'orcid',
  'openalex_id',
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

const MAX_CSV_FIELDS = 3;
const MAX_CSV_TOPICS = 5;

// ============ Helper Functions ============

function getConfidenceColor(confidence: ConfidenceLevel | undefined): string {
  switch (confidence) {
    case 'high':
      return '22C55E';
    case 'medium':
      return 'EAB308';
    case 'low':
      return 'F97316';
    default:
      return 'A0A0A0';
  }
}

function getColumnValue(record: FacultyRecord, column: CsvColumn): string {
  switch (column) {
    case 'name':
      return record.name;
    case 'h_index':
      return String(record.hIndex);
    case 'works_count':
      return String(record.worksCount);
    case 'cited_by_count':
      return String(record.citedByCount);
    case 'email':
      return record.email?.value ?? '';
    case 'email_source':
      return record.email?.source ?? '';
    case 'email_confidence':
      return record.email?.confidence ?? '';
    case 'email_method':
      return record.email?.extractionMethod ?? '';
    case 'website':
      return record.website?.value ?? '';
    case 'website_source':
      return record.website?.source ?? '';
    case 'website_confidence':
      return record.website?.confidence ?? '';
    case 'website_type':
      return record.website?.pageType ?? '';
    case 'fields':
      return record.research.fields.slice(0, MAX_CSV_FIELDS).join('; ');
    case 'research_topics':
      return record.research.topics
        .slice(0, MAX_CSV_TOPICS)
        .map((topic) => topic.name)
        .join('; ');
    case 'orcid':
      return record.orcidId ?? '';
    case 'openalex_id':
      return record.bibliometricId ?? '';
  }
}

// ============ CSV Export ============

/**
 * Escape CSV field value
 */
export function escapeCsvField(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function generateCsv(records: FacultyRecord[]): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const record of records) {
    lines.push(CSV_COLUMNS.map((column) => escapeCsvField(getColumnValue(record, column))).join(','));
  }
  return `${lines.join('\n')}\n`;
}

// ============ JSON Export ============

export function generateJson(result: PipelineResult): string {
  return JSON.stringify(result, null, 2);
}

// ============ Excel Export ============

function summaryRows(metadata: RunMetadata): Array<{ metric: string; value: string | number }> {
  const percent = (value: number) => `${(value * 100).toFixed(1)}%`;
  const rows: Array<{ metric: string; value: string | number }> = [
    { metric: 'Institution', value: metadata.institution },
    { metric: 'Generated', value: metadata.generatedAt },
    { metric: 'Pipeline Version', value: metadata.version },
    { metric: 'Total Faculty', value: metadata.totalFaculty },
    { metric: 'Websites Found', value: `${metadata.websitesFound} (${percent(metadata.websiteCoverage)})` },
    { metric: 'Emails Found', value: `${metadata.emailsFound} (${percent(metadata.emailCoverage)})` },
    { metric: 'High-Confidence Emails', value: metadata.highConfidenceEmails },
    { metric: 'Needing Review', value: metadata.needingReview },
    { metric: 'Search Queries Used', value: metadata.searchQueriesUsed },
    { metric: 'Duration (minutes)', value: metadata.durationMinutes },
  ];

  if (metadata.endedEarlyDueToQuota) {
    rows.push({ metric: 'Quota Exhausted In', value: metadata.quotaExhaustedIn ?? '' });
  }
  if (metadata.checkpointFailures.length > 0) {
    rows.push({ metric: 'Unsaved Checkpoints', value: metadata.checkpointFailures.join(', ') });
  }
  if (metadata.abortedAt) {
    rows.push({ metric: 'Aborted At', value: `${metadata.abortedAt}: ${metadata.abortReason ?? ''}` });
  }

  rows.push({ metric: '', value: '' });
  rows.push({ metric: 'Email Sources', value: '' });
  for (const [source, count] of Object.entries(metadata.emailsBySource).sort((a, b) => (b[1] ?? 0) - (a[1] ?? 0))) {
    rows.push({ metric: `  ${source}`, value: count ?? 0 });
  }

  return rows;
}

export async function generateWorkbook(result: PipelineResult): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'Faculty Contact Pipeline';
  workbook.created = new Date();

  const worksheet = workbook.addWorksheet('Faculty', {
    views: [{ state: 'frozen', ySplit: 1 }],
  });

  worksheet.columns = [
    { header: 'Name', key: 'name', width: 30 },
    { header: 'h-index', key: 'h_index', width: 9 },
    { header: 'Works', key: 'works_count', width: 9 },
    { header: 'Citations', key: 'cited_by_count', width: 11 },
    { header: 'Email', key: 'email', width: 35 },
    { header: 'Email Source', key: 'email_source', width: 13 },
    { header: 'Email Confidence', key: 'email_confidence', width: 16 },
    { header: 'Email Method', key: 'email_method', width: 20 },
    { header: 'Website', key: 'website', width: 45 },
    { header: 'Website Source', key: 'website_source', width: 14 },
    { header: 'Website Confidence', key: 'website_confidence', width: 18 },
    { header: 'Website Type', key: 'website_type', width: 14 },
    { header: 'Fields', key: 'fields', width: 35 },
    { header: 'Research Topics', key: 'research_topics', width: 50 },
    { header: 'ORCID', key: 'orcid', width: 38 },
    { header: 'OpenAlex ID', key: 'openalex_id', width: 32 },
    { header: 'Review Notes', key: 'review_notes', width: 40 },
  ];

  const headerRow = worksheet.getRow(1);
  headerRow.font = { bold: true, color: { argb: 'FFFFFFFF' } };
  headerRow.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF1E3A5F' } };
  headerRow.alignment = { vertical: 'middle', horizontal: 'center' };
  headerRow.height = 24;

  for (const record of result.faculty) {
    const values: Record<string, string | number> = { review_notes: record.reviewNotes };
    for (const column of CSV_COLUMNS) {
      values[column] = getColumnValue(record, column);
    }
    values.h_index = record.hIndex;
    values.works_count = record.worksCount;
    values.cited_by_count = record.citedByCount;

    const row = worksheet.addRow(values);

    for (const [key, confidence] of [
      ['email_confidence', record.email?.confidence],
      ['website_confidence', record.website?.confidence],
    ] as const) {
      const cell = row.getCell(key);
      const color = getConfidenceColor(confidence);
      cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: `FF${color}` } };
      cell.font = { bold: true, color: { argb: color === 'A0A0A0' ? 'FF333333' : 'FFFFFFFF' } };
      cell.alignment = { horizontal: 'center' };
    }

    if (record.website) {
      row.getCell('website').value = { text: record.website.value, hyperlink: record.website.value };
      row.getCell('website').font = { color: { argb: 'FF0066CC' }, underline: true };
    }
    if (record.email) {
      row.getCell('email').value = { text: record.email.value, hyperlink: `mailto:${record.email.value}` };
      row.getCell('email').font = { color: { argb: 'FF0066CC' }, underline: true };
    }
  }

  const summarySheet = workbook.addWorksheet('Summary');
  summarySheet.columns = [
    { header: 'Metric', key: 'metric', width: 28 },
    { header: 'Value', key: 'value', width: 30 },
  ];

  const summaryHeader = summarySheet.getRow(1);
  summaryHeader.font = { bold: true, color: { argb: 'FFFFFFFF' } };
  summaryHeader.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF1E3A5F' } };

  for (const row of summaryRows(result.metadata)) {
    summarySheet.addRow(row);
  }

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

// ============ Writing Files ============

export interface ExportPaths {
  json: string;
  csv: string;
  xlsx?: string;
}

/** `harvard_faculty_20261019_143005` */
export function outputBaseName(institutionKey: string, date: Date = new Date()): string {
  const stamp = date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `${institutionKey}_faculty_${stamp}`;
}

export async function writeOutputs(
  result: PipelineResult,
  options: { outputDir: string; xlsx?: boolean; date?: Date }
): Promise<ExportPaths> {
  await mkdir(options.outputDir, { recursive: true });
  const base = join(options.outputDir, outputBaseName(result.metadata.institutionKey, options.date));

  const paths: ExportPaths = { json: `${base}.json`, csv: `${base}.csv` };
  await writeFile(paths.json, generateJson(result), 'utf-8');
  logger.info('JSON written', { path: paths.json });

  await writeFile(paths.csv, generateCsv(result.faculty), 'utf-8');
  logger.info('CSV written', { path: paths.csv });

  if (options.xlsx) {
    paths.xlsx = `${base}.xlsx`;
    await writeFile(paths.xlsx, await generateWorkbook(result));
    logger.info('Workbook written', { path: paths.xlsx });
  }

  return paths;
}
