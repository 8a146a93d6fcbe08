import * as fs from 'fs-extra';
import * as path from 'path';
import { z } from 'zod';
import { cleanupOrphanedTempFiles, writeFileAtomic } from '../storage/jsonStore';
import { Classification, DatasetEntry, FailedImage, ValidationStatus } from '../types/dataset';
import { ExportError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export const EXPORT_COLUMNS = [
  'image_path',
  'phase_label',
  'caption',
  'growth_percentage',
  'quality_score',
  'classification',
  'validation_status',
] as const;

const exportRowSchema = z.object({
  image_path: z.string(),
  phase_label: z.string(),
  caption: z.string(),
  growth_percentage: z.number().min(0).max(100).nullable(),
  quality_score: z.number().int().min(0).max(100),
  classification: z.enum(['Excellent', 'Good', 'Acceptable', 'Poor']),
  validation_status: z.enum(['Accepted', 'NeedsReview', 'Rejected']),
});

export type ExportRow = z.infer<typeof exportRowSchema>;

export interface ExportInput {
  entries: readonly DatasetEntry[];
  failures: readonly FailedImage[];
  phaseOrder: readonly string[];
  cancelled?: number;
}

export interface ExportPaths {
  dataset: string;
  table: string;
  statistics: string;
  failures: string;
  report: string;
}

interface GroupStatistics {
  count: number;
  exported: number;
  mean_score: number;
}

export interface DatasetStatistics {
  total_images: number;
  captioned: number;
  failed: number;
  cancelled: number;
  exported: number;
  mean_score: number;
  approval_rate: number;
  by_status: Record<ValidationStatus, number>;
  by_phase: Record<string, GroupStatistics>;
  by_classification: Record<Classification, GroupStatistics>;
  failures_by_kind: Record<string, number>;
}

const CLASSIFICATIONS: readonly Classification[] = ['Excellent', 'Good', 'Acceptable', 'Poor'];

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function byPhaseThenPath(phaseOrder: readonly string[]) {
  const rank = (label: string) => {
    const index = phaseOrder.indexOf(label);
    return index === -1 ? phaseOrder.length : index;
  };
  return (a: { phase: string; path: string }, b: { phase: string; path: string }) =>
    rank(a.phase) - rank(b.phase) || compareCodeUnits(a.phase, b.phase) || compareCodeUnits(a.path, b.path);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return round2(values.reduce((sum, v) => sum + v, 0) / values.length);
}

export function toExportRow(entry: DatasetEntry): ExportRow {
  return {
    image_path: entry.imageRecord.relativePath,
    phase_label: entry.imageRecord.phaseLabel,
    caption: entry.captionResult.rawText,
    growth_percentage: entry.qualityScore.growthValue,
    quality_score: entry.qualityScore.total,
    classification: entry.qualityScore.classification,
    validation_status: entry.validationStatus,
  };
}

/** Accepted entries as export rows, in phase order and then path order. */
export function selectExportRows(entries: readonly DatasetEntry[], phaseOrder: readonly string[]): ExportRow[] {
  const compare = byPhaseThenPath(phaseOrder);
  return entries
    .filter(entry => entry.validationStatus === 'Accepted')
    .map(toExportRow)
    .sort((a, b) => compare({ phase: a.phase_label, path: a.image_path }, { phase: b.phase_label, path: b.image_path }));
}

function csvField(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly ExportRow[]): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(EXPORT_COLUMNS.map(column => csvField(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

export function computeStatistics(input: ExportInput): DatasetStatistics {
  const { entries, failures, phaseOrder } = input;
  const cancelled = input.cancelled ?? 0;
  const exported = entries.filter(e => e.validationStatus === 'Accepted');

  const byPhase: Record<string, GroupStatistics> = {};
  const labels = [...phaseOrder];
  for (const entry of entries) {
    if (!labels.includes(entry.imageRecord.phaseLabel)) labels.push(entry.imageRecord.phaseLabel);
  }
  for (const label of labels) {
    const inPhase = entries.filter(e => e.imageRecord.phaseLabel === label);
    byPhase[label] = {
      count: inPhase.length,
      exported: inPhase.filter(e => e.validationStatus === 'Accepted').length,
      mean_score: mean(inPhase.map(e => e.qualityScore.total)),
    };
  }

  const group = (classification: Classification): GroupStatistics => {
    const inClass = entries.filter(e => e.qualityScore.classification === classification);
    return {
      count: inClass.length,
      exported: inClass.filter(e => e.validationStatus === 'Accepted').length,
      mean_score: mean(inClass.map(e => e.qualityScore.total)),
    };
  };

  const failuresByKind: Record<string, number> = {};
  for (const kind of [...new Set(failures.map(f => f.errorKind))].sort(compareCodeUnits)) {
    failuresByKind[kind] = failures.filter(f => f.errorKind === kind).length;
  }

  return {
    total_images: entries.length + failures.length + cancelled,
    captioned: entries.length,
    failed: failures.length,
    cancelled,
    exported: exported.length,
    mean_score: mean(entries.map(e => e.qualityScore.total)),
    approval_rate: entries.length === 0 ? 0 : round2((exported.length / entries.length) * 100),
    by_status: {
      Accepted: exported.length,
      NeedsReview: entries.filter(e => e.validationStatus === 'NeedsReview').length,
      Rejected: entries.filter(e => e.validationStatus === 'Rejected').length,
    },
    by_phase: byPhase,
    by_classification: {
      Excellent: group('Excellent'),
      Good: group('Good'),
      Acceptable: group('Acceptable'),
      Poor: group('Poor'),
    },
    failures_by_kind: failuresByKind,
  };
}

export function renderReport(stats: DatasetStatistics): string {
  const lines = [
    'Caption filtering report',
    '========================',
    `Images: ${stats.total_images}`,
    `Captioned: ${stats.captioned}`,
    `Failed: ${stats.failed}`,
    `Cancelled: ${stats.cancelled}`,
    `Accepted: ${stats.by_status.Accepted}`,
    `Needs review: ${stats.by_status.NeedsReview}`,
    `Rejected: ${stats.by_status.Rejected}`,
    `Approval rate: ${stats.approval_rate.toFixed(1)}%`,
    `Mean score: ${stats.mean_score.toFixed(2)}`,
    '',
    'By phase:',
  ];
  for (const [label, group] of Object.entries(stats.by_phase)) {
    lines.push(`  ${label}: ${group.exported}/${group.count} accepted, mean score ${group.mean_score.toFixed(2)}`);
  }
  lines.push('', 'By classification:');
  for (const classification of CLASSIFICATIONS) {
    const group = stats.by_classification[classification];
    lines.push(`  ${classification}: ${group.count} (mean score ${group.mean_score.toFixed(2)})`);
  }
  const kinds = Object.entries(stats.failures_by_kind);
  if (kinds.length > 0) {
    lines.push('', 'Failures:');
    for (const [kind, count] of kinds) {
      lines.push(`  ${kind}: ${count}`);
    }
  }
  return lines.join('\n') + '\n';
}

async function writeOutput(filePath: string, content: string): Promise<void> {
  try {
    await writeFileAtomic(filePath, content);
  } catch (error) {
    throw new ExportError(`Could not write ${filePath}: ${describeError(error)}`, filePath);
  }
}

/**
 * Writes the dataset, its table form, statistics, failures and a text report
 * into `outputDir`. Output holds no timestamps, so exporting the same entries
 * twice yields identical bytes.
 */
export async function exportDataset(input: ExportInput, outputDir: string): Promise<ExportPaths> {
  const paths: ExportPaths = {
    dataset: path.join(outputDir, 'dataset.json'),
    table: path.join(outputDir, 'dataset.csv'),
    statistics: path.join(outputDir, 'statistics.json'),
    failures: path.join(outputDir, 'failures.json'),
    report: path.join(outputDir, 'report.txt'),
  };

  try {
    await fs.ensureDir(outputDir);
    await cleanupOrphanedTempFiles(outputDir);
  } catch (error) {
    throw new ExportError(`Could not prepare ${outputDir}: ${describeError(error)}`, outputDir);
  }

  const rows = selectExportRows(input.entries, input.phaseOrder);
  const stats = computeStatistics(input);
  const compare = byPhaseThenPath(input.phaseOrder);
  const failures = [...input.failures].sort((a, b) =>
    compare({ phase: a.phaseLabel, path: a.imagePath }, { phase: b.phaseLabel, path: b.imagePath })
  );

  await writeOutput(paths.dataset, JSON.stringify(rows, null, 2) + '\n');
  await writeOutput(paths.table, toCsv(rows));
  await writeOutput(paths.statistics, JSON.stringify(stats, null, 2) + '\n');
  await writeOutput(paths.failures, JSON.stringify(failures, null, 2) + '\n');
  await writeOutput(paths.report, renderReport(stats));

  logger.info(`Exported ${rows.length} entr${rows.length === 1 ? 'y' : 'ies'} to ${outputDir}`);
  return paths;
}

/** Reads `dataset.json` back, validating every row. */
export async function readStructuredDataset(filePath: string): Promise<ExportRow[]> {
  let data: unknown;
  try {
    data = await fs.readJson(filePath);
  } catch (error) {
    throw new ExportError(`Could not read ${filePath}: ${describeError(error)}`, filePath);
  }
  const parsed = z.array(exportRowSchema).safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ExportError(`${filePath} is not a valid dataset: ${issue.path.join('.')}: ${issue.message}`, filePath);
  }
  return parsed.data;
}
