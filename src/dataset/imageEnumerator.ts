import * as fs from 'fs-extra';
import * as path from 'path';
import { EnumerationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { ImageFormat, ImageRecord } from '../types/dataset';

export interface PhaseDirectory {
  directory: string;
  label: string;
}

export interface EnumerationOptions {
  root: string;
  phases: PhaseDirectory[];
  extensions: string[];
}

const FORMATS: Record<string, { format: ImageFormat; mimeType: string }> = {
  '.jpg': { format: 'jpeg', mimeType: 'image/jpeg' },
  '.jpeg': { format: 'jpeg', mimeType: 'image/jpeg' },
  '.png': { format: 'png', mimeType: 'image/png' },
  '.bmp': { format: 'bmp', mimeType: 'image/bmp' },
  '.tif': { format: 'tiff', mimeType: 'image/tiff' },
  '.tiff': { format: 'tiff', mimeType: 'image/tiff' },
  '.webp': { format: 'webp', mimeType: 'image/webp' },
  '.gif': { format: 'gif', mimeType: 'image/gif' },
};

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function toPosixPath(p: string): string {
  return p.split(path.sep).join('/');
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Walks `root/{phase directory}/**` and returns one record per image, ordered by
 * the configured phase order and then by path within the phase directory.
 *
 * Every declared phase directory must exist under `root` with exactly that name;
 * otherwise the phase ground truth is ambiguous and the whole run is aborted.
 */
export async function enumerateImages(options: EnumerationOptions): Promise<ImageRecord[]> {
  const root = path.resolve(options.root);
  if (!(await fs.pathExists(root)) || !(await fs.stat(root)).isDirectory()) {
    throw new EnumerationError(`Dataset root not found: ${root}`, root);
  }

  // readdir rather than pathExists so that name matching stays case-sensitive
  const rootEntries = await fs.readdir(root, { withFileTypes: true });
  const subdirectories = new Set(rootEntries.filter(e => e.isDirectory()).map(e => e.name));
  const missing = options.phases.filter(phase => !subdirectories.has(phase.directory));
  if (missing.length > 0) {
    const names = missing.map(phase => phase.directory).join(', ');
    throw new EnumerationError(`Phase director${missing.length === 1 ? 'y' : 'ies'} missing under ${root}: ${names}`, missing[0].directory);
  }

  const allowed = new Set(options.extensions.map(ext => ext.toLowerCase()));
  const records: ImageRecord[] = [];

  for (const phase of options.phases) {
    const phaseDir = path.join(root, phase.directory);
    const files = (await listFiles(phaseDir))
      .map(file => ({ file, relativePath: toPosixPath(path.relative(root, file)) }))
      .sort((a, b) => compareCodeUnits(a.relativePath, b.relativePath));

    let skipped = 0;
    for (const { file, relativePath } of files) {
      const ext = path.extname(file).toLowerCase();
      const known = FORMATS[ext];
      if (!allowed.has(ext) || !known) {
        skipped++;
        continue;
      }
      const stat = await fs.stat(file);
      records.push({
        path: file,
        relativePath,
        phaseLabel: phase.label,
        format: known.format,
        mimeType: known.mimeType,
        sizeBytes: stat.size,
      });
    }

    const count = records.filter(r => r.phaseLabel === phase.label).length;
    logger.info(`  ${phase.label.toUpperCase().padEnd(15)}: ${String(count).padStart(4)} images${skipped ? ` (${skipped} non-image file(s) skipped)` : ''}`);
  }

  return records;
}
