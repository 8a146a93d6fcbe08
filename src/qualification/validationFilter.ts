import * as fs from 'fs-extra';
import { z } from 'zod';
import { DatasetEntry, QualityScore, ValidationStatus } from '../types/dataset';
import { ConfigError, describeError } from '../utils/errors';

export const humanOverridesSchema = z.record(z.enum(['approve', 'reject']));

export type HumanOverrides = z.infer<typeof humanOverridesSchema>;

/** Reads the configured human-overrides file; any problem with it is a ConfigError. */
export async function loadHumanOverrides(filePath: string): Promise<HumanOverrides> {
  let data: unknown;
  try {
    data = await fs.readJson(filePath);
  } catch (error) {
    throw new ConfigError(`Cannot read human overrides file ${filePath}: ${describeError(error)}`);
  }

  const result = humanOverridesSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid human overrides file ${filePath}`, issues);
  }
  return result.data;
}

export interface FilterResult {
  entries: DatasetEntry[];
  accepted: DatasetEntry[];
  needsReview: DatasetEntry[];
  rejected: DatasetEntry[];
}

/**
 * Rejection wins over everything else; a growth estimate outside the phase band
 * always needs a second look, even on an otherwise strong caption.
 */
export function assignStatus(score: QualityScore): ValidationStatus {
  if (score.classification === 'Poor' || !score.phaseMatch || score.growthOutOfBounds) {
    return 'Rejected';
  }
  if (score.growthValue !== null && !score.growthInRange) {
    return 'NeedsReview';
  }
  if (score.classification === 'Excellent' || score.classification === 'Good') {
    return 'Accepted';
  }
  return 'NeedsReview';
}

function partition(entries: DatasetEntry[]): FilterResult {
  return {
    entries,
    accepted: entries.filter(e => e.validationStatus === 'Accepted'),
    needsReview: entries.filter(e => e.validationStatus === 'NeedsReview'),
    rejected: entries.filter(e => e.validationStatus === 'Rejected'),
  };
}

export function filterEntries(entries: readonly DatasetEntry[]): FilterResult {
  return partition(entries.map(entry => ({ ...entry, validationStatus: assignStatus(entry.qualityScore) })));
}

/** NeedsReview entries that may still be sent back for a new caption. */
export function regenerationCandidates(entries: readonly DatasetEntry[], regenerationCap: number): DatasetEntry[] {
  return entries.filter(e => e.validationStatus === 'NeedsReview' && e.regenerations < regenerationCap);
}

/**
 * Settles every remaining NeedsReview entry. An entry is accepted only when a
 * reviewer approved it and human overrides are enabled; everything else is
 * rejected.
 */
export function resolveOutstandingReviews(
  entries: readonly DatasetEntry[],
  overrides: HumanOverrides,
  acceptHumanOverrides: boolean
): FilterResult {
  const resolved = entries.map((entry): DatasetEntry => {
    if (entry.validationStatus !== 'NeedsReview') return entry;
    const decision = overrides[entry.imageRecord.relativePath];
    const approved = decision === 'approve' && acceptHumanOverrides;
    return {
      ...entry,
      validationStatus: approved ? 'Accepted' : 'Rejected',
      reviewedByHuman: acceptHumanOverrides && decision !== undefined,
    };
  });
  return partition(resolved);
}
