import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import {
  assignStatus,
  filterEntries,
  loadHumanOverrides,
  regenerationCandidates,
  resolveOutstandingReviews,
} from '../src/qualification/validationFilter';
import { ConfigError } from '../src/utils/errors';
import { entryOf, makeTempDir, scoreOf } from './helpers/fixtures';

describe('assignStatus', () => {
  it('accepts Excellent and Good captions that name the phase', () => {
    expect(assignStatus(scoreOf({ classification: 'Excellent', total: 95 }))).toBe('Accepted');
    expect(assignStatus(scoreOf({ classification: 'Good', total: 82 }))).toBe('Accepted');
  });

  it('never accepts a caption without the phase name', () => {
    expect(assignStatus(scoreOf({ classification: 'Excellent', total: 95, phaseMatch: false }))).toBe('Rejected');
  });

  it('rejects Poor captions and impossible growth values', () => {
    expect(assignStatus(scoreOf({ classification: 'Poor', total: 40 }))).toBe('Rejected');
    expect(assignStatus(scoreOf({ classification: 'Excellent', total: 90, growthOutOfBounds: true }))).toBe('Rejected');
  });

  it('sends Acceptable captions to review', () => {
    expect(assignStatus(scoreOf({ classification: 'Acceptable', total: 75 }))).toBe('NeedsReview');
  });

  it('sends growth outside the phase band to review even when the score is high', () => {
    const score = scoreOf({ classification: 'Excellent', total: 90, growthValue: 40, growthInRange: false });
    expect(assignStatus(score)).toBe('NeedsReview');
  });

  it('accepts a Good caption with no growth estimate', () => {
    expect(assignStatus(scoreOf({ classification: 'Good', total: 80, growthValue: null }))).toBe('Accepted');
  });
});

describe('filterEntries', () => {
  it('partitions entries by their assigned status', () => {
    const result = filterEntries([
      entryOf('labile/a.png', 'labile', { classification: 'Good', total: 85 }),
      entryOf('labile/b.png', 'labile', { classification: 'Acceptable', total: 72 }),
      entryOf('labile/c.png', 'labile', { classification: 'Poor', total: 30 }),
    ]);

    expect(result.accepted.map(e => e.imageRecord.relativePath)).toEqual(['labile/a.png']);
    expect(result.needsReview.map(e => e.imageRecord.relativePath)).toEqual(['labile/b.png']);
    expect(result.rejected.map(e => e.imageRecord.relativePath)).toEqual(['labile/c.png']);
  });
});

describe('regenerationCandidates', () => {
  it('only returns review entries below the cap', () => {
    const entries = [
      entryOf('a.png', 'labile', {}, { validationStatus: 'NeedsReview', regenerations: 0 }),
      entryOf('b.png', 'labile', {}, { validationStatus: 'NeedsReview', regenerations: 2 }),
      entryOf('c.png', 'labile', {}, { validationStatus: 'Accepted', regenerations: 0 }),
    ];
    expect(regenerationCandidates(entries, 2).map(e => e.imageRecord.relativePath)).toEqual(['a.png']);
  });
});

describe('resolveOutstandingReviews', () => {
  const pending = [
    entryOf('a.png', 'labile', {}, { validationStatus: 'NeedsReview' }),
    entryOf('b.png', 'labile', {}, { validationStatus: 'NeedsReview' }),
    entryOf('c.png', 'labile', {}, { validationStatus: 'Accepted' }),
  ];

  it('accepts approved entries when overrides are enabled', () => {
    const result = resolveOutstandingReviews(pending, { 'a.png': 'approve', 'b.png': 'reject' }, true);

    expect(result.accepted.map(e => e.imageRecord.relativePath)).toEqual(['a.png', 'c.png']);
    expect(result.rejected.map(e => e.imageRecord.relativePath)).toEqual(['b.png']);
    expect(result.needsReview).toHaveLength(0);
    expect(result.entries[0].reviewedByHuman).toBe(true);
  });

  it('rejects every remaining review entry when overrides are disabled', () => {
    const result = resolveOutstandingReviews(pending, { 'a.png': 'approve' }, false);

    expect(result.accepted.map(e => e.imageRecord.relativePath)).toEqual(['c.png']);
    expect(result.rejected.map(e => e.imageRecord.relativePath)).toEqual(['a.png', 'b.png']);
    expect(result.entries[0].reviewedByHuman).toBe(false);
  });
});

describe('loadHumanOverrides', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.remove(dir);
  });

  it('returns the decisions of a valid file', async () => {
    dir = await makeTempDir('overrides');
    const file = path.join(dir, 'overrides.json');
    await fs.writeJson(file, { 'labile/a.png': 'approve', 'labile/b.png': 'reject' });

    expect(await loadHumanOverrides(file)).toEqual({ 'labile/a.png': 'approve', 'labile/b.png': 'reject' });
  });

  it('rejects an unknown decision and leaves the file alone', async () => {
    dir = await makeTempDir('overrides');
    const file = path.join(dir, 'overrides.json');
    await fs.writeJson(file, { 'labile/a.png': 'approved' });

    try {
      await loadHumanOverrides(file);
      expect.unreachable('loadHumanOverrides should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.message).toBe(`Invalid human overrides file ${file}`);
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0].startsWith('labile/a.png: ')).toBe(true);
      }
    }
    expect(await fs.readdir(dir)).toEqual(['overrides.json']);
  });

  it('fails for a missing file', async () => {
    await expect(loadHumanOverrides('/nonexistent/overrides.json')).rejects.toBeInstanceOf(ConfigError);
  });
});
