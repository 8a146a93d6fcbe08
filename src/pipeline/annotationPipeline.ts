import { AnnotatorConfig, checkpointPath, getProviderConfig } from '../config/config';
import { CaptionRequester, CaptionRequesterOptions, RequestOutcome } from '../captioning/captionRequester';
import { promptFor } from '../captioning/promptBuilder';
import { runPool } from '../captioning/workerPool';
import { enumerateImages } from '../dataset/imageEnumerator';
import { ExportPaths, exportDataset } from '../export/datasetExporter';
import { VisionProvider, createProvider } from '../providers';
import { createScorer } from '../qualification/qualityScorer';
import {
  HumanOverrides,
  filterEntries,
  loadHumanOverrides,
  regenerationCandidates,
  resolveOutstandingReviews,
} from '../qualification/validationFilter';
import { CheckpointStore } from '../storage/checkpointStore';
import { withFileLock } from '../storage/locks';
import { CaptionResult, DatasetEntry } from '../types/dataset';
import { logger } from '../utils/logger';

export interface PipelineOptions {
  /** Ignore the checkpoint and request every image again. */
  force?: boolean;
  /** Only the first N images in enumeration order. */
  limit?: number;
  signal?: AbortSignal;
  /** Provider id overriding `activeProvider`. */
  provider?: string;
  /** Prebuilt provider, used instead of one created from the configuration. */
  providerInstance?: VisionProvider;
  requester?: Pick<CaptionRequesterOptions, 'sleep' | 'random' | 'readImage' | 'onTransition' | 'now'>;
}

export interface PipelineSummary {
  images: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  resumed: number;
  regenerationRounds: number;
  accepted: number;
  rejected: number;
  reviewsResolved: number;
  output: ExportPaths;
}

/**
 * Enumerate, caption, score, filter, regenerate, resolve reviews and export.
 * Configuration and enumeration problems abort before any provider call; per
 * image failures are reported in the export and the summary.
 */
export async function runAnnotationPipeline(cfg: AnnotatorConfig, options: PipelineOptions = {}): Promise<PipelineSummary> {
  const { force = false, limit, signal } = options;
  const overrides: HumanOverrides = cfg.export.overridesFile
    ? await loadHumanOverrides(cfg.export.overridesFile)
    : {};
  const provider = options.providerInstance ?? createProvider(getProviderConfig(cfg, options.provider));

  const enumerated = await enumerateImages({
    root: cfg.dataset.root,
    phases: cfg.dataset.phases,
    extensions: cfg.dataset.extensions,
  });
  const records = limit !== undefined ? enumerated.slice(0, limit) : enumerated;
  logger.info(`Annotating ${records.length} of ${enumerated.length} image(s) with provider ${provider.id}`);

  const storePath = checkpointPath(cfg);
  return withFileLock(`${storePath}.lock`, async () => {
    const checkpoint = new CheckpointStore(storePath);
    await checkpoint.load();

    const requester = new CaptionRequester({
      ...options.requester,
      provider,
      settings: cfg.requester,
      checkpoint,
      promptFor: (record) => promptFor(cfg, record),
    });
    const report = await requester.requestAll(records, { force, signal });

    const score = createScorer(cfg);
    const toEntry = (result: CaptionResult, regenerations: number): DatasetEntry => ({
      imageRecord: result.imageRecord,
      captionResult: result,
      qualityScore: score(result.rawText, result.imageRecord.phaseLabel),
      validationStatus: 'NeedsReview',
      regenerations,
    });

    let filtered = filterEntries(report.succeeded.map(result => toEntry(result, 0)));
    const cap = cfg.validation.regenerationCap;
    let rounds = 0;

    while (!signal?.aborted) {
      const candidates = regenerationCandidates(filtered.entries, cap);
      if (candidates.length === 0) break;
      rounds++;
      logger.info(`Regeneration round ${rounds}: ${candidates.length} caption(s) need review`);

      const outcomes = await runPool(
        candidates,
        cfg.requester.concurrency,
        (entry) => requester.requestOne(entry.imageRecord, signal, { persistFailure: false }),
        {
          shouldStop: () => signal?.aborted ?? false,
          skipped: (entry): RequestOutcome => ({ status: 'cancelled', record: entry.imageRecord }),
        }
      );

      const replacements = new Map<string, DatasetEntry>();
      candidates.forEach((entry, index) => {
        const outcome = outcomes[index];
        replacements.set(
          entry.imageRecord.relativePath,
          outcome.status === 'succeeded'
            ? toEntry(outcome.result, entry.regenerations + 1)
            : { ...entry, regenerations: entry.regenerations + 1 }
        );
      });
      filtered = filterEntries(filtered.entries.map(entry => replacements.get(entry.imageRecord.relativePath) ?? entry));
    }

    const outstanding = filtered.needsReview.length;
    const resolved = resolveOutstandingReviews(filtered.entries, overrides, cfg.export.acceptHumanOverrides);

    const output = await exportDataset(
      {
        entries: resolved.entries,
        failures: report.failed,
        phaseOrder: cfg.dataset.phases.map(phase => phase.label),
        cancelled: report.cancelled.length,
      },
      cfg.export.outputDir
    );

    const summary: PipelineSummary = {
      images: records.length,
      succeeded: report.succeeded.length,
      failed: report.failed.length,
      cancelled: report.cancelled.length,
      resumed: report.resumed,
      regenerationRounds: rounds,
      accepted: resolved.accepted.length,
      rejected: resolved.rejected.length,
      reviewsResolved: outstanding,
      output,
    };

    logger.info(
      `Run summary: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.cancelled} cancelled; ` +
      `${summary.accepted} accepted, ${summary.rejected} rejected, ${summary.reviewsResolved} review(s) resolved`
    );
    if (signal?.aborted) {
      logger.warn(`Run was cancelled; ${summary.cancelled} image(s) will be picked up by the next run`);
    }
    return summary;
  });
}
