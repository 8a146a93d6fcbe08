import * as fs from 'fs-extra';
import { RequesterSettings } from '../config/config';
import { ImagePayload, ProviderResponse, VisionProvider } from '../providers/baseProvider';
import { isRetryable } from '../providers/errorClassifier';
import { systemClock } from '../providers/rateLimiter';
import { CheckpointRecord, CheckpointStore } from '../storage/checkpointStore';
import { CaptionRequest, CaptionResult, FailedImage, ImageRecord, ProviderFailure } from '../types/dataset';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { computeBackoffDelay } from './backoff';
import { runPool } from './workerPool';

export type RequestState = 'Pending' | 'InFlight' | 'Retrying' | 'Succeeded' | 'Failed';

export interface StateTransition {
  request: CaptionRequest;
  from: RequestState;
  to: RequestState;
  error?: ProviderFailure;
}

export type RequestOutcome =
  | { status: 'succeeded'; record: ImageRecord; result: CaptionResult; attempts: number; fromCheckpoint: boolean }
  | { status: 'failed'; record: ImageRecord; failure: FailedImage; fromCheckpoint: boolean }
  | { status: 'cancelled'; record: ImageRecord };

export interface RequesterReport {
  outcomes: RequestOutcome[];
  succeeded: CaptionResult[];
  failed: FailedImage[];
  cancelled: ImageRecord[];
  resumed: number;
}

export interface CaptionRequesterOptions {
  provider: VisionProvider;
  settings: RequesterSettings;
  promptFor: (record: ImageRecord) => string;
  checkpoint?: CheckpointStore;
  readImage?: (record: ImageRecord) => Promise<Buffer>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => Date;
  onTransition?: (transition: StateTransition) => void;
}

export interface RequestOneOptions {
  persistFailure?: boolean;
}

export interface RequestAllOptions {
  force?: boolean;
  signal?: AbortSignal;
}

const readImageFromDisk = (record: ImageRecord): Promise<Buffer> => fs.readFile(record.path);

/**
 * Drives one provider over many images. Each image moves through
 * Pending → InFlight → {Succeeded, Retrying, Failed}; Retrying re-enters
 * InFlight after a backoff, at most `maxAttempts` times in total.
 */
export class CaptionRequester {
  private readonly provider: VisionProvider;
  private readonly settings: RequesterSettings;
  private readonly promptFor: (record: ImageRecord) => string;
  private readonly checkpoint?: CheckpointStore;
  private readonly readImage: (record: ImageRecord) => Promise<Buffer>;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly onTransition?: (transition: StateTransition) => void;

  constructor(options: CaptionRequesterOptions) {
    this.provider = options.provider;
    this.settings = options.settings;
    this.promptFor = options.promptFor;
    this.checkpoint = options.checkpoint;
    this.readImage = options.readImage ?? readImageFromDisk;
    this.sleep = options.sleep ?? systemClock.sleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.onTransition = options.onTransition;
  }

  async requestAll(records: readonly ImageRecord[], options: RequestAllOptions = {}): Promise<RequesterReport> {
    const { force = false, signal } = options;
    const concurrency = this.settings.concurrency;
    logger.info(`Requesting captions for ${records.length} image(s) from ${this.provider.id} (${this.provider.modelName}), concurrency ${concurrency}`);

    const outcomes = await runPool(
      records,
      concurrency,
      async (record) => {
        const previous = force ? undefined : this.checkpoint?.get(record.relativePath);
        const resumed = previous ? this.fromCheckpoint(record, previous) : undefined;
        return resumed ?? this.requestOne(record, signal);
      },
      {
        shouldStop: () => signal?.aborted ?? false,
        skipped: (record): RequestOutcome => ({ status: 'cancelled', record }),
      }
    );

    if (this.checkpoint) {
      await this.checkpoint.flush();
    }

    const report: RequesterReport = { outcomes, succeeded: [], failed: [], cancelled: [], resumed: 0 };
    for (const outcome of outcomes) {
      if (outcome.status === 'succeeded') {
        report.succeeded.push(outcome.result);
      } else if (outcome.status === 'failed') {
        report.failed.push(outcome.failure);
      } else {
        report.cancelled.push(outcome.record);
      }
      if (outcome.status !== 'cancelled' && outcome.fromCheckpoint) {
        report.resumed++;
      }
    }

    logger.info(
      `Captioning finished: ${report.succeeded.length} succeeded, ${report.failed.length} failed, ` +
      `${report.cancelled.length} cancelled, ${report.resumed} taken from checkpoint`
    );
    return report;
  }

  /**
   * Runs the full attempt cycle for one image, ignoring any checkpoint entry.
   * Terminal outcomes are appended to the checkpoint; with `persistFailure`
   * off, a failure leaves the existing checkpoint entry in place.
   */
  async requestOne(record: ImageRecord, signal?: AbortSignal, options: RequestOneOptions = {}): Promise<RequestOutcome> {
    const { persistFailure = true } = options;
    const prompt = this.promptFor(record);
    const maxAttempts = this.settings.maxAttempts;
    let state: RequestState = 'Pending';
    let attempt = 0;

    const request = (): CaptionRequest => ({
      imageRecord: record,
      promptTemplate: prompt,
      providerId: this.provider.id,
      attemptNumber: attempt,
    });
    const move = (to: RequestState, error?: ProviderFailure): void => {
      this.emit({ request: request(), from: state, to, error });
      state = to;
    };

    let bytes: Buffer;
    try {
      bytes = await this.readImage(record);
    } catch (error) {
      const failure: ProviderFailure = { kind: 'InvalidInput', message: `Could not read image: ${describeError(error)}` };
      move('Failed', failure);
      return this.fail(record, failure, 0, persistFailure);
    }
    const image: ImagePayload = { bytes, mimeType: record.mimeType };

    for (;;) {
      if (signal?.aborted) {
        return { status: 'cancelled', record };
      }
      const granted = await this.provider.rateLimiter.acquire(signal);
      if (!granted) {
        return { status: 'cancelled', record };
      }

      attempt++;
      move('InFlight');
      const response = await this.attemptWithTimeout(image, prompt);

      if (response.ok) {
        move('Succeeded');
        const result: CaptionResult = {
          imageRecord: record,
          rawText: response.text,
          providerId: this.provider.id,
          modelName: response.modelName,
          latencyMs: response.latencyMs,
          error: null,
        };
        await this.record({
          imagePath: record.relativePath,
          terminalState: 'Succeeded',
          attemptCount: attempt,
          timestamp: this.now().toISOString(),
          caption: {
            rawText: result.rawText,
            providerId: result.providerId,
            modelName: result.modelName,
            latencyMs: result.latencyMs,
          },
        });
        return { status: 'succeeded', record, result, attempts: attempt, fromCheckpoint: false };
      }

      const failure = response.error;
      const retryable = isRetryable(failure.kind);

      if (retryable && signal?.aborted) {
        // Run is shutting down: no further attempts for this image
        const cancelled: ProviderFailure = { kind: 'Transient', message: `${failure.message} (run cancelled)` };
        move('Failed', cancelled);
        return this.fail(record, cancelled, attempt, persistFailure);
      }

      if (retryable && attempt < maxAttempts) {
        const retryAfterMs = failure.kind === 'RateLimited' ? failure.retryAfterMs : undefined;
        if (retryAfterMs !== undefined) {
          this.provider.rateLimiter.penalize(retryAfterMs);
        }
        const delay = computeBackoffDelay(attempt, this.settings, retryAfterMs, this.random);
        logger.warn(`${record.relativePath}: attempt ${attempt}/${maxAttempts} failed (${failure.kind}: ${failure.message}); retrying in ${delay}ms`);
        move('Retrying', failure);
        await this.sleep(delay, signal);
        continue;
      }

      logger.error(`${record.relativePath}: attempt ${attempt}/${maxAttempts} failed (${failure.kind}: ${failure.message}); giving up`);
      move('Failed', failure);
      return this.fail(record, failure, attempt, persistFailure);
    }
  }

  private async attemptWithTimeout(image: ImagePayload, prompt: string): Promise<ProviderResponse> {
    const timeoutMs = this.settings.requestTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<ProviderResponse>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          ok: false,
          error: { kind: 'Transient', message: `Request timed out after ${timeoutMs}ms` },
          modelName: this.provider.modelName,
          latencyMs: timeoutMs,
        });
      }, timeoutMs);
    });
    try {
      return await Promise.race([this.provider.generate(image, prompt, controller.signal), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async fail(record: ImageRecord, failure: ProviderFailure, attempts: number, persist: boolean): Promise<RequestOutcome> {
    if (persist) {
      await this.record({
        imagePath: record.relativePath,
        terminalState: 'Failed',
        attemptCount: attempts,
        timestamp: this.now().toISOString(),
        errorKind: failure.kind,
        errorMessage: failure.message,
      });
    }
    return {
      status: 'failed',
      record,
      failure: {
        imagePath: record.relativePath,
        phaseLabel: record.phaseLabel,
        errorKind: failure.kind,
        message: failure.message,
        attempts,
      },
      fromCheckpoint: false,
    };
  }

  private fromCheckpoint(record: ImageRecord, previous: CheckpointRecord): RequestOutcome | undefined {
    if (previous.terminalState === 'Failed') {
      return {
        status: 'failed',
        record,
        failure: {
          imagePath: record.relativePath,
          phaseLabel: record.phaseLabel,
          errorKind: previous.errorKind ?? 'Unknown',
          message: previous.errorMessage ?? 'failed in an earlier run',
          attempts: previous.attemptCount,
        },
        fromCheckpoint: true,
      };
    }
    if (!previous.caption) {
      // Succeeded without a stored caption: nothing to score, ask again
      return undefined;
    }
    return {
      status: 'succeeded',
      record,
      result: {
        imageRecord: record,
        rawText: previous.caption.rawText,
        providerId: previous.caption.providerId,
        modelName: previous.caption.modelName,
        latencyMs: previous.caption.latencyMs,
        error: null,
      },
      attempts: previous.attemptCount,
      fromCheckpoint: true,
    };
  }

  private async record(entry: CheckpointRecord): Promise<void> {
    if (!this.checkpoint) return;
    try {
      await this.checkpoint.append(entry);
    } catch (error) {
      logger.warn(`${entry.imagePath} will be requested again on resume: ${describeError(error)}`);
    }
  }

  private emit(transition: StateTransition): void {
    logger.debug(`${transition.request.imageRecord.relativePath}: ${transition.from} -> ${transition.to} (attempt ${transition.request.attemptNumber})`);
    this.onTransition?.(transition);
  }
}
