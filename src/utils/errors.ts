import { logger } from './logger';
import { ProviderErrorKind, ProviderFailure } from '../types/dataset';

export class AnnotatorError extends Error {
  constructor(
    message: string,
    public code: string,
    public fatal: boolean = false
  ) {
    super(message);
    this.name = 'AnnotatorError';
  }
}

/**
 * The dataset directory does not match the configured phase layout.
 * Ground truth would be ambiguous, so the whole run stops.
 */
export class EnumerationError extends AnnotatorError {
  constructor(message: string, public missingDirectory?: string) {
    super(message, 'ENUMERATION_FAILED', true);
    this.name = 'EnumerationError';
  }
}

export class ConfigError extends AnnotatorError {
  constructor(message: string, public issues: string[] = []) {
    super(message, 'INVALID_CONFIG', true);
    this.name = 'ConfigError';
  }
}

export class ProviderError extends AnnotatorError {
  constructor(
    public kind: ProviderErrorKind,
    message: string,
    public retryAfterMs?: number
  ) {
    super(message, `PROVIDER_${kind.toUpperCase()}`);
    this.name = 'ProviderError';
  }

  toFailure(): ProviderFailure {
    const failure: ProviderFailure = { kind: this.kind, message: this.message };
    if (this.retryAfterMs !== undefined) {
      failure.retryAfterMs = this.retryAfterMs;
    }
    return failure;
  }
}

export class ScoringError extends AnnotatorError {
  constructor(message: string) {
    super(message, 'CAPTION_UNPARSEABLE');
    this.name = 'ScoringError';
  }
}

export class ExportError extends AnnotatorError {
  constructor(message: string, public filePath: string) {
    super(message, 'EXPORT_FAILED', true);
    this.name = 'ExportError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Logs an error with its context. Fatal annotator errors are logged once here
 * and then rethrown by the caller.
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof AnnotatorError) {
    logger.error(`[${context}] ${error.code}: ${error.message}`);
    if (error instanceof ConfigError && error.issues.length > 0) {
      for (const issue of error.issues) {
        logger.error(`[${context}]   - ${issue}`);
      }
    }
    return;
  }
  logger.error(`[${context}] Unexpected error: ${describeError(error)}`);
  if (error instanceof Error && error.stack) {
    logger.debug(`[${context}] Stack trace: ${error.stack}`);
  }
}
