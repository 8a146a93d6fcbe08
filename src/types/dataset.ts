export type PhaseLabel = string;

export type ImageFormat = 'jpeg' | 'png' | 'bmp' | 'tiff' | 'webp' | 'gif';

export interface ImageRecord {
  readonly path: string;          // Absolute path on disk
  readonly relativePath: string;  // POSIX path relative to the dataset root; the record's identity
  readonly phaseLabel: PhaseLabel;
  readonly format: ImageFormat;
  readonly mimeType: string;
  readonly sizeBytes: number;
}

export type ProviderErrorKind = 'Transient' | 'RateLimited' | 'AuthFailure' | 'InvalidInput' | 'Unknown';

export interface ProviderFailure {
  kind: ProviderErrorKind;
  message: string;
  retryAfterMs?: number;
}

export interface CaptionRequest {
  imageRecord: ImageRecord;
  promptTemplate: string;
  providerId: string;
  attemptNumber: number;
}

export interface CaptionResult {
  imageRecord: ImageRecord;
  rawText: string;
  providerId: string;
  modelName: string;
  latencyMs: number;
  error: ProviderFailure | null;
}

export type Classification = 'Excellent' | 'Good' | 'Acceptable' | 'Poor';

export type Criterion =
  | 'phaseMatch'
  | 'growthPresent'
  | 'growthInRange'
  | 'visualDescription'
  | 'processStage'
  | 'technicalTerms'
  | 'length'
  | 'noContradiction';

export interface QualityScore {
  phaseMatch: boolean;
  growthValue: number | null;
  growthInRange: boolean;
  growthOutOfBounds: boolean;
  criteriaBreakdown: Record<Criterion, number>;
  total: number;
  classification: Classification;
  parseError?: string;
}

export type ValidationStatus = 'Accepted' | 'NeedsReview' | 'Rejected';

export interface DatasetEntry {
  imageRecord: ImageRecord;
  captionResult: CaptionResult;
  qualityScore: QualityScore;
  validationStatus: ValidationStatus;
  regenerations: number;
  reviewedByHuman?: boolean;
}

export interface FailedImage {
  imagePath: string;
  phaseLabel: PhaseLabel;
  errorKind: ProviderErrorKind;
  message: string;
  attempts: number;
}
