import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { AnnotatorConfig, RequesterSettings, parseConfig } from '../../src/config/config';
import { ImagePayload, ProviderKind, ProviderResponse, VisionProvider } from '../../src/providers/baseProvider';
import { RateLimiter } from '../../src/providers/rateLimiter';
import { CaptionResult, DatasetEntry, ImageRecord, ProviderErrorKind, QualityScore } from '../../src/types/dataset';

export const EXAMPLE_CONFIG_PATH = path.join(__dirname, '..', '..', 'config', 'config.example.json');

export interface TestConfigOverrides {
  root: string;
  outputDir: string;
  requester?: Partial<RequesterSettings>;
  regenerationCap?: number;
  acceptHumanOverrides?: boolean;
  overridesFile?: string;
}

/** Example configuration pointed at a temporary dataset and output directory. */
export function testConfig(overrides: TestConfigOverrides): AnnotatorConfig {
  const cfg = parseConfig(fs.readJsonSync(EXAMPLE_CONFIG_PATH), path.dirname(path.dirname(EXAMPLE_CONFIG_PATH)));
  cfg.dataset.root = overrides.root;
  cfg.export.outputDir = overrides.outputDir;
  Object.assign(cfg.requester, { backoffBaseMs: 1, backoffMaxMs: 5, jitterMs: 0, requestTimeoutMs: 1000 }, overrides.requester);
  if (overrides.regenerationCap !== undefined) cfg.validation.regenerationCap = overrides.regenerationCap;
  if (overrides.acceptHumanOverrides !== undefined) cfg.export.acceptHumanOverrides = overrides.acceptHumanOverrides;
  if (overrides.overridesFile !== undefined) cfg.export.overridesFile = overrides.overridesFile;
  return cfg;
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

/**
 * Creates `root/<dir>/<file>` for every entry. File content is the relative
 * path, which lets fake providers tell images apart.
 */
export async function writeImages(root: string, files: string[]): Promise<void> {
  for (const file of files) {
    const target = path.join(root, file);
    await fs.ensureDir(path.dirname(target));
    await fs.writeFile(target, file);
  }
}

export function okResponse(text: string, latencyMs = 5): ProviderResponse {
  return { ok: true, text, modelName: 'fake-model', latencyMs };
}

export function failResponse(kind: ProviderErrorKind, message = `${kind} failure`, retryAfterMs?: number): ProviderResponse {
  const error = retryAfterMs === undefined ? { kind, message } : { kind, message, retryAfterMs };
  return { ok: false, error, modelName: 'fake-model', latencyMs: 5 };
}

export type Responder = (imageName: string, callNumber: number) => ProviderResponse | Promise<ProviderResponse>;

/** In-process provider that answers from a function and tracks concurrency. */
export class FakeProvider implements VisionProvider {
  readonly id = 'fake';
  readonly kind: ProviderKind = 'ollama';
  readonly modelName = 'fake-model';
  readonly capabilities = {
    maxImageBytes: 1024 * 1024,
    supportedMimeTypes: ['image/jpeg', 'image/png'],
    requestsPerMinute: 60000,
  };
  readonly rateLimiter = new RateLimiter(60000);
  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly responder: Responder, private readonly delayMs = 0) {}

  async generate(image: ImagePayload): Promise<ProviderResponse> {
    const name = image.bytes.toString('utf-8');
    this.calls.push(name);
    const callNumber = this.calls.filter(call => call === name).length;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.delayMs));
      }
      return await this.responder(name, callNumber);
    } finally {
      this.inFlight--;
    }
  }
}

export function imageRecord(relativePath: string, phaseLabel: string): ImageRecord {
  return {
    path: path.join('/data', relativePath),
    relativePath,
    phaseLabel,
    format: 'png',
    mimeType: 'image/png',
    sizeBytes: 10,
  };
}

export function scoreOf(partial: Partial<QualityScore>): QualityScore {
  return {
    phaseMatch: true,
    growthValue: null,
    growthInRange: false,
    growthOutOfBounds: false,
    criteriaBreakdown: {
      phaseMatch: 0,
      growthPresent: 0,
      growthInRange: 0,
      visualDescription: 0,
      processStage: 0,
      technicalTerms: 0,
      length: 0,
      noContradiction: 0,
    },
    total: 85,
    classification: 'Good',
    ...partial,
  };
}

export function entryOf(
  relativePath: string,
  phaseLabel: string,
  score: Partial<QualityScore>,
  extra: Partial<DatasetEntry> = {}
): DatasetEntry {
  const record = imageRecord(relativePath, phaseLabel);
  const captionResult: CaptionResult = {
    imageRecord: record,
    rawText: `caption for ${relativePath}`,
    providerId: 'fake',
    modelName: 'fake-model',
    latencyMs: 5,
    error: null,
  };
  return {
    imageRecord: record,
    captionResult,
    qualityScore: scoreOf(score),
    validationStatus: 'Accepted',
    regenerations: 0,
    ...extra,
  };
}
