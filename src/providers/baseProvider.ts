import { ProviderFailure } from '../types/dataset';
import { ProviderError } from '../utils/errors';
import { classifyProviderError } from './errorClassifier';
import { RateLimiter } from './rateLimiter';

export type ProviderKind = 'openrouter' | 'anthropic' | 'ollama';

export interface ImagePayload {
  bytes: Buffer;
  mimeType: string;
}

export interface ProviderCapabilities {
  maxImageBytes: number;
  supportedMimeTypes: readonly string[];
  requestsPerMinute: number;
}

export type ProviderResponse =
  | { ok: true; text: string; modelName: string; latencyMs: number }
  | { ok: false; error: ProviderFailure; modelName: string; latencyMs: number };

/**
 * Capability contract shared by every vision backend. The requester depends on
 * this interface only.
 */
export interface VisionProvider {
  readonly id: string;
  readonly kind: ProviderKind;
  readonly modelName: string;
  readonly capabilities: ProviderCapabilities;
  readonly rateLimiter: RateLimiter;

  /**
   * Sends one image and prompt to the model. Never rejects: every failure is
   * returned as a classified `ProviderFailure`.
   */
  generate(image: ImagePayload, prompt: string, signal?: AbortSignal): Promise<ProviderResponse>;
}

export interface ModelReply {
  text: string;
  modelName?: string;
}

export abstract class BaseVisionProvider implements VisionProvider {
  abstract readonly kind: ProviderKind;
  readonly rateLimiter: RateLimiter;

  constructor(
    readonly id: string,
    readonly modelName: string,
    readonly capabilities: ProviderCapabilities
  ) {
    this.rateLimiter = new RateLimiter(capabilities.requestsPerMinute);
  }

  protected abstract callModel(image: ImagePayload, prompt: string, signal?: AbortSignal): Promise<ModelReply>;

  protected validateImage(image: ImagePayload): void {
    const { maxImageBytes, supportedMimeTypes } = this.capabilities;
    if (!supportedMimeTypes.includes(image.mimeType)) {
      throw new ProviderError('InvalidInput', `${this.id} does not accept ${image.mimeType} (supported: ${supportedMimeTypes.join(', ')})`);
    }
    if (image.bytes.length > maxImageBytes) {
      throw new ProviderError('InvalidInput', `Image is ${image.bytes.length} bytes; ${this.id} accepts at most ${maxImageBytes}`);
    }
  }

  async generate(image: ImagePayload, prompt: string, signal?: AbortSignal): Promise<ProviderResponse> {
    const startedAt = Date.now();
    try {
      this.validateImage(image);
      const reply = await this.callModel(image, prompt, signal);
      const text = reply.text.trim();
      if (!text) {
        throw new ProviderError('Transient', `${this.id} returned an empty reply`);
      }
      return {
        ok: true,
        text,
        modelName: reply.modelName || this.modelName,
        latencyMs: Date.now() - startedAt,
      };
    } catch (error) {
      return {
        ok: false,
        error: classifyProviderError(error),
        modelName: this.modelName,
        latencyMs: Date.now() - startedAt,
      };
    }
  }
}
