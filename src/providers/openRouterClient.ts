import axios from 'axios';
import { BaseVisionProvider, ImagePayload, ModelReply } from './baseProvider';
import { ProviderError } from '../utils/errors';

export interface OpenRouterOptions {
  id: string;
  model: string;
  apiKey: string;
  baseUrl?: string;
  requestsPerMinute?: number;
  maxImageBytes?: number;
}

interface ChatCompletionResponse {
  model?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
}

/**
 * OpenAI-compatible chat completions through OpenRouter; the image travels as a
 * base64 data URL.
 */
export class OpenRouterClient extends BaseVisionProvider {
  readonly kind = 'openrouter' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: OpenRouterOptions) {
    super(options.id, options.model, {
      maxImageBytes: options.maxImageBytes ?? 20 * 1024 * 1024,
      supportedMimeTypes: ['image/jpeg', 'image/png', 'image/webp', 'image/gif'],
      requestsPerMinute: options.requestsPerMinute ?? 20,
    });
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? 'https://openrouter.ai/api/v1';
  }

  protected async callModel(image: ImagePayload, prompt: string, signal?: AbortSignal): Promise<ModelReply> {
    if (!this.apiKey) {
      throw new ProviderError('AuthFailure', 'OpenRouter API key is missing');
    }

    const response = await axios.post<ChatCompletionResponse>(
      `${this.baseUrl}/chat/completions`,
      {
        model: this.modelName,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: prompt },
              {
                type: 'image_url',
                image_url: { url: `data:${image.mimeType};base64,${image.bytes.toString('base64')}` },
              },
            ],
          },
        ],
      },
      {
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'X-Title': 'phase-caption-annotator',
          'Content-Type': 'application/json',
        },
        signal,
      }
    );

    const content = response.data.choices?.[0]?.message?.content ?? '';
    return { text: content, modelName: response.data.model };
  }
}
