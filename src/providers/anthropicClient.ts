import axios from 'axios';
import { BaseVisionProvider, ImagePayload, ModelReply } from './baseProvider';
import { ProviderError } from '../utils/errors';

export interface AnthropicOptions {
  id: string;
  model: string;
  apiKey: string;
  baseUrl?: string;
  requestsPerMinute?: number;
  maxImageBytes?: number;
}

interface MessagesResponse {
  model?: string;
  content?: Array<{ type: string; text?: string }>;
}

const ANTHROPIC_VERSION = '2023-06-01';

export class AnthropicClient extends BaseVisionProvider {
  readonly kind = 'anthropic' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: AnthropicOptions) {
    super(options.id, options.model, {
      maxImageBytes: options.maxImageBytes ?? 5 * 1024 * 1024,
      supportedMimeTypes: ['image/jpeg', 'image/png', 'image/webp', 'image/gif'],
      requestsPerMinute: options.requestsPerMinute ?? 50,
    });
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? 'https://api.anthropic.com/v1';
  }

  protected async callModel(image: ImagePayload, prompt: string, signal?: AbortSignal): Promise<ModelReply> {
    if (!this.apiKey) {
      throw new ProviderError('AuthFailure', 'Anthropic API key is missing');
    }

    const response = await axios.post<MessagesResponse>(
      `${this.baseUrl}/messages`,
      {
        model: this.modelName,
        max_tokens: 400,
        messages: [
          {
            role: 'user',
            content: [
              {
                type: 'image',
                source: { type: 'base64', media_type: image.mimeType, data: image.bytes.toString('base64') },
              },
              { type: 'text', text: prompt },
            ],
          },
        ],
      },
      {
        headers: {
          'x-api-key': this.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
          'Content-Type': 'application/json',
        },
        signal,
      }
    );

    const text = (response.data.content ?? [])
      .filter(block => block.type === 'text')
      .map(block => block.text ?? '')
      .join('\n');
    return { text, modelName: response.data.model };
  }
}
