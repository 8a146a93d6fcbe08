import axios from 'axios';
import { BaseVisionProvider, ImagePayload, ModelReply } from './baseProvider';

export interface OllamaOptions {
  id: string;
  model: string;
  baseUrl?: string;
  requestsPerMinute?: number;
  maxImageBytes?: number;
}

interface GenerateResponse {
  model?: string;
  response?: string;
}

/**
 * Local vision model served by Ollama. No key and a generous quota; the
 * practical limit is the machine it runs on.
 */
export class OllamaClient extends BaseVisionProvider {
  readonly kind = 'ollama' as const;
  private readonly baseUrl: string;

  constructor(options: OllamaOptions) {
    super(options.id, options.model, {
      maxImageBytes: options.maxImageBytes ?? 50 * 1024 * 1024,
      supportedMimeTypes: ['image/jpeg', 'image/png'],
      requestsPerMinute: options.requestsPerMinute ?? 600,
    });
    this.baseUrl = options.baseUrl ?? 'http://localhost:11434';
  }

  protected async callModel(image: ImagePayload, prompt: string, signal?: AbortSignal): Promise<ModelReply> {
    const response = await axios.post<GenerateResponse>(
      `${this.baseUrl}/api/generate`,
      {
        model: this.modelName,
        prompt,
        images: [image.bytes.toString('base64')],
        stream: false,
        options: { temperature: 0.2 },
      },
      { signal }
    );
    return { text: response.data.response ?? '', modelName: response.data.model };
  }
}
