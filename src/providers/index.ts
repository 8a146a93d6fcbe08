import { ProviderConfig } from '../config/config';
import { VisionProvider } from './baseProvider';
import { OpenRouterClient } from './openRouterClient';
import { AnthropicClient } from './anthropicClient';
import { OllamaClient } from './ollamaClient';

export * from './baseProvider';
export * from './openRouterClient';
export * from './anthropicClient';
export * from './ollamaClient';

/**
 * Builds the adapter for one configured provider.
 */
export function createProvider(cfg: ProviderConfig): VisionProvider {
  switch (cfg.kind) {
    case 'openrouter':
      return new OpenRouterClient(cfg);
    case 'anthropic':
      return new AnthropicClient(cfg);
    case 'ollama':
      return new OllamaClient(cfg);
  }
}
