import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return {
    ...actual,
    default: { ...actual.default, post: vi.fn() },
  };
});

vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}));

import axios, { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import {
  AnthropicClient,
  OllamaClient,
  OpenRouterClient,
  createProvider,
} from '../src/providers';

const post = vi.mocked(axios.post);
const PNG = { bytes: Buffer.from('fake-png-bytes'), mimeType: 'image/png' };

function reply(data: unknown): AxiosResponse {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

function httpError(status: number, data: unknown, headers: Record<string, string> = {}): AxiosError {
  return new AxiosError('Request failed', 'ERR_BAD_RESPONSE', undefined, undefined, {
    status,
    statusText: '',
    data,
    headers,
    config: { headers: new AxiosHeaders() },
  });
}

describe('OpenRouterClient', () => {
  beforeEach(() => {
    post.mockReset();
  });

  const client = () => new OpenRouterClient({ id: 'openrouter', model: 'openai/gpt-4o-mini', apiKey: 'test-secret' });

  it('sends the prompt and the image as a data URL', async () => {
    post.mockResolvedValue(reply({ model: 'openai/gpt-4o-mini', choices: [{ message: { content: '  Labile: tiny seeds.  ' } }] }));

    const response = await client().generate(PNG, 'Describe it.');

    expect(response).toMatchObject({ ok: true, text: 'Labile: tiny seeds.', modelName: 'openai/gpt-4o-mini' });
    const [url, body, config] = post.mock.calls[0];
    expect(url).toBe('https://openrouter.ai/api/v1/chat/completions');
    expect(body).toEqual({
      model: 'openai/gpt-4o-mini',
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: 'Describe it.' },
            { type: 'image_url', image_url: { url: `data:image/png;base64,${PNG.bytes.toString('base64')}` } },
          ],
        },
      ],
    });
    expect(config?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
  });

  it('reports a missing key as AuthFailure without calling the API', async () => {
    const response = await new OpenRouterClient({ id: 'openrouter', model: 'm', apiKey: '' }).generate(PNG, 'p');

    expect(response).toMatchObject({ ok: false, error: { kind: 'AuthFailure', message: 'OpenRouter API key is missing' } });
    expect(post).not.toHaveBeenCalled();
  });

  it('rejects images over the size limit before any call', async () => {
    const small = new OpenRouterClient({ id: 'openrouter', model: 'm', apiKey: 'test-secret', maxImageBytes: 4 });

    const response = await small.generate(PNG, 'p');

    expect(response).toMatchObject({ ok: false, error: { kind: 'InvalidInput' } });
    expect(post).not.toHaveBeenCalled();
  });

  it('classifies 429 with its retry-after hint', async () => {
    post.mockRejectedValue(httpError(429, { error: { message: 'rate limited' } }, { 'retry-after': '7' }));

    const response = await client().generate(PNG, 'p');

    expect(response).toMatchObject({
      ok: false,
      error: { kind: 'RateLimited', message: 'HTTP 429: rate limited', retryAfterMs: 7000 },
    });
  });

  it('classifies 401 as AuthFailure and 503 as Transient', async () => {
    post.mockRejectedValueOnce(httpError(401, { error: { message: 'bad key' } }));
    post.mockRejectedValueOnce(httpError(503, 'upstream unavailable'));

    const unauthorized = await client().generate(PNG, 'p');
    const unavailable = await client().generate(PNG, 'p');

    expect(unauthorized).toMatchObject({ ok: false, error: { kind: 'AuthFailure', message: 'HTTP 401: bad key' } });
    expect(unavailable).toMatchObject({ ok: false, error: { kind: 'Transient', message: 'HTTP 503: upstream unavailable' } });
  });

  it('treats a connection reset as Transient', async () => {
    post.mockRejectedValue(new AxiosError('socket hang up', 'ECONNRESET'));

    const response = await client().generate(PNG, 'p');

    expect(response).toMatchObject({ ok: false, error: { kind: 'Transient', message: 'ECONNRESET: socket hang up' } });
  });

  it('treats an empty reply as Transient', async () => {
    post.mockResolvedValue(reply({ choices: [{ message: { content: '   ' } }] }));

    const response = await client().generate(PNG, 'p');

    expect(response).toMatchObject({ ok: false, error: { kind: 'Transient', message: 'openrouter returned an empty reply' } });
  });
});

describe('AnthropicClient', () => {
  beforeEach(() => {
    post.mockReset();
  });

  it('sends a base64 image block and joins the text blocks', async () => {
    post.mockResolvedValue(
      reply({ model: 'claude-test', content: [{ type: 'text', text: 'Metastable:' }, { type: 'text', text: 'dense mosaic.' }] })
    );
    const client = new AnthropicClient({ id: 'anthropic', model: 'claude-test', apiKey: 'test-secret' });

    const response = await client.generate(PNG, 'Describe it.');

    expect(response).toMatchObject({ ok: true, text: 'Metastable:\ndense mosaic.', modelName: 'claude-test' });
    const [url, body, config] = post.mock.calls[0];
    expect(url).toBe('https://api.anthropic.com/v1/messages');
    expect(body).toMatchObject({
      model: 'claude-test',
      messages: [
        {
          role: 'user',
          content: [
            { type: 'image', source: { type: 'base64', media_type: 'image/png', data: PNG.bytes.toString('base64') } },
            { type: 'text', text: 'Describe it.' },
          ],
        },
      ],
    });
    expect(config?.headers).toMatchObject({ 'x-api-key': 'test-secret', 'anthropic-version': '2023-06-01' });
  });

  it('declares a 5 MiB image limit', () => {
    const client = new AnthropicClient({ id: 'anthropic', model: 'm', apiKey: 'test-secret' });
    expect(client.capabilities.maxImageBytes).toBe(5 * 1024 * 1024);
    expect(client.capabilities.requestsPerMinute).toBe(50);
  });
});

describe('OllamaClient', () => {
  beforeEach(() => {
    post.mockReset();
  });

  it('posts to the local generate endpoint without a key', async () => {
    post.mockResolvedValue(reply({ model: 'llava:13b', response: 'Unsaturated: clear solution.' }));
    const client = new OllamaClient({ id: 'local', model: 'llava:13b' });

    const response = await client.generate(PNG, 'Describe it.');

    expect(response).toMatchObject({ ok: true, text: 'Unsaturated: clear solution.' });
    const [url, body] = post.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/generate');
    expect(body).toMatchObject({ model: 'llava:13b', prompt: 'Describe it.', images: [PNG.bytes.toString('base64')], stream: false });
  });

  it('refuses encodings it does not support', async () => {
    const client = new OllamaClient({ id: 'local', model: 'llava:13b' });

    const response = await client.generate({ bytes: Buffer.from('x'), mimeType: 'image/webp' }, 'p');

    expect(response).toMatchObject({ ok: false, error: { kind: 'InvalidInput' } });
    expect(post).not.toHaveBeenCalled();
  });
});

describe('createProvider', () => {
  it('builds the adapter matching the configured kind', () => {
    expect(createProvider({ kind: 'openrouter', id: 'a', model: 'm', apiKey: 'test-secret' })).toBeInstanceOf(OpenRouterClient);
    expect(createProvider({ kind: 'anthropic', id: 'b', model: 'm', apiKey: 'test-secret' })).toBeInstanceOf(AnthropicClient);
    const local = createProvider({ kind: 'ollama', id: 'c', model: 'm', requestsPerMinute: 30 });
    expect(local).toBeInstanceOf(OllamaClient);
    expect(local.rateLimiter.requestsPerMinute).toBe(30);
  });
});
