import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EmbeddingClient } from '../client.js';
import { EmbeddingError } from '../../shared/errors.js';
import { ConfigSchema } from '../../shared/config.js';

const config = ConfigSchema.parse({
  embedding: { base_url: 'https://embed.test/v1', api_key: 'test-secret', model: 'test-embed', dimensions: 3 },
}).embedding;

const originalFetch = globalThis.fetch;
let fetchMock: ReturnType<typeof vi.fn>;

function respondWith(body: string, status = 200): void {
  fetchMock.mockImplementation(async () => new Response(body, { status }));
}

beforeEach(() => {
  fetchMock = vi.fn();
  globalThis.fetch = fetchMock;
});

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe('EmbeddingClient.embed', () => {
  it('sends model, input and dimensions', async () => {
    respondWith(JSON.stringify({ data: [{ index: 0, embedding: [0.1, 0.2, 0.3] }] }));

    await new EmbeddingClient(config).embed(['octo/vec: stores vectors']);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://embed.test/v1/embeddings');
    expect(JSON.parse(init.body)).toEqual({
      model: 'test-embed',
      input: ['octo/vec: stores vectors'],
      dimensions: 3,
    });
  });

  it('returns entries in provider order with their indices', async () => {
    respondWith(
      JSON.stringify({
        data: [
          { index: 1, embedding: [0, 1, 0] },
          { index: 0, embedding: [1, 0, 0] },
        ],
      }),
    );

    const result = await new EmbeddingClient(config).embed(['a', 'b']);

    expect(result).toEqual([
      { index: 1, embedding: [0, 1, 0] },
      { index: 0, embedding: [1, 0, 0] },
    ]);
  });

  it('makes no request for empty input', async () => {
    expect(await new EmbeddingClient(config).embed([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('throws EmbeddingError on a non-2xx status', async () => {
    respondWith('unauthorized', 401);
    await expect(new EmbeddingClient(config).embed(['a'])).rejects.toThrow('Embedding API error: 401');
  });

  it('throws EmbeddingError on an unexpected shape', async () => {
    respondWith(JSON.stringify({ data: [{ index: -1, embedding: 'nope' }] }));
    await expect(new EmbeddingClient(config).embed(['a'])).rejects.toThrow('Unexpected embedding response shape');
  });

  it('wraps network failures', async () => {
    fetchMock.mockRejectedValue(new Error('socket hang up'));
    const err = await new EmbeddingClient(config).embed(['a']).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingError);
    expect(err).toHaveProperty('message', 'Embedding request failed: socket hang up');
  });
});
