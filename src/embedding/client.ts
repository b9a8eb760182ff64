import { z } from 'zod';
import type { Config } from '../shared/config.js';
import type { Embedder, IndexedEmbedding } from '../engine/providers.js';
import { EmbeddingError } from '../shared/errors.js';
import { requestSignal } from '../shared/http.js';
import { logger } from '../shared/logger.js';

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
  model: z.string().optional(),
});

/**
 * Embedder over an OpenAI-compatible `/embeddings` endpoint. Returns the
 * provider's entries as-is; callers place each vector by its `index`.
 */
export class EmbeddingClient implements Embedder {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly dimensions: number;
  private readonly timeoutMs: number;

  constructor(config: Config['embedding']) {
    this.baseUrl = config.base_url || 'https://api.openai.com/v1';
    this.apiKey = config.api_key;
    this.model = config.model;
    this.dimensions = config.dimensions;
    this.timeoutMs = config.timeout_ms;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<IndexedEmbedding[]> {
    if (texts.length === 0) return [];

    const url = `${this.baseUrl.replace(/\/+$/, '')}/embeddings`;
    const { signal: reqSignal, isTimeout } = requestSignal(this.timeoutMs, signal);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ model: this.model, input: texts, dimensions: this.dimensions }),
        signal: reqSignal,
      });
    } catch (err) {
      if (isTimeout()) throw new EmbeddingError(`Embedding request timed out after ${this.timeoutMs}ms`, { url });
      throw new EmbeddingError(`Embedding request failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
        model: this.model,
      });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new EmbeddingError(`Embedding API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new EmbeddingError('Embedding response is not valid JSON', { url });
    }

    const parsed = EmbeddingResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new EmbeddingError('Unexpected embedding response shape', { error: parsed.error.message });
    }

    logger.debug({ model: parsed.data.model ?? this.model, count: parsed.data.data.length }, 'Embeddings created');
    return parsed.data.data;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }
}
