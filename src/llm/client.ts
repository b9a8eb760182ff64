import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError } from '../shared/errors.js';
import { requestSignal } from '../shared/http.js';
import type { Config } from '../shared/config.js';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
  token_count: number;
}

// OpenAI-compatible chat completions API response shape (partial)
const ChatResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }).nullish() })).optional(),
  model: z.string().optional(),
  usage: z.object({ total_tokens: z.number().optional() }).nullish(),
});

export interface ChatClient {
  chat(messages: LlmMessage[], signal?: AbortSignal): Promise<LlmResponse>;
}

export class LlmClient implements ChatClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;

  constructor(config: Config['llm']) {
    this.baseUrl = config.base_url || 'https://api.openai.com/v1';
    this.apiKey = config.api_key;
    this.model = config.model;
    this.maxTokens = config.max_tokens;
    this.temperature = config.temperature;
    this.timeoutMs = config.timeout_ms;
  }

  async chat(messages: LlmMessage[], signal?: AbortSignal): Promise<LlmResponse> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    // No response_format: not every compatible provider supports json_object mode,
    // so the prompt asks for bare JSON instead.
    const body = JSON.stringify({
      model: this.model,
      messages,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
    });

    const { signal: reqSignal, isTimeout } = requestSignal(this.timeoutMs, signal);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body,
        signal: reqSignal,
      });
    } catch (err) {
      if (isTimeout()) throw new LlmError(`LLM request timed out after ${this.timeoutMs}ms`, { url });
      throw new LlmError(`LLM request failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
        model: this.model,
      });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new LlmError(`LLM API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: text.slice(0, 500),
        url,
      });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new LlmError('LLM response is not valid JSON', { url });
    }
    const parsed = ChatResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new LlmError(`LLM response has unexpected shape: ${parsed.error.message}`, { url });
    }
    const data = parsed.data;

    const content = data.choices?.[0]?.message?.content;
    if (!content) {
      throw new LlmError('LLM returned empty content', { response: JSON.stringify(data).slice(0, 200) });
    }

    const tokenCount = data.usage?.total_tokens ?? 0;
    logger.debug({ model: data.model, tokens: tokenCount }, 'LLM call completed');

    return {
      content,
      model: data.model ?? this.model,
      token_count: tokenCount,
    };
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }
}
