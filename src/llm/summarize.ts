import type { Repo } from '../source/adapter.js';
import type { Summarizer, SummaryResult } from '../engine/providers.js';
import type { ChatClient } from './client.js';
import { buildSummaryMessages, SUMMARY_SYSTEM_PROMPT } from './prompts.js';
import { parseWithRetry, SummarySchema } from './parse.js';
import { LlmError } from '../shared/errors.js';

/**
 * Summarizer backed by an OpenAI-compatible chat model.
 */
export class LlmSummarizer implements Summarizer {
  constructor(private readonly client: ChatClient) {}

  async summarize(repo: Repo, signal?: AbortSignal): Promise<SummaryResult> {
    const messages = buildSummaryMessages(repo);
    try {
      const response = await this.client.chat(messages, signal);
      const parsed = await parseWithRetry(SummarySchema, response.content, this.client, SUMMARY_SYSTEM_PROMPT, signal);
      return { summary: parsed.summary, categories: parsed.categories };
    } catch (err) {
      if (err instanceof LlmError) {
        throw new LlmError(`Summarizing ${repo.full_name}: ${err.message}`, { ...err.details, repo: repo.full_name });
      }
      throw err;
    }
  }
}
