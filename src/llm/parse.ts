import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LlmError } from '../shared/errors.js';
import type { ChatClient } from './client.js';
import { buildRepairPrompt } from './prompts.js';

export const SummarySchema = z.object({
  summary: z.string().min(1),
  categories: z.array(z.string()).default([]),
});

export type SummaryOutput = z.infer<typeof SummarySchema>;

/**
 * Strip markdown code fences that some models wrap around JSON.
 */
export function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```\s*$/, '')
    .trim();
}

/**
 * Try to parse and validate JSON from LLM output.
 * Returns the parsed data, or a string error message if it fails.
 */
function tryParse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T | string {
  try {
    const json: unknown = JSON.parse(raw);
    const result = schema.safeParse(json);
    if (result.success) return result.data;
    return result.error.message;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/**
 * Parse LLM JSON output with one repair-retry on parse or validation failure.
 */
export async function parseWithRetry<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rawOutput: string,
  client: ChatClient,
  systemMessage: string,
  signal?: AbortSignal,
): Promise<T> {
  const cleaned = stripCodeFences(rawOutput);

  const firstResult = tryParse(schema, cleaned);
  if (typeof firstResult !== 'string') return firstResult;

  logger.warn({ error: firstResult, raw: cleaned.slice(0, 200) }, 'LLM output invalid, attempting repair');

  let repairResponse;
  try {
    repairResponse = await client.chat(
      [
        { role: 'system', content: systemMessage },
        { role: 'user', content: buildRepairPrompt(firstResult, cleaned) },
      ],
      signal,
    );
  } catch (err) {
    throw new LlmError(`LLM repair call failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  const repairedCleaned = stripCodeFences(repairResponse.content);
  const repairedResult = tryParse(schema, repairedCleaned);
  if (typeof repairedResult !== 'string') return repairedResult;

  throw new LlmError('LLM output invalid after repair attempt', {
    original_error: firstResult,
    repair_error: repairedResult,
    raw: repairedCleaned.slice(0, 500),
  });
}
