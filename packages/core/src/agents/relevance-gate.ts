import type { GateResult } from '@verita/shared/src/types/verification.types.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { throwIfAborted } from '@verita/shared/src/utils/async.js';
import type { LlmClient } from '../llm/llm-client.js';
import { extractJsonObject } from '../llm/json-extraction.js';
import { RelevanceGateResultSchema } from './agent-output.schemas.js';

const log = createChildLogger('agent:relevance-gate');

export const FAIL_OPEN_REASON = 'Could not determine, treating as potential news';
export const EMPTY_INPUT_REASON = 'The message is empty.';

const SYSTEM_PROMPT = `You decide whether a message is news or a fact-checkable claim.

Consider it NEWS or FACT-CHECKABLE if it:
- Reports on current events, politics, sports, entertainment, science, or world affairs
- Contains claims about real-world events, people, or organizations
- Appears to share information meant to inform about happenings
- Makes factual claims that can be verified
- Forwards or shares news-like content

Do NOT consider it news if it is:
- Personal conversation or a greeting (e.g. "Hi, how are you?")
- Random text or spam
- A question without factual claims
- An opinion clearly stated as an opinion
- An advertisement or promotional content without news claims
- A very short message with no substantive claim

Respond with ONLY a JSON object in this exact format:
{"is_news": true/false, "reason": "brief explanation"}`;

export interface RelevanceGate {
  isFactCheckable(text: string, signal?: AbortSignal): Promise<GateResult>;
}

/**
 * Any failure to get a usable answer is reported as news, so the claim is
 * checked rather than silently dropped. Only a caller abort escapes.
 */
export function createRelevanceGate(llmClient: LlmClient): RelevanceGate {
  return {
    async isFactCheckable(text: string, signal?: AbortSignal): Promise<GateResult> {
      if (text.trim().length === 0) {
        return { isNews: false, reason: EMPTY_INPUT_REASON };
      }

      let content: string;
      try {
        const response = await llmClient.invoke(
          { systemPrompt: SYSTEM_PROMPT, userMessage: text },
          signal,
        );
        content = response.content;
        if (response.tokenUsage) {
          log.debug({ tokenUsage: response.tokenUsage }, 'Relevance gate token usage');
        }
      } catch (error) {
        throwIfAborted(signal);
        log.warn(
          { error: error instanceof Error ? error.message : String(error) },
          'Relevance gate request failed, failing open',
        );
        return { isNews: true, reason: FAIL_OPEN_REASON };
      }

      const extraction = extractJsonObject(content);
      if (!extraction.ok) {
        log.warn({ failure: extraction.failure }, 'Relevance gate output was not JSON, failing open');
        return { isNews: true, reason: FAIL_OPEN_REASON };
      }

      const parsed = RelevanceGateResultSchema.safeParse(extraction.value);
      if (!parsed.success) {
        log.warn(
          { issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`) },
          'Relevance gate output failed validation, failing open',
        );
        return { isNews: true, reason: FAIL_OPEN_REASON };
      }

      const result: GateResult = {
        isNews: parsed.data.is_news,
        reason: parsed.data.reason ?? '',
      };
      log.info({ isNews: result.isNews, reason: result.reason }, 'Relevance gate decided');
      return result;
    },
  };
}
