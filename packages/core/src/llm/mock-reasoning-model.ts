import type { Turn } from '@verita/shared/src/types/conversation.types.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { throwIfAborted } from '@verita/shared/src/utils/async.js';
import type { ReasoningModel, ReasoningRequest, ReasoningResponse } from './reasoning-model.js';

const log = createChildLogger('llm:reasoning-model:mock');

const DEBUNK_PATTERN = /\b(false|fake|hoax|debunk(ed|s)?|fabricated|misleading|no evidence)\b/i;

interface MockHit {
  readonly title: string;
  readonly snippet: string;
  readonly url: string;
}

function claimFromTurns(turns: readonly Turn[]): string {
  const userTurn = turns.find((turn) => turn.kind === 'user');
  if (!userTurn) {
    return '';
  }
  // The first paragraph is the instruction; the claim follows it.
  const paragraphs = userTurn.content.split(/\n\s*\n/);
  return (paragraphs[1] ?? paragraphs[0] ?? '').trim();
}

function isMockHit(value: unknown): value is MockHit {
  return (
    typeof value === 'object' &&
    value !== null &&
    'title' in value &&
    typeof value.title === 'string' &&
    'snippet' in value &&
    typeof value.snippet === 'string' &&
    'url' in value &&
    typeof value.url === 'string'
  );
}

function hitsFromTurns(turns: readonly Turn[]): MockHit[] {
  const hits: MockHit[] = [];
  for (const turn of turns) {
    if (turn.kind !== 'tool-result') continue;
    try {
      const parsed: unknown = JSON.parse(turn.content);
      if (Array.isArray(parsed)) {
        hits.push(...parsed.filter(isMockHit));
      }
    } catch {
      // Truncated payloads are not valid JSON; the mock just skips them.
      continue;
    }
  }
  return hits;
}

function finalAnswer(hits: readonly MockHit[]): string {
  const debunking = hits.filter((hit) => DEBUNK_PATTERN.test(`${hit.title} ${hit.snippet}`));
  const isMisinformation = debunking.length > 0;
  const cited = isMisinformation ? debunking : hits;

  const verdict = {
    is_misinformation: isMisinformation,
    confidence: isMisinformation ? 0.85 : hits.length > 0 ? 0.6 : 0.5,
    summary: isMisinformation
      ? 'Fact-checking sources describe this claim as false.'
      : 'No fact-check contradicting this claim was found.',
    evidence: cited.slice(0, 3).map((hit) => hit.snippet || hit.title),
    sources_checked: cited.slice(0, 5).map((hit) => hit.url),
    recommendation: isMisinformation
      ? 'Do not share this message; it has been debunked.'
      : 'Verify with trusted sources.',
  };

  return `Based on the search results:\n\`\`\`json\n${JSON.stringify(verdict, null, 2)}\n\`\`\``;
}

/**
 * Deterministic stand-in for offline runs: asks for one fact-check search,
 * then answers from whatever the search returned.
 */
export function createMockReasoningModel(): ReasoningModel {
  log.info('Using mock reasoning model');

  let callCounter = 0;

  return {
    async complete(request: ReasoningRequest, signal?: AbortSignal): Promise<ReasoningResponse> {
      throwIfAborted(signal);
      log.debug({ turnCount: request.turns.length }, 'Mock reasoning invocation');

      const hasToolResults = request.turns.some((turn) => turn.kind === 'tool-result');
      const canSearch = (request.tools ?? []).some((tool) => tool.name === 'fact_check_search');

      if (!hasToolResults && canSearch) {
        callCounter++;
        return {
          content: '',
          toolCalls: [
            {
              toolName: 'fact_check_search',
              arguments: { claim: claimFromTurns(request.turns) },
              correlationId: `mock_call_${String(callCounter)}`,
            },
          ],
        };
      }

      return {
        content: finalAnswer(hitsFromTurns(request.turns)),
        toolCalls: [],
      };
    },
  };
}
