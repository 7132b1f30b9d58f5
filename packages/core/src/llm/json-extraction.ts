/**
 * Pulls a JSON object out of raw model output that may wrap it in prose or
 * markdown code fences.
 *
 * Strategies run in a fixed order and each one only proposes a candidate
 * string; the first candidate that parses to a plain JSON object wins.
 */

export type JsonObject = Record<string, unknown>;

export type ExtractionStrategyName = 'json-fence' | 'bare-fence' | 'brace-span' | 'raw-text';

export interface ExtractionStrategy {
  readonly name: ExtractionStrategyName;
  candidate(text: string): string | undefined;
}

export interface ExtractionFailure {
  readonly reason: string;
  /** First characters of the raw text, kept for diagnostics. */
  readonly excerpt: string;
}

export type ExtractionResult =
  | { readonly ok: true; readonly value: JsonObject; readonly strategy: ExtractionStrategyName }
  | { readonly ok: false; readonly failure: ExtractionFailure };

export const FAILURE_EXCERPT_LENGTH = 500;

export const jsonFenceStrategy: ExtractionStrategy = {
  name: 'json-fence',
  candidate(text) {
    const match = /```json\s*([\s\S]*?)```/i.exec(text);
    return match?.[1]?.trim();
  },
};

export const bareFenceStrategy: ExtractionStrategy = {
  name: 'bare-fence',
  candidate(text) {
    const match = /```\s*([\s\S]*?)```/.exec(text);
    return match?.[1]?.trim();
  },
};

export const braceSpanStrategy: ExtractionStrategy = {
  name: 'brace-span',
  candidate(text) {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start === -1 || end <= start) {
      return undefined;
    }
    return text.slice(start, end + 1);
  },
};

export const rawTextStrategy: ExtractionStrategy = {
  name: 'raw-text',
  candidate(text) {
    return text.trim();
  },
};

export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  jsonFenceStrategy,
  bareFenceStrategy,
  braceSpanStrategy,
  rawTextStrategy,
];

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseObject(candidate: string): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function extractJsonObject(
  raw: string,
  strategies: readonly ExtractionStrategy[] = EXTRACTION_STRATEGIES,
): ExtractionResult {
  for (const strategy of strategies) {
    const candidate = strategy.candidate(raw);
    if (!candidate) {
      continue;
    }
    const value = parseObject(candidate);
    if (value) {
      return { ok: true, value, strategy: strategy.name };
    }
  }

  return {
    ok: false,
    failure: {
      reason: raw.trim() ? 'No JSON object found in model output' : 'Model output was empty',
      excerpt: raw.slice(0, FAILURE_EXCERPT_LENGTH),
    },
  };
}
