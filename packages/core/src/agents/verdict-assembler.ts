import type { GateResult, Verdict } from '@verita/shared/src/types/verification.types.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { clamp } from '@verita/shared/src/utils/math.js';
import type { ExtractionResult, JsonObject } from '../llm/json-extraction.js';

const log = createChildLogger('agent:verdict-assembler');

export const DEFAULT_CONFIDENCE = 0.5;
export const DEFAULT_RECOMMENDATION = 'Verify with trusted sources.';
export const NOT_APPLICABLE_RECOMMENDATION = 'No fact-check needed for this type of message.';
export const NOT_APPLICABLE_SUMMARY = 'This message does not contain a claim that can be fact-checked.';
export const FAILURE_SUMMARY = 'Could not complete analysis';
export const FAILURE_RECOMMENDATION = 'Manual verification recommended.';

const DOMAIN_PATTERN = /^(?:www\.)?[a-z0-9-]+(?:\.[a-z0-9-]+)+(?:\/\S*)?$/i;
const MAX_SOURCE_NAME_WORDS = 4;
const MAX_SOURCE_NAME_CHARS = 40;

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/** URLs, domain names and short outlet names ("Reuters", "BBC News"). Prose is not a source. */
export function isSourceIdentifier(value: string): boolean {
  if (isHttpUrl(value) || DOMAIN_PATTERN.test(value)) {
    return true;
  }
  const words = value.split(/\s+/);
  return (
    value.length <= MAX_SOURCE_NAME_CHARS &&
    words.length <= MAX_SOURCE_NAME_WORDS &&
    !/[.!?,;:]$/.test(value)
  );
}

function readStrings(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
}

function readSources(value: JsonObject): string[] {
  const raw = 'sources_checked' in value ? value['sources_checked'] : value['sources'];
  return readStrings(raw).filter((entry) => isSourceIdentifier(entry.trim()));
}

function readConfidence(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return DEFAULT_CONFIDENCE;
  }
  return clamp(value, 0, 1);
}

function readString(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function notApplicable(summary: string): Verdict {
  return {
    isMisinformation: false,
    confidence: 0,
    isNews: false,
    summary: summary || NOT_APPLICABLE_SUMMARY,
    evidence: [],
    sourcesChecked: [],
    recommendation: NOT_APPLICABLE_RECOMMENDATION,
  };
}

/**
 * Normalizes whatever the agent produced into a complete Verdict. Never
 * throws: every missing or ill-typed field falls back to its default.
 */
export function assembleVerdict(extraction: ExtractionResult, gateResult: GateResult): Verdict {
  if (!gateResult.isNews) {
    return notApplicable(gateResult.reason);
  }

  if (!extraction.ok) {
    log.warn({ reason: extraction.failure.reason }, 'Assembling default verdict from failed extraction');
    return {
      isMisinformation: false,
      confidence: DEFAULT_CONFIDENCE,
      isNews: true,
      summary: extraction.failure.excerpt || FAILURE_SUMMARY,
      evidence: [],
      sourcesChecked: [],
      recommendation: FAILURE_RECOMMENDATION,
    };
  }

  const value = extraction.value;

  if (value['is_news'] === false) {
    return notApplicable(readString(value['summary'], ''));
  }

  return {
    isMisinformation: value['is_misinformation'] === true,
    confidence: readConfidence(value['confidence']),
    isNews: true,
    summary: readString(value['summary'], ''),
    evidence: readStrings(value['evidence']),
    sourcesChecked: readSources(value),
    recommendation: readString(value['recommendation'], DEFAULT_RECOMMENDATION),
  };
}
