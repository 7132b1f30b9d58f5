export type ClaimModality = 'text' | 'image';

export interface Claim {
  readonly id: string;
  readonly text: string;
  readonly modality: ClaimModality;
}

export interface SearchResult {
  readonly title: string;
  readonly snippet: string;
  readonly url: string;
  readonly sourceDomain: string;
}

export interface SearchErrorMarker {
  readonly error: string;
}

export type SearchRecord = SearchResult | SearchErrorMarker;

export function isSearchErrorMarker(record: SearchRecord): record is SearchErrorMarker {
  return 'error' in record;
}

export interface GateResult {
  readonly isNews: boolean;
  readonly reason: string;
}

export interface Verdict {
  readonly isMisinformation: boolean;
  readonly confidence: number;
  readonly isNews: boolean;
  readonly summary: string;
  readonly evidence: readonly string[];
  readonly sourcesChecked: readonly string[];
  readonly recommendation: string;
}
