export type InputModality = 'image' | 'text';

export interface TextPayload {
  readonly modality: 'text';
  readonly content: string;
}

export interface ImagePayload {
  readonly modality: 'image';
  readonly data: Uint8Array;
  readonly mimeType?: string;
}

export type IngestionPayload = TextPayload | ImagePayload;

export interface IngestionResult {
  readonly modality: InputModality;
  readonly extractedText: string;
  readonly metadata: Record<string, unknown>;
}
