import type { TextPayload, IngestionResult } from '@verita/shared/src/types/ingestion.types.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { IngestionError } from '@verita/shared/src/utils/errors.js';

const log = createChildLogger('ingestion:text');

export function processText(payload: TextPayload): Promise<IngestionResult> {
  const content = payload.content.trim();

  if (content.length === 0) {
    return Promise.reject(new IngestionError('Text input is empty'));
  }

  log.info({ characterCount: content.length }, 'Processing text input');

  return Promise.resolve({
    modality: 'text',
    extractedText: content,
    metadata: {
      characterCount: content.length,
    },
  });
}
