import { randomUUID } from 'node:crypto';
import type { IngestionPayload } from '@verita/shared/src/types/ingestion.types.js';
import type { Claim } from '@verita/shared/src/types/verification.types.js';
import type { IngestionResult } from '@verita/shared/src/types/ingestion.types.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { IngestionError } from '@verita/shared/src/utils/errors.js';
import type { ImageDescriber } from './image/image-describer.js';
import { processImage } from './image/processor.js';
import { processText } from './text/processor.js';

export interface IngestOptions {
  /** Required for image payloads. */
  readonly describer?: ImageDescriber;
  readonly signal?: AbortSignal;
}

const log = createChildLogger('ingestion:claim');

function toClaim(result: IngestionResult): Claim {
  const claim: Claim = { id: randomUUID(), text: result.extractedText, modality: result.modality };
  log.info({ claimId: claim.id, modality: claim.modality, ...result.metadata }, 'Claim ingested');
  return claim;
}

export async function ingest(payload: IngestionPayload, options: IngestOptions = {}): Promise<Claim> {
  switch (payload.modality) {
    case 'text': {
      return toClaim(await processText(payload));
    }
    case 'image': {
      if (!options.describer) {
        throw new IngestionError('An image describer is required for image input');
      }
      return toClaim(await processImage(payload, options.describer, options.signal));
    }
  }
}
