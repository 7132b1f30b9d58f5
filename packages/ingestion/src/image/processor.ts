import type { ImagePayload, IngestionResult } from '@verita/shared/src/types/ingestion.types.js';
import { createChildLogger } from '@verita/shared/src/logger.js';
import { IngestionError } from '@verita/shared/src/utils/errors.js';
import type { ImageDescriber } from './image-describer.js';
import { detectImageFormat, IMAGE_MIME_TYPES } from './image-format.js';

const log = createChildLogger('ingestion:image');

export async function processImage(
  payload: ImagePayload,
  describer: ImageDescriber,
  signal?: AbortSignal,
): Promise<IngestionResult> {
  if (payload.data.length === 0) {
    throw new IngestionError('Image input is empty');
  }

  const format = detectImageFormat(payload.data);
  if (!format) {
    throw new IngestionError('File must be an image (JPEG, PNG, GIF, or WebP)');
  }

  const mimeType = IMAGE_MIME_TYPES[format];
  const declared = payload.mimeType?.trim().toLowerCase();
  if (declared && declared !== mimeType && !(declared === 'image/jpg' && format === 'jpeg')) {
    throw new IngestionError(
      `Declared type ${declared} does not match the image content (${mimeType})`,
    );
  }

  log.info({ format, byteLength: payload.data.length }, 'Processing image input');

  const { extractedText, description } = await describer.describe(
    { data: payload.data, mimeType },
    signal,
  );

  return {
    modality: 'image',
    extractedText: `${extractedText} ${description}`,
    metadata: {
      format,
      mimeType,
      byteLength: payload.data.length,
      ocrText: extractedText,
      description,
    },
  };
}
