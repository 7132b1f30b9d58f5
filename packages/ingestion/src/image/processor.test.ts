import { describe, it, expect, vi } from 'vitest';
import { IngestionError } from '@verita/shared/src/utils/errors.js';
import type { ImageDescriber } from './image-describer.js';
import { processImage } from './processor.js';

const PNG_BYTES = Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00]);

function createStubDescriber() {
  const describe = vi.fn<ImageDescriber['describe']>().mockResolvedValue({
    extractedText: 'BREAKING: Eiffel Tower sold',
    description: 'A screenshot of a social media post showing the Eiffel Tower.',
  });
  const describer: ImageDescriber = { describe };
  return { describer, describe };
}

describe('processImage', () => {
  it('should join on-image text and description into the extracted text', async () => {
    const { describer, describe } = createStubDescriber();

    const result = await processImage({ modality: 'image', data: PNG_BYTES }, describer);

    expect(describe).toHaveBeenCalledWith({ data: PNG_BYTES, mimeType: 'image/png' }, undefined);
    expect(result).toEqual({
      modality: 'image',
      extractedText:
        'BREAKING: Eiffel Tower sold A screenshot of a social media post showing the Eiffel Tower.',
      metadata: {
        format: 'png',
        mimeType: 'image/png',
        byteLength: 10,
        ocrText: 'BREAKING: Eiffel Tower sold',
        description: 'A screenshot of a social media post showing the Eiffel Tower.',
      },
    });
  });

  it('should reject bytes that are not an image', async () => {
    const { describer, describe } = createStubDescriber();

    await expect(
      processImage({ modality: 'image', data: Uint8Array.from([0x25, 0x50, 0x44, 0x46]) }, describer),
    ).rejects.toThrow('File must be an image (JPEG, PNG, GIF, or WebP)');
    expect(describe).not.toHaveBeenCalled();
  });

  it('should accept a declared type that matches the content', async () => {
    const { describer, describe } = createStubDescriber();

    await processImage({ modality: 'image', data: PNG_BYTES, mimeType: ' Image/PNG ' }, describer);

    expect(describe).toHaveBeenCalledWith({ data: PNG_BYTES, mimeType: 'image/png' }, undefined);
  });

  it('should reject a declared type that contradicts the content', async () => {
    const { describer, describe } = createStubDescriber();

    await expect(
      processImage({ modality: 'image', data: PNG_BYTES, mimeType: 'image/jpeg' }, describer),
    ).rejects.toThrow('Declared type image/jpeg does not match the image content (image/png)');
    expect(describe).not.toHaveBeenCalled();
  });

  it('should reject empty input', async () => {
    const { describer } = createStubDescriber();

    await expect(
      processImage({ modality: 'image', data: new Uint8Array(0) }, describer),
    ).rejects.toThrow(IngestionError);
  });
});
