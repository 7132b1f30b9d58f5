export type ImageFormat = 'jpeg' | 'png' | 'gif' | 'webp';

export const IMAGE_MIME_TYPES: Readonly<Record<ImageFormat, string>> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp',
};

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function startsWith(data: Uint8Array, bytes: readonly number[], offset = 0): boolean {
  if (data.length < offset + bytes.length) {
    return false;
  }
  return bytes.every((byte, index) => data[offset + index] === byte);
}

function asciiBytes(text: string): number[] {
  return Array.from(text, (char) => char.charCodeAt(0));
}

/** Identifies the image format from its magic bytes. */
export function detectImageFormat(data: Uint8Array): ImageFormat | undefined {
  if (startsWith(data, [0xff, 0xd8])) {
    return 'jpeg';
  }
  if (startsWith(data, PNG_SIGNATURE)) {
    return 'png';
  }
  if (startsWith(data, asciiBytes('GIF87a')) || startsWith(data, asciiBytes('GIF89a'))) {
    return 'gif';
  }
  if (startsWith(data, asciiBytes('RIFF')) && startsWith(data, asciiBytes('WEBP'), 8)) {
    return 'webp';
  }
  return undefined;
}
