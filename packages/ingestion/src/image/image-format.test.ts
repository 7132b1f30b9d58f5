import { describe, it, expect } from 'vitest';
import { detectImageFormat } from './image-format.js';

function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

function ascii(text: string): number[] {
  return Array.from(text, (char) => char.charCodeAt(0));
}

describe('detectImageFormat', () => {
  it('should recognize JPEG, PNG and GIF signatures', () => {
    expect(detectImageFormat(bytes(0xff, 0xd8, 0xff, 0xe0))).toBe('jpeg');
    expect(detectImageFormat(bytes(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00))).toBe('png');
    expect(detectImageFormat(bytes(...ascii('GIF89a'), 0x01))).toBe('gif');
    expect(detectImageFormat(bytes(...ascii('GIF87a')))).toBe('gif');
  });

  it('should recognize WebP inside a RIFF container', () => {
    expect(detectImageFormat(bytes(...ascii('RIFF'), 0x24, 0x00, 0x00, 0x00, ...ascii('WEBPVP8 ')))).toBe(
      'webp',
    );
  });

  it('should reject other RIFF payloads and arbitrary bytes', () => {
    expect(detectImageFormat(bytes(...ascii('RIFF'), 0x24, 0x00, 0x00, 0x00, ...ascii('WAVE')))).toBeUndefined();
    expect(detectImageFormat(bytes(...ascii('%PDF-1.7')))).toBeUndefined();
    expect(detectImageFormat(bytes(0x89, 0x50))).toBeUndefined();
    expect(detectImageFormat(bytes())).toBeUndefined();
  });
});
