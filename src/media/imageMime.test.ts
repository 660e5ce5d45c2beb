import { describe, expect, it } from 'vitest';

import { buildImageDataUrl, detectImageMimeType, isImageMimeType, resolveImageMimeType } from './imageMime.js';

describe('imageMime', () => {
  it('recognizes image mime types case-insensitively', () => {
    expect(isImageMimeType('IMAGE/PNG')).toBe(true);
    expect(isImageMimeType('application/pdf')).toBe(false);
    expect(isImageMimeType(undefined)).toBe(false);
  });

  it('detects common formats from magic bytes', () => {
    expect(detectImageMimeType(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe('image/jpeg');
    expect(detectImageMimeType(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))).toBe('image/png');
    expect(
      detectImageMimeType(new Uint8Array([0x52, 0x49, 0x46, 0x46, 0, 0, 0, 0, 0x57, 0x45, 0x42, 0x50])),
    ).toBe('image/webp');
    expect(detectImageMimeType(new Uint8Array([0x47, 0x49, 0x46, 0x38, 0x39, 0x61]))).toBe('image/gif');
    expect(detectImageMimeType(new Uint8Array([1, 2, 3]))).toBeNull();
  });

  it('prefers the declared type and falls back to jpeg', () => {
    expect(resolveImageMimeType(new Uint8Array([1]), 'image/PNG')).toBe('image/png');
    expect(resolveImageMimeType(new Uint8Array([1]), 'application/pdf')).toBe('image/jpeg');
    expect(resolveImageMimeType(new Uint8Array([0x47, 0x49, 0x46, 0x38, 0x37, 0x61]))).toBe('image/gif');
  });

  it('builds base64 data urls', () => {
    expect(buildImageDataUrl(new Uint8Array([104, 105]), 'image/png')).toBe('data:image/png;base64,aGk=');
  });
});
