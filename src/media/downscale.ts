import sharp from 'sharp';

export const EXPORT_IMAGE_MAX_SIZE = 800;
export const EXPORT_IMAGE_JPEG_QUALITY = 85;

export type DownscaleOptions = {
  maxWidth?: number;
  maxHeight?: number;
  quality?: number;
};

export type DownscaledImage = {
  bytes: Buffer;
  width: number;
  height: number;
};

/**
 * Fits the image inside the bounding box keeping its aspect ratio, never enlarging it, and
 * re-encodes it as JPEG. Transparent areas are flattened onto white.
 */
export async function downscaleImage(input: Uint8Array, options: DownscaleOptions = {}): Promise<DownscaledImage> {
  const {
    maxWidth = EXPORT_IMAGE_MAX_SIZE,
    maxHeight = EXPORT_IMAGE_MAX_SIZE,
    quality = EXPORT_IMAGE_JPEG_QUALITY,
  } = options;

  const { data, info } = await sharp(input)
    .rotate()
    .resize({
      width: maxWidth,
      height: maxHeight,
      fit: 'inside',
      withoutEnlargement: true,
      kernel: sharp.kernel.lanczos3,
    })
    .flatten({ background: '#ffffff' })
    .jpeg({ quality })
    .toBuffer({ resolveWithObject: true });

  return { bytes: data, width: info.width, height: info.height };
}

export async function downscaleToBase64(input: Uint8Array, options?: DownscaleOptions): Promise<string> {
  const { bytes } = await downscaleImage(input, options);
  return bytes.toString('base64');
}
