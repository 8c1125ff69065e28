import sharp from 'sharp';

export const IMAGE_CHANNELS = 3;

/**
 * Decodes an uploaded image into a square RGB tensor layout (`size * size * 3`,
 * row-major) scaled to [-1, 1], the input range MobileNet-style extractors expect.
 */
export async function decodeImage(image: Buffer, size: number): Promise<Float32Array> {
  const { data, info } = await sharp(image)
    .removeAlpha()
    .toColourspace('srgb')
    .resize(size, size, { fit: 'fill', kernel: sharp.kernel.nearest })
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== IMAGE_CHANNELS) {
    throw new Error(`Expected ${IMAGE_CHANNELS} colour channels, got ${info.channels}`);
  }

  const pixels = new Float32Array(data.length);
  for (let i = 0; i < data.length; i++) {
    pixels[i] = data[i] / 127.5 - 1;
  }
  return pixels;
}

export type ImageDecoder = typeof decodeImage;
