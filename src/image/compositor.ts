import type { RasterImage, Rgb } from '../types/types.js';

const CHANNELS = 3;

/**
 * Allocates a raster filled with black.
 */
export function createRaster(width: number, height: number): RasterImage {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new RangeError(`Invalid raster size ${width}x${height}`);
  }
  return { width, height, data: new Uint8Array(width * height * CHANNELS) };
}

function offsetOf(image: RasterImage, x: number, y: number): number {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) {
    throw new RangeError(`Pixel (${x}, ${y}) is outside a ${image.width}x${image.height} raster`);
  }
  return (y * image.width + x) * CHANNELS;
}

export function getPixel(image: RasterImage, x: number, y: number): Rgb {
  const offset = offsetOf(image, x, y);
  return [image.data[offset] ?? 0, image.data[offset + 1] ?? 0, image.data[offset + 2] ?? 0];
}

export function setPixel(image: RasterImage, x: number, y: number, [r, g, b]: Rgb): void {
  const offset = offsetOf(image, x, y);
  image.data[offset] = r;
  image.data[offset + 1] = g;
  image.data[offset + 2] = b;
}

function paste(target: RasterImage, source: RasterImage, left: number): void {
  const rowBytes = source.width * CHANNELS;
  for (let y = 0; y < source.height; y++) {
    const from = y * rowBytes;
    target.data.set(source.data.subarray(from, from + rowBytes), (y * target.width + left) * CHANNELS);
  }
}

/**
 * Places `b` to the right of `a`. The result is as tall as the taller input;
 * the area under the shorter one stays black.
 */
export function concatenateHorizontally(a: RasterImage, b: RasterImage): RasterImage {
  const combined = createRaster(a.width + b.width, Math.max(a.height, b.height));
  paste(combined, a, 0);
  paste(combined, b, a.width);
  return combined;
}
