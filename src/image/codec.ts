import type { Canvas, Image } from '@napi-rs/canvas';
import type { RasterImage } from '../types/types.js';
import { Buffer } from 'node:buffer';
import { createCanvas, loadImage } from '@napi-rs/canvas';
import { DecodeError } from '../api/errors.js';
import { createRaster } from './compositor.js';

const CHART_BACKDROP = '#ffffff';

export interface Size {
  width: number;
  height: number;
}

/**
 * Decodes PNG/JPEG/GIF/WebP bytes into an RGB raster. Transparency is
 * flattened onto white, the page colour the charts are drawn for.
 */
export async function decodeImage(bytes: Uint8Array, source?: string): Promise<RasterImage> {
  const label = source ?? 'image data';
  let image: Image;
  try {
    image = await loadImage(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  }
  catch (error) {
    throw new DecodeError(`Could not decode ${label}: ${error instanceof Error ? error.message : String(error)}`, source);
  }

  if (image.width <= 0 || image.height <= 0) {
    throw new DecodeError(`Could not decode ${label}: the image is empty`, source);
  }

  const canvas = createCanvas(image.width, image.height);
  const context = canvas.getContext('2d');
  context.fillStyle = CHART_BACKDROP;
  context.fillRect(0, 0, image.width, image.height);
  context.drawImage(image, 0, 0);
  const rgba = context.getImageData(0, 0, image.width, image.height).data;

  const raster = createRaster(image.width, image.height);
  for (let src = 0, dst = 0; src < rgba.length; src += 4, dst += 3) {
    raster.data[dst] = rgba[src] ?? 0;
    raster.data[dst + 1] = rgba[src + 1] ?? 0;
    raster.data[dst + 2] = rgba[src + 2] ?? 0;
  }
  return raster;
}

function toCanvas(image: RasterImage): Canvas {
  const canvas = createCanvas(image.width, image.height);
  const context = canvas.getContext('2d');
  const imageData = context.createImageData(image.width, image.height);
  for (let src = 0, dst = 0; src < image.data.length; src += 3, dst += 4) {
    imageData.data[dst] = image.data[src] ?? 0;
    imageData.data[dst + 1] = image.data[src + 1] ?? 0;
    imageData.data[dst + 2] = image.data[src + 2] ?? 0;
    imageData.data[dst + 3] = 255;
  }
  context.putImageData(imageData, 0, 0);
  return canvas;
}

/**
 * Encodes a raster as PNG, rescaled to `size` when one is given.
 */
export async function encodePng(image: RasterImage, size?: Size): Promise<Buffer> {
  if (image.width === 0 || image.height === 0) {
    throw new RangeError('Cannot encode an empty raster');
  }

  const native = toCanvas(image);
  if (!size || (size.width === image.width && size.height === image.height)) {
    return await native.encode('png');
  }

  const scaled = createCanvas(size.width, size.height);
  scaled.getContext('2d').drawImage(native, 0, 0, size.width, size.height);
  return await scaled.encode('png');
}
