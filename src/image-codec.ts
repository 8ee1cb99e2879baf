import * as fs from 'fs';
import { Jimp, JimpMime } from 'jimp';
import { DecodeError, EncodeError, FetchError } from './errors';
import type { Raster } from './types';

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Shares the pixel memory with the raster
function rasterToJimp(raster: Raster) {
  const { data } = raster;
  return Jimp.fromBitmap({
    width: raster.width,
    height: raster.height,
    data: Buffer.from(data.buffer, data.byteOffset, data.byteLength),
  });
}

/**
 * Resample to width x height with jimp's default resizer, which averages source
 * pixels when shrinking and weights color by alpha. The input raster is not modified.
 */
export function resizeRaster(raster: Raster, width: number, height: number): Raster {
  const image = rasterToJimp(raster);
  image.resize({ w: width, h: height });

  return {
    width: image.bitmap.width,
    height: image.bitmap.height,
    data: new Uint8ClampedArray(image.bitmap.data),
  };
}

export function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Read image bytes from a local path or an http(s) URL.
 */
export async function loadImageBytes(source: string): Promise<Uint8Array> {
  if (isRemoteSource(source)) {
    let response: Response;
    try {
      response = await fetch(source);
    } catch (error) {
      throw new FetchError(`Request to ${source} failed: ${errorMessage(error)}`, { cause: error });
    }
    if (!response.ok) {
      throw new FetchError(`Request to ${source} returned HTTP ${response.status}`);
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  try {
    return await fs.promises.readFile(source);
  } catch (error) {
    throw new FetchError(`Cannot read ${source}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Decode PNG, JPEG, BMP, GIF (first frame) or TIFF bytes into an RGBA raster.
 *
 * jimp applies the EXIF orientation of JPEG input, so a rotated photo comes back
 * with its dimensions swapped and a different top-left pixel than the stored
 * pixel order would give.
 */
export async function decodeImage(bytes: Uint8Array): Promise<Raster> {
  const image = await Jimp.fromBuffer(toBuffer(bytes)).catch((error: unknown) => {
    throw new DecodeError(errorMessage(error), { cause: error });
  });

  const { width, height, data } = image.bitmap;
  if (width < 1 || height < 1) {
    throw new DecodeError(`Decoded image has no pixels (${width}x${height})`);
  }

  return { width, height, data: new Uint8ClampedArray(data) };
}

export async function encodePng(raster: Raster): Promise<Uint8Array> {
  try {
    return await rasterToJimp(raster).getBuffer(JimpMime.png);
  } catch (error) {
    throw new EncodeError(errorMessage(error), { cause: error });
  }
}
