import { InvalidParameterError } from '../errors';
import { resizeRaster } from '../image-codec';
import type { Raster, SquarifyResult } from '../types';

export function validateOutputSize(desiredSize: number): number {
  if (!Number.isInteger(desiredSize) || desiredSize < 1) {
    throw new InvalidParameterError(`Output size must be a positive integer, got ${desiredSize}`);
  }
  return desiredSize;
}

export function clampOutputSize(
  desiredSize: number,
  width: number,
  height: number
): { naturalMaxSize: number; usedSize: number } {
  validateOutputSize(desiredSize);
  const naturalMaxSize = Math.max(width, height);
  return { naturalMaxSize, usedSize: Math.min(desiredSize, naturalMaxSize) };
}

/**
 * Copy `src` onto `dst` at (x, y). Pixels are overwritten, alpha included.
 */
function paste(dst: Raster, src: Raster, x: number, y: number): void {
  const rowBytes = src.width * 4;
  for (let row = 0; row < src.height; row++) {
    const srcStart = row * rowBytes;
    const dstStart = ((y + row) * dst.width + x) * 4;
    dst.data.set(src.data.subarray(srcStart, srcStart + rowBytes), dstStart);
  }
}

/**
 * Pad a raster into a transparent square canvas with the content centered, then
 * scale the canvas down to the requested size. The requested size is clamped to
 * the canvas side; both sizes are returned so callers can display them.
 */
export function squarify(raster: Raster, desiredSize: number): SquarifyResult {
  const { naturalMaxSize, usedSize } = clampOutputSize(desiredSize, raster.width, raster.height);

  const offset = {
    x: Math.floor((naturalMaxSize - raster.width) / 2),
    y: Math.floor((naturalMaxSize - raster.height) / 2),
  };

  const canvas: Raster = {
    width: naturalMaxSize,
    height: naturalMaxSize,
    data: new Uint8ClampedArray(naturalMaxSize * naturalMaxSize * 4),
  };
  paste(canvas, raster, offset.x, offset.y);

  return {
    raster: usedSize === naturalMaxSize ? canvas : resizeRaster(canvas, usedSize, usedSize),
    naturalMaxSize,
    usedSize,
    offset,
  };
}
