/**
 * Chroma-key transparency: turns a background color into alpha
 */

import { toDetectedColor, validateRgb } from '../colors';
import type { DetectedColor, Raster, RGB, TransparencyMode } from '../types';

export interface ExtractOptions {
  color: RGB;
  mode: TransparencyMode;
  autoDetect: boolean;
}

export interface ExtractResult {
  raster: Raster;
  targetColor: RGB;
  /** Set when the target color was read from the image */
  detectedColor?: DetectedColor;
}

/**
 * Color of the top-left pixel. Assumes a uniform background that touches the corner.
 */
export function detectBackgroundColor(raster: Raster): RGB {
  const { data } = raster;
  return { r: data[0], g: data[1], b: data[2] };
}

/**
 * Replace the target color with transparency.
 *
 * 'exact' produces binary alpha: 0 where the pixel matches the target exactly or was
 * already fully transparent, 255 everywhere else.
 * 'similarity' sets alpha to the largest per-channel distance from the target, so
 * near colors fade instead of being cut.
 *
 * The input raster is left untouched.
 */
export function extractTransparency(raster: Raster, options: ExtractOptions): ExtractResult {
  const detectedColor = options.autoDetect
    ? toDetectedColor(detectBackgroundColor(raster))
    : undefined;
  const target = detectedColor ? detectedColor.rgb : validateRgb(options.color);

  const { width, height, data } = raster;
  const out = new Uint8ClampedArray(data);
  const pixelCount = width * height;

  for (let i = 0; i < pixelCount; i++) {
    const idx = i * 4;
    const r = data[idx];
    const g = data[idx + 1];
    const b = data[idx + 2];

    if (options.mode === 'exact') {
      const matches = r === target.r && g === target.g && b === target.b;
      out[idx + 3] = matches || data[idx + 3] === 0 ? 0 : 255;
    } else {
      out[idx + 3] = Math.max(
        Math.abs(r - target.r),
        Math.abs(g - target.g),
        Math.abs(b - target.b)
      );
    }
  }

  return {
    raster: { width, height, data: out },
    targetColor: target,
    detectedColor,
  };
}
