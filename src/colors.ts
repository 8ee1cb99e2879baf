import { InvalidParameterError } from './errors';
import type { DetectedColor, RGB } from './types';

export function rgbToHex(r: number, g: number, b: number): string {
  return '#' + [r, g, b].map((x) => {
    const hex = Math.round(x).toString(16);
    return hex.length === 1 ? '0' + hex : hex;
  }).join('');
}

export function parseColor(text: string): RGB {
  const long = /^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i.exec(text.trim());
  if (long) {
    return {
      r: parseInt(long[1], 16),
      g: parseInt(long[2], 16),
      b: parseInt(long[3], 16),
    };
  }

  // #rgb shorthand expands each digit, e.g. #fa0 -> #ffaa00
  const short = /^#?([a-f\d])([a-f\d])([a-f\d])$/i.exec(text.trim());
  if (short) {
    return {
      r: parseInt(short[1] + short[1], 16),
      g: parseInt(short[2] + short[2], 16),
      b: parseInt(short[3] + short[3], 16),
    };
  }

  throw new InvalidParameterError(`Malformed color "${text}", expected #rrggbb or #rgb`);
}

export function validateRgb(rgb: RGB): RGB {
  for (const channel of [rgb.r, rgb.g, rgb.b]) {
    if (!Number.isInteger(channel) || channel < 0 || channel > 255) {
      throw new InvalidParameterError(
        `Malformed color (${rgb.r}, ${rgb.g}, ${rgb.b}), channels must be integers in [0, 255]`
      );
    }
  }
  return rgb;
}

export function toDetectedColor(rgb: RGB): DetectedColor {
  return { rgb, hex: rgbToHex(rgb.r, rgb.g, rgb.b) };
}

export function formatColor(color: DetectedColor): string {
  const { r, g, b } = color.rgb;
  return `${color.hex.toUpperCase()} (${r}, ${g}, ${b})`;
}
