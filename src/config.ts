import * as fs from 'fs';
import * as path from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { parseColor } from './colors';
import { InvalidParameterError } from './errors';
import { isRemoteSource } from './image-codec';
import type { PipelineOptions, TransparencyMode } from './types';

export interface TransparencyConfig {
  enabled: boolean;
  autoDetect: boolean;
  mode: TransparencyMode;
  color: string; // hex, e.g. "#ffffff"
}

export interface Config {
  size: number;
  transparency: TransparencyConfig;
}

export const DEFAULT_OUTPUT_SIZE = 500;
export const DEFAULT_BACKGROUND_COLOR = '#ffffff';

export function generateDefaultConfig(): Config {
  return {
    size: DEFAULT_OUTPUT_SIZE,
    transparency: {
      enabled: false,
      autoDetect: false,
      mode: 'similarity',
      color: DEFAULT_BACKGROUND_COLOR,
    },
  };
}

export function writeConfig(filepath: string, config: Config): void {
  const jsonContent = JSON.stringify(config, null, 2);

  const commentBlock = `// Squarify options:
//
// "size": desired output size in pixels. Values above the longest
//   image edge are clamped to it.
//
// "transparency.enabled": replace the background color with transparency
// "transparency.autoDetect": use the top-left pixel as the background color
//   (ignores "color")
// "transparency.mode":
//   "exact"      only pixels equal to the color become transparent
//   "similarity" similar colors fade out with their distance to the color
// "transparency.color": background color as "#rrggbb"
//
`;

  fs.writeFileSync(filepath, commentBlock + jsonContent + '\n', 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new InvalidParameterError(`Invalid config: "transparency.${key}" must be true or false`);
  }
  return value;
}

export function parseConfig(content: string): Config {
  const errors: ParseError[] = [];
  const raw: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new InvalidParameterError(
      `Invalid config: ${printParseErrorCode(first.error)} at offset ${first.offset}`
    );
  }
  if (!isRecord(raw)) {
    throw new InvalidParameterError('Invalid config: expected an object');
  }

  const config = generateDefaultConfig();

  const size = raw.size;
  if (size !== undefined) {
    if (typeof size !== 'number' || !Number.isInteger(size) || size < 1) {
      throw new InvalidParameterError('Invalid config: "size" must be a positive integer');
    }
    config.size = size;
  }

  if (raw.transparency !== undefined) {
    if (!isRecord(raw.transparency)) {
      throw new InvalidParameterError('Invalid config: "transparency" must be an object');
    }
    const t = raw.transparency;
    config.transparency.enabled = readBoolean(t, 'enabled', config.transparency.enabled);
    config.transparency.autoDetect = readBoolean(t, 'autoDetect', config.transparency.autoDetect);

    const mode = t.mode;
    if (mode !== undefined) {
      if (mode !== 'exact' && mode !== 'similarity') {
        throw new InvalidParameterError(
          'Invalid config: "transparency.mode" must be "exact" or "similarity"'
        );
      }
      config.transparency.mode = mode;
    }

    const color = t.color;
    if (color !== undefined) {
      if (typeof color !== 'string') {
        throw new InvalidParameterError('Invalid config: "transparency.color" must be a string');
      }
      parseColor(color);
      config.transparency.color = color;
    }
  }

  return config;
}

export function readConfig(filepath: string): Config {
  return parseConfig(fs.readFileSync(filepath, 'utf-8'));
}

export function toPipelineOptions(config: Config): PipelineOptions {
  return {
    size: config.size,
    transparency: {
      enabled: config.transparency.enabled,
      autoDetect: config.transparency.autoDetect,
      mode: config.transparency.mode,
      color: parseColor(config.transparency.color),
    },
  };
}

export function configExists(filepath: string): boolean {
  return fs.existsSync(filepath);
}

function urlPathname(source: string): string {
  try {
    return new URL(source).pathname;
  } catch {
    throw new InvalidParameterError(`Malformed image URL "${source}"`);
  }
}

/**
 * Base name used for the config and output files of a source path or URL.
 */
export function sourceBasename(source: string): string {
  const pathname = isRemoteSource(source) ? urlPathname(source) : source;
  const basename = path.basename(pathname, path.extname(pathname));
  return basename.length > 0 ? basename : 'square_image';
}

export function getConfigPath(source: string, dir: string): string {
  return path.join(dir, `${sourceBasename(source)}.jsonc`);
}

export function getOutputPath(source: string, dir: string): string {
  return path.join(dir, `${sourceBasename(source)}.square.png`);
}
