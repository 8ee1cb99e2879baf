export { runPipeline, squarifyFile } from './processor';
export { extractTransparency, detectBackgroundColor } from './lib/transparency';
export type { ExtractOptions, ExtractResult } from './lib/transparency';
export { squarify, clampOutputSize, validateOutputSize } from './lib/squarify';
export { decodeImage, encodePng, loadImageBytes } from './image-codec';
export { parseColor, rgbToHex, formatColor } from './colors';
export {
  generateDefaultConfig,
  parseConfig,
  readConfig,
  writeConfig,
  toPipelineOptions,
} from './config';
export type { Config, TransparencyConfig } from './config';
export {
  SquarifyError,
  DecodeError,
  InvalidParameterError,
  EncodeError,
  FetchError,
  describeError,
} from './errors';
export type { SquarifyErrorCode } from './errors';
export type {
  Raster,
  RGB,
  TransparencyMode,
  TransparencyOptions,
  DetectedColor,
  SquarifyResult,
  PipelineOptions,
  PipelineResult,
} from './types';
