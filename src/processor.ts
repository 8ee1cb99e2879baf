import * as fs from 'fs';
import { formatColor, validateRgb } from './colors';
import { readConfig, toPipelineOptions } from './config';
import { decodeImage, encodePng, loadImageBytes } from './image-codec';
import { squarify, validateOutputSize } from './lib/squarify';
import { extractTransparency } from './lib/transparency';
import type { DetectedColor, PipelineOptions, PipelineResult, Raster } from './types';

/**
 * Decode, optionally key out the background, squarify and encode as PNG.
 * Rejects with a SquarifyError; nothing is returned on failure.
 */
export async function runPipeline(
  imageBytes: Uint8Array,
  options: PipelineOptions
): Promise<PipelineResult> {
  const { size, transparency } = options;

  // Parameters are checked before any decoding
  validateOutputSize(size);
  if (transparency.enabled && !transparency.autoDetect) {
    validateRgb(transparency.color);
  }

  const input = await decodeImage(imageBytes);

  let raster: Raster = input;
  let detectedColor: DetectedColor | undefined;
  if (transparency.enabled) {
    const extracted = extractTransparency(input, transparency);
    raster = extracted.raster;
    detectedColor = extracted.detectedColor;
  }

  const squared = squarify(raster, size);
  const png = await encodePng(squared.raster);

  return {
    raster: squared.raster,
    inputWidth: input.width,
    inputHeight: input.height,
    naturalMaxSize: squared.naturalMaxSize,
    usedOutputSize: squared.usedSize,
    detectedColor,
    png,
  };
}

export async function squarifyFile(
  source: string,
  configFilepath: string,
  outputFilepath: string
): Promise<PipelineResult> {
  const options = toPipelineOptions(readConfig(configFilepath));

  console.log(`Loading ${source}...`);
  const bytes = await loadImageBytes(source);

  console.log('Processing image...');
  const result = await runPipeline(bytes, options);

  console.log(`Input resolution: ${result.inputWidth}x${result.inputHeight}`);
  console.log(`Max image size: ${result.naturalMaxSize}px`);
  if (result.detectedColor) {
    console.log(`Detected background color: ${formatColor(result.detectedColor)}`);
  }
  if (result.usedOutputSize < options.size) {
    console.warn(
      `Warning: requested size ${options.size}px exceeds max image size, using ${result.usedOutputSize}px`
    );
  }
  console.log(`Output resolution: ${result.usedOutputSize}x${result.usedOutputSize}`);

  await fs.promises.writeFile(outputFilepath, result.png);
  console.log(`Generated ${outputFilepath}`);

  return result;
}
