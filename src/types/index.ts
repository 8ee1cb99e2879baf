export type TransparencyMode = 'exact' | 'similarity';

export interface RGB {
  r: number;
  g: number;
  b: number;
}

/** RGBA pixels, row-major, four bytes per pixel */
export interface Raster {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

export interface TransparencyOptions {
  enabled: boolean;
  autoDetect: boolean;
  mode: TransparencyMode;
  color: RGB;
}

export interface DetectedColor {
  rgb: RGB;
  hex: string;
}

export interface SquarifyResult {
  raster: Raster;
  naturalMaxSize: number;
  usedSize: number;
  offset: { x: number; y: number };
}

export interface PipelineOptions {
  size: number;
  transparency: TransparencyOptions;
}

export interface PipelineResult {
  raster: Raster;
  inputWidth: number;
  inputHeight: number;
  naturalMaxSize: number;
  usedOutputSize: number;
  detectedColor?: DetectedColor;
  png: Uint8Array;
}
