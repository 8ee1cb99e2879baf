import * as os from 'os';
import * as path from 'path';
import { decodeImage, encodePng, isRemoteSource, loadImageBytes } from '../image-codec';
import { DecodeError, FetchError } from '../errors';
import type { Raster } from '../types';

describe('image codec', () => {
  test('PNG round trip keeps every channel', async () => {
    const raster: Raster = {
      width: 3,
      height: 1,
      data: new Uint8ClampedArray([0, 0, 0, 0, 10, 20, 30, 128, 255, 255, 255, 255]),
    };

    const decoded = await decodeImage(await encodePng(raster));

    expect(decoded.width).toBe(3);
    expect(decoded.height).toBe(1);
    expect(Array.from(decoded.data)).toEqual(Array.from(raster.data));
  });

  test('encoded output is a PNG', async () => {
    const png = await encodePng({ width: 1, height: 1, data: new Uint8ClampedArray([1, 2, 3, 4]) });

    expect(Array.from(png.subarray(0, 8))).toEqual([137, 80, 78, 71, 13, 10, 26, 10]);
  });

  test('garbage bytes raise DecodeError', async () => {
    await expect(decodeImage(new Uint8Array([0, 1, 2, 3, 4, 5]))).rejects.toBeInstanceOf(DecodeError);
  });

  test('missing file raises FetchError', async () => {
    const missing = path.join(os.tmpdir(), 'squarify-missing-file.png');

    await expect(loadImageBytes(missing)).rejects.toBeInstanceOf(FetchError);
  });

  test('recognizes remote sources', () => {
    expect(isRemoteSource('https://example.com/a.png')).toBe(true);
    expect(isRemoteSource('HTTP://example.com/a.png')).toBe(true);
    expect(isRemoteSource('./images/a.png')).toBe(false);
  });
});
