import { formatColor, parseColor, rgbToHex, toDetectedColor, validateRgb } from '../colors';
import { DecodeError, describeError, InvalidParameterError } from '../errors';

describe('colors', () => {
  test('rgbToHex pads and lowercases', () => {
    expect(rgbToHex(10, 20, 30)).toBe('#0a141e');
    expect(rgbToHex(255, 255, 255)).toBe('#ffffff');
  });

  test('parseColor accepts long and short hex', () => {
    expect(parseColor('#0A141E')).toEqual({ r: 10, g: 20, b: 30 });
    expect(parseColor('ffffff')).toEqual({ r: 255, g: 255, b: 255 });
    expect(parseColor('#fa0')).toEqual({ r: 255, g: 170, b: 0 });
  });

  test.each(['', '#12', '#12345g', 'white', '#1234567'])('parseColor rejects "%s"', (text) => {
    expect(() => parseColor(text)).toThrow(InvalidParameterError);
  });

  test('validateRgb rejects fractional and out-of-range channels', () => {
    expect(validateRgb({ r: 0, g: 128, b: 255 })).toEqual({ r: 0, g: 128, b: 255 });
    expect(() => validateRgb({ r: 0.5, g: 0, b: 0 })).toThrow(InvalidParameterError);
    expect(() => validateRgb({ r: 0, g: 256, b: 0 })).toThrow(InvalidParameterError);
  });

  test('formatColor shows uppercase hex with the triple', () => {
    expect(formatColor(toDetectedColor({ r: 10, g: 20, b: 30 }))).toBe('#0A141E (10, 20, 30)');
  });
});

describe('describeError', () => {
  test('prefixes the error category', () => {
    expect(describeError(new DecodeError('bad header'))).toBe('Could not decode image: bad header');
    expect(describeError(new InvalidParameterError('size'))).toBe('Invalid parameter: size');
  });

  test('falls back to the plain message', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('text')).toBe('text');
  });
});
