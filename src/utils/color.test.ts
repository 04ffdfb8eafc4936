import { describe, it, expect } from 'vitest';
import { hexToRgb, hslaToRgba, rgbToHex } from './color';

describe('rgbToHex', () => {
  it('converts primaries and black', () => {
    expect(rgbToHex([1, 0, 0])).toBe('#ff0000');
    expect(rgbToHex([0, 0, 0])).toBe('#000000');
  });

  it('rounds each channel to the nearest 8-bit value', () => {
    expect(rgbToHex([0, 0.6, 1])).toBe('#0099ff');
    expect(rgbToHex([0.2, 0.2, 0.2])).toBe('#333333');
  });

  it('clamps channels outside [0, 1]', () => {
    expect(rgbToHex([1.5, -1, 0.5])).toBe('#ff0080');
  });

  it('round-trips through hexToRgb within one step', () => {
    const samples: Array<[number, number, number]> = [
      [0.123, 0.5, 0.987],
      [0.001, 0.999, 0.333],
      [0.75, 0.25, 0.6],
    ];
    for (const rgb of samples) {
      const back = hexToRgb(rgbToHex(rgb));
      expect(back).not.toBeNull();
      back?.forEach((c, i) => {
        expect(Math.abs(c - rgb[i])).toBeLessThanOrEqual(1 / 255);
      });
    }
  });
});

describe('hexToRgb', () => {
  it('expands shorthand', () => {
    expect(hexToRgb('#fff')).toEqual([1, 1, 1]);
  });

  it('accepts a missing hash', () => {
    expect(hexToRgb('ff0000')).toEqual([1, 0, 0]);
  });

  it('rejects anything else', () => {
    expect(hexToRgb('nope')).toBeNull();
    expect(hexToRgb('#12345')).toBeNull();
  });
});

describe('hslaToRgba', () => {
  it('gives pure red for hue 0 at half lightness', () => {
    const [r, g, b, a] = hslaToRgba([0, 1, 0.5, 1]);
    expect(r).toBeCloseTo(1, 3);
    expect(g).toBeCloseTo(0, 3);
    expect(b).toBeCloseTo(0, 3);
    expect(a).toBe(1);
  });

  it('preserves alpha', () => {
    expect(hslaToRgba([0.3, 0.8, 0.4, 0.2])[3]).toBe(0.2);
  });

  it('returns grey when unsaturated', () => {
    expect(hslaToRgba([0.7, 0, 0.25, 1])).toEqual([0.25, 0.25, 0.25, 1]);
  });
});
