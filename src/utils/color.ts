/**
 * Color utility functions
 */
import type { HSLA, RGB, RGBA } from '../types/style.types';

function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Convert normalized RGB floats to a `#rrggbb` string. Each channel is clamped
 * to [0, 1] and rounded to the nearest 8-bit value.
 */
export function rgbToHex(rgb: RGB): string {
  return '#' + rgb
    .map(c => Math.round(clampUnit(c) * 255).toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Parse `#rgb` or `#rrggbb` (with or without the hash) into normalized floats.
 * Returns null for anything else.
 */
export function hexToRgb(hex: string): RGB | null {
  let cleaned = hex.trim().replace(/^#/, '');
  if (/^[0-9a-fA-F]{3}$/.test(cleaned)) {
    cleaned = cleaned.split('').map(c => c + c).join('');
  }
  if (!/^[0-9a-fA-F]{6}$/.test(cleaned)) return null;
  return [
    parseInt(cleaned.slice(0, 2), 16) / 255,
    parseInt(cleaned.slice(2, 4), 16) / 255,
    parseInt(cleaned.slice(4, 6), 16) / 255,
  ];
}

function hueToChannel(p: number, q: number, t: number): number {
  let h = t;
  if (h < 0) h += 1;
  if (h > 1) h -= 1;
  if (h < 1 / 6) return p + (q - p) * 6 * h;
  if (h < 1 / 2) return q;
  if (h < 2 / 3) return p + (q - p) * (2 / 3 - h) * 6;
  return p;
}

/** HSLA (all channels in [0, 1]) to RGBA. Alpha passes through untouched. */
export function hslaToRgba([h, s, l, a]: HSLA): RGBA {
  if (s === 0) {
    return [l, l, l, a];
  }
  const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
  const p = 2 * l - q;
  return [
    hueToChannel(p, q, h + 1 / 3),
    hueToChannel(p, q, h),
    hueToChannel(p, q, h - 1 / 3),
    a,
  ];
}
