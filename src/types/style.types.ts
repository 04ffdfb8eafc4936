/** Normalized color channels, each in [0, 1]. */
export type RGB = readonly [number, number, number];
export type RGBA = readonly [number, number, number, number];
export type HSLA = readonly [number, number, number, number];

export type FontWeight =
  | 'ultralight' | 'light' | 'normal' | 'bold' | 'ultrabold' | 'heavy'
  | number;
export type FontStyle = 'normal' | 'oblique' | 'italic';
export type UnderlineStyle = 'none' | 'single' | 'double' | 'low' | 'error';

/**
 * Attributes applied to the highlighted run only. Anything left undefined is
 * inherited from the base span.
 */
export interface StyleOverrides {
  color?: RGB;
  family?: string;
  /** Pango units (points × 1024) */
  size?: number;
  weight?: FontWeight;
  style?: FontStyle;
  underline?: UnderlineStyle;
  strikethrough?: boolean;
  /** Baseline shift in Pango units */
  rise?: number;
}

export interface BaseStyle {
  family: string;
  sizePt: number;
  color: RGB;
}

export interface HighlightSpec {
  sentence: string;
  phrase: string;
}

export interface Variant {
  suffix: string;
  overrides: StyleOverrides;
  highlightColor: RGB;
}

export type VariantSet = readonly Variant[];

export interface VariantMarkup {
  /** `${baseName}_${suffix}` */
  name: string;
  suffix: string;
  markup: string;
}
