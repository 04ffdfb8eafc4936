import type { RGB, Variant, VariantSet } from '../../types/style.types';

export const DEFAULT_VARIANT_COLOR: RGB = [0.0, 0.6, 1.0];

/**
 * One variant per Pango span attribute, each styling the phrase differently
 * from the rest of the sentence.
 */
export function defaultVariants(baseSizePt: number, highlightColor: RGB): VariantSet {
  const v = (suffix: string, overrides: Variant['overrides'], color: RGB = highlightColor): Variant => ({
    suffix,
    overrides,
    highlightColor: color,
  });

  return [
    v('color', {}, DEFAULT_VARIANT_COLOR),
    v('size', { size: Math.round(baseSizePt * 1.4 * 1024) }),
    v('family', { family: 'Courier New' }),
    v('weight', { weight: 'bold' }),
    v('style', { style: 'italic' }),
    v('underline', { underline: 'single' }),
    v('strike', { strikethrough: true }),
    v('rise', { rise: 10000 }), // ≈ 10px
  ];
}
