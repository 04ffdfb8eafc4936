import { logger } from '../../config/logger';
import { rgbToHex } from '../../utils/color';
import { ConfigError, PhraseNotFoundError } from '../../utils/errors';
import { escapeMarkup, unescapeMarkup } from './escape';
import type {
  BaseStyle,
  HighlightSpec,
  RGB,
  StyleOverrides,
  VariantMarkup,
  VariantSet,
} from '../../types/style.types';

// ===========================================================================
// Markup Builder
//
// Produces a Pango document with exactly one highlighted run:
//   <span BASE>prefix<span HIGHLIGHT>phrase</span>suffix</span>
// Layout (wrapping, centering) is left to the rasterizer.
// ===========================================================================

/** Pango size unit: one point is 1024 units. */
export const PANGO_SCALE = 1024;

export interface HighlightStyle {
  /** Default foreground of the highlighted run */
  color: RGB;
  overrides?: StyleOverrides;
}

export interface MarkupRuns {
  prefix: string;
  highlighted: string;
  suffix: string;
}

/** Locate the first, case-sensitive occurrence of the phrase. */
export function locatePhrase({ sentence, phrase }: HighlightSpec): { start: number; end: number } {
  const start = phrase.length > 0 ? sentence.indexOf(phrase) : -1;
  if (start < 0) {
    throw new PhraseNotFoundError(sentence, phrase);
  }
  return { start, end: start + phrase.length };
}

export function splitRuns(spec: HighlightSpec): MarkupRuns {
  const { start, end } = locatePhrase(spec);
  return {
    prefix: spec.sentence.slice(0, start),
    highlighted: spec.phrase,
    suffix: spec.sentence.slice(end),
  };
}

function spanOpen(attrs: ReadonlyArray<readonly [string, string]>): string {
  const rendered = attrs.map(([key, value]) => `${key}='${escapeMarkup(value)}'`).join(' ');
  return `<span ${rendered}>`;
}

export function baseSpanAttributes(base: BaseStyle): Array<[string, string]> {
  return [
    ['font_family', base.family],
    ['size', String(Math.round(base.sizePt * PANGO_SCALE))],
    ['foreground', rgbToHex(base.color)],
  ];
}

/**
 * Highlight attributes: the default foreground merged with the overrides,
 * overrides winning. Emitted in a fixed order.
 */
export function highlightAttributes(style: HighlightStyle): Array<[string, string]> {
  const o = style.overrides ?? {};
  const attrs: Array<[string, string]> = [['foreground', rgbToHex(o.color ?? style.color)]];
  if (o.family !== undefined) attrs.push(['font_family', o.family]);
  if (o.size !== undefined) attrs.push(['size', String(Math.round(o.size))]);
  if (o.weight !== undefined) attrs.push(['weight', String(o.weight)]);
  if (o.style !== undefined) attrs.push(['style', o.style]);
  if (o.underline !== undefined) attrs.push(['underline', o.underline]);
  if (o.strikethrough !== undefined) attrs.push(['strikethrough', o.strikethrough ? 'true' : 'false']);
  if (o.rise !== undefined) attrs.push(['rise', String(Math.round(o.rise))]);
  return attrs;
}

/**
 * Build the markup for one sentence. Throws PhraseNotFoundError when the
 * phrase does not occur; later occurrences of the phrase stay unstyled.
 */
export function buildMarkup(spec: HighlightSpec, base: BaseStyle, highlight: HighlightStyle): string {
  const runs = splitRuns(spec);
  return (
    spanOpen(baseSpanAttributes(base)) +
    escapeMarkup(runs.prefix) +
    spanOpen(highlightAttributes(highlight)) +
    escapeMarkup(runs.highlighted) +
    '</span>' +
    escapeMarkup(runs.suffix) +
    '</span>'
  );
}

/**
 * One document per variant, same sentence and phrase, in variant order.
 * Nothing is produced if the phrase is missing.
 */
export function buildVariantMarkups(
  spec: HighlightSpec,
  base: BaseStyle,
  variants: VariantSet,
  baseName: string
): VariantMarkup[] {
  locatePhrase(spec);

  const seen = new Set<string>();
  for (const variant of variants) {
    if (seen.has(variant.suffix)) {
      throw new ConfigError(`Duplicate variant suffix "${variant.suffix}"`);
    }
    seen.add(variant.suffix);
  }

  const documents = variants.map((variant) => ({
    name: `${baseName}_${variant.suffix}`,
    suffix: variant.suffix,
    markup: buildMarkup(spec, base, { color: variant.highlightColor, overrides: variant.overrides }),
  }));

  logger.debug('Built variant markups', { baseName, count: documents.length });
  return documents;
}

/** Width the rasterizer wraps text to, in pixels. */
export function wrapWidth(canvasWidth: number, wrapRatio: number): number {
  return Math.floor(canvasWidth * wrapRatio);
}

const DOCUMENT_PATTERN = /^<span [^>]*>([^<]*)<span [^>]*>([^<]*)<\/span>([^<]*)<\/span>$/;

/** Split a document produced by buildMarkup back into its unescaped runs. */
export function parseMarkupRuns(markup: string): MarkupRuns | null {
  const match = DOCUMENT_PATTERN.exec(markup);
  if (!match) return null;
  const [, prefix = '', highlighted = '', suffix = ''] = match;
  return {
    prefix: unescapeMarkup(prefix),
    highlighted: unescapeMarkup(highlighted),
    suffix: unescapeMarkup(suffix),
  };
}
