import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { logger } from './logger';
import { hexToRgb } from '../utils/color';
import { ConfigError } from '../utils/errors';
import { defaultVariants } from '../services/markup/variants';
import type { RGB, StyleOverrides, Variant, VariantSet } from '../types/style.types';

export const DEFAULT_CONFIG_PATH = 'config_video.yml';

// ===========================================================================
// Schema for config_video.yml
// ===========================================================================

const ColorSchema = z
  .union([z.tuple([z.number(), z.number(), z.number()]), z.string()])
  .transform((value, ctx): RGB => {
    if (typeof value !== 'string') {
      if (value.some(c => c < 0 || c > 1)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'color channels must be within [0, 1]' });
        return z.NEVER;
      }
      return [value[0], value[1], value[2]];
    }
    const rgb = hexToRgb(value);
    if (!rgb) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid hex color "${value}"` });
      return z.NEVER;
    }
    return rgb;
  });

/** Pango attribute names accepted under `variants.<suffix>.extra_attrs`. */
const ExtraAttrsSchema = z
  .object({
    foreground: ColorSchema.optional(),
    font_family: z.string().min(1).optional(),
    size: z.coerce.number().int().positive().optional(),
    weight: z.union([
      z.enum(['ultralight', 'light', 'normal', 'bold', 'ultrabold', 'heavy']),
      z.number().int().min(100).max(1000),
    ]).optional(),
    style: z.enum(['normal', 'oblique', 'italic']).optional(),
    underline: z.enum(['none', 'single', 'double', 'low', 'error']).optional(),
    strikethrough: z
      .union([z.boolean(), z.enum(['true', 'false'])])
      .transform(v => v === true || v === 'true')
      .optional(),
    rise: z.coerce.number().int().optional(),
  })
  .strict();

const VariantEntrySchema = z.object({
  extra_attrs: ExtraAttrsSchema.optional(),
  highlight_color: ColorSchema.optional(),
});

export const RenderConfigSchema = z.object({
  canvas_width: z.number().int().positive().default(1920),
  canvas_height: z.number().int().positive().default(1080),
  wrap_ratio: z.number().gt(0).max(1).default(0.92),
  background_color: ColorSchema.default([0.2, 0.2, 0.2]),
  text_color: ColorSchema.default([1.0, 1.0, 1.0]),
  default_highlight_color: ColorSchema.default([0.0, 0.6, 1.0]),
  base_font_family: z.string().min(1).default('Arial'),
  base_font_size_pt: z.number().positive().default(100),
  png_path: z.string().min(1).default('output/demo_color.png'),
  output_video: z.string().min(1).default('output/video.mp4'),
  total_duration: z.number().positive().default(10),
  fade_in_duration: z.number().min(0).default(1.5),
  fade_out_duration: z.number().min(0).default(1.5),
  easing_in: z.string().default('linear'),
  easing_out: z.string().default('linear'),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  fps: z.number().positive().default(30),
  codec: z.string().min(1).default('libx265'),
  hw_accel: z.boolean().default(false),
  variants: z.record(z.string().min(1), VariantEntrySchema).optional(),
  sentence: z.string().optional(),
  highlight: z.string().optional(),
});

export type RawRenderConfig = z.input<typeof RenderConfigSchema>;

/** Fully resolved, immutable configuration shared by the builder and the synthesizer. */
export interface RenderConfig {
  readonly canvasWidth: number;
  readonly canvasHeight: number;
  readonly wrapRatio: number;
  readonly backgroundColor: RGB;
  readonly textColor: RGB;
  readonly defaultHighlightColor: RGB;
  readonly baseFontFamily: string;
  readonly baseFontSizePt: number;
  readonly pngPath: string;
  readonly outputVideo: string;
  readonly totalDuration: number;
  readonly fadeInDuration: number;
  readonly fadeOutDuration: number;
  readonly easingIn: string;
  readonly easingOut: string;
  /** Encoded frame width; falls back to the canvas width */
  readonly width: number;
  readonly height: number;
  readonly fps: number;
  readonly codec: string;
  readonly hwAccel: boolean;
  readonly variants: VariantSet;
  readonly sentence?: string;
  readonly highlight?: string;
}

type ExtraAttrs = z.output<typeof ExtraAttrsSchema>;

function toOverrides(attrs: ExtraAttrs): StyleOverrides {
  const overrides: StyleOverrides = {};
  if (attrs.foreground !== undefined) overrides.color = attrs.foreground;
  if (attrs.font_family !== undefined) overrides.family = attrs.font_family;
  if (attrs.size !== undefined) overrides.size = attrs.size;
  if (attrs.weight !== undefined) overrides.weight = attrs.weight;
  if (attrs.style !== undefined) overrides.style = attrs.style;
  if (attrs.underline !== undefined) overrides.underline = attrs.underline;
  if (attrs.strikethrough !== undefined) overrides.strikethrough = attrs.strikethrough;
  if (attrs.rise !== undefined) overrides.rise = attrs.rise;
  return overrides;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate a parsed YAML document and resolve it into a RenderConfig.
 * Unknown top-level keys are dropped; unknown variant attributes are errors.
 */
export function parseRenderConfig(raw: unknown): RenderConfig {
  const result = RenderConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError('Invalid render configuration', issues);
  }
  const cfg = result.data;

  const variants: Variant[] = cfg.variants
    ? Object.entries(cfg.variants).map(([suffix, entry]) => ({
        suffix,
        overrides: toOverrides(entry.extra_attrs ?? {}),
        highlightColor: entry.highlight_color ?? cfg.default_highlight_color,
      }))
    : [...defaultVariants(cfg.base_font_size_pt, cfg.default_highlight_color)];

  return deepFreeze<RenderConfig>({
    canvasWidth: cfg.canvas_width,
    canvasHeight: cfg.canvas_height,
    wrapRatio: cfg.wrap_ratio,
    backgroundColor: cfg.background_color,
    textColor: cfg.text_color,
    defaultHighlightColor: cfg.default_highlight_color,
    baseFontFamily: cfg.base_font_family,
    baseFontSizePt: cfg.base_font_size_pt,
    pngPath: cfg.png_path,
    outputVideo: cfg.output_video,
    totalDuration: cfg.total_duration,
    fadeInDuration: cfg.fade_in_duration,
    fadeOutDuration: cfg.fade_out_duration,
    easingIn: cfg.easing_in,
    easingOut: cfg.easing_out,
    width: cfg.width ?? cfg.canvas_width,
    height: cfg.height ?? cfg.canvas_height,
    fps: cfg.fps,
    codec: cfg.codec,
    hwAccel: cfg.hw_accel,
    variants,
    sentence: cfg.sentence,
    highlight: cfg.highlight,
  });
}

/** Read and validate a YAML configuration file. */
export function loadRenderConfig(configPath: string = DEFAULT_CONFIG_PATH): RenderConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Config file ${resolved} not found`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(resolved, 'utf-8'));
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse ${resolved}`, [msg]);
  }
  return parseRenderConfig(raw);
}

/**
 * Configuration for a CLI run. An explicit `--config` path must exist; without
 * one, a missing default file means built-in defaults.
 */
export function loadCliRenderConfig(
  explicitPath: string | undefined,
  defaultPath: string = DEFAULT_CONFIG_PATH
): RenderConfig {
  if (explicitPath !== undefined) {
    return loadRenderConfig(explicitPath);
  }
  if (!fs.existsSync(path.resolve(defaultPath))) {
    logger.debug('No config file, using defaults', { defaultPath });
    return parseRenderConfig({});
  }
  return loadRenderConfig(defaultPath);
}
