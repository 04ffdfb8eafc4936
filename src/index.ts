export { loadRenderConfig, parseRenderConfig, RenderConfigSchema } from './config/render-config';
export type { RenderConfig, RawRenderConfig } from './config/render-config';
export {
  buildMarkup,
  buildVariantMarkups,
  locatePhrase,
  parseMarkupRuns,
  wrapWidth,
  PANGO_SCALE,
} from './services/markup/markup-builder.service';
export type { HighlightStyle, MarkupRuns } from './services/markup/markup-builder.service';
export { escapeMarkup, unescapeMarkup } from './services/markup/escape';
export { defaultVariants } from './services/markup/variants';
export { buildMagickArgs, MagickService } from './services/image/magick.service';
export {
  synthesize,
  computeTiming,
  buildFilterGraph,
  buildFfmpegArgs,
  resolveCodec,
} from './services/video/render-command.service';
export type { FfmpegInvocation, TimingPlan, SynthesizeOptions } from './services/video/render-command.service';
export { normalizeEasing, EASING_TO_CURVE } from './services/video/easing';
export { resolveSourceAsset, discoverLatestAsset } from './services/video/asset-discovery';
export { FFmpegService, probeDuration } from './services/video/ffmpeg.service';
export { rgbToHex, hexToRgb, hslaToRgba } from './utils/color';
export * from './utils/errors';
export type * from './types/style.types';
