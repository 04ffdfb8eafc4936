import path from 'path';
import { logger } from '../../config/logger';
import { getOutputRoot, getToolPaths } from '../../config/env';
import type { RenderConfig } from '../../config/render-config';
import { resolveSourceAsset, DEFAULT_EXPECTED_NAME } from './asset-discovery';
import { normalizeEasing, type FadeCurve } from './easing';

// ===========================================================================
// Render Invocation Synthesizer
//
// RenderConfig → ordered ffmpeg arguments for a looped still that fades in,
// holds, and fades out on its alpha channel.
// ===========================================================================

export const SOFTWARE_HEVC = 'libx265';
export const HARDWARE_HEVC = 'hevc_videotoolbox';
/** Alpha-capable pixel format; the fades act on alpha */
export const PIXEL_FORMAT = 'yuva420p';

/** Codec aliases resolved before hardware substitution. */
export const CODEC_ALIASES: Readonly<Record<string, string>> = {
  vp9alpha: 'libvpx-vp9',
};

export interface TimingPlan {
  totalDuration: number;
  fadeIn: number;
  fadeOut: number;
  /** total - fadeIn - fadeOut; negative when the fades overlap */
  holdDuration: number;
  /** Pulled back one frame so the final frame is fully transparent */
  fadeOutStart: number;
  frameInterval: number;
  easingIn: FadeCurve;
  easingOut: FadeCurve;
  warnings: string[];
}

export interface FfmpegInvocation {
  binary: string;
  args: string[];
  sourcePath: string;
  outputPath: string;
  codec: string;
  filterGraph: string;
  timing: TimingPlan;
}

export interface SynthesizeOptions {
  /** Base for relative paths in the config (default: cwd) */
  root?: string;
  /** Where to look for a source image when png_path is missing */
  searchRoot?: string;
  expectedName?: string;
  binary?: string;
}

export function computeTiming(config: Pick<
  RenderConfig,
  'totalDuration' | 'fadeInDuration' | 'fadeOutDuration' | 'fps' | 'easingIn' | 'easingOut'
>): TimingPlan {
  const totalDuration = config.totalDuration;
  const fadeIn = config.fadeInDuration;
  const fadeOut = config.fadeOutDuration;
  const frameInterval = 1 / config.fps;
  const holdDuration = totalDuration - fadeIn - fadeOut;

  const warnings: string[] = [];
  if (holdDuration < 0) {
    // Overlapping fades are tolerated, only flagged
    warnings.push(
      `fade_in (${fadeIn}s) + fade_out (${fadeOut}s) exceeds total_duration (${totalDuration}s); hold is ${holdDuration}s`
    );
  }

  const fadeOutStart = totalDuration - fadeOut - frameInterval;
  if (fadeOutStart < 0) {
    // ffmpeg's fade rejects a negative st; the value is kept and flagged
    warnings.push(
      `fade-out would start at ${fadeOutStart}s, before the clip begins (fade_out ${fadeOut}s, ${config.fps} fps)`
    );
  }

  return {
    totalDuration,
    fadeIn,
    fadeOut,
    holdDuration,
    fadeOutStart,
    frameInterval,
    easingIn: normalizeEasing(config.easingIn),
    easingOut: normalizeEasing(config.easingOut),
    warnings,
  };
}

/**
 * scale first, then both fades. The fade filter's `curve` option is missing
 * from some ffmpeg builds, so easing is not passed through here.
 */
export function buildFilterGraph(width: number, height: number, timing: TimingPlan): string {
  return [
    `scale=${width}:${height}`,
    `fade=t=in:st=0:d=${timing.fadeIn}:alpha=1`,
    `fade=t=out:st=${timing.fadeOutStart}:d=${timing.fadeOut}:alpha=1`,
  ].join(',');
}

/** Alias resolution, then hardware substitution of the software HEVC encoder. */
export function resolveCodec(codec: string | undefined, hwAccel: boolean): string {
  const requested = codec ?? SOFTWARE_HEVC;
  const resolved = CODEC_ALIASES[requested] ?? requested;
  if (hwAccel && resolved === SOFTWARE_HEVC) {
    return HARDWARE_HEVC;
  }
  return resolved;
}

export function buildFfmpegArgs(parts: {
  sourcePath: string;
  outputPath: string;
  duration: number;
  filterGraph: string;
  codec: string;
  fps: number;
}): string[] {
  return [
    '-y', // overwrite output
    '-loop', '1',
    '-i', parts.sourcePath,
    '-t', String(parts.duration),
    '-vf', parts.filterGraph,
    '-c:v', parts.codec,
    '-pix_fmt', PIXEL_FORMAT,
    '-r', String(parts.fps),
    parts.outputPath,
  ];
}

/**
 * Build the full ffmpeg invocation. Touches the filesystem read-only, and
 * only to locate the source image.
 */
export function synthesize(config: RenderConfig, options: SynthesizeOptions = {}): FfmpegInvocation {
  const root = options.root ?? process.cwd();
  const sourcePath = resolveSourceAsset(config.pngPath, {
    root,
    searchRoot: options.searchRoot ?? getOutputRoot(),
    expectedName: options.expectedName ?? DEFAULT_EXPECTED_NAME,
  });
  const outputPath = path.resolve(root, config.outputVideo);

  const timing = computeTiming(config);
  for (const warning of timing.warnings) {
    logger.warn(warning);
  }

  const filterGraph = buildFilterGraph(config.width, config.height, timing);
  const codec = resolveCodec(config.codec, config.hwAccel);

  logger.info('Synthesized ffmpeg invocation', {
    codec,
    hwAccel: config.hwAccel,
    duration: `${timing.totalDuration}s`,
    hold: `${timing.holdDuration}s`,
    easing: `${timing.easingIn}/${timing.easingOut}`,
  });
  logger.debug('ffmpeg filter graph: %s', filterGraph);

  return {
    binary: options.binary ?? getToolPaths().ffmpeg,
    args: buildFfmpegArgs({
      sourcePath,
      outputPath,
      duration: timing.totalDuration,
      filterGraph,
      codec,
      fps: config.fps,
    }),
    sourcePath,
    outputPath,
    codec,
    filterGraph,
    timing,
  };
}
