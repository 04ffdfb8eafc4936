#!/usr/bin/env node
/**
 * Encode a fade-in / hold / fade-out clip from a still image.
 *
 * Usage:
 *   render-video                              # reads config_video.yml
 *   render-video --config other.yml
 *   render-video --dry-run                    # print the ffmpeg command only
 */

import { loadEnv, getOutputRoot } from '../config/env';
loadEnv();

import { logger } from '../config/logger';
import { loadCliRenderConfig } from '../config/render-config';
import { synthesize, type FfmpegInvocation } from '../services/video/render-command.service';
import ffmpegService, { type FFmpegService } from '../services/video/ffmpeg.service';
import { formatCommand } from '../utils/command-runner';
import { getFlagValue, hasFlag, runCli } from './cli';

export async function runRenderVideo(
  args: readonly string[],
  encoder: Pick<FFmpegService, 'encodeClip'> = ffmpegService
): Promise<FfmpegInvocation> {
  const config = loadCliRenderConfig(getFlagValue(args, '--config'));
  const invocation = synthesize(config, { searchRoot: getOutputRoot() });

  if (hasFlag(args, '--dry-run')) {
    process.stdout.write(`${formatCommand(invocation.binary, invocation.args)}\n`);
    return invocation;
  }

  await encoder.encodeClip(invocation);
  logger.info(`Video generated at: ${config.outputVideo}`);
  return invocation;
}

if (require.main === module) {
  runCli(async () => {
    await runRenderVideo(process.argv.slice(2));
  });
}
