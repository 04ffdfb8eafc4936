import ffmpeg from 'fluent-ffmpeg';
import { logger } from '../../config/logger';
import { getToolPaths } from '../../config/env';
import { spawnRunner, formatCommand, type CommandRunner } from '../../utils/command-runner';
import type { FfmpegInvocation } from './render-command.service';

export type DurationProbe = (filePath: string) => Promise<number>;

/** Read a media file's container duration with ffprobe. */
export const probeDuration: DurationProbe = (filePath) => {
  ffmpeg.setFfprobePath(getToolPaths().ffprobe);
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err, metadata) => {
      if (err) {
        const msg = err instanceof Error ? err.message : String(err);
        reject(new Error(`ffprobe failed for ${filePath}: ${msg}`));
        return;
      }
      const duration = metadata.format.duration;
      if (duration === undefined) {
        reject(new Error(`ffprobe reported no duration for ${filePath}`));
        return;
      }
      resolve(duration);
    });
  });
};

export interface EncodeResult {
  outputPath: string;
  /** Duration read back from the encoded file */
  probedDuration: number;
}

class FFmpegService {
  constructor(
    private readonly runner: CommandRunner = spawnRunner,
    private readonly probe: DurationProbe = probeDuration
  ) {}

  /** Spawn ffmpeg with a synthesized argument list. Failures propagate as ExternalToolError. */
  async runInvocation(invocation: FfmpegInvocation): Promise<void> {
    logger.info('FFmpeg command started', { output: invocation.outputPath });
    logger.debug('FFmpeg command: %s', formatCommand(invocation.binary, invocation.args));
    await this.runner(invocation.binary, invocation.args);
  }

  /**
   * Encode the clip, then check the result is within one frame of the
   * requested duration.
   */
  async encodeClip(invocation: FfmpegInvocation): Promise<EncodeResult> {
    await this.runInvocation(invocation);

    const probedDuration = await this.probe(invocation.outputPath);
    const drift = Math.abs(probedDuration - invocation.timing.totalDuration);
    if (drift > invocation.timing.frameInterval) {
      logger.warn(
        `Encoded duration ${probedDuration.toFixed(3)}s differs from requested ${invocation.timing.totalDuration}s`
      );
    }

    logger.info('Video encoding completed', { output: invocation.outputPath, duration: probedDuration });
    return { outputPath: invocation.outputPath, probedDuration };
  }
}

export { FFmpegService };
export default new FFmpegService();
