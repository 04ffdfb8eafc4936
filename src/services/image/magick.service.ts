import fs from 'fs';
import os from 'os';
import path from 'path';
import { logger } from '../../config/logger';
import { getToolPaths } from '../../config/env';
import type { RenderConfig } from '../../config/render-config';
import { rgbToHex } from '../../utils/color';
import { spawnRunner, formatCommand, type CommandRunner } from '../../utils/command-runner';
import type { RGB, VariantMarkup } from '../../types/style.types';
import { wrapWidth } from '../markup/markup-builder.service';

export interface MagickArgsOptions {
  markupFile: string;
  output: string;
  canvasWidth: number;
  canvasHeight: number;
  wrapWidth: number;
  background: RGB;
}

/**
 * Composite wrapped Pango text onto a solid canvas, centred.
 * The markup is passed by file (`pango:@file`) so quoting never reaches the shell.
 */
export function buildMagickArgs(opts: MagickArgsOptions): string[] {
  return [
    '-size', `${opts.canvasWidth}x${opts.canvasHeight}`,
    `xc:${rgbToHex(opts.background)}`,
    '(',
    '-size', `${opts.wrapWidth}x`, // width only, height auto
    '-background', 'none',
    `pango:@${opts.markupFile}`,
    ')',
    '-gravity', 'center',
    '-composite',
    opts.output,
  ];
}

class MagickService {
  constructor(
    private readonly runner: CommandRunner = spawnRunner,
    private readonly binary: string = getToolPaths().magick
  ) {}

  /** Rasterize one markup document to a PNG. */
  async renderStill(markup: string, output: string, config: RenderConfig): Promise<string> {
    // Temp dir path has no spaces, which Pango's file loader trips over
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'im_markup-'));
    const markupFile = path.join(tmpDir, 'markup.txt');

    try {
      fs.writeFileSync(markupFile, markup, 'utf-8');
      fs.mkdirSync(path.dirname(output), { recursive: true });

      const args = buildMagickArgs({
        markupFile,
        output,
        canvasWidth: config.canvasWidth,
        canvasHeight: config.canvasHeight,
        wrapWidth: wrapWidth(config.canvasWidth, config.wrapRatio),
        background: config.backgroundColor,
      });
      logger.debug('magick command: %s', formatCommand(this.binary, args));

      await this.runner(this.binary, args);
      logger.info('Image written', { output });
      return output;
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  }

  /** Render every variant to `${dir}/${name}.png`, one after another. */
  async renderVariants(documents: VariantMarkup[], dir: string, config: RenderConfig): Promise<string[]> {
    const written: string[] = [];
    for (const doc of documents) {
      written.push(await this.renderStill(doc.markup, path.join(dir, `${doc.name}.png`), config));
    }
    return written;
  }
}

export { MagickService };
export default new MagickService();
