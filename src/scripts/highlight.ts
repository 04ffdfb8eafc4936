#!/usr/bin/env node
/**
 * Render a sentence with its highlighted phrase once per style variant.
 *
 * Usage:
 *   highlight --sentence "Growth comes from stepping out of the comfort zone." \
 *             --highlight "comfort zone" --basename demo
 *   highlight --config config_video.yml            # sentence/highlight from the config
 *   highlight --sentence "..." --highlight "..." --markup-only
 *
 * Writes demo_color.png, demo_size.png, ... into output/YYYYMMDD_HHMMSS/.
 */

import { loadEnv, getOutputRoot } from '../config/env';
loadEnv();

import path from 'path';
import { logger } from '../config/logger';
import { loadCliRenderConfig, type RenderConfig } from '../config/render-config';
import { buildVariantMarkups } from '../services/markup/markup-builder.service';
import magickService, { type MagickService } from '../services/image/magick.service';
import { createTimestampedOutputDir } from '../utils/output-dir';
import { MissingTextError } from '../utils/errors';
import { getFlagValue, hasFlag, runCli } from './cli';
import type { VariantMarkup } from '../types/style.types';

export interface HighlightRequest {
  sentence: string;
  phrase: string;
  baseName: string;
  outRoot: string;
  markupOnly: boolean;
}

/** Combine CLI flags with the config's fallback text. */
export function resolveHighlightRequest(args: readonly string[], config: RenderConfig): HighlightRequest {
  const sentence = getFlagValue(args, '--sentence') ?? config.sentence;
  if (!sentence) throw new MissingTextError('sentence');
  const phrase = getFlagValue(args, '--highlight') ?? config.highlight;
  if (!phrase) throw new MissingTextError('highlight');

  const baseName = getFlagValue(args, '--basename') ?? 'demo';
  return {
    sentence,
    phrase,
    baseName: path.parse(baseName).name,
    outRoot: getFlagValue(args, '--out-root') ?? getOutputRoot(),
    markupOnly: hasFlag(args, '--markup-only'),
  };
}

export function buildDocuments(request: HighlightRequest, config: RenderConfig): VariantMarkup[] {
  return buildVariantMarkups(
    { sentence: request.sentence, phrase: request.phrase },
    { family: config.baseFontFamily, sizePt: config.baseFontSizePt, color: config.textColor },
    config.variants,
    request.baseName
  );
}

export async function runHighlight(
  args: readonly string[],
  renderer: Pick<MagickService, 'renderVariants'> = magickService
): Promise<string[]> {
  const config = loadCliRenderConfig(getFlagValue(args, '--config'));
  const request = resolveHighlightRequest(args, config);
  const documents = buildDocuments(request, config);

  if (request.markupOnly) {
    for (const doc of documents) {
      process.stdout.write(`${doc.name}\t${doc.markup}\n`);
    }
    return [];
  }

  const outDir = createTimestampedOutputDir(request.outRoot);
  const written = await renderer.renderVariants(documents, outDir, config);
  logger.info(`Wrote ${written.length} images`, { outDir });
  return written;
}

if (require.main === module) {
  runCli(async () => {
    await runHighlight(process.argv.slice(2));
  });
}
