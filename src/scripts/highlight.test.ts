import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { resolveHighlightRequest, runHighlight } from './highlight';
import { parseRenderConfig } from '../config/render-config';
import { ConfigError, MissingTextError, PhraseNotFoundError } from '../utils/errors';
import type { VariantMarkup } from '../types/style.types';

describe('resolveHighlightRequest', () => {
  const config = parseRenderConfig({ sentence: 'Fallback sentence here', highlight: 'sentence' });

  it('prefers command-line text over the configuration', () => {
    const req = resolveHighlightRequest(['--sentence', 'A new day', '--highlight', 'new'], config);
    expect(req.sentence).toBe('A new day');
    expect(req.phrase).toBe('new');
  });

  it('falls back to the configuration text', () => {
    const req = resolveHighlightRequest([], config);
    expect(req.sentence).toBe('Fallback sentence here');
    expect(req.phrase).toBe('sentence');
    expect(req.baseName).toBe('demo');
    expect(req.markupOnly).toBe(false);
  });

  it('strips directories and extensions from the base name', () => {
    const req = resolveHighlightRequest(['--basename', 'renders/idiom.png'], config);
    expect(req.baseName).toBe('idiom');
  });

  it('fails without any sentence', () => {
    expect(() => resolveHighlightRequest([], parseRenderConfig({}))).toThrow(MissingTextError);
  });

  it('fails without any highlight', () => {
    expect(() => resolveHighlightRequest(['--sentence', 'x'], parseRenderConfig({}))).toThrow(MissingTextError);
  });
});

describe('runHighlight', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  function setup(): { configPath: string; outRoot: string } {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'highlight-cli-'));
    dirs.push(dir);
    const configPath = path.join(dir, 'config.yml');
    fs.writeFileSync(configPath, 'base_font_family: Arial\n', 'utf-8');
    return { configPath, outRoot: path.join(dir, 'output') };
  }

  it('renders every variant into a fresh timestamped directory', async () => {
    const { configPath, outRoot } = setup();
    const renderVariants = vi.fn(async (docs: VariantMarkup[], dir: string) =>
      docs.map((d) => path.join(dir, `${d.name}.png`))
    );

    const written = await runHighlight(
      ['--config', configPath, '--out-root', outRoot, '--sentence', 'Mind the gap.', '--highlight', 'gap'],
      { renderVariants }
    );

    expect(written).toHaveLength(8);
    const [docs, dir] = renderVariants.mock.calls[0];
    expect(docs[0].name).toBe('demo_color');
    expect(path.dirname(dir)).toBe(outRoot);
    expect(path.basename(dir)).toMatch(/^\d{8}_\d{6}$/);
  });

  it('stops before rendering when the phrase is missing', async () => {
    const { configPath, outRoot } = setup();
    const renderVariants = vi.fn();

    await expect(
      runHighlight(
        ['--config', configPath, '--out-root', outRoot, '--sentence', 'Mind the gap.', '--highlight', 'Gap'],
        { renderVariants }
      )
    ).rejects.toThrow(PhraseNotFoundError);
    expect(renderVariants).not.toHaveBeenCalled();
    expect(fs.existsSync(outRoot)).toBe(false);
  });

  it('rejects an explicit config path that does not exist', async () => {
    const { outRoot } = setup();
    const renderVariants = vi.fn();

    await expect(
      runHighlight(
        ['--config', path.join(outRoot, 'missing.yml'), '--sentence', 'Mind the gap.', '--highlight', 'gap'],
        { renderVariants }
      )
    ).rejects.toThrow(ConfigError);
    expect(renderVariants).not.toHaveBeenCalled();
  });
});
