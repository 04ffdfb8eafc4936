import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { loadCliRenderConfig, loadRenderConfig, parseRenderConfig } from './render-config';
import { ConfigError } from '../utils/errors';

describe('parseRenderConfig', () => {
  it('fills in defaults for an empty document', () => {
    const cfg = parseRenderConfig({});
    expect(cfg.canvasWidth).toBe(1920);
    expect(cfg.canvasHeight).toBe(1080);
    expect(cfg.wrapRatio).toBe(0.92);
    expect(cfg.width).toBe(1920);
    expect(cfg.height).toBe(1080);
    expect(cfg.totalDuration).toBe(10);
    expect(cfg.fadeInDuration).toBe(1.5);
    expect(cfg.fadeOutDuration).toBe(1.5);
    expect(cfg.fps).toBe(30);
    expect(cfg.codec).toBe('libx265');
    expect(cfg.hwAccel).toBe(false);
    expect(cfg.backgroundColor).toEqual([0.2, 0.2, 0.2]);
    expect(cfg.variants.map((v) => v.suffix)).toEqual([
      'color', 'size', 'family', 'weight', 'style', 'underline', 'strike', 'rise',
    ]);
  });

  it('treats a null document as empty', () => {
    expect(parseRenderConfig(null).fps).toBe(30);
  });

  it('returns a frozen object', () => {
    const cfg = parseRenderConfig({ hw_accel: true });
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.variants)).toBe(true);
    expect(Object.isFrozen(cfg.textColor)).toBe(true);
  });

  it('maps variant extra_attrs onto style overrides', () => {
    const cfg = parseRenderConfig({
      default_highlight_color: [0, 0, 1],
      variants: {
        big: {
          extra_attrs: { size: '143360', font_family: 'Courier New', strikethrough: 'true' },
          highlight_color: '#ff0000',
        },
        plain: {},
      },
    });
    expect(cfg.variants).toEqual([
      {
        suffix: 'big',
        overrides: { size: 143360, family: 'Courier New', strikethrough: true },
        highlightColor: [1, 0, 0],
      },
      { suffix: 'plain', overrides: {}, highlightColor: [0, 0, 1] },
    ]);
  });

  it('rejects unknown variant attributes', () => {
    expect(() => parseRenderConfig({ variants: { x: { extra_attrs: { colour: 'red' } } } })).toThrow(ConfigError);
  });

  it('rejects malformed colors', () => {
    expect(() => parseRenderConfig({ text_color: '#zzzzzz' })).toThrow(ConfigError);
    expect(() => parseRenderConfig({ text_color: [2, 0, 0] })).toThrow(ConfigError);
  });

  it('names the failing key in the error message', () => {
    expect(() => parseRenderConfig({ fps: -1 })).toThrow(/fps/);
  });

  it('accepts fades longer than the clip', () => {
    const cfg = parseRenderConfig({ total_duration: 2, fade_in_duration: 1.5, fade_out_duration: 1.5 });
    expect(cfg.totalDuration).toBe(2);
  });
});

describe('loadRenderConfig', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(contents: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'render-config-'));
    dirs.push(dir);
    const file = path.join(dir, 'config_video.yml');
    fs.writeFileSync(file, contents, 'utf-8');
    return file;
  }

  it('reads YAML and resolves it', () => {
    const file = writeConfig(
      ['fps: 24', 'hw_accel: true', 'width: 640', 'height: 360', 'easing_in: easeinout', 'sentence: Hello world'].join('\n')
    );
    const cfg = loadRenderConfig(file);
    expect(cfg.fps).toBe(24);
    expect(cfg.hwAccel).toBe(true);
    expect(cfg.width).toBe(640);
    expect(cfg.height).toBe(360);
    expect(cfg.easingIn).toBe('easeinout');
    expect(cfg.sentence).toBe('Hello world');
  });

  it('fails on a missing file', () => {
    expect(() => loadRenderConfig(path.join(os.tmpdir(), 'does-not-exist-config.yml'))).toThrow(ConfigError);
  });

  it('fails on unparsable YAML', () => {
    const file = writeConfig('fps: [1, 2');
    expect(() => loadRenderConfig(file)).toThrow(ConfigError);
  });
});

describe('loadCliRenderConfig', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  function emptyDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-config-'));
    dirs.push(dir);
    return dir;
  }

  it('uses defaults when no config is given and the default file is absent', () => {
    const cfg = loadCliRenderConfig(undefined, path.join(emptyDir(), 'config_video.yml'));
    expect(cfg.canvasWidth).toBe(1920);
    expect(cfg.variants).toHaveLength(8);
  });

  it('reads the default file when it exists', () => {
    const file = path.join(emptyDir(), 'config_video.yml');
    fs.writeFileSync(file, 'fps: 12\n', 'utf-8');
    expect(loadCliRenderConfig(undefined, file).fps).toBe(12);
  });

  it('still fails for an explicit path that does not exist', () => {
    expect(() => loadCliRenderConfig(path.join(emptyDir(), 'other.yml'))).toThrow(ConfigError);
  });
});
