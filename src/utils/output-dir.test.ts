import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { createTimestampedOutputDir, formatTimestamp } from './output-dir';

describe('output directories', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('20240102_030405');
  });

  it('creates the timestamped directory under the root', () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'outdir-'));
    dirs.push(root);
    const dir = createTimestampedOutputDir(path.join(root, 'output'), new Date(2025, 10, 30, 23, 59, 58));
    expect(dir).toBe(path.join(root, 'output', '20251130_235958'));
    expect(fs.statSync(dir).isDirectory()).toBe(true);
  });
});
