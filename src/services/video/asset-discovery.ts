import fs from 'fs';
import path from 'path';
import { logger } from '../../config/logger';
import { SourceAssetNotFoundError } from '../../utils/errors';

export const DEFAULT_EXPECTED_NAME = 'demo_color.png';

export interface AssetResolutionOptions {
  /** Base for relative paths */
  root: string;
  /** Directory searched when the configured path is missing */
  searchRoot: string;
  expectedName?: string;
}

function collectMatches(dir: string, name: string, found: string[]): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
    throw error;
  }
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      collectMatches(full, name, found);
    } else if (entry.isFile() && entry.name === name) {
      found.push(full);
    }
  }
}

/**
 * Most recently modified file called `name` anywhere below `searchRoot`,
 * or null when there is none.
 */
export function discoverLatestAsset(searchRoot: string, name: string = DEFAULT_EXPECTED_NAME): string | null {
  const found: string[] = [];
  collectMatches(searchRoot, name, found);
  if (found.length === 0) return null;

  return found
    .map((file) => ({ file, mtime: fs.statSync(file).mtimeMs }))
    .sort((a, b) => b.mtime - a.mtime)[0].file;
}

/**
 * The configured source image if it exists, otherwise the newest discovered
 * candidate. Throws SourceAssetNotFoundError when both come up empty.
 */
export function resolveSourceAsset(configuredPath: string, opts: AssetResolutionOptions): string {
  const expectedName = opts.expectedName ?? DEFAULT_EXPECTED_NAME;
  const primary = path.resolve(opts.root, configuredPath);
  if (fs.existsSync(primary)) {
    return primary;
  }

  const searchRoot = path.resolve(opts.root, opts.searchRoot);
  const discovered = discoverLatestAsset(searchRoot, expectedName);
  if (!discovered) {
    throw new SourceAssetNotFoundError(configuredPath, searchRoot, expectedName);
  }

  logger.warn('Configured source image missing, using discovered file', {
    configured: configuredPath,
    discovered: path.relative(opts.root, discovered),
  });
  return discovered;
}
