import * as dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Load .env from the working directory or its parent so tool paths and the
 * log level are available however the CLIs are launched.
 */
export function loadEnv(): void {
  const cwd = process.cwd();
  const candidates = [
    path.join(cwd, '.env'),
    path.join(cwd, '..', '.env'),
  ];

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error && process.env.NODE_ENV === 'development') {
        console.warn(`[env] Warning loading ${envPath}:`, result.error.message);
      }
      return;
    }
  }
}

export interface ToolPaths {
  ffmpeg: string;
  ffprobe: string;
  magick: string;
}

/** External binaries, overridable per machine. */
export function getToolPaths(env: NodeJS.ProcessEnv = process.env): ToolPaths {
  return {
    ffmpeg: env.FFMPEG_PATH || 'ffmpeg',
    ffprobe: env.FFPROBE_PATH || 'ffprobe',
    magick: env.MAGICK_PATH || 'magick',
  };
}

export function getOutputRoot(env: NodeJS.ProcessEnv = process.env): string {
  return env.OUTPUT_ROOT || 'output';
}
