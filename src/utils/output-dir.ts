import fs from 'fs';
import path from 'path';

const pad = (n: number): string => String(n).padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatTimestamp(now: Date): string {
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

/** Create (if needed) and return `root/YYYYMMDD_HHMMSS`. */
export function createTimestampedOutputDir(root: string, now: Date = new Date()): string {
  const dir = path.join(root, formatTimestamp(now));
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}
