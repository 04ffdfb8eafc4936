import { spawn } from 'child_process';
import path from 'path';
import type { Readable } from 'stream';
import { toolLogger } from '../config/logger';
import { ExternalToolError } from './errors';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Runs an external binary with an argument list; rejects on non-zero exit. */
export type CommandRunner = (binary: string, args: readonly string[]) => Promise<CommandResult>;

/** The slice of a spawned child the runner relies on. */
export interface SpawnedProcess {
  stdout: Readable | null;
  stderr: Readable | null;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: (code: number | null) => void): unknown;
}

export type SpawnFn = (binary: string, args: string[]) => SpawnedProcess;

const defaultSpawn: SpawnFn = (binary, args) => spawn(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });

/** Keep only the end of stderr for error messages. */
const STDERR_TAIL = 4000;

/**
 * Runner that relays the tool's stderr (ffmpeg and magick report progress
 * there) line by line at debug level while it runs.
 */
export function createSpawnRunner(spawnFn: SpawnFn = defaultSpawn): CommandRunner {
  return (binary, args) =>
    new Promise((resolve, reject) => {
      const log = toolLogger(path.basename(binary));
      let stdout = '';
      let stderr = '';
      let pending = '';

      const child = spawnFn(binary, [...args]);

      child.stdout?.on('data', (chunk: Buffer | string) => {
        stdout += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer | string) => {
        const text = chunk.toString();
        stderr = (stderr + text).slice(-STDERR_TAIL);
        const lines = (pending + text).split(/\r\n|\r|\n/);
        pending = lines.pop() ?? '';
        for (const line of lines) {
          if (line.trim()) log.debug(line);
        }
      });

      child.on('error', (err) => {
        reject(new ExternalToolError(binary, null, err.message));
      });
      child.on('close', (code) => {
        if (pending.trim()) log.debug(pending);
        if (code === 0) {
          resolve({ stdout, stderr });
        } else {
          reject(new ExternalToolError(binary, code, stderr));
        }
      });
    });
}

export const spawnRunner: CommandRunner = createSpawnRunner();

/** Shell-style rendering of a command, for logs and --dry-run output. */
export function formatCommand(binary: string, args: readonly string[]): string {
  return [binary, ...args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}
