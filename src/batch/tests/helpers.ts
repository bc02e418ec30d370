import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import pino from 'pino';
import type { Logger } from 'pino';

/**
 * A throwaway directory under the OS temp dir.
 */
export type Workspace = {
  root: string;
  resolve: (...segments: string[]) => string;
  dispose: () => Promise<void>;
};

export async function createWorkspace(): Promise<Workspace> {
  const root = await mkdtemp(path.join(tmpdir(), 'ron-node-migrate-'));
  return {
    root,
    resolve: (...segments) => path.join(root, ...segments),
    dispose: () => rm(root, { recursive: true, force: true })
  };
}

/**
 * A logger whose records are parsed and kept in memory.
 */
export type CapturingLogger = {
  logger: Logger;
  records: Array<Record<string, unknown>>;
};

export function createCapturingLogger(): CapturingLogger {
  const records: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (line: string) => {
        records.push(JSON.parse(line));
      }
    }
  );
  return { logger, records };
}

export const silentLogger: Logger = pino({ level: 'silent' });
