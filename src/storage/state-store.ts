/**
 * Checkpoint persistence for resumable crawls
 */
import { promises as fs } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { FrontierState } from '../crawl/url-frontier.js';

export interface StateStore {
  save(state: FrontierState): Promise<void>;
  /** Empty state when no checkpoint exists or it cannot be read back. */
  load(): Promise<FrontierState>;
}

export const CheckpointSchema = z.object({
  visited: z.array(z.string()).default([]),
  queue: z.array(z.string()).default([]),
});

function emptyState(): FrontierState {
  return { visited: [], queue: [] };
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return String(error.code);
  }
  return undefined;
}

/**
 * Single JSON checkpoint file, overwritten on every save. Writes go to a
 * sibling temp file first and are renamed into place, so a reader sees
 * either the previous checkpoint or the new one.
 */
export class FileStateStore implements StateStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async save(state: FrontierState): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    const body = JSON.stringify({ visited: state.visited, queue: state.queue }, null, 2);

    await fs.mkdir(dirname(this.filePath), { recursive: true });
    await fs.writeFile(tempPath, body, 'utf-8');
    await fs.rename(tempPath, this.filePath);

    logger.debug(
      { path: this.filePath, visited: state.visited.length, queued: state.queue.length },
      'Checkpoint saved'
    );
  }

  async load(): Promise<FrontierState> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return emptyState();
      logger.warn({ path: this.filePath, error: String(error) }, 'Checkpoint unreadable, starting fresh');
      return emptyState();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      logger.warn({ path: this.filePath, error: String(error) }, 'Checkpoint is not valid JSON, starting fresh');
      return emptyState();
    }

    const parsed = CheckpointSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(
        { path: this.filePath, error: parsed.error.message },
        'Checkpoint has unexpected shape, starting fresh'
      );
      return emptyState();
    }

    return parsed.data;
  }
}
