import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger, describeError } from './logger.js';

const checkpointFileSchema = z.object({
  timestamp: z.string(),
  username: z.string().nullable().optional(),
  completed_queries: z.array(z.string()),
  current_query: z.string().nullable(),
  posts_collected: z.number().int().nonnegative(),
});

export type CheckpointFile = z.infer<typeof checkpointFileSchema>;

export interface CheckpointState {
  completedQueries: string[];
  currentQuery: string | null;
  postsCollected: number;
}

export const EMPTY_CHECKPOINT: Readonly<CheckpointState> = Object.freeze({
  completedQueries: [],
  currentQuery: null,
  postsCollected: 0,
});

/**
 * Durable progress snapshot for multi-query ingestion runs.
 * Writes go to a sibling temp file and are renamed over the target, so a
 * reader sees either the previous snapshot or the new one.
 */
export class CheckpointStore {
  constructor(
    readonly filePath: string,
    private readonly username: string | null = null
  ) {}

  save(completedQueries: string[], currentQuery: string | null, postsCollected: number): void {
    const snapshot: CheckpointFile = {
      timestamp: new Date().toISOString(),
      username: this.username,
      completed_queries: [...completedQueries],
      current_query: currentQuery,
      posts_collected: postsCollected,
    };

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(snapshot, null, 2), 'utf-8');
    fs.renameSync(tmpPath, this.filePath);

    logger.debug('Checkpoint saved', {
      completed: completedQueries.length,
      currentQuery,
      postsCollected,
    });
  }

  load(): CheckpointState {
    if (!fs.existsSync(this.filePath)) {
      return { ...EMPTY_CHECKPOINT, completedQueries: [] };
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const parsed = checkpointFileSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn(`Ignoring malformed checkpoint at ${this.filePath}`);
        return { ...EMPTY_CHECKPOINT, completedQueries: [] };
      }
      return {
        completedQueries: parsed.data.completed_queries,
        currentQuery: parsed.data.current_query,
        postsCollected: parsed.data.posts_collected,
      };
    } catch (error) {
      logger.warn(`Could not read checkpoint at ${this.filePath}: ${describeError(error)}`);
      return { ...EMPTY_CHECKPOINT, completedQueries: [] };
    }
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  clear(): void {
    if (fs.existsSync(this.filePath)) {
      fs.unlinkSync(this.filePath);
      logger.info('Checkpoint cleared');
    }
  }
}
