import fs from 'fs';
import path from 'path';
import type { BatchResult, PostRecord, PostSink } from '../db/queries.js';
import { logger } from '../core/logger.js';

const SEPARATOR = '='.repeat(80);
// Headers count only at the start of the file or right after a separator.
const BLOCK_HEADER = new RegExp(`(?:^|${SEPARATOR}\\n\\n)Post \\d+:\\n`, 'g');

const pad = (value: number) => String(value).padStart(2, '0');

export function defaultOutputName(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `linkedin_posts_${date}_${time}.txt`;
}

export function formatPostBlock(index: number, text: string): string {
  return `Post ${index}:\n${text}\n\n${SEPARATOR}\n\n`;
}

export function idsPathFor(filePath: string): string {
  return `${filePath}.ids`;
}

/**
 * Appends post text to a flat file instead of the database. Numbering carries
 * on from the blocks already in the file, so a resumed run keeps counting.
 *
 * The post ids already written are kept one per line in a `.ids` file beside
 * the output; a post whose id is listed there is skipped, the same way the
 * database skips an existing primary key.
 */
export class TextFileSink implements PostSink {
  readonly idsPath: string;
  private written: number;
  private known: Set<string>;

  constructor(readonly filePath: string) {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    this.idsPath = idsPathFor(filePath);
    this.written = fs.existsSync(filePath)
      ? (fs.readFileSync(filePath, 'utf-8').match(BLOCK_HEADER) ?? []).length
      : 0;
    this.known = new Set(
      fs.existsSync(this.idsPath)
        ? fs
            .readFileSync(this.idsPath, 'utf-8')
            .split('\n')
            .map(line => line.trim())
            .filter(Boolean)
        : []
    );
  }

  get count(): number {
    return this.written;
  }

  upsertMany(records: PostRecord[]): BatchResult {
    const result: BatchResult = { saved: 0, skipped: 0 };
    let chunk = '';
    let ids = '';

    for (const record of records) {
      if (!record.text || this.known.has(record.post_id)) {
        result.skipped++;
        continue;
      }
      this.known.add(record.post_id);
      this.written++;
      result.saved++;
      chunk += formatPostBlock(this.written, record.text);
      ids += `${record.post_id}\n`;
    }

    if (chunk) {
      fs.appendFileSync(this.filePath, chunk, 'utf-8');
      fs.appendFileSync(this.idsPath, ids, 'utf-8');
      logger.debug(`Appended ${result.saved} posts to ${this.filePath}`);
    }
    return result;
  }
}
