import type { Db } from './schema.js';
import { logger, describeError } from '../core/logger.js';

export type Severity = '0' | '1' | '2' | '3' | 'Unknown';

// Post types
export interface PostRecord {
  post_id: string;
  text: string;
  post_date: string | null;
  post_author: string | null;
  profile_headline: string | null;
  post_url: string | null;
  hashtags: string | null;
  search_query: string | null;
}

export interface StoredPost extends PostRecord {
  severity: string | null;
  reasons: string | null;
}

export interface UnscoredPost {
  post_id: string;
  text: string;
}

export type UpsertOutcome = 'saved' | 'skipped';

export interface BatchResult {
  saved: number;
  skipped: number;
}

export interface ScrapeLog {
  id?: number;
  query: string | null;
  status: 'running' | 'success' | 'failed' | 'interrupted';
  items_found: number;
  items_new: number;
  error: string | null;
  started_at: string;
  completed_at: string | null;
}

export type ScrapeLogStatus = Exclude<ScrapeLog['status'], 'running'>;

/** Anything a batch of extracted posts can be flushed into. */
export interface PostSink {
  upsertMany(records: PostRecord[]): BatchResult;
}

export interface PostFilters {
  severity?: string;
  unscored?: boolean;
  search?: string;
  query?: string;
  limit?: number;
  offset?: number;
}

function isPrimaryKeyViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || error.code === 'SQLITE_CONSTRAINT_UNIQUE')
  );
}

export class PostStore implements PostSink {
  private existsStmt;
  private insertStmt;
  private updateSeverityStmt;
  private unscoredStmt;

  constructor(private db: Db) {
    this.existsStmt = db.prepare('SELECT 1 FROM linkedin_posts WHERE post_id = ?');
    this.insertStmt = db.prepare(`
      INSERT INTO linkedin_posts (post_id, text, post_date, post_author, profile_headline, post_url, hashtags, search_query)
      VALUES (@post_id, @text, @post_date, @post_author, @profile_headline, @post_url, @hashtags, @search_query)
    `);
    this.updateSeverityStmt = db.prepare(`
      UPDATE linkedin_posts SET severity = ?, reasons = ? WHERE post_id = ?
    `);
    this.unscoredStmt = db.prepare(`
      SELECT post_id, text FROM linkedin_posts
      WHERE (severity IS NULL OR severity = '')
        AND post_id NOT IN (SELECT value FROM json_each(?))
      LIMIT ?
    `);
  }

  exists(postId: string): boolean {
    return this.existsStmt.get(postId) !== undefined;
  }

  // Insert-or-skip: stored rows are never overwritten by ingestion
  upsertOrSkip(record: PostRecord): UpsertOutcome {
    if (!record.text) {
      logger.debug(`Skipping post ${record.post_id}: empty text`);
      return 'skipped';
    }

    try {
      if (this.exists(record.post_id)) {
        return 'skipped';
      }
      this.insertStmt.run(record);
      return 'saved';
    } catch (error) {
      if (!isPrimaryKeyViolation(error)) {
        logger.error(`Failed to store post ${record.post_id}: ${describeError(error)}`);
      }
      return 'skipped';
    }
  }

  // Batch insert posts
  upsertMany(records: PostRecord[]): BatchResult {
    const result: BatchResult = { saved: 0, skipped: 0 };
    const transaction = this.db.transaction((items: PostRecord[]) => {
      for (const record of items) {
        if (this.upsertOrSkip(record) === 'saved') {
          result.saved++;
        } else {
          result.skipped++;
        }
      }
    });
    transaction(records);
    return result;
  }

  fetchUnscored(limit: number, excludeIds: Iterable<string> = []): UnscoredPost[] {
    return this.unscoredStmt.all(JSON.stringify([...excludeIds]), limit) as UnscoredPost[];
  }

  writeBack(postId: string, severity: string, reasons: string): void {
    this.updateSeverityStmt.run(severity, reasons, postId);
  }

  count(): number {
    const row = this.db.prepare('SELECT COUNT(*) as count FROM linkedin_posts').get() as { count: number };
    return row.count;
  }

  // Query posts with filters
  getPosts(filters: PostFilters = {}): StoredPost[] {
    let query = `SELECT post_id, text, post_date, post_author, profile_headline, post_url, hashtags,
      search_query, severity, reasons FROM linkedin_posts WHERE 1=1`;
    const params: Array<string | number> = [];

    if (filters.unscored) {
      query += " AND (severity IS NULL OR severity = '')";
    } else if (filters.severity) {
      query += ' AND severity = ?';
      params.push(filters.severity);
    }
    if (filters.search) {
      query += ' AND (text LIKE ? OR post_author LIKE ? OR hashtags LIKE ?)';
      params.push(`%${filters.search}%`, `%${filters.search}%`, `%${filters.search}%`);
    }
    if (filters.query) {
      query += ' AND search_query = ?';
      params.push(filters.query);
    }

    query += ' ORDER BY rowid DESC';

    if (filters.limit) {
      query += ' LIMIT ?';
      params.push(filters.limit);
      if (filters.offset) {
        query += ' OFFSET ?';
        params.push(filters.offset);
      }
    }

    return this.db.prepare(query).all(...params) as StoredPost[];
  }

  // Get stats
  getStats() {
    const total = this.count();

    const bySeverity = this.db.prepare(`
      SELECT COALESCE(NULLIF(severity, ''), 'unscored') as severity, COUNT(*) as total
      FROM linkedin_posts
      GROUP BY 1
      ORDER BY 1
    `).all() as Array<{ severity: string; total: number }>;

    const byQuery = this.db.prepare(`
      SELECT COALESCE(search_query, '(feed)') as query, COUNT(*) as total
      FROM linkedin_posts
      GROUP BY 1
      ORDER BY total DESC
    `).all() as Array<{ query: string; total: number }>;

    return { total, bySeverity, byQuery };
  }

  // Scrape logs
  logScrapeStart(query: string | null): number {
    const result = this.db.prepare(`
      INSERT INTO scrape_logs (query, status, started_at) VALUES (?, 'running', datetime('now'))
    `).run(query);
    return Number(result.lastInsertRowid);
  }

  logScrapeEnd(id: number, status: ScrapeLogStatus, itemsFound: number, itemsNew: number, error?: string): void {
    this.db.prepare(`
      UPDATE scrape_logs SET status = ?, items_found = ?, items_new = ?, error = ?, completed_at = datetime('now')
      WHERE id = ?
    `).run(status, itemsFound, itemsNew, error || null, id);
  }

  getRecentLogs(limit = 20): ScrapeLog[] {
    return this.db.prepare(`
      SELECT * FROM scrape_logs ORDER BY id DESC LIMIT ?
    `).all(limit) as ScrapeLog[];
  }
}
