import Database from 'better-sqlite3';
import { beforeEach, describe, expect, it } from 'vitest';
import { initializeDatabase, openDatabase } from '../src/db/schema.js';
import { PostStore, type PostRecord } from '../src/db/queries.js';

function record(postId: string, overrides: Partial<PostRecord> = {}): PostRecord {
  return {
    post_id: postId,
    text: `Text of ${postId}`,
    post_date: '2024-03-01',
    post_author: 'Jane Doe',
    profile_headline: 'Coach',
    post_url: null,
    hashtags: null,
    search_query: 'gratitude',
    ...overrides,
  };
}

describe('PostStore', () => {
  let store: PostStore;

  beforeEach(() => {
    store = new PostStore(openDatabase(':memory:'));
  });

  it('saves a new post and skips it the second time', () => {
    expect(store.upsertOrSkip(record('1'))).toBe('saved');
    expect(store.upsertOrSkip(record('1', { text: 'changed' }))).toBe('skipped');

    expect(store.count()).toBe(1);
    expect(store.getPosts()[0].text).toBe('Text of 1');
    expect(store.exists('1')).toBe(true);
    expect(store.exists('2')).toBe(false);
  });

  it('skips posts with empty text', () => {
    expect(store.upsertOrSkip(record('1', { text: '' }))).toBe('skipped');
    expect(store.count()).toBe(0);
  });

  it('counts saved and skipped posts in a batch', () => {
    store.upsertOrSkip(record('1'));

    const result = store.upsertMany([record('1'), record('2'), record('3'), record('2')]);

    expect(result).toEqual({ saved: 2, skipped: 2 });
    expect(store.count()).toBe(3);
  });

  it('fetches unscored posts up to the limit, minus excluded ids', () => {
    store.upsertMany([record('1'), record('2'), record('3')]);
    store.writeBack('2', '1', '- upbeat');

    expect(store.fetchUnscored(10).map(p => p.post_id).sort()).toEqual(['1', '3']);
    expect(store.fetchUnscored(1)).toHaveLength(1);
    expect(store.fetchUnscored(10, ['1'])).toEqual([{ post_id: '3', text: 'Text of 3' }]);
  });

  it('treats an empty severity as unscored', () => {
    store.upsertOrSkip(record('1'));
    store.writeBack('1', '', '');

    expect(store.fetchUnscored(10)).toEqual([{ post_id: '1', text: 'Text of 1' }]);
  });

  it('filters posts for the dashboard', () => {
    store.upsertMany([
      record('1', { text: 'Good vibes only #mindset', hashtags: '#mindset' }),
      record('2', { search_query: 'hustle' }),
      record('3'),
    ]);
    store.writeBack('1', '3', '- dismisses struggle');

    expect(store.getPosts({ severity: '3' }).map(p => p.post_id)).toEqual(['1']);
    expect(store.getPosts({ unscored: true }).map(p => p.post_id)).toEqual(['3', '2']);
    expect(store.getPosts({ search: 'mindset' }).map(p => p.post_id)).toEqual(['1']);
    expect(store.getPosts({ query: 'hustle' }).map(p => p.post_id)).toEqual(['2']);
    expect(store.getPosts({ limit: 1, offset: 1 }).map(p => p.post_id)).toEqual(['2']);
  });

  it('summarises posts by severity and query', () => {
    store.upsertMany([record('1'), record('2', { search_query: null }), record('3')]);
    store.writeBack('1', '2', '- forced');

    expect(store.getStats()).toEqual({
      total: 3,
      bySeverity: [
        { severity: '2', total: 1 },
        { severity: 'unscored', total: 2 },
      ],
      byQuery: [
        { query: 'gratitude', total: 2 },
        { query: '(feed)', total: 1 },
      ],
    });
  });

  it('records run log entries', () => {
    const id = store.logScrapeStart('gratitude');
    store.logScrapeEnd(id, 'interrupted', 12, 9);

    const [log] = store.getRecentLogs();
    expect(log).toMatchObject({
      id,
      query: 'gratitude',
      status: 'interrupted',
      items_found: 12,
      items_new: 9,
      error: null,
    });
    expect(log.completed_at).not.toBeNull();
  });
});

describe('schema migration', () => {
  it('adds scoring columns to an older table and keeps its rows', () => {
    const db = new Database(':memory:');
    db.exec(`
      CREATE TABLE linkedin_posts (
        post_id TEXT PRIMARY KEY,
        text TEXT NOT NULL,
        post_date TEXT,
        post_author TEXT,
        profile_headline TEXT,
        post_url TEXT,
        hashtags TEXT
      );
      INSERT INTO linkedin_posts (post_id, text) VALUES ('old', 'From before');
    `);

    initializeDatabase(db);

    const columns = (db.prepare('PRAGMA table_info(linkedin_posts)').all() as Array<{ name: string }>).map(c => c.name);
    expect(columns).toEqual(expect.arrayContaining(['search_query', 'severity', 'reasons']));
    expect(new PostStore(db).fetchUnscored(10)).toEqual([{ post_id: 'old', text: 'From before' }]);
  });
});
