import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CheckpointStore } from '../src/core/checkpoint.js';

describe('CheckpointStore', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'checkpoint-'));
    filePath = path.join(dir, 'nested', 'checkpoint.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns empty defaults when nothing was saved', () => {
    const store = new CheckpointStore(filePath);

    expect(store.exists()).toBe(false);
    expect(store.load()).toEqual({ completedQueries: [], currentQuery: null, postsCollected: 0 });
  });

  it('round-trips a snapshot', () => {
    const store = new CheckpointStore(filePath);

    store.save(['gratitude', 'hustle'], 'mindset', 30);

    expect(store.load()).toEqual({
      completedQueries: ['gratitude', 'hustle'],
      currentQuery: 'mindset',
      postsCollected: 30,
    });
  });

  it('writes the documented file shape and leaves no temp files', () => {
    const store = new CheckpointStore(filePath, 'tester@example.com');

    store.save(['a'], null, 0);

    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    expect(raw).toMatchObject({
      username: 'tester@example.com',
      completed_queries: ['a'],
      current_query: null,
      posts_collected: 0,
    });
    expect(raw).toHaveProperty('timestamp');
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(['checkpoint.json']);
  });

  it('overwrites the previous snapshot', () => {
    const store = new CheckpointStore(filePath);

    store.save([], 'a', 10);
    store.save(['a'], null, 0);

    expect(store.load()).toEqual({ completedQueries: ['a'], currentQuery: null, postsCollected: 0 });
  });

  it('ignores unreadable or malformed files', () => {
    const store = new CheckpointStore(filePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });

    fs.writeFileSync(filePath, '{ not json');
    expect(store.load()).toEqual({ completedQueries: [], currentQuery: null, postsCollected: 0 });

    fs.writeFileSync(filePath, JSON.stringify({ completed_queries: 'a', posts_collected: -1 }));
    expect(store.load()).toEqual({ completedQueries: [], currentQuery: null, postsCollected: 0 });
  });

  it('clears the snapshot', () => {
    const store = new CheckpointStore(filePath);
    store.save([], 'a', 5);

    store.clear();

    expect(store.exists()).toBe(false);
    expect(() => store.clear()).not.toThrow();
  });
});
