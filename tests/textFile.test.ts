import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TextFileSink, defaultOutputName, formatPostBlock, idsPathFor } from '../src/output/textFile.js';
import type { PostRecord } from '../src/db/queries.js';

const SEPARATOR = '='.repeat(80);

function record(postId: string, text: string): PostRecord {
  return {
    post_id: postId,
    text,
    post_date: null,
    post_author: null,
    profile_headline: null,
    post_url: null,
    hashtags: null,
    search_query: 'q',
  };
}

describe('TextFileSink', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'text-sink-'));
    filePath = path.join(dir, 'posts.txt');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('numbers posts across flushes', () => {
    const sink = new TextFileSink(filePath);

    expect(sink.upsertMany([record('1', 'first'), record('2', 'second')])).toEqual({ saved: 2, skipped: 0 });
    expect(sink.upsertMany([record('3', 'third'), record('4', '')])).toEqual({ saved: 1, skipped: 1 });

    expect(fs.readFileSync(filePath, 'utf-8')).toBe(
      `Post 1:\nfirst\n\n${SEPARATOR}\n\n` +
        `Post 2:\nsecond\n\n${SEPARATOR}\n\n` +
        `Post 3:\nthird\n\n${SEPARATOR}\n\n`
    );
    expect(sink.count).toBe(3);
  });

  it('continues numbering in an existing file', () => {
    new TextFileSink(filePath).upsertMany([record('1', 'first'), record('2', 'second')]);

    const resumed = new TextFileSink(filePath);
    resumed.upsertMany([record('3', 'third')]);

    expect(resumed.count).toBe(3);
    expect(fs.readFileSync(filePath, 'utf-8').endsWith(formatPostBlock(3, 'third'))).toBe(true);
  });

  it('skips posts already written by an earlier run', () => {
    new TextFileSink(filePath).upsertMany([record('1', 'first'), record('2', 'second')]);

    const resumed = new TextFileSink(filePath);
    const result = resumed.upsertMany([record('1', 'first'), record('2', 'second'), record('3', 'third')]);

    expect(result).toEqual({ saved: 1, skipped: 2 });
    expect(fs.readFileSync(filePath, 'utf-8')).toBe(
      formatPostBlock(1, 'first') + formatPostBlock(2, 'second') + formatPostBlock(3, 'third')
    );
    expect(fs.readFileSync(idsPathFor(filePath), 'utf-8')).toBe('1\n2\n3\n');
  });

  it('ignores header-like lines inside post text when counting', () => {
    new TextFileSink(filePath).upsertMany([record('1', 'Agenda\nPost 7:\nwrap up')]);

    const resumed = new TextFileSink(filePath);
    resumed.upsertMany([record('2', 'next')]);

    expect(resumed.count).toBe(2);
    expect(fs.readFileSync(filePath, 'utf-8').endsWith(formatPostBlock(2, 'next'))).toBe(true);
  });

  it('does not create the file until something is written', () => {
    new TextFileSink(filePath).upsertMany([]);

    expect(fs.existsSync(filePath)).toBe(false);
    expect(fs.existsSync(idsPathFor(filePath))).toBe(false);
  });
});

describe('defaultOutputName', () => {
  it('stamps the local date and time', () => {
    expect(defaultOutputName(new Date(2024, 0, 2, 3, 4, 5))).toBe('linkedin_posts_20240102_030405.txt');
  });
});
