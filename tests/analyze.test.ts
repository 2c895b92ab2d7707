import { beforeEach, describe, expect, it, vi } from 'vitest';
import { SeverityClassifier, runAnalysis } from '../src/pipeline/analyze.js';
import type { LanguageModel } from '../src/pipeline/model.js';
import { OpenAICompatibleModel } from '../src/pipeline/model.js';
import { UNPARSED_REASONS } from '../src/pipeline/severity.js';
import { CancellationToken } from '../src/core/cancellation.js';
import { ModelError } from '../src/core/errors.js';
import { openDatabase } from '../src/db/schema.js';
import { PostStore, type PostRecord } from '../src/db/queries.js';

const OPTIONS = { batchSize: 2, recordDelayMs: 0, batchDelayMs: 0 };

function record(postId: string, text: string): PostRecord {
  return {
    post_id: postId,
    text,
    post_date: null,
    post_author: null,
    profile_headline: null,
    post_url: null,
    hashtags: null,
    search_query: null,
  };
}

function fakeModel(respond: (prompt: string) => string): LanguageModel {
  return { name: 'fake', generate: vi.fn(async (prompt: string) => respond(prompt)) };
}

describe('SeverityClassifier', () => {
  it('returns the parsed rating with the raw response', async () => {
    const classifier = new SeverityClassifier(fakeModel(() => 'Severity: 2\nReasons:\n- dismisses grief'));

    expect(await classifier.classify('Everything happens for a reason')).toEqual({
      severity: '2',
      reasons: '- dismisses grief',
      rawResponse: 'Severity: 2\nReasons:\n- dismisses grief',
    });
  });

  it('embeds the post text in the prompt', async () => {
    const model = fakeModel(() => 'Severity: 0');

    await new SeverityClassifier(model).classify('Happy Monday');

    expect(model.generate).toHaveBeenCalledWith(expect.stringContaining('Post:\nHappy Monday'));
  });
});

describe('runAnalysis', () => {
  let store: PostStore;

  beforeEach(() => {
    store = new PostStore(openDatabase(':memory:'));
    store.upsertMany([record('1', 'calm post'), record('2', 'grind post'), record('3', 'odd post')]);
  });

  it('scores every unscored post across batches', async () => {
    const model = fakeModel(() => 'Severity: 1\nReasons:\n- mild');

    const summary = await runAnalysis(store, new SeverityClassifier(model), new CancellationToken(), OPTIONS);

    expect(summary).toEqual({ processed: 3, scored: 3, unknown: 0, failed: 0, interrupted: false });
    expect(store.fetchUnscored(10)).toEqual([]);
    expect(store.getPosts({ severity: '1' })).toHaveLength(3);
    expect(model.generate).toHaveBeenCalledTimes(3);
  });

  it('stores Unknown when no severity can be read', async () => {
    const model = fakeModel(prompt => (prompt.endsWith('odd post') ? 'I would rather not say.' : 'Severity: 0'));

    const summary = await runAnalysis(store, new SeverityClassifier(model), new CancellationToken(), OPTIONS);

    expect(summary.unknown).toBe(1);
    const [odd] = store.getPosts({ severity: 'Unknown' });
    expect(odd.post_id).toBe('3');
    expect(odd.reasons).toBe(UNPARSED_REASONS);
  });

  it('leaves a post unscored when the model fails and still drains the rest', async () => {
    const model: LanguageModel = {
      name: 'flaky',
      generate: vi.fn(async (prompt: string) => {
        if (prompt.endsWith('grind post')) throw new ModelError('Request timed out', 'timeout');
        return 'Severity: 3\nReasons:\n- hustle';
      }),
    };

    const summary = await runAnalysis(store, new SeverityClassifier(model), new CancellationToken(), OPTIONS);

    expect(summary).toEqual({ processed: 3, scored: 2, unknown: 0, failed: 1, interrupted: false });
    expect(store.fetchUnscored(10)).toEqual([{ post_id: '2', text: 'grind post' }]);
    expect(model.generate).toHaveBeenCalledTimes(3);
  });

  it('stops after the current post when cancelled', async () => {
    const token = new CancellationToken();
    const model = fakeModel(() => {
      token.cancel('SIGINT');
      return 'Severity: 2';
    });

    const summary = await runAnalysis(store, new SeverityClassifier(model), token, OPTIONS);

    expect(summary.processed).toBe(1);
    expect(summary.interrupted).toBe(true);
    expect(store.fetchUnscored(10)).toHaveLength(2);
  });
});

describe('OpenAICompatibleModel', () => {
  it('requires an access token', () => {
    expect(
      () =>
        new OpenAICompatibleModel({
          token: '',
          baseUrl: 'http://localhost:11434/v1',
          model: 'mistral',
          temperature: 0.3,
          maxTokens: 512,
          topP: 0.9,
        })
    ).toThrow(ModelError);
  });
});
