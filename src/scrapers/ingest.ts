import path from 'path';
import fs from 'fs';
import type { FeedDriver, PostElement } from './driver.js';
import {
  buildSearchUrl,
  classifyLoginLocation,
  expandTruncatedPosts,
  extractPost,
  readLoginErrors,
  submitCredentials,
  type Credentials,
  type ExtractedPost,
} from './linkedin.js';
import { EXTRACTION_STRATEGIES, LINKEDIN_URLS, SEE_MORE_SELECTOR, type ExtractionStrategy } from './selectors.js';
import type { PostRecord, PostSink } from '../db/queries.js';
import type { CancellationToken } from '../core/cancellation.js';
import type { Prompter } from '../core/prompt.js';
import { LoginError, NavigationError, isQueryFatal } from '../core/errors.js';
import { logger, describeError } from '../core/logger.js';

export type IngestState =
  | 'LoggingIn'
  | 'Navigating'
  | 'Extracting'
  | 'Scrolling'
  | 'Flushing'
  | 'Done'
  | 'LoginFailed'
  | 'Interrupted';

export type IngestStatus = 'completed' | 'login_failed' | 'failed' | 'interrupted';

export interface IngestOptions {
  maxPosts: number;
  batchSize: number;
  scrollDelayMs: number;
  loginSettleMs: number;
  searchSettleMs: number;
  feedSettleMs: number;
  expandDelayMs: number;
  initialAttempts: number;
  initialRetryDelayMs: number;
  /** consecutive scroll cycles without a new post before giving up */
  emptyScrollLimit: number;
  /** where "no posts found" screenshots go; null disables them */
  debugDir: string | null;
}

export interface IngestContext {
  query: string | null;
  completedQueries: string[];
  /** posts_collected from a resumed checkpoint; informational only */
  resumeOffset: number;
}

export interface IngestResult {
  status: IngestStatus;
  query: string | null;
  collected: number;
  saved: number;
  skipped: number;
  error?: string;
}

export interface CheckpointWriter {
  save(completedQueries: string[], currentQuery: string | null, postsCollected: number): void;
}

export interface IngestDeps {
  driver: FeedDriver;
  sink: PostSink;
  checkpoint: CheckpointWriter;
  token: CancellationToken;
  prompter: Prompter;
  credentials: Credentials;
}

const TERMINAL_STATES: ReadonlySet<IngestState> = new Set(['Done', 'LoginFailed', 'Interrupted']);

/**
 * Drives one query's browser session: log in, open the results, then
 * extract / scroll until the post budget is met or the page stops yielding
 * new posts. Pending posts are flushed in batches, each flush followed by a
 * checkpoint, so an interrupted run loses at most the posts still on screen.
 */
export class FeedIngestor {
  private pending: PostRecord[] = [];
  private seenIds = new Set<string>();
  private collected = 0;
  private saved = 0;
  private skipped = 0;
  private emptyCycles = 0;
  private initialPassDone = false;
  private context: IngestContext = { query: null, completedQueries: [], resumeOffset: 0 };

  constructor(
    private deps: IngestDeps,
    private options: IngestOptions
  ) {}

  /**
   * Cumulative progress for the current query, as written to checkpoints.
   * A resumed query replays the feed from the top, so posts counted in
   * `resumeOffset` are counted again as they are re-collected. The figure is
   * informational and overcounts after a resume.
   */
  get postsCollected(): number {
    return this.context.resumeOffset + this.collected;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  async run(context: IngestContext): Promise<IngestResult> {
    this.reset(context);
    const label = context.query ?? 'feed';

    if (context.resumeOffset > 0) {
      logger.info(`Resuming "${label}" after ${context.resumeOffset} previously collected posts`);
    }

    let state: IngestState = 'LoggingIn';

    try {
      while (!TERMINAL_STATES.has(state)) {
        if (this.deps.token.isCancelled) {
          state = 'Interrupted';
          break;
        }
        const next = await this.step(state);
        logger.debug(`[${label}] ${state} -> ${next}`);
        state = next;
      }
    } catch (error) {
      const message = describeError(error);
      this.flush();
      this.writeCheckpoint();

      if (isQueryFatal(error)) {
        logger.error(`Aborting "${label}": ${message}`);
        return this.result('failed', message);
      }
      throw error;
    }

    if (state === 'LoginFailed') {
      return this.result('login_failed', 'Login failed');
    }

    if (state === 'Interrupted') {
      logger.warn(`Interrupted while scraping "${label}", saving progress`);
      this.flush();
      this.writeCheckpoint();
      return this.result('interrupted');
    }

    logger.info(`Finished "${label}": ${this.collected} collected, ${this.saved} new, ${this.skipped} skipped`);
    return this.result('completed');
  }

  private async step(state: IngestState): Promise<IngestState> {
    switch (state) {
      case 'LoggingIn':
        return this.logIn();
      case 'Navigating':
        return this.navigate();
      case 'Extracting':
        return this.extract();
      case 'Scrolling':
        return this.scroll();
      case 'Flushing':
        this.flush();
        return 'Done';
      default:
        return state;
    }
  }

  private async logIn(): Promise<IngestState> {
    const { driver, token, credentials, prompter } = this.deps;

    logger.info('Logging in...');
    try {
      await submitCredentials(driver, credentials);
    } catch (error) {
      throw new LoginError(`Login page unavailable: ${describeError(error)}`, 'login_page_unavailable');
    }

    await token.sleep(this.options.loginSettleMs);
    if (token.isCancelled) return 'Interrupted';

    const errors = await readLoginErrors(driver).catch(() => []);
    const outcome = classifyLoginLocation(driver.url(), errors);
    logger.debug(`Location after login: ${driver.url()} (${outcome})`);

    switch (outcome) {
      case 'CheckpointChallenge':
        logger.warn('Security checkpoint detected. Complete the verification in the browser window.');
        await prompter.ask('Press Enter after completing the security verification...');
        return token.isCancelled ? 'Interrupted' : 'Navigating';
      case 'LoginFailed':
        for (const message of errors) {
          logger.error(`Login error: ${message}`);
        }
        logger.error('Login failed. Check your credentials.');
        return 'LoginFailed';
      case 'LoginOk':
        if (driver.url().includes('login')) {
          logger.warn('Still on the login page but no error shown, continuing');
        } else {
          logger.info('Login successful');
        }
        return 'Navigating';
    }
  }

  private async navigate(): Promise<IngestState> {
    const { driver, token } = this.deps;
    const { query } = this.context;
    const url = query ? buildSearchUrl(query) : LINKEDIN_URLS.FEED;

    logger.info(query ? `Opening search results for "${query}"` : 'Opening feed');
    try {
      await driver.goto(url);
    } catch (error) {
      throw new NavigationError(`Could not open ${url}: ${describeError(error)}`, 'navigation_failed');
    }

    await token.sleep(query ? this.options.searchSettleMs : this.options.feedSettleMs);
    return token.isCancelled ? 'Interrupted' : 'Extracting';
  }

  private async extract(): Promise<IngestState> {
    const { token } = this.deps;

    if (!this.initialPassDone) {
      this.initialPassDone = true;
      for (let attempt = 1; attempt <= this.options.initialAttempts; attempt++) {
        const added = await this.extractionPass();
        if (added > 0 || token.isCancelled) break;
        if (attempt < this.options.initialAttempts) {
          logger.info(`No posts yet, retrying (${attempt}/${this.options.initialAttempts})`);
          await token.sleep(this.options.initialRetryDelayMs);
        }
      }
    } else {
      const added = await this.extractionPass();
      if (added === 0) {
        this.emptyCycles++;
        logger.info(`No new posts after scrolling (${this.emptyCycles}/${this.options.emptyScrollLimit})`);
      } else {
        this.emptyCycles = 0;
      }
    }

    if (token.isCancelled) return 'Interrupted';

    logger.info(`Posts collected: ${this.runTotal()}/${this.options.maxPosts}`);
    return this.shouldStop() ? 'Flushing' : 'Scrolling';
  }

  private async scroll(): Promise<IngestState> {
    const { driver, token } = this.deps;

    try {
      await driver.scrollByViewport();
    } catch (error) {
      logger.warn(`Scroll failed: ${describeError(error)}`);
      this.emptyCycles++;
      return this.shouldStop() ? 'Flushing' : 'Scrolling';
    }

    await token.sleep(this.options.scrollDelayMs);
    return token.isCancelled ? 'Interrupted' : 'Extracting';
  }

  /** One pass over what is currently rendered; returns the number of new posts queued. */
  private async extractionPass(): Promise<number> {
    const { driver, token } = this.deps;

    const buttons = await driver.queryAll(SEE_MORE_SELECTOR).catch(() => []);
    if (buttons.length > 0) {
      const expanded = await expandTruncatedPosts(
        buttons,
        () => token.sleep(this.options.expandDelayMs),
        () => token.isCancelled
      );
      logger.debug(`Expanded ${expanded}/${buttons.length} truncated posts`);
    }

    const match = await this.locatePosts();
    if (!match) {
      logger.warn('No posts found with any extraction strategy');
      await this.captureScreenshot('no-posts-found');
      return 0;
    }

    let added = 0;
    for (const element of match.elements) {
      if (token.isCancelled || this.reachedMax()) break;

      let extracted: ExtractedPost | null;
      try {
        extracted = await extractPost(element, match.strategy, this.context.query);
      } catch (error) {
        logger.warn(`Could not extract post: ${describeError(error)}`);
        continue;
      }
      if (!extracted) continue;

      // Generated ids never repeat, so only URN-backed posts go through the seen-set
      if (extracted.hasStableId) {
        if (this.seenIds.has(extracted.record.post_id)) continue;
        this.seenIds.add(extracted.record.post_id);
      }

      this.pending.push(extracted.record);
      added++;
      logger.debug(`Post ${this.runTotal()}: ${extracted.record.text.slice(0, 100)}`);

      if (this.pending.length >= this.options.batchSize) {
        this.flush();
      }
    }

    return added;
  }

  private async locatePosts(): Promise<{ strategy: ExtractionStrategy; elements: PostElement[] } | null> {
    for (const strategy of EXTRACTION_STRATEGIES) {
      try {
        const elements = await this.deps.driver.queryAll(strategy.container);
        if (elements.length > 0) {
          logger.debug(`Found ${elements.length} posts using strategy: ${strategy.name}`);
          return { strategy, elements };
        }
      } catch (error) {
        logger.debug(`Strategy ${strategy.name} failed: ${describeError(error)}`);
      }
    }
    return null;
  }

  private flush(): void {
    if (this.pending.length === 0) return;

    const batch = this.pending.splice(0, this.pending.length);
    const result = this.deps.sink.upsertMany(batch);
    this.collected += batch.length;
    this.saved += result.saved;
    this.skipped += result.skipped;

    this.writeCheckpoint();
    logger.info(`💾 Flushed ${batch.length} posts (${result.saved} new, ${result.skipped} skipped, total: ${this.collected})`);
  }

  private writeCheckpoint(): void {
    this.deps.checkpoint.save(this.context.completedQueries, this.context.query, this.postsCollected);
  }

  private async captureScreenshot(label: string): Promise<void> {
    if (!this.options.debugDir) return;
    try {
      if (!fs.existsSync(this.options.debugDir)) {
        fs.mkdirSync(this.options.debugDir, { recursive: true });
      }
      const filePath = path.join(this.options.debugDir, `${label}-${Date.now()}.png`);
      await this.deps.driver.screenshot(filePath);
      logger.warn(`Screenshot saved: ${filePath}`);
    } catch (error) {
      logger.debug(`Screenshot failed: ${describeError(error)}`);
    }
  }

  private runTotal(): number {
    return this.collected + this.pending.length;
  }

  private reachedMax(): boolean {
    return this.runTotal() >= this.options.maxPosts;
  }

  private shouldStop(): boolean {
    return this.reachedMax() || this.emptyCycles >= this.options.emptyScrollLimit;
  }

  private reset(context: IngestContext): void {
    this.context = { ...context, completedQueries: [...context.completedQueries] };
    this.pending = [];
    this.seenIds.clear();
    this.collected = 0;
    this.saved = 0;
    this.skipped = 0;
    this.emptyCycles = 0;
    this.initialPassDone = false;
  }

  private result(status: IngestStatus, error?: string): IngestResult {
    return {
      status,
      query: this.context.query,
      collected: this.collected,
      saved: this.saved,
      skipped: this.skipped,
      error,
    };
  }
}
